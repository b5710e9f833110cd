/**
 * Markup text escaping.
 * Only `<`, `>` and `&` are reserved; everything else, quotes included, is
 * written through unchanged.
 */

import { getMarkupEscape, isReservedMarkupCharacter } from './character-codes.js';

/**
 * Receiver of escaped output: unreserved runs arrive as ranges of the source
 * text, escape tokens as whole strings. TextBuffer satisfies this shape.
 */
export interface EncodedTextSink {
  append(text: string): void;
  appendRange(text: string, start: number, end: number): void;
}

/**
 * Writes `text` into `sink` with reserved characters replaced.
 * Single left-to-right pass; each run between reserved characters is handed
 * over as one range.
 */
export function appendEncodedText(sink: EncodedTextSink, text: string): void {
  const length = text.length;
  let runStart = 0;

  for (let index = 0; index < length; index++) {
    const escape = getMarkupEscape(text.charCodeAt(index));
    if (escape === undefined) continue;

    if (index > runStart) {
      sink.appendRange(text, runStart, index);
    }
    sink.append(escape);
    runStart = index + 1;
  }

  if (length > runStart) {
    sink.appendRange(text, runStart, length);
  }
}

/**
 * Returns `text` with reserved characters escaped.
 * Text without reserved characters is returned as the same string.
 */
export function encodeMarkupText(text: string): string {
  let firstReserved = -1;
  for (let i = 0; i < text.length; i++) {
    if (isReservedMarkupCharacter(text.charCodeAt(i))) {
      firstReserved = i;
      break;
    }
  }
  if (firstReserved < 0) return text;

  const parts: string[] = [text.substring(0, firstReserved)];
  appendEncodedText({
    append: (part) => { parts.push(part); },
    appendRange: (source, start, end) => { parts.push(source.substring(start, end)); },
  }, text.substring(firstReserved));
  return parts.join('');
}

const decodedTokens: ReadonlyArray<readonly [token: string, ch: string]> = [
  ['&lt;', '<'],
  ['&gt;', '>'],
  ['&amp;', '&'],
];

/**
 * Inverse of encodeMarkupText. Only the three escape tokens are recognised;
 * any other `&` sequence is copied as is.
 */
export function decodeMarkupText(text: string): string {
  let ampersand = text.indexOf('&');
  if (ampersand < 0) return text;

  const parts: string[] = [];
  let runStart = 0;

  while (ampersand >= 0) {
    let matched = false;
    for (const [token, ch] of decodedTokens) {
      if (text.startsWith(token, ampersand)) {
        parts.push(text.substring(runStart, ampersand), ch);
        runStart = ampersand + token.length;
        matched = true;
        break;
      }
    }
    ampersand = text.indexOf('&', matched ? runStart : ampersand + 1);
  }

  parts.push(text.substring(runStart));
  return parts.join('');
}

/**
 * Writes a double-quoted attribute value.
 * Same reserved set as text content.
 */
export function appendEncodedAttributeValue(sink: EncodedTextSink, value: string): void {
  sink.append('"');
  appendEncodedText(sink, value);
  sink.append('"');
}
