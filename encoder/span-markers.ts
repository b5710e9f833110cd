/**
 * Span markers
 *
 * Pulls open/close markers such as `/*1*\/` and `/*2*\/` out of annotated
 * text and reduces them to sorted, non-overlapping ranges of the stripped
 * text. Each close pairs with the earliest unmatched open; overlapping and
 * touching ranges are merged.
 */

import type { TextSpan } from './member-span-cache.js';

export interface SpanMarkerTokens {
  open: string;
  close: string;
}

export interface MarkedText {
  text: string;
  spans: TextSpan[];
}

export const defaultSpanMarkers: Readonly<SpanMarkerTokens> = { open: '/*1*/', close: '/*2*/' };

export function extractSpanMarkers(annotated: string, markers: SpanMarkerTokens = defaultSpanMarkers): MarkedText {
  if (!markers.open.length || !markers.close.length || markers.open === markers.close)
    throw new Error('SpanMarkers: open and close markers must be distinct and non-empty');

  const parts: string[] = [];
  const pendingOpens: number[] = [];
  const spans: TextSpan[] = [];
  let strippedLength = 0;
  let pos = 0;

  while (pos < annotated.length) {
    const nextOpen = annotated.indexOf(markers.open, pos);
    const nextClose = annotated.indexOf(markers.close, pos);
    if (nextOpen < 0 && nextClose < 0) break;

    const isOpen = nextClose < 0 || (nextOpen >= 0 && nextOpen < nextClose);
    const markerPos = isOpen ? nextOpen : nextClose;

    parts.push(annotated.substring(pos, markerPos));
    strippedLength += markerPos - pos;

    if (isOpen) {
      pendingOpens.push(strippedLength);
      pos = markerPos + markers.open.length;
    } else {
      const start = pendingOpens.shift();
      if (start === undefined)
        throw new Error(`SpanMarkers: close marker at offset ${markerPos} has no matching open marker`);
      spans.push({ start, end: strippedLength });
      pos = markerPos + markers.close.length;
    }
  }

  if (pendingOpens.length > 0)
    throw new Error(`SpanMarkers: open marker at stripped offset ${pendingOpens[0]} is never closed`);

  parts.push(annotated.substring(pos));
  return { text: parts.join(''), spans: mergeSpans(spans) };
}

/** Sorts ranges by start and merges any that overlap or touch. */
export function mergeSpans(spans: readonly TextSpan[]): TextSpan[] {
  const sorted = [...spans].sort((a, b) => a.start - b.start || a.end - b.end);
  const merged: TextSpan[] = [];

  for (const span of sorted) {
    const last = merged[merged.length - 1];
    if (last && span.start <= last.end) {
      if (span.end > last.end) merged[merged.length - 1] = { start: last.start, end: span.end };
    } else {
      merged.push(span);
    }
  }

  return merged;
}
