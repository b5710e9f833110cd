/**
 * TextBuffer - append-only part accumulator behind the tag writer
 *
 * Parts are kept as appended and only joined on materialize(). A running end
 * offset per part lets truncate() cut back to any character index without
 * joining first.
 */

export interface TextBuffer {
  /** Total number of characters appended (and not truncated) so far. */
  readonly length: number;
  append(text: string): void;
  // second parameter is end index (exclusive)
  appendRange(text: string, start: number, end: number): void;
  truncate(length: number): void;
  materialize(): string;
  fillDebugState(state: Partial<TextBufferDebugState>): void;
}

const MAX_PARTS = 1 << 24;

export function createTextBuffer(): TextBuffer {
  const parts: string[] = [];
  // partEnds[i] is the buffer offset right after parts[i]
  const partEnds: number[] = [];
  let length = 0;
  let materializeCount = 0;

  function push(part: string): void {
    if (parts.length >= MAX_PARTS) {
      // Fold everything written so far into one part
      collapse();
    }
    length += part.length;
    parts.push(part);
    partEnds.push(length);
  }

  function append(text: string): void {
    if (!text.length) return;
    push(text);
  }

  function appendRange(text: string, start: number, end: number): void {
    if (start < 0 || end > text.length || start > end)
      throw new Error(`TextBuffer: invalid range [${start}, ${end}) for text of length ${text.length}`);
    if (start === end) return;
    push(start === 0 && end === text.length ? text : text.substring(start, end));
  }

  function truncate(newLength: number): void {
    if (!Number.isInteger(newLength) || newLength < 0 || newLength > length)
      throw new Error(`TextBuffer: cannot truncate to ${newLength}, buffer length is ${length}`);
    if (newLength === length) return;

    // Drop whole parts that start at or after the cut
    while (parts.length > 0 && partEnds[parts.length - 1] - parts[parts.length - 1].length >= newLength) {
      parts.pop();
      partEnds.pop();
    }

    // Trim the part that straddles the cut
    const last = parts.length - 1;
    if (last >= 0 && partEnds[last] > newLength) {
      const partStart = partEnds[last] - parts[last].length;
      parts[last] = parts[last].substring(0, newLength - partStart);
      partEnds[last] = newLength;
    }

    length = newLength;
  }

  function collapse(): string {
    if (parts.length === 0) return '';
    if (parts.length === 1) return parts[0];
    const joined = parts.join('');
    parts.length = 0;
    partEnds.length = 0;
    parts.push(joined);
    partEnds.push(joined.length);
    return joined;
  }

  function materialize(): string {
    materializeCount++;
    return collapse();
  }

  function fillDebugState(state: Partial<TextBufferDebugState>): void {
    state.length = length;
    state.partCount = parts.length;
    state.materializeCount = materializeCount;
  }

  return {
    get length() { return length; },
    append,
    appendRange,
    truncate,
    materialize,
    fillDebugState,
  };
}

export interface TextBufferDebugState {
  length: number;
  partCount: number;
  materializeCount: number;
}
