import { describe, expect, test } from 'vitest';
import { extractSpanMarkers, mergeSpans } from '../span-markers.js';

describe('extractSpanMarkers', () => {
  test('strips markers and reports the marked range', () => {
    const result = extractSpanMarkers('namespace A{/*1*/}/*2*/');
    expect(result.text).toBe('namespace A{}');
    expect(result.spans).toEqual([{ start: 12, end: 13 }]);
  });

  test('separate ranges stay separate', () => {
    const result = extractSpanMarkers('namespace A/*1*/{}/*2*/ class A /*1*/{}/*2*/');
    expect(result.text).toBe('namespace A{} class A {}');
    expect(result.spans).toEqual([{ start: 11, end: 13 }, { start: 22, end: 24 }]);
  });

  test('overlapping ranges merge', () => {
    const result = extractSpanMarkers('a/*1*/bc/*1*/de/*2*/f/*2*/g');
    expect(result.text).toBe('abcdefg');
    // [1, 5) and [3, 6) pair up in order and merge into one range
    expect(result.spans).toEqual([{ start: 1, end: 6 }]);
  });

  test('touching ranges merge', () => {
    const result = extractSpanMarkers('/*1*/ab/*2*//*1*/cd/*2*/');
    expect(result.text).toBe('abcd');
    expect(result.spans).toEqual([{ start: 0, end: 4 }]);
  });

  test('custom markers', () => {
    const result = extractSpanMarkers('x[|yz|]w', { open: '[|', close: '|]' });
    expect(result.text).toBe('xyzw');
    expect(result.spans).toEqual([{ start: 1, end: 3 }]);
  });

  test('text without markers has no spans', () => {
    expect(extractSpanMarkers('plain')).toEqual({ text: 'plain', spans: [] });
  });

  test('unbalanced markers fail', () => {
    expect(() => extractSpanMarkers('a/*2*/b')).toThrow('SpanMarkers: close marker at offset 1 has no matching open marker');
    expect(() => extractSpanMarkers('ab/*1*/c')).toThrow('SpanMarkers: open marker at stripped offset 2 is never closed');
  });

  test('identical open and close markers are rejected', () => {
    expect(() => extractSpanMarkers('a', { open: '|', close: '|' }))
      .toThrow('SpanMarkers: open and close markers must be distinct and non-empty');
  });
});

describe('mergeSpans', () => {
  test('sorts and merges without mutating the input', () => {
    const input = [{ start: 10, end: 12 }, { start: 0, end: 3 }, { start: 2, end: 5 }, { start: 11, end: 11 }];
    expect(mergeSpans(input)).toEqual([{ start: 0, end: 5 }, { start: 10, end: 12 }]);
    expect(input[0]).toEqual({ start: 10, end: 12 });
  });
});
