import { describe, expect, test } from 'vitest';
import { createMemberSpanCache, type TextSpan, type VersionStamp } from '../member-span-cache.js';

interface FakeDocument {
  readonly text: string;
}

function spansFor(version: VersionStamp): TextSpan[] {
  return [{ start: 0, end: String(version).length }];
}

function createCountingCache() {
  const computed: VersionStamp[] = [];
  const cache = createMemberSpanCache<FakeDocument>({
    async computeSpans(_document, version) {
      computed.push(version);
      return spansFor(version);
    },
  });
  return { cache, computed };
}

const documentD = { id: 'D', document: { text: 'class C { void M() { } }' } };

describe('member span cache', () => {
  test('repeated lookups with the same document and version hit', async () => {
    const { cache, computed } = createCountingCache();
    const first = await cache.getOrCreate(documentD, 'v1');
    const second = await cache.getOrCreate(documentD, 'v1');
    expect(second).toBe(first);
    expect(computed).toEqual(['v1']);
  });

  test('a new version recomputes and replaces the single slot', async () => {
    const { cache, computed } = createCountingCache();
    await cache.getOrCreate(documentD, 'v1');
    const v2 = await cache.getOrCreate(documentD, 'v2');
    expect(v2).toEqual([{ start: 0, end: 2 }]);

    await cache.getOrCreate(documentD, 'v1');
    expect(computed).toEqual(['v1', 'v2', 'v1']);
  });

  test('the document id is part of the key', async () => {
    const { cache, computed } = createCountingCache();
    await cache.getOrCreate(documentD, 7);
    await cache.getOrCreate({ id: 'E', document: documentD.document }, 7);
    expect(computed).toEqual([7, 7]);
  });

  test('versions compare by strict equality', async () => {
    const { cache, computed } = createCountingCache();
    await cache.getOrCreate(documentD, 1);
    await cache.getOrCreate(documentD, '1');
    expect(computed).toEqual([1, '1']);
  });

  test('save overwrites the slot without computing', async () => {
    const { cache, computed } = createCountingCache();
    const saved: TextSpan[] = [{ start: 3, end: 9 }];
    cache.save('D', 'v5', saved);
    expect(await cache.getOrCreate(documentD, 'v5')).toBe(saved);
    expect(computed).toEqual([]);
  });

  test('concurrent misses both compute and the last writer wins', async () => {
    const releases: Array<() => void> = [];
    let calls = 0;
    const cache = createMemberSpanCache<FakeDocument>({
      computeSpans() {
        calls++;
        const spans = [{ start: calls, end: calls + 1 }];
        return new Promise<readonly TextSpan[]>((resolve) => {
          releases.push(() => resolve(spans));
        });
      },
    });

    const first = cache.getOrCreate(documentD, 'v1');
    const second = cache.getOrCreate(documentD, 'v1');
    expect(calls).toBe(2);

    // Finish the second computation before the first
    releases[1]();
    await second;
    releases[0]();
    const firstSpans = await first;

    expect(firstSpans).toEqual([{ start: 1, end: 2 }]);
    expect(await cache.getOrCreate(documentD, 'v1')).toBe(firstSpans);
    expect(calls).toBe(2);
  });

  test('debug state reports the slot and hit counts', async () => {
    const { cache } = createCountingCache();
    await cache.getOrCreate(documentD, 'v1');
    await cache.getOrCreate(documentD, 'v1');
    const dbg = {};
    cache.fillDebugState(dbg);
    expect(dbg).toEqual({ documentId: 'D', version: 'v1', spanCount: 1, hits: 1, misses: 1 });
  });
});
