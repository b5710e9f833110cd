/**
 * Single-slot member span cache.
 *
 * Holds the member spans of one document version. A lookup hits only when
 * both the document id and the version match exactly; anything else
 * recomputes and replaces the slot. There is no history: after switching to
 * another version the previous one misses again.
 *
 * Reading and writing the slot are synchronous sections, so they cannot
 * interleave on the event loop. The computation awaits between them, which
 * means two concurrent misses both compute and the last one to finish is
 * what stays cached.
 */

import { createChildLogger, getDefaultLogger, type Logger } from './logger.js';

export type DocumentId = string;
export type VersionStamp = string | number;

/** Half-open `[start, end)` range of source positions. */
export interface TextSpan {
  readonly start: number;
  readonly end: number;
}

export interface MemberSpanSource<TDocument> {
  readonly id: DocumentId;
  readonly document: TDocument;
}

export interface MemberSpanCache<TDocument> {
  getOrCreate(source: MemberSpanSource<TDocument>, version: VersionStamp): Promise<readonly TextSpan[]>;
  save(documentId: DocumentId, version: VersionStamp, spans: readonly TextSpan[]): void;
  fillDebugState(state: Partial<MemberSpanCacheDebugState>): void;
}

export interface MemberSpanCacheOptions<TDocument> {
  computeSpans(document: TDocument, version: VersionStamp): Promise<readonly TextSpan[]>;
  logger?: Logger;
}

export interface MemberSpanCacheDebugState {
  documentId: DocumentId | undefined;
  version: VersionStamp | undefined;
  spanCount: number;
  hits: number;
  misses: number;
}

interface SavedMemberSpans {
  readonly documentId: DocumentId;
  readonly version: VersionStamp;
  readonly spans: readonly TextSpan[];
}

export function createMemberSpanCache<TDocument>(options: MemberSpanCacheOptions<TDocument>): MemberSpanCache<TDocument> {
  const logger = createChildLogger(options.logger ?? getDefaultLogger(), 'member-span-cache');
  let saved: SavedMemberSpans | undefined;
  let hits = 0;
  let misses = 0;

  function lookup(documentId: DocumentId, version: VersionStamp): readonly TextSpan[] | undefined {
    if (saved && saved.documentId === documentId && saved.version === version) return saved.spans;
    return undefined;
  }

  function save(documentId: DocumentId, version: VersionStamp, spans: readonly TextSpan[]): void {
    saved = { documentId, version, spans };
  }

  async function getOrCreate(source: MemberSpanSource<TDocument>, version: VersionStamp): Promise<readonly TextSpan[]> {
    const cached = lookup(source.id, version);
    if (cached) {
      hits++;
      return cached;
    }

    misses++;
    logger.debug({ documentId: source.id, version }, 'member spans miss');
    const spans = await options.computeSpans(source.document, version);
    save(source.id, version, spans);
    return spans;
  }

  function fillDebugState(state: Partial<MemberSpanCacheDebugState>): void {
    state.documentId = saved?.documentId;
    state.version = saved?.version;
    state.spanCount = saved ? saved.spans.length : 0;
    state.hits = hits;
    state.misses = misses;
  }

  return {
    getOrCreate,
    save,
    fillDebugState,
  };
}
