import { MarkupEncoderError, MarkupErrorCode } from '../errors.js';
import { createChildLogger, getDefaultLogger, type Logger } from '../logger.js';
import { isEmptyAttribute, type AttributeInfo } from './attribute.js';
import { appendEncodedAttributeValue, appendEncodedText } from './escape.js';
import { createTextBuffer, type TextBufferDebugState } from './text-buffer.js';

export interface TagWriter {
  /** Writes `<name a="v">` for every non-empty attribute. */
  appendOpenTag(name: string, attributes: readonly AttributeInfo[]): void;

  /** Writes `</name>`. */
  appendCloseTag(name: string): void;

  /** Writes `<name/>`, with attributes when non-empty ones are given. */
  appendLeafTag(name: string, attributes?: readonly AttributeInfo[]): void;

  /** Writes text with `<`, `>` and `&` escaped. */
  appendEncoded(text: string): void;

  appendLineBreak(): void;

  /**
   * Opens an element scope. The returned handle must be closed in LIFO
   * order; prefer `within` so the close runs on every exit path.
   */
  openTag(name: string, ...attributes: AttributeInfo[]): TagScope;

  /**
   * Runs `body` inside `scope` and closes it afterwards. When `body` throws,
   * scopes it left open are closed first and its error is rethrown.
   */
  within<T>(scope: TagScope, body: () => T): T;

  /**
   * Current buffer length, registered as a checkpoint `rewind` accepts.
   * Release it once the output after it is kept.
   */
  mark(): number;

  /** Drops a checkpoint from `mark` without touching the output. */
  release(checkpoint: number): void;

  /** Truncates the output back to a checkpoint from `mark`. */
  rewind(checkpoint: number): void;

  /** Keeps whatever `body` writes only when it returns a truthy value. */
  tryEmit<T>(body: () => T): T;

  /** Runs `body` and always discards what it wrote. */
  lookAhead<T>(body: () => T): T;

  /** Number of open scopes. */
  readonly depth: number;

  /** Output length so far. */
  readonly length: number;

  /** Final output; fails while scopes are still open. */
  finish(): string;

  /** Output so far, whatever the scope state. */
  toString(): string;

  fillDebugState(state: Partial<TagWriterDebugState>): void;
}

export interface TagScope {
  readonly name: string;
  /** Buffer offset of the scope's `<`. */
  readonly start: number;
  readonly isOpen: boolean;
  close(): void;
}

export interface TagWriterOptions {
  newLine?: '\n' | '\r\n';
  logger?: Logger;
}

export interface TagWriterDebugState extends TextBufferDebugState {
  depth: number;
  checkpointCount: number;
  openScopes: string[];
}

const enum ScopeState {
  Open,
  Closed,
  Discarded,
}

interface ScopeRecord {
  readonly name: string;
  readonly start: number;
  state: ScopeState;
}

interface Checkpoint {
  readonly offset: number;
  /** Scopes open when the checkpoint was taken. */
  readonly depth: number;
}

export function createTagWriter(options: TagWriterOptions = {}): TagWriter {
  const newLine = options.newLine ?? '\n';
  const logger = createChildLogger(options.logger ?? getDefaultLogger(), 'tag-writer');
  const buffer = createTextBuffer();

  const scopes: ScopeRecord[] = [];
  const scopeRecords = new WeakMap<TagScope, ScopeRecord>();
  // Live checkpoints, offsets ascending: a rewind drops every later one
  const checkpoints: Checkpoint[] = [];

  function appendAttributes(attributes: readonly AttributeInfo[]): void {
    for (const attribute of attributes) {
      if (isEmptyAttribute(attribute)) continue;
      buffer.append(' ');
      buffer.append(attribute.name);
      buffer.append('=');
      appendEncodedAttributeValue(buffer, attribute.value);
    }
  }

  function appendOpenTag(name: string, attributes: readonly AttributeInfo[]): void {
    buffer.append('<');
    buffer.append(name);
    appendAttributes(attributes);
    buffer.append('>');
  }

  function appendCloseTag(name: string): void {
    buffer.append('</');
    buffer.append(name);
    buffer.append('>');
  }

  function appendLeafTag(name: string, attributes: readonly AttributeInfo[] = []): void {
    buffer.append('<');
    buffer.append(name);
    appendAttributes(attributes);
    buffer.append('/>');
  }

  function appendEncoded(text: string): void {
    appendEncodedText(buffer, text);
  }

  function appendLineBreak(): void {
    buffer.append(newLine);
  }

  function closeScope(record: ScopeRecord): void {
    if (record.state === ScopeState.Closed)
      throw new MarkupEncoderError(MarkupErrorCode.ScopeAlreadyClosed,
        `Element <${record.name}> at offset ${record.start} is already closed`);
    if (record.state === ScopeState.Discarded)
      throw new MarkupEncoderError(MarkupErrorCode.ScopeDiscarded,
        `Element <${record.name}> at offset ${record.start} was discarded by a rewind`);

    const innermost = scopes[scopes.length - 1];
    if (innermost !== record)
      throw new MarkupEncoderError(MarkupErrorCode.ScopeNotInnermost,
        `Cannot close <${record.name}> while <${innermost.name}> is still open`);

    appendCloseTag(record.name);
    scopes.pop();
    record.state = ScopeState.Closed;
  }

  function openTag(name: string, ...attributes: AttributeInfo[]): TagScope {
    const record: ScopeRecord = { name, start: buffer.length, state: ScopeState.Open };
    appendOpenTag(name, attributes);
    scopes.push(record);

    const scope: TagScope = {
      name,
      start: record.start,
      get isOpen() { return record.state === ScopeState.Open; },
      close: () => closeScope(record),
    };
    scopeRecords.set(scope, record);
    return scope;
  }

  /** Closes `record` along with every scope opened inside it. */
  function unwindTo(record: ScopeRecord): void {
    while (scopes.length > 0 && scopes[scopes.length - 1] !== record) {
      closeScope(scopes[scopes.length - 1]);
    }
    closeScope(record);
  }

  function within<T>(scope: TagScope, body: () => T): T {
    let result: T;
    try {
      result = body();
    } catch (error) {
      // A scope already discarded by a rewind is left alone
      if (scope.isOpen) {
        const record = scopeRecords.get(scope);
        if (record) unwindTo(record);
        else scope.close();
      }
      throw error;
    }
    scope.close();
    return result;
  }

  function mark(): number {
    const offset = buffer.length;
    checkpoints.push({ offset, depth: scopes.length });
    logger.trace({ offset, depth: scopes.length }, 'mark');
    return offset;
  }

  function findCheckpoint(offset: number): number {
    for (let i = checkpoints.length - 1; i >= 0; i--) {
      if (checkpoints[i].offset === offset) return i;
      if (checkpoints[i].offset < offset) break;
    }
    return -1;
  }

  function rewind(checkpoint: number): void {
    if (checkpoint > buffer.length)
      throw new MarkupEncoderError(MarkupErrorCode.RewindPastEnd,
        `Cannot rewind to ${checkpoint}, output length is ${buffer.length}`);

    const index = findCheckpoint(checkpoint);
    if (index < 0)
      throw new MarkupEncoderError(MarkupErrorCode.UnknownCheckpoint,
        `${checkpoint} is not a live checkpoint`);

    let surviving = scopes.length;
    while (surviving > 0 && scopes[surviving - 1].start >= checkpoint) surviving--;
    if (surviving < checkpoints[index].depth)
      throw new MarkupEncoderError(MarkupErrorCode.RewindAcrossClose,
        `Cannot rewind to ${checkpoint}: an element open at that point has since been closed`);

    const discarded = scopes.splice(surviving);
    for (const record of discarded) record.state = ScopeState.Discarded;
    checkpoints.length = index + 1;

    if (logger.isLevelEnabled('debug')) {
      logger.debug({
        from: buffer.length,
        to: checkpoint,
        discardedScopes: discarded.map((record) => record.name),
      }, 'rewind');
    }

    buffer.truncate(checkpoint);
  }

  function release(checkpoint: number): void {
    const index = findCheckpoint(checkpoint);
    if (index < 0) return;
    checkpoints.splice(index, 1);
    logger.trace({ offset: checkpoint }, 'release');
  }

  /** Rewinds after `body` threw; a failed rewind carries the body's error as its cause. */
  function rewindAfterFailure(checkpoint: number, cause: unknown): void {
    try {
      rewind(checkpoint);
    } catch (rewindError) {
      if (rewindError instanceof MarkupEncoderError)
        throw new MarkupEncoderError(rewindError.code, rewindError.message, { cause });
      throw rewindError;
    }
  }

  function tryEmit<T>(body: () => T): T {
    const checkpoint = mark();
    try {
      let result: T;
      try {
        result = body();
      } catch (error) {
        rewindAfterFailure(checkpoint, error);
        throw error;
      }
      if (!result) rewind(checkpoint);
      return result;
    } finally {
      release(checkpoint);
    }
  }

  function lookAhead<T>(body: () => T): T {
    const checkpoint = mark();
    try {
      let result: T;
      try {
        result = body();
      } catch (error) {
        rewindAfterFailure(checkpoint, error);
        throw error;
      }
      rewind(checkpoint);
      return result;
    } finally {
      release(checkpoint);
    }
  }

  function finish(): string {
    if (scopes.length > 0)
      throw new MarkupEncoderError(MarkupErrorCode.UnclosedScopes,
        `Cannot finish with open elements: ${scopes.map((record) => record.name).join(' > ')}`);
    return buffer.materialize();
  }

  function fillDebugState(state: Partial<TagWriterDebugState>): void {
    buffer.fillDebugState(state);
    state.depth = scopes.length;
    state.checkpointCount = checkpoints.length;
    state.openScopes = scopes.map((record) => record.name);
  }

  return {
    appendOpenTag,
    appendCloseTag,
    appendLeafTag,
    appendEncoded,
    appendLineBreak,
    openTag,
    within,
    mark,
    release,
    rewind,
    tryEmit,
    lookAhead,
    get depth() { return scopes.length; },
    get length() { return buffer.length; },
    finish,
    toString: () => buffer.materialize(),
    fillDebugState,
  };
}
