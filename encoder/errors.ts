/**
 * Encoder error codes.
 * Every code marks a programming error on the caller's side: absent optional
 * data never raises, it takes the empty-attribute path instead.
 */
export enum MarkupErrorCode {
  None,
  UnmappedVariant,
  RewindPastEnd,
  UnknownCheckpoint,
  RewindAcrossClose,
  ScopeNotInnermost,
  ScopeAlreadyClosed,
  ScopeDiscarded,
  UnclosedScopes,
  InvalidOptions,
}

export class MarkupEncoderError extends Error {
  readonly code: MarkupErrorCode;

  constructor(code: MarkupErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'MarkupEncoderError';
    this.code = code;
  }
}

/**
 * Raised from the default branch of an exhaustive switch.
 * The parameter is typed `never` so a missing case fails to compile; values
 * that bypass the type system still reach this at run time.
 */
export function unmappedVariant(enumName: string, value: never, names?: Record<number, string>): never {
  const raw: unknown = value;
  const name = typeof raw === 'number' ? names?.[raw] : undefined;
  const label = name !== undefined ? `${name} (${String(raw)})` : String(raw);
  throw new MarkupEncoderError(MarkupErrorCode.UnmappedVariant, `Invalid ${enumName}: ${label}`);
}
