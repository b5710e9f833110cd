/**
 * Character code constants for markup emission
 * Following TypeScript's character code pattern for consistent character handling
 */

export const enum CharacterCodes {
  lineFeed = 0x0A,              // \n
  carriageReturn = 0x0D,        // \r
  space = 0x20,
  doubleQuote = 0x22,           // "
  ampersand = 0x26,             // &
  slash = 0x2F,                 // /
  lessThan = 0x3C,              // <
  equals = 0x3D,                // =
  greaterThan = 0x3E,           // >
}

/**
 * Characters that must never appear raw in text content or attribute values.
 */
export function isReservedMarkupCharacter(ch: number): boolean {
  return ch === CharacterCodes.lessThan ||
    ch === CharacterCodes.greaterThan ||
    ch === CharacterCodes.ampersand;
}

/**
 * Escape token for a reserved character, or undefined for any other character.
 */
export function getMarkupEscape(ch: number): string | undefined {
  switch (ch) {
    case CharacterCodes.lessThan: return '&lt;';
    case CharacterCodes.greaterThan: return '&gt;';
    case CharacterCodes.ampersand: return '&amp;';
    default: return undefined;
  }
}
