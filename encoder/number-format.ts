/**
 * Culture-invariant numeric text for <Number> elements.
 *
 * Double and single precision values get round-trip text: parsing the output
 * gives back the same bits. Everything else is converted with String().
 */

export enum NumericKind {
  Double,
  Single,
  Integral,
  Decimal,
}

export type NumericValue =
  | { readonly kind: NumericKind.Double; readonly value: number }
  | { readonly kind: NumericKind.Single; readonly value: number }
  | { readonly kind: NumericKind.Integral; readonly value: number | bigint }
  | { readonly kind: NumericKind.Decimal; readonly value: string };

export function doubleValue(value: number): NumericValue {
  return { kind: NumericKind.Double, value };
}

export function singleValue(value: number): NumericValue {
  return { kind: NumericKind.Single, value: Math.fround(value) };
}

export function integralValue(value: number | bigint): NumericValue {
  return { kind: NumericKind.Integral, value };
}

/** Decimal literals travel as their canonical digit string. */
export function decimalValue(value: string): NumericValue {
  return { kind: NumericKind.Decimal, value };
}

const DOUBLE_DIGITS = 17;
const SINGLE_DIGITS = 9;

/**
 * 17 significant digits in general format: `0.1` becomes
 * `0.10000000000000001`, `1e20` becomes `1E+20`.
 */
export function formatDouble(value: number): string {
  if (!Number.isFinite(value) || value === 0) return formatSpecial(value);
  return formatGeneral(value.toExponential(DOUBLE_DIGITS - 1), DOUBLE_DIGITS);
}

/**
 * Shortest text that reads back as the same single-precision value.
 */
export function formatSingle(value: number): string {
  const single = Math.fround(value);
  if (!Number.isFinite(single) || single === 0) return formatSpecial(single);

  for (let digits = 1; digits < SINGLE_DIGITS; digits++) {
    const candidate = single.toExponential(digits - 1);
    if (Math.fround(Number(candidate)) === single) return formatGeneral(candidate, SINGLE_DIGITS);
  }
  return formatGeneral(single.toExponential(SINGLE_DIGITS - 1), SINGLE_DIGITS);
}

export function formatNumericValue(numeric: NumericValue): string {
  switch (numeric.kind) {
    case NumericKind.Double: return formatDouble(numeric.value);
    case NumericKind.Single: return formatSingle(numeric.value);
    case NumericKind.Integral:
    case NumericKind.Decimal:
      return String(numeric.value);
  }
}

function formatSpecial(value: number): string {
  if (Number.isNaN(value)) return 'NaN';
  if (value === Infinity) return 'Infinity';
  if (value === -Infinity) return '-Infinity';
  return Object.is(value, -0) ? '-0' : '0';
}

/**
 * Rewrites `toExponential` output (`-d.ddde+x`) in general format.
 * Fixed notation while the exponent is within [-4, maxDigits), scientific
 * with a two-digit minimum exponent otherwise. Trailing zeros are dropped.
 */
function formatGeneral(exponential: string, maxDigits: number): string {
  const negative = exponential.charCodeAt(0) === 45; // -
  const body = negative ? exponential.substring(1) : exponential;
  const exponentIndex = body.indexOf('e');
  const exponent = Number(body.substring(exponentIndex + 1));
  const digits = body.substring(0, exponentIndex).replace('.', '').replace(/0+$/, '');
  const sign = negative ? '-' : '';

  if (exponent >= maxDigits || exponent < -4) {
    const fraction = digits.length > 1 ? '.' + digits.substring(1) : '';
    const magnitude = Math.abs(exponent);
    return sign + digits[0] + fraction + 'E' + (exponent < 0 ? '-' : '+') + (magnitude < 10 ? '0' : '') + magnitude;
  }

  if (exponent < 0) {
    return sign + '0.' + '0'.repeat(-exponent - 1) + digits;
  }

  const integerDigits = exponent + 1;
  if (digits.length <= integerDigits) {
    return sign + digits + '0'.repeat(integerDigits - digits.length);
  }
  return sign + digits.substring(0, integerDigits) + '.' + digits.substring(integerDigits);
}
