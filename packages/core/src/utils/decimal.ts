/**
 * Arbitrary-precision decimal helpers
 *
 * A decimal is kept as an unscaled integer and a scale, so `123.450` is
 * `{ unscaled: 123450n, scale: 3 }` and keeps its trailing zero.
 */

import type { DecimalValue } from '../types/index.js';

const DECIMAL_PATTERN = /^([+-]?)(\d*)(?:\.(\d*))?(?:[eE]([+-]?\d+))?$/;

/**
 * Parse a decimal literal such as "-12.50" or "1.5E+3"
 */
export function parseDecimal(text: string): DecimalValue {
  const match = DECIMAL_PATTERN.exec(text.trim());
  const intPart = match?.[2] ?? '';
  const fracPart = match?.[3] ?? '';
  if (!match || intPart.length + fracPart.length === 0) {
    throw new RangeError(`Invalid decimal literal: "${text}"`);
  }

  const digits = BigInt(`${intPart}${fracPart}`);
  const exponent = match[4] ? Number.parseInt(match[4], 10) : 0;

  return {
    unscaled: match[1] === '-' ? -digits : digits,
    scale: fracPart.length - exponent,
  };
}

function splitSign(value: DecimalValue): { sign: string; digits: string } {
  const negative = value.unscaled < 0n;
  return {
    sign: negative ? '-' : '',
    digits: (negative ? -value.unscaled : value.unscaled).toString(),
  };
}

function insertPoint(digits: string, scale: number): string {
  const padded = digits.padStart(scale + 1, '0');
  const point = padded.length - scale;
  return `${padded.slice(0, point)}.${padded.slice(point)}`;
}

/**
 * Render without an exponent field, e.g. 1.5E+3 as "1500"
 */
export function toPlainString(value: DecimalValue): string {
  const { sign, digits } = splitSign(value);
  if (value.scale <= 0) {
    const body = value.unscaled === 0n ? '0' : `${digits}${'0'.repeat(-value.scale)}`;
    return `${sign}${body}`;
  }
  return `${sign}${insertPoint(digits, value.scale)}`;
}

/**
 * Default rendering: plain while the scale is non-negative and the adjusted
 * exponent is at least -6, scientific notation otherwise.
 */
export function toDecimalString(value: DecimalValue): string {
  const { sign, digits } = splitSign(value);
  const adjusted = digits.length - 1 - value.scale;

  if (value.scale >= 0 && adjusted >= -6) {
    return value.scale === 0 ? `${sign}${digits}` : `${sign}${insertPoint(digits, value.scale)}`;
  }

  const mantissa = digits.length > 1 ? `${digits[0]}.${digits.slice(1)}` : digits;
  const exponent = adjusted >= 0 ? `+${adjusted}` : `${adjusted}`;
  return `${sign}${mantissa}E${exponent}`;
}

/**
 * Integer part of the decimal, truncated toward zero
 */
export function truncateDecimal(value: DecimalValue): bigint {
  if (value.scale <= 0) {
    return value.unscaled * 10n ** BigInt(-value.scale);
  }
  return value.unscaled / 10n ** BigInt(value.scale);
}

/**
 * Nearest double to the decimal
 */
export function decimalToNumber(value: DecimalValue): number {
  return Number(toDecimalString(value));
}

const FLOAT_SIGNIFICAND_BITS = 24;
const FLOAT_MIN_EXPONENT = -149;

function bitLength(value: bigint): number {
  return value.toString(2).length;
}

/**
 * Nearest single-precision value to numerator / denominator, rounding
 * half to even once. Denominator is positive.
 */
function ratioToFloat(numerator: bigint, denominator: bigint): number {
  if (numerator === 0n) return 0;
  const negative = numerator < 0n;
  const magnitude = negative ? -numerator : numerator;

  // quotient = magnitude / (denominator * 2^exponent), kept to 24 significant bits
  let exponent = Math.max(
    bitLength(magnitude) - bitLength(denominator) - FLOAT_SIGNIFICAND_BITS,
    FLOAT_MIN_EXPONENT
  );
  const divide = (exp: number): [bigint, bigint, bigint] => {
    const num = exp < 0 ? magnitude << BigInt(-exp) : magnitude;
    const den = exp > 0 ? denominator << BigInt(exp) : denominator;
    return [num / den, num % den, den];
  };

  let [quotient, remainder, divisor] = divide(exponent);
  if (quotient >= 1n << BigInt(FLOAT_SIGNIFICAND_BITS)) {
    exponent += 1;
    [quotient, remainder, divisor] = divide(exponent);
  }

  const twice = remainder * 2n;
  if (twice > divisor || (twice === divisor && quotient % 2n === 1n)) {
    quotient += 1n;
  }

  const result = Math.fround(Number(quotient) * 2 ** exponent);
  return negative ? -result : result;
}

/**
 * Nearest single-precision value to the decimal, held in a number
 */
export function decimalToFloat(value: DecimalValue): number {
  if (value.unscaled === 0n) return 0;
  const negative = value.unscaled < 0n;
  // Upper bound of log10 |value|; beyond these the result is an infinity or zero
  const magnitude = bitLength(negative ? -value.unscaled : value.unscaled) * Math.LOG10_2 - value.scale;
  if (magnitude > 40) return negative ? -Infinity : Infinity;
  if (magnitude < -48) return negative ? -0 : 0;

  if (value.scale <= 0) {
    return ratioToFloat(value.unscaled * 10n ** BigInt(-value.scale), 1n);
  }
  return ratioToFloat(value.unscaled, 10n ** BigInt(value.scale));
}
