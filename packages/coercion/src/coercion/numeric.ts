/**
 * Numeric narrowing and widening to the target's native width
 *
 * Integer targets truncate toward zero and keep the low-order bits.
 * Doubles first go through a saturating conversion to a 32-bit (or, for
 * BIGINT, 64-bit) integer, with NaN becoming zero.
 */

import type { NumericSource } from '@rowcast/core';
import { decimalToFloat, decimalToNumber, truncateDecimal } from '@rowcast/core';

export type IntegerWidth = 8 | 16 | 32;

const INT32_MIN = -2_147_483_648;
const INT32_MAX = 2_147_483_647;
const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;
const TWO_POW_63 = 2 ** 63;

function doubleToInt32(value: number): number {
  if (Number.isNaN(value)) return 0;
  if (value <= INT32_MIN) return INT32_MIN;
  if (value >= INT32_MAX) return INT32_MAX;
  return Math.trunc(value) | 0;
}

function doubleToInt64(value: number): bigint {
  if (Number.isNaN(value)) return 0n;
  if (value >= TWO_POW_63) return INT64_MAX;
  if (value <= -TWO_POW_63) return INT64_MIN;
  return BigInt(Math.trunc(value));
}

function wrapInt32(value: number, width: IntegerWidth): number {
  const shift = 32 - width;
  return (value << shift) >> shift;
}

/**
 * TINYINT, SMALLINT and INT
 */
export function toSignedInteger(source: NumericSource, width: IntegerWidth): number {
  switch (source.kind) {
    case 'number':
      return wrapInt32(doubleToInt32(source.value), width);
    case 'long':
      return Number(BigInt.asIntN(width, source.value));
    case 'decimal':
      return Number(BigInt.asIntN(width, truncateDecimal(source.value)));
  }
}

/**
 * BIGINT
 */
export function toLong(source: NumericSource): bigint {
  switch (source.kind) {
    case 'number':
      return doubleToInt64(source.value);
    case 'long':
      return BigInt.asIntN(64, source.value);
    case 'decimal':
      return BigInt.asIntN(64, truncateDecimal(source.value));
  }
}

export function toDouble(source: NumericSource): number {
  switch (source.kind) {
    case 'number':
      return source.value;
    case 'long':
      return Number(source.value);
    case 'decimal':
      return decimalToNumber(source.value);
  }
}

/**
 * Single-precision value held in a number. Longs and decimals round once,
 * straight to single precision.
 */
export function toFloat(source: NumericSource): number {
  switch (source.kind) {
    case 'number':
      return Math.fround(source.value);
    case 'long':
      return decimalToFloat({ unscaled: source.value, scale: 0 });
    case 'decimal':
      return decimalToFloat(source.value);
  }
}

export function isNonZero(source: NumericSource): boolean {
  switch (source.kind) {
    case 'number':
      return source.value !== 0;
    case 'long':
      return source.value !== 0n;
    case 'decimal':
      return source.value.unscaled !== 0n;
  }
}
