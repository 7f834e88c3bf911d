import { describe, expect, it } from 'vitest';
import {
  blobBytes,
  clobText,
  decimalToFloat,
  decimalToNumber,
  describeRuntimeKind,
  formatDate,
  formatLobReference,
  formatTime,
  formatTimestamp,
  parseDecimal,
  parseLobReference,
  toDecimalString,
  toPlainString,
  truncateDecimal,
} from '../src/index.js';

describe('decimal helpers', () => {
  it('keeps trailing zeros when parsing', () => {
    expect(parseDecimal('123.450')).toEqual({ unscaled: 123450n, scale: 3 });
    expect(toPlainString(parseDecimal('123.450'))).toBe('123.450');
    expect(toDecimalString(parseDecimal('123.450'))).toBe('123.450');
  });

  it('parses exponents into a negative scale', () => {
    const value = parseDecimal('-1.5E+3');
    expect(value).toEqual({ unscaled: -15n, scale: -2 });
    expect(toPlainString(value)).toBe('-1500');
    expect(toDecimalString(value)).toBe('-1.5E+3');
  });

  it('uses scientific notation for small adjusted exponents only', () => {
    expect(toDecimalString(parseDecimal('0.0000012'))).toBe('0.0000012');
    expect(toDecimalString(parseDecimal('0.00000012'))).toBe('1.2E-7');
    expect(toPlainString(parseDecimal('0.00000012'))).toBe('0.00000012');
    expect(toDecimalString(parseDecimal('-0.5'))).toBe('-0.5');
    expect(toDecimalString(parseDecimal('0.00'))).toBe('0.00');
  });

  it('rejects malformed literals', () => {
    expect(() => parseDecimal('abc')).toThrow(RangeError);
    expect(() => parseDecimal('-')).toThrow('Invalid decimal literal: "-"');
  });

  it('truncates toward zero', () => {
    expect(truncateDecimal(parseDecimal('-7.9'))).toBe(-7n);
    expect(truncateDecimal(parseDecimal('7.9'))).toBe(7n);
    expect(truncateDecimal(parseDecimal('1.5E+3'))).toBe(1500n);
    expect(decimalToNumber(parseDecimal('2.5'))).toBe(2.5);
  });

  it('rounds to single precision in one step', () => {
    expect(decimalToFloat(parseDecimal('0.1'))).toBe(Math.fround(0.1));
    expect(decimalToFloat(parseDecimal('-2.5'))).toBe(-2.5);
    // 2^60 + 2^36 + 1: just above a float midpoint that the nearest double lands on
    expect(decimalToFloat(parseDecimal('1152921573326323713'))).toBe(2 ** 60 + 2 ** 37);
    expect(Math.fround(Number(parseDecimal('1152921573326323713').unscaled))).toBe(2 ** 60);
  });

  it('overflows to infinity and underflows to zero or subnormals', () => {
    expect(decimalToFloat(parseDecimal('1E+39'))).toBe(Infinity);
    expect(decimalToFloat(parseDecimal('-1E+39'))).toBe(-Infinity);
    expect(decimalToFloat(parseDecimal('-1E-50'))).toBe(-0);
    expect(decimalToFloat(parseDecimal('1E-45'))).toBe(2 ** -149);
  });
});

describe('temporal helpers', () => {
  it('formats dates and times in UTC', () => {
    expect(formatDate(Date.UTC(2024, 0, 2))).toBe('2024-01-02');
    expect(formatTime(Date.UTC(1970, 0, 1, 13, 45, 7))).toBe('13:45:07');
  });

  it('trims the timestamp fraction but keeps at least one digit', () => {
    expect(formatTimestamp(Date.UTC(2024, 2, 1, 13, 45, 0, 250))).toBe('2024-03-01 13:45:00.25');
    expect(formatTimestamp(Date.UTC(2024, 2, 1))).toBe('2024-03-01 00:00:00.0');
    expect(formatTimestamp(Date.UTC(2024, 2, 1), 123456789)).toBe('2024-03-01 00:00:00.123456789');
  });

  it('handles instants before the epoch', () => {
    expect(formatTimestamp(-500)).toBe('1969-12-31 23:59:59.5');
  });

  it('rejects out-of-range nanos', () => {
    expect(() => formatTimestamp(0, 1_000_000_000)).toThrow(RangeError);
  });
});

describe('large object helpers', () => {
  const reference = { file: 'lob_1.bin', offset: 0, length: 12 };

  it('formats and parses external references', () => {
    expect(formatLobReference(reference)).toBe('externalLob(lf,lob_1.bin,0,12)');
    expect(parseLobReference('externalLob(lf,lob_1.bin,0,12)')).toEqual(reference);
    expect(parseLobReference('not a reference')).toBeNull();
  });

  it('falls back to the reference text for external objects', () => {
    expect(new TextDecoder().decode(blobBytes({ external: true, reference }))).toBe(
      'externalLob(lf,lob_1.bin,0,12)'
    );
    expect(clobText({ external: true, reference })).toBe('externalLob(lf,lob_1.bin,0,12)');
  });

  it('returns inline content as is', () => {
    const data = new Uint8Array([1, 2, 3]);
    expect(blobBytes({ external: false, data })).toBe(data);
    expect(clobText({ external: false, data: 'text' })).toBe('text');
  });
});

describe('describeRuntimeKind', () => {
  it('names primitive, tagged and built-in kinds', () => {
    expect(describeRuntimeKind(null)).toBe('null');
    expect(describeRuntimeKind(5)).toBe('number');
    expect(describeRuntimeKind({ kind: 'interval' })).toBe('interval');
    expect(describeRuntimeKind([1])).toBe('Array');
    expect(describeRuntimeKind(new Map())).toBe('Map');
  });
});
