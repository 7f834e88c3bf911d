import { describe, expect, it } from 'vitest';
import { ConversionError, UnsupportedSourceTypeError } from '@rowcast/core';
import { ValueCoercer } from '@rowcast/coercion';
import {
  decodeSourceRecord,
  decodeSourceValue,
  encodeConvertedRecord,
} from '../src/record-codec.js';

describe('decodeSourceValue', () => {
  it('maps JSON primitives to their kinds', () => {
    expect(decodeSourceValue(42)).toEqual({ kind: 'number', value: 42 });
    expect(decodeSourceValue('Ann')).toEqual({ kind: 'text', value: 'Ann' });
    expect(decodeSourceValue(false)).toEqual({ kind: 'boolean', value: false });
    expect(decodeSourceValue(null)).toBeNull();
    expect(decodeSourceValue(undefined)).toBeNull();
  });

  it('accepts JavaScript values without a JSON form', () => {
    expect(decodeSourceValue(7n)).toEqual({ kind: 'long', value: 7n });
    expect(decodeSourceValue(new Date(Date.UTC(2024, 2, 1)))).toEqual({
      kind: 'timestamp',
      epochMillis: Date.UTC(2024, 2, 1),
    });
    const bytes = new Uint8Array([1]);
    expect(decodeSourceValue(bytes)).toEqual({ kind: 'bytes', value: bytes });
  });

  it('decodes tagged values', () => {
    expect(decodeSourceValue({ $decimal: '123.450' })).toEqual({
      kind: 'decimal',
      value: { unscaled: 123450n, scale: 3 },
    });
    expect(decodeSourceValue({ $long: '9007199254740993' })).toEqual({
      kind: 'long',
      value: 9007199254740993n,
    });
    expect(decodeSourceValue({ $date: '2024-03-01' })).toEqual({
      kind: 'date',
      epochMillis: Date.UTC(2024, 2, 1),
    });
    expect(decodeSourceValue({ $time: '13:45:00' })).toEqual({ kind: 'time', epochMillis: 49_500_000 });
    expect(decodeSourceValue({ $timestamp: '2024-03-01T13:45:00.250Z', nanos: 250000001 })).toEqual({
      kind: 'timestamp',
      epochMillis: Date.UTC(2024, 2, 1, 13, 45, 0, 250),
      nanos: 250000001,
    });
    expect(decodeSourceValue({ $bytes: 'AQID' })).toEqual({
      kind: 'bytes',
      value: new Uint8Array([1, 2, 3]),
    });
    expect(decodeSourceValue({ $clob: 'notes' })).toEqual({
      kind: 'clob',
      value: { external: false, data: 'notes' },
    });
    expect(decodeSourceValue({ $blobRef: 'externalLob(lf,lob_1.bin,0,12)' })).toEqual({
      kind: 'blob',
      value: { external: true, reference: { file: 'lob_1.bin', offset: 0, length: 12 } },
    });
  });

  it('takes the fraction of a second from nanos for every conversion', () => {
    const coercer = new ValueCoercer({ bigDecimalFormatString: true });
    const value = decodeSourceValue({ $timestamp: '2024-03-01T13:45:00.250Z', nanos: 123456789 });
    expect(value).toEqual({
      kind: 'timestamp',
      epochMillis: Date.UTC(2024, 2, 1, 13, 45, 0, 123),
      nanos: 123456789,
    });
    expect(coercer.coerce(value, 'BIGINT', 'bigint')).toBe(1709300700123n);
    expect(coercer.coerce(value, 'STRING', 'string')).toBe('2024-03-01 13:45:00.123456789');

    const beforeEpoch = decodeSourceValue({ $timestamp: '1969-12-31T23:59:59.500Z', nanos: 1 });
    expect(coercer.coerce(beforeEpoch, 'BIGINT', 'bigint')).toBe(-1000n);
    expect(coercer.coerce(beforeEpoch, 'STRING', 'string')).toBe('1969-12-31 23:59:59.000000001');
  });

  it('rejects values of no recognized kind', () => {
    expect(() => decodeSourceValue([1, 2], 'tags')).toThrow(UnsupportedSourceTypeError);
    expect(() => decodeSourceValue([1, 2], 'tags')).toThrow('Objects of type Array are not supported');
    expect(() => decodeSourceValue({ nested: true })).toThrow('Objects of type Object are not supported');
  });

  it('rejects tagged values with invalid content', () => {
    expect(() => decodeSourceValue({ $decimal: 'abc' }, 'price')).toThrow(ConversionError);
    expect(() => decodeSourceValue({ $decimal: 'abc' }, 'price')).toThrow(
      'Invalid value for field "price": Invalid decimal literal: "abc"'
    );
    expect(() => decodeSourceValue({ $clobRef: 'elsewhere' }, 'notes')).toThrow(
      'Invalid value for field "notes": "elsewhere" is not a large object reference'
    );
    expect(() => decodeSourceValue({ $date: 'not a date' })).toThrow(
      'Invalid value: cannot parse "not a date" as a date or time'
    );
  });
});

describe('record encoding', () => {
  it('decodes every field of a record', () => {
    expect(decodeSourceRecord({ Id: 1, Name: 'Ann' })).toEqual({
      Id: { kind: 'number', value: 1 },
      Name: { kind: 'text', value: 'Ann' },
    });
  });

  it('renders bigints as strings and bytes as base64', () => {
    expect(
      encodeConvertedRecord({
        id: 42n,
        payload: new Uint8Array([1, 2, 3]),
        name: 'Ann',
        score: 1.5,
        active: true,
        missing: null,
      })
    ).toEqual({
      id: '42',
      payload: { $bytes: 'AQID' },
      name: 'Ann',
      score: 1.5,
      active: true,
      missing: null,
    });
  });

  it('tags doubles that JSON numbers cannot hold', () => {
    const coercer = new ValueCoercer({ bigDecimalFormatString: true });
    const huge = coercer.coerce(decodeSourceValue({ $decimal: '1E+400' }), 'DOUBLE', 'double');

    expect(huge).toBe(Infinity);
    expect(JSON.stringify(encodeConvertedRecord({ x: huge, y: -Infinity, z: NaN }))).toBe(
      '{"x":{"$double":"Infinity"},"y":{"$double":"-Infinity"},"z":{"$double":"NaN"}}'
    );
  });
});
