/**
 * JSON encoding of source and converted records
 *
 * JSON has no decimals, 64-bit integers, temporal values, byte strings or
 * large objects, so those travel as single-key tagged objects:
 *
 *   { "$decimal": "123.450" }      { "$long": "9007199254740993" }
 *   { "$date": "2024-03-01" }      { "$time": "13:45:00" }
 *   { "$timestamp": "2024-03-01T13:45:00Z", "nanos": 250000000 }
 *   { "$bytes": "<base64>" }       { "$blob": "<base64>" }   { "$clob": "text" }
 *   { "$blobRef": "externalLob(lf,<file>,<offset>,<length>)" }
 *   { "$clobRef": "externalLob(lf,<file>,<offset>,<length>)" }
 *
 * Converted records only need `$bytes`, plus `$double` for NaN and the
 * infinities, which JSON numbers cannot hold.
 */

import { z } from 'zod';
import type {
  ConvertedRecord,
  ConvertedValue,
  ExternalLobReference,
  SourceRecord,
  SourceValue,
} from '@rowcast/core';
import {
  ConversionError,
  UnsupportedSourceTypeError,
  describeRuntimeKind,
  parseDecimal,
  parseLobReference,
} from '@rowcast/core';

const MILLIS_PER_SECOND = 1000;
const NANOS_PER_MILLI = 1_000_000;

const temporalInput = z.union([z.string().min(1), z.number().finite()]);

const taggedValueSchema = z.union([
  z.object({ $decimal: z.string().min(1) }).strict(),
  z.object({ $long: z.union([z.string().regex(/^-?\d+$/), z.number().int()]) }).strict(),
  z.object({ $date: temporalInput }).strict(),
  z.object({ $time: temporalInput }).strict(),
  z
    .object({ $timestamp: temporalInput, nanos: z.number().int().min(0).max(999_999_999).optional() })
    .strict(),
  z.object({ $bytes: z.string() }).strict(),
  z.object({ $blob: z.string() }).strict(),
  z.object({ $blobRef: z.string().min(1) }).strict(),
  z.object({ $clob: z.string() }).strict(),
  z.object({ $clobRef: z.string().min(1) }).strict(),
]);

type TaggedValue = z.infer<typeof taggedValueSchema>;

export const inputLineSchema = z.object({
  key: z.unknown(),
  record: z.record(z.unknown()),
});

function invalidValue(field: string | undefined, message: string): ConversionError {
  return new ConversionError({
    code: 'UNSUPPORTED_SOURCE_TYPE',
    message: field ? `Invalid value for field "${field}": ${message}` : `Invalid value: ${message}`,
    field,
  });
}

function toEpochMillis(input: string | number, field: string | undefined): number {
  const millis = typeof input === 'number' ? input : Date.parse(input);
  if (!Number.isFinite(millis)) {
    throw invalidValue(field, `cannot parse "${input}" as a date or time`);
  }
  return Math.trunc(millis);
}

function timeToEpochMillis(input: string | number, field: string | undefined): number {
  return typeof input === 'number'
    ? toEpochMillis(input, field)
    : toEpochMillis(`1970-01-01T${input}Z`, field);
}

function toReference(text: string, field: string | undefined): ExternalLobReference {
  const reference = parseLobReference(text);
  if (!reference) {
    throw invalidValue(field, `"${text}" is not a large object reference`);
  }
  return reference;
}

function decodeTagged(tagged: TaggedValue, field: string | undefined): SourceValue {
  if ('$decimal' in tagged) {
    try {
      return { kind: 'decimal', value: parseDecimal(tagged.$decimal) };
    } catch (error) {
      throw invalidValue(field, error instanceof Error ? error.message : String(error));
    }
  }
  if ('$long' in tagged) {
    return { kind: 'long', value: BigInt.asIntN(64, BigInt(tagged.$long)) };
  }
  if ('$date' in tagged) {
    return { kind: 'date', epochMillis: toEpochMillis(tagged.$date, field) };
  }
  if ('$time' in tagged) {
    return { kind: 'time', epochMillis: timeToEpochMillis(tagged.$time, field) };
  }
  if ('$timestamp' in tagged) {
    const epochMillis = toEpochMillis(tagged.$timestamp, field);
    if (tagged.nanos === undefined) {
      return { kind: 'timestamp', epochMillis };
    }
    // nanos replaces the parsed fraction of a second
    const wholeSeconds = Math.floor(epochMillis / MILLIS_PER_SECOND) * MILLIS_PER_SECOND;
    return {
      kind: 'timestamp',
      epochMillis: wholeSeconds + Math.floor(tagged.nanos / NANOS_PER_MILLI),
      nanos: tagged.nanos,
    };
  }
  if ('$bytes' in tagged) {
    return { kind: 'bytes', value: new Uint8Array(Buffer.from(tagged.$bytes, 'base64')) };
  }
  if ('$blob' in tagged) {
    const data = new Uint8Array(Buffer.from(tagged.$blob, 'base64'));
    return { kind: 'blob', value: { external: false, data } };
  }
  if ('$blobRef' in tagged) {
    const reference = toReference(tagged.$blobRef, field);
    return { kind: 'blob', value: { external: true, reference } };
  }
  if ('$clob' in tagged) {
    return { kind: 'clob', value: { external: false, data: tagged.$clob } };
  }
  const reference = toReference(tagged.$clobRef, field);
  return { kind: 'clob', value: { external: true, reference } };
}

/**
 * Turn a raw value (a JSON cell or a plain JavaScript value) into a SourceValue
 *
 * @throws UnsupportedSourceTypeError if the value is of no recognized kind
 */
export function decodeSourceValue(raw: unknown, field?: string): SourceValue | null {
  if (raw === null || raw === undefined) return null;
  if (typeof raw === 'number') return { kind: 'number', value: raw };
  if (typeof raw === 'bigint') return { kind: 'long', value: BigInt.asIntN(64, raw) };
  if (typeof raw === 'boolean') return { kind: 'boolean', value: raw };
  if (typeof raw === 'string') return { kind: 'text', value: raw };
  if (raw instanceof Date) {
    return { kind: 'timestamp', epochMillis: toEpochMillis(raw.getTime(), field) };
  }
  if (raw instanceof Uint8Array) return { kind: 'bytes', value: raw };

  const tagged = taggedValueSchema.safeParse(raw);
  if (tagged.success) {
    return decodeTagged(tagged.data, field);
  }
  throw new UnsupportedSourceTypeError(describeRuntimeKind(raw), field);
}

export function decodeSourceRecord(raw: Record<string, unknown>): SourceRecord {
  return Object.fromEntries(
    Object.entries(raw).map(([field, value]) => [field, decodeSourceValue(value, field)])
  );
}

/**
 * JSON-safe form of a converted value: bigints as decimal strings,
 * byte arrays as `{ "$bytes": "<base64>" }`, and NaN or infinities as
 * `{ "$double": "NaN" | "Infinity" | "-Infinity" }`
 */
export function encodeConvertedValue(value: ConvertedValue): unknown {
  if (typeof value === 'bigint') return value.toString();
  if (typeof value === 'number' && !Number.isFinite(value)) return { $double: String(value) };
  if (value instanceof Uint8Array) {
    return { $bytes: Buffer.from(value.buffer, value.byteOffset, value.byteLength).toString('base64') };
  }
  return value;
}

export function encodeConvertedRecord(record: ConvertedRecord): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(record).map(([field, value]) => [field, encodeConvertedValue(value)])
  );
}
