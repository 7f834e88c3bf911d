/**
 * Source values: the closed set of value kinds a record may carry
 * before it is coerced to its target schema.
 */

/** Pointer to large-object content stored outside the record */
export interface ExternalLobReference {
  /** File holding the object, relative to the table's LOB directory */
  file: string;
  /** Byte (blob) or character (clob) offset of the object within the file */
  offset: number;
  /** Length of the object in bytes (blob) or characters (clob) */
  length: number;
}

export type BlobContent =
  | { external: false; data: Uint8Array }
  | { external: true; reference: ExternalLobReference };

export type ClobContent =
  | { external: false; data: string }
  | { external: true; reference: ExternalLobReference };

/** Arbitrary-precision decimal: unscaled * 10^-scale */
export interface DecimalValue {
  unscaled: bigint;
  scale: number;
}

export type NumberSource = { kind: 'number'; value: number };
export type LongSource = { kind: 'long'; value: bigint };
export type DecimalSource = { kind: 'decimal'; value: DecimalValue };
export type BooleanSource = { kind: 'boolean'; value: boolean };
export type TextSource = { kind: 'text'; value: string };
export type DateSource = { kind: 'date'; epochMillis: number };
export type TimeSource = { kind: 'time'; epochMillis: number };
export type TimestampSource = {
  kind: 'timestamp';
  epochMillis: number;
  /** Fractional second in nanoseconds; defaults to the millisecond part */
  nanos?: number;
};
export type BytesSource = { kind: 'bytes'; value: Uint8Array };
export type BlobSource = { kind: 'blob'; value: BlobContent };
export type ClobSource = { kind: 'clob'; value: ClobContent };

export type NumericSource = NumberSource | LongSource | DecimalSource;
export type TemporalSource = DateSource | TimeSource | TimestampSource;

export type SourceValue =
  | NumericSource
  | BooleanSource
  | TextSource
  | TemporalSource
  | BytesSource
  | BlobSource
  | ClobSource;

/**
 * Name of a value's runtime kind, as used in error and debug messages
 */
export function describeSourceKind(value: SourceValue | null): string {
  return value === null ? 'null' : value.kind;
}

/**
 * Runtime kind of an arbitrary value, for values that may not be a SourceValue
 */
export function describeRuntimeKind(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value !== 'object') return typeof value;
  if ('kind' in value && typeof value.kind === 'string') return value.kind;
  return Object.prototype.toString.call(value).slice(8, -1);
}

export function isTemporal(value: SourceValue): value is TemporalSource {
  return value.kind === 'date' || value.kind === 'time' || value.kind === 'timestamp';
}

export function isNumeric(value: SourceValue): value is NumericSource {
  return value.kind === 'number' || value.kind === 'long' || value.kind === 'decimal';
}
