/**
 * Record types exchanged between the import harness and the converter
 */

import type { SourceValue } from './source-value.js';

/** A row as read from the source, keyed by column name */
export type SourceRecord = {
  [field: string]: SourceValue | null;
};

/**
 * A value in its target representation. TINYINT, SMALLINT, INT, FLOAT and
 * DOUBLE are numbers, BIGINT is a bigint, BINARY is a byte array.
 */
export type ConvertedValue = boolean | number | bigint | string | Uint8Array | null;

/** A row conforming to the target schema, keyed by lower-cased field name */
export type ConvertedRecord = {
  [field: string]: ConvertedValue;
};

/** A record paired with the key the harness received it under */
export interface KeyedRecord<TKey, TRecord> {
  key: TKey;
  record: TRecord;
}
