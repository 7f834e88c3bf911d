/**
 * RecordConverter
 *
 * Converts every field of a source record to its target schema type.
 */

import type { ConvertedRecord, ConvertedValue, SourceRecord } from '@rowcast/core';
import { normalizeFieldName } from '@rowcast/core';
import type { TargetSchema } from '../schema/target-schema.js';
import type { ValueCoercer } from '../coercion/value-coercer.js';

/**
 * Check applied to a fully converted record. Throws to reject it.
 */
export interface IRecordValidator {
  readonly name: string;
  validate(record: ConvertedRecord, schema: TargetSchema): void;
}

export interface RecordConverterOptions {
  schema: TargetSchema;
  coercer: ValueCoercer;
  /** Opt-in checks run after conversion, in order */
  validators?: IRecordValidator[];
}

export class RecordConverter {
  readonly schema: TargetSchema;
  private readonly coercer: ValueCoercer;
  private readonly validators: readonly IRecordValidator[];

  constructor(options: RecordConverterOptions) {
    this.schema = options.schema;
    this.coercer = options.coercer;
    this.validators = options.validators ?? [];
  }

  /**
   * Convert a record. The result holds exactly the source's fields, keyed
   * by lower-cased name; fields only present in the schema are not added.
   *
   * @throws SchemaLookupError if a field is not in the schema
   * @throws UnsupportedMappingError if a value cannot be converted to its field's type
   */
  convert(source: SourceRecord): ConvertedRecord {
    const entries: [string, ConvertedValue][] = [];

    for (const [name, value] of Object.entries(source)) {
      const key = normalizeFieldName(name);
      const field = this.schema.lookup(key);
      entries.push([key, this.coercer.coerceField(name, value, field)]);
    }

    const result: ConvertedRecord = Object.fromEntries(entries);

    for (const validator of this.validators) {
      validator.validate(result, this.schema);
    }

    return result;
  }
}
