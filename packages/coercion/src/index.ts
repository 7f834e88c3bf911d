/**
 * @rowcast/coercion
 *
 * Schema-directed value coercion: resolves each field's target type and
 * converts the field's value to it.
 */

import type { ColumnDefinition } from '@rowcast/core';
import { TargetSchema as _TargetSchema } from './schema/target-schema.js';
import { ValueCoercer as _ValueCoercer } from './coercion/value-coercer.js';
import type { ValueCoercerOptions } from './coercion/value-coercer.js';
import { RecordConverter as _RecordConverter } from './converter/record-converter.js';
import type { IRecordValidator } from './converter/record-converter.js';
import { PartitionKeyValidator as _PartitionKeyValidator } from './converter/partition-key-validator.js';

export { TargetSchema } from './schema/target-schema.js';
export { ValueCoercer } from './coercion/value-coercer.js';
export type { ValueCoercerOptions } from './coercion/value-coercer.js';
export { toSignedInteger, toLong, toFloat, toDouble, isNonZero } from './coercion/numeric.js';
export type { IntegerWidth } from './coercion/numeric.js';
export { RecordConverter } from './converter/record-converter.js';
export type { IRecordValidator, RecordConverterOptions } from './converter/record-converter.js';
export { PartitionKeyValidator } from './converter/partition-key-validator.js';

export interface CreateRecordConverterOptions extends ValueCoercerOptions {
  /** Reject records with null partition keys (default: false) */
  validatePartitionKeys?: boolean;
}

/**
 * Factory function to create a RecordConverter for a table
 *
 * @param dataColumns - Data columns, in table order
 * @param partitionColumns - Partition columns, appended after the data columns
 */
export function createRecordConverter(
  dataColumns: readonly ColumnDefinition[],
  partitionColumns: readonly ColumnDefinition[],
  options: CreateRecordConverterOptions
): _RecordConverter {
  const validators: IRecordValidator[] = options.validatePartitionKeys
    ? [new _PartitionKeyValidator()]
    : [];

  return new _RecordConverter({
    schema: _TargetSchema.fromColumns(dataColumns, partitionColumns),
    coercer: new _ValueCoercer(options),
    validators,
  });
}
