/**
 * Rejects records whose partition key fields are null. Not enabled unless
 * the job asks for it.
 */

import type { ConvertedRecord } from '@rowcast/core';
import { NullPartitionKeyError } from '@rowcast/core';
import type { TargetSchema } from '../schema/target-schema.js';
import type { IRecordValidator } from './record-converter.js';

export class PartitionKeyValidator implements IRecordValidator {
  readonly name = 'partition-key';

  validate(record: ConvertedRecord, schema: TargetSchema): void {
    for (const [field, value] of Object.entries(record)) {
      if (value === null && schema.isPartitionField(field)) {
        throw new NullPartitionKeyError(field);
      }
    }
  }
}
