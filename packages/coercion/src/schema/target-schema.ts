/**
 * TargetSchema
 *
 * Flattened table schema (data columns followed by partition columns)
 * with case-insensitive lookup by field name.
 */

import type { ColumnDefinition, SchemaField, TableInfo } from '@rowcast/core';
import {
  SchemaDefinitionError,
  SchemaLookupError,
  findDuplicateFieldNames,
  normalizeFieldName,
} from '@rowcast/core';

function toSchemaField(column: ColumnDefinition): SchemaField {
  return Object.freeze({
    name: column.name,
    type: column.type,
    typeString: column.typeString ?? column.type.toLowerCase(),
  });
}

export class TargetSchema {
  /** Fields in declaration order, partition fields last */
  readonly fields: readonly SchemaField[];
  private readonly index: ReadonlyMap<string, SchemaField>;
  private readonly partitionNames: ReadonlySet<string>;

  constructor(dataFields: readonly SchemaField[], partitionFields: readonly SchemaField[] = []) {
    const all = [...dataFields, ...partitionFields];
    const duplicates = findDuplicateFieldNames(all.map((field) => field.name));
    if (duplicates.length > 0) {
      throw new SchemaDefinitionError(
        `Field names must be unique ignoring case: ${duplicates.join(', ')}`,
        { duplicates }
      );
    }

    this.fields = Object.freeze(all);
    this.index = new Map(all.map((field) => [normalizeFieldName(field.name), field]));
    this.partitionNames = new Set(partitionFields.map((field) => normalizeFieldName(field.name)));
    Object.freeze(this);
  }

  static fromColumns(
    dataColumns: readonly ColumnDefinition[],
    partitionColumns: readonly ColumnDefinition[] = []
  ): TargetSchema {
    return new TargetSchema(dataColumns.map(toSchemaField), partitionColumns.map(toSchemaField));
  }

  static fromTableInfo(table: TableInfo): TargetSchema {
    return TargetSchema.fromColumns(table.dataColumns, table.partitionColumns);
  }

  get size(): number {
    return this.fields.length;
  }

  get fieldNames(): string[] {
    return this.fields.map((field) => normalizeFieldName(field.name));
  }

  get partitionFieldNames(): string[] {
    return Array.from(this.partitionNames);
  }

  /**
   * Resolve a field by name, ignoring case
   * @throws SchemaLookupError if the schema has no such field
   */
  lookup(name: string): SchemaField {
    const field = this.find(name);
    if (!field) {
      throw new SchemaLookupError(name, this.fieldNames);
    }
    return field;
  }

  find(name: string): SchemaField | undefined {
    return this.index.get(normalizeFieldName(name));
  }

  has(name: string): boolean {
    return this.index.has(normalizeFieldName(name));
  }

  isPartitionField(name: string): boolean {
    return this.partitionNames.has(normalizeFieldName(name));
  }
}
