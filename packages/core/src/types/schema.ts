/**
 * Schema types describing the storage type each output field must have
 */

export const TARGET_FIELD_TYPES = [
  'BOOLEAN',
  'TINYINT',
  'SMALLINT',
  'INT',
  'BIGINT',
  'FLOAT',
  'DOUBLE',
  'STRING',
  'BINARY',
] as const;

export type TargetFieldType = (typeof TARGET_FIELD_TYPES)[number];

export interface SchemaField {
  /** Column name as declared in the table metadata */
  readonly name: string;
  readonly type: TargetFieldType;
  /** Human-readable type, e.g. "bigint" or "varchar(64)", used in diagnostics */
  readonly typeString: string;
}

/** Column metadata as supplied by the table catalog */
export interface ColumnDefinition {
  name: string;
  type: TargetFieldType;
  typeString?: string;
}
