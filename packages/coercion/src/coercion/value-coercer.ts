/**
 * ValueCoercer
 *
 * Converts a single source value to the native representation of its
 * target field type. Dispatch is on the source kind first, then on the
 * target type.
 */

import type {
  ConvertedValue,
  ILogger,
  NumericSource,
  SchemaField,
  SourceValue,
  TargetFieldType,
  TemporalSource,
} from '@rowcast/core';
import {
  UnsupportedMappingError,
  UnsupportedSourceTypeError,
  blobBytes,
  clobText,
  describeRuntimeKind,
  describeSourceKind,
  formatDate,
  formatLobReference,
  formatTime,
  formatTimestamp,
  isNumeric,
  isTemporal,
  toDecimalString,
  toPlainString,
} from '@rowcast/core';
import { isNonZero, toDouble, toFloat, toLong, toSignedInteger } from './numeric.js';

export interface ValueCoercerOptions {
  /** Render decimals bound for STRING fields without an exponent */
  bigDecimalFormatString: boolean;
  /** Log every field before it is converted */
  debug?: boolean;
  /** Receives the per-field debug lines */
  logger?: ILogger;
}

function fromBoolean(value: boolean, type: TargetFieldType): ConvertedValue | undefined {
  const bit = value ? 1 : 0;
  switch (type) {
    case 'BOOLEAN':
      return value;
    case 'TINYINT':
    case 'SMALLINT':
    case 'INT':
    case 'FLOAT':
    case 'DOUBLE':
      return bit;
    case 'BIGINT':
      return BigInt(bit);
    default:
      return undefined;
  }
}

function fromTemporal(value: TemporalSource, type: TargetFieldType): ConvertedValue | undefined {
  if (type === 'BIGINT') {
    return BigInt(Math.trunc(value.epochMillis));
  }
  if (type !== 'STRING') {
    return undefined;
  }

  switch (value.kind) {
    case 'date':
      return formatDate(value.epochMillis);
    case 'time':
      return formatTime(value.epochMillis);
    case 'timestamp':
      return formatTimestamp(value.epochMillis, value.nanos);
  }
}

export class ValueCoercer {
  private readonly options: Readonly<ValueCoercerOptions>;

  constructor(options: ValueCoercerOptions) {
    this.options = { ...options };
  }

  get debugEnabled(): boolean {
    return (this.options.debug ?? false) && this.options.logger !== undefined;
  }

  /**
   * Coerce a value to the target type
   *
   * @param typeString - Display form of the target type, used in error messages
   * @param field - Field being converted, attached to any error raised
   * @throws UnsupportedMappingError if a non-null value has no conversion to the target type
   */
  coerce(
    value: SourceValue | null,
    type: TargetFieldType,
    typeString: string,
    field?: string
  ): ConvertedValue {
    if (value === null) {
      return null;
    }

    const converted = this.convert(value, type, field);
    if (converted === undefined || converted === null) {
      throw new UnsupportedMappingError(describeSourceKind(value), typeString, field);
    }
    return converted;
  }

  /**
   * Coerce the value of a named field, emitting the debug line first when enabled
   */
  coerceField(name: string, value: SourceValue | null, field: SchemaField): ConvertedValue {
    if (this.debugEnabled) {
      this.options.logger?.debug('Converting field', {
        field: name,
        value: describeValue(value),
        kind: describeSourceKind(value),
        targetType: field.typeString,
      });
    }
    return this.coerce(value, field.type, field.typeString, name);
  }

  private convert(
    value: SourceValue,
    type: TargetFieldType,
    field: string | undefined
  ): ConvertedValue | undefined {
    if (isNumeric(value)) {
      return this.fromNumeric(value, type);
    }
    if (isTemporal(value)) {
      return fromTemporal(value, type);
    }

    switch (value.kind) {
      case 'boolean':
        return fromBoolean(value.value, type);
      case 'text':
        return type === 'STRING' ? value.value : undefined;
      case 'bytes':
        return type === 'BINARY' ? value.value : undefined;
      case 'blob':
        return type === 'BINARY' ? blobBytes(value.value) : undefined;
      case 'clob':
        return type === 'STRING' ? clobText(value.value) : undefined;
      default: {
        const unknownValue: never = value;
        throw new UnsupportedSourceTypeError(describeRuntimeKind(unknownValue), field);
      }
    }
  }

  private fromNumeric(value: NumericSource, type: TargetFieldType): ConvertedValue | undefined {
    if (value.kind === 'decimal' && type === 'STRING') {
      return this.options.bigDecimalFormatString
        ? toPlainString(value.value)
        : toDecimalString(value.value);
    }

    switch (type) {
      case 'TINYINT':
        return toSignedInteger(value, 8);
      case 'SMALLINT':
        return toSignedInteger(value, 16);
      case 'INT':
        return toSignedInteger(value, 32);
      case 'BIGINT':
        return toLong(value);
      case 'FLOAT':
        return toFloat(value);
      case 'DOUBLE':
        return toDouble(value);
      case 'BOOLEAN':
        return isNonZero(value);
      default:
        return undefined;
    }
  }
}

function describeValue(value: SourceValue | null): string {
  if (value === null) return 'null';
  switch (value.kind) {
    case 'decimal':
      return toDecimalString(value.value);
    case 'date':
    case 'time':
    case 'timestamp':
      return String(value.epochMillis);
    case 'bytes':
      return `<${value.value.byteLength} bytes>`;
    case 'blob':
      return value.value.external
        ? formatLobReference(value.value.reference)
        : `<${value.value.data.byteLength} bytes>`;
    case 'clob':
      return value.value.external
        ? formatLobReference(value.value.reference)
        : `<${value.value.data.length} chars>`;
    default:
      return String(value.value);
  }
}
