/**
 * Error types raised while resolving, converting and importing records
 */

export type ErrorCode =
  | 'SCHEMA_LOOKUP_FAILED'
  | 'UNSUPPORTED_SOURCE_TYPE'
  | 'UNSUPPORTED_MAPPING'
  | 'INVALID_SCHEMA'
  | 'NULL_PARTITION_KEY'
  | 'CONFIGURATION_ERROR'
  | 'IO_ERROR'
  | 'UNKNOWN';

export interface ConversionErrorDetails {
  /** Error code for programmatic handling */
  code: ErrorCode;
  /** Human-readable message */
  message: string;
  /** Field being converted when the error was raised */
  field?: string;
  /** Suggested action to resolve */
  suggestion?: string;
  /** Original error (if wrapping) */
  cause?: Error;
  /** Additional context */
  context?: Record<string, unknown>;
}

export class ConversionError extends Error {
  readonly code: ErrorCode;
  readonly field?: string;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  constructor(details: ConversionErrorDetails) {
    super(details.message);
    this.name = 'ConversionError';
    this.code = details.code;
    this.field = details.field;
    this.suggestion = details.suggestion;
    this.context = details.context;

    if (details.cause) {
      this.cause = details.cause;
    }

    // Maintains proper stack trace in V8 environments
    if ('captureStackTrace' in Error) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Format error for the job failure channel
   */
  toActionableMessage(): string {
    const parts = [`Error [${this.code}]: ${this.message}`];

    if (this.field) {
      parts.push(`Field: ${this.field}`);
    }

    if (this.suggestion) {
      parts.push(`Suggested action: ${this.suggestion}`);
    }

    return parts.join('\n');
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      field: this.field,
      suggestion: this.suggestion,
      context: this.context,
    };
  }
}

export class SchemaLookupError extends ConversionError {
  constructor(field: string, knownFields: readonly string[]) {
    super({
      code: 'SCHEMA_LOOKUP_FAILED',
      message: `Field "${field}" is not part of the target schema`,
      field,
      suggestion: 'Check that the table metadata matches the columns produced by the source query',
      context: { knownFields },
    });
    this.name = 'SchemaLookupError';
  }
}

export class UnsupportedSourceTypeError extends ConversionError {
  readonly sourceKind: string;

  constructor(sourceKind: string, field?: string) {
    super({
      code: 'UNSUPPORTED_SOURCE_TYPE',
      message: `Objects of type ${sourceKind} are not supported`,
      field,
    });
    this.name = 'UnsupportedSourceTypeError';
    this.sourceKind = sourceKind;
  }
}

export class UnsupportedMappingError extends ConversionError {
  readonly sourceKind: string;
  readonly targetType: string;

  constructor(sourceKind: string, targetType: string, field?: string) {
    super({
      code: 'UNSUPPORTED_MAPPING',
      message: `Objects of type ${sourceKind} can not be mapped to type ${targetType}`,
      field,
      suggestion: 'Change the column type in the target table or cast the column in the source query',
    });
    this.name = 'UnsupportedMappingError';
    this.sourceKind = sourceKind;
    this.targetType = targetType;
  }
}

export class SchemaDefinitionError extends ConversionError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({ code: 'INVALID_SCHEMA', message, context });
    this.name = 'SchemaDefinitionError';
  }
}

export class NullPartitionKeyError extends ConversionError {
  constructor(field: string) {
    super({
      code: 'NULL_PARTITION_KEY',
      message: `Dynamic partition keys cannot be null. Please make sure that the column ${field} is declared as not null in the database`,
      field,
    });
    this.name = 'NullPartitionKeyError';
  }
}

export class ImportIoError extends ConversionError {
  constructor(message: string, cause?: Error, context?: Record<string, unknown>) {
    super({ code: 'IO_ERROR', message, cause, context });
    this.name = 'ImportIoError';
  }
}

/**
 * Helper to wrap unknown errors as ConversionError
 */
export function wrapError(
  error: unknown,
  defaultCode: ErrorCode = 'UNKNOWN'
): ConversionError {
  if (error instanceof ConversionError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;

  return new ConversionError({
    code: defaultCode,
    message,
    cause,
  });
}
