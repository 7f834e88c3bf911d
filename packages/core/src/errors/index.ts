export {
  ConversionError,
  SchemaLookupError,
  UnsupportedSourceTypeError,
  UnsupportedMappingError,
  SchemaDefinitionError,
  NullPartitionKeyError,
  ImportIoError,
  wrapError,
} from './conversion-error.js';
export type { ErrorCode, ConversionErrorDetails } from './conversion-error.js';
