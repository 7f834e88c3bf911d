/**
 * @rowcast/import-mapper
 *
 * Runs record conversion as an import task: configuration, logging,
 * large-object loading and the per-record mapper lifecycle.
 */

export { ImportMapper } from './import-mapper.js';
export type { ImportMapperOptions, ImportMapperStats } from './import-mapper.js';

export { LargeObjectLoader, LOB_DIRECTORY } from './lob-loader.js';
export type { ILargeObjectLoader, LargeObjectLoaderOptions } from './lob-loader.js';

export {
  ConfigError,
  DEFAULT_INLINE_LOB_LIMIT,
  expandEnvVars,
  formatZodError,
  jobConfigSchema,
  loadJobConfig,
  parseJobConfig,
} from './config.js';
export type { JobConfig, JobConfigInput, ImportOptions, EnvExpansionOptions } from './config.js';

export { Logger, toLogValue } from './logger.js';
export type { LogFormat, LogLevel, LoggerOptions } from './logger.js';

export {
  decodeSourceRecord,
  decodeSourceValue,
  encodeConvertedRecord,
  encodeConvertedValue,
} from './record-codec.js';

export { readJsonLines, runImportJob } from './job.js';
export type { RunImportJobOptions } from './job.js';
