/**
 * ImportMapper
 *
 * Per-task lifecycle around the record converter: `setup` builds the
 * schema, coercer and large-object loader from the job configuration,
 * `map` converts one keyed record, `cleanup` releases the loader.
 */

import type { ConvertedRecord, KeyedRecord, SourceRecord } from '@rowcast/core';
import { ConversionError, ImportIoError } from '@rowcast/core';
import { createRecordConverter, type RecordConverter } from '@rowcast/coercion';
import type { JobConfig } from './config.js';
import { LargeObjectLoader, type ILargeObjectLoader } from './lob-loader.js';
import { Logger } from './logger.js';

export interface ImportMapperOptions {
  logger?: Logger;
  /** Replaces the file-based loader built from the table location */
  loader?: ILargeObjectLoader;
}

export interface ImportMapperStats {
  recordsMapped: number;
}

type RecordSource<TKey> =
  | Iterable<KeyedRecord<TKey, SourceRecord>>
  | AsyncIterable<KeyedRecord<TKey, SourceRecord>>;

interface MapperState {
  converter: RecordConverter;
  loader: ILargeObjectLoader;
}

export class ImportMapper<TKey = unknown> {
  private readonly logger: Logger;
  private state: MapperState | null = null;
  private recordsMapped = 0;

  constructor(private readonly options: ImportMapperOptions = {}) {
    this.logger = options.logger ?? new Logger();
  }

  get stats(): ImportMapperStats {
    return { recordsMapped: this.recordsMapped };
  }

  setup(config: JobConfig): void {
    const { table } = config;
    const converter = createRecordConverter(table.dataColumns, table.partitionColumns, {
      bigDecimalFormatString: config.import.bigDecimalFormatString,
      debug: config.import.debugMapper,
      logger: this.logger.child({ table: table.name }),
      validatePartitionKeys: config.import.validatePartitionKeys,
    });

    const loader =
      this.options.loader ??
      new LargeObjectLoader({
        tableLocation: table.location,
        inlineLobLimit: config.import.inlineLobLimit,
      });

    this.state = { converter, loader };
    this.logger.info('Import mapper ready', {
      table: table.name,
      fieldCount: converter.schema.size,
      partitionFields: converter.schema.partitionFieldNames,
    });
  }

  /**
   * Load the record's large objects, then convert it. The key is passed through.
   *
   * @throws ImportIoError if large objects cannot be loaded
   * @throws ConversionError if the record does not fit the target schema
   */
  async map(key: TKey, record: SourceRecord): Promise<KeyedRecord<TKey, ConvertedRecord>> {
    const { converter, loader } = this.requireState();

    let loaded: SourceRecord;
    try {
      loaded = await loader.load(record);
    } catch (error) {
      if (error instanceof ImportIoError) throw error;
      throw new ImportIoError(
        'Failed to load large objects',
        error instanceof Error ? error : new Error(String(error))
      );
    }

    const converted = converter.convert(loaded);
    this.recordsMapped++;
    return { key, record: converted };
  }

  /**
   * Map every record of the input in order, stopping at the first failure.
   * Failures are left to the caller to report.
   */
  async *run(input: RecordSource<TKey>): AsyncGenerator<KeyedRecord<TKey, ConvertedRecord>> {
    for await (const { key, record } of input) {
      yield await this.map(key, record);
    }
  }

  async cleanup(): Promise<void> {
    const state = this.state;
    this.state = null;
    if (state) {
      await state.loader.close();
      this.logger.info('Import mapper closed', { recordsMapped: this.recordsMapped });
    }
  }

  private requireState(): MapperState {
    if (!this.state) {
      throw new ConversionError({
        code: 'CONFIGURATION_ERROR',
        message: 'Import mapper used before setup()',
        suggestion: 'Call setup() with the job configuration first',
      });
    }
    return this.state;
  }
}
