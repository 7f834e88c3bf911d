/**
 * Runs an import job over a JSON-lines input file
 */

import { createReadStream } from 'node:fs';
import { createInterface } from 'node:readline';
import type { KeyedRecord, SourceRecord } from '@rowcast/core';
import { ImportIoError } from '@rowcast/core';
import type { JobConfig } from './config.js';
import { ImportMapper, type ImportMapperStats } from './import-mapper.js';
import { Logger } from './logger.js';
import { decodeSourceRecord, encodeConvertedRecord, inputLineSchema } from './record-codec.js';

export interface RunImportJobOptions {
  config: JobConfig;
  inputPath: string;
  /** Receives one JSON line per converted record */
  write: (line: string) => void;
  logger?: Logger;
}

/**
 * Read `{ "key": ..., "record": { ... } }` lines, skipping blank ones
 */
export async function* readJsonLines(path: string): AsyncGenerator<KeyedRecord<unknown, SourceRecord>> {
  const lines = createInterface({
    input: createReadStream(path, { encoding: 'utf-8' }),
    crlfDelay: Infinity,
  });

  let lineNumber = 0;
  try {
    for await (const line of lines) {
      lineNumber++;
      if (line.trim() === '') continue;

      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch (error) {
        throw new ImportIoError(`Input line ${lineNumber} is not valid JSON`, toError(error), {
          path,
          lineNumber,
        });
      }

      const result = inputLineSchema.safeParse(parsed);
      if (!result.success) {
        throw new ImportIoError(
          `Input line ${lineNumber} must be an object with "key" and "record"`,
          undefined,
          { path, lineNumber }
        );
      }

      yield { key: result.data.key, record: decodeSourceRecord(result.data.record) };
    }
  } finally {
    lines.close();
  }
}

export async function runImportJob(options: RunImportJobOptions): Promise<ImportMapperStats> {
  const logger =
    options.logger ??
    new Logger({
      level: options.config.logging?.level,
      format: options.config.logging?.format,
    });

  const mapper = new ImportMapper({ logger });
  mapper.setup(options.config);

  try {
    for await (const output of mapper.run(readJsonLines(options.inputPath))) {
      options.write(`${JSON.stringify({ key: output.key, record: encodeConvertedRecord(output.record) })}\n`);
    }
  } finally {
    await mapper.cleanup();
  }

  return mapper.stats;
}

function toError(reason: unknown): Error {
  return reason instanceof Error ? reason : new Error(String(reason));
}
