#!/usr/bin/env node
/**
 * CLI entry point for record import
 *
 * Usage:
 *   rowcast --config ./job.json --input ./records.jsonl
 */

import { wrapError } from '@rowcast/core';
import { loadJobConfig } from './config.js';
import { runImportJob } from './job.js';
import { Logger } from './logger.js';

function argValue(args: string[], name: string): string | null {
  const index = args.indexOf(name);
  return index !== -1 ? (args[index + 1] ?? null) : null;
}

async function main(): Promise<void> {
  let logger = new Logger();
  const args = process.argv.slice(2);
  const configPath = argValue(args, '--config');
  const inputPath = argValue(args, '--input');

  if (!configPath || !inputPath) {
    console.error('Usage: rowcast --config <job.json> --input <records.jsonl>');
    console.error('');
    console.error('Example job.json:');
    console.error(JSON.stringify({
      table: {
        name: 'customers',
        location: './warehouse/customers',
        dataColumns: [
          { name: 'id', type: 'bigint' },
          { name: 'name', type: 'string', typeString: 'varchar(64)' },
          { name: 'active', type: 'boolean' },
        ],
        partitionColumns: [{ name: 'region', type: 'string' }],
      },
      import: { bigDecimalFormatString: true, debugMapper: false },
    }, null, 2));
    process.exit(1);
  }

  try {
    const config = await loadJobConfig(configPath);
    logger = new Logger({
      level: config.logging?.level,
      format: config.logging?.format,
    });

    const stats = await runImportJob({
      config,
      inputPath,
      logger,
      write: (line) => process.stdout.write(line),
    });
    logger.info('Import completed', { ...stats });
  } catch (error) {
    const failure = wrapError(error);
    logger.error(failure.toActionableMessage(), { error: failure.toJSON() });
    process.exit(1);
  }
}

void main();
