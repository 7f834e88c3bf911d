import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { z } from 'zod';
import { tableInfoSchema } from '@rowcast/core';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

export type EnvExpansionOptions = {
  env?: NodeJS.ProcessEnv;
};

function expandEnvInString(input: string, options?: EnvExpansionOptions): string {
  const env = options?.env ?? process.env;
  return input.replace(/\$\{([^}]+)\}/g, (match, inner: string) => {
    const [rawName, rawDefault] = inner.split(':-', 2);
    const name = (rawName ?? '').trim();
    if (!name) return match;

    const envValue = env[name];
    if (envValue !== undefined && envValue !== '') return envValue;

    if (rawDefault !== undefined) return rawDefault;

    throw new ConfigError(`Missing required environment variable: ${name}`);
  });
}

/**
 * Replace `${NAME}` and `${NAME:-default}` placeholders in every string
 */
export function expandEnvVars(value: unknown, options?: EnvExpansionOptions): unknown {
  if (typeof value === 'string') {
    return expandEnvInString(value, options);
  }
  if (Array.isArray(value)) {
    return value.map((v) => expandEnvVars(v, options));
  }
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = expandEnvVars(v, options);
    }
    return out;
  }
  return value;
}

/** Objects up to this size are read inline; larger ones stay external */
export const DEFAULT_INLINE_LOB_LIMIT = 16 * 1024 * 1024;

export const importOptionsSchema = z
  .object({
    /** Render decimals bound for STRING columns without an exponent */
    bigDecimalFormatString: z.boolean().default(true),
    /** Log each field, its value and target type before conversion */
    debugMapper: z.boolean().default(false),
    /** Reject records whose partition key columns are null */
    validatePartitionKeys: z.boolean().default(false),
    inlineLobLimit: z.number().int().min(0).default(DEFAULT_INLINE_LOB_LIMIT),
  })
  .strict();

export const loggingSchema = z
  .object({
    format: z.enum(['text', 'json']).optional(),
    level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  })
  .strict();

export const jobConfigSchema = z
  .object({
    $schema: z.string().min(1).optional(),
    table: tableInfoSchema,
    import: importOptionsSchema.default({}),
    logging: loggingSchema.optional(),
  })
  .strict();

export type JobConfigInput = z.input<typeof jobConfigSchema>;
export type JobConfig = z.infer<typeof jobConfigSchema>;
export type ImportOptions = z.infer<typeof importOptionsSchema>;

export function formatZodError(err: z.ZodError): string {
  const issues = err.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `- ${path}: ${issue.message}`;
    })
    .join('\n');
  return `Invalid job configuration:\n${issues}`;
}

/**
 * Validate an already-parsed configuration object
 * @throws ConfigError listing every invalid setting
 */
export function parseJobConfig(raw: unknown, options?: EnvExpansionOptions): JobConfig {
  const result = jobConfigSchema.safeParse(expandEnvVars(raw, options));
  if (!result.success) {
    throw new ConfigError(formatZodError(result.error));
  }
  return result.data;
}

export async function loadJobConfig(configPath: string): Promise<JobConfig> {
  const absolutePath = resolve(process.cwd(), configPath);
  const content = await readFile(absolutePath, 'utf-8');
  // Handle UTF-8 BOM (common on Windows) to avoid JSON.parse failures.
  const sanitized = content.replace(/^\uFEFF/, '');

  let parsed: unknown;
  try {
    parsed = JSON.parse(sanitized);
  } catch (error) {
    throw new ConfigError(`Config file is not valid JSON: ${absolutePath}`, { cause: error });
  }

  const config = parseJobConfig(parsed);
  return {
    ...config,
    table: { ...config.table, location: resolve(absolutePath, '..', config.table.location) },
  };
}
