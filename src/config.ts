/**
 * docschema Configuration — YAML file validated with Zod
 *
 * The file uses snake_case keys; the rest of the code sees DocSchemaConfig.
 * Environment variables win over the file for secrets:
 * - MONGODB_URI overrides mongodb.uri
 * - CLAUDE_API_KEY overrides correction.api_key
 */

import { readFile } from 'fs/promises';
import { parse } from 'yaml';
import { z } from 'zod';
import { DocSchemaError, errorMessage } from './errors.js';
import type { DocSchemaConfig } from './types.js';

export const DEFAULT_CONFIG_PATH = 'config.yaml';
export const DEFAULT_CORRECTION_MODEL = 'claude-3-5-sonnet-latest';

const fieldListSchema = z.array(z.string()).nullish().transform(v => v ?? []);

export const configFileSchema = z.object({
  mongodb: z.object({
    database: z.string().min(1).describe('Database to document'),
    uri: z.string().min(1).optional().describe('Connection string; MONGODB_URI takes precedence'),
  }),
  output: z.object({
    directory: z.string().min(1).default('./output'),
    format: z.string().regex(/^[A-Za-z0-9]+$/, 'must be a plain file extension such as "md"').default('md'),
  }).default({}),
  schema: z.object({
    sample_size: z.number().int().positive().default(100),
    include_fields: fieldListSchema,
    exclude_fields: fieldListSchema,
  }).default({}),
  correction: z.object({
    enabled: z.boolean().default(true),
    model: z.string().min(1).default(DEFAULT_CORRECTION_MODEL),
    api_key: z.string().min(1).optional(),
    timeout_ms: z.number().int().positive().default(60000),
    max_tokens: z.number().int().positive().default(4096),
  }).default({}),
});

/**
 * Validate an already-parsed config object.
 */
export function parseConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): DocSchemaConfig {
  const result = configFileSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new DocSchemaError({
      code: 'CONFIGURATION_ERROR',
      message: `Invalid configuration: ${issues}.`,
      fix: `Correct the listed keys in the configuration file.`,
    });
  }

  const file = result.data;
  return {
    mongodb: {
      database: file.mongodb.database,
      uri: env['MONGODB_URI'] || file.mongodb.uri,
    },
    output: {
      directory: file.output.directory,
      format: file.output.format,
    },
    schema: {
      sampleSize: file.schema.sample_size,
      includeFields: file.schema.include_fields,
      excludeFields: file.schema.exclude_fields,
    },
    correction: {
      enabled: file.correction.enabled,
      model: file.correction.model,
      apiKey: env['CLAUDE_API_KEY'] || file.correction.api_key,
      timeoutMs: file.correction.timeout_ms,
      maxTokens: file.correction.max_tokens,
    },
  };
}

export async function loadConfig(path: string = DEFAULT_CONFIG_PATH, env: NodeJS.ProcessEnv = process.env): Promise<DocSchemaConfig> {
  let raw: unknown;
  try {
    raw = parse(await readFile(path, 'utf8'));
  } catch (err) {
    throw new DocSchemaError({
      code: 'CONFIGURATION_ERROR',
      message: `Cannot load configuration from "${path}": ${errorMessage(err)}`,
      fix: `Pass --config with the path to a readable YAML file.`,
      originalError: err,
    });
  }
  return parseConfig(raw, env);
}

/**
 * Connection string for the run. Checked before any database access.
 */
export function requireMongoUri(config: DocSchemaConfig): string {
  if (!config.mongodb.uri) {
    throw new DocSchemaError({
      code: 'MISSING_CREDENTIALS',
      message: `No MongoDB connection string configured.`,
      fix: `Set MONGODB_URI or mongodb.uri in the configuration file.`,
    });
  }
  return config.mongodb.uri;
}

export function requireApiKey(config: DocSchemaConfig): string {
  if (!config.correction.apiKey) {
    throw new DocSchemaError({
      code: 'MISSING_CREDENTIALS',
      message: `CLAUDE_API_KEY environment variable is not set.`,
      fix: `Set CLAUDE_API_KEY, set correction.api_key, or disable correction with --no-correct.`,
    });
  }
  return config.correction.apiKey;
}
