/**
 * Generator configuration.
 *
 * Sources, lowest precedence first: built-in defaults, an optional JSON
 * config file, environment variables (a `.env` file is loaded by the CLI),
 * then explicit overrides from command-line flags.
 */

import fs from 'fs';
import { z } from 'zod';
import { BGG_API_BASE, BGG_THING_BATCH_LIMIT } from '../src/types/bgg.js';
import { DEFAULT_EDGE_THRESHOLD, DEFAULT_SIMILARITY_WEIGHTS } from '../src/types/graph.js';
import { ConfigError, describeError } from './errors.js';

export const CONFIG_FILE_VERSION = 1;

const WEIGHT_SUM_TOLERANCE = 1e-9;

const WeightsSchema = z
  .object({
    mechanics: z.number().min(0).max(1),
    categories: z.number().min(0).max(1),
    numeric: z.number().min(0).max(1),
  })
  .refine(
    (w) => Math.abs(w.mechanics + w.categories + w.numeric - 1) <= WEIGHT_SUM_TOLERANCE,
    { message: 'similarity weights must sum to 1' },
  );

export const GeneratorConfigSchema = z.object({
  apiBaseUrl: z.string().url().default(BGG_API_BASE),
  apiToken: z.string().min(1).optional(),
  rateLimitDelayMs: z.number().int().min(0).default(1500),
  maxAttempts: z.number().int().min(1).max(20).default(3),
  backoffBaseMs: z.number().int().min(0).default(1500),
  requestTimeoutMs: z.number().int().min(1).default(60_000),
  batchSize: z.number().int().min(1).max(BGG_THING_BATCH_LIMIT).default(BGG_THING_BATCH_LIMIT),
  batchConcurrency: z.number().int().min(1).max(8).default(1),
  edgeThreshold: z.number().min(0).max(1).default(DEFAULT_EDGE_THRESHOLD),
  weights: WeightsSchema.default(DEFAULT_SIMILARITY_WEIGHTS),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export type GeneratorConfig = z.output<typeof GeneratorConfigSchema>;
export type GeneratorConfigInput = z.input<typeof GeneratorConfigSchema>;

const ConfigFileSchema = GeneratorConfigSchema.partial().extend({
  version: z.literal(CONFIG_FILE_VERSION),
});

/** Environment variable → config key, with how to read the value */
const ENV_KEYS = {
  BGG_API_BASE: ['apiBaseUrl', 'string'],
  BGG_API_TOKEN: ['apiToken', 'string'],
  BGG_RATE_LIMIT_DELAY_MS: ['rateLimitDelayMs', 'number'],
  BGG_MAX_ATTEMPTS: ['maxAttempts', 'number'],
  BGG_BACKOFF_BASE_MS: ['backoffBaseMs', 'number'],
  BGG_REQUEST_TIMEOUT_MS: ['requestTimeoutMs', 'number'],
  BGG_BATCH_SIZE: ['batchSize', 'number'],
  BGG_BATCH_CONCURRENCY: ['batchConcurrency', 'number'],
  EDGE_THRESHOLD: ['edgeThreshold', 'number'],
  LOG_LEVEL: ['logLevel', 'string'],
} as const satisfies Record<string, readonly [keyof GeneratorConfig, 'string' | 'number']>;

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`).join('; ');
}

/** Read config-relevant variables; blank values are treated as unset. */
export function readEnvConfig(env: NodeJS.ProcessEnv): Record<string, string | number> {
  const values: Record<string, string | number> = {};
  for (const [name, [key, kind]] of Object.entries(ENV_KEYS)) {
    const raw = env[name]?.trim();
    if (!raw) continue;
    if (kind === 'number') {
      const value = Number(raw);
      if (!Number.isFinite(value)) {
        throw new ConfigError(`${name} must be a number, got "${raw}"`);
      }
      values[key] = value;
    } else {
      values[key] = raw;
    }
  }
  return values;
}

/** Load and validate a JSON config file (`{ "version": 1, ... }`). */
export function readConfigFile(filePath: string): Partial<GeneratorConfigInput> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Could not read config file ${filePath}: ${describeError(error)}`, { cause: error });
  }

  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigError(`Invalid config file ${filePath}: ${formatIssues(result.error)}`);
  }
  const { version: _version, ...config } = result.data;
  return config;
}

export interface LoadConfigOptions {
  configFile?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: Partial<GeneratorConfigInput>;
}

export function loadConfig(options: LoadConfigOptions = {}): GeneratorConfig {
  const fromFile = options.configFile ? readConfigFile(options.configFile) : {};
  const fromEnv = readEnvConfig(options.env ?? process.env);
  const overrides = Object.fromEntries(
    Object.entries(options.overrides ?? {}).filter(([, value]) => value !== undefined),
  );

  const result = GeneratorConfigSchema.safeParse({ ...fromFile, ...fromEnv, ...overrides });
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(result.error)}`);
  }
  return result.data;
}
