/**
 * Command-line adapter around the pipeline. Returns the process exit code
 * instead of exiting so it can be driven from tests.
 */

import { parseArgs } from 'node:util';
import path from 'path';
import { ConfigError, GeneratorError, describeError } from './errors.js';
import { loadConfig } from './config-store.js';
import type { GeneratorConfig } from './config-store.js';
import { createClient, pipelineOptions, runPipeline } from './pipeline.js';
import { logger, setLogLevel } from './safe-logger.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export const USAGE = `Usage: boardgame-graph --username <name> [options]

Generate nodes.json and edges.json from a BoardGameGeek collection.

Options:
  -u, --username <name>       BGG username (required)
  -t, --edge-threshold <n>    Similarity threshold in [0, 1] (default 0.35)
  -o, --out-dir <dir>         Output directory (default "data")
  -c, --config <file>         JSON config file ({ "version": 1, ... })
      --batch-size <n>        Games per detail request (max 20)
      --concurrency <n>       Detail batches in flight at once
  -v, --verbose               Debug logging
  -h, --help                  Show this help`;

export interface CliContext {
  env?: NodeJS.ProcessEnv;
  fetchFn?: typeof globalThis.fetch;
}

interface CliArgs {
  username: string;
  outDir: string;
  configFile?: string;
  edgeThreshold?: number;
  batchSize?: number;
  batchConcurrency?: number;
  verbose: boolean;
}

class UsageError extends Error {}

function numericFlag(name: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(value)) {
    throw new UsageError(`--${name} expects a number, got "${raw}"`);
  }
  return value;
}

function readFlags(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      allowPositionals: false,
      options: {
        username: { type: 'string', short: 'u' },
        'edge-threshold': { type: 'string', short: 't' },
        'out-dir': { type: 'string', short: 'o', default: 'data' },
        config: { type: 'string', short: 'c' },
        'batch-size': { type: 'string' },
        concurrency: { type: 'string' },
        verbose: { type: 'boolean', short: 'v', default: false },
        help: { type: 'boolean', short: 'h', default: false },
      },
    }).values;
  } catch (error) {
    throw new UsageError(describeError(error));
  }
}

export function parseCliArgs(argv: readonly string[]): CliArgs | 'help' {
  const values = readFlags(argv);
  if (values.help) return 'help';

  const username = values.username?.trim();
  if (!username) {
    throw new UsageError('--username is required');
  }

  return {
    username,
    outDir: path.resolve(values['out-dir'] ?? 'data'),
    configFile: values.config,
    edgeThreshold: numericFlag('edge-threshold', values['edge-threshold']),
    batchSize: numericFlag('batch-size', values['batch-size']),
    batchConcurrency: numericFlag('concurrency', values.concurrency),
    verbose: values.verbose ?? false,
  };
}

export async function runCli(argv: readonly string[], context: CliContext = {}): Promise<number> {
  let args: CliArgs | 'help';
  try {
    args = parseCliArgs(argv);
  } catch (error) {
    if (!(error instanceof UsageError)) throw error;
    logger.error(`[Generator] ${error.message}\n\n${USAGE}`);
    return EXIT_USAGE;
  }
  if (args === 'help') {
    logger.log(USAGE);
    return EXIT_OK;
  }

  let config: GeneratorConfig;
  try {
    config = loadConfig({
      configFile: args.configFile,
      env: context.env ?? process.env,
      overrides: {
        edgeThreshold: args.edgeThreshold,
        batchSize: args.batchSize,
        batchConcurrency: args.batchConcurrency,
        logLevel: args.verbose ? 'debug' : undefined,
      },
    });
  } catch (error) {
    if (!(error instanceof ConfigError)) throw error;
    logger.error(`[Generator] ${error.message}`);
    return EXIT_USAGE;
  }
  setLogLevel(config.logLevel);

  try {
    const client = createClient(config, context.fetchFn);
    const result = await runPipeline(client, pipelineOptions(config, args.username, args.outDir));

    if (result.skipped.length > 0) {
      logger.warn(`[Generator] Skipped ${result.skipped.length} games: ${result.skipped.map((s) => s.id).join(', ')}`);
      for (const skip of result.skipped) {
        logger.debug(`[Generator]   ${skip.id}: ${skip.reason}`);
      }
    }
    logger.info(`[Generator] Done: ${result.graph.nodes.length} nodes, ${result.graph.edges.length} edges → ${args.outDir}`);
    return EXIT_OK;
  } catch (error) {
    if (error instanceof GeneratorError) {
      logger.error(`[Generator] ${error.stage} failed: ${error.message}`);
    } else {
      logger.error('[Generator] Unexpected error:', error);
    }
    return EXIT_FAILURE;
  }
}
