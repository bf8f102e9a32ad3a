/**
 * One generation run: collection → details → similarity graph → export.
 */

import type { SkippedGame } from '../src/types/game.js';
import type { SimilarityGraph, SimilarityWeights } from '../src/types/graph.js';
import { buildGraph } from '../src/services/graph-builder.js';
import { explainSimilarity } from '../src/services/similarity.js';
import { BggApiClient } from './bgg-api.js';
import { fetchCollection } from './collection-fetcher.js';
import type { GeneratorConfig } from './config-store.js';
import { fetchDetails } from './detail-fetcher.js';
import { exportGraph } from './exporter.js';
import type { ExportResult } from './exporter.js';
import { getLogLevel, logger } from './safe-logger.js';

export interface PipelineOptions {
  username: string;
  outDir: string;
  edgeThreshold: number;
  weights: SimilarityWeights;
  batchSize: number;
  batchConcurrency: number;
}

export interface PipelineResult {
  username: string;
  graph: SimilarityGraph;
  skipped: SkippedGame[];
  files: ExportResult;
}

export function createClient(config: GeneratorConfig, fetchFn?: typeof globalThis.fetch): BggApiClient {
  return new BggApiClient({
    baseUrl: config.apiBaseUrl,
    apiToken: config.apiToken,
    rateLimitDelayMs: config.rateLimitDelayMs,
    maxAttempts: config.maxAttempts,
    backoffBaseMs: config.backoffBaseMs,
    requestTimeoutMs: config.requestTimeoutMs,
    fetchFn,
  });
}

export function pipelineOptions(config: GeneratorConfig, username: string, outDir: string): PipelineOptions {
  return {
    username,
    outDir,
    edgeThreshold: config.edgeThreshold,
    weights: config.weights,
    batchSize: config.batchSize,
    batchConcurrency: config.batchConcurrency,
  };
}

/**
 * Errors from the collection and export stages propagate and end the run;
 * failures while fetching details only drop the affected games.
 */
export async function runPipeline(client: BggApiClient, options: PipelineOptions): Promise<PipelineResult> {
  const collection = await fetchCollection(client, options.username);

  const fallbackNames = new Map<string, string>();
  for (const entry of collection) {
    if (entry.name) fallbackNames.set(entry.id, entry.name);
  }

  const details = await fetchDetails(
    client,
    collection.map((entry) => entry.id),
    { batchSize: options.batchSize, concurrency: options.batchConcurrency, fallbackNames },
  );

  logger.info(`[Graph] Computing similarities for ${details.games.size} games with threshold ${options.edgeThreshold}`);
  const graph = buildGraph(details.games.values(), options.edgeThreshold, options.weights);
  logger.info(`[Graph] Built ${graph.edges.length} edges with threshold ${options.edgeThreshold}`);

  if (getLogLevel() === 'debug' && graph.edges.length > 0) {
    const strongest = graph.edges.reduce((best, edge) => (edge.weight > best.weight ? edge : best));
    const source = details.games.get(strongest.source);
    const target = details.games.get(strongest.target);
    if (source && target) {
      const b = explainSimilarity(source, target, options.weights);
      logger.debug(
        `[Graph] Strongest pair ${source.name} / ${target.name}: ` +
        `mechanics=${b.mechanics.toFixed(3)} categories=${b.categories.toFixed(3)} ` +
        `numeric=${b.numeric.toFixed(3)} (${b.numericDimensions} dims) score=${b.score.toFixed(3)}`,
      );
    }
  }

  const files = await exportGraph(graph, options.outDir);

  return {
    username: options.username,
    graph,
    skipped: details.skipped,
    files,
  };
}
