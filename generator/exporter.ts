/**
 * Writes the viewer's data files (`nodes.json`, `edges.json`).
 */

import * as fs from 'fs';
import path from 'path';
import type { SimilarityGraph } from '../src/types/graph.js';
import { ExportError, describeError } from './errors.js';
import { atomicWriteFiles } from './safe-write.js';
import { logger } from './safe-logger.js';

export const NODES_FILE = 'nodes.json';
export const EDGES_FILE = 'edges.json';

export interface ExportResult {
  nodesPath: string;
  edgesPath: string;
}

export function serialize(value: unknown): string {
  return JSON.stringify(value, null, 2) + '\n';
}

export async function exportGraph(graph: SimilarityGraph, outDir: string): Promise<ExportResult> {
  const nodesPath = path.join(outDir, NODES_FILE);
  const edgesPath = path.join(outDir, EDGES_FILE);

  try {
    await fs.promises.mkdir(outDir, { recursive: true });
    await atomicWriteFiles([
      { filePath: nodesPath, data: serialize(graph.nodes) },
      { filePath: edgesPath, data: serialize(graph.edges) },
    ]);
  } catch (error) {
    throw new ExportError(outDir, `Could not write graph files to ${outDir}: ${describeError(error)}`, { cause: error });
  }

  logger.info(`[Export] Wrote ${nodesPath} (${graph.nodes.length} nodes)`);
  logger.info(`[Export] Wrote ${edgesPath} (${graph.edges.length} edges)`);
  return { nodesPath, edgesPath };
}
