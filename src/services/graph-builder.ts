/**
 * Similarity graph construction: all owned games as nodes, one undirected
 * edge per pair whose score reaches the threshold.
 */

import type { BoardGame } from '../types/game.js';
import type { GraphEdge, GraphNode, SimilarityGraph, SimilarityWeights } from '../types/graph.js';
import { DEFAULT_SIMILARITY_WEIGHTS } from '../types/graph.js';
import { scoreSimilarity } from './similarity.js';

const NUMERIC_ID = /^\d+$/;

/** Numeric ids sort by value, anything else by code unit order. */
export function compareIds(a: string, b: string): number {
  if (NUMERIC_ID.test(a) && NUMERIC_ID.test(b)) {
    const byLength = a.replace(/^0+/, '').length - b.replace(/^0+/, '').length;
    if (byLength !== 0) return byLength;
  }
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Sorted id pair, so (a, b) and (b, a) map to the same edge. */
export function canonicalPair(a: string, b: string): [string, string] {
  return compareIds(a, b) <= 0 ? [a, b] : [b, a];
}

export function toGraphNode(game: BoardGame): GraphNode {
  return {
    id: game.id,
    label: game.name,
    name: game.name,
    averagerating: game.stats.averageRating,
    averageweight: game.stats.averageWeight,
    minplayers: game.stats.minPlayers,
    maxplayers: game.stats.maxPlayers,
    playingtime: game.stats.playingTime,
    mechanics: [...game.mechanics],
    categories: [...game.categories],
    bggUrl: game.bggUrl,
  };
}

/**
 * Score every unordered pair and keep those with `score >= threshold`.
 * Games repeating an earlier id are ignored.
 */
export function buildGraph(
  games: Iterable<BoardGame>,
  threshold: number,
  weights: SimilarityWeights = DEFAULT_SIMILARITY_WEIGHTS,
): SimilarityGraph {
  const unique = new Map<string, BoardGame>();
  for (const game of games) {
    if (!unique.has(game.id)) unique.set(game.id, game);
  }
  const list = [...unique.values()];

  const edges = new Map<string, GraphEdge>();
  for (let i = 0; i < list.length; i++) {
    for (let j = i + 1; j < list.length; j++) {
      const weight = scoreSimilarity(list[i], list[j], weights);
      if (weight < threshold) continue;

      const [source, target] = canonicalPair(list[i].id, list[j].id);
      const key = `${source}|${target}`;
      if (!edges.has(key)) edges.set(key, { source, target, weight });
    }
  }

  return {
    nodes: list.map(toGraphNode),
    edges: [...edges.values()],
  };
}
