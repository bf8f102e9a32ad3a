/**
 * Game similarity: pure functions, no I/O.
 *
 * score = w.mechanics · Jaccard(mechanics)
 *       + w.categories · Jaccard(categories)
 *       + w.numeric · cosine(stats)
 *
 * Every input resolves to a number in [0, 1]; nothing here throws.
 */

import type { BoardGame, GameStats } from '../types/game.js';
import type { SimilarityWeights } from '../types/graph.js';
import { DEFAULT_SIMILARITY_WEIGHTS } from '../types/graph.js';

/** Fixed feature order for the numeric vector */
export const NUMERIC_FEATURES: readonly (keyof GameStats)[] = [
  'averageRating',
  'averageWeight',
  'minPlayers',
  'maxPlayers',
  'playingTime',
];

export interface SimilarityBreakdown {
  mechanics: number;
  categories: number;
  numeric: number;
  /** Comparable numeric dimensions after dropping unknowns */
  numericDimensions: number;
  score: number;
}

// ---------------------------------------------------------------------------
// Components
// ---------------------------------------------------------------------------

/** |A∩B| / |A∪B|; two empty sets agree completely (1.0). */
export function jaccard(a: Iterable<string>, b: Iterable<string>): number {
  const setA = new Set(a);
  const setB = new Set(b);
  if (setA.size === 0 && setB.size === 0) return 1;

  let intersection = 0;
  for (const tag of setA) {
    if (setB.has(tag)) intersection++;
  }
  const union = setA.size + setB.size - intersection;
  return intersection / union;
}

function hasAnyStat(stats: GameStats): boolean {
  return NUMERIC_FEATURES.some((feature) => stats[feature] !== null);
}

/**
 * Cosine over the features both games report.
 *
 * - A feature unknown on either side is dropped from both vectors.
 * - No shared feature: 0.0, unless neither game reports any feature, which
 *   counts as the empty/empty case (1.0).
 * - Zero-magnitude vectors: 1.0 when both are zero, else 0.0.
 */
export function numericCosine(a: GameStats, b: GameStats): { value: number; dimensions: number } {
  let dot = 0, magA = 0, magB = 0, dimensions = 0;
  for (const feature of NUMERIC_FEATURES) {
    const valA = a[feature];
    const valB = b[feature];
    if (valA === null || valB === null) continue;
    dimensions++;
    dot += valA * valB;
    magA += valA * valA;
    magB += valB * valB;
  }

  if (dimensions === 0) {
    return { value: !hasAnyStat(a) && !hasAnyStat(b) ? 1 : 0, dimensions };
  }
  if (magA === 0 || magB === 0) {
    return { value: magA === 0 && magB === 0 ? 1 : 0, dimensions };
  }
  return { value: dot / Math.sqrt(magA * magB), dimensions };
}

export function clamp01(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

// ---------------------------------------------------------------------------
// Combined score
// ---------------------------------------------------------------------------

export function explainSimilarity(
  a: BoardGame,
  b: BoardGame,
  weights: SimilarityWeights = DEFAULT_SIMILARITY_WEIGHTS,
): SimilarityBreakdown {
  const mechanics = jaccard(a.mechanics, b.mechanics);
  const categories = jaccard(a.categories, b.categories);
  const numeric = numericCosine(a.stats, b.stats);

  // Normalised by the weight total: identical games score exactly 1 for any
  // accepted weights (0.6 + 0.3 + 0.1 sums to 0.9999999999999999).
  const total = weights.mechanics + weights.categories + weights.numeric;
  const combined = total > 0
    ? (weights.mechanics * mechanics +
      weights.categories * categories +
      weights.numeric * clamp01(numeric.value)) / total
    : 0;

  return {
    mechanics,
    categories,
    numeric: clamp01(numeric.value),
    numericDimensions: numeric.dimensions,
    score: clamp01(combined),
  };
}

export function scoreSimilarity(
  a: BoardGame,
  b: BoardGame,
  weights: SimilarityWeights = DEFAULT_SIMILARITY_WEIGHTS,
): number {
  return explainSimilarity(a, b, weights).score;
}
