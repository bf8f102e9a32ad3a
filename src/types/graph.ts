/**
 * Export schema read by the graph viewer (`nodes.json` / `edges.json`).
 * Field names are part of the file contract; do not rename.
 */

export interface GraphNode {
  id: string;
  label: string;
  name: string;
  averagerating: number | null;
  averageweight: number | null;
  minplayers: number | null;
  maxplayers: number | null;
  playingtime: number | null;
  mechanics: string[];
  categories: string[];
  bggUrl: string;
}

export interface GraphEdge {
  source: string;
  target: string;
  weight: number;
}

export interface SimilarityGraph {
  nodes: GraphNode[];
  edges: GraphEdge[];
}

/** Weights of the three similarity components; they sum to 1. */
export interface SimilarityWeights {
  mechanics: number;
  categories: number;
  numeric: number;
}

export const DEFAULT_SIMILARITY_WEIGHTS: SimilarityWeights = {
  mechanics: 0.5,
  categories: 0.3,
  numeric: 0.2,
};

export const DEFAULT_EDGE_THRESHOLD = 0.35;
