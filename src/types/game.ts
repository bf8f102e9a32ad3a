/**
 * Board game record used by the similarity pipeline.
 *
 * Built once from the BGG `thing` response; every later stage reads these
 * fields directly instead of poking at raw XML.
 */

export const BGG_GAME_URL_BASE = 'https://boardgamegeek.com/boardgame';

/** Numeric features; `null` means BGG did not report a usable value. */
export interface GameStats {
  averageRating: number | null;
  averageWeight: number | null;
  minPlayers: number | null;
  maxPlayers: number | null;
  playingTime: number | null;
}

export interface BoardGame {
  id: string;
  name: string;
  yearPublished: number | null;
  /** Deduplicated, trimmed tag names in first-seen order */
  mechanics: readonly string[];
  categories: readonly string[];
  stats: GameStats;
  bggUrl: string;
}

export const EMPTY_STATS: GameStats = {
  averageRating: null,
  averageWeight: null,
  minPlayers: null,
  maxPlayers: null,
  playingTime: null,
};

export function getBggGameUrl(id: string): string {
  return `${BGG_GAME_URL_BASE}/${id}`;
}

/** One owned game as listed by the collection endpoint. */
export interface CollectionEntry {
  id: string;
  name: string;
  yearPublished: number | null;
  thumbnail: string | null;
}

/** A requested game that did not make it into the graph. */
export interface SkippedGame {
  id: string;
  reason: string;
}
