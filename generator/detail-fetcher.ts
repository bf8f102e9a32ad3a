/**
 * Batched game-detail lookup (`thing?id=...&stats=1`).
 *
 * A game that cannot be fetched or parsed is dropped from the result and
 * reported in `skipped`; the rest of the run carries on without it.
 */

import type * as cheerio from 'cheerio';
import type { BoardGame, SkippedGame } from '../src/types/game.js';
import { getBggGameUrl } from '../src/types/game.js';
import { BGG_THING_BATCH_LIMIT, ThingItemSchema } from '../src/types/bgg.js';
import type { ParsedThingItem, ThingParseResult } from '../src/types/bgg.js';
import type { BggApiClient } from './bgg-api.js';
import { expectRoot, readThingItems } from './bgg-xml.js';
import { TransportError, describeError } from './errors.js';
import { logger } from './safe-logger.js';

export interface DetailFetchOptions {
  batchSize?: number;
  /** Batches in flight at once; dispatch is still spaced by the client's rate limiter */
  concurrency?: number;
  /** Names from the collection listing, used when a detail record has none */
  fallbackNames?: ReadonlyMap<string, string>;
}

export interface DetailResult {
  /** Fetched games keyed by id, in the order they were requested */
  games: Map<string, BoardGame>;
  skipped: SkippedGame[];
}

interface BatchResult {
  games: BoardGame[];
  skipped: SkippedGame[];
}

export function chunk<T>(values: readonly T[], size: number): T[][] {
  const step = Math.max(1, Math.floor(size));
  const batches: T[][] = [];
  for (let i = 0; i < values.length; i += step) {
    batches.push(values.slice(i, i + step));
  }
  return batches;
}

export function toBoardGame(item: ParsedThingItem): BoardGame {
  return {
    id: item.id,
    name: item.name,
    yearPublished: item.yearPublished,
    mechanics: item.mechanics,
    categories: item.categories,
    stats: {
      averageRating: item.averageRating,
      averageWeight: item.averageWeight,
      minPlayers: item.minPlayers,
      maxPlayers: item.maxPlayers,
      playingTime: item.playingTime,
    },
    bggUrl: getBggGameUrl(item.id),
  };
}

/** Parse every `<item>` of a thing response independently. */
export function parseThingBatch(fallbackNames?: ReadonlyMap<string, string>): ($: cheerio.CheerioAPI) => ThingParseResult[] {
  return ($) => {
    expectRoot($, 'items');
    return readThingItems($).map((raw): ThingParseResult => {
      const id = raw.id?.trim() || null;
      const fallback = id ? fallbackNames?.get(id) : undefined;
      const name = raw.primaryName || raw.firstName || fallback || '';

      const parsed = ThingItemSchema.safeParse({ ...raw, name });
      if (parsed.success) {
        return { ok: true, item: parsed.data };
      }
      const reason = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      return { ok: false, id, reason: `malformed record (${reason})` };
    });
  };
}

async function fetchBatch(
  client: BggApiClient,
  batch: readonly string[],
  label: string,
  fallbackNames?: ReadonlyMap<string, string>,
): Promise<BatchResult> {
  logger.info(`[Details] Processing batch ${label} (${batch.length} games)`);

  let results: ThingParseResult[];
  try {
    results = await client.request('thing', { id: batch.join(','), stats: '1' }, parseThingBatch(fallbackNames), 'details');
  } catch (error) {
    if (!(error instanceof TransportError)) throw error;
    logger.warn(`[Details] Batch ${label} failed, dropping ${batch.length} games: ${error.message}`);
    return {
      games: [],
      skipped: batch.map((id) => ({ id, reason: `batch request failed: ${describeError(error)}` })),
    };
  }

  const requested = new Set(batch);
  const found = new Map<string, BoardGame>();
  const failed = new Map<string, string>();

  for (const result of results) {
    if (!result.ok) {
      if (result.id && requested.has(result.id)) {
        failed.set(result.id, result.reason);
      } else {
        logger.warn(`[Details] Unattributable item in batch ${label}: ${result.reason}`);
      }
      continue;
    }
    const { item } = result;
    if (!requested.has(item.id)) {
      logger.debug(`[Details] Ignoring unrequested item ${item.id}`);
      continue;
    }
    if (!found.has(item.id)) found.set(item.id, toBoardGame(item));
  }

  const games: BoardGame[] = [];
  const skipped: SkippedGame[] = [];
  for (const id of batch) {
    const game = found.get(id);
    if (game) {
      games.push(game);
      continue;
    }
    const reason = failed.get(id) ?? 'not returned by BGG';
    logger.warn(`[Details] Skipping ${id}: ${reason}`);
    skipped.push({ id, reason });
  }
  return { games, skipped };
}

export async function fetchDetails(
  client: BggApiClient,
  ids: readonly string[],
  options: DetailFetchOptions = {},
): Promise<DetailResult> {
  const uniqueIds = [...new Set(ids)];
  const games = new Map<string, BoardGame>();
  const skipped: SkippedGame[] = [];
  if (uniqueIds.length === 0) {
    return { games, skipped };
  }

  const batchSize = Math.min(options.batchSize ?? BGG_THING_BATCH_LIMIT, BGG_THING_BATCH_LIMIT);
  const concurrency = Math.max(1, options.concurrency ?? 1);
  const batches = chunk(uniqueIds, batchSize);

  logger.info(`[Details] Fetching details for ${uniqueIds.length} games in ${batches.length} batches...`);

  const fetched = new Map<string, BoardGame>();
  for (let i = 0; i < batches.length; i += concurrency) {
    const wave = batches.slice(i, i + concurrency);
    const results = await Promise.all(
      wave.map((batch, offset) =>
        fetchBatch(client, batch, `${i + offset + 1}/${batches.length}`, options.fallbackNames),
      ),
    );
    for (const result of results) {
      for (const game of result.games) fetched.set(game.id, game);
      skipped.push(...result.skipped);
    }
  }

  for (const id of uniqueIds) {
    const game = fetched.get(id);
    if (game) games.set(id, game);
  }

  logger.info(`[Details] Successfully fetched details for ${games.size} games (${skipped.length} skipped)`);
  return { games, skipped };
}
