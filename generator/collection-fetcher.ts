/**
 * Owned-collection lookup for a BGG user.
 */

import type * as cheerio from 'cheerio';
import type { CollectionEntry } from '../src/types/game.js';
import { CollectionItemSchema } from '../src/types/bgg.js';
import type { BggApiClient } from './bgg-api.js';
import { expectRoot, readApiError, readCollectionItems } from './bgg-xml.js';
import { CollectionUnavailableError, TransportError } from './errors.js';
import { logger } from './safe-logger.js';

/** Owned base games, with stats */
export function collectionParams(username: string): Record<string, string> {
  return {
    username,
    own: '1',
    excludesubtype: 'boardgameexpansion',
    stats: '1',
  };
}

/**
 * Turn a collection document into entries, deduplicated by id.
 * Items BGG lists twice (owned + preordered, say) keep their first position.
 */
export function parseCollection(username: string): ($: cheerio.CheerioAPI) => CollectionEntry[] {
  return ($) => {
    const apiError = readApiError($);
    if (apiError) {
      throw new CollectionUnavailableError(username, apiError);
    }
    expectRoot($, 'items');

    const entries: CollectionEntry[] = [];
    const seen = new Set<string>();

    for (const raw of readCollectionItems($)) {
      const parsed = CollectionItemSchema.safeParse(raw);
      if (!parsed.success) {
        logger.warn(`[Collection] Ignoring item without a valid objectid (${raw.objectId ?? 'missing'})`);
        continue;
      }
      const { objectId, name, yearPublished, thumbnail } = parsed.data;
      if (seen.has(objectId)) {
        logger.debug(`[Collection] Duplicate listing for ${objectId} (${name}) ignored`);
        continue;
      }
      seen.add(objectId);
      entries.push({ id: objectId, name, yearPublished, thumbnail });
    }

    return entries;
  };
}

export async function fetchCollection(client: BggApiClient, username: string): Promise<CollectionEntry[]> {
  const user = username.trim();
  if (!user) {
    throw new CollectionUnavailableError(username, 'username is empty');
  }

  logger.info(`[Collection] Fetching collection for user: ${user}`);

  let entries: CollectionEntry[];
  try {
    entries = await client.request('collection', collectionParams(user), parseCollection(user), 'collection');
  } catch (error) {
    if (error instanceof TransportError && error.kind === 'rejected') {
      throw new CollectionUnavailableError(user, `BGG answered HTTP ${error.status}`, { cause: error });
    }
    throw error;
  }

  logger.info(`[Collection] Found ${entries.length} owned games for ${user}`);
  return entries;
}
