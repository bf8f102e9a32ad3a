/**
 * BGG XML API v2 record schemas.
 *
 * The XML is read into plain string fields first (see `generator/bgg-xml.ts`);
 * these schemas then validate and normalise them into the shapes the rest of
 * the pipeline uses. Parsing happens exactly once, here.
 */

import { z } from 'zod';

export const BGG_API_BASE = 'https://boardgamegeek.com/xmlapi2';

/** `thing` accepts at most this many ids per request */
export const BGG_THING_BATCH_LIMIT = 20;

export type BggEndpoint = 'collection' | 'thing';

export const LINK_TYPE_MECHANIC = 'boardgamemechanic';
export const LINK_TYPE_CATEGORY = 'boardgamecategory';

// ---------------------------------------------------------------------------
// Field helpers
// ---------------------------------------------------------------------------

/** Parse a numeric attribute; blank or non-numeric text becomes `null`. */
export function parseNumeric(raw: string | null | undefined): number | null {
  if (raw === null || raw === undefined) return null;
  const trimmed = raw.trim();
  if (trimmed === '') return null;
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
}

/** Trim, drop blanks and duplicates; case is preserved. */
export function normalizeTags(raw: readonly string[]): string[] {
  const seen = new Set<string>();
  const tags: string[] = [];
  for (const value of raw) {
    const tag = value.trim();
    if (!tag || seen.has(tag)) continue;
    seen.add(tag);
    tags.push(tag);
  }
  return tags;
}

const bggId = z.string().trim().regex(/^\d+$/, 'BGG ids are numeric');
const numericText = z.string().nullable().transform(parseNumeric);
/** BGG writes 0 for "no votes" or "not given"; those are unknown, not zero. */
const positiveNumericText = numericText.transform((value) => (value !== null && value > 0 ? value : null));
const tagList = z.array(z.string()).transform(normalizeTags);

// ---------------------------------------------------------------------------
// collection
// ---------------------------------------------------------------------------

/** Raw fields of one `<item>` in a collection response */
export interface RawCollectionItem {
  objectId: string | null;
  name: string | null;
  yearPublished: string | null;
  thumbnail: string | null;
}

export const CollectionItemSchema = z.object({
  objectId: bggId,
  name: z.string().nullable().transform((value) => value?.trim() ?? ''),
  yearPublished: numericText,
  thumbnail: z.string().nullable().transform((value) => value?.trim() || null),
});

// ---------------------------------------------------------------------------
// thing
// ---------------------------------------------------------------------------

/** Raw fields of one `<item>` in a thing response */
export interface RawThingItem {
  id: string | null;
  primaryName: string | null;
  firstName: string | null;
  yearPublished: string | null;
  minPlayers: string | null;
  maxPlayers: string | null;
  playingTime: string | null;
  averageRating: string | null;
  averageWeight: string | null;
  mechanics: string[];
  categories: string[];
}

export const ThingItemSchema = z.object({
  id: bggId,
  name: z.string().trim().min(1, 'game has no name'),
  yearPublished: numericText,
  minPlayers: positiveNumericText,
  maxPlayers: positiveNumericText,
  playingTime: positiveNumericText,
  averageRating: positiveNumericText,
  averageWeight: positiveNumericText,
  mechanics: tagList,
  categories: tagList,
});

export type ParsedThingItem = z.output<typeof ThingItemSchema>;

/** Per-item outcome of parsing a `thing` batch */
export type ThingParseResult =
  | { ok: true; item: ParsedThingItem }
  | { ok: false; id: string | null; reason: string };
