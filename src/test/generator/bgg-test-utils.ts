import { readFileSync } from 'fs';
import { vi } from 'vitest';
import { BggApiClient } from '../../../generator/bgg-api.js';
import type { BggClientOptions } from '../../../generator/bgg-api.js';

export type FetchFn = typeof globalThis.fetch;

export function readFixture(name: string): string {
  return readFileSync(new URL(`../fixtures/${name}`, import.meta.url), 'utf-8');
}

export function xmlResponse(body: string, status = 200): Response {
  return new Response(body, { status, headers: { 'Content-Type': 'text/xml; charset=utf-8' } });
}

function requestUrl(input: string | URL | Request): URL {
  if (typeof input === 'string') return new URL(input);
  if (input instanceof URL) return input;
  return new URL(input.url);
}

/** Fetch stub answering from a handler that sees the parsed request URL */
export function routeFetch(handler: (url: URL) => Response | Promise<Response>) {
  return vi.fn(async (input: string | URL | Request, _init?: RequestInit) => handler(requestUrl(input)));
}

/** Fetch stub answering with the given responses in order */
export function queuedFetch(...responses: Array<Response | Error>) {
  let index = 0;
  return vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => {
    const next = responses[Math.min(index, responses.length - 1)];
    index++;
    if (next instanceof Error) throw next;
    return next.clone();
  });
}

/** Sleep that returns immediately and advances a virtual clock */
export function fakeClock() {
  let now = 0;
  const sleeps: number[] = [];
  return {
    sleeps,
    now: () => now,
    sleep: async (ms: number) => {
      sleeps.push(ms);
      now += ms;
    },
  };
}

export function createTestClient(fetchFn: FetchFn, overrides: Partial<BggClientOptions> = {}) {
  const clock = fakeClock();
  const client = new BggApiClient({
    baseUrl: 'https://bgg.test/xmlapi2',
    rateLimitDelayMs: 1000,
    maxAttempts: 3,
    backoffBaseMs: 1500,
    requestTimeoutMs: 1000,
    fetchFn,
    sleep: clock.sleep,
    now: clock.now,
    ...overrides,
  });
  return { client, clock };
}

// ---------------------------------------------------------------------------
// XML builders
// ---------------------------------------------------------------------------

function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

export interface ThingFixture {
  id: string;
  name?: string;
  minPlayers?: number;
  maxPlayers?: number;
  playingTime?: number;
  rating?: number;
  weight?: number;
  mechanics?: string[];
  categories?: string[];
}

export function thingXml(items: ThingFixture[]): string {
  const body = items.map((item) => {
    const lines = [`  <item type="boardgame" id="${escapeXml(item.id)}">`];
    if (item.name !== undefined) lines.push(`    <name type="primary" sortindex="1" value="${escapeXml(item.name)}"/>`);
    if (item.minPlayers !== undefined) lines.push(`    <minplayers value="${item.minPlayers}"/>`);
    if (item.maxPlayers !== undefined) lines.push(`    <maxplayers value="${item.maxPlayers}"/>`);
    if (item.playingTime !== undefined) lines.push(`    <playingtime value="${item.playingTime}"/>`);
    for (const m of item.mechanics ?? []) lines.push(`    <link type="boardgamemechanic" id="1" value="${escapeXml(m)}"/>`);
    for (const c of item.categories ?? []) lines.push(`    <link type="boardgamecategory" id="2" value="${escapeXml(c)}"/>`);
    if (item.rating !== undefined || item.weight !== undefined) {
      lines.push('    <statistics page="1"><ratings>');
      if (item.rating !== undefined) lines.push(`      <average value="${item.rating}"/>`);
      if (item.weight !== undefined) lines.push(`      <averageweight value="${item.weight}"/>`);
      lines.push('    </ratings></statistics>');
    }
    lines.push('  </item>');
    return lines.join('\n');
  });
  return `<?xml version="1.0" encoding="utf-8"?>\n<items termsofuse="https://boardgamegeek.com/xmlapi/termsofuse">\n${body.join('\n')}\n</items>`;
}

export function collectionXml(entries: Array<{ id: string; name: string }>): string {
  const body = entries.map(
    (e) => `  <item objecttype="thing" objectid="${escapeXml(e.id)}" subtype="boardgame"><name sortindex="1">${escapeXml(e.name)}</name><status own="1"/></item>`,
  );
  return `<?xml version="1.0" encoding="utf-8"?>\n<items totalitems="${entries.length}">\n${body.join('\n')}\n</items>`;
}

export const PROCESSING_XML =
  '<?xml version="1.0" encoding="utf-8"?>\n<message>Your request for this collection has been accepted and will be processed.  Please try again later for access.</message>';
