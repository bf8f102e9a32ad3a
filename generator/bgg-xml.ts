/**
 * BGG XML readers (cheerio in XML mode).
 *
 * These only pull strings out of the document; validation and type
 * conversion happen in the zod schemas in `src/types/bgg.ts`.
 */

import * as cheerio from 'cheerio';
import type { AnyNode } from 'domhandler';
import type { RawCollectionItem, RawThingItem } from '../src/types/bgg.js';
import { LINK_TYPE_CATEGORY, LINK_TYPE_MECHANIC } from '../src/types/bgg.js';

/** Thrown when a body is not an XML document with a root element. */
export class XmlShapeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'XmlShapeError';
  }
}

export function loadXml(body: string): cheerio.CheerioAPI {
  if (!body.trim()) {
    throw new XmlShapeError('Empty response body');
  }
  const $ = cheerio.load(body, { xml: true });
  if ($.root().children().length === 0) {
    throw new XmlShapeError('Response has no root element');
  }
  return $;
}

/** Require a specific root element, e.g. `<items>`. */
export function expectRoot($: cheerio.CheerioAPI, rootName: string): void {
  if ($.root().children(rootName).length === 0) {
    throw new XmlShapeError(`Expected <${rootName}> root element`);
  }
}

/**
 * Error message BGG embeds in a 200 response, e.g. for an unknown user:
 * `<errors><error><message>Invalid username specified</message></error></errors>`
 */
export function readApiError($: cheerio.CheerioAPI): string | null {
  const message = $.root().find('error > message').first();
  if (message.length === 0) {
    return $.root().children('error').length > 0 ? 'Unknown API error' : null;
  }
  return message.text().trim() || 'Unknown API error';
}

function attr(value: string | undefined): string | null {
  return value === undefined ? null : value;
}

function childText<T extends AnyNode>(node: cheerio.Cheerio<T>, selector: string): string | null {
  const child = node.children(selector).first();
  return child.length > 0 ? child.text() : null;
}

function childValue<T extends AnyNode>(node: cheerio.Cheerio<T>, selector: string): string | null {
  const child = node.children(selector).first();
  return child.length > 0 ? attr(child.attr('value')) : null;
}

// ---------------------------------------------------------------------------
// collection
// ---------------------------------------------------------------------------

export function readCollectionItems($: cheerio.CheerioAPI): RawCollectionItem[] {
  return $.root()
    .children('items')
    .children('item')
    .toArray()
    .map((el) => {
      const item = $(el);
      return {
        objectId: attr(item.attr('objectid')),
        name: childText(item, 'name'),
        yearPublished: childText(item, 'yearpublished'),
        thumbnail: childText(item, 'thumbnail'),
      };
    });
}

// ---------------------------------------------------------------------------
// thing
// ---------------------------------------------------------------------------

export function readThingItems($: cheerio.CheerioAPI): RawThingItem[] {
  return $.root()
    .children('items')
    .children('item')
    .toArray()
    .map((el) => {
      const item = $(el);
      const names = item.children('name');
      const primary = names.filter((_, n) => $(n).attr('type') === 'primary').first();
      const ratings = item.children('statistics').children('ratings').first();

      const linkValues = (type: string): string[] =>
        item
          .children('link')
          .filter((_, link) => $(link).attr('type') === type)
          .toArray()
          .map((link) => $(link).attr('value') ?? '');

      return {
        id: attr(item.attr('id')),
        primaryName: primary.length > 0 ? attr(primary.attr('value')) : null,
        firstName: names.length > 0 ? attr(names.first().attr('value')) : null,
        yearPublished: childValue(item, 'yearpublished'),
        minPlayers: childValue(item, 'minplayers'),
        maxPlayers: childValue(item, 'maxplayers'),
        playingTime: childValue(item, 'playingtime'),
        averageRating: ratings.length > 0 ? childValue(ratings, 'average') : null,
        averageWeight: ratings.length > 0 ? childValue(ratings, 'averageweight') : null,
        mechanics: linkValues(LINK_TYPE_MECHANIC),
        categories: linkValues(LINK_TYPE_CATEGORY),
      };
    });
}
