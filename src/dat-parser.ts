/**
 * DAT (Logiqx XML) catalog parser
 *
 * ```xml
 * <datafile>
 *   <header><name>Nintendo - NES</name></header>
 *   <game name="Game 1">
 *     <description>Game 1 (USA)</description>
 *     <rom name="game1.nes" size="131072" crc="ABCD1234" md5="..." sha1="..."/>
 *   </game>
 * </datafile>
 * ```
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { ParseError } from './errors.js';
import type { Catalog, CatalogEntry } from './types.js';

const GAME_ELEMENTS = new Set(['game', 'machine']);

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  htmlEntities: true,
  isArray: (name) => GAME_ELEMENTS.has(name) || name === 'rom',
});

type XmlNode = Record<string, unknown>;

function isNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asArray(value: unknown): unknown[] {
  if (value === undefined || value === null) return [];
  return Array.isArray(value) ? value : [value];
}

function textOf(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (isNode(value)) return textOf(value['#text']);
  return '';
}

function attribute(node: XmlNode, name: string): string {
  return textOf(node[`@_${name}`]);
}

export function createCatalog(name: string): Catalog {
  return {
    name,
    md5: new Map(),
    sha1: new Map(),
    crc32: new Map(),
    byName: new Map(),
  };
}

/**
 * Collect every game/machine element below `node`, at any depth
 */
function collectGames(node: XmlNode, games: XmlNode[]): void {
  for (const [key, value] of Object.entries(node)) {
    if (key.startsWith('@_') || key === '#text') continue;

    for (const child of asArray(value)) {
      if (!isNode(child)) continue;
      if (GAME_ELEMENTS.has(key)) {
        games.push(child);
      } else {
        collectGames(child, games);
      }
    }
  }
}

function findRoot(document: unknown): XmlNode {
  if (isNode(document)) {
    for (const [key, value] of Object.entries(document)) {
      if (key.startsWith('?') || key === '#text') continue;
      if (isNode(value)) return value;
      // an empty root element parses to ''
      if (value === '') return {};
    }
  }
  throw new ParseError('DAT document has no root element');
}

/**
 * Add one rom to every index it has a key for. The name index always
 * receives the entry.
 */
export function addEntry(catalog: Catalog, entry: CatalogEntry): void {
  if (entry.md5) catalog.md5.set(entry.md5, entry);
  if (entry.crc32) catalog.crc32.set(entry.crc32, entry);
  if (entry.sha1) catalog.sha1.set(entry.sha1, entry);
  catalog.byName.set(entry.name, entry);
}

/**
 * Parse a DAT document into a new, self-contained catalog
 *
 * @param xml - Document text
 * @param fallbackName - Catalog name used when the header declares none
 * @throws ParseError when the document is not well-formed XML
 */
export function parseDat(xml: string, fallbackName: string): Catalog {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new ParseError(`Malformed DAT (line ${line}, column ${col}): ${msg}`);
  }

  let document: unknown;
  try {
    document = xmlParser.parse(xml);
  } catch (error) {
    throw new ParseError('Malformed DAT', undefined, error);
  }

  const root = findRoot(document);
  const header = root.header;
  const declaredName = isNode(header) ? textOf(header.name).trim() : '';
  const catalog = createCatalog(declaredName || fallbackName);

  const games: XmlNode[] = [];
  collectGames(root, games);

  for (const game of games) {
    const gameName = attribute(game, 'name');
    const description = textOf(game.description) || gameName;

    for (const rom of asArray(game.rom)) {
      if (!isNode(rom)) continue;

      addEntry(catalog, {
        name: attribute(rom, 'name'),
        description,
        size: attribute(rom, 'size') || '0',
        md5: attribute(rom, 'md5').toLowerCase(),
        crc32: attribute(rom, 'crc').toLowerCase(),
        sha1: attribute(rom, 'sha1').toLowerCase(),
      });
    }
  }

  return catalog;
}
