/**
 * In-memory store of loaded DAT catalogs
 */

import { readdir, readFile } from 'node:fs/promises';
import { basename, join, resolve } from 'node:path';
import { parseDat } from './dat-parser.js';
import { IOError, ParseError, toErrorMessage } from './errors.js';
import { isDatFile } from './extensions.js';
import { silentLogger } from './logging.js';
import type { Logger } from './logging.js';
import type {
  Catalog,
  CatalogMatch,
  CatalogStats,
  ComponentOptions,
  Fingerprint,
  HashType,
  ReadonlyCatalog,
} from './types.js';

/**
 * Hash lookups in the order they are tried, with the confidence of a hit
 */
export const HASH_PRIORITY: ReadonlyArray<{ type: HashType; confidence: number }> = [
  { type: 'md5', confidence: 1.0 },
  { type: 'sha1', confidence: 0.99 },
  { type: 'crc32', confidence: 0.95 },
];

/** Name matches never reach the hash-match range */
export const MAX_NAME_CONFIDENCE = 0.8;

export interface CatalogStoreOptions extends ComponentOptions {
  /** Directory scanned by {@link CatalogStore.loadAllFromDirectory} when none is given */
  databaseDir?: string;
}

export type LoadResult =
  | { ok: true; catalog: string; entries: number; alreadyLoaded: boolean }
  | { ok: false; error: IOError | ParseError };

/**
 * CatalogStore - load DAT sources and resolve fingerprints against them
 *
 * Loading and lookups must not overlap: finish every load before identifying.
 *
 * @example
 * ```typescript
 * const store = new CatalogStore({ databaseDir: './data' });
 * await store.loadAllFromDirectory();
 *
 * const match = store.findByFingerprint(await fingerprintFile('mario.nes'));
 * console.log(match?.entry.name); // 'Super Mario Bros. (World).nes'
 * ```
 */
export class CatalogStore {
  private readonly catalogs = new Map<string, Catalog>();
  private readonly loaded = new Set<string>();
  private readonly sourceCatalogs = new Map<string, string>();
  private readonly logger: Logger;
  private readonly databaseDir?: string;

  constructor(options: CatalogStoreOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.databaseDir = options.databaseDir;
  }

  /**
   * Load a DAT source
   *
   * The source is parsed into a fresh catalog and only merged into the store
   * once the whole document has been read, so a failure leaves existing
   * catalogs untouched. Loading the same path again is a no-op.
   */
  async loadSourceResult(path: string): Promise<LoadResult> {
    const key = resolve(path);

    if (this.loaded.has(key)) {
      this.logger.info('catalog', 'DAT file already loaded', { source: path });
      return { ok: true, catalog: this.catalogNameFor(key), entries: 0, alreadyLoaded: true };
    }

    this.logger.info('catalog', 'Loading DAT file', { source: path });

    let xml: string;
    try {
      xml = await readFile(path, 'utf-8');
    } catch (error) {
      const failure = new IOError(`Cannot read DAT file ${path}: ${toErrorMessage(error)}`, path, error);
      this.logger.error('catalog', 'Error loading DAT file', failure, { source: path });
      return { ok: false, error: failure };
    }

    let parsed: Catalog;
    try {
      parsed = parseDat(xml, basename(path));
    } catch (error) {
      const failure = error instanceof ParseError
        ? new ParseError(`${error.message} in ${path}`, path, error)
        : new ParseError(`Cannot parse DAT file ${path}: ${toErrorMessage(error)}`, path, error);
      this.logger.error('catalog', 'Error loading DAT file', failure, { source: path });
      return { ok: false, error: failure };
    }

    this.commit(parsed);
    this.loaded.add(key);
    this.sourceCatalogs.set(key, parsed.name);

    this.logger.info('catalog', 'Loaded DAT file', {
      source: path,
      catalog: parsed.name,
      entries: parsed.byName.size,
    });

    return { ok: true, catalog: parsed.name, entries: parsed.byName.size, alreadyLoaded: false };
  }

  /**
   * Load a DAT source, reporting only whether it succeeded
   */
  async loadSource(path: string): Promise<boolean> {
    const result = await this.loadSourceResult(path);
    return result.ok;
  }

  /**
   * Load every DAT source directly inside a directory
   *
   * @returns Number of sources loaded successfully
   */
  async loadAllFromDirectory(dir: string | undefined = this.databaseDir): Promise<number> {
    if (!dir) {
      this.logger.warn('catalog', 'No database directory configured');
      return 0;
    }

    let names: string[];
    try {
      const entries = await readdir(dir, { withFileTypes: true });
      names = entries
        .filter((entry) => entry.isFile() && isDatFile(entry.name))
        .map((entry) => entry.name)
        .sort();
    } catch (error) {
      this.logger.warn('catalog', 'Cannot read database directory', { path: dir, error: toErrorMessage(error) });
      return 0;
    }

    let count = 0;
    for (const name of names) {
      if (await this.loadSource(join(dir, name))) {
        count++;
      }
    }

    this.logger.info('catalog', 'Loaded DAT files', { path: dir, count });
    return count;
  }

  /**
   * Find the entry a fingerprint belongs to
   *
   * Every catalog is searched by MD5 before any is searched by SHA-1, and by
   * SHA-1 before CRC32. Within one hash type catalogs are searched in the order
   * they were first loaded.
   */
  findByFingerprint(fingerprint: Fingerprint): CatalogMatch | null {
    for (const { type, confidence } of HASH_PRIORITY) {
      const key = fingerprint[type].toLowerCase();
      if (!key) continue;

      for (const catalog of this.catalogs.values()) {
        const entry = catalog[type].get(key);
        if (entry) {
          return { entry, catalog: catalog.name, matchType: type, confidence };
        }
      }
    }

    return null;
  }

  /**
   * Case-insensitive substring search over entry names
   *
   * @returns Matches sorted by descending confidence
   */
  findByName(query: string): CatalogMatch[] {
    const needle = query.toLowerCase();
    if (!needle) return [];

    const results: CatalogMatch[] = [];

    for (const catalog of this.catalogs.values()) {
      for (const [name, entry] of catalog.byName) {
        const candidate = name.toLowerCase();
        if (!candidate.includes(needle)) continue;

        const similarity = needle.length / Math.max(needle.length, candidate.length);
        results.push({
          entry,
          catalog: catalog.name,
          matchType: 'name',
          confidence: Math.min(MAX_NAME_CONFIDENCE, similarity),
        });
      }
    }

    return results.sort((a, b) => b.confidence - a.confidence);
  }

  exportStats(): CatalogStats {
    const stats: CatalogStats = { catalogCount: this.catalogs.size, totalEntries: 0, perCatalog: {} };

    for (const catalog of this.catalogs.values()) {
      stats.totalEntries += catalog.byName.size;
      stats.perCatalog[catalog.name] = {
        entries: catalog.byName.size,
        uniqueMd5: catalog.md5.size,
        uniqueCrc32: catalog.crc32.size,
        uniqueSha1: catalog.sha1.size,
      };
    }

    return stats;
  }

  /**
   * Catalog names in load order
   */
  listCatalogs(): string[] {
    return Array.from(this.catalogs.keys());
  }

  /**
   * Copy of a catalog's indexes. Later loads into the same catalog do not
   * show up in it.
   */
  getCatalog(name: string): ReadonlyCatalog | undefined {
    const catalog = this.catalogs.get(name);
    if (!catalog) return undefined;

    return {
      name: catalog.name,
      md5: new Map(catalog.md5),
      sha1: new Map(catalog.sha1),
      crc32: new Map(catalog.crc32),
      byName: new Map(catalog.byName),
    };
  }

  /**
   * Absolute paths of every source loaded so far
   */
  loadedSources(): string[] {
    return Array.from(this.loaded);
  }

  private catalogNameFor(sourceKey: string): string {
    return this.sourceCatalogs.get(sourceKey) ?? basename(sourceKey);
  }

  /**
   * Merge a parsed catalog into the store. Entries of a catalog that is
   * already present are added to it, replacing entries with the same keys.
   */
  private commit(parsed: Catalog): void {
    const existing = this.catalogs.get(parsed.name);
    if (!existing) {
      this.catalogs.set(parsed.name, parsed);
      return;
    }

    for (const index of ['md5', 'sha1', 'crc32', 'byName'] as const) {
      for (const [key, entry] of parsed[index]) {
        existing[index].set(key, entry);
      }
    }
  }
}
