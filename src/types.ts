/**
 * Type definitions for datmatch
 */

import type { ErrorKind } from './errors.js';
import type { Logger } from './logging.js';

/**
 * Hash types a catalog is indexed by
 */
export type HashType = 'md5' | 'sha1' | 'crc32';

/**
 * How a file was matched to a catalog entry
 */
export type MatchType = HashType | 'name';

/**
 * Content identity of a whole file
 */
export interface Fingerprint {
  readonly md5: string;
  readonly sha1: string;
  /** Zero-padded to 8 hex digits */
  readonly crc32: string;
  readonly size: number;
}

/**
 * A single rom record from a DAT source
 */
export interface CatalogEntry {
  /** Canonical file name declared by the DAT */
  readonly name: string;

  /** Description of the parent game, or the game name when it has none */
  readonly description: string;

  /** Size as declared by the DAT (kept verbatim) */
  readonly size: string;

  readonly md5: string;
  readonly crc32: string;
  readonly sha1: string;
}

/**
 * One loaded DAT source, indexed four ways over the same entries
 */
export interface Catalog {
  readonly name: string;
  readonly md5: Map<string, CatalogEntry>;
  readonly sha1: Map<string, CatalogEntry>;
  readonly crc32: Map<string, CatalogEntry>;
  readonly byName: Map<string, CatalogEntry>;
}

/**
 * Snapshot of a loaded catalog handed out by the store
 */
export interface ReadonlyCatalog {
  readonly name: string;
  readonly md5: ReadonlyMap<string, CatalogEntry>;
  readonly sha1: ReadonlyMap<string, CatalogEntry>;
  readonly crc32: ReadonlyMap<string, CatalogEntry>;
  readonly byName: ReadonlyMap<string, CatalogEntry>;
}

/**
 * Hit returned by a catalog lookup
 */
export interface CatalogMatch {
  entry: CatalogEntry;

  /** Name of the catalog the entry was found in */
  catalog: string;

  matchType: MatchType;

  /** Heuristic score in [0, 1] */
  confidence: number;
}

export interface CatalogStats {
  catalogCount: number;
  totalEntries: number;
  perCatalog: Record<
    string,
    {
      entries: number;
      uniqueMd5: number;
      uniqueCrc32: number;
      uniqueSha1: number;
    }
  >;
}

export type OperationStatus = 'success' | 'error';

/**
 * Outcome of identifying one file
 */
export interface IdentificationResult {
  filePath: string;
  fileName: string;
  status: OperationStatus;
  message?: string;
  errorKind?: ErrorKind;

  /** Absent when the file was rejected before hashing */
  fingerprint?: Fingerprint;

  identified: boolean;
  matchedEntry?: CatalogEntry;
  catalog?: string;
  matchType?: MatchType;
  matchConfidence?: number;

  /** Canonical name of the matched entry */
  correctName?: string;

  /** Byte-exact comparison of the current base name with `correctName` */
  nameMatches?: boolean;
}

/**
 * Outcome of renaming one file
 *
 * In dry-run mode `renamed` reports the intended outcome: `true` means the
 * file would have been renamed, although nothing on disk changed.
 */
export interface RenameResult {
  filePath: string;
  newPath?: string;
  newName?: string;
  renamed: boolean;
  nameMatches?: boolean;
  identification: IdentificationResult;
  dryRun: boolean;
  status: OperationStatus;
  message: string;
  errorKind?: ErrorKind;
}

export interface IdentificationReport {
  total: number;
  identified: number;
  identificationRate: number;
  correct: number;
  correctNameRate: number;
  results: IdentificationResult[];
}

export interface RenamingReport {
  total: number;
  identified: number;
  identificationRate: number;
  renamed: number;
  alreadyCorrect: number;
  results: RenameResult[];
}

export type ReportFormat = 'json' | 'html' | 'csv';

/**
 * Destination a finished report is handed to
 */
export interface ReportSink {
  write(report: IdentificationReport | RenamingReport): Promise<void>;
}

/**
 * Options shared by the engines
 */
export interface ComponentOptions {
  /** Defaults to a logger that drops every entry */
  logger?: Logger;
}
