/**
 * datmatch - identify ROM files against DAT checksum catalogs
 *
 * Files are fingerprinted (MD5, SHA-1, CRC32, size), resolved against one or
 * more loaded DAT catalogs, and optionally renamed to the name the catalog
 * declares.
 *
 * @example
 * ```typescript
 * import { CatalogStore, RomIdentifier, RomRenamer, createLogger } from 'datmatch';
 *
 * const logger = createLogger({ level: 'info' });
 * const store = new CatalogStore({ logger });
 * await store.loadSource('dats/Nintendo - Nintendo Entertainment System.dat');
 *
 * const identifier = new RomIdentifier(store, { logger });
 * const renamer = new RomRenamer(identifier, { logger });
 *
 * const results = await renamer.renameDirectory('roms/nes', true, true);
 * const report = await renamer.generateReport(results);
 * console.log(`${report.renamed} of ${report.total} files would be renamed`);
 * ```
 *
 * @packageDocumentation
 */

// Engines
export { CatalogStore, HASH_PRIORITY, MAX_NAME_CONFIDENCE } from './catalog-store.js';
export type { CatalogStoreOptions, LoadResult } from './catalog-store.js';
export { RomIdentifier, rate } from './identifier.js';
export type { CatalogLookup } from './identifier.js';
export { RomRenamer, deriveName } from './renamer.js';
export type { FileIdentifier } from './renamer.js';

// Hash utilities
export {
  calculateHash,
  calculateSingleHash,
  readFingerprint,
  fingerprintFile,
  isEmptyFingerprint,
  EMPTY_FINGERPRINT,
} from './hash.js';
export type { HashResult } from './hash.js';

// DAT parsing
export { parseDat, createCatalog } from './dat-parser.js';

// File names and extensions
export { ROM_EXTENSIONS, DAT_EXTENSIONS, isRomFile, isDatFile } from './extensions.js';
export { parseRomName, createStandardizedName } from './filename.js';
export type { RomNameParts } from './filename.js';

// Reports
export {
  renderReport,
  renderJson,
  renderCsv,
  renderHtml,
  createFileSink,
  formatPercent,
  REPORT_FORMATS,
} from './report.js';

// Ambient
export { loadConfig, DEFAULT_CONFIG } from './config.js';
export type { DatmatchConfig, LoadConfigOptions } from './config.js';
export { createLogger, createMemoryLogger, silentLogger, LOG_LEVELS } from './logging.js';
export type { Logger, LogLevel, LogEntry, LogContext, MemoryLogger } from './logging.js';
export {
  DatmatchError,
  IOError,
  ParseError,
  NotFoundError,
  CollisionError,
  ValidationError,
  isDatmatchError,
  toErrorMessage,
} from './errors.js';
export type { ErrorKind } from './errors.js';

// Types
export type {
  HashType,
  MatchType,
  Fingerprint,
  CatalogEntry,
  Catalog,
  ReadonlyCatalog,
  CatalogMatch,
  CatalogStats,
  OperationStatus,
  IdentificationResult,
  RenameResult,
  IdentificationReport,
  RenamingReport,
  ReportFormat,
  ReportSink,
  ComponentOptions,
} from './types.js';
