/**
 * Identify ROM files by content against the loaded catalogs
 */

import { stat } from 'node:fs/promises';
import { basename } from 'node:path';
import { IOError, ValidationError } from './errors.js';
import type { DatmatchError } from './errors.js';
import { isRomFile } from './extensions.js';
import { fingerprintFile, isEmptyFingerprint } from './hash.js';
import { silentLogger } from './logging.js';
import type { Logger } from './logging.js';
import { listFiles } from './walk.js';
import type {
  CatalogMatch,
  ComponentOptions,
  Fingerprint,
  IdentificationReport,
  IdentificationResult,
  ReportSink,
} from './types.js';

/**
 * The part of a catalog store identification needs
 */
export interface CatalogLookup {
  findByFingerprint(fingerprint: Fingerprint): CatalogMatch | null;
}

export function rate(count: number, total: number): number {
  return total > 0 ? count / total : 0;
}

function failure(filePath: string, error: DatmatchError, fingerprint?: Fingerprint): IdentificationResult {
  return {
    filePath,
    fileName: basename(filePath),
    status: 'error',
    errorKind: error.kind,
    message: error.message,
    ...(fingerprint && { fingerprint }),
    identified: false,
  };
}

/**
 * RomIdentifier - resolve files to catalog entries by fingerprint
 *
 * Only hash lookups take part in identification; name search is left to
 * interactive use through {@link CatalogStore.findByName}.
 *
 * @example
 * ```typescript
 * const identifier = new RomIdentifier(store, { logger });
 * const result = await identifier.identify('roms/mario.nes');
 * if (result.identified && !result.nameMatches) {
 *   console.log(`${result.fileName} should be ${result.correctName}`);
 * }
 * ```
 */
export class RomIdentifier {
  private readonly logger: Logger;

  constructor(
    private readonly catalogs: CatalogLookup,
    options: ComponentOptions = {}
  ) {
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Identify a single file
   */
  async identify(filePath: string): Promise<IdentificationResult> {
    const fileName = basename(filePath);

    const isFile = await stat(filePath).then(
      (stats) => stats.isFile(),
      () => false
    );
    if (!isFile) {
      return failure(filePath, new ValidationError(`File not found: ${filePath}`, filePath));
    }

    if (!isRomFile(filePath)) {
      return failure(filePath, new ValidationError(`Not a ROM file: ${filePath}`, filePath));
    }

    const fingerprint = await fingerprintFile(filePath, this.logger);
    if (isEmptyFingerprint(fingerprint)) {
      return failure(filePath, new IOError(`Could not read file: ${filePath}`, filePath), fingerprint);
    }

    const match = this.catalogs.findByFingerprint(fingerprint);
    if (!match) {
      this.logger.debug('identify', 'No catalog match', { path: filePath });
      return { filePath, fileName, status: 'success', fingerprint, identified: false };
    }

    this.logger.debug('identify', 'Identified ROM', {
      path: filePath,
      catalog: match.catalog,
      match_type: match.matchType,
    });

    return {
      filePath,
      fileName,
      status: 'success',
      fingerprint,
      identified: true,
      matchedEntry: match.entry,
      catalog: match.catalog,
      matchType: match.matchType,
      matchConfidence: match.confidence,
      correctName: match.entry.name,
      nameMatches: fileName === match.entry.name,
    };
  }

  /**
   * Identify every ROM file in a directory
   *
   * Files are identified one after another; a failure on one file shows up in
   * its own result and does not stop the scan.
   */
  async identifyDirectory(dir: string, recursive = true): Promise<IdentificationResult[]> {
    let files: string[];
    try {
      const stats = await stat(dir);
      if (!stats.isDirectory()) {
        this.logger.error('identify', 'Not a directory', undefined, { path: dir });
        return [];
      }
      files = await listFiles(dir, recursive, isRomFile, this.logger);
    } catch (error) {
      this.logger.error('identify', 'Directory not found', error, { path: dir });
      return [];
    }

    const results: IdentificationResult[] = [];
    for (const file of files) {
      results.push(await this.identify(file));
    }

    this.logger.info('identify', 'Scanned directory', { path: dir, count: results.length });
    return results;
  }

  /**
   * Summarize identification results, optionally handing the report to a sink
   */
  async generateReport(results: IdentificationResult[], sink?: ReportSink): Promise<IdentificationReport> {
    const identified = results.filter((r) => r.identified).length;
    const correct = results.filter((r) => r.nameMatches === true).length;

    const report: IdentificationReport = {
      total: results.length,
      identified,
      identificationRate: rate(identified, results.length),
      correct,
      correctNameRate: rate(correct, identified),
      results,
    };

    if (sink) {
      try {
        await sink.write(report);
      } catch (error) {
        this.logger.error('report', 'Error saving report', error);
      }
    }

    return report;
  }
}
