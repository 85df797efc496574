/**
 * Rename identified ROM files to their catalog names
 */

import { access, cp, mkdir, rename } from 'node:fs/promises';
import { basename, dirname, extname, join, relative } from 'node:path';
import { CollisionError, IOError, NotFoundError, ValidationError, toErrorMessage } from './errors.js';
import type { DatmatchError } from './errors.js';
import { isRomFile } from './extensions.js';
import { rate } from './identifier.js';
import { silentLogger } from './logging.js';
import type { Logger } from './logging.js';
import { listFiles } from './walk.js';
import type {
  CatalogEntry,
  ComponentOptions,
  IdentificationResult,
  RenameResult,
  RenamingReport,
  ReportSink,
} from './types.js';

/**
 * The part of an identifier renaming needs
 */
export interface FileIdentifier {
  identify(filePath: string): Promise<IdentificationResult>;
  identifyDirectory(dir: string, recursive?: boolean): Promise<IdentificationResult[]>;
}

/**
 * Canonical file name for a catalog entry
 *
 * Prefers the entry's own name, then its description with the extension of
 * the file being renamed.
 *
 * @returns `null` when the entry carries neither
 */
export function deriveName(entry: Pick<CatalogEntry, 'name' | 'description'>, originalPath: string): string | null {
  if (entry.name) {
    return entry.name;
  }
  if (entry.description) {
    return `${entry.description}${extname(originalPath)}`;
  }
  return null;
}

function failure(
  base: Pick<RenameResult, 'filePath' | 'identification' | 'dryRun'>,
  error: DatmatchError,
  target: Pick<RenameResult, 'newName' | 'newPath'> = {}
): RenameResult {
  return { ...base, ...target, status: 'error', errorKind: error.kind, message: error.message, renamed: false };
}

async function pathExists(path: string): Promise<boolean> {
  return access(path).then(
    () => true,
    () => false
  );
}

/**
 * RomRenamer - rename files to the names their catalog entries declare
 *
 * An existing file is never overwritten. Destinations are reserved while a
 * rename is in flight, so two concurrent renames to the same name cannot both
 * succeed.
 *
 * @example
 * ```typescript
 * const renamer = new RomRenamer(identifier, { logger });
 * await renamer.backup('roms');
 * const results = await renamer.renameDirectory('roms', true, false);
 * ```
 */
export class RomRenamer {
  private readonly logger: Logger;
  private readonly reserved = new Set<string>();

  constructor(
    private readonly identifier: FileIdentifier,
    options: ComponentOptions = {}
  ) {
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Identify a file and rename it to its canonical name
   *
   * @param dryRun - Report what would happen without touching the filesystem
   */
  async rename(filePath: string, dryRun = false): Promise<RenameResult> {
    const identification = await this.identifier.identify(filePath);
    return this.renameIdentified(identification, dryRun);
  }

  /**
   * Rename every ROM file in a directory
   */
  async renameDirectory(dir: string, recursive = true, dryRun = false): Promise<RenameResult[]> {
    const identifications = await this.identifier.identifyDirectory(dir, recursive);

    const results: RenameResult[] = [];
    for (const identification of identifications) {
      results.push(await this.renameIdentified(identification, dryRun));
    }
    return results;
  }

  /**
   * Summarize renaming results, optionally handing the report to a sink
   */
  async generateReport(results: RenameResult[], sink?: ReportSink): Promise<RenamingReport> {
    const identified = results.filter((r) => r.identification.identified).length;

    const report: RenamingReport = {
      total: results.length,
      identified,
      identificationRate: rate(identified, results.length),
      renamed: results.filter((r) => r.renamed).length,
      alreadyCorrect: results.filter((r) => r.nameMatches === true).length,
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

  /**
   * Copy every ROM file below `dir` into a mirrored tree
   *
   * Files copied before a failure stay in place.
   *
   * @param backupDir - Defaults to `<dir>_backup`
   */
  async backup(dir: string, backupDir = `${dir}_backup`): Promise<boolean> {
    try {
      await mkdir(backupDir, { recursive: true });

      for (const source of await listFiles(dir, true, isRomFile, this.logger)) {
        const destination = join(backupDir, relative(dir, source));
        await mkdir(dirname(destination), { recursive: true });
        await cp(source, destination, { preserveTimestamps: true });
      }

      this.logger.info('backup', 'Backed up ROMs', { path: dir, destination: backupDir });
      return true;
    } catch (error) {
      this.logger.error('backup', 'Error backing up ROMs', error, { path: dir, destination: backupDir });
      return false;
    }
  }

  private async renameIdentified(identification: IdentificationResult, dryRun: boolean): Promise<RenameResult> {
    const { filePath } = identification;
    const base = { filePath, identification, dryRun };

    if (identification.status === 'error') {
      return {
        ...base,
        status: 'error',
        errorKind: identification.errorKind,
        message: identification.message ?? `Could not identify ROM: ${filePath}`,
        renamed: false,
      };
    }

    if (!identification.identified || !identification.matchedEntry) {
      return failure(base, new NotFoundError(`Could not identify ROM: ${filePath}`, filePath));
    }

    const newName = deriveName(identification.matchedEntry, filePath);
    if (!newName) {
      return failure(base, new ValidationError(`Could not generate new name for ROM: ${filePath}`, filePath));
    }

    // renames stay inside the file's own directory
    if (basename(newName) !== newName || newName === '.' || newName === '..') {
      return failure(base, new ValidationError(`Catalog name is not a plain file name: ${newName}`, filePath), {
        newName,
      });
    }

    if (basename(filePath) === newName) {
      return {
        ...base,
        status: 'success',
        message: `ROM already has correct name: ${filePath}`,
        renamed: false,
        newName,
        nameMatches: true,
      };
    }

    const newPath = join(dirname(filePath), newName);

    if (dryRun) {
      this.logger.info('rename', 'Would rename', { path: filePath, destination: newPath });
      return {
        ...base,
        status: 'success',
        message: `Would rename ${filePath} to ${newPath}`,
        renamed: true,
        newName,
        newPath,
      };
    }

    const collision = (): RenameResult =>
      failure(base, new CollisionError(`Destination file already exists: ${newPath}`, newPath), { newName, newPath });

    if (this.reserved.has(newPath)) {
      return collision();
    }

    this.reserved.add(newPath);
    try {
      if (await pathExists(newPath)) {
        return collision();
      }
      await rename(filePath, newPath);
    } catch (error) {
      this.logger.error('rename', 'Error renaming file', error, { path: filePath, destination: newPath });
      const cause = new IOError(`Failed to rename ${filePath}: ${toErrorMessage(error)}`, filePath, error);
      return failure(base, cause, { newName, newPath });
    } finally {
      this.reserved.delete(newPath);
    }

    this.logger.info('rename', 'Renamed', { path: filePath, destination: newPath });
    return {
      ...base,
      status: 'success',
      message: `Renamed ${filePath} to ${newPath}`,
      renamed: true,
      newName,
      newPath,
    };
  }
}
