import { readdir, stat } from 'node:fs/promises';
import type { Dirent } from 'node:fs';
import { join } from 'node:path';
import { toErrorMessage } from './errors.js';
import { silentLogger } from './logging.js';
import type { Logger } from './logging.js';

/**
 * Symlinks count as files when they point at one. Linked directories are
 * not descended into.
 */
async function isListedFile(entry: Dirent, fullPath: string): Promise<boolean> {
  if (entry.isFile()) return true;
  if (!entry.isSymbolicLink()) return false;

  return stat(fullPath).then(
    (stats) => stats.isFile(),
    () => false
  );
}

/**
 * List the files below `dir`, sorted by name within each directory
 *
 * A subdirectory that cannot be read is logged and skipped; only a failure
 * to read `dir` itself rejects.
 *
 * @param recursive - Descend into subdirectories
 * @param accept - Keep only files whose path passes this check
 */
export async function listFiles(
  dir: string,
  recursive: boolean,
  accept: (path: string) => boolean = () => true,
  logger: Logger = silentLogger
): Promise<string[]> {
  const files: string[] = [];
  const subdirs: string[] = [];
  const entries = await readdir(dir, { withFileTypes: true });

  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    const fullPath = join(dir, entry.name);

    if (entry.isDirectory()) {
      subdirs.push(fullPath);
      continue;
    }

    if (accept(fullPath) && (await isListedFile(entry, fullPath))) {
      files.push(fullPath);
    }
  }

  if (recursive) {
    for (const subdir of subdirs) {
      try {
        files.push(...(await listFiles(subdir, true, accept, logger)));
      } catch (error) {
        logger.warn('walk', 'Skipping unreadable directory', {
          path: subdir,
          error: toErrorMessage(error),
        });
      }
    }
  }

  return files;
}
