import { extname } from 'node:path';

/**
 * File extensions treated as ROMs (compared case-insensitively)
 */
export const ROM_EXTENSIONS: ReadonlySet<string> = new Set([
  '.nes', '.smc', '.sfc', '.gb', '.gbc', '.gba', '.n64', '.z64',
  '.v64', '.nds', '.iso', '.cue', '.bin', '.smd', '.md', '.32x',
  '.gg', '.sms', '.zip', '.7z', '.rom', '.ccd', '.chd',
]);

/**
 * File extensions treated as DAT catalog sources
 */
export const DAT_EXTENSIONS: ReadonlySet<string> = new Set(['.dat', '.xml']);

export function isRomFile(filePath: string): boolean {
  return ROM_EXTENSIONS.has(extname(filePath).toLowerCase());
}

export function isDatFile(filePath: string): boolean {
  return DAT_EXTENSIONS.has(extname(filePath).toLowerCase());
}
