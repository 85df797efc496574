/**
 * No-Intro style file name helpers, e.g. `Title (Region) (v1.1) [!].ext`
 */

import { extname } from 'node:path';

export interface RomNameParts {
  title: string;
  /** First parenthesised group */
  region: string;
  /** Contents of the first `(vX)` group, without the leading `v` */
  version: string;
  /** Every square-bracketed group, in order */
  attributes: string[];
}

export function parseRomName(filename: string): RomNameParts {
  const extension = extname(filename);
  const baseName = extension ? filename.slice(0, -extension.length) : filename;

  const regionMatch = /\(([^)]+)\)/.exec(baseName);
  const versionMatch = /\(v([^)]+)\)/.exec(baseName);
  const attributes = Array.from(baseName.matchAll(/\[([^\]]+)\]/g), (match) => match[1]);

  let title = baseName;
  if (regionMatch) {
    title = title.replace(regionMatch[0], '');
  }
  if (versionMatch) {
    title = title.replace(versionMatch[0], '');
  }
  for (const attribute of attributes) {
    title = title.replace(`[${attribute}]`, '');
  }

  return {
    title: title.split(/\s+/).filter(Boolean).join(' '),
    region: regionMatch ? regionMatch[1] : '',
    version: versionMatch ? versionMatch[1] : '',
    attributes,
  };
}

export function createStandardizedName(parts: RomNameParts, extension: string): string {
  let name = parts.title;

  if (parts.region) {
    name += ` (${parts.region})`;
  }
  if (parts.version) {
    name += ` (v${parts.version})`;
  }
  for (const attribute of parts.attributes) {
    name += ` [${attribute}]`;
  }

  return name + extension;
}
