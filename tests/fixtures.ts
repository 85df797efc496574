/**
 * Helpers shared by the test suites: temporary directories and DAT documents
 */

import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { calculateHash } from '../src/hash.js';
import type { Fingerprint } from '../src/types.js';

export interface RomFixture {
  name: string;
  size?: string;
  crc?: string;
  md5?: string;
  sha1?: string;
}

export interface GameFixture {
  name: string;
  description?: string;
  roms: RomFixture[];
}

export async function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'datmatch-test-'));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export async function writeFixture(path: string, data: string | Uint8Array): Promise<string> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, data);
  return path;
}

function escapeAttribute(value: string): string {
  return value.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/"/g, '&quot;');
}

export function buildDat(games: GameFixture[], headerName?: string): string {
  const lines = ['<?xml version="1.0"?>', '<datafile>'];

  if (headerName !== undefined) {
    lines.push('  <header>', `    <name>${escapeAttribute(headerName)}</name>`, '  </header>');
  }

  for (const game of games) {
    lines.push(`  <game name="${escapeAttribute(game.name)}">`);
    if (game.description !== undefined) {
      lines.push(`    <description>${escapeAttribute(game.description)}</description>`);
    }
    for (const rom of game.roms) {
      const attributes = (['name', 'size', 'crc', 'md5', 'sha1'] as const)
        .filter((key) => rom[key] !== undefined)
        .map((key) => `${key}="${escapeAttribute(rom[key] ?? '')}"`)
        .join(' ');
      lines.push(`    <rom ${attributes}/>`);
    }
    lines.push('  </game>');
  }

  lines.push('</datafile>', '');
  return lines.join('\n');
}

/**
 * Rom record carrying the real hashes of `data`
 */
export async function romFor(name: string, data: string | Uint8Array): Promise<RomFixture> {
  const bytes = typeof data === 'string' ? new TextEncoder().encode(data) : data;
  const hashes = await calculateHash(bytes);
  return {
    name,
    size: String(bytes.byteLength),
    crc: hashes.crc32,
    md5: hashes.md5,
    sha1: hashes.sha1,
  };
}

export function fingerprint(values: Partial<Fingerprint>): Fingerprint {
  return { md5: '', sha1: '', crc32: '', size: 0, ...values };
}

/**
 * The two-game catalog used across the catalog tests
 */
export const TEST_DAT = buildDat(
  [
    {
      name: 'Game 1',
      description: 'Game 1',
      roms: [
        {
          name: 'game1.nes',
          size: '131072',
          crc: 'abcd1234',
          md5: '1a2b3c4d5e6f7g8h9i0j',
          sha1: '1a2b3c4d5e6f7g8h9i0j1k2l3m4n5o6p7q8r9s0t',
        },
      ],
    },
    {
      name: 'Game 2',
      description: 'Game 2',
      roms: [
        {
          name: 'game2.nes',
          size: '262144',
          crc: 'efgh5678',
          md5: '0j9i8h7g6f5e4d3c2b1a',
          sha1: '0t9s8r7q6p5o4n3m2l1k0j9i8h7g6f5e4d3c2b1a',
        },
      ],
    },
  ],
  'Test Database'
);
