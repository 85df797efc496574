/**
 * Hash utilities for ROM files
 */

import { createHash } from 'node:crypto';
import { readFile } from 'node:fs/promises';
import CRC32 from 'crc-32';
import { IOError, toErrorMessage } from './errors.js';
import { silentLogger } from './logging.js';
import type { Logger } from './logging.js';
import type { Fingerprint, HashType } from './types.js';

/**
 * Result of hashing a buffer
 */
export interface HashResult {
  md5?: string;
  sha1?: string;
  crc32?: string;
}

/**
 * Fingerprint of a file that could not be read. Never matches any catalog.
 */
export const EMPTY_FINGERPRINT: Fingerprint = Object.freeze({
  md5: '',
  sha1: '',
  crc32: '',
  size: 0,
});

function toUint8Array(data: Uint8Array | ArrayBuffer | Buffer): Uint8Array {
  if (data instanceof ArrayBuffer) {
    return new Uint8Array(data);
  }
  if (data instanceof Uint8Array || Buffer.isBuffer(data)) {
    return data;
  }
  throw new Error('Data must be Uint8Array, ArrayBuffer, or Buffer');
}

function digest(algorithm: 'md5' | 'sha1', data: Uint8Array): string {
  return createHash(algorithm).update(data).digest('hex');
}

/**
 * Calculate CRC32 hash as an unsigned, zero-padded hex string
 */
function crc32Hash(data: Uint8Array): string {
  const crc = CRC32.buf(data);
  return (crc >>> 0).toString(16).padStart(8, '0');
}

/**
 * Calculate hash(es) for ROM data
 *
 * @param data - ROM data as Uint8Array, ArrayBuffer, or Buffer
 * @param types - Hash types to calculate (defaults to all)
 * @returns Object containing requested hash values
 *
 * @example
 * ```typescript
 * const buffer = await readFile('Super Mario Bros. (World).nes');
 * const hashes = await calculateHash(buffer, ['md5', 'crc32']);
 * console.log(hashes); // { md5: '...', crc32: '...' }
 * ```
 */
export async function calculateHash(
  data: Uint8Array | ArrayBuffer | Buffer,
  types: HashType[] = ['md5', 'sha1', 'crc32']
): Promise<HashResult> {
  const uint8Data = toUint8Array(data);
  const result: HashResult = {};

  for (const type of types) {
    switch (type) {
      case 'md5':
        result.md5 = digest('md5', uint8Data);
        break;

      case 'sha1':
        result.sha1 = digest('sha1', uint8Data);
        break;

      case 'crc32':
        result.crc32 = crc32Hash(uint8Data);
        break;
    }
  }

  return result;
}

/**
 * Calculate a single hash type
 */
export async function calculateSingleHash(
  data: Uint8Array | ArrayBuffer | Buffer,
  type: HashType
): Promise<string> {
  const result = await calculateHash(data, [type]);
  return result[type] ?? '';
}

/**
 * Read a whole file and fingerprint its bytes
 *
 * @throws IOError when the file cannot be read
 */
export async function readFingerprint(path: string): Promise<Fingerprint> {
  let data: Buffer;
  try {
    data = await readFile(path);
  } catch (error) {
    throw new IOError(`Cannot read ${path}: ${toErrorMessage(error)}`, path, error);
  }

  const hashes = await calculateHash(data);

  return Object.freeze({
    md5: hashes.md5 ?? '',
    sha1: hashes.sha1 ?? '',
    crc32: hashes.crc32 ?? '',
    size: data.byteLength,
  });
}

/**
 * Fingerprint a file, returning {@link EMPTY_FINGERPRINT} when it is unreadable
 */
export async function fingerprintFile(path: string, logger: Logger = silentLogger): Promise<Fingerprint> {
  try {
    return await readFingerprint(path);
  } catch (error) {
    logger.error('hash', 'Error calculating checksums', error, { path });
    return EMPTY_FINGERPRINT;
  }
}

export function isEmptyFingerprint(fingerprint: Fingerprint): boolean {
  return fingerprint.md5 === '' && fingerprint.sha1 === '' && fingerprint.crc32 === '';
}
