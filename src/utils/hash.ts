/**
 * SHA-256 checksum utilities
 *
 * Document identity is the checksum of the raw bytes.
 * All hashes use the format: 'sha256:' + 64-character lowercase hex string.
 *
 * @module utils/hash
 */

import crypto from 'crypto';
import fs from 'fs';
import path from 'path';
import type { Readable } from 'stream';

/**
 * Hash prefix used for all SHA-256 hashes in this system
 */
const HASH_PREFIX = 'sha256:';

/**
 * Matches 'sha256:' followed by exactly 64 lowercase hex characters
 */
const HASH_PATTERN = /^sha256:[a-f0-9]{64}$/;

/**
 * Read size used when streaming files into the hash
 */
export const HASH_CHUNK_SIZE = 64 * 1024;

/**
 * Compute SHA-256 hash of content
 *
 * @param content - String or Buffer to hash
 * @returns Hash in format 'sha256:' + 64-char lowercase hex string
 * @example
 * computeHash('hello')
 * // Returns: 'sha256:2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824'
 */
export function computeHash(content: string | Buffer): string {
  const hash = crypto.createHash('sha256').update(content).digest('hex');

  return HASH_PREFIX + hash;
}

/**
 * Hash any readable byte stream chunk by chunk.
 *
 * @returns hash and the number of bytes consumed
 */
export function hashStream(stream: Readable): Promise<{ hash: string; bytes: number }> {
  return new Promise((resolve, reject) => {
    const hash = crypto.createHash('sha256');
    let bytes = 0;

    stream.on('data', (chunk: string | Buffer) => {
      const buffer = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
      bytes += buffer.length;
      hash.update(buffer);
    });

    stream.on('end', () => {
      resolve({ hash: HASH_PREFIX + hash.digest('hex'), bytes });
    });

    stream.on('error', (error) => {
      stream.destroy();
      reject(error);
    });
  });
}

/**
 * Compute SHA-256 hash of a file in bounded chunks
 *
 * @param filePath - Absolute path to file
 * @returns Promise resolving to hash in format 'sha256:' + 64-char hex string
 * @throws Error if file doesn't exist, path is not absolute, or can't be read
 */
export async function hashFile(filePath: string): Promise<string> {
  if (!path.isAbsolute(filePath)) {
    throw new Error(`Path must be absolute: ${filePath}`);
  }

  try {
    await fs.promises.access(filePath, fs.constants.R_OK);
  } catch (error) {
    const fsError = error as NodeJS.ErrnoException;
    if (fsError.code === 'ENOENT') {
      throw new Error(`File not found: ${filePath}`);
    }
    if (fsError.code === 'EACCES') {
      throw new Error(`Permission denied: ${filePath}`);
    }
    throw new Error(`Cannot access file: ${filePath} - ${fsError.message}`);
  }

  const stats = await fs.promises.stat(filePath);
  if (!stats.isFile()) {
    throw new Error(`Path is not a file: ${filePath}`);
  }

  try {
    const { hash } = await hashStream(
      fs.createReadStream(filePath, { highWaterMark: HASH_CHUNK_SIZE })
    );
    return hash;
  } catch (error) {
    const fsError = error as NodeJS.ErrnoException;
    if (fsError.code === 'EACCES') {
      throw new Error(`Permission denied: ${filePath}`);
    }
    throw new Error(`Error reading file: ${filePath} - ${fsError.message}`);
  }
}

/**
 * Validate hash format is correct
 *
 * @example
 * isValidHashFormat('sha256:ABC123') // Wrong length, uppercase
 * // Returns: false
 */
export function isValidHashFormat(hash: string): boolean {
  if (typeof hash !== 'string') {
    return false;
  }
  return HASH_PATTERN.test(hash);
}
