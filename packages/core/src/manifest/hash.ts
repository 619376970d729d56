/**
 * Streaming content hashes
 */

import * as crypto from 'crypto';
import * as fs from 'fs';

import { HASH_CHUNK_BYTES } from './types.js';

export interface FileDigest {
  hash: string;
  size: number;
}

/**
 * Hash a file in bounded chunks, returning the digest and the byte count read
 */
export async function digestFile(filePath: string): Promise<FileDigest> {
  const hash = crypto.createHash('sha256');
  let size = 0;

  const stream = fs.createReadStream(filePath, { highWaterMark: HASH_CHUNK_BYTES });
  for await (const chunk of stream) {
    if (Buffer.isBuffer(chunk)) {
      hash.update(chunk);
      size += chunk.length;
    }
  }

  return { hash: hash.digest('hex'), size };
}

export async function hashFile(filePath: string): Promise<string> {
  return (await digestFile(filePath)).hash;
}

export function hashContent(content: string | Buffer): string {
  return crypto.createHash('sha256').update(content).digest('hex');
}
