/**
 * SHA-256 hashing for transfer verification
 */

import { createReadStream } from 'fs';
import { sha256 } from '@noble/hashes/sha2.js';
import { bytesToHex } from '@noble/hashes/utils.js';

/** Hex SHA-256 digest */
export type FileDigest = string;

/**
 * Hash a file by streaming it
 */
export async function hashFile(filePath: string): Promise<FileDigest> {
  return new Promise((resolve, reject) => {
    const hasher = new StreamingHasher();
    const stream = createReadStream(filePath);

    stream.on('data', (chunk: Buffer | string) => {
      hasher.update(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
    });

    stream.on('end', () => {
      resolve(hasher.finalize());
    });

    stream.on('error', reject);
  });
}

/**
 * Hash bytes (for small data)
 */
export function hashBytes(data: Uint8Array): FileDigest {
  return bytesToHex(sha256(data));
}

/**
 * Chunk-by-chunk hasher for data arriving over the wire
 */
export class StreamingHasher {
  private hash = sha256.create();
  private bytesProcessed = 0;

  update(chunk: Uint8Array): void {
    this.hash.update(chunk);
    this.bytesProcessed += chunk.length;
  }

  getBytesProcessed(): number {
    return this.bytesProcessed;
  }

  /**
   * Finalize and get the digest. The hasher cannot be updated afterwards.
   */
  finalize(): FileDigest {
    return bytesToHex(this.hash.digest());
  }
}
