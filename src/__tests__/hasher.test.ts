/**
 * Tests for the transfer hasher
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { StreamingHasher, hashBytes, hashFile } from '../transport/hasher.js';

const ABC_SHA256 = 'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad';
const EMPTY_SHA256 = 'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855';

describe('hasher', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'hasher-test-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('should hash bytes', () => {
    expect(hashBytes(Buffer.from('abc'))).toBe(ABC_SHA256);
    expect(hashBytes(new Uint8Array(0))).toBe(EMPTY_SHA256);
  });

  it('should hash a file the same as its bytes', async () => {
    const data = Buffer.alloc(200 * 1024, 7);
    const filePath = join(tempDir, 'blob.bin');
    await writeFile(filePath, data);

    expect(await hashFile(filePath)).toBe(hashBytes(data));
  });

  it('should hash an empty file', async () => {
    const filePath = join(tempDir, 'empty.txt');
    await writeFile(filePath, '');

    expect(await hashFile(filePath)).toBe(EMPTY_SHA256);
  });

  it('should reject a missing file', async () => {
    await expect(hashFile(join(tempDir, 'missing.txt'))).rejects.toThrow('ENOENT');
  });

  it('should hash chunk by chunk and count bytes', () => {
    const hasher = new StreamingHasher();
    hasher.update(Buffer.from('a'));
    hasher.update(Buffer.from('bc'));

    expect(hasher.getBytesProcessed()).toBe(3);
    expect(hasher.finalize()).toBe(ABC_SHA256);
  });
});
