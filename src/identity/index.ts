/**
 * Identity Module - Ed25519 device keypair management
 *
 * The private key doubles as the Hyperswarm key seed, so a device keeps the
 * same fingerprint across restarts.
 */

import * as ed from '@noble/ed25519';
import { sha256, sha512 } from '@noble/hashes/sha2.js';
import { bytesToHex, hexToBytes } from '@noble/hashes/utils.js';
import { wordlist } from '@scure/bip39/wordlists/english.js';
import { writeFile, readFile, mkdir } from 'fs/promises';
import { join } from 'path';
import type { PublicKeyHex, Fingerprint } from '../types.js';

// Configure ed25519 to use sha512
ed.etc.sha512Sync = (...m) => sha512(ed.etc.concatBytes(...m));

/**
 * Device identity keypair
 */
export interface Identity {
  /** Private key (32 bytes hex) - keep secret! */
  privateKey: string;
  /** Public key (32 bytes hex) */
  publicKey: PublicKeyHex;
  /** Hex SHA-256 of the public key */
  fingerprint: Fingerprint;
}

/**
 * Generate a new Ed25519 keypair
 */
export function generateIdentity(): Identity {
  return restoreIdentity(bytesToHex(ed.utils.randomPrivateKey()));
}

/**
 * Restore identity from private key
 */
export function restoreIdentity(privateKeyHex: string): Identity {
  const publicKeyHex = bytesToHex(ed.getPublicKey(hexToBytes(privateKeyHex)));

  return {
    privateKey: privateKeyHex,
    publicKey: publicKeyHex,
    fingerprint: computeFingerprint(publicKeyHex),
  };
}

/**
 * Compute fingerprint from public key
 */
export function computeFingerprint(publicKeyHex: PublicKeyHex): Fingerprint {
  return bytesToHex(sha256(hexToBytes(publicKeyHex)));
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}

/**
 * Two-word device name picked from the BIP-39 list by the leading
 * fingerprint bytes, e.g. "Amber Falcon"
 */
export function getDefaultAlias(fingerprint: Fingerprint): string {
  const bytes = hexToBytes(fingerprint.slice(0, 8).padEnd(8, '0'));
  const first = ((bytes[0] << 8) | bytes[1]) % wordlist.length;
  const second = ((bytes[2] << 8) | bytes[3]) % wordlist.length;
  return `${capitalize(wordlist[first])} ${capitalize(wordlist[second])}`;
}

function isIdentity(value: unknown): value is Identity {
  return (
    typeof value === 'object' &&
    value !== null &&
    'privateKey' in value &&
    typeof value.privateKey === 'string' &&
    /^[0-9a-f]{64}$/i.test(value.privateKey) &&
    'publicKey' in value &&
    typeof value.publicKey === 'string' &&
    'fingerprint' in value &&
    typeof value.fingerprint === 'string'
  );
}

/**
 * Identity storage interface
 */
export interface IdentityStorage {
  save(identity: Identity): Promise<void>;
  load(): Promise<Identity | null>;
}

/**
 * In-memory identity storage (for testing)
 */
export class MemoryIdentityStorage implements IdentityStorage {
  private identity: Identity | null = null;

  async save(identity: Identity): Promise<void> {
    this.identity = identity;
  }

  async load(): Promise<Identity | null> {
    return this.identity;
  }
}

/**
 * File-based identity storage
 */
export class FileIdentityStorage implements IdentityStorage {
  private dirPath: string;
  private filePath: string;

  constructor(dirPath: string) {
    this.dirPath = dirPath;
    this.filePath = join(dirPath, 'identity.json');
  }

  async save(identity: Identity): Promise<void> {
    await mkdir(this.dirPath, { recursive: true, mode: 0o700 });
    await writeFile(this.filePath, JSON.stringify(identity), { mode: 0o600 });
  }

  /**
   * Missing or unreadable files load as null; a fresh identity replaces them.
   * The stored public key and fingerprint are recomputed from the private key.
   */
  async load(): Promise<Identity | null> {
    let data: string;
    try {
      data = await readFile(this.filePath, 'utf-8');
    } catch {
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(data);
    } catch {
      return null;
    }

    return isIdentity(parsed) ? restoreIdentity(parsed.privateKey) : null;
  }
}

/**
 * Identity manager - handles creation and persistence
 */
export class IdentityManager {
  private identity: Identity | null = null;
  private storage: IdentityStorage;

  constructor(storageOrPath: IdentityStorage | string) {
    if (typeof storageOrPath === 'string') {
      this.storage = new FileIdentityStorage(storageOrPath);
    } else {
      this.storage = storageOrPath;
    }
  }

  /**
   * Initialize identity - loads existing or creates new
   */
  async initialize(): Promise<Identity> {
    const existing = await this.storage.load();
    if (existing) {
      this.identity = existing;
      return existing;
    }

    const newIdentity = generateIdentity();
    await this.storage.save(newIdentity);
    this.identity = newIdentity;
    return newIdentity;
  }

  /**
   * Get current identity (must be initialized first)
   */
  getIdentity(): Identity {
    if (!this.identity) {
      throw new Error('Identity not initialized. Call initialize() first.');
    }
    return this.identity;
  }

  getPublicKey(): PublicKeyHex {
    return this.getIdentity().publicKey;
  }

  getFingerprint(): Fingerprint {
    return this.getIdentity().fingerprint;
  }

  /**
   * 32-byte seed for the swarm key pair
   */
  getSeed(): Buffer {
    return Buffer.from(hexToBytes(this.getIdentity().privateKey));
  }
}

export type { PublicKeyHex, Fingerprint };
