/**
 * Network capability contract the coordination core drives.
 * Discovery wire format and transport security live behind this interface.
 */

import type { Fingerprint, PeerEntry, PeerRecord, ShareConfig } from '../types.js';

export interface ShareCapability {
  /**
   * Start announcing this device, listening for peers and accepting
   * inbound transfers
   */
  start(): Promise<void>;

  /**
   * Current live peer set
   */
  listPeers(): Promise<Map<Fingerprint, PeerEntry>>;

  /**
   * Push one file to one peer. Resolves once the peer confirmed receipt.
   */
  sendFile(peer: PeerRecord, filePath: string): Promise<void>;

  stop(): Promise<void>;
}

export type CapabilityFactory = (config: ShareConfig) => ShareCapability | Promise<ShareCapability>;
