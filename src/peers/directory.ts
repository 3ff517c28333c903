/**
 * Peer Directory
 *
 * Fingerprint -> (address, descriptor). The discovery sync loop is the only
 * writer; everyone else reads copies through snapshot().
 */

import type { Fingerprint, PeerEntry, PeerRecord, PeerSnapshot } from '../types.js';

/**
 * Outcome of one reconciliation pass
 */
export interface ReconcileResult {
  discovered: PeerRecord[];
  lost: Fingerprint[];
  refreshed: number;
}

function copyEntry(entry: PeerEntry): PeerEntry {
  return {
    address: { ...entry.address },
    descriptor: { ...entry.descriptor },
  };
}

export class PeerDirectory {
  private peers: Map<Fingerprint, PeerEntry> = new Map();

  /**
   * Replace the directory contents with the live set.
   *
   * Runs to completion without yielding, so readers on the event loop never
   * observe a half-applied cycle. Discovered peers are inserted before lost
   * peers are removed.
   */
  reconcile(live: ReadonlyMap<Fingerprint, PeerEntry>): ReconcileResult {
    const discovered: PeerRecord[] = [];
    let refreshed = 0;

    for (const [fingerprint, entry] of live) {
      if (!this.peers.has(fingerprint)) {
        discovered.push({ fingerprint, ...copyEntry(entry) });
      } else {
        refreshed++;
      }
      this.peers.set(fingerprint, copyEntry(entry));
    }

    const lost: Fingerprint[] = [];
    for (const fingerprint of this.peers.keys()) {
      if (!live.has(fingerprint)) {
        lost.push(fingerprint);
      }
    }
    for (const fingerprint of lost) {
      this.peers.delete(fingerprint);
    }

    return { discovered, lost, refreshed };
  }

  /**
   * Point-in-time copy of every entry
   */
  snapshot(): PeerSnapshot {
    const copy: PeerSnapshot = new Map();
    for (const [fingerprint, entry] of this.peers) {
      copy.set(fingerprint, copyEntry(entry));
    }
    return copy;
  }

  get(fingerprint: Fingerprint): PeerRecord | undefined {
    const entry = this.peers.get(fingerprint);
    if (!entry) return undefined;
    return { fingerprint, ...copyEntry(entry) };
  }

  has(fingerprint: Fingerprint): boolean {
    return this.peers.has(fingerprint);
  }

  get size(): number {
    return this.peers.size;
  }
}
