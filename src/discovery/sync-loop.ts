/**
 * Discovery Sync Loop
 *
 * Periodically reconciles the capability's live peer set against the peer
 * directory and reports the difference as PEER_DISCOVERED / PEER_LOST.
 */

import { setTimeout as sleep } from 'timers/promises';
import type { ShareCapability } from '../capability/types.js';
import type { PeerDirectory, ReconcileResult } from '../peers/directory.js';
import type { EventSink, Fingerprint, PeerEntry } from '../types.js';
import { describeError } from '../errors.js';

export class DiscoverySyncLoop {
  private capability: ShareCapability;
  private directory: PeerDirectory;
  private emit: EventSink;
  private intervalMs: number;

  constructor(
    capability: ShareCapability,
    directory: PeerDirectory,
    emit: EventSink,
    intervalMs: number,
  ) {
    this.capability = capability;
    this.directory = directory;
    this.emit = emit;
    this.intervalMs = intervalMs;
  }

  /**
   * Run cycles until the signal aborts. Each cycle waits one interval first.
   */
  async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        await sleep(this.intervalMs, undefined, { signal });
      } catch (err) {
        if (signal.aborted) return;
        throw err;
      }

      await this.runCycle();
    }
  }

  /**
   * One reconciliation pass. A failed peer query leaves the directory as it
   * was and is reported as an ERROR event.
   */
  async runCycle(): Promise<ReconcileResult | null> {
    let live: Map<Fingerprint, PeerEntry>;
    try {
      live = await this.capability.listPeers();
    } catch (err) {
      this.emit({ type: 'ERROR', message: `Peer query failed: ${describeError(err)}` });
      return null;
    }

    const result = this.directory.reconcile(live);

    for (const peer of result.discovered) {
      this.emit({
        type: 'PEER_DISCOVERED',
        fingerprint: peer.fingerprint,
        descriptor: peer.descriptor,
        address: peer.address,
      });
    }
    for (const fingerprint of result.lost) {
      this.emit({ type: 'PEER_LOST', fingerprint });
    }

    return result;
  }
}
