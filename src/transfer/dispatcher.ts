/**
 * Transfer Dispatcher - one SEND_FILE command, one capability push
 */

import type { ShareCapability } from '../capability/types.js';
import type { PeerDirectory } from '../peers/directory.js';
import type { EventSink, Fingerprint } from '../types.js';
import { TransferError, describeError } from '../errors.js';

export class TransferDispatcher {
  private capability: ShareCapability;
  private directory: PeerDirectory;
  private emit: EventSink;

  constructor(capability: ShareCapability, directory: PeerDirectory, emit: EventSink) {
    this.capability = capability;
    this.directory = directory;
    this.emit = emit;
  }

  /**
   * Push a file and report TRANSFER_STARTED followed by exactly one of
   * TRANSFER_COMPLETE / TRANSFER_FAILED. Never throws.
   */
  async dispatch(peerFingerprint: Fingerprint, filePath: string): Promise<boolean> {
    this.emit({ type: 'TRANSFER_STARTED', peerFingerprint, filePath });

    try {
      const peer = this.directory.get(peerFingerprint);
      if (!peer) {
        throw new TransferError(`Unknown peer: ${peerFingerprint}`, 'UNKNOWN_PEER');
      }

      await this.capability.sendFile(peer, filePath);
    } catch (err) {
      this.emit({ type: 'TRANSFER_FAILED', peerFingerprint, error: describeError(err) });
      return false;
    }

    this.emit({ type: 'TRANSFER_COMPLETE', peerFingerprint });
    return true;
  }
}
