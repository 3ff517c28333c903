/**
 * Tests for the transfer dispatcher
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { TransferDispatcher } from '../transfer/dispatcher.js';
import { PeerDirectory } from '../peers/directory.js';
import { TransferError } from '../errors.js';
import type { ShareEvent } from '../types.js';
import { MemoryCapability, liveSet } from './helpers/memory-capability.js';

describe('TransferDispatcher', () => {
  let capability: MemoryCapability;
  let directory: PeerDirectory;
  let events: ShareEvent[];
  let dispatcher: TransferDispatcher;

  beforeEach(() => {
    capability = new MemoryCapability();
    directory = new PeerDirectory();
    directory.reconcile(liveSet('A'));
    events = [];
    dispatcher = new TransferDispatcher(capability, directory, (e) => events.push(e));
  });

  it('should report start then completion for a successful push', async () => {
    const ok = await dispatcher.dispatch('A', '/photos/cat.png');

    expect(ok).toBe(true);
    expect(events).toEqual([
      { type: 'TRANSFER_STARTED', peerFingerprint: 'A', filePath: '/photos/cat.png' },
      { type: 'TRANSFER_COMPLETE', peerFingerprint: 'A' },
    ]);
  });

  it('should pass the directory record to the capability', async () => {
    let receivedHost = '';
    capability.transfer = async (peer) => {
      receivedHost = peer.address.host;
    };

    await dispatcher.dispatch('A', '/photos/cat.png');

    expect(capability.sent).toEqual([{ fingerprint: 'A', filePath: '/photos/cat.png' }]);
    expect(receivedHost).toBe('192.168.1.10');
  });

  it('should fail an unknown peer after reporting the start', async () => {
    const ok = await dispatcher.dispatch('X', '/img.png');

    expect(ok).toBe(false);
    expect(events).toEqual([
      { type: 'TRANSFER_STARTED', peerFingerprint: 'X', filePath: '/img.png' },
      { type: 'TRANSFER_FAILED', peerFingerprint: 'X', error: 'Unknown peer: X' },
    ]);
    expect(capability.sent).toEqual([]);
    expect(Array.from(directory.snapshot().keys())).toEqual(['A']);
  });

  it('should report the capability error message on failure', async () => {
    capability.transfer = async () => {
      throw new TransferError('Peer rejected the transfer: busy', 'TRANSFER_REJECTED');
    };

    await dispatcher.dispatch('A', '/img.png');

    expect(events[1]).toEqual({
      type: 'TRANSFER_FAILED',
      peerFingerprint: 'A',
      error: 'Peer rejected the transfer: busy',
    });
  });

  it('should describe non-Error rejections', async () => {
    capability.transfer = () => Promise.reject('disk unplugged');

    await dispatcher.dispatch('A', '/img.png');

    expect(events[1]).toEqual({ type: 'TRANSFER_FAILED', peerFingerprint: 'A', error: 'disk unplugged' });
  });

  it('should not retry a failed push', async () => {
    capability.transfer = async () => {
      throw new Error('unreachable');
    };

    await dispatcher.dispatch('A', '/img.png');

    expect(capability.sent).toHaveLength(1);
  });
});
