/**
 * ShareManager - the only object a UI touches.
 *
 * Every call is synchronous and returns immediately. Network work happens on
 * the share worker; outcomes come back through pollEvents().
 */

import { AsyncQueue } from './channel/queue.js';
import { PeerDirectory } from './peers/directory.js';
import { ShareWorker } from './worker/share-worker.js';
import { resolveShareConfig } from './config.js';
import { ChannelClosedError, ShareInitError, describeError, toError } from './errors.js';
import type { CapabilityFactory } from './capability/types.js';
import type {
  EventSink,
  Fingerprint,
  PeerSnapshot,
  ShareCommand,
  ShareConfig,
  ShareEvent,
  ShareManagerOptions,
  WorkerState,
} from './types.js';

/**
 * Loads the Hyperswarm capability on first use so that importing the
 * library does not pull in native networking modules.
 */
export const defaultCapabilityFactory: CapabilityFactory = async (config) => {
  const { SwarmCapability } = await import('./transport/swarm.js');
  return SwarmCapability.create(config);
};

/**
 * Event sink bound to the queue alone. Nothing the worker holds may reach
 * the ShareManager, or the teardown registry could never collect it.
 */
function forwardTo(events: AsyncQueue<ShareEvent>): EventSink {
  return (event) => {
    events.send(event);
  };
}

// Sends SHUTDOWN for managers dropped without an explicit shutdown()
const teardownRegistry = new FinalizationRegistry<AsyncQueue<ShareCommand>>((commands) => {
  commands.send({ type: 'SHUTDOWN' });
});

export class ShareManager {
  readonly config: ShareConfig;
  private commands = new AsyncQueue<ShareCommand>();
  private events = new AsyncQueue<ShareEvent>();
  private directory = new PeerDirectory();
  private worker: ShareWorker;
  private shutdownRequested = false;

  /**
   * Wire the channels and launch the worker. Does not wait for the network;
   * startup failures arrive later as an ERROR event.
   *
   * @throws ShareInitError if the worker cannot be created
   */
  constructor(options: ShareManagerOptions = {}) {
    const { capabilityFactory = defaultCapabilityFactory, ...configOptions } = options;

    try {
      this.config = resolveShareConfig(configOptions);
    } catch (err) {
      throw new ShareInitError(`Failed to create share worker: ${describeError(err)}`, toError(err));
    }

    this.worker = new ShareWorker({
      config: this.config,
      capabilityFactory,
      commands: this.commands,
      directory: this.directory,
      emit: forwardTo(this.events),
    });
    void this.worker.start();

    teardownRegistry.register(this, this.commands, this);
  }

  /**
   * Queue a file for sending. The outcome arrives as TRANSFER_* events.
   *
   * @throws ChannelClosedError if the worker has already exited
   */
  sendFile(peerFingerprint: Fingerprint, filePath: string): void {
    const accepted = this.commands.send({ type: 'SEND_FILE', peerFingerprint, filePath });
    if (!accepted) {
      throw new ChannelClosedError('Failed to send command: share worker has stopped');
    }
  }

  /**
   * Copy of the peer directory as of the last reconciliation cycle
   */
  getPeers(): PeerSnapshot {
    return this.directory.snapshot();
  }

  /**
   * Drain pending events without blocking. Safe to call every frame.
   */
  pollEvents(): ShareEvent[] {
    return this.events.drain();
  }

  /**
   * Ask the worker to stop. Idempotent.
   */
  shutdown(): void {
    if (this.shutdownRequested) return;
    this.shutdownRequested = true;

    teardownRegistry.unregister(this);
    this.commands.send({ type: 'SHUTDOWN' });
  }

  get state(): WorkerState {
    return this.worker.state;
  }

  /**
   * Resolves once the worker has stopped
   */
  whenStopped(): Promise<void> {
    return this.worker.whenStopped();
  }
}
