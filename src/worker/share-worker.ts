/**
 * Share Worker - background actor behind ShareManager
 *
 * initializing -> running -> draining -> stopped
 *
 * Owns the network capability for its whole life. The discovery sync loop
 * and the command loop run as concurrent tasks; commands are handled one at
 * a time in submission order.
 */

import type { AsyncQueue } from '../channel/queue.js';
import { DiscoverySyncLoop } from '../discovery/sync-loop.js';
import { TransferDispatcher } from '../transfer/dispatcher.js';
import { describeError } from '../errors.js';
import type { CapabilityFactory, ShareCapability } from '../capability/types.js';
import type { PeerDirectory } from '../peers/directory.js';
import type { EventSink, ShareCommand, ShareConfig, WorkerState } from '../types.js';

export interface ShareWorkerOptions {
  config: ShareConfig;
  capabilityFactory: CapabilityFactory;
  commands: AsyncQueue<ShareCommand>;
  directory: PeerDirectory;
  emit: EventSink;
}

export class ShareWorker {
  private config: ShareConfig;
  private capabilityFactory: CapabilityFactory;
  private commands: AsyncQueue<ShareCommand>;
  private directory: PeerDirectory;
  private emit: EventSink;
  private currentState: WorkerState = 'initializing';
  private stopped: Promise<void> | null = null;

  constructor(opts: ShareWorkerOptions) {
    this.config = opts.config;
    this.capabilityFactory = opts.capabilityFactory;
    this.commands = opts.commands;
    this.directory = opts.directory;
    this.emit = opts.emit;
  }

  get state(): WorkerState {
    return this.currentState;
  }

  /**
   * Launch the worker. Safe to call more than once; only the first call
   * starts anything.
   */
  start(): Promise<void> {
    if (!this.stopped) {
      this.stopped = this.run();
    }
    return this.stopped;
  }

  /**
   * Resolves once the worker reached the stopped state
   */
  whenStopped(): Promise<void> {
    return this.start();
  }

  private async run(): Promise<void> {
    const capability = await this.initialize();
    if (!capability) {
      this.commands.close();
      this.currentState = 'stopped';
      return;
    }

    this.currentState = 'running';

    const abort = new AbortController();
    const syncLoop = new DiscoverySyncLoop(
      capability,
      this.directory,
      this.emit,
      this.config.syncIntervalMs,
    );
    const syncTask = syncLoop.run(abort.signal).catch((err: unknown) => {
      this.emit({ type: 'ERROR', message: `Discovery stopped: ${describeError(err)}` });
    });

    await this.processCommands(capability);

    this.currentState = 'draining';
    this.commands.close();
    abort.abort();
    await syncTask;

    await this.stopCapability(capability);

    this.currentState = 'stopped';
  }

  /**
   * Build and start the capability. Failures become an ERROR event.
   */
  private async initialize(): Promise<ShareCapability | null> {
    let capability: ShareCapability;
    try {
      capability = await this.capabilityFactory(this.config);
    } catch (err) {
      this.emit({ type: 'ERROR', message: `Failed to create network capability: ${describeError(err)}` });
      return null;
    }

    try {
      await capability.start();
    } catch (err) {
      this.emit({ type: 'ERROR', message: `Failed to start network capability: ${describeError(err)}` });
      // start() may have opened resources before it failed
      await this.stopCapability(capability);
      return null;
    }

    return capability;
  }

  private async stopCapability(capability: ShareCapability): Promise<void> {
    try {
      await capability.stop();
    } catch (err) {
      this.emit({ type: 'ERROR', message: `Failed to stop network capability: ${describeError(err)}` });
    }
  }

  /**
   * Command loop. Returns on SHUTDOWN or when the channel closes.
   */
  private async processCommands(capability: ShareCapability): Promise<void> {
    const dispatcher = new TransferDispatcher(capability, this.directory, this.emit);

    for (;;) {
      const command = await this.commands.recv();
      if (!command || command.type === 'SHUTDOWN') return;

      await dispatcher.dispatch(command.peerFingerprint, command.filePath);
    }
  }
}
