/**
 * lanshare - peer discovery and file transfer coordination
 *
 * ShareManager runs discovery and transfers on a background worker and hands
 * results to a foreground caller through pollEvents().
 */

// Core types
export * from './types.js';

// Facade
export { ShareManager, defaultCapabilityFactory } from './share-manager.js';

// Errors
export {
  ShareError,
  ShareInitError,
  ChannelClosedError,
  ConfigError,
  TransferError,
  describeError,
  type ShareErrorCode,
  type TransferErrorCode,
} from './errors.js';

// Configuration
export { resolveShareConfig } from './config.js';

// Building blocks
export { AsyncQueue } from './channel/queue.js';
export { PeerDirectory, type ReconcileResult } from './peers/directory.js';
export { DiscoverySyncLoop } from './discovery/sync-loop.js';
export { TransferDispatcher } from './transfer/dispatcher.js';
export { ShareWorker, type ShareWorkerOptions } from './worker/share-worker.js';

// Capability
export type { ShareCapability, CapabilityFactory } from './capability/types.js';

// Identity
export {
  IdentityManager,
  generateIdentity,
  restoreIdentity,
  computeFingerprint,
  getDefaultAlias,
  FileIdentityStorage,
  MemoryIdentityStorage,
  type Identity,
  type IdentityStorage,
} from './identity/index.js';
