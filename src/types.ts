/**
 * Core types for lanshare
 * Peer records, channel messages and configuration
 */

import type { CapabilityFactory } from './capability/types.js';

// ============================================
// Identity Types
// ============================================

/** 32-byte Ed25519 public key in hex */
export type PublicKeyHex = string;

/** Stable peer identity: hex SHA-256 of the device public key */
export type Fingerprint = string;

// ============================================
// Peer Types
// ============================================

export const DEVICE_TYPES = ['mobile', 'desktop', 'web', 'headless', 'server'] as const;

export type DeviceType = typeof DEVICE_TYPES[number];

export type TransferProtocol = 'http' | 'https' | 'swarm';

/**
 * Network endpoint a peer was last reached at
 */
export interface PeerAddress {
  host: string;
  port: number;
}

/**
 * Device metadata a peer announces about itself
 */
export interface DeviceDescriptor {
  /** Human readable device name */
  alias: string;
  /** Announce format version */
  version: string;
  deviceModel?: string;
  deviceType: DeviceType;
  fingerprint: Fingerprint;
  /** Port the peer accepts transfers on */
  port: number;
  protocol: TransferProtocol;
  /** Whether the peer serves downloads in addition to receiving pushes */
  download: boolean;
}

/**
 * Value stored under a fingerprint in the peer directory
 */
export interface PeerEntry {
  address: PeerAddress;
  descriptor: DeviceDescriptor;
}

export interface PeerRecord extends PeerEntry {
  fingerprint: Fingerprint;
}

/** Fingerprint -> last known address and descriptor */
export type PeerSnapshot = Map<Fingerprint, PeerEntry>;

// ============================================
// Channel Messages
// ============================================

/**
 * Operator intents, foreground -> worker
 */
export type ShareCommand =
  | { type: 'SEND_FILE'; peerFingerprint: Fingerprint; filePath: string }
  | { type: 'SHUTDOWN' };

export type PeerDiscoveredEvent = {
  type: 'PEER_DISCOVERED';
  fingerprint: Fingerprint;
  descriptor: DeviceDescriptor;
  address: PeerAddress;
};

export type PeerLostEvent = { type: 'PEER_LOST'; fingerprint: Fingerprint };

export type TransferStartedEvent = {
  type: 'TRANSFER_STARTED';
  peerFingerprint: Fingerprint;
  filePath: string;
};

export type TransferCompleteEvent = { type: 'TRANSFER_COMPLETE'; peerFingerprint: Fingerprint };

export type TransferFailedEvent = {
  type: 'TRANSFER_FAILED';
  peerFingerprint: Fingerprint;
  error: string;
};

export type ErrorEvent = { type: 'ERROR'; message: string };

/**
 * State notifications, worker -> foreground
 */
export type ShareEvent =
  | PeerDiscoveredEvent
  | PeerLostEvent
  | TransferStartedEvent
  | TransferCompleteEvent
  | TransferFailedEvent
  | ErrorEvent;

/** Sink the worker's producers push events into */
export type EventSink = (event: ShareEvent) => void;

// ============================================
// Worker State
// ============================================

export type WorkerState = 'initializing' | 'running' | 'draining' | 'stopped';

// ============================================
// Configuration
// ============================================

export interface ShareConfig {
  /** Reconciliation period of the discovery sync loop */
  syncIntervalMs: number;
  /** Directory holding the device identity */
  configDir: string;
  /** Directory incoming files are written to */
  downloadDir: string;
  /** Device name announced to peers. Derived from the fingerprint when unset. */
  alias?: string;
  deviceModel?: string;
  deviceType: DeviceType;
  /** Discovery topic name shared by every device that should see each other */
  topic: string;
  /** Accept files pushed by other devices */
  acceptIncoming: boolean;
  /** Upper bound on a single outbound push */
  transferTimeoutMs: number;
  /** Log informational connection messages */
  verbose: boolean;
}

export interface ShareManagerOptions extends Partial<ShareConfig> {
  /** Builds the network capability. Defaults to the Hyperswarm capability. */
  capabilityFactory?: CapabilityFactory;
}

export const DEFAULT_SHARE_CONFIG: Omit<ShareConfig, 'configDir' | 'downloadDir'> = {
  syncIntervalMs: 2 * 1000, // 2 seconds
  deviceType: 'desktop',
  topic: 'lanshare',
  acceptIncoming: true,
  transferTimeoutMs: 5 * 60 * 1000, // 5 minutes
  verbose: false,
};
