/**
 * Swarm Capability - peer discovery and file push over Hyperswarm
 *
 * Every device joins the same discovery topic as client and server. Each
 * connection carries a PeerSession; a peer counts as live from its HELLO
 * until its connection closes. Connections are Noise-encrypted with keys
 * each device generates for itself, so any remote key is admitted.
 */

import Hyperswarm from 'hyperswarm';
import { EventEmitter } from 'events';
import { createHash } from 'crypto';
import { bytesToHex } from '@noble/hashes/utils.js';
import { IdentityManager, computeFingerprint, getDefaultAlias } from '../identity/index.js';
import { TransferError } from '../errors.js';
import type { ShareCapability } from '../capability/types.js';
import type {
  DeviceDescriptor,
  Fingerprint,
  PeerAddress,
  PeerEntry,
  PeerRecord,
  ShareConfig,
} from '../types.js';
import { PeerSession, type ReceivedFile } from './session.js';
import { PROTOCOL_VERSION } from './wire.js';

/**
 * 32-byte discovery topic for a topic name
 */
export function discoveryTopic(name: string): Buffer {
  return createHash('sha256').update(`lanshare:${name}`).digest();
}

/**
 * Remote endpoint of a swarm connection, when the transport exposes it
 */
function remoteAddress(socket: Hyperswarm.SwarmConnection): PeerAddress {
  return {
    host: socket.rawStream?.remoteHost ?? 'unknown',
    port: socket.rawStream?.remotePort ?? 0,
  };
}

interface LivePeer {
  session: PeerSession;
  address: PeerAddress;
  descriptor: DeviceDescriptor;
}

export class SwarmCapability extends EventEmitter implements ShareCapability {
  private config: ShareConfig;
  private identity: IdentityManager;
  private swarm: Hyperswarm | null = null;
  private live: Map<Fingerprint, LivePeer> = new Map();

  constructor(config: ShareConfig, identity: IdentityManager) {
    super();
    this.config = config;
    this.identity = identity;
  }

  /**
   * Load (or create) the device identity from config.configDir and build
   * the capability
   */
  static async create(config: ShareConfig): Promise<SwarmCapability> {
    const identity = new IdentityManager(config.configDir);
    await identity.initialize();
    return new SwarmCapability(config, identity);
  }

  /**
   * What this device announces in its HELLO
   */
  get descriptor(): DeviceDescriptor {
    const fingerprint = this.identity.getFingerprint();
    const descriptor: DeviceDescriptor = {
      alias: this.config.alias ?? getDefaultAlias(fingerprint),
      version: PROTOCOL_VERSION,
      deviceType: this.config.deviceType,
      fingerprint,
      port: 0,
      protocol: 'swarm',
      download: false,
    };
    if (this.config.deviceModel) {
      descriptor.deviceModel = this.config.deviceModel;
    }
    return descriptor;
  }

  async start(): Promise<void> {
    if (this.swarm) return;

    const swarm = new Hyperswarm({
      seed: this.identity.getSeed(),
      firewall: () => false,
    });

    swarm.on('connection', (socket, info) => {
      this.handleConnection(socket, info);
    });

    this.swarm = swarm;

    const discovery = swarm.join(discoveryTopic(this.config.topic), { client: true, server: true });
    void discovery.flushed().then(
      () => {
        if (this.config.verbose) {
          console.log(`Announced on discovery topic "${this.config.topic}"`);
        }
      },
      (err: Error) => {
        console.error('Failed to announce on discovery topic:', err.message);
      },
    );
  }

  async listPeers(): Promise<Map<Fingerprint, PeerEntry>> {
    const peers = new Map<Fingerprint, PeerEntry>();
    for (const [fingerprint, peer] of this.live) {
      peers.set(fingerprint, {
        address: { ...peer.address },
        descriptor: { ...peer.descriptor },
      });
    }
    return peers;
  }

  async sendFile(peer: PeerRecord, filePath: string): Promise<void> {
    const live = this.live.get(peer.fingerprint);
    if (!live || live.session.closed) {
      throw new TransferError(
        `Peer ${peer.descriptor.alias} (${peer.address.host}:${peer.address.port}) is not connected`,
        'PEER_UNREACHABLE'
      );
    }
    await live.session.sendFile(filePath);
  }

  async stop(): Promise<void> {
    for (const peer of this.live.values()) {
      peer.session.close();
    }
    this.live.clear();

    if (this.swarm) {
      const swarm = this.swarm;
      this.swarm = null;
      await swarm.destroy();
    }
  }

  /**
   * Wrap a new connection in a session. The Noise-authenticated key decides
   * the fingerprint; the one inside HELLO is only informational.
   */
  private handleConnection(socket: Hyperswarm.SwarmConnection, info: Hyperswarm.PeerInfo): void {
    const fingerprint = computeFingerprint(bytesToHex(info.publicKey));
    const address = remoteAddress(socket);

    const session = new PeerSession(socket, this.descriptor, {
      downloadDir: this.config.downloadDir,
      acceptIncoming: this.config.acceptIncoming,
      transferTimeoutMs: this.config.transferTimeoutMs,
      verbose: this.config.verbose,
    });

    session.on('hello', (announced: DeviceDescriptor) => {
      if (announced.fingerprint !== fingerprint) {
        console.warn(
          `Peer ${announced.alias} announced fingerprint ${announced.fingerprint.slice(0, 16)}..., using its key fingerprint`
        );
      }

      const previous = this.live.get(fingerprint);
      this.live.set(fingerprint, {
        session,
        address,
        descriptor: { ...announced, fingerprint },
      });
      if (previous && previous.session !== session) {
        previous.session.close();
      }

      if (this.config.verbose) {
        console.log(`Peer connected: ${announced.alias} (${fingerprint.slice(0, 16)})`);
      }
    });

    session.on('file', (file: ReceivedFile) => {
      if (this.config.verbose) {
        console.log(`Received ${file.fileName} (${file.size} bytes) from ${file.from?.alias ?? 'unknown peer'}`);
      }
      this.emit('file', file);
    });

    session.on('close', () => {
      if (this.live.get(fingerprint)?.session === session) {
        this.live.delete(fingerprint);
      }
    });

    session.start();
  }
}
