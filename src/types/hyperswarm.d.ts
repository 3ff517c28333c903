// Type declarations for hyperswarm
declare module 'hyperswarm' {
  import { EventEmitter } from 'events';
  import { Duplex } from 'stream';

  namespace Hyperswarm {
    interface SwarmOptions {
      seed?: Buffer;
      /** Return true to reject the remote peer */
      firewall?: (remotePublicKey: Buffer) => boolean;
    }

    interface PeerInfo {
      publicKey: Buffer;
    }

    /** Noise-encrypted connection handed out by the swarm */
    interface SwarmConnection extends Duplex {
      rawStream?: {
        remoteHost?: string;
        remotePort?: number;
      };
    }

    interface PeerDiscovery {
      flushed(): Promise<void>;
    }
  }

  class Hyperswarm extends EventEmitter {
    constructor(options?: Hyperswarm.SwarmOptions);

    join(topic: Buffer, options?: { server?: boolean; client?: boolean }): Hyperswarm.PeerDiscovery;
    destroy(): Promise<void>;

    on(event: 'connection', listener: (socket: Hyperswarm.SwarmConnection, info: Hyperswarm.PeerInfo) => void): this;
    on(event: string, listener: (...args: unknown[]) => void): this;
  }

  export = Hyperswarm;
}
