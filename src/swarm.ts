/**
 * lanshare/swarm - Hyperswarm capability
 *
 * Separate entry point: pulls in hyperswarm and its native dependencies.
 */

export { SwarmCapability, discoveryTopic } from './transport/swarm.js';
export { PeerSession, type SessionOptions, type ReceivedFile } from './transport/session.js';
export {
  FrameDecoder,
  serializeMessage,
  parseMessage,
  CHUNK_SIZE,
  PROTOCOL_VERSION,
  type WireMessage,
  type WireMessageType,
} from './transport/wire.js';
export { hashFile, hashBytes, StreamingHasher, type FileDigest } from './transport/hasher.js';
