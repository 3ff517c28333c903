/**
 * Peer Session - one connection to one peer device
 *
 * Both sides open with HELLO. A push is OFFER -> ACCEPT|REJECT -> DATA...
 * -> COMPLETE -> RESULT; the receiver verifies size and SHA-256 before it
 * answers RESULT ok.
 */

import { EventEmitter } from 'events';
import { createReadStream, createWriteStream, type WriteStream } from 'fs';
import { mkdir, stat, unlink } from 'fs/promises';
import { basename } from 'path';
import { randomBytes } from 'crypto';
import type { Duplex } from 'stream';
import { finished } from 'stream/promises';
import { AsyncQueue } from '../channel/queue.js';
import { TransferError, describeError, toError } from '../errors.js';
import type { DeviceDescriptor } from '../types.js';
import { CHUNK_SIZE, FrameDecoder, serializeMessage, type WireMessage } from './wire.js';
import { StreamingHasher, hashFile } from './hasher.js';
import { sanitizeFileName, uniqueFilePath } from './files.js';

export interface SessionOptions {
  downloadDir: string;
  acceptIncoming: boolean;
  transferTimeoutMs: number;
  verbose?: boolean;
}

/**
 * A file another device pushed to us
 */
export interface ReceivedFile {
  transferId: string;
  fileName: string;
  path: string;
  size: number;
  from: DeviceDescriptor | null;
}

/**
 * Receiving side of an accepted offer
 */
interface InboundTransfer {
  transferId: string;
  path: string;
  size: number;
  sha256: string;
  bytesReceived: number;
  hasher: StreamingHasher;
  stream: WriteStream;
  writeError: Error | null;
  /** Resumes the socket once the write stream drained */
  onDrain: (() => void) | null;
}

/**
 * Wait for a promise unless the signal aborts first
 */
function abortable<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(toError(signal.reason));
      return;
    }

    const onAbort = () => reject(toError(signal.reason));
    signal.addEventListener('abort', onAbort, { once: true });

    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(toError(err));
      },
    );
  });
}

export class PeerSession extends EventEmitter {
  private socket: Duplex;
  private localDescriptor: DeviceDescriptor;
  private options: SessionOptions;
  private decoder = new FrameDecoder();
  private remote: DeviceDescriptor | null = null;
  private outbound: Map<string, AsyncQueue<WireMessage>> = new Map();
  private inbound: Map<string, InboundTransfer> = new Map();
  private processing: Promise<void> = Promise.resolve();
  private isClosed = false;

  constructor(socket: Duplex, localDescriptor: DeviceDescriptor, options: SessionOptions) {
    super();
    this.socket = socket;
    this.localDescriptor = localDescriptor;
    this.options = options;

    socket.on('data', (data: Buffer) => this.handleData(data));

    socket.on('error', (err: Error) => {
      console.error('Peer connection error:', err.message);
    });

    socket.on('close', () => this.handleClose());
  }

  /**
   * Announce ourselves to the remote side
   */
  start(): void {
    this.send({ type: 'HELLO', descriptor: this.localDescriptor });
  }

  /**
   * Descriptor from the remote HELLO, null until it arrived
   */
  get remoteDescriptor(): DeviceDescriptor | null {
    return this.remote;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  close(): void {
    this.socket.destroy();
  }

  /**
   * Push one file and wait for the receiver's verdict
   */
  async sendFile(filePath: string): Promise<void> {
    if (this.isClosed) {
      throw new TransferError('Connection to peer is closed', 'CONNECTION_CLOSED');
    }

    const stats = await stat(filePath);
    if (!stats.isFile()) {
      throw new Error(`Not a regular file: ${filePath}`);
    }
    const sha256 = await hashFile(filePath);

    const transferId = randomBytes(8).toString('hex');
    const mailbox = new AsyncQueue<WireMessage>();
    this.outbound.set(transferId, mailbox);

    const controller = new AbortController();
    const timer = setTimeout(() => {
      controller.abort(
        new TransferError(`Transfer timed out after ${this.options.transferTimeoutMs}ms`, 'TRANSFER_TIMEOUT')
      );
    }, this.options.transferTimeoutMs);

    // Set once the peer sent a final REJECT or RESULT
    let answered = false;

    try {
      this.send({
        type: 'OFFER',
        transferId,
        fileName: basename(filePath),
        size: stats.size,
        sha256,
      });

      const answer = await this.nextReply(mailbox, controller.signal);
      if (answer.type === 'REJECT') {
        answered = true;
        throw new TransferError(`Peer rejected the transfer: ${answer.reason}`, 'TRANSFER_REJECTED');
      }
      if (answer.type !== 'ACCEPT') {
        throw new TransferError(`Unexpected ${answer.type} while waiting for ACCEPT`, 'PROTOCOL_ERROR');
      }

      await this.streamFile(transferId, filePath, controller.signal);
      this.send({ type: 'COMPLETE', transferId });

      const result = await this.nextReply(mailbox, controller.signal);
      answered = result.type === 'RESULT';
      if (result.type !== 'RESULT') {
        throw new TransferError(`Unexpected ${result.type} while waiting for RESULT`, 'PROTOCOL_ERROR');
      }
      if (!result.ok) {
        throw new TransferError(`Peer failed to store the file: ${result.error ?? 'unknown error'}`, 'TRANSFER_REJECTED');
      }
    } catch (err) {
      // The receiver may hold a partial file for this push; dropping the
      // connection makes it discard it
      if (!answered) this.close();
      throw err;
    } finally {
      clearTimeout(timer);
      this.outbound.delete(transferId);
      mailbox.close();
    }
  }

  private async nextReply(mailbox: AsyncQueue<WireMessage>, signal: AbortSignal): Promise<WireMessage> {
    const reply = await abortable(mailbox.recv(), signal);
    if (!reply) {
      throw new TransferError('Connection closed before the peer replied', 'CONNECTION_CLOSED');
    }
    return reply;
  }

  private async streamFile(transferId: string, filePath: string, signal: AbortSignal): Promise<void> {
    const stream = createReadStream(filePath, { highWaterMark: CHUNK_SIZE });
    try {
      for await (const chunk of stream) {
        if (signal.aborted) throw toError(signal.reason);
        if (this.isClosed) {
          throw new TransferError('Connection closed during transfer', 'CONNECTION_CLOSED');
        }

        const data = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
        if (!this.send({ type: 'DATA', transferId, chunk: data })) {
          await this.waitForDrain(signal);
        }
      }
    } finally {
      stream.destroy();
    }
  }

  /**
   * Resolves on drain, on close, or when the transfer is aborted
   */
  private waitForDrain(signal: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
      const done = () => {
        this.socket.off('drain', done);
        this.off('close', done);
        signal.removeEventListener('abort', done);
        resolve();
      };
      this.socket.on('drain', done);
      this.on('close', done);
      signal.addEventListener('abort', done, { once: true });
    });
  }

  private send(msg: WireMessage): boolean {
    if (this.isClosed) return false;
    return this.socket.write(serializeMessage(msg));
  }

  private handleData(data: Buffer): void {
    let messages: WireMessage[];
    try {
      messages = this.decoder.push(data);
    } catch (err) {
      console.error('Dropping peer connection:', describeError(err));
      this.socket.destroy();
      return;
    }

    for (const msg of messages) {
      this.processing = this.processing
        .then(() => this.handleMessage(msg))
        .catch((err: unknown) => {
          console.error(`Failed to handle ${msg.type}:`, describeError(err));
          this.socket.destroy();
        });
    }
  }

  private async handleMessage(msg: WireMessage): Promise<void> {
    switch (msg.type) {
      case 'HELLO':
        this.remote = msg.descriptor;
        this.emit('hello', msg.descriptor);
        break;
      case 'OFFER':
        await this.handleOffer(msg);
        break;
      case 'DATA':
        this.handleChunk(msg.transferId, msg.chunk);
        break;
      case 'COMPLETE':
        await this.handleComplete(msg.transferId);
        break;
      case 'ACCEPT':
      case 'REJECT':
      case 'RESULT':
        this.routeReply(msg);
        break;
    }
  }

  /**
   * Pass a reply to the outbound transfer waiting for it
   */
  private routeReply(msg: Extract<WireMessage, { transferId: string }>): void {
    const mailbox = this.outbound.get(msg.transferId);
    if (!mailbox) {
      if (this.options.verbose) {
        console.log(`Ignoring ${msg.type} for unknown transfer ${msg.transferId}`);
      }
      return;
    }
    mailbox.send(msg);
  }

  private async handleOffer(msg: Extract<WireMessage, { type: 'OFFER' }>): Promise<void> {
    const { transferId } = msg;

    if (!this.options.acceptIncoming) {
      this.send({ type: 'REJECT', transferId, reason: 'Receiver is not accepting files' });
      return;
    }
    if (this.inbound.has(transferId)) {
      this.send({ type: 'REJECT', transferId, reason: 'Duplicate transfer id' });
      return;
    }
    if (!Number.isInteger(msg.size) || msg.size < 0) {
      this.send({ type: 'REJECT', transferId, reason: `Invalid size ${msg.size}` });
      return;
    }

    let path: string;
    try {
      await mkdir(this.options.downloadDir, { recursive: true });
      path = await uniqueFilePath(this.options.downloadDir, sanitizeFileName(msg.fileName));
    } catch (err) {
      this.send({ type: 'REJECT', transferId, reason: `Cannot store file: ${describeError(err)}` });
      return;
    }
    if (this.isClosed) return;

    const state: InboundTransfer = {
      transferId,
      path,
      size: msg.size,
      sha256: msg.sha256.toLowerCase(),
      bytesReceived: 0,
      hasher: new StreamingHasher(),
      stream: createWriteStream(path, { flags: 'wx' }),
      writeError: null,
      onDrain: null,
    };
    state.stream.on('error', (err) => {
      state.writeError = err;
    });

    this.inbound.set(transferId, state);
    this.send({ type: 'ACCEPT', transferId });
  }

  private handleChunk(transferId: string, chunk: Buffer): void {
    const state = this.inbound.get(transferId);
    if (!state) return;

    if (state.bytesReceived + chunk.length > state.size) {
      void this.failInbound(state, 'Received more data than offered');
      return;
    }

    if (!state.stream.write(chunk)) {
      this.pauseUntilDrained(state);
    }
    state.hasher.update(chunk);
    state.bytesReceived += chunk.length;
  }

  /**
   * Stop reading from the peer until the disk caught up
   */
  private pauseUntilDrained(state: InboundTransfer): void {
    if (state.onDrain) return;

    const onDrain = () => {
      state.onDrain = null;
      this.socket.resume();
    };
    state.onDrain = onDrain;
    this.socket.pause();
    state.stream.once('drain', onDrain);
  }

  /**
   * Resume reading for a transfer whose write stream will not drain again
   */
  private releaseBackpressure(state: InboundTransfer): void {
    if (!state.onDrain) return;

    state.stream.off('drain', state.onDrain);
    state.onDrain = null;
    if (!this.isClosed) this.socket.resume();
  }

  private async handleComplete(transferId: string): Promise<void> {
    const state = this.inbound.get(transferId);
    if (!state) return;

    this.releaseBackpressure(state);
    state.stream.end();
    try {
      await finished(state.stream);
    } catch (err) {
      await this.failInbound(state, `Write failed: ${describeError(err)}`);
      return;
    }

    if (state.writeError) {
      await this.failInbound(state, `Write failed: ${state.writeError.message}`);
      return;
    }
    if (state.bytesReceived !== state.size) {
      await this.failInbound(state, `Size mismatch: expected ${state.size} bytes, got ${state.bytesReceived}`);
      return;
    }
    if (state.hasher.finalize() !== state.sha256) {
      await this.failInbound(state, 'Hash verification failed');
      return;
    }

    this.inbound.delete(transferId);
    this.send({ type: 'RESULT', transferId, ok: true });

    const received: ReceivedFile = {
      transferId,
      fileName: basename(state.path),
      path: state.path,
      size: state.size,
      from: this.remote,
    };
    this.emit('file', received);
  }

  /**
   * Report failure to the sender and remove the partial file
   */
  private async failInbound(state: InboundTransfer, error: string): Promise<void> {
    if (!this.inbound.delete(state.transferId)) return;

    this.send({ type: 'RESULT', transferId: state.transferId, ok: false, error });
    await this.discardPartial(state);
  }

  private async discardPartial(state: InboundTransfer): Promise<void> {
    this.releaseBackpressure(state);

    const { stream } = state;
    const closed = new Promise<void>((resolve) => {
      if (stream.closed) resolve();
      else stream.once('close', () => resolve());
    });
    stream.destroy();
    // A stream destroyed while still opening creates the file before it closes
    await closed;

    try {
      await unlink(state.path);
    } catch (err) {
      if (this.options.verbose) {
        console.warn(`Could not remove partial file ${state.path}:`, describeError(err));
      }
    }
  }

  private handleClose(): void {
    if (this.isClosed) return;
    this.isClosed = true;

    for (const mailbox of this.outbound.values()) {
      mailbox.close();
    }

    const abandoned = Array.from(this.inbound.values());
    this.inbound.clear();
    for (const state of abandoned) {
      void this.discardPartial(state);
    }

    this.emit('close');
  }
}
