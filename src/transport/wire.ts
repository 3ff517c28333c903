/**
 * Wire codec for peer connections
 *
 * Newline-delimited JSON frames. File chunks travel base64-encoded.
 */

import { TransferError } from '../errors.js';
import { DEVICE_TYPES, type DeviceDescriptor, type DeviceType, type TransferProtocol } from '../types.js';

/** Bytes of file data per DATA frame */
export const CHUNK_SIZE = 64 * 1024;

/** Longest frame accepted before a newline must appear */
export const MAX_FRAME_BYTES = 1024 * 1024;

export const PROTOCOL_VERSION = '1.0';

export type WireMessage =
  | { type: 'HELLO'; descriptor: DeviceDescriptor }
  | { type: 'OFFER'; transferId: string; fileName: string; size: number; sha256: string }
  | { type: 'ACCEPT'; transferId: string }
  | { type: 'REJECT'; transferId: string; reason: string }
  | { type: 'DATA'; transferId: string; chunk: Buffer }
  | { type: 'COMPLETE'; transferId: string }
  | { type: 'RESULT'; transferId: string; ok: boolean; error?: string };

export type WireMessageType = WireMessage['type'];

function protocolError(message: string): TransferError {
  return new TransferError(message, 'PROTOCOL_ERROR');
}

/**
 * Serialize a message as one frame, newline included
 */
export function serializeMessage(msg: WireMessage): Buffer {
  const body = msg.type === 'DATA'
    ? { ...msg, chunk: msg.chunk.toString('base64') }
    : msg;
  return Buffer.from(JSON.stringify(body) + '\n');
}

type Fields = { [key: string]: unknown };

function isFields(value: unknown): value is Fields {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function str(fields: Fields, key: string): string {
  const value = fields[key];
  if (typeof value !== 'string') throw protocolError(`Field "${key}" must be a string`);
  return value;
}

function num(fields: Fields, key: string): number {
  const value = fields[key];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw protocolError(`Field "${key}" must be a number`);
  }
  return value;
}

function bool(fields: Fields, key: string): boolean {
  const value = fields[key];
  if (typeof value !== 'boolean') throw protocolError(`Field "${key}" must be a boolean`);
  return value;
}

function deviceType(value: string): DeviceType {
  const match = DEVICE_TYPES.find((type) => type === value);
  return match ?? 'desktop';
}

function transferProtocol(value: string): TransferProtocol {
  if (value === 'http' || value === 'https' || value === 'swarm') return value;
  throw protocolError(`Unsupported protocol "${value}"`);
}

function parseDescriptor(value: unknown): DeviceDescriptor {
  if (!isFields(value)) throw protocolError('Field "descriptor" must be an object');

  const descriptor: DeviceDescriptor = {
    alias: str(value, 'alias'),
    version: str(value, 'version'),
    deviceType: deviceType(str(value, 'deviceType')),
    fingerprint: str(value, 'fingerprint'),
    port: num(value, 'port'),
    protocol: transferProtocol(str(value, 'protocol')),
    download: bool(value, 'download'),
  };
  if (typeof value.deviceModel === 'string') {
    descriptor.deviceModel = value.deviceModel;
  }
  return descriptor;
}

/**
 * Validate a decoded JSON value as a wire message
 */
export function parseMessage(raw: unknown): WireMessage {
  if (!isFields(raw)) throw protocolError('Frame is not an object');

  switch (raw.type) {
    case 'HELLO':
      return { type: 'HELLO', descriptor: parseDescriptor(raw.descriptor) };
    case 'OFFER':
      return {
        type: 'OFFER',
        transferId: str(raw, 'transferId'),
        fileName: str(raw, 'fileName'),
        size: num(raw, 'size'),
        sha256: str(raw, 'sha256'),
      };
    case 'ACCEPT':
      return { type: 'ACCEPT', transferId: str(raw, 'transferId') };
    case 'REJECT':
      return { type: 'REJECT', transferId: str(raw, 'transferId'), reason: str(raw, 'reason') };
    case 'DATA':
      return {
        type: 'DATA',
        transferId: str(raw, 'transferId'),
        chunk: Buffer.from(str(raw, 'chunk'), 'base64'),
      };
    case 'COMPLETE':
      return { type: 'COMPLETE', transferId: str(raw, 'transferId') };
    case 'RESULT': {
      const result: Extract<WireMessage, { type: 'RESULT' }> = {
        type: 'RESULT',
        transferId: str(raw, 'transferId'),
        ok: bool(raw, 'ok'),
      };
      if (typeof raw.error === 'string') result.error = raw.error;
      return result;
    }
    default:
      throw protocolError(`Unknown message type "${String(raw.type)}"`);
  }
}

/**
 * Splits an incoming byte stream into messages
 */
export class FrameDecoder {
  private buffer: Buffer = Buffer.alloc(0);

  /**
   * Feed received bytes; returns every complete frame.
   * Throws a PROTOCOL_ERROR TransferError on malformed or oversized frames.
   */
  push(data: Buffer): WireMessage[] {
    this.buffer = Buffer.concat([this.buffer, data]);
    const messages: WireMessage[] = [];

    while (true) {
      const newlineIdx = this.buffer.indexOf('\n');
      if (newlineIdx === -1) break;

      const frame = this.buffer.subarray(0, newlineIdx);
      this.buffer = this.buffer.subarray(newlineIdx + 1);
      if (frame.length === 0) continue;

      let raw: unknown;
      try {
        raw = JSON.parse(frame.toString('utf-8'));
      } catch {
        throw protocolError('Frame is not valid JSON');
      }
      messages.push(parseMessage(raw));
    }

    if (this.buffer.length > MAX_FRAME_BYTES) {
      this.buffer = Buffer.alloc(0);
      throw protocolError(`Frame exceeds ${MAX_FRAME_BYTES} bytes`);
    }

    return messages;
  }
}
