/**
 * Error classes
 *
 * Every error raised at the library boundary extends ShareError so callers
 * can branch on `code` instead of message text.
 */

export type ShareErrorCode =
  | 'INIT_FAILED'
  | 'CHANNEL_CLOSED'
  | 'INVALID_CONFIG'
  | 'UNKNOWN_PEER'
  | 'PEER_UNREACHABLE'
  | 'TRANSFER_REJECTED'
  | 'TRANSFER_TIMEOUT'
  | 'CONNECTION_CLOSED'
  | 'PROTOCOL_ERROR';

export type TransferErrorCode = Exclude<ShareErrorCode, 'INIT_FAILED' | 'CHANNEL_CLOSED' | 'INVALID_CONFIG'>;

export class ShareError extends Error {
  override readonly name: string = 'ShareError';

  constructor(
    message: string,
    public readonly code: ShareErrorCode,
    public readonly recoverable: boolean,
    public override readonly cause?: Error,
  ) {
    super(message);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }

    if (cause?.stack) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }

  override toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

/**
 * The background worker could not be created
 */
export class ShareInitError extends ShareError {
  override readonly name = 'ShareInitError';

  constructor(message: string, cause?: Error) {
    super(message, 'INIT_FAILED', false, cause);
  }
}

/**
 * A command was submitted after the worker exited
 */
export class ChannelClosedError extends ShareError {
  override readonly name = 'ChannelClosedError';

  constructor(message = 'Command channel is closed') {
    super(message, 'CHANNEL_CLOSED', false);
  }
}

export class ConfigError extends ShareError {
  override readonly name = 'ConfigError';

  constructor(message: string) {
    super(message, 'INVALID_CONFIG', false);
  }
}

/**
 * A single push to a peer failed. Never fatal to the worker.
 */
export class TransferError extends ShareError {
  override readonly name = 'TransferError';

  constructor(
    message: string,
    code: TransferErrorCode,
    cause?: Error,
  ) {
    super(message, code, true, cause);
  }
}

/**
 * Human readable cause for an unknown thrown value
 */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  if (typeof err === 'string' && err.length > 0) return err;
  return 'Unknown error';
}

/**
 * Normalize an unknown thrown value to an Error
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(describeError(err));
}
