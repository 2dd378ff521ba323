/**
 * Error taxonomy for device connections.
 *
 * Transport and timeout errors end the current connection. Protocol
 * violations mean sent commands and registered handlers disagree, and
 * are reported as loudly as possible.
 */

export type ErrorCode = 'TRANSPORT' | 'TIMEOUT' | 'PROTOCOL_VIOLATION' | 'QUEUE_OVERFLOW';

export class TakeControlError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Connection refused, send failure, malformed reply, or a failed reply. */
export class TransportError extends TakeControlError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('TRANSPORT', message, options);
  }
}

/** No confirmed activity within the disconnect window. */
export class TimeoutError extends TakeControlError {
  readonly elapsedMs: number;

  constructor(elapsedMs: number) {
    super('TIMEOUT', `Connection timeout: no activity for ${elapsedMs}ms`);
    this.elapsedMs = elapsedMs;
  }
}

/** A reply referenced a command name with no registered handler. */
export class ProtocolViolationError extends TakeControlError {
  readonly commandName: string;

  constructor(device: string, commandName: string) {
    super('PROTOCOL_VIOLATION', `${device}: no handler registered for "${commandName}" replies`);
    this.commandName = commandName;
  }
}

export class QueueOverflowError extends TakeControlError {
  readonly capacity: number;

  constructor(capacity: number) {
    super('QUEUE_OVERFLOW', `Command queue full (capacity ${capacity})`);
    this.capacity = capacity;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
