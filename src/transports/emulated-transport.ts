/**
 * EmulatedTransport: in-process stand-in for a real device
 *
 * Satisfies the Transport contract without touching the network so a
 * device can run with `emulate: true` and tests can script replies.
 * Provides:
 *   - a request log ring buffer with timestamps
 *   - a pluggable responder (default: every request succeeds)
 *   - switchable open failures
 */

import { Reply } from '../core/types';
import { TransportError } from '../core/errors';
import { getLogger } from '../logger';
import { Transport } from './transport';

const log = getLogger('Emulator');

export interface EmulatorLogEntry<TRequest> {
  timestamp: number;
  request: TRequest;
  reply: Reply | null;
}

export type EmulatedResponder<TRequest> = (request: TRequest) => Reply | Promise<Reply>;

export interface EmulatedTransportOptions<TRequest> {
  name?: string;
  responder?: EmulatedResponder<TRequest>;
  /** When set, open() rejects with this message */
  openError?: string;
  maxLogSize?: number;
}

export class EmulatedTransport<TRequest> implements Transport<TRequest> {
  readonly kind = 'emulated' as const;

  private readonly name: string;
  private readonly maxLogSize: number;
  private _log: EmulatorLogEntry<TRequest>[] = [];
  private _open = false;
  openCalls = 0;
  closeCalls = 0;
  responder: EmulatedResponder<TRequest>;
  openError: string | undefined;

  constructor(options: EmulatedTransportOptions<TRequest> = {}) {
    this.name = options.name ?? 'emulator';
    this.responder = options.responder ?? (() => ({ ok: true }));
    this.openError = options.openError;
    this.maxLogSize = options.maxLogSize ?? 200;
  }

  get isOpen(): boolean {
    return this._open;
  }

  async open(): Promise<void> {
    this.openCalls++;
    if (this.openError !== undefined) {
      throw new TransportError(this.openError);
    }
    this._open = true;
    log.debug({ emulator: this.name }, 'Connected (virtual)');
  }

  async send(request: TRequest): Promise<Reply> {
    if (!this._open) {
      throw new TransportError(`${this.name}: not open`);
    }
    const entry: EmulatorLogEntry<TRequest> = { timestamp: Date.now(), request, reply: null };
    this.append(entry);

    const reply = await this.responder(request);
    entry.reply = reply;
    log.debug({ emulator: this.name, ok: reply.ok }, 'Request handled');
    return reply;
  }

  async close(): Promise<void> {
    this.closeCalls++;
    this._open = false;
  }

  /** Requests seen so far, oldest first */
  get requests(): TRequest[] {
    return this._log.map((entry) => entry.request);
  }

  getLog(): EmulatorLogEntry<TRequest>[] {
    return [...this._log];
  }

  private append(entry: EmulatorLogEntry<TRequest>): void {
    this._log.push(entry);
    if (this._log.length > this.maxLogSize) {
      this._log.shift();
    }
  }
}
