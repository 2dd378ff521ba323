/**
 * Per-connection mutable state.
 *
 * A fresh instance is created on every connect(), so a worker that is
 * still winding down keeps writing to its own state and never to the
 * state of the connection that replaced it.
 */

import { CommandQueue } from './command-queue';
import { Clock, DeviceStatus, QueueOptions, RESPONSE_STATUS } from './types';

export class ConnectionState {
  readonly queue: CommandQueue;
  readonly openedAt: number;

  responseStatus: number = RESPONSE_STATUS.CONNECTED;
  private _status: DeviceStatus = 'ready';
  lastActivity: number;
  awaitingEcho = false;
  recording = false;
  recordStartedAt: number | null = null;
  /** Set once the controller has been told this connection ended */
  disconnectNotified = false;

  /** Called with (status, previous) whenever the status changes */
  onStatusChange?: (status: DeviceStatus, previous: DeviceStatus) => void;

  private readonly clock: Clock;

  constructor(clock: Clock, queueOptions?: Partial<QueueOptions>) {
    this.clock = clock;
    this.queue = new CommandQueue(queueOptions);
    this.openedAt = clock();
    this.lastActivity = this.openedAt;
  }

  get status(): DeviceStatus {
    return this._status;
  }

  setStatus(status: DeviceStatus): void {
    if (status === this._status) return;
    const previous = this._status;
    this._status = status;
    this.onStatusChange?.(status, previous);
  }

  get isConnected(): boolean {
    return this.responseStatus > 0;
  }

  /** Record confirmed inbound activity */
  touch(): void {
    this.lastActivity = this.clock();
  }

  idleFor(): number {
    return this.clock() - this.lastActivity;
  }
}
