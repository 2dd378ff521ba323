/**
 * Dispatch Worker
 *
 * One worker per device connection. It owns the transport, drains the
 * command queue one command at a time and supervises liveness:
 *
 *   connecting  open the transport, send the handshake probe if any
 *   active      send queued commands, idle on the queue, ping or time out
 *   disconnected  close the transport and exit (terminal)
 *
 * A controller-initiated disconnect only flips responseStatus negative;
 * the worker sees it on its next iteration and winds down.
 */

import { Logger } from 'pino';
import { ConnectionState } from './connection-state';
import { ProtocolViolationError, TimeoutError, TransportError, errorMessage } from './errors';
import { ResponseRouter } from './response-router';
import {
  DisconnectEvent,
  DisconnectReason,
  QueuedCommand,
  RESPONSE_STATUS,
  Reply,
  TimingOptions,
  WorkerState,
} from './types';
import { Transport } from '../transports/transport';
import { getLogger } from '../logger';

export interface DispatchWorkerOptions<TRequest> {
  name: string;
  connection: ConnectionState;
  transport: Transport<TRequest>;
  router: ResponseRouter;
  timing: TimingOptions;
  encode: (command: QueuedCommand) => TRequest;
  probe?: TRequest;
  /** Heartbeat hook; expected to enqueue an echo unless one is pending */
  sendEchoRequest: () => void;
  onConnected: () => void;
  onDisconnected: (event: DisconnectEvent) => void;
}

export class DispatchWorker<TRequest> {
  readonly name: string;

  private readonly conn: ConnectionState;
  private readonly transport: Transport<TRequest>;
  private readonly router: ResponseRouter;
  private readonly timing: TimingOptions;
  private readonly encode: (command: QueuedCommand) => TRequest;
  private readonly probe?: TRequest;
  private readonly sendEchoRequest: () => void;
  private readonly onConnected: () => void;
  private readonly onDisconnected: (event: DisconnectEvent) => void;
  private readonly log: Logger;
  private _state: WorkerState = 'connecting';
  private closed = false;
  private _commandsSent = 0;

  constructor(options: DispatchWorkerOptions<TRequest>) {
    this.name = options.name;
    this.conn = options.connection;
    this.transport = options.transport;
    this.router = options.router;
    this.timing = options.timing;
    this.encode = options.encode;
    this.probe = options.probe;
    this.sendEchoRequest = options.sendEchoRequest;
    this.onConnected = options.onConnected;
    this.onDisconnected = options.onDisconnected;
    this.log = getLogger('Worker').child({ device: this.name });
  }

  get state(): WorkerState {
    return this._state;
  }

  get commandsSent(): number {
    return this._commandsSent;
  }

  /**
   * Full worker lifetime: connect, loop until disconnected, close.
   * Rejects only for protocol violations and unexpected errors, after
   * the connection has been marked closed and the transport released.
   */
  async run(): Promise<void> {
    try {
      if (await this.connect()) {
        while (await this.step()) {
          if (this.conn.queue.empty) {
            await this.conn.queue.waitForItem(this.timing.idleMs);
          }
        }
      }
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      this.fail(err instanceof ProtocolViolationError ? 'protocol' : 'error', error);
      throw error;
    } finally {
      await this.close();
    }
  }

  /**
   * Connecting phase. Resolves true once the worker is active.
   */
  async connect(): Promise<boolean> {
    if (this._state !== 'connecting') return this._state === 'active';

    try {
      await this.transport.open();
      if (this.probe !== undefined) {
        const reply = await this.transport.send(this.probe);
        if (!reply.ok) {
          throw new TransportError(`Handshake probe rejected: ${reply.comment ?? 'no reason given'}`);
        }
        this.log.debug({ data: reply.data }, 'Handshake probe ok');
      }
    } catch (err) {
      this.fail('handshake', err instanceof Error ? err : new Error(String(err)));
      return false;
    }

    if (!this.conn.isConnected) {
      // Disconnected by the controller while the handshake was in flight
      this._state = 'disconnected';
      return false;
    }

    this.conn.touch();
    this._state = 'active';
    this.log.info({ transport: this.transport.kind }, 'Connected');
    this.onConnected();
    return true;
  }

  /**
   * One iteration of the active loop, without the idle wait.
   * Resolves false once the worker should stop.
   */
  async step(): Promise<boolean> {
    if (this._state !== 'active') return false;
    if (!this.conn.isConnected) {
      this._state = 'disconnected';
      return false;
    }

    const command = this.conn.queue.dequeueNext();
    if (command) {
      if (!(await this.dispatch(command))) return false;
    }

    const elapsed = this.conn.idleFor();
    if (elapsed > this.timing.disconnectTimeoutMs) {
      this.fail('timeout', new TimeoutError(elapsed));
      return false;
    }
    if (elapsed > this.timing.pingIntervalMs) {
      this.sendEchoRequest();
    }
    return true;
  }

  private async dispatch(command: QueuedCommand): Promise<boolean> {
    let reply: Reply;
    try {
      reply = await this.transport.send(this.encode(command));
    } catch (err) {
      this.fail('transport', err instanceof Error ? err : new Error(String(err)));
      return false;
    }
    this._commandsSent++;

    if (!this.conn.isConnected) {
      this._state = 'disconnected';
      return false;
    }

    if (!reply.ok) {
      this.fail('transport', new TransportError(`${command.commandName} failed: ${reply.comment ?? 'no reason given'}`));
      return false;
    }

    this.log.debug({ command: command.commandName, data: reply.data }, 'Response');
    this.conn.responseStatus = RESPONSE_STATUS.OK;

    try {
      this.router.route(command.commandName, reply);
    } catch (err) {
      if (err instanceof ProtocolViolationError) {
        this.log.fatal({ command: err.commandName }, err.message);
        this.fail('protocol', err);
      }
      throw err;
    }
    return true;
  }

  /** Mark the connection failed and notify; idempotent. */
  private fail(reason: DisconnectReason, error: Error): void {
    if (this._state === 'disconnected') return;
    this._state = 'disconnected';

    if (this.conn.responseStatus < 0) {
      // Already disconnected by the controller; keep its status
      return;
    }

    this.conn.responseStatus = RESPONSE_STATUS.FAILED;
    this.conn.setStatus('closed');
    this.log.warn({ reason }, `Disconnecting due to: ${error.message}`);
    this.onDisconnected({ reason, error });
  }

  private async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this._state = 'disconnected';
    try {
      await this.transport.close();
    } catch (err) {
      this.log.warn({ error: errorMessage(err) }, 'Transport close failed');
    }
  }

  /** Release the transport when the worker is driven step by step */
  async stop(): Promise<void> {
    await this.close();
  }
}
