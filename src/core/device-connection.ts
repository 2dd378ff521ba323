/**
 * DeviceConnection
 *
 * The controller-facing side of one capture device. The controller only
 * enqueues commands and reads status here; the dispatch worker owns the
 * transport.
 *
 * Events:
 *   'connected'            worker finished connecting
 *   'disconnected'         (event: DisconnectEvent) once per connection
 *   'recordStartConfirmed' (event: RecordStartConfirmed)
 *   'recordStopConfirmed'  (event: RecordStopConfirmed)
 *   'statusChange'         (status: DeviceStatus, previous: DeviceStatus)
 *   'queueOverflow'        (dropped: QueuedCommand | null)
 *   'error'                (err: Error) protocol violations and worker crashes
 */

import { EventEmitter } from 'events';
import { Logger } from 'pino';
import { ConnectionState } from './connection-state';
import { DispatchWorker } from './dispatch-worker';
import { QueueOverflowError } from './errors';
import { ResponseRouter } from './response-router';
import {
  Clock,
  CommandKind,
  CommandPayload,
  DEFAULT_TIMING,
  DeviceStatus,
  DisconnectEvent,
  QueueOptions,
  QueuedCommand,
  RESPONSE_STATUS,
  RecordStartConfirmed,
  RecordStopConfirmed,
  Reply,
  TimingOptions,
} from './types';
import { DeviceProtocol, DeviceType, EncodeContext } from '../devices/protocol';
import { Transport } from '../transports/transport';
import { getLogger } from '../logger';

export interface DeviceConnectionOptions<TRequest, TSettings> {
  name: string;
  host: string;
  port: number;
  protocol: DeviceProtocol<TRequest, TSettings>;
  /** Called on every connect(); each connection gets a fresh transport */
  createTransport: (settings: Readonly<TSettings>) => Transport<TRequest>;
  settings: TSettings;
  triggerOnStart?: boolean;
  triggerOnStop?: boolean;
  timing?: Partial<TimingOptions>;
  queue?: Partial<QueueOptions>;
  frameRate?: number;
  timecode?: string;
  slate?: string;
  take?: number;
  clock?: Clock;
  /**
   * When false, connect() builds the worker but does not run it; the
   * caller drives it through `worker`. Defaults to true.
   */
  autoRun?: boolean;
}

export interface DeviceSnapshot {
  name: string;
  type: DeviceType;
  host: string;
  port: number;
  status: DeviceStatus;
  connected: boolean;
  responseStatus: number;
  recording: boolean;
  awaitingEcho: boolean;
  queueSize: number;
  lastActivity: number | null;
  triggerOnStart: boolean;
  triggerOnStop: boolean;
  slate: string;
  take: number;
}

export class DeviceConnection<TRequest = unknown, TSettings = unknown> extends EventEmitter {
  readonly name: string;
  readonly type: DeviceType;
  readonly host: string;
  readonly port: number;

  triggerOnStart: boolean;
  triggerOnStop: boolean;

  private readonly protocol: DeviceProtocol<TRequest, TSettings>;
  private readonly createTransport: (settings: Readonly<TSettings>) => Transport<TRequest>;
  private readonly timing: TimingOptions;
  private readonly queueOptions?: Partial<QueueOptions>;
  private readonly clock: Clock;
  private readonly autoRun: boolean;
  private readonly log: Logger;
  private settings: TSettings;
  private frameRate: number;
  private timecodeValue: string;
  private _slate: string;
  private _take: number;
  private conn: ConnectionState | null = null;
  private _worker: DispatchWorker<TRequest> | null = null;
  private running: Promise<void> | null = null;

  constructor(options: DeviceConnectionOptions<TRequest, TSettings>) {
    super();
    this.name = options.name;
    this.type = options.protocol.type;
    this.host = options.host;
    this.port = options.port;
    this.protocol = options.protocol;
    this.createTransport = options.createTransport;
    this.settings = options.settings;
    this.triggerOnStart = options.triggerOnStart ?? true;
    this.triggerOnStop = options.triggerOnStop ?? true;
    this.timing = { ...DEFAULT_TIMING, ...options.timing };
    this.queueOptions = options.queue;
    this.frameRate = options.frameRate ?? 30;
    this.timecodeValue = options.timecode ?? '00:00:00:00';
    this._slate = options.slate ?? 'slate';
    this._take = options.take ?? 1;
    this.clock = options.clock ?? Date.now;
    this.autoRun = options.autoRun ?? true;
    this.log = getLogger('Device').child({ device: this.name });
  }

  // --- Read-only status ---

  get isConnected(): boolean {
    return this.conn?.isConnected ?? false;
  }

  get status(): DeviceStatus {
    return this.conn?.status ?? 'disconnected';
  }

  get responseStatus(): number {
    return this.conn?.responseStatus ?? RESPONSE_STATUS.DISCONNECTED;
  }

  get lastActivity(): number | null {
    return this.conn?.lastActivity ?? null;
  }

  get awaitingEcho(): boolean {
    return this.conn?.awaitingEcho ?? false;
  }

  get isRecording(): boolean {
    return this.conn?.recording ?? false;
  }

  /** When the current recording was confirmed, or null */
  get recordingSince(): number | null {
    return this.conn?.recording ? this.conn.recordStartedAt : null;
  }

  get queueSize(): number {
    return this.conn?.queue.size ?? 0;
  }

  /** Commands waiting to be sent, in drain order */
  get pendingCommands(): QueuedCommand[] {
    return this.conn?.queue.toArray() ?? [];
  }

  get slate(): string {
    return this._slate;
  }

  get take(): number {
    return this._take;
  }

  /** The worker of the current connection, if any */
  get worker(): DispatchWorker<TRequest> | null {
    return this._worker;
  }

  /** Resolves when the current worker exits */
  whenStopped(): Promise<void> {
    return this.running ?? Promise.resolve();
  }

  timecode(): string {
    return this.timecodeValue;
  }

  // --- Lifecycle ---

  /** Open a fresh connection. No-op while connected. */
  connect(): void {
    if (this.isConnected) return;

    const previous = this.status;
    const conn = new ConnectionState(this.clock, this.queueOptions);
    conn.onStatusChange = (status, prev) => this.emit('statusChange', status, prev);
    this.conn = conn;

    const router = new ResponseRouter(this.name, this.protocol.names, {
      onEcho: () => this.onEchoResponse(conn),
      onRecordStarted: () => this.onRecordingStarted(conn),
      onRecordStopped: (reply) => this.onRecordingStopped(conn, reply),
    }, () => conn.touch());

    const worker = new DispatchWorker<TRequest>({
      name: this.name,
      connection: conn,
      transport: this.createTransport(this.settings),
      router,
      timing: this.timing,
      encode: (command) => this.protocol.encode(command, this.encodeContext()),
      probe: this.protocol.probe,
      sendEchoRequest: () => this.requestEcho(conn),
      onConnected: () => this.emit('connected'),
      onDisconnected: (event) => this.notifyDisconnected(conn, event),
    });
    this._worker = worker;

    this.log.info({ host: this.host, port: this.port }, 'Connecting');
    this.emit('statusChange', conn.status, previous);

    if (this.autoRun) {
      this.running = worker.run().catch((err: unknown) => {
        const error = err instanceof Error ? err : new Error(String(err));
        this.emit('error', error);
      });
    }
  }

  /**
   * Administrative disconnect. The worker notices on its next
   * iteration, closes the transport and exits.
   */
  disconnect(): void {
    const conn = this.conn;
    if (!conn || conn.responseStatus < 0) return;

    const wasConnected = conn.isConnected;
    conn.responseStatus = RESPONSE_STATUS.DISCONNECTED;
    conn.setStatus('disconnected');
    this.log.info('Disconnected by controller');
    if (wasConnected) {
      this.notifyDisconnected(conn, { reason: 'requested' });
    }
  }

  // --- Metadata & settings ---

  setSlate(value: string): void {
    this._slate = value;
  }

  setTake(value: number): void {
    this._take = value;
  }

  /** Settings are read when a command is encoded, not when it is queued */
  updateSettings(patch: Partial<TSettings>): void {
    this.settings = { ...this.settings, ...patch };
  }

  getSettings(): Readonly<TSettings> {
    return this.settings;
  }

  // --- Recording commands ---

  /**
   * Ask the device to start recording. Returns whether a command was
   * queued; nothing is queued while disconnected or with triggerOnStart off.
   */
  recordStart(slate: string, take: number, description = ''): boolean {
    if (!this.isConnected || !this.triggerOnStart) return false;

    this.setSlate(slate);
    this.setTake(take);
    return this.enqueue('recordStart', { description });
  }

  recordStop(): boolean {
    if (!this.isConnected || !this.triggerOnStop) return false;
    return this.enqueue('recordStop', {});
  }

  /**
   * Queue a heartbeat unless one is outstanding or real commands are
   * waiting.
   */
  sendEchoRequest(): boolean {
    if (!this.conn || !this.isConnected) return false;
    return this.requestEcho(this.conn);
  }

  snapshot(): DeviceSnapshot {
    return {
      name: this.name,
      type: this.type,
      host: this.host,
      port: this.port,
      status: this.status,
      connected: this.isConnected,
      responseStatus: this.responseStatus,
      recording: this.isRecording,
      awaitingEcho: this.awaitingEcho,
      queueSize: this.queueSize,
      lastActivity: this.lastActivity,
      triggerOnStart: this.triggerOnStart,
      triggerOnStop: this.triggerOnStop,
      slate: this._slate,
      take: this._take,
    };
  }

  // --- Internals ---

  private requestEcho(conn: ConnectionState): boolean {
    if (conn.awaitingEcho) return false;
    if (!conn.queue.empty) return false;
    if (!this.enqueueOn(conn, 'echo', {})) return false;
    conn.awaitingEcho = true;
    return true;
  }

  private enqueue(kind: CommandKind, payload: CommandPayload): boolean {
    return this.conn ? this.enqueueOn(this.conn, kind, payload) : false;
  }

  private enqueueOn(conn: ConnectionState, kind: CommandKind, payload: CommandPayload): boolean {
    const command: QueuedCommand = {
      kind,
      commandName: this.protocol.names[kind],
      payload,
      enqueuedAt: this.clock(),
    };

    try {
      const dropped = conn.queue.enqueue(command);
      if (dropped) {
        this.log.warn({ dropped: dropped.commandName, capacity: conn.queue.capacity }, 'Queue full, dropped oldest command');
        if (dropped.kind === 'echo') conn.awaitingEcho = false;
        this.emit('queueOverflow', dropped);
      }
    } catch (err) {
      if (err instanceof QueueOverflowError) {
        this.log.warn({ command: command.commandName, capacity: err.capacity }, 'Queue full, command rejected');
        this.emit('queueOverflow', null);
        return false;
      }
      throw err;
    }

    this.log.debug({ command: command.commandName, queued: conn.queue.size }, 'Queued');
    return true;
  }

  private encodeContext(): EncodeContext<TSettings> {
    return {
      slate: this._slate,
      take: this._take,
      timecode: this.timecode(),
      frameRate: this.frameRate,
      settings: this.settings,
    };
  }

  private notifyDisconnected(conn: ConnectionState, event: DisconnectEvent): void {
    if (conn.disconnectNotified) return;
    conn.disconnectNotified = true;
    conn.recording = false;
    this.emit('disconnected', event);
  }

  // --- Response handlers ---

  private onEchoResponse(conn: ConnectionState): void {
    conn.awaitingEcho = false;
  }

  private onRecordingStarted(conn: ConnectionState): void {
    conn.recording = true;
    conn.recordStartedAt = this.clock();
    const event: RecordStartConfirmed = { timecode: this.timecode() };
    this.log.info({ slate: this._slate, take: this._take, timecode: event.timecode }, 'Recording started');
    this.emit('recordStartConfirmed', event);
  }

  private onRecordingStopped(conn: ConnectionState, reply: Reply): void {
    conn.recording = false;
    const event: RecordStopConfirmed = {
      timecode: this.timecode(),
      paths: this.protocol.outputPaths(reply),
    };
    this.log.info({ timecode: event.timecode, paths: event.paths }, 'Recording stopped');
    this.emit('recordStopConfirmed', event);
  }
}
