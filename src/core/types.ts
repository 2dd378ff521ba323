/**
 * Core types shared by the queue, the dispatch worker and the router.
 */

/** Lifecycle state exposed to the controller */
export type DeviceStatus = 'disconnected' | 'ready' | 'closed';

/** Dispatch worker states; `disconnected` is terminal for a worker instance */
export type WorkerState = 'connecting' | 'active' | 'disconnected';

/** The fixed set of commands every device variant understands */
export const COMMAND_KINDS = ['echo', 'recordStart', 'recordStop'] as const;
export type CommandKind = typeof COMMAND_KINDS[number];

/**
 * responseStatus sentinels: >0 connected, 0 connected but the last
 * operation failed, <0 administratively disconnected.
 */
export const RESPONSE_STATUS = {
  CONNECTED: 1,
  OK: 200,
  FAILED: 0,
  DISCONNECTED: -1,
} as const;

export type PayloadValue = string | number | boolean;
export type CommandPayload = Readonly<Record<string, PayloadValue>>;

export interface QueuedCommand {
  readonly kind: CommandKind;
  /** Wire name of the command, also the key replies are routed by */
  readonly commandName: string;
  readonly payload: CommandPayload;
  readonly enqueuedAt: number;
}

/** Result of a transport send */
export interface Reply {
  ok: boolean;
  data?: Record<string, unknown>;
  /** Device-side explanation for a failed reply */
  comment?: string;
}

/** Command names a device variant uses on the wire, keyed by kind */
export type CommandNames = Readonly<Record<CommandKind, string>>;

export type OverflowPolicy = 'reject' | 'drop-oldest';
export type DrainOrder = 'fifo' | 'lifo';

export interface QueueOptions {
  capacity: number;
  overflow: OverflowPolicy;
  order: DrainOrder;
}

export interface TimingOptions {
  /** Idle time after which a heartbeat is sent */
  pingIntervalMs: number;
  /** Idle time after which the connection is considered lost */
  disconnectTimeoutMs: number;
  /** Upper bound on one idle wait when the queue is empty */
  idleMs: number;
}

export const DEFAULT_QUEUE: QueueOptions = {
  capacity: 64,
  overflow: 'reject',
  order: 'fifo',
};

export const DEFAULT_TIMING: TimingOptions = {
  pingIntervalMs: 1000,
  disconnectTimeoutMs: 3000,
  idleMs: 10,
};

export type DisconnectReason = 'requested' | 'timeout' | 'transport' | 'handshake' | 'protocol' | 'error';

export interface DisconnectEvent {
  reason: DisconnectReason;
  error?: Error;
}

export interface RecordStartConfirmed {
  timecode: string;
}

export interface RecordStopConfirmed {
  timecode: string;
  paths: string[];
}

export type Clock = () => number;
