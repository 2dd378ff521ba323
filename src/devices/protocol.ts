/**
 * Device protocol contract.
 *
 * A protocol is everything that differs between device variants: the
 * wire names of the three commands, an optional handshake probe, and
 * how a queued command becomes a transport request. Encoding happens
 * when the worker sends, so it always sees the latest slate, take and
 * settings.
 */

import { CommandNames, QueuedCommand, Reply } from '../core/types';

export type DeviceType = 'obs' | 'rokoko-udp' | 'rokoko-http';

export interface EncodeContext<TSettings> {
  slate: string;
  take: number;
  timecode: string;
  frameRate: number;
  settings: Readonly<TSettings>;
}

export interface DeviceProtocol<TRequest, TSettings> {
  readonly type: DeviceType;
  readonly names: CommandNames;
  /** Sent once after the transport opens, before any queued command */
  readonly probe?: TRequest;
  encode(command: QueuedCommand, context: EncodeContext<TSettings>): TRequest;
  /** Output files reported by a stop reply */
  outputPaths(reply: Reply): string[];
}
