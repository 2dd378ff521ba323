/**
 * Transport Interface
 *
 * A transport carries encoded commands to one device endpoint. Calls
 * are awaited by the dispatch worker one at a time; failures reject
 * with TransportError.
 *
 *   open()   connect and complete any identification handshake
 *   send()   deliver one request, resolve with the device's reply
 *   close()  tear down; safe to call more than once
 */

import { Reply } from '../core/types';

export type TransportKind = 'websocket' | 'udp' | 'http' | 'emulated';

export interface Endpoint {
  host: string;
  port: number;
}

export interface Transport<TRequest> {
  readonly kind: TransportKind;
  open(): Promise<void>;
  send(request: TRequest): Promise<Reply>;
  close(): Promise<void>;
}
