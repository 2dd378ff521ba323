/**
 * OBS WebSocket v5 Transport
 *
 * JSON-RPC over websocket. open() waits for the Hello/Identify exchange
 * (SHA256 challenge-response when OBS has auth enabled); send() issues
 * an op 6 Request and resolves with the matching op 7 RequestResponse.
 *
 *   op 0 Hello          server -> client
 *   op 1 Identify       client -> server
 *   op 2 Identified     server -> client
 *   op 6 Request        client -> server
 *   op 7 RequestResponse server -> client
 */

import * as crypto from 'crypto';
import WebSocket from 'ws';
import { z } from 'zod';
import { Reply } from '../core/types';
import { TransportError, errorMessage } from '../core/errors';
import { getLogger } from '../logger';
import { Endpoint, Transport } from './transport';

const log = getLogger('OBS');

export interface ObsRequest {
  requestType: string;
  requestData?: Record<string, unknown>;
}

/** The subset of a ws client the transport relies on */
export interface ObsSocket {
  on(event: string, listener: (...args: unknown[]) => void): unknown;
  send(data: string): void;
  close(): void;
}

export type ObsSocketFactory = (url: string) => ObsSocket;

export interface ObsTransportOptions extends Endpoint {
  password?: string;
  /** Bound on the connect + identify handshake */
  connectTimeoutMs?: number;
  /** Bound on each request round trip */
  requestTimeoutMs?: number;
  createSocket?: ObsSocketFactory;
}

const envelopeSchema = z.object({
  op: z.number().int(),
  d: z.record(z.unknown()).default({}),
});

const helloSchema = z.object({
  rpcVersion: z.number().int().default(1),
  authentication: z.object({
    challenge: z.string(),
    salt: z.string(),
  }).optional(),
});

const requestResponseSchema = z.object({
  requestType: z.string(),
  requestId: z.string(),
  requestStatus: z.object({
    result: z.boolean(),
    code: z.number(),
    comment: z.string().optional(),
  }),
  responseData: z.record(z.unknown()).optional(),
});

interface PendingRequest {
  resolve: (reply: Reply) => void;
  reject: (err: Error) => void;
  timer: ReturnType<typeof setTimeout>;
}

/** OBS auth string: base64(sha256(base64(sha256(password + salt)) + challenge)) */
export function obsAuthResponse(password: string, salt: string, challenge: string): string {
  const secret = crypto.createHash('sha256')
    .update(password + salt)
    .digest('base64');
  return crypto.createHash('sha256')
    .update(secret + challenge)
    .digest('base64');
}

function rawToString(data: unknown): string {
  if (typeof data === 'string') return data;
  if (Buffer.isBuffer(data)) return data.toString('utf-8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf-8');
  if (Array.isArray(data)) {
    return Buffer.concat(data.filter((chunk): chunk is Buffer => Buffer.isBuffer(chunk))).toString('utf-8');
  }
  throw new TransportError('Unsupported websocket frame payload');
}

export class ObsWebSocketTransport implements Transport<ObsRequest> {
  readonly kind = 'websocket' as const;

  private readonly url: string;
  private readonly password: string;
  private readonly connectTimeoutMs: number;
  private readonly requestTimeoutMs: number;
  private readonly createSocket: ObsSocketFactory;
  private socket: ObsSocket | null = null;
  private identified = false;
  private requestId = 0;
  private pending: Map<string, PendingRequest> = new Map();

  constructor(options: ObsTransportOptions) {
    this.url = `ws://${options.host}:${options.port}`;
    this.password = options.password ?? '';
    this.connectTimeoutMs = options.connectTimeoutMs ?? 5000;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 5000;
    this.createSocket = options.createSocket ?? ((url) => new WebSocket(url));
  }

  get isIdentified(): boolean {
    return this.identified;
  }

  open(): Promise<void> {
    if (this.socket) {
      return Promise.reject(new TransportError('Transport already open'));
    }

    log.debug({ url: this.url }, 'Connecting');

    return new Promise((resolve, reject) => {
      let settled = false;
      const settle = (err?: Error): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        if (err) {
          const socket = this.socket;
          this.teardown(err);
          socket?.close();
          reject(err);
        } else {
          resolve();
        }
      };

      const timer = setTimeout(() => {
        settle(new TransportError(`Identify timeout after ${this.connectTimeoutMs}ms (${this.url})`));
      }, this.connectTimeoutMs);

      let socket: ObsSocket;
      try {
        socket = this.createSocket(this.url);
      } catch (err) {
        settle(new TransportError(`WebSocket creation failed: ${errorMessage(err)}`, { cause: err }));
        return;
      }
      this.socket = socket;

      socket.on('message', (data) => {
        try {
          this.handleMessage(rawToString(data), () => settle());
        } catch (err) {
          log.warn({ error: errorMessage(err) }, 'Malformed message from OBS');
          settle(new TransportError(`Malformed message: ${errorMessage(err)}`, { cause: err }));
        }
      });

      socket.on('close', () => {
        const err = new TransportError('WebSocket closed');
        settle(err);
        this.teardown(err);
      });

      socket.on('error', (err) => {
        const wrapped = new TransportError(`WebSocket error: ${errorMessage(err)}`, { cause: err });
        log.warn({ error: wrapped.message }, 'WebSocket error');
        settle(wrapped);
      });
    });
  }

  send(request: ObsRequest): Promise<Reply> {
    const socket = this.socket;
    if (!socket || !this.identified) {
      return Promise.reject(new TransportError(`Not connected, cannot send ${request.requestType}`));
    }

    this.requestId++;
    const requestId = `req-${this.requestId}`;

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(requestId);
        reject(new TransportError(`Request timeout: ${request.requestType}`));
      }, this.requestTimeoutMs);

      this.pending.set(requestId, { resolve, reject, timer });

      const d: Record<string, unknown> = { requestType: request.requestType, requestId };
      if (request.requestData) {
        d.requestData = request.requestData;
      }

      try {
        socket.send(JSON.stringify({ op: 6, d }));
      } catch (err) {
        clearTimeout(timer);
        this.pending.delete(requestId);
        reject(new TransportError(`Send error: ${errorMessage(err)}`, { cause: err }));
        return;
      }

      log.debug({ requestType: request.requestType, requestId }, '->');
    });
  }

  async close(): Promise<void> {
    const socket = this.socket;
    this.teardown(new TransportError('Transport closed'));
    if (socket) {
      try {
        socket.close();
      } catch (err) {
        log.warn({ error: errorMessage(err) }, 'Error while closing websocket');
      }
    }
  }

  private handleMessage(raw: string, onIdentified: () => void): void {
    const msg = envelopeSchema.parse(JSON.parse(raw));

    switch (msg.op) {
      case 0: // Hello
        this.identify(helloSchema.parse(msg.d));
        break;
      case 2: // Identified
        this.identified = true;
        log.debug({ url: this.url }, 'Identified');
        onIdentified();
        break;
      case 7: // RequestResponse
        this.resolveRequest(requestResponseSchema.parse(msg.d));
        break;
      default:
        // Events (op 5) and batch responses are not used
        break;
    }
  }

  private identify(hello: z.infer<typeof helloSchema>): void {
    const d: Record<string, unknown> = {
      rpcVersion: hello.rpcVersion,
      eventSubscriptions: 0,
    };
    if (hello.authentication) {
      const { salt, challenge } = hello.authentication;
      d.authentication = obsAuthResponse(this.password, salt, challenge);
    }
    this.socket?.send(JSON.stringify({ op: 1, d }));
  }

  private resolveRequest(response: z.infer<typeof requestResponseSchema>): void {
    const pending = this.pending.get(response.requestId);
    if (!pending) {
      log.debug({ requestId: response.requestId }, 'Response for unknown request');
      return;
    }
    clearTimeout(pending.timer);
    this.pending.delete(response.requestId);

    const reply: Reply = {
      ok: response.requestStatus.result,
      data: response.responseData,
      comment: response.requestStatus.comment,
    };
    if (!reply.ok) {
      log.warn({ requestType: response.requestType, code: response.requestStatus.code, comment: reply.comment }, 'Request failed');
    }
    pending.resolve(reply);
  }

  private teardown(reason: Error): void {
    this.identified = false;
    this.socket = null;
    for (const [id, pending] of this.pending) {
      clearTimeout(pending.timer);
      pending.reject(reason);
      this.pending.delete(id);
    }
  }
}
