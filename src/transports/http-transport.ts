/**
 * HTTP Transport
 *
 * One JSON POST per command to http://{host}:{port}/v1/{path}. The path
 * is built per call by the device protocol (it carries the API key).
 * There is no connection to open; each send is an independent request.
 * A non-2xx status, or a JSON body whose response_code is not "OK",
 * is a failed reply. Network errors and timeouts reject.
 */

import { Reply } from '../core/types';
import { TransportError, errorMessage } from '../core/errors';
import { getLogger } from '../logger';
import { Endpoint, Transport } from './transport';

const log = getLogger('HTTP');

export interface HttpRequest {
  /** Path below /v1/, e.g. "1234/recording/start" */
  path: string;
  body?: Record<string, unknown>;
}

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

export interface HttpTransportOptions extends Endpoint {
  requestTimeoutMs?: number;
  fetchFn?: FetchFn;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class HttpTransport implements Transport<HttpRequest> {
  readonly kind = 'http' as const;

  private readonly baseUrl: string;
  private readonly requestTimeoutMs: number;
  private readonly fetchFn: FetchFn;
  private opened = false;

  constructor(options: HttpTransportOptions) {
    this.baseUrl = `http://${options.host}:${options.port}/v1`;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 5000;
    this.fetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));
  }

  urlFor(path: string): string {
    return `${this.baseUrl}/${path.replace(/^\/+/, '')}`;
  }

  async open(): Promise<void> {
    this.opened = true;
  }

  async send(request: HttpRequest): Promise<Reply> {
    if (!this.opened) {
      throw new TransportError('HTTP transport not open');
    }

    const url = this.urlFor(request.path);
    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(request.body ?? {}),
        signal: AbortSignal.timeout(this.requestTimeoutMs),
      });
    } catch (err) {
      throw new TransportError(`POST ${request.path} failed: ${errorMessage(err)}`, { cause: err });
    }

    let text: string;
    try {
      text = await response.text();
    } catch (err) {
      throw new TransportError(`POST ${request.path}: reading reply failed: ${errorMessage(err)}`, { cause: err });
    }
    let data: Record<string, unknown> | undefined;
    if (text.length > 0) {
      try {
        const parsed: unknown = JSON.parse(text);
        data = isRecord(parsed) ? parsed : { value: parsed };
      } catch (err) {
        throw new TransportError(`POST ${request.path}: malformed reply body`, { cause: err });
      }
    }

    const responseCode = data?.response_code;
    const ok = response.ok && (responseCode === undefined || responseCode === 'OK');
    const description = typeof data?.description === 'string' ? data.description : undefined;

    log.debug({ path: request.path, status: response.status, responseCode }, '<-');
    if (!ok) {
      log.warn({ path: request.path, status: response.status, responseCode, description }, 'Request failed');
    }

    return {
      ok,
      data,
      comment: ok ? undefined : description ?? `HTTP ${response.status}`,
    };
  }

  async close(): Promise<void> {
    this.opened = false;
  }
}
