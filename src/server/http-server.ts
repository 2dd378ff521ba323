/**
 * Control HTTP Server
 *
 * Small JSON API over the take controller:
 *   GET  /ping                      liveness
 *   GET  /status                    controller + device snapshots
 *   POST /take/start                { description?, slate?, take? }
 *   POST /take/stop
 *   POST /devices/{name}/connect
 *   POST /devices/{name}/disconnect
 *   POST /devices/{name}/trigger    { start?: boolean, stop?: boolean }
 */

import * as http from 'http';
import { z } from 'zod';
import { TakeController } from '../controller/take-controller';
import { formatZodError } from '../config-schema';
import { getLogger } from '../logger';

const log = getLogger('HttpServer');

const MAX_BODY_BYTES = 64 * 1024;

const startBodySchema = z.object({
  description: z.string().default(''),
  slate: z.string().min(1).optional(),
  take: z.number().int().min(1).optional(),
});

const triggerBodySchema = z.object({
  start: z.boolean().optional(),
  stop: z.boolean().optional(),
});

export interface HttpResult {
  status: number;
  body: unknown;
}

function json(status: number, body: unknown): HttpResult {
  return { status, body };
}

class BodyTooLargeError extends Error {
  constructor() {
    super('Request body too large');
    this.name = 'BodyTooLargeError';
  }
}

/** Buffers up to MAX_BODY_BYTES; anything past that is drained and discarded so the reply can still be written. */
function readBody(req: http.IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    req.on('data', (chunk: Buffer) => {
      size += chunk.length;
      if (size <= MAX_BODY_BYTES) chunks.push(chunk);
    });
    req.on('end', () => {
      if (size > MAX_BODY_BYTES) {
        reject(new BodyTooLargeError());
        return;
      }
      resolve(Buffer.concat(chunks).toString('utf-8'));
    });
    req.on('error', reject);
  });
}

export class ControlHttpServer {
  private server?: http.Server;
  private controller: TakeController;

  constructor(controller: TakeController) {
    this.controller = controller;
  }

  /** Listen on the given port; resolves with the bound port once listening. */
  start(port: number, host = '0.0.0.0'): Promise<number> {
    const server = http.createServer((req, res) => {
      this.handleRequest(req, res).catch((err: unknown) => {
        log.error({ error: err instanceof Error ? err.message : String(err) }, 'Request handling failed');
        if (!res.headersSent) {
          res.writeHead(500, { 'Content-Type': 'application/json' });
        }
        res.end(JSON.stringify({ error: 'Internal error' }));
      });
    });
    this.server = server;

    return new Promise((resolve, reject) => {
      server.once('error', reject);
      server.listen(port, host, () => {
        server.off('error', reject);
        server.on('error', (err: NodeJS.ErrnoException) => {
          log.error({ error: err.message }, 'HTTP server error');
        });
        const address = server.address();
        const bound = typeof address === 'object' && address !== null ? address.port : port;
        log.info({ port: bound }, 'HTTP server started');
        resolve(bound);
      });
    });
  }

  stop(): void {
    if (this.server) {
      this.server.close();
      this.server.closeIdleConnections();
      this.server = undefined;
    }
  }

  private async handleRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    let body = '';
    if (req.method === 'POST') {
      try {
        body = await readBody(req);
      } catch (err) {
        if (!(err instanceof BodyTooLargeError)) throw err;
        log.warn({ url: req.url }, 'Rejected oversized request body');
        res.writeHead(413, { 'Content-Type': 'application/json', Connection: 'close' });
        res.end(JSON.stringify({ error: err.message }));
        return;
      }
    }

    const result = this.route(req.method ?? 'GET', req.url ?? '/', body);
    res.writeHead(result.status, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(result.body, null, 2));
  }

  /** Resolve one request; separated from the socket handling */
  route(method: string, url: string, rawBody: string): HttpResult {
    const pathname = url.split('?')[0].replace(/\/+$/, '') || '/';

    if (method === 'GET' && pathname === '/ping') {
      return json(200, { pong: true });
    }

    if (method === 'GET' && pathname === '/status') {
      return json(200, this.controller.getStatus());
    }

    if (method !== 'POST') {
      return json(404, { error: 'Not found' });
    }

    let payload: unknown = {};
    if (rawBody.trim().length > 0) {
      try {
        payload = JSON.parse(rawBody);
      } catch {
        return json(400, { error: 'Body is not valid JSON' });
      }
    }

    if (pathname === '/take/start') {
      const parsed = startBodySchema.safeParse(payload);
      if (!parsed.success) {
        return json(400, { error: formatZodError(parsed.error) });
      }
      if (parsed.data.slate !== undefined) this.controller.setSlate(parsed.data.slate);
      if (parsed.data.take !== undefined) this.controller.setTake(parsed.data.take);
      return json(200, this.controller.startTake(parsed.data.description));
    }

    if (pathname === '/take/stop') {
      return json(200, this.controller.stopTake());
    }

    const deviceMatch = /^\/devices\/([^/]+)\/(connect|disconnect|trigger)$/.exec(pathname);
    if (deviceMatch) {
      const name = decodeURIComponent(deviceMatch[1]);
      const action = deviceMatch[2];
      const device = this.controller.getDevice(name);
      if (!device) {
        return json(404, { error: `Unknown device: ${name}` });
      }

      switch (action) {
        case 'connect':
          device.connect();
          break;
        case 'disconnect':
          device.disconnect();
          break;
        case 'trigger': {
          const parsed = triggerBodySchema.safeParse(payload);
          if (!parsed.success) {
            return json(400, { error: formatZodError(parsed.error) });
          }
          if (parsed.data.start !== undefined) this.controller.setTrigger(name, 'start', parsed.data.start);
          if (parsed.data.stop !== undefined) this.controller.setTrigger(name, 'stop', parsed.data.stop);
          break;
        }
      }
      return json(200, device.snapshot());
    }

    return json(404, { error: 'Not found' });
  }
}
