/**
 * UDP Transport
 *
 * Fire-and-forget datagrams. Nothing comes back from the device, so a
 * send that the local socket accepts is reported as an ok reply. A null
 * datagram is a local no-op that still acknowledges (used for echo
 * probes on devices with no probe command).
 */

import * as dgram from 'dgram';
import { Reply } from '../core/types';
import { TransportError, errorMessage } from '../core/errors';
import { getLogger } from '../logger';
import { Endpoint, Transport } from './transport';

const log = getLogger('UDP');

export interface UdpRequest {
  datagram: string | null;
}

/** The subset of a dgram socket the transport relies on */
export interface UdpSocket {
  on(event: 'error', listener: (err: Error) => void): unknown;
  bind(port: number, callback: () => void): unknown;
  send(msg: string, port: number, address: string, callback: (err: Error | null) => void): void;
  close(callback?: () => void): unknown;
}

export interface UdpTransportOptions extends Endpoint {
  createSocket?: () => UdpSocket;
}

export class UdpTransport implements Transport<UdpRequest> {
  readonly kind = 'udp' as const;

  private readonly host: string;
  private readonly port: number;
  private readonly createSocket: () => UdpSocket;
  private socket: UdpSocket | null = null;
  private lastError: Error | null = null;

  constructor(options: UdpTransportOptions) {
    this.host = options.host;
    this.port = options.port;
    this.createSocket = options.createSocket ?? (() => dgram.createSocket('udp4'));
  }

  open(): Promise<void> {
    if (this.socket) {
      return Promise.reject(new TransportError('Transport already open'));
    }

    return new Promise((resolve, reject) => {
      let socket: UdpSocket;
      try {
        socket = this.createSocket();
      } catch (err) {
        reject(new TransportError(`UDP socket creation failed: ${errorMessage(err)}`, { cause: err }));
        return;
      }

      let bound = false;
      socket.on('error', (err: Error) => {
        log.warn({ error: err.message }, 'UDP error');
        this.lastError = err;
        if (!bound) {
          this.socket = null;
          reject(new TransportError(`UDP bind failed: ${err.message}`, { cause: err }));
        }
      });

      this.socket = socket;
      // Any free local port; only used for sending
      socket.bind(0, () => {
        bound = true;
        log.debug({ host: this.host, port: this.port }, 'Ready to send');
        resolve();
      });
    });
  }

  send(request: UdpRequest): Promise<Reply> {
    const socket = this.socket;
    if (!socket) {
      return Promise.reject(new TransportError('UDP socket not open'));
    }
    if (this.lastError) {
      const err = this.lastError;
      return Promise.reject(new TransportError(`UDP socket failed: ${err.message}`, { cause: err }));
    }
    const datagram = request.datagram;
    if (datagram === null) {
      return Promise.resolve({ ok: true });
    }

    return new Promise((resolve, reject) => {
      socket.send(datagram, this.port, this.host, (err) => {
        if (err) {
          reject(new TransportError(`UDP send failed: ${err.message}`, { cause: err }));
          return;
        }
        log.debug({ bytes: Buffer.byteLength(datagram), host: this.host, port: this.port }, '->');
        resolve({ ok: true });
      });
    });
  }

  close(): Promise<void> {
    const socket = this.socket;
    this.socket = null;
    if (!socket) return Promise.resolve();

    return new Promise((resolve) => {
      try {
        socket.close(() => resolve());
      } catch (err) {
        // dgram throws if the socket is already closed
        log.debug({ error: errorMessage(err) }, 'UDP close');
        resolve();
      }
    });
  }
}
