import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert/strict';
import { EventEmitter } from 'events';
import { TransportError } from '../core/errors';
import { UdpSocket, UdpTransport } from '../transports/udp-transport';

// --- Mock dgram socket ---

interface SentDatagram {
  msg: string;
  port: number;
  address: string;
}

class MockUdpSocket extends EventEmitter implements UdpSocket {
  sent: SentDatagram[] = [];
  boundPort: number | null = null;
  closeCalls = 0;
  /** When set, the next bind emits this error instead of completing */
  bindError: Error | null = null;
  sendError: Error | null = null;

  bind(port: number, callback: () => void): this {
    if (this.bindError) {
      const err = this.bindError;
      setImmediate(() => this.emit('error', err));
      return this;
    }
    this.boundPort = port;
    setImmediate(callback);
    return this;
  }

  send(msg: string, port: number, address: string, callback: (err: Error | null) => void): void {
    if (this.sendError) {
      const err = this.sendError;
      setImmediate(() => callback(err));
      return;
    }
    this.sent.push({ msg, port, address });
    setImmediate(() => callback(null));
  }

  close(callback?: () => void): this {
    this.closeCalls++;
    if (callback) setImmediate(callback);
    return this;
  }
}

describe('UdpTransport', () => {
  let socket: MockUdpSocket;
  let transport: UdpTransport;

  beforeEach(() => {
    socket = new MockUdpSocket();
    transport = new UdpTransport({ host: '192.168.1.20', port: 14047, createSocket: () => socket });
  });

  it('binds an ephemeral local port on open', async () => {
    await transport.open();
    assert.equal(socket.boundPort, 0);
  });

  it('sends a datagram to the device endpoint', async () => {
    await transport.open();
    const reply = await transport.send({ datagram: '<CaptureStart></CaptureStart>' });
    assert.deepEqual(reply, { ok: true });
    assert.deepEqual(socket.sent, [{ msg: '<CaptureStart></CaptureStart>', port: 14047, address: '192.168.1.20' }]);
  });

  it('acknowledges a null datagram without sending', async () => {
    await transport.open();
    assert.deepEqual(await transport.send({ datagram: null }), { ok: true });
    assert.equal(socket.sent.length, 0);
  });

  it('rejects sends before open', async () => {
    await assert.rejects(transport.send({ datagram: 'x' }), /UDP socket not open/);
  });

  it('rejects open when bind fails', async () => {
    socket.bindError = new Error('EADDRINUSE');
    await assert.rejects(transport.open(), (err: unknown) => {
      assert.ok(err instanceof TransportError);
      assert.equal(err.message, 'UDP bind failed: EADDRINUSE');
      return true;
    });
  });

  it('rejects a send the socket refuses', async () => {
    await transport.open();
    socket.sendError = new Error('EHOSTUNREACH');
    await assert.rejects(transport.send({ datagram: 'x' }), /UDP send failed: EHOSTUNREACH/);
  });

  it('fails every send after a socket error', async () => {
    await transport.open();
    socket.emit('error', new Error('ENETDOWN'));
    await assert.rejects(transport.send({ datagram: null }), /UDP socket failed: ENETDOWN/);
  });

  it('closes once', async () => {
    await transport.open();
    await transport.close();
    await transport.close();
    assert.equal(socket.closeCalls, 1);
    await assert.rejects(transport.send({ datagram: 'x' }), /not open/);
  });
});
