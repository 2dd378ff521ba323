import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert/strict';
import { ResponseRouter } from '../core/response-router';
import { ProtocolViolationError } from '../core/errors';
import { ROKOKO_HTTP_COMMANDS } from '../devices/rokoko-http';

describe('ResponseRouter', () => {
  let calls: string[];
  let touches: number;
  let router: ResponseRouter;

  beforeEach(() => {
    calls = [];
    touches = 0;
    router = new ResponseRouter('studio', ROKOKO_HTTP_COMMANDS, {
      onEcho: () => calls.push('echo'),
      onRecordStarted: () => calls.push('started'),
      onRecordStopped: (reply) => calls.push(`stopped:${String(reply.data?.clip)}`),
    }, () => { touches++; });
  });

  it('routes each command name to its handler', () => {
    assert.equal(router.route('info', { ok: true }), 'echo');
    assert.equal(router.route('recording/start', { ok: true }), 'recordStart');
    assert.equal(router.route('recording/stop', { ok: true, data: { clip: 'take-3' } }), 'recordStop');
    assert.deepEqual(calls, ['echo', 'started', 'stopped:take-3']);
    assert.equal(touches, 3);
  });

  it('maps names back to kinds', () => {
    assert.equal(router.has('recording/start'), true);
    assert.equal(router.kindOf('recording/stop'), 'recordStop');
    assert.equal(router.has('StartRecord'), false);
    assert.equal(router.kindOf('StartRecord'), undefined);
  });

  it('throws a protocol violation for an unknown name after recording activity', () => {
    assert.throws(() => router.route('recording/pause', { ok: true }), (err: unknown) => {
      assert.ok(err instanceof ProtocolViolationError);
      assert.equal(err.commandName, 'recording/pause');
      assert.equal(err.message, 'studio: no handler registered for "recording/pause" replies');
      return true;
    });
    assert.equal(touches, 1);
    assert.deepEqual(calls, []);
  });
});
