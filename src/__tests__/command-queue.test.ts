import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { CommandQueue } from '../core/command-queue';
import { QueueOverflowError } from '../core/errors';
import { CommandKind, QueuedCommand } from '../core/types';

function cmd(commandName: string, kind: CommandKind = 'recordStart'): QueuedCommand {
  return { kind, commandName, payload: {}, enqueuedAt: 0 };
}

function drain(queue: CommandQueue): string[] {
  const names: string[] = [];
  let next = queue.dequeueNext();
  while (next) {
    names.push(next.commandName);
    next = queue.dequeueNext();
  }
  return names;
}

describe('CommandQueue', () => {
  it('drains in submission order by default', () => {
    const queue = new CommandQueue();
    queue.enqueue(cmd('a'));
    queue.enqueue(cmd('b'));
    queue.enqueue(cmd('c'));
    assert.equal(queue.size, 3);
    assert.deepEqual(drain(queue), ['a', 'b', 'c']);
    assert.equal(queue.empty, true);
  });

  it('drains newest first in lifo order', () => {
    const queue = new CommandQueue({ order: 'lifo' });
    queue.enqueue(cmd('a'));
    queue.enqueue(cmd('b'));
    queue.enqueue(cmd('c'));
    assert.deepEqual(queue.toArray().map((c) => c.commandName), ['c', 'b', 'a']);
    assert.deepEqual(drain(queue), ['c', 'b', 'a']);
  });

  it('keeps fifo order across the ring wrap-around', () => {
    const queue = new CommandQueue({ capacity: 3 });
    queue.enqueue(cmd('a'));
    queue.enqueue(cmd('b'));
    assert.equal(queue.dequeueNext()?.commandName, 'a');
    queue.enqueue(cmd('c'));
    queue.enqueue(cmd('d'));
    assert.deepEqual(queue.toArray().map((c) => c.commandName), ['b', 'c', 'd']);
    assert.deepEqual(drain(queue), ['b', 'c', 'd']);
  });

  it('returns undefined when empty', () => {
    const queue = new CommandQueue();
    assert.equal(queue.dequeueNext(), undefined);
  });

  it('rejects when full under the reject policy', () => {
    const queue = new CommandQueue({ capacity: 2 });
    queue.enqueue(cmd('a'));
    queue.enqueue(cmd('b'));
    assert.throws(() => queue.enqueue(cmd('c')), (err: unknown) => {
      assert.ok(err instanceof QueueOverflowError);
      assert.equal(err.capacity, 2);
      assert.equal(err.code, 'QUEUE_OVERFLOW');
      return true;
    });
    assert.deepEqual(drain(queue), ['a', 'b']);
  });

  it('evicts the oldest command under drop-oldest', () => {
    const queue = new CommandQueue({ capacity: 2, overflow: 'drop-oldest' });
    assert.equal(queue.enqueue(cmd('a')), undefined);
    queue.enqueue(cmd('b'));
    const evicted = queue.enqueue(cmd('c'));
    assert.equal(evicted?.commandName, 'a');
    assert.equal(queue.size, 2);
    assert.deepEqual(drain(queue), ['b', 'c']);
  });

  it('stores frozen copies', () => {
    const queue = new CommandQueue();
    const original = cmd('a');
    queue.enqueue(original);
    const stored = queue.dequeueNext();
    assert.notEqual(stored, original);
    assert.equal(Object.isFrozen(stored), true);
  });

  it('rejects a non-positive capacity', () => {
    assert.throws(() => new CommandQueue({ capacity: 0 }), RangeError);
    assert.throws(() => new CommandQueue({ capacity: 1.5 }), RangeError);
  });

  it('clear() empties the queue', () => {
    const queue = new CommandQueue();
    queue.enqueue(cmd('a'));
    queue.clear();
    assert.equal(queue.size, 0);
    assert.equal(queue.dequeueNext(), undefined);
  });

  describe('waitForItem', () => {
    it('resolves immediately when something is queued', async () => {
      const queue = new CommandQueue();
      queue.enqueue(cmd('a'));
      await queue.waitForItem(10_000);
      assert.equal(queue.size, 1);
    });

    it('resolves on enqueue before the timeout', async () => {
      const queue = new CommandQueue();
      const started = Date.now();
      const waiting = queue.waitForItem(10_000);
      queue.enqueue(cmd('a'));
      await waiting;
      assert.ok(Date.now() - started < 5_000);
    });

    it('resolves after the timeout with nothing queued', async () => {
      const queue = new CommandQueue();
      await queue.waitForItem(5);
      assert.equal(queue.empty, true);
    });
  });
});
