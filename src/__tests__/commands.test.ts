import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert/strict';
import { HELP_LINES, runCommand } from '../commands';
import { parseConfig } from '../config';
import { TakeController } from '../controller/take-controller';
import { Device, createDevice } from '../devices';

describe('runCommand', () => {
  let controller: TakeController;
  let cam: Device;

  beforeEach(async () => {
    const config = parseConfig({ devices: [{ type: 'rokoko-udp', name: 'suit', emulate: true }] });
    cam = createDevice(config.devices[0], { autoRun: false });
    controller = new TakeController({ slate: 'scene1', take: 1 });
    controller.addDevice(cam);
    cam.connect();
    await cam.worker?.connect();
  });

  it('ignores blank lines', () => {
    assert.deepEqual(runCommand(controller, '   '), { output: [] });
  });

  it('starts and stops a take', () => {
    assert.deepEqual(runCommand(controller, 'start close up'), { output: ['Started scene1 take 1 on [suit]'] });
    assert.deepEqual(cam.pendingCommands[0].payload, { description: 'close up' });
    assert.deepEqual(runCommand(controller, 'STOP'), { output: ['Stopped scene1 take 1 on [suit]'] });
    assert.equal(controller.take, 2);
  });

  it('sets slate and take', () => {
    assert.deepEqual(runCommand(controller, 'slate scene 4'), { output: ['Slate set to "scene 4"'] });
    assert.equal(cam.slate, 'scene 4');
    assert.deepEqual(runCommand(controller, 'take 5'), { output: ['Take set to 5'] });
    assert.equal(cam.take, 5);
    assert.deepEqual(runCommand(controller, 'take zero'), { output: ['Usage: take <n> (positive integer)'] });
  });

  it('toggles a trigger', () => {
    assert.deepEqual(runCommand(controller, 'trigger suit start off'), { output: ['suit: start trigger off'] });
    assert.equal(cam.triggerOnStart, false);
    assert.deepEqual(runCommand(controller, 'trigger suit start maybe'), { output: ['Usage: trigger <device> <start|stop> <on|off>'] });
    assert.deepEqual(runCommand(controller, 'trigger ghost stop on'), { output: ['Unknown device: ghost'] });
  });

  it('disconnects a single device', () => {
    assert.deepEqual(runCommand(controller, 'disconnect suit'), { output: ['Disconnecting suit'] });
    assert.equal(cam.status, 'disconnected');
    assert.deepEqual(runCommand(controller, 'connect ghost'), { output: ['Unknown device: ghost'] });
  });

  it('prints status', () => {
    assert.deepEqual(runCommand(controller, 'status'), {
      output: [
        'slate "scene1" take 1',
        '  suit             rokoko-udp   ready        SE queue=0',
      ],
    });
  });

  it('lists help and quits', () => {
    assert.deepEqual(runCommand(controller, 'help'), { output: HELP_LINES });
    assert.deepEqual(runCommand(controller, 'quit'), { output: [], quit: true });
    assert.deepEqual(runCommand(controller, 'dance'), { output: ['Unknown command: dance (try "help")'] });
  });
});
