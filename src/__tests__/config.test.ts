import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { defaultConfig, loadConfig, parseConfig } from '../config';

describe('parseConfig', () => {
  it('fills in device defaults per type', () => {
    const config = parseConfig({
      devices: [
        { type: 'obs', name: 'obs' },
        { type: 'rokoko-udp', name: 'suit', host: '192.168.1.20' },
        { type: 'rokoko-http', name: 'studio' },
      ],
    });

    const [obs, udp, http] = config.devices;
    assert.equal(obs.type, 'obs');
    assert.equal(obs.host, 'localhost');
    assert.equal(obs.port, 4455);
    assert.equal(obs.triggerOnStart, true);
    assert.equal(obs.emulate, false);
    assert.deepEqual(obs.timing, { pingIntervalMs: 1000, disconnectTimeoutMs: 3000, idleMs: 10, requestTimeoutMs: 5000 });
    assert.deepEqual(obs.queue, { capacity: 64, overflow: 'reject', order: 'fifo' });
    if (obs.type === 'obs') assert.equal(obs.password, '');

    assert.equal(udp.port, 14047);
    if (udp.type === 'rokoko-udp') {
      assert.equal(udp.processId, 12345);
      assert.equal(udp.enterClipEditing, false);
    }

    assert.equal(http.port, 14053);
    if (http.type === 'rokoko-http') {
      assert.equal(http.apiKey, '1234');
      assert.equal(http.backToLive, false);
    }
  });

  it('fills in controller and logging defaults', () => {
    const config = parseConfig({ devices: [{ type: 'obs', name: 'obs' }] });
    assert.deepEqual(config.controller, { slate: 'slate', take: 1, http: { enabled: false, port: 8080 } });
    assert.deepEqual(config.logging, {});
  });

  it('requires at least one device', () => {
    assert.throws(() => parseConfig({ devices: [] }), /\[Config\] Validation failed:\n {2}- devices: /);
  });

  it('rejects an unknown device type', () => {
    assert.throws(() => parseConfig({ devices: [{ type: 'vicon', name: 'mocap' }] }), /devices\.0\.type/);
  });

  it('rejects a disconnect timeout that does not exceed the ping interval', () => {
    assert.throws(
      () => parseConfig({ devices: [{ type: 'obs', name: 'obs', timing: { pingIntervalMs: 2000, disconnectTimeoutMs: 2000 } }] }),
      (err: unknown) => {
        assert.ok(err instanceof Error);
        assert.equal(
          err.message,
          '[Config] Validation failed:\n  - devices.0.timing: disconnectTimeoutMs must be greater than pingIntervalMs',
        );
        return true;
      },
    );
  });

  it('rejects duplicate device names regardless of case', () => {
    assert.throws(
      () => parseConfig({ devices: [{ type: 'obs', name: 'Cam' }, { type: 'rokoko-udp', name: 'cam' }] }),
      /devices: Duplicate device name detected/,
    );
  });

  it('rejects names with spaces', () => {
    assert.throws(() => parseConfig({ devices: [{ type: 'obs', name: 'main cam' }] }), /devices\.0\.name/);
  });
});

describe('defaultConfig', () => {
  it('is a single emulated OBS device', () => {
    const config = defaultConfig();
    assert.equal(config.devices.length, 1);
    assert.equal(config.devices[0].type, 'obs');
    assert.equal(config.devices[0].name, 'obs');
    assert.equal(config.devices[0].emulate, true);
  });
});

describe('loadConfig', () => {
  let dir: string;

  before(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'take-control-'));
  });

  after(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('reads and validates a YAML file', () => {
    const file = path.join(dir, 'take-control.yml');
    fs.writeFileSync(file, [
      'controller:',
      '  slate: scene12',
      '  take: 3',
      'devices:',
      '  - name: studio',
      '    type: rokoko-http',
      '    host: 192.168.1.20',
      '    apiKey: test-secret',
      '    queue:',
      '      overflow: drop-oldest',
      '',
    ].join('\n'));

    const config = loadConfig(file);
    assert.equal(config.controller.slate, 'scene12');
    assert.equal(config.controller.take, 3);
    const [device] = config.devices;
    assert.equal(device.type, 'rokoko-http');
    assert.equal(device.host, '192.168.1.20');
    assert.deepEqual(device.queue, { capacity: 64, overflow: 'drop-oldest', order: 'fifo' });
    if (device.type === 'rokoko-http') assert.equal(device.apiKey, 'test-secret');
  });

  it('falls back to the default config when the file is missing', () => {
    const config = loadConfig(path.join(dir, 'missing.yml'));
    assert.deepEqual(config, defaultConfig());
  });

  it('reports invalid YAML', () => {
    const file = path.join(dir, 'broken.yml');
    fs.writeFileSync(file, 'devices: [\n');
    assert.throws(() => loadConfig(file), /is not valid YAML/);
  });

  it('reports an empty file as a validation error', () => {
    const file = path.join(dir, 'empty.yml');
    fs.writeFileSync(file, '');
    assert.throws(() => loadConfig(file), /\[Config\] Validation failed/);
  });
});
