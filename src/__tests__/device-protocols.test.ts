import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { CommandKind, CommandNames, QueuedCommand } from '../core/types';
import { OBS_COMMANDS, obsProtocol } from '../devices/obs';
import { EncodeContext } from '../devices/protocol';
import { ROKOKO_HTTP_COMMANDS, RokokoHttpSettings, rokokoHttpProtocol } from '../devices/rokoko-http';
import {
  ROKOKO_UDP_COMMANDS,
  RokokoUdpSettings,
  buildCaptureMessage,
  escapeXml,
  rokokoUdpProtocol,
} from '../devices/rokoko-udp';

function queued(kind: CommandKind, names: CommandNames): QueuedCommand {
  return { kind, commandName: names[kind], payload: {}, enqueuedAt: 0 };
}

function context<T>(settings: T): EncodeContext<T> {
  return { slate: 'scene12', take: 4, timecode: '01:02:03:04', frameRate: 24, settings };
}

describe('OBS protocol', () => {
  it('uses GetVersion as both probe and echo', () => {
    assert.deepEqual(obsProtocol.probe, { requestType: 'GetVersion' });
    assert.deepEqual(obsProtocol.encode(queued('echo', OBS_COMMANDS), context({ password: '' })), { requestType: 'GetVersion' });
  });

  it('encodes start and stop', () => {
    const ctx = context({ password: '' });
    assert.deepEqual(obsProtocol.encode(queued('recordStart', OBS_COMMANDS), ctx), { requestType: 'StartRecord' });
    assert.deepEqual(obsProtocol.encode(queued('recordStop', OBS_COMMANDS), ctx), { requestType: 'StopRecord' });
  });

  it('reports the output path of a stop reply', () => {
    assert.deepEqual(obsProtocol.outputPaths({ ok: true, data: { outputPath: '/captures/a.mkv' } }), ['/captures/a.mkv']);
    assert.deepEqual(obsProtocol.outputPaths({ ok: true, data: { outputPath: '' } }), []);
    assert.deepEqual(obsProtocol.outputPaths({ ok: true }), []);
  });
});

describe('Rokoko UDP protocol', () => {
  const settings: RokokoUdpSettings = { enterClipEditing: false, processId: 12345 };

  it('builds the capture XML message', () => {
    assert.equal(
      buildCaptureMessage('CaptureStart', context(settings)),
      '<CaptureStart>'
        + '<TimeCode VALUE="01:02:03:04"/>'
        + '<FrameRate VALUE="24"/>'
        + '<Name VALUE="scene12 4"/>'
        + '<SetActiveClip VALUE="false"/>'
        + '<ProcessID VALUE="12345"/>'
        + '</CaptureStart>',
    );
  });

  it('escapes attribute values', () => {
    assert.equal(escapeXml(`a&b<c>"d'`), 'a&amp;b&lt;c&gt;&quot;d&apos;');
    const message = buildCaptureMessage('CaptureStop', { ...context(settings), slate: 'R&D "wide"' });
    assert.ok(message.includes('<Name VALUE="R&amp;D &quot;wide&quot; 4"/>'));
  });

  it('sends no datagram for an echo', () => {
    assert.deepEqual(rokokoUdpProtocol.encode(queued('echo', ROKOKO_UDP_COMMANDS), context(settings)), { datagram: null });
    assert.equal(rokokoUdpProtocol.probe, undefined);
  });

  it('reflects enterClipEditing at encode time', () => {
    const request = rokokoUdpProtocol.encode(
      queued('recordStop', ROKOKO_UDP_COMMANDS),
      context({ enterClipEditing: true, processId: 7 }),
    );
    assert.equal(
      request.datagram,
      '<CaptureStop><TimeCode VALUE="01:02:03:04"/><FrameRate VALUE="24"/><Name VALUE="scene12 4"/>'
        + '<SetActiveClip VALUE="true"/><ProcessID VALUE="7"/></CaptureStop>',
    );
  });
});

describe('Rokoko HTTP protocol', () => {
  const settings: RokokoHttpSettings = { apiKey: '1234', backToLive: true };

  it('puts the API key in the path', () => {
    assert.deepEqual(rokokoHttpProtocol.encode(queued('echo', ROKOKO_HTTP_COMMANDS), context(settings)), { path: '1234/info' });
    const keyed = rokokoHttpProtocol.encode(queued('echo', ROKOKO_HTTP_COMMANDS), context({ apiKey: 'a/b c', backToLive: false }));
    assert.equal(keyed.path, 'a%2Fb%20c/info');
  });

  it('encodes start with filename and timing', () => {
    assert.deepEqual(rokokoHttpProtocol.encode(queued('recordStart', ROKOKO_HTTP_COMMANDS), context(settings)), {
      path: '1234/recording/start',
      body: { filename: 'scene12 4', time: '01:02:03:04', frame_rate: 24, back_to_live: true },
    });
  });

  it('encodes stop without a filename', () => {
    assert.deepEqual(rokokoHttpProtocol.encode(queued('recordStop', ROKOKO_HTTP_COMMANDS), context(settings)), {
      path: '1234/recording/stop',
      body: { time: '01:02:03:04', frame_rate: 24, back_to_live: true },
    });
  });
});
