/**
 * Device barrel exports and factory.
 *
 * Usage:
 *   import { createDevice } from './devices';
 *   const device = createDevice(deviceConfig);
 *   device.connect();
 */

export type { DeviceProtocol, DeviceType, EncodeContext } from './protocol';
export { obsProtocol, OBS_COMMANDS } from './obs';
export type { ObsSettings } from './obs';
export { rokokoUdpProtocol, ROKOKO_UDP_COMMANDS, buildCaptureMessage } from './rokoko-udp';
export type { RokokoUdpSettings } from './rokoko-udp';
export { rokokoHttpProtocol, ROKOKO_HTTP_COMMANDS } from './rokoko-http';
export type { RokokoHttpSettings } from './rokoko-http';

import { DeviceConnection, DeviceConnectionOptions } from '../core/device-connection';
import { Clock } from '../core/types';
import { DeviceConfig } from '../config-schema';
import { EmulatedTransport } from '../transports/emulated-transport';
import { HttpRequest, HttpTransport } from '../transports/http-transport';
import { ObsRequest, ObsWebSocketTransport } from '../transports/obs-websocket-transport';
import { Transport } from '../transports/transport';
import { UdpRequest, UdpTransport } from '../transports/udp-transport';
import { ObsSettings, obsProtocol } from './obs';
import { RokokoHttpSettings, rokokoHttpProtocol } from './rokoko-http';
import { RokokoUdpSettings, rokokoUdpProtocol } from './rokoko-udp';

export type ObsDevice = DeviceConnection<ObsRequest, ObsSettings>;
export type RokokoUdpDevice = DeviceConnection<UdpRequest, RokokoUdpSettings>;
export type RokokoHttpDevice = DeviceConnection<HttpRequest, RokokoHttpSettings>;
export type Device = ObsDevice | RokokoUdpDevice | RokokoHttpDevice;

export interface CreateDeviceOptions {
  clock?: Clock;
  autoRun?: boolean;
}

type BaseOptions = Omit<DeviceConnectionOptions<unknown, unknown>, 'protocol' | 'settings' | 'createTransport'>;

function baseOptions(config: DeviceConfig, options: CreateDeviceOptions): BaseOptions {
  return {
    name: config.name,
    host: config.host,
    port: config.port,
    triggerOnStart: config.triggerOnStart,
    triggerOnStop: config.triggerOnStop,
    timing: {
      pingIntervalMs: config.timing.pingIntervalMs,
      disconnectTimeoutMs: config.timing.disconnectTimeoutMs,
      idleMs: config.timing.idleMs,
    },
    queue: config.queue,
    frameRate: config.frameRate,
    timecode: config.timecode,
    clock: options.clock,
    autoRun: options.autoRun,
  };
}

/** Replies an emulated OBS gives; everything else is a plain ok */
function emulatedObsTransport(name: string): Transport<ObsRequest> {
  let takes = 0;
  return new EmulatedTransport<ObsRequest>({
    name,
    responder: (request) => {
      switch (request.requestType) {
        case 'GetVersion':
          return { ok: true, data: { obsVersion: 'emulated', rpcVersion: 1 } };
        case 'StopRecord':
          takes++;
          return { ok: true, data: { outputPath: `emulated-take-${takes}.mkv` } };
        default:
          return { ok: true };
      }
    },
  });
}

/**
 * Create a device connection for a validated config entry.
 * Devices with `emulate: true` get an in-process transport.
 */
export function createDevice(config: DeviceConfig, options: CreateDeviceOptions = {}): Device {
  switch (config.type) {
    case 'obs':
      return new DeviceConnection<ObsRequest, ObsSettings>({
        ...baseOptions(config, options),
        protocol: obsProtocol,
        settings: { password: config.password },
        createTransport: (settings) => config.emulate
          ? emulatedObsTransport(config.name)
          : new ObsWebSocketTransport({
            host: config.host,
            port: config.port,
            password: settings.password,
            requestTimeoutMs: config.timing.requestTimeoutMs,
          }),
      });

    case 'rokoko-udp':
      return new DeviceConnection<UdpRequest, RokokoUdpSettings>({
        ...baseOptions(config, options),
        protocol: rokokoUdpProtocol,
        settings: { enterClipEditing: config.enterClipEditing, processId: config.processId },
        createTransport: () => config.emulate
          ? new EmulatedTransport<UdpRequest>({ name: config.name })
          : new UdpTransport({ host: config.host, port: config.port }),
      });

    case 'rokoko-http':
      return new DeviceConnection<HttpRequest, RokokoHttpSettings>({
        ...baseOptions(config, options),
        protocol: rokokoHttpProtocol,
        settings: { apiKey: config.apiKey, backToLive: config.backToLive },
        createTransport: () => config.emulate
          ? new EmulatedTransport<HttpRequest>({ name: config.name })
          : new HttpTransport({
            host: config.host,
            port: config.port,
            requestTimeoutMs: config.timing.requestTimeoutMs,
          }),
      });
  }
}
