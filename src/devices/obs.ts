/**
 * OBS Studio (obs-websocket v5)
 *
 *   info        GetVersion (also the handshake probe)
 *   StartRecord
 *   StopRecord  reply carries outputPath
 */

import { CommandNames, Reply } from '../core/types';
import { ObsRequest } from '../transports/obs-websocket-transport';
import { DeviceProtocol } from './protocol';

export const OBS_DEFAULT_PORT = 4455;

export interface ObsSettings {
  password: string;
}

export const OBS_COMMANDS: CommandNames = {
  echo: 'info',
  recordStart: 'StartRecord',
  recordStop: 'StopRecord',
};

export const obsProtocol: DeviceProtocol<ObsRequest, ObsSettings> = {
  type: 'obs',
  names: OBS_COMMANDS,
  probe: { requestType: 'GetVersion' },

  encode(command) {
    switch (command.kind) {
      case 'echo':
        return { requestType: 'GetVersion' };
      case 'recordStart':
        return { requestType: 'StartRecord' };
      case 'recordStop':
        return { requestType: 'StopRecord' };
    }
  },

  outputPaths(reply: Reply): string[] {
    const outputPath = reply.data?.outputPath;
    return typeof outputPath === 'string' && outputPath.length > 0 ? [outputPath] : [];
  },
};
