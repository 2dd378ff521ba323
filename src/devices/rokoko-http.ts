/**
 * Rokoko Studio Command API (HTTP)
 *
 *   POST /v1/{apiKey}/info
 *   POST /v1/{apiKey}/recording/start  { filename, time, frame_rate, back_to_live }
 *   POST /v1/{apiKey}/recording/stop   { time, frame_rate, back_to_live }
 */

import { CommandNames } from '../core/types';
import { HttpRequest } from '../transports/http-transport';
import { DeviceProtocol } from './protocol';

export const ROKOKO_HTTP_DEFAULT_PORT = 14053;
export const ROKOKO_HTTP_DEFAULT_API_KEY = '1234';

export interface RokokoHttpSettings {
  apiKey: string;
  /** Return Studio to the live view once a capture stops */
  backToLive: boolean;
}

export const ROKOKO_HTTP_COMMANDS: CommandNames = {
  echo: 'info',
  recordStart: 'recording/start',
  recordStop: 'recording/stop',
};

export const rokokoHttpProtocol: DeviceProtocol<HttpRequest, RokokoHttpSettings> = {
  type: 'rokoko-http',
  names: ROKOKO_HTTP_COMMANDS,

  encode(command, context) {
    const path = `${encodeURIComponent(context.settings.apiKey)}/${command.commandName}`;
    switch (command.kind) {
      case 'echo':
        return { path };
      case 'recordStart':
        return {
          path,
          body: {
            filename: `${context.slate} ${context.take}`,
            time: context.timecode,
            frame_rate: context.frameRate,
            back_to_live: context.settings.backToLive,
          },
        };
      case 'recordStop':
        return {
          path,
          body: {
            time: context.timecode,
            frame_rate: context.frameRate,
            back_to_live: context.settings.backToLive,
          },
        };
    }
  },

  outputPaths(): string[] {
    return [];
  },
};
