/**
 * Rokoko Studio over UDP
 *
 * Start and stop travel as one XML datagram each; nothing is sent back.
 *
 *   <CaptureStart>
 *     <TimeCode VALUE="00:00:00:00"/>
 *     <FrameRate VALUE="30"/>
 *     <Name VALUE="slate 1"/>
 *     <SetActiveClip VALUE="false"/>
 *     <ProcessID VALUE="12345"/>
 *   </CaptureStart>
 *
 * There is no probe command, so echoes are acknowledged locally.
 */

import { CommandNames } from '../core/types';
import { UdpRequest } from '../transports/udp-transport';
import { DeviceProtocol, EncodeContext } from './protocol';

export const ROKOKO_UDP_DEFAULT_PORT = 14047;

export interface RokokoUdpSettings {
  /** Open the new clip for editing once capture stops */
  enterClipEditing: boolean;
  processId: number;
}

export const ROKOKO_UDP_COMMANDS: CommandNames = {
  echo: 'info',
  recordStart: 'CaptureStart',
  recordStop: 'CaptureStop',
};

export function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

export function buildCaptureMessage(commandName: string, context: EncodeContext<RokokoUdpSettings>): string {
  const field = (tag: string, value: string | number | boolean): string =>
    `<${tag} VALUE="${escapeXml(String(value))}"/>`;

  return `<${commandName}>`
    + field('TimeCode', context.timecode)
    + field('FrameRate', context.frameRate)
    + field('Name', `${context.slate} ${context.take}`)
    + field('SetActiveClip', context.settings.enterClipEditing)
    + field('ProcessID', context.settings.processId)
    + `</${commandName}>`;
}

export const rokokoUdpProtocol: DeviceProtocol<UdpRequest, RokokoUdpSettings> = {
  type: 'rokoko-udp',
  names: ROKOKO_UDP_COMMANDS,

  encode(command, context) {
    switch (command.kind) {
      case 'echo':
        return { datagram: null };
      case 'recordStart':
      case 'recordStop':
        return { datagram: buildCaptureMessage(command.commandName, context) };
    }
  },

  outputPaths(): string[] {
    return [];
  },
};
