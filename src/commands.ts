/**
 * Interactive console commands
 *
 *   start [description]   start a take on every device
 *   stop                  stop the take and advance the take number
 *   slate <name>          set the slate
 *   take <n>              set the take number
 *   trigger <device> <start|stop> <on|off>
 *   connect [device]      connect one device, or all
 *   disconnect [device]   disconnect one device, or all
 *   status                print controller and device state
 *   help                  list commands
 */

import { TakeController } from './controller/take-controller';

export interface CommandResult {
  output: string[];
  quit?: boolean;
}

export const HELP_LINES = [
  'start [description]   start a take on every device',
  'stop                  stop the take and advance the take number',
  'slate <name>          set the slate',
  'take <n>              set the take number',
  'trigger <device> <start|stop> <on|off>',
  'connect [device]      connect one device, or all',
  'disconnect [device]   disconnect one device, or all',
  'status                print controller and device state',
  'quit                  disconnect and exit',
];

function formatStatus(controller: TakeController): string[] {
  const status = controller.getStatus();
  const lines = [`slate "${status.slate}" take ${status.take}${status.recording ? ' (recording)' : ''}`];
  for (const device of status.devices) {
    const triggers = `${device.triggerOnStart ? 'S' : '-'}${device.triggerOnStop ? 'E' : '-'}`;
    lines.push(
      `  ${device.name.padEnd(16)} ${device.type.padEnd(12)} ${device.status.padEnd(12)} `
      + `${triggers} queue=${device.queueSize}${device.recording ? ' REC' : ''}`,
    );
  }
  return lines;
}

/** Execute one console line against the controller */
export function runCommand(controller: TakeController, line: string): CommandResult {
  const [cmd, ...args] = line.trim().split(/\s+/).filter(Boolean);
  if (!cmd) return { output: [] };

  switch (cmd.toLowerCase()) {
    case 'start': {
      const result = controller.startTake(args.join(' '));
      return { output: [`Started ${result.slate} take ${result.take} on [${result.triggered.join(', ')}]`] };
    }

    case 'stop': {
      const result = controller.stopTake();
      return { output: [`Stopped ${result.slate} take ${result.take} on [${result.triggered.join(', ')}]`] };
    }

    case 'slate': {
      const name = args.join(' ');
      if (!name) return { output: ['Usage: slate <name>'] };
      controller.setSlate(name);
      return { output: [`Slate set to "${name}"`] };
    }

    case 'take': {
      const take = Number(args[0]);
      if (!Number.isInteger(take) || take < 1) return { output: ['Usage: take <n> (positive integer)'] };
      controller.setTake(take);
      return { output: [`Take set to ${take}`] };
    }

    case 'trigger': {
      const [name, kind, state] = args;
      if (!name || (kind !== 'start' && kind !== 'stop') || (state !== 'on' && state !== 'off')) {
        return { output: ['Usage: trigger <device> <start|stop> <on|off>'] };
      }
      if (!controller.setTrigger(name, kind, state === 'on')) {
        return { output: [`Unknown device: ${name}`] };
      }
      return { output: [`${name}: ${kind} trigger ${state}`] };
    }

    case 'connect':
    case 'disconnect': {
      const connecting = cmd.toLowerCase() === 'connect';
      const name = args[0];
      if (!name) {
        if (connecting) controller.connectAll();
        else controller.disconnectAll();
        return { output: [connecting ? 'Connecting all devices' : 'Disconnecting all devices'] };
      }
      const device = controller.getDevice(name);
      if (!device) return { output: [`Unknown device: ${name}`] };
      if (connecting) device.connect();
      else device.disconnect();
      return { output: [`${connecting ? 'Connecting' : 'Disconnecting'} ${device.name}`] };
    }

    case 'status':
      return { output: formatStatus(controller) };

    case 'help':
      return { output: HELP_LINES };

    case 'quit':
    case 'exit':
      return { output: [], quit: true };

    default:
      return { output: [`Unknown command: ${cmd} (try "help")`] };
  }
}
