/**
 * Response Router
 *
 * Maps a reply's command name back to the command kind it answers and
 * dispatches to the matching handler. Names come from the device
 * variant; a name outside that table is a protocol violation and is
 * thrown, never dropped.
 */

import { ProtocolViolationError } from './errors';
import { COMMAND_KINDS, CommandKind, CommandNames, Reply } from './types';

export interface ResponseHandlers {
  onEcho(reply: Reply): void;
  onRecordStarted(reply: Reply): void;
  onRecordStopped(reply: Reply): void;
}

export class ResponseRouter {
  private readonly table: Map<string, CommandKind>;

  constructor(
    private readonly device: string,
    names: CommandNames,
    private readonly handlers: ResponseHandlers,
    private readonly touch: () => void,
  ) {
    this.table = new Map();
    for (const kind of COMMAND_KINDS) {
      this.table.set(names[kind], kind);
    }
  }

  has(commandName: string): boolean {
    return this.table.has(commandName);
  }

  kindOf(commandName: string): CommandKind | undefined {
    return this.table.get(commandName);
  }

  /**
   * Route a reply. Activity is recorded before the lookup, so even a
   * violating reply counts as proof the device is alive.
   */
  route(commandName: string, reply: Reply): CommandKind {
    this.touch();

    const kind = this.table.get(commandName);
    if (kind === undefined) {
      throw new ProtocolViolationError(this.device, commandName);
    }

    switch (kind) {
      case 'echo':
        this.handlers.onEcho(reply);
        break;
      case 'recordStart':
        this.handlers.onRecordStarted(reply);
        break;
      case 'recordStop':
        this.handlers.onRecordStopped(reply);
        break;
      default: {
        const unreachable: never = kind;
        throw new ProtocolViolationError(this.device, String(unreachable));
      }
    }
    return kind;
  }
}
