/**
 * Take Controller
 *
 * Session-level orchestrator for a set of capture devices. Owns the
 * current slate and take, fans start/stop out to every device and
 * relays device notifications with the device name attached.
 *
 * Events:
 *   'deviceConnected'      (name)
 *   'deviceDisconnected'   (name, event: DisconnectEvent)
 *   'recordStartConfirmed' (name, event: RecordStartConfirmed)
 *   'recordStopConfirmed'  (name, event: RecordStopConfirmed)
 *   'deviceError'          (name, err: Error)
 *
 * Device failures never surface as exceptions from this class.
 */

import { EventEmitter } from 'events';
import { DeviceSnapshot } from '../core/device-connection';
import { DisconnectEvent, RecordStartConfirmed, RecordStopConfirmed } from '../core/types';
import { Device } from '../devices';
import { getLogger } from '../logger';

const log = getLogger('Controller');

export type TriggerKind = 'start' | 'stop';

export interface TakeControllerOptions {
  slate?: string;
  take?: number;
}

export interface TakeResult {
  slate: string;
  take: number;
  /** Devices a command was queued for */
  triggered: string[];
  /** Devices skipped because they are disconnected or the trigger is off */
  skipped: string[];
}

export interface ControllerStatus {
  slate: string;
  take: number;
  recording: boolean;
  devices: DeviceSnapshot[];
}

export class TakeController extends EventEmitter {
  private devices: Map<string, Device> = new Map();
  private _slate: string;
  private _take: number;
  private _recording = false;

  constructor(options: TakeControllerOptions = {}) {
    super();
    this._slate = options.slate ?? 'slate';
    this._take = options.take ?? 1;
  }

  get slate(): string {
    return this._slate;
  }

  get take(): number {
    return this._take;
  }

  /** Whether a take is in progress from the controller's point of view */
  get recording(): boolean {
    return this._recording;
  }

  /** Register a device */
  addDevice(device: Device): void {
    const key = device.name.toLowerCase();
    if (this.devices.has(key)) {
      throw new Error(`Duplicate device name: ${device.name}`);
    }
    this.devices.set(key, device);

    device.on('connected', () => {
      log.info({ device: device.name }, 'Device connected');
      this.emit('deviceConnected', device.name);
    });

    device.on('disconnected', (event: DisconnectEvent) => {
      const logged = { device: device.name, reason: event.reason, error: event.error?.message };
      if (event.reason === 'requested') {
        log.info(logged, 'Device disconnected');
      } else {
        log.warn(logged, 'Device lost');
      }
      this.emit('deviceDisconnected', device.name, event);
    });

    device.on('recordStartConfirmed', (event: RecordStartConfirmed) => {
      log.info({ device: device.name, timecode: event.timecode }, 'Record start confirmed');
      this.emit('recordStartConfirmed', device.name, event);
    });

    device.on('recordStopConfirmed', (event: RecordStopConfirmed) => {
      log.info({ device: device.name, timecode: event.timecode, paths: event.paths }, 'Record stop confirmed');
      this.emit('recordStopConfirmed', device.name, event);
    });

    device.on('queueOverflow', () => {
      log.warn({ device: device.name, queued: device.queueSize }, 'Device command queue overflow');
    });

    device.on('error', (err: Error) => {
      log.fatal({ device: device.name, error: err.message }, 'Device error');
      this.emit('deviceError', device.name, err);
    });

    log.debug({ device: device.name, type: device.type }, 'Registered device');
  }

  getDevice(name: string): Device | undefined {
    return this.devices.get(name.toLowerCase());
  }

  getDevices(): Device[] {
    return Array.from(this.devices.values());
  }

  connectAll(): void {
    for (const device of this.devices.values()) {
      device.connect();
    }
  }

  disconnectAll(): void {
    for (const device of this.devices.values()) {
      device.disconnect();
    }
  }

  /** Resolves once every device worker has exited */
  async whenAllStopped(): Promise<void> {
    await Promise.all(this.getDevices().map((device) => device.whenStopped()));
  }

  setSlate(slate: string): void {
    this._slate = slate;
    for (const device of this.devices.values()) {
      device.setSlate(slate);
    }
  }

  setTake(take: number): void {
    if (!Number.isInteger(take) || take < 1) {
      throw new RangeError(`Take must be a positive integer, got ${take}`);
    }
    this._take = take;
    for (const device of this.devices.values()) {
      device.setTake(take);
    }
  }

  /** Toggle a device's start or stop trigger. Returns false for unknown devices. */
  setTrigger(name: string, kind: TriggerKind, enabled: boolean): boolean {
    const device = this.getDevice(name);
    if (!device) return false;
    if (kind === 'start') {
      device.triggerOnStart = enabled;
    } else {
      device.triggerOnStop = enabled;
    }
    log.info({ device: device.name, trigger: kind, enabled }, 'Trigger changed');
    return true;
  }

  /** Start recording the current slate/take on every device */
  startTake(description = ''): TakeResult {
    const result: TakeResult = { slate: this._slate, take: this._take, triggered: [], skipped: [] };
    for (const device of this.devices.values()) {
      if (device.recordStart(this._slate, this._take, description)) {
        result.triggered.push(device.name);
      } else {
        result.skipped.push(device.name);
      }
    }
    if (result.triggered.length > 0) this._recording = true;
    log.info({ slate: result.slate, take: result.take, triggered: result.triggered, skipped: result.skipped }, 'Take started');
    return result;
  }

  /** Stop recording on every device and advance to the next take */
  stopTake(): TakeResult {
    const result: TakeResult = { slate: this._slate, take: this._take, triggered: [], skipped: [] };
    for (const device of this.devices.values()) {
      if (device.recordStop()) {
        result.triggered.push(device.name);
      } else {
        result.skipped.push(device.name);
      }
    }
    if (this._recording) {
      this._recording = false;
      this.setTake(this._take + 1);
    }
    log.info({ slate: result.slate, take: result.take, triggered: result.triggered, skipped: result.skipped }, 'Take stopped');
    return result;
  }

  getStatus(): ControllerStatus {
    return {
      slate: this._slate,
      take: this._take,
      recording: this._recording,
      devices: this.getDevices().map((device) => device.snapshot()),
    };
  }
}
