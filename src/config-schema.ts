/**
 * Config Schema Validation
 *
 * Zod schemas for the take controller configuration.
 */

import { z } from 'zod';
import { OBS_DEFAULT_PORT } from './devices/obs';
import { ROKOKO_UDP_DEFAULT_PORT } from './devices/rokoko-udp';
import { ROKOKO_HTTP_DEFAULT_API_KEY, ROKOKO_HTTP_DEFAULT_PORT } from './devices/rokoko-http';

// --- Reusable Validators ---

const portSchema = z.number().int().min(1).max(65535);

const hostSchema = z.string().min(1).refine(
  (val) => {
    const ipv4 = /^(\d{1,3}\.){3}\d{1,3}$/;
    const hostname = /^[a-zA-Z0-9]([a-zA-Z0-9-]*[a-zA-Z0-9])?(\.[a-zA-Z0-9]([a-zA-Z0-9-]*[a-zA-Z0-9])?)*$/;
    return val === 'localhost' || ipv4.test(val) || hostname.test(val);
  },
  { message: 'Invalid host: must be IP address or hostname' }
);

const nameSchema = z.string().min(1).regex(
  /^[a-zA-Z0-9_-]+$/,
  'Device name must contain only alphanumeric characters, underscores, or hyphens'
);

const timecodeSchema = z.string().regex(/^\d{2}:\d{2}:\d{2}[:;]\d{2}$/, 'Timecode must look like HH:MM:SS:FF');

// --- Timing & Queue ---

const timingSchema = z.object({
  pingIntervalMs: z.number().int().min(10).default(1000),
  disconnectTimeoutMs: z.number().int().min(20).default(3000),
  idleMs: z.number().int().min(1).max(1000).default(10),
  requestTimeoutMs: z.number().int().min(100).default(5000),
}).refine(
  (t) => t.disconnectTimeoutMs > t.pingIntervalMs,
  { message: 'disconnectTimeoutMs must be greater than pingIntervalMs' }
);

const queueSchema = z.object({
  capacity: z.number().int().min(1).max(10000).default(64),
  overflow: z.enum(['reject', 'drop-oldest']).default('reject'),
  order: z.enum(['fifo', 'lifo']).default('fifo'),
});

// --- Devices ---

const baseDeviceSchema = z.object({
  name: nameSchema,
  host: hostSchema.default('localhost'),
  triggerOnStart: z.boolean().default(true),
  triggerOnStop: z.boolean().default(true),
  emulate: z.boolean().default(false),
  frameRate: z.number().positive().default(30),
  timecode: timecodeSchema.default('00:00:00:00'),
  timing: timingSchema.default({}),
  queue: queueSchema.default({}),
});

const obsDeviceSchema = baseDeviceSchema.extend({
  type: z.literal('obs'),
  port: portSchema.default(OBS_DEFAULT_PORT),
  password: z.string().default(''),
});

const rokokoUdpDeviceSchema = baseDeviceSchema.extend({
  type: z.literal('rokoko-udp'),
  port: portSchema.default(ROKOKO_UDP_DEFAULT_PORT),
  enterClipEditing: z.boolean().default(false),
  processId: z.number().int().min(0).default(12345),
});

const rokokoHttpDeviceSchema = baseDeviceSchema.extend({
  type: z.literal('rokoko-http'),
  port: portSchema.default(ROKOKO_HTTP_DEFAULT_PORT),
  apiKey: z.string().min(1).default(ROKOKO_HTTP_DEFAULT_API_KEY),
  backToLive: z.boolean().default(false),
});

export const deviceSchema = z.discriminatedUnion('type', [
  obsDeviceSchema,
  rokokoUdpDeviceSchema,
  rokokoHttpDeviceSchema,
]);

// --- Logging ---

const loggingConfigSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).optional(),
  pretty: z.boolean().optional(),
});

// --- Controller ---

const controllerConfigSchema = z.object({
  slate: z.string().min(1).default('slate'),
  take: z.number().int().min(1).default(1),
  http: z.object({
    enabled: z.boolean().default(false),
    port: portSchema.default(8080),
  }).default({}),
});

// --- Full Config Schema ---

export const configSchema = z.object({
  logging: loggingConfigSchema.default({}),
  controller: controllerConfigSchema.default({}),
  devices: z.array(deviceSchema).min(1),
}).refine(
  (config) => {
    const names = config.devices.map((d) => d.name.toLowerCase());
    return new Set(names).size === names.length;
  },
  { message: 'Duplicate device name detected', path: ['devices'] }
);

// --- Type Exports ---

export type ConfigInput = z.input<typeof configSchema>;
export type Config = z.output<typeof configSchema>;
export type DeviceConfig = z.output<typeof deviceSchema>;
export type ObsDeviceConfig = z.output<typeof obsDeviceSchema>;
export type RokokoUdpDeviceConfig = z.output<typeof rokokoUdpDeviceSchema>;
export type RokokoHttpDeviceConfig = z.output<typeof rokokoHttpDeviceSchema>;

export function validateConfig(data: unknown): Config {
  return configSchema.parse(data);
}

/**
 * Format Zod errors into readable messages
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : 'config';
    return `  - ${path}: ${issue.message}`;
  }).join('\n');
}
