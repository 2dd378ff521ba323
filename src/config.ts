/**
 * Configuration loader
 *
 * Reads a YAML config file describing the controller and its capture
 * devices. Without a config file a single emulated OBS device is used.
 */

import * as fs from 'fs';
import * as path from 'path';
import { parse } from 'yaml';
import { ZodError } from 'zod';
import { Config, formatZodError, validateConfig } from './config-schema';
import { getLogger } from './logger';

export type { Config, DeviceConfig } from './config-schema';

const log = getLogger('Config');

export const DEFAULT_CONFIG_FILE = 'take-control.yml';

/** Validate an already-parsed config object */
export function parseConfig(data: unknown): Config {
  try {
    return validateConfig(data);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new Error(`[Config] Validation failed:\n${formatZodError(error)}`);
    }
    throw error;
  }
}

export function defaultConfig(): Config {
  return parseConfig({
    devices: [{ type: 'obs', name: 'obs', host: 'localhost', emulate: true }],
  });
}

/**
 * Load and validate config from YAML.
 */
export function loadConfig(configPath?: string): Config {
  const resolvedPath = configPath ?? path.join(process.cwd(), DEFAULT_CONFIG_FILE);

  if (!fs.existsSync(resolvedPath)) {
    log.warn({ path: resolvedPath }, 'No config file found, using a single emulated OBS device');
    return defaultConfig();
  }

  const raw = fs.readFileSync(resolvedPath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = parse(raw);
  } catch (error) {
    throw new Error(`[Config] ${resolvedPath} is not valid YAML: ${error instanceof Error ? error.message : String(error)}`);
  }

  const config = parseConfig(parsed ?? {});
  log.info({ path: resolvedPath, devices: config.devices.length }, 'Config loaded');
  return config;
}
