#!/usr/bin/env node

/**
 * Take Control
 *
 * Drives capture devices from one take controller:
 *   obs          OBS Studio (obs-websocket v5)
 *   rokoko-udp   Rokoko Studio, XML datagrams
 *   rokoko-http  Rokoko Studio Command API
 *
 * Usage:
 *   take-control                     # Use take-control.yml in current directory
 *   take-control --config ./my.yml   # Use a specific config file
 *   take-control --verbose           # Debug logging
 *   take-control --emulate           # Replace every device with an in-process emulator
 */

import * as fs from 'fs';
import * as readline from 'readline';
import { loadConfig } from './config';
import { TakeController } from './controller/take-controller';
import { createDevice } from './devices';
import { runCommand } from './commands';
import { ControlHttpServer } from './server/http-server';
import { getLogger, initLogger } from './logger';

interface CliArgs {
  configPath?: string;
  verbose: boolean;
  emulate: boolean;
}

function printBanner(): void {
  console.log('');
  console.log('  Take Control');
  console.log('  Start and stop recording on every capture device at once');
  console.log('');
}

function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { verbose: false, emulate: false };

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--config':
      case '-c':
        args.configPath = argv[++i];
        if (!args.configPath) {
          console.error('[Error] --config requires a path');
          process.exit(1);
        }
        break;
      case '--verbose':
      case '-v':
        args.verbose = true;
        break;
      case '--emulate':
        args.emulate = true;
        break;
      case '--help':
      case '-h':
        console.log('Usage: take-control [--config file] [--verbose] [--emulate]');
        process.exit(0);
      default:
        console.error(`[Error] Unknown argument: ${arg}`);
        process.exit(1);
    }
  }
  return args;
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv);

  printBanner();

  if (args.configPath && !fs.existsSync(args.configPath)) {
    console.error(`[Error] Config file not found: ${args.configPath}`);
    process.exit(1);
  }

  const config = loadConfig(args.configPath);
  initLogger({
    level: args.verbose ? 'debug' : config.logging.level,
    pretty: config.logging.pretty,
  });
  const log = getLogger('Main');

  const controller = new TakeController({
    slate: config.controller.slate,
    take: config.controller.take,
  });

  for (const deviceConf of config.devices) {
    if (args.emulate) deviceConf.emulate = true;
    const device = createDevice(deviceConf);
    controller.addDevice(device);
    const mode = deviceConf.emulate ? 'emulated' : `${deviceConf.host}:${deviceConf.port}`;
    log.info({ device: deviceConf.name, type: deviceConf.type, mode }, 'Registered device');
  }

  const httpServer = config.controller.http.enabled ? new ControlHttpServer(controller) : null;
  if (httpServer) await httpServer.start(config.controller.http.port);

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout, prompt: 'take> ' });

  let shuttingDown = false;
  const shutdown = async (): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log('\n[Main] Shutting down...');
    rl.close();
    httpServer?.stop();
    controller.disconnectAll();
    await controller.whenAllStopped();
    process.exit(0);
  };

  process.on('SIGINT', () => { void shutdown(); });
  process.on('SIGTERM', () => { void shutdown(); });

  controller.connectAll();

  rl.on('line', (line) => {
    const result = runCommand(controller, line);
    for (const out of result.output) console.log(out);
    if (result.quit) {
      void shutdown();
      return;
    }
    rl.prompt();
  });
  rl.on('close', () => { void shutdown(); });
  rl.prompt();
}

// Only run main() when this file is the entry point (not when imported for testing)
if (require.main === module) {
  main().catch((err: unknown) => {
    console.error(`[Error] ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  });
}
