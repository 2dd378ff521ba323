/**
 * Structured Logging Module
 *
 * pino-based structured logging with scoped child loggers.
 * JSON output in production, pino-pretty everywhere else.
 *
 * Scoped loggers are usually created at import time, before the CLI has
 * read its config. The root logger is built once and writes through a
 * switchable sink, so initLogger() retargets every existing logger to the
 * new output and level.
 */

import pino, { DestinationStream, Logger } from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export interface LoggerConfig {
  level?: LogLevel;
  pretty?: boolean;
  /** Write log lines here instead of stdout. */
  destination?: DestinationStream;
}

const LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

interface Sink {
  stream: DestinationStream;
  close?: () => void;
}

let sink: Sink | null = null;
let rootLogger: Logger | null = null;
const scoped: Map<string, Logger> = new Map();

const forwarder: DestinationStream = {
  write(msg: string): void {
    sink?.stream.write(msg);
  },
};

function levelFromEnv(): LogLevel | undefined {
  const raw = process.env.LOG_LEVEL;
  return LEVELS.find((level) => level === raw);
}

function openSink(config: LoggerConfig, level: LogLevel): Sink {
  if (config.destination) return { stream: config.destination };

  const pretty = config.pretty ?? process.env.NODE_ENV !== 'production';
  if (pretty && level !== 'silent') {
    const transport = pino.transport({
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss',
        ignore: 'pid,hostname',
        messageFormat: '[{module}] {msg}',
      },
    });
    return { stream: transport, close: () => transport.end() };
  }
  return { stream: pino.destination(1) };
}

/**
 * Initialize logging. Call once at startup; later calls swap the output
 * and level for every logger handed out so far.
 */
export function initLogger(config: LoggerConfig = {}): Logger {
  const level = config.level ?? levelFromEnv() ?? 'info';

  const previous = sink;
  sink = openSink(config, level);
  previous?.close?.();

  if (!rootLogger) {
    rootLogger = pino({ level }, forwarder);
  } else {
    rootLogger.level = level;
  }
  for (const logger of scoped.values()) {
    logger.level = level;
  }
  return rootLogger;
}

/**
 * Get the root logger instance, initializing it on first use.
 */
export function getRootLogger(): Logger {
  return rootLogger ?? initLogger();
}

/**
 * Get a scoped logger for a specific module. One instance per module name.
 */
export function getLogger(module: string): Logger {
  let logger = scoped.get(module);
  if (!logger) {
    logger = getRootLogger().child({ module });
    scoped.set(module, logger);
  }
  return logger;
}
