/**
 * Logger Factory
 *
 * Central factory for creating and managing Logger instances.
 * Initializes the root winston logger and caches per-component Logger wrappers.
 *
 * Usage:
 *   import { getLogger, initializeLogging } from '../logging/index.js';
 *
 *   // At startup (optional, lazy-init with defaults if skipped):
 *   initializeLogging();
 *
 *   // In any module:
 *   const logger = getLogger('my-component');
 *   logger.info('Envelope built');
 */

import fs from 'fs';
import path from 'path';
import winston from 'winston';
import { LogLevel } from './LogLevel.js';
import { getLoggingConfig } from './config.js';
import { initFromEnv } from './DebugModeRegistry.js';
import { Logger, setGlobalLevelProvider } from './Logger.js';
import { ConsoleTransport, FileTransport } from './transports.js';
import type { LogTransport } from './transports.js';

/**
 * winston uses LOWER numbers for HIGHER priority:
 * error=0 (highest), trace=4 (lowest)
 */
const WINSTON_LEVELS: Record<string, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4,
};

function toWinstonLevel(level: LogLevel): string {
  switch (level) {
    case LogLevel.ERROR:
      return 'error';
    case LogLevel.WARN:
      return 'warn';
    case LogLevel.INFO:
      return 'info';
    case LogLevel.DEBUG:
      return 'debug';
    case LogLevel.TRACE:
      return 'trace';
    default:
      return 'info';
  }
}

let rootLogger: winston.Logger | null = null;
let currentGlobalLevel: LogLevel = LogLevel.INFO;
const loggerCache = new Map<string, Logger>();

/**
 * Initialize the logging subsystem.
 * If getLogger() is called before this, it lazy-initializes with defaults
 * (console transport, INFO level).
 */
export function initializeLogging(additionalTransports?: LogTransport[]): winston.Logger {
  const config = getLoggingConfig();

  currentGlobalLevel = config.logLevel;

  const transports: winston.transport[] = [];

  transports.push(new ConsoleTransport(config.logFormat, config.timestampFormat).createWinstonTransport());

  if (config.logFile) {
    fs.mkdirSync(path.dirname(path.resolve(config.logFile)), { recursive: true });
    transports.push(new FileTransport(config.logFile, config.logFormat).createWinstonTransport());
  }

  if (additionalTransports) {
    for (const t of additionalTransports) {
      transports.push(t.createWinstonTransport());
    }
  }

  if (rootLogger) {
    rootLogger.close();
  }

  // Every level is passed through; filtering happens per component in Logger
  const logger = winston.createLogger({
    levels: WINSTON_LEVELS,
    level: 'trace',
    transports,
    exitOnError: false,
  });
  rootLogger = logger;

  setGlobalLevelProvider(() => currentGlobalLevel);

  initFromEnv(config.debugComponents);

  return logger;
}

function ensureInitialized(): winston.Logger {
  return rootLogger ?? initializeLogging();
}

/**
 * Get (or create) a Logger for a named component.
 * Loggers are cached by component name.
 */
export function getLogger(component: string): Logger {
  const cached = loggerCache.get(component);
  if (cached) return cached;

  const logger = new Logger(component, ensureInitialized);
  loggerCache.set(component, logger);
  return logger;
}

/**
 * Change the global log level at runtime.
 * Affects all loggers that don't have a per-component override.
 */
export function setGlobalLevel(level: LogLevel): void {
  currentGlobalLevel = level;
}

export function getGlobalLevel(): LogLevel {
  return currentGlobalLevel;
}

/**
 * Flush pending writes and close all transports.
 */
export async function shutdownLogging(): Promise<void> {
  const logger = rootLogger;
  if (!logger) return;
  rootLogger = null;
  await new Promise<void>((resolve) => {
    logger.on('finish', () => resolve());
    logger.end();
  });
}

/**
 * Reset all logging state (for testing).
 */
export function resetLogging(): void {
  if (rootLogger) {
    rootLogger.close();
  }
  rootLogger = null;
  currentGlobalLevel = LogLevel.INFO;
  loggerCache.clear();
  setGlobalLevelProvider(() => LogLevel.INFO);
}
