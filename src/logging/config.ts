/**
 * Logging Configuration
 *
 * Configuration derived from environment variables, cached after first read.
 * CLI flags are applied on top through applyLoggingOverrides().
 */

import { LogLevel, parseLogLevel } from './LogLevel.js';

export interface LoggingConfiguration {
  /** Minimum log level (LOG_LEVEL env, default INFO) */
  logLevel: LogLevel;
  /** Components to enable debug logging for (AEAT_DEBUG_COMPONENTS env, comma-separated) */
  debugComponents: string[];
  /** Log output format (LOG_FORMAT env, default 'text') */
  logFormat: 'text' | 'json';
  /** Optional file path to write logs to (LOG_FILE env) */
  logFile?: string;
  /** Timestamp format: 'local' is yyyy-MM-dd HH:mm:ss,SSS, 'iso' uses ISO-8601 (LOG_TIMESTAMP_FORMAT env) */
  timestampFormat: 'local' | 'iso';
}

let cachedConfig: LoggingConfiguration | null = null;

function parseFormat(value: string | undefined): 'text' | 'json' {
  if (value === 'json') return 'json';
  return 'text';
}

function parseTimestampFormat(value: string | undefined): 'local' | 'iso' {
  if (value === 'iso') return 'iso';
  return 'local';
}

function parseDebugComponents(value: string | undefined): string[] {
  if (!value || value.trim() === '') return [];
  return value
    .split(',')
    .map((c) => c.trim())
    .filter((c) => c.length > 0);
}

/**
 * Get the current logging configuration.
 * Cached after the first call; use resetLoggingConfig() in tests.
 */
export function getLoggingConfig(): LoggingConfiguration {
  if (cachedConfig) return cachedConfig;

  cachedConfig = {
    logLevel: parseLogLevel(process.env['LOG_LEVEL'] ?? 'INFO'),
    debugComponents: parseDebugComponents(process.env['AEAT_DEBUG_COMPONENTS']),
    logFormat: parseFormat(process.env['LOG_FORMAT']),
    logFile: process.env['LOG_FILE'] || undefined,
    timestampFormat: parseTimestampFormat(process.env['LOG_TIMESTAMP_FORMAT']),
  };

  return cachedConfig;
}

/**
 * Override parts of the environment-derived configuration (CLI flags).
 */
export function applyLoggingOverrides(overrides: Partial<LoggingConfiguration>): LoggingConfiguration {
  const next: LoggingConfiguration = { ...getLoggingConfig() };
  if (overrides.logLevel !== undefined) next.logLevel = overrides.logLevel;
  if (overrides.debugComponents !== undefined) next.debugComponents = overrides.debugComponents;
  if (overrides.logFormat !== undefined) next.logFormat = overrides.logFormat;
  if (overrides.logFile !== undefined) next.logFile = overrides.logFile;
  if (overrides.timestampFormat !== undefined) next.timestampFormat = overrides.timestampFormat;
  cachedConfig = next;
  return next;
}

/**
 * Reset cached configuration (for testing)
 */
export function resetLoggingConfig(): void {
  cachedConfig = null;
}
