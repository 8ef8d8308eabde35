/**
 * Logger
 *
 * Lightweight wrapper around a winston logger instance.
 * Each Logger is bound to a component name; level filtering goes through
 * DebugModeRegistry for per-component overrides. The winston instance is
 * resolved on every call, so loggers created at module load follow a later
 * initializeLogging().
 */

import winston from 'winston';
import { LogLevel } from './LogLevel.js';
import { shouldLog } from './DebugModeRegistry.js';

const REDACTED = '***';

/** Reference to the factory's global level getter, injected to avoid circular imports */
let globalLevelFn: () => LogLevel = () => LogLevel.INFO;

/** Values that must never appear in log output (certificate passphrases), with registration counts */
const secrets = new Map<string, number>();

/**
 * Set the global level provider function.
 * Called by LoggerFactory during initialization.
 * @internal
 */
export function setGlobalLevelProvider(fn: () => LogLevel): void {
  globalLevelFn = fn;
}

/**
 * Register a secret value to be masked in every message, metadata string and stack.
 * Empty values are ignored. The returned function ends the registration; a
 * value registered by several callers stays masked until all of them end theirs.
 */
export function registerSecret(value: string): () => void {
  if (value.length === 0) {
    return () => undefined;
  }
  secrets.set(value, (secrets.get(value) ?? 0) + 1);

  let active = true;
  return () => {
    if (!active) return;
    active = false;
    const remaining = (secrets.get(value) ?? 1) - 1;
    if (remaining > 0) {
      secrets.set(value, remaining);
    } else {
      secrets.delete(value);
    }
  };
}

export function clearSecrets(): void {
  secrets.clear();
}

export function redact(text: string): string {
  let result = text;
  for (const secret of secrets.keys()) {
    result = result.split(secret).join(REDACTED);
  }
  return result;
}

function redactMetadata(metadata: Record<string, unknown>): Record<string, unknown> {
  const clean: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(metadata)) {
    clean[key] = typeof value === 'string' ? redact(value) : value;
  }
  return clean;
}

export class Logger {
  constructor(
    private readonly component: string,
    private readonly resolveWinston: () => winston.Logger
  ) {}

  trace(message: string, metadata?: Record<string, unknown>): void {
    this.logAt(LogLevel.TRACE, 'trace', message, undefined, metadata);
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.logAt(LogLevel.DEBUG, 'debug', message, undefined, metadata);
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.logAt(LogLevel.INFO, 'info', message, undefined, metadata);
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.logAt(LogLevel.WARN, 'warn', message, undefined, metadata);
  }

  /**
   * Log an ERROR-level message; the stack of an Error cause is attached.
   */
  error(message: string, error?: unknown, metadata?: Record<string, unknown>): void {
    this.logAt(LogLevel.ERROR, 'error', message, error, metadata);
  }

  isDebugEnabled(): boolean {
    this.resolveWinston();
    return shouldLog(this.component, LogLevel.DEBUG, globalLevelFn());
  }

  isTraceEnabled(): boolean {
    this.resolveWinston();
    return shouldLog(this.component, LogLevel.TRACE, globalLevelFn());
  }

  /**
   * Create a child logger with a sub-component suffix.
   * e.g., logger.child('attempt') on component "transport" yields "transport.attempt"
   */
  child(subComponent: string): Logger {
    return new Logger(`${this.component}.${subComponent}`, this.resolveWinston);
  }

  getComponent(): string {
    return this.component;
  }

  // -- internal --

  private logAt(
    level: LogLevel,
    winstonLevel: string,
    message: string,
    error?: unknown,
    metadata?: Record<string, unknown>
  ): void {
    const winstonLogger = this.resolveWinston();
    if (!shouldLog(this.component, level, globalLevelFn())) {
      return;
    }

    const meta: Record<string, unknown> = {
      component: this.component,
      ...(metadata ? redactMetadata(metadata) : {}),
    };
    if (error instanceof Error && error.stack) {
      meta['errorStack'] = redact(error.stack);
    } else if (error !== undefined) {
      meta['errorStack'] = redact(String(error));
    }
    winstonLogger.log(winstonLevel, redact(message), meta);
  }
}
