/**
 * Logging Transports
 *
 * Winston transport wrappers. Console output goes to stderr so that stdout
 * stays free for anything a caller pipes; file output rotates at 10 MB.
 */

import winston from 'winston';

const ALL_LEVELS = ['error', 'warn', 'info', 'debug', 'trace'];

/**
 * Interface for pluggable log transports.
 */
export interface LogTransport {
  name: string;
  createWinstonTransport(): winston.transport;
}

/**
 * Format a Date as yyyy-MM-dd HH:mm:ss,SSS in local time
 */
export function formatLocalTimestamp(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  const hours = String(date.getHours()).padStart(2, '0');
  const minutes = String(date.getMinutes()).padStart(2, '0');
  const seconds = String(date.getSeconds()).padStart(2, '0');
  const millis = String(date.getMilliseconds()).padStart(3, '0');
  return `${year}-${month}-${day} ${hours}:${minutes}:${seconds},${millis}`;
}

/**
 * Render one log line:
 * INFO  2026-02-10 14:30:15,042 [transport] Response received
 */
export function formatTextLine(
  info: { level: string; message: unknown; [key: string]: unknown },
  timestamp: string
): string {
  const level = info.level.toUpperCase().padEnd(5);
  const component = info['component'];
  const componentPart = typeof component === 'string' ? ` [${component}]` : '';
  let line = `${level} ${timestamp}${componentPart} ${String(info.message)}`;
  const errorStack = info['errorStack'];
  if (typeof errorStack === 'string') {
    line += '\n' + errorStack;
  }
  return line;
}

function buildTextFormat(timestampFormat: 'local' | 'iso'): winston.Logform.Format {
  return winston.format.printf((info) => {
    const now = new Date();
    const timestamp = timestampFormat === 'iso' ? now.toISOString() : formatLocalTimestamp(now);
    return formatTextLine(info, timestamp);
  });
}

function buildJsonFormat(): winston.Logform.Format {
  return winston.format.combine(winston.format.timestamp(), winston.format.json());
}

/**
 * Console transport: every level goes to stderr.
 */
export class ConsoleTransport implements LogTransport {
  name = 'console';

  constructor(
    private format: 'text' | 'json',
    private timestampFormat: 'local' | 'iso'
  ) {}

  createWinstonTransport(): winston.transport {
    return new winston.transports.Console({
      format: this.format === 'json' ? buildJsonFormat() : buildTextFormat(this.timestampFormat),
      stderrLevels: ALL_LEVELS,
    });
  }
}

/**
 * File transport: rotates at 10 MB, keeping 5 files.
 */
export class FileTransport implements LogTransport {
  name = 'file';

  constructor(
    private filePath: string,
    private format: 'text' | 'json'
  ) {}

  createWinstonTransport(): winston.transport {
    return new winston.transports.File({
      filename: this.filePath,
      format: this.format === 'json' ? buildJsonFormat() : buildTextFormat('local'),
      maxsize: 10 * 1024 * 1024,
      maxFiles: 5,
      tailable: true,
    });
  }
}
