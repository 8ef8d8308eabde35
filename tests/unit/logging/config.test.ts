import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { applyLoggingOverrides, getLoggingConfig, resetLoggingConfig } from '../../../src/logging/config.js';
import { LogLevel } from '../../../src/logging/LogLevel.js';

describe('LoggingConfig', () => {
  const originalEnv = { ...process.env };

  beforeEach(() => {
    delete process.env['LOG_LEVEL'];
    delete process.env['LOG_FORMAT'];
    delete process.env['LOG_FILE'];
    delete process.env['LOG_TIMESTAMP_FORMAT'];
    delete process.env['AEAT_DEBUG_COMPONENTS'];
    resetLoggingConfig();
  });

  afterEach(() => {
    process.env = { ...originalEnv };
    resetLoggingConfig();
  });

  it('should use defaults without environment variables', () => {
    expect(getLoggingConfig()).toEqual({
      logLevel: LogLevel.INFO,
      debugComponents: [],
      logFormat: 'text',
      logFile: undefined,
      timestampFormat: 'local',
    });
  });

  it('should read the environment', () => {
    process.env['LOG_LEVEL'] = 'debug';
    process.env['LOG_FORMAT'] = 'json';
    process.env['LOG_FILE'] = '/var/log/aeat/dispatch.log';
    process.env['LOG_TIMESTAMP_FORMAT'] = 'iso';
    process.env['AEAT_DEBUG_COMPONENTS'] = ' transport , credential-bridge:TRACE ,';

    expect(getLoggingConfig()).toEqual({
      logLevel: LogLevel.DEBUG,
      debugComponents: ['transport', 'credential-bridge:TRACE'],
      logFormat: 'json',
      logFile: '/var/log/aeat/dispatch.log',
      timestampFormat: 'iso',
    });
  });

  it('should fall back for unknown values', () => {
    process.env['LOG_LEVEL'] = 'VERBOSE';
    process.env['LOG_FORMAT'] = 'xml';

    const config = getLoggingConfig();

    expect(config.logLevel).toBe(LogLevel.INFO);
    expect(config.logFormat).toBe('text');
  });

  it('should cache the first read', () => {
    process.env['LOG_LEVEL'] = 'WARN';
    getLoggingConfig();
    process.env['LOG_LEVEL'] = 'ERROR';

    expect(getLoggingConfig().logLevel).toBe(LogLevel.WARN);
  });

  it('should apply overrides on top of the environment', () => {
    process.env['LOG_FORMAT'] = 'json';

    const config = applyLoggingOverrides({ logLevel: LogLevel.DEBUG, logFile: 'out/dispatch.log' });

    expect(config.logLevel).toBe(LogLevel.DEBUG);
    expect(config.logFile).toBe('out/dispatch.log');
    expect(config.logFormat).toBe('json');
    expect(getLoggingConfig()).toEqual(config);
  });
});
