import { describe, it, expect, afterEach } from '@jest/globals';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import {
  CERT_PASSWORD_ENV,
  loadDispatchConfig,
  parseDispatchConfig,
  resolveEndpoint,
} from '../../../src/config/DispatchConfig.js';
import { ConfigurationError } from '../../../src/model/DispatchErrors.js';
import { TargetEnvironment, TaxSystem } from '../../../src/model/TaxSystem.js';

function rawConfig(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    cert_path: 'certs/client.p12',
    cert_password: 'test-secret',
    entornos: {
      SII: {
        pruebas: 'https://prewww1.example.test/sii',
        produccion: 'https://www1.example.test/sii',
        soap_action: 'urn:SuministroFactEmitidas',
      },
      VERIFACTU: {
        pruebas: 'https://prewww1.example.test/verifactu',
        produccion: 'https://www1.example.test/verifactu',
      },
    },
    ...overrides,
  };
}

describe('DispatchConfig', () => {
  describe('parseDispatchConfig', () => {
    it('should resolve paths and apply defaults', () => {
      const config = parseDispatchConfig(rawConfig(), '/etc/aeat', {});

      expect(config.certPath).toBe(path.resolve('/etc/aeat', 'certs/client.p12'));
      expect(config.certPassword).toBe('test-secret');
      expect(config.connectTimeoutMs).toBe(10000);
      expect(config.readTimeoutMs).toBe(60000);
      expect(config.retryPolicy).toEqual({ maxAttempts: 3, backoffMs: 500, backoffFactor: 2 });
      expect(config.caCertPath).toBeUndefined();
      expect(config.endpoints[TaxSystem.SII]).toEqual({
        urls: {
          [TargetEnvironment.TEST]: 'https://prewww1.example.test/sii',
          [TargetEnvironment.PRODUCTION]: 'https://www1.example.test/sii',
        },
        soapAction: 'urn:SuministroFactEmitidas',
        operationName: undefined,
      });
    });

    it('should convert timeouts from seconds', () => {
      const config = parseDispatchConfig(rawConfig({ timeouts: { connect: 2.5, read: 30 } }), '/tmp', {});

      expect(config.connectTimeoutMs).toBe(2500);
      expect(config.readTimeoutMs).toBe(30000);
    });

    it('should read the retry section', () => {
      const config = parseDispatchConfig(
        rawConfig({ retry: { max_attempts: 1, backoff_ms: 0 }, ca_cert_path: 'ca.pem' }),
        '/srv',
        {}
      );

      expect(config.retryPolicy).toEqual({ maxAttempts: 1, backoffMs: 0, backoffFactor: 2 });
      expect(config.caCertPath).toBe(path.resolve('/srv', 'ca.pem'));
    });

    it('should let the environment override the certificate password', () => {
      const config = parseDispatchConfig(rawConfig(), '/tmp', { [CERT_PASSWORD_ENV]: 'env-secret' });

      expect(config.certPassword).toBe('env-secret');
    });

    it('should ignore an empty password override', () => {
      const config = parseDispatchConfig(rawConfig(), '/tmp', { [CERT_PASSWORD_ENV]: '' });

      expect(config.certPassword).toBe('test-secret');
    });

    it('should report every invalid field', () => {
      const raw = rawConfig({ cert_path: '', timeouts: { connect: -1 } });

      expect(() => parseDispatchConfig(raw, '/tmp', {})).toThrow(ConfigurationError);
      expect(() => parseDispatchConfig(raw, '/tmp', {})).toThrow(/cert_path: .*; timeouts\.connect: /);
    });

    it('should reject a missing system section', () => {
      const raw = rawConfig({ entornos: { SII: { pruebas: 'https://a.test', produccion: 'https://b.test' } } });

      expect(() => parseDispatchConfig(raw, '/tmp', {})).toThrow(/entornos\.VERIFACTU/);
    });
  });

  describe('resolveEndpoint', () => {
    it('should combine URL, timeouts and SOAPAction', () => {
      const config = parseDispatchConfig(rawConfig(), '/tmp', {});

      expect(resolveEndpoint(config, TaxSystem.SII, TargetEnvironment.PRODUCTION)).toEqual({
        system: TaxSystem.SII,
        environment: TargetEnvironment.PRODUCTION,
        url: 'https://www1.example.test/sii',
        connectTimeoutMs: 10000,
        readTimeoutMs: 60000,
        soapAction: 'urn:SuministroFactEmitidas',
        operationName: undefined,
      });
    });

    it('should fail for an environment without URL', () => {
      const config = parseDispatchConfig(rawConfig(), '/tmp', {});
      config.endpoints[TaxSystem.VERIFACTU].urls[TargetEnvironment.TEST] = '';

      expect(() => resolveEndpoint(config, TaxSystem.VERIFACTU, TargetEnvironment.TEST)).toThrow(
        'Environment not configured for verifactu: test'
      );
    });
  });

  describe('loadDispatchConfig', () => {
    let dir: string | null = null;

    afterEach(async () => {
      if (dir) {
        await fs.rm(dir, { recursive: true, force: true });
        dir = null;
      }
    });

    async function writeConfig(content: string): Promise<string> {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), 'config-test-'));
      const file = path.join(dir, 'config.json');
      await fs.writeFile(file, content);
      return file;
    }

    it('should resolve relative paths against the file directory', async () => {
      const file = await writeConfig(JSON.stringify(rawConfig()));

      const config = await loadDispatchConfig(file, {});

      expect(config.sourcePath).toBe(file);
      expect(config.certPath).toBe(path.join(path.dirname(file), 'certs', 'client.p12'));
    });

    it('should report a missing file', async () => {
      await expect(loadDispatchConfig('/nonexistent/config.json', {})).rejects.toThrow(
        /^Configuration file could not be read: \/nonexistent\/config\.json/
      );
    });

    it('should report invalid JSON', async () => {
      const file = await writeConfig('{ "cert_path": ');

      await expect(loadDispatchConfig(file, {})).rejects.toThrow(/^Configuration file is not valid JSON: /);
    });
  });
});
