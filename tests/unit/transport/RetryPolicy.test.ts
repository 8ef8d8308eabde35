import { describe, it, expect } from '@jest/globals';
import { DEFAULT_RETRY_POLICY, backoffDelay, isRetriable } from '../../../src/transport/RetryPolicy.js';
import { CONNECT_TIMEOUT_CODE, READ_TIMEOUT_CODE } from '../../../src/transport/HttpsAttempt.js';

describe('RetryPolicy', () => {
  describe('isRetriable', () => {
    it.each(['ECONNREFUSED', 'ENOTFOUND', 'EAI_AGAIN', 'ECONNRESET', 'ETIMEDOUT', CONNECT_TIMEOUT_CODE])(
      'should retry %s while connecting',
      (code) => {
        expect(isRetriable('connect', code)).toBe(true);
      }
    );

    it('should retry a reset during the TLS handshake', () => {
      expect(isRetriable('tls', 'ECONNRESET')).toBe(true);
    });

    it('should not retry certificate validation failures', () => {
      expect(isRetriable('tls', 'UNABLE_TO_VERIFY_LEAF_SIGNATURE')).toBe(false);
      expect(isRetriable('tls', 'ERR_TLS_CERT_ALTNAME_INVALID')).toBe(false);
    });

    it('should never retry once the handshake completed', () => {
      expect(isRetriable('exchange', 'ECONNRESET')).toBe(false);
      expect(isRetriable('exchange', READ_TIMEOUT_CODE)).toBe(false);
    });
  });

  describe('backoffDelay', () => {
    it('should grow exponentially from the base delay', () => {
      expect(backoffDelay(DEFAULT_RETRY_POLICY, 1)).toBe(500);
      expect(backoffDelay(DEFAULT_RETRY_POLICY, 2)).toBe(1000);
      expect(backoffDelay(DEFAULT_RETRY_POLICY, 3)).toBe(2000);
    });

    it('should keep a constant delay with factor 1', () => {
      const policy = { maxAttempts: 5, backoffMs: 250, backoffFactor: 1 };
      expect(backoffDelay(policy, 4)).toBe(250);
    });
  });
});
