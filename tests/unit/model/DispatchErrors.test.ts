import { describe, it, expect } from '@jest/globals';
import vm from 'vm';
import {
  CertificateFormatError,
  CommunicationError,
  ConfigurationError,
  EnvelopeParseError,
  FunctionalError,
  errorCode,
  errorMessage,
  isDispatchError,
} from '../../../src/model/DispatchErrors.js';

describe('DispatchErrors', () => {
  it('should name each error after its class', () => {
    expect(new ConfigurationError('x').name).toBe('ConfigurationError');
    expect(new CertificateFormatError('x').name).toBe('CertificateFormatError');
    expect(new EnvelopeParseError('x', '<a').name).toBe('EnvelopeParseError');
    expect(new CommunicationError('x', { phase: 'connect' }).name).toBe('CommunicationError');
    expect(new FunctionalError('Client', 'x').name).toBe('FunctionalError');
  });

  it('should tag each error with its category', () => {
    expect(new ConfigurationError('x').category).toBe('configuration');
    expect(new CertificateFormatError('x').category).toBe('certificate');
    expect(new EnvelopeParseError('x', '').category).toBe('envelope-parse');
    expect(new CommunicationError('x', { phase: 'tls' }).category).toBe('communication');
    expect(new FunctionalError('Client', 'x').category).toBe('functional');
  });

  it('should keep communication details', () => {
    const cause = new Error('connect ECONNREFUSED');
    const error = new CommunicationError('failed', { phase: 'connect', code: 'ECONNREFUSED', attempts: 3, cause });

    expect(error.phase).toBe('connect');
    expect(error.code).toBe('ECONNREFUSED');
    expect(error.attempts).toBe(3);
    expect(error.cause).toBe(cause);
  });

  it('should default the attempt count to one', () => {
    expect(new CommunicationError('failed', { phase: 'exchange' }).attempts).toBe(1);
  });

  it('should format the functional error message from the Fault', () => {
    const error = new FunctionalError('soapenv:Server', 'Service unavailable', '<code>1</code>');

    expect(error.message).toBe('SOAP Fault [soapenv:Server]: Service unavailable');
    expect(error.faultCode).toBe('soapenv:Server');
    expect(error.detail).toBe('<code>1</code>');
  });

  it('should recognize errors of the taxonomy', () => {
    expect(isDispatchError(new ConfigurationError('x'))).toBe(true);
    expect(isDispatchError(new Error('x'))).toBe(false);
    expect(isDispatchError('x')).toBe(false);
  });

  describe('errorCode and errorMessage', () => {
    const foreign: unknown = vm.runInNewContext(
      "Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:9'), { code: 'ECONNREFUSED' })"
    );

    it('should read an error created in another realm', () => {
      expect(foreign instanceof Error).toBe(false);
      expect(errorCode(foreign)).toBe('ECONNREFUSED');
      expect(errorMessage(foreign)).toBe('connect ECONNREFUSED 127.0.0.1:9');
    });

    it('should read a local errno error', () => {
      const error = Object.assign(new Error('no such file'), { code: 'ENOENT' });

      expect(errorCode(error)).toBe('ENOENT');
      expect(errorMessage(error)).toBe('no such file');
    });

    it('should handle values without a code or message', () => {
      expect(errorCode(new Error('plain'))).toBeUndefined();
      expect(errorCode({ code: 42 })).toBeUndefined();
      expect(errorCode(null)).toBeUndefined();
      expect(errorMessage('just text')).toBe('just text');
      expect(errorMessage(undefined)).toBe('undefined');
    });
  });
});
