/**
 * Transport Client
 *
 * Purpose: post one SOAP envelope to the agency endpoint over mutual TLS.
 *
 * Key behaviors:
 * - One HTTPS session per send, never reused across operations
 * - Client certificate/key taken from the ephemeral PEM files
 * - Standard server certificate validation; an extra CA may be appended
 *   to the default roots, never substituted for validation
 * - Separate connect and read timeouts
 * - Bounded retries for connection-establishment failures only; once the
 *   TLS handshake completed the request may have reached the server, so a
 *   failure from that point on is final (no duplicate submissions)
 */

import fs from 'fs/promises';
import tls from 'tls';
import type { EphemeralKeyMaterial } from '../credentials/CredentialBridge.js';
import { CertificateFormatError, CommunicationError, errorMessage } from '../model/DispatchErrors.js';
import type { TargetEndpoint } from '../model/TargetEndpoint.js';
import type { SoapEnvelope } from '../soap/EnvelopeCodec.js';
import { getSoapContentType } from '../soap/EnvelopeCodec.js';
import { getLogger, registerComponent } from '../logging/index.js';
import {
  AttemptFn,
  HttpExchange,
  TlsMaterial,
  TransportAttemptError,
  httpsAttempt,
} from './HttpsAttempt.js';
import { DEFAULT_RETRY_POLICY, RetryPolicy, backoffDelay, isRetriable } from './RetryPolicy.js';

registerComponent('transport', 'HTTPS/SOAP transport');
const logger = getLogger('transport');

export interface RawHttpResponse extends HttpExchange {
  /** Attempts made, including the successful one */
  attempts: number;
}

export interface TransportClientOptions {
  retryPolicy?: Partial<RetryPolicy>;
  /** Extra PEM trust anchor appended to the default roots */
  caCertPath?: string;
  /** Network attempt; replaced in tests */
  attempt?: AttemptFn;
  /** Backoff wait; replaced in tests */
  sleep?: (ms: number) => Promise<void>;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class TransportClient {
  private readonly retryPolicy: RetryPolicy;
  private readonly caCertPath?: string;
  private readonly attempt: AttemptFn;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: TransportClientOptions = {}) {
    this.retryPolicy = { ...DEFAULT_RETRY_POLICY, ...options.retryPolicy };
    this.caCertPath = options.caCertPath;
    this.attempt = options.attempt ?? httpsAttempt;
    this.sleep = options.sleep ?? defaultSleep;
  }

  getRetryPolicy(): RetryPolicy {
    return this.retryPolicy;
  }

  /**
   * POST `envelope` to `endpoint`.
   *
   * Resolves with the raw response whatever its HTTP status; deciding what
   * a status means is left to the caller, since a 500 may carry a Fault.
   *
   * @throws CommunicationError for DNS, connection, TLS and timeout failures
   */
  async send(
    endpoint: TargetEndpoint,
    envelope: SoapEnvelope,
    keyMaterial: EphemeralKeyMaterial
  ): Promise<RawHttpResponse> {
    let url: URL;
    try {
      url = new URL(endpoint.url);
    } catch (error) {
      throw new CommunicationError(`Invalid endpoint URL: ${endpoint.url}`, {
        phase: 'connect',
        code: 'ERR_INVALID_URL',
        attempts: 0,
        cause: error,
      });
    }
    if (url.protocol !== 'https:') {
      throw new CommunicationError(`Endpoint must use https: ${endpoint.url}`, {
        phase: 'connect',
        code: 'ERR_INVALID_PROTOCOL',
        attempts: 0,
      });
    }

    const tlsMaterial = await this.loadTlsMaterial(keyMaterial);
    const request = {
      url,
      headers: {
        'Content-Type': getSoapContentType(),
        SOAPAction: `"${envelope.soapAction}"`,
        Accept: 'text/xml',
      },
      body: envelope.xml,
      connectTimeoutMs: endpoint.connectTimeoutMs,
      readTimeoutMs: endpoint.readTimeoutMs,
      tls: tlsMaterial,
    };

    const maxAttempts = Math.max(1, this.retryPolicy.maxAttempts);

    for (let attemptNumber = 1; ; attemptNumber++) {
      logger.info(`POST ${url.origin}${url.pathname} (attempt ${attemptNumber}/${maxAttempts})`, {
        operation: envelope.operationName,
      });

      try {
        const exchange = await this.attempt(request);
        logger.info(`Response received: HTTP ${exchange.statusCode}`);
        logger.debug(`Response body: ${exchange.body.length} characters`);
        return { ...exchange, attempts: attemptNumber };
      } catch (error) {
        const failure =
          error instanceof TransportAttemptError
            ? error
            : new TransportAttemptError(
                errorMessage(error),
                'exchange',
                'UNKNOWN',
                { cause: error }
              );

        const retriable = isRetriable(failure.phase, failure.code);
        if (retriable && attemptNumber < maxAttempts) {
          const delay = backoffDelay(this.retryPolicy, attemptNumber);
          logger.warn(
            `Connection attempt ${attemptNumber} failed (${failure.code}: ${failure.message}); retrying in ${delay}ms`
          );
          await this.sleep(delay);
          continue;
        }

        const reason = retriable ? `after ${attemptNumber} attempts` : `in ${failure.phase} phase`;
        logger.error(`Communication with ${url.host} failed ${reason}: ${failure.message}`);
        throw new CommunicationError(`Communication with ${url.host} failed ${reason}: ${failure.message}`, {
          phase: failure.phase,
          code: failure.code,
          attempts: attemptNumber,
          cause: failure,
        });
      }
    }
  }

  private async loadTlsMaterial(keyMaterial: EphemeralKeyMaterial): Promise<TlsMaterial> {
    if (keyMaterial.released) {
      throw new CertificateFormatError('Client key material was already released');
    }

    let cert: Buffer;
    let key: Buffer;
    try {
      [cert, key] = await Promise.all([fs.readFile(keyMaterial.certPath), fs.readFile(keyMaterial.keyPath)]);
    } catch (error) {
      const message = errorMessage(error);
      throw new CertificateFormatError(`Client key material could not be read: ${message}`, { cause: error });
    }

    if (!this.caCertPath) {
      return { cert, key };
    }

    try {
      const extraCa = await fs.readFile(this.caCertPath);
      return {
        cert,
        key,
        ca: [...tls.rootCertificates.map((pem) => Buffer.from(pem)), extraCa],
      };
    } catch (error) {
      const message = errorMessage(error);
      throw new CommunicationError(`CA certificate could not be read: ${message}`, {
        phase: 'tls',
        code: 'CA_UNREADABLE',
        attempts: 0,
        cause: error,
      });
    }
  }
}
