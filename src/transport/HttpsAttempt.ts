/**
 * Single HTTPS POST attempt with mutual TLS.
 *
 * Tracks which phase the exchange reached so the caller can tell a failure
 * that happened before any request byte could reach the server (retriable)
 * from one after the handshake completed (never retried).
 */

import https from 'https';
import { errorCode, errorMessage } from '../model/DispatchErrors.js';
import type { TransportPhase } from '../model/DispatchErrors.js';

export const CONNECT_TIMEOUT_CODE = 'CONNECT_TIMEOUT';
export const READ_TIMEOUT_CODE = 'READ_TIMEOUT';

/**
 * TLS material for one attempt
 */
export interface TlsMaterial {
  cert: Buffer;
  key: Buffer;
  /** Trust anchors; undefined means Node's default root store */
  ca?: Buffer[];
}

export interface TransportRequest {
  url: URL;
  headers: Record<string, string>;
  body: string;
  connectTimeoutMs: number;
  readTimeoutMs: number;
  tls: TlsMaterial;
}

export interface HttpExchange {
  statusCode: number;
  statusMessage: string;
  headers: Record<string, string | string[] | undefined>;
  body: string;
}

/**
 * One network attempt. Implementations throw TransportAttemptError.
 */
export type AttemptFn = (request: TransportRequest) => Promise<HttpExchange>;

/**
 * Failure of one attempt, tagged with the phase it happened in
 */
export class TransportAttemptError extends Error {
  readonly phase: TransportPhase;
  readonly code: string;

  constructor(message: string, phase: TransportPhase, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportAttemptError';
    this.phase = phase;
    this.code = code;
  }
}

/**
 * POST `request.body` over a fresh TLS connection. The agent is not shared
 * and is destroyed once the attempt settles.
 */
export const httpsAttempt: AttemptFn = (request) => {
  const agent = new https.Agent({
    keepAlive: false,
    maxSockets: 1,
    cert: request.tls.cert,
    key: request.tls.key,
    ca: request.tls.ca,
    rejectUnauthorized: true,
  });

  return new Promise<HttpExchange>((resolve, reject) => {
    let phase: TransportPhase = 'connect';
    let settled = false;

    const req = https.request(request.url, {
      method: 'POST',
      agent,
      headers: {
        ...request.headers,
        'Content-Length': String(Buffer.byteLength(request.body, 'utf8')),
      },
    });

    const connectTimer = setTimeout(() => {
      req.destroy(
        new TransportAttemptError(
          `Connection not established within ${request.connectTimeoutMs}ms`,
          phase,
          CONNECT_TIMEOUT_CODE
        )
      );
    }, request.connectTimeoutMs);

    const finish = (outcome: () => void): void => {
      if (settled) return;
      settled = true;
      clearTimeout(connectTimer);
      agent.destroy();
      outcome();
    };

    const fail = (error: unknown): void => {
      finish(() => {
        if (error instanceof TransportAttemptError) {
          reject(error);
          return;
        }
        reject(new TransportAttemptError(errorMessage(error), phase, errorCode(error) ?? 'UNKNOWN', { cause: error }));
      });
    };

    req.on('socket', (socket) => {
      socket.once('connect', () => {
        phase = 'tls';
      });
      socket.once('secureConnect', () => {
        phase = 'exchange';
        clearTimeout(connectTimer);
        req.setTimeout(request.readTimeoutMs, () => {
          req.destroy(
            new TransportAttemptError(
              `No response within ${request.readTimeoutMs}ms after the request was sent`,
              'exchange',
              READ_TIMEOUT_CODE
            )
          );
        });
      });
    });

    req.on('response', (res) => {
      const chunks: Buffer[] = [];
      res.on('data', (chunk: Buffer) => chunks.push(chunk));
      res.on('error', fail);
      res.on('close', () => {
        if (!res.complete) {
          fail(new TransportAttemptError('Connection closed before the response was complete', 'exchange', 'ECONNRESET'));
        }
      });
      res.on('end', () => {
        finish(() =>
          resolve({
            statusCode: res.statusCode ?? 0,
            statusMessage: res.statusMessage ?? '',
            headers: res.headers,
            body: Buffer.concat(chunks).toString('utf8'),
          })
        );
      });
    });

    req.on('error', fail);
    req.end(request.body, 'utf8');
  });
};
