/**
 * Retry policy for connection-establishment failures.
 *
 * Retries are deterministic and bounded: a fixed attempt count with
 * exponential backoff. Nothing in the `exchange` phase is ever retried.
 */

import type { TransportPhase } from '../model/DispatchErrors.js';
import { CONNECT_TIMEOUT_CODE } from './HttpsAttempt.js';

export interface RetryPolicy {
  /** Total attempts, including the first */
  maxAttempts: number;
  /** Wait before the first retry */
  backoffMs: number;
  /** Multiplier applied to the wait for each further retry */
  backoffFactor: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  backoffMs: 500,
  backoffFactor: 2,
};

/**
 * Error codes meaning no request byte reached the server
 */
export const RETRIABLE_CODES: ReadonlySet<string> = new Set([
  'ENOTFOUND',
  'EAI_AGAIN',
  'ECONNREFUSED',
  'ECONNRESET',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ETIMEDOUT',
  CONNECT_TIMEOUT_CODE,
]);

/**
 * A failure is retriable only before the TLS handshake completed, and only
 * for connection-level codes; certificate or protocol errors during the
 * handshake are deterministic and fail at once.
 */
export function isRetriable(phase: TransportPhase, code: string): boolean {
  return phase !== 'exchange' && RETRIABLE_CODES.has(code);
}

/**
 * Delay before retry number `attempt` (1-based: the wait after the first failure)
 */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.round(policy.backoffMs * Math.pow(policy.backoffFactor, attempt - 1));
}
