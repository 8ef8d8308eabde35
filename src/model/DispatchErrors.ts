/**
 * Dispatch error taxonomy
 *
 * Separates "could not talk to the server" (certificate, transport, unreadable
 * response) from "server talked back and refused the request" (SOAP Fault).
 * The CLI maps each category onto its own exit code.
 */

export type DispatchErrorCategory =
  | 'configuration'
  | 'certificate'
  | 'envelope-parse'
  | 'communication'
  | 'functional';

/**
 * Base class for every error raised by the dispatch pipeline
 */
export abstract class DispatchError extends Error {
  abstract readonly category: DispatchErrorCategory;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Configuration file missing, malformed, or lacking the requested system/environment
 */
export class ConfigurationError extends DispatchError {
  readonly category = 'configuration' as const;
}

/**
 * PKCS#12 container cannot be read or parsed, or the passphrase was rejected.
 * Never retried; raised before any network call.
 */
export class CertificateFormatError extends DispatchError {
  readonly category = 'certificate' as const;
}

/**
 * Response body is not well-formed XML
 */
export class EnvelopeParseError extends DispatchError {
  readonly category = 'envelope-parse' as const;
  readonly responseText: string;

  constructor(message: string, responseText: string, options?: { cause?: unknown }) {
    super(message, options);
    this.responseText = responseText;
  }
}

/**
 * Phase of the exchange in which a transport failure happened.
 * `connect` covers DNS and TCP, `tls` the handshake, `exchange` everything
 * after the handshake completed (request written, response read).
 */
export type TransportPhase = 'connect' | 'tls' | 'exchange';

export interface CommunicationErrorDetails {
  phase: TransportPhase;
  /** Node.js error code (ECONNREFUSED, ENOTFOUND...) or a synthetic timeout code */
  code?: string;
  /** Number of attempts made before giving up */
  attempts?: number;
  /** HTTP status for a non-fault error response */
  httpStatus?: number;
  cause?: unknown;
}

/**
 * Network, TLS or timeout failure, or an unexpected response without a Fault
 */
export class CommunicationError extends DispatchError {
  readonly category = 'communication' as const;
  readonly phase: TransportPhase;
  readonly code?: string;
  readonly attempts: number;
  readonly httpStatus?: number;

  constructor(message: string, details: CommunicationErrorDetails) {
    super(message, { cause: details.cause });
    this.phase = details.phase;
    this.code = details.code;
    this.attempts = details.attempts ?? 1;
    this.httpStatus = details.httpStatus;
  }
}

/**
 * The server returned a well-formed SOAP Fault. Final for this payload.
 */
export class FunctionalError extends DispatchError {
  readonly category = 'functional' as const;
  readonly faultCode: string;
  readonly faultString: string;
  readonly detail?: string;

  constructor(faultCode: string, faultString: string, detail?: string) {
    super(`SOAP Fault [${faultCode}]: ${faultString}`);
    this.faultCode = faultCode;
    this.faultString = faultString;
    this.detail = detail;
  }
}

export function isDispatchError(error: unknown): error is DispatchError {
  return error instanceof DispatchError;
}

/**
 * Errno-style code of a thrown value. Checked structurally: errors raised by
 * Node's own modules may come from another realm (VM contexts, test runners).
 */
export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Message of a thrown value, Error or not
 */
export function errorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}
