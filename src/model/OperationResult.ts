/**
 * Tagged outcome of one send operation.
 * Exactly one variant is produced per operation.
 */

import type {
  CertificateFormatError,
  CommunicationError,
  EnvelopeParseError,
  FunctionalError,
} from './DispatchErrors.js';

/**
 * SOAP 1.1 Fault structure
 */
export interface SoapFault {
  /** Short machine token, e.g. "soapenv:Client" */
  faultCode: string;
  /** Human-readable message */
  faultString: string;
  /** Inner XML of the detail element, when present */
  detail?: string;
}

export interface SuccessResult {
  kind: 'success';
  /** Inner content of the SOAP Body, verbatim */
  responseXml: string;
  httpStatus?: number;
}

export interface FunctionalFailureResult {
  kind: 'functional-failure';
  fault: SoapFault;
  error: FunctionalError;
  httpStatus?: number;
}

/** Anything that kept a usable answer from coming back */
export type CommunicationFailureCause =
  | CommunicationError
  | EnvelopeParseError
  | CertificateFormatError;

export interface CommunicationFailureResult {
  kind: 'communication-failure';
  cause: CommunicationFailureCause;
}

export type OperationResult = SuccessResult | FunctionalFailureResult | CommunicationFailureResult;

/** What the envelope codec can decide on its own */
export type ParsedResponse = SuccessResult | FunctionalFailureResult;

export function success(responseXml: string, httpStatus?: number): SuccessResult {
  return { kind: 'success', responseXml, httpStatus };
}

export function communicationFailure(cause: CommunicationFailureCause): CommunicationFailureResult {
  return { kind: 'communication-failure', cause };
}

export function isSuccess(result: OperationResult): result is SuccessResult {
  return result.kind === 'success';
}
