/**
 * Model exports
 */

export {
  TaxSystem,
  TargetEnvironment,
  TAX_SYSTEM_LABELS,
  parseTaxSystem,
  parseTargetEnvironment,
} from './TaxSystem.js';
export type { TargetEndpoint } from './TargetEndpoint.js';

export {
  DispatchError,
  ConfigurationError,
  CertificateFormatError,
  EnvelopeParseError,
  CommunicationError,
  FunctionalError,
  isDispatchError,
  errorCode,
  errorMessage,
} from './DispatchErrors.js';
export type { DispatchErrorCategory, TransportPhase, CommunicationErrorDetails } from './DispatchErrors.js';

export { success, communicationFailure, isSuccess } from './OperationResult.js';
export type {
  SoapFault,
  SuccessResult,
  FunctionalFailureResult,
  CommunicationFailureCause,
  CommunicationFailureResult,
  OperationResult,
  ParsedResponse,
} from './OperationResult.js';
