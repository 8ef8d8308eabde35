import { TaxSystem, TargetEnvironment } from './TaxSystem.js';

/**
 * Resolved destination of one send operation. Immutable for its duration.
 */
export interface TargetEndpoint {
  readonly system: TaxSystem;
  readonly environment: TargetEnvironment;
  readonly url: string;
  /** DNS + TCP + TLS handshake budget */
  readonly connectTimeoutMs: number;
  /** Socket inactivity budget once the handshake completed */
  readonly readTimeoutMs: number;
  /** SOAPAction override; defaults to the operation name */
  readonly soapAction?: string;
  /** Operation name override; defaults to the payload root element */
  readonly operationName?: string;
}
