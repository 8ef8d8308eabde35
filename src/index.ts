/**
 * aeat-soap-dispatch
 *
 * Submits XML records to the Spanish tax agency's SII and VERI*FACTU SOAP
 * services with a PKCS#12 client certificate. The CLI lives in ./cli.
 */

export * from './model/index.js';

export {
  CredentialBridge,
  extractCredentials,
  loadCredentialBundle,
} from './credentials/CredentialBridge.js';
export type {
  CredentialBundle,
  CredentialBridgeOptions,
  EphemeralKeyMaterial,
  ReleaseFailure,
  ReleaseReport,
} from './credentials/CredentialBridge.js';

export {
  SOAP_NAMESPACES,
  buildEnvelope,
  parseResponse,
  resolveOperationName,
  stripXmlDeclaration,
  getSoapContentType,
} from './soap/EnvelopeCodec.js';
export type { SoapEnvelope } from './soap/EnvelopeCodec.js';

export { TransportClient } from './transport/TransportClient.js';
export type { RawHttpResponse, TransportClientOptions } from './transport/TransportClient.js';
export { DEFAULT_RETRY_POLICY, RETRIABLE_CODES, backoffDelay, isRetriable } from './transport/RetryPolicy.js';
export type { RetryPolicy } from './transport/RetryPolicy.js';
export { TransportAttemptError, httpsAttempt } from './transport/HttpsAttempt.js';
export type { AttemptFn, HttpExchange, TlsMaterial, TransportRequest } from './transport/HttpsAttempt.js';

export {
  CERT_PASSWORD_ENV,
  ConfigFileSchema,
  loadDispatchConfig,
  parseDispatchConfig,
  resolveEndpoint,
} from './config/DispatchConfig.js';
export type { ConfigFile, DispatchConfig, SystemEndpoints } from './config/DispatchConfig.js';

export {
  DispatchState,
  classifyResponse,
  dispatchFromConfig,
  dispatchOnce,
} from './dispatch/DispatchOrchestrator.js';
export type { CredentialSource, DispatchDependencies } from './dispatch/DispatchOrchestrator.js';

export { XmlFileError, isWellFormedXml, readXmlFile, writeXmlFile } from './io/XmlFiles.js';
