/**
 * Dispatch Orchestrator
 *
 * Purpose: run one complete send operation and classify its outcome.
 *
 * Lifecycle (linear, no branching back):
 *   IDLE → CREDENTIALS_ACQUIRED → ENVELOPE_BUILT → SENT → PARSED
 *        → SUCCESS | FUNCTIONAL_FAILURE | COMMUNICATION_FAILURE
 *        → CREDENTIALS_RELEASED
 *
 * The three outcome paths reconverge on release, which runs exactly once
 * whichever way the operation ended (CredentialBridge.withKeyMaterial). Nothing is retried here; transient
 * connection failures are retried inside the TransportClient.
 */

import {
  CredentialBridge,
  CredentialBundle,
  ReleaseReport,
  loadCredentialBundle,
} from '../credentials/CredentialBridge.js';
import { resolveEndpoint } from '../config/DispatchConfig.js';
import type { DispatchConfig } from '../config/DispatchConfig.js';
import {
  CertificateFormatError,
  CommunicationError,
  EnvelopeParseError,
  errorMessage,
} from '../model/DispatchErrors.js';
import {
  OperationResult,
  CommunicationFailureCause,
  communicationFailure,
} from '../model/OperationResult.js';
import { TAX_SYSTEM_LABELS, TargetEnvironment, TaxSystem } from '../model/TaxSystem.js';
import type { TargetEndpoint } from '../model/TargetEndpoint.js';
import { buildEnvelope, parseResponse, resolveOperationName } from '../soap/EnvelopeCodec.js';
import type { SoapEnvelope } from '../soap/EnvelopeCodec.js';
import { RawHttpResponse, TransportClient } from '../transport/TransportClient.js';
import { getLogger, registerComponent, registerSecret } from '../logging/index.js';

registerComponent('dispatch', 'Send operation lifecycle');
const logger = getLogger('dispatch');

export enum DispatchState {
  IDLE = 'IDLE',
  CREDENTIALS_ACQUIRED = 'CREDENTIALS_ACQUIRED',
  ENVELOPE_BUILT = 'ENVELOPE_BUILT',
  SENT = 'SENT',
  PARSED = 'PARSED',
  SUCCESS = 'SUCCESS',
  FUNCTIONAL_FAILURE = 'FUNCTIONAL_FAILURE',
  COMMUNICATION_FAILURE = 'COMMUNICATION_FAILURE',
  CREDENTIALS_RELEASED = 'CREDENTIALS_RELEASED',
}

/**
 * Where the client certificate comes from: bytes already in memory, or a
 * file path read at the start of the operation.
 */
export type CredentialSource = CredentialBundle | { path: string; passphrase: string };

export interface DispatchDependencies {
  bridge?: CredentialBridge;
  transport?: TransportClient;
  /** Observes every state change */
  onTransition?: (state: DispatchState) => void;
  /** Receives the release report, including recorded deletion failures; not called when no key material was written */
  onRelease?: (report: ReleaseReport) => void;
}

function isInMemoryBundle(source: CredentialSource): source is CredentialBundle {
  return 'pkcs12' in source;
}

function resolveBundle(source: CredentialSource): Promise<CredentialBundle> {
  if (isInMemoryBundle(source)) {
    return Promise.resolve(source);
  }
  return loadCredentialBundle(source.path, source.passphrase);
}

function toCause(error: unknown): CommunicationFailureCause {
  if (
    error instanceof CommunicationError ||
    error instanceof EnvelopeParseError ||
    error instanceof CertificateFormatError
  ) {
    return error;
  }
  const message = errorMessage(error);
  return new CommunicationError(`Unexpected error during send: ${message}`, {
    phase: 'exchange',
    code: 'UNEXPECTED',
    cause: error,
  });
}

function isSuccessStatus(statusCode: number): boolean {
  return statusCode >= 200 && statusCode < 300;
}

/**
 * Classify a raw response. Any status is inspected for a Fault first:
 * SOAP 1.1 servers report faults with HTTP 500.
 */
export function classifyResponse(response: RawHttpResponse): OperationResult {
  let parseError: EnvelopeParseError | null = null;
  let parsed: OperationResult | null = null;

  try {
    parsed = parseResponse(response.body, response.statusCode);
  } catch (error) {
    if (!(error instanceof EnvelopeParseError)) {
      throw error;
    }
    parseError = error;
  }

  if (parsed?.kind === 'functional-failure') {
    return parsed;
  }

  if (!isSuccessStatus(response.statusCode)) {
    const excerpt = response.body.substring(0, 500);
    return communicationFailure(
      new CommunicationError(
        `HTTP ${response.statusCode} ${response.statusMessage} without a SOAP Fault: ${excerpt}`,
        {
          phase: 'exchange',
          code: `HTTP_${response.statusCode}`,
          httpStatus: response.statusCode,
          attempts: response.attempts,
          cause: parseError ?? undefined,
        }
      )
    );
  }

  if (parsed) {
    return parsed;
  }
  return communicationFailure(
    parseError ?? new EnvelopeParseError('Response could not be classified', response.body)
  );
}

function outcomeState(result: OperationResult): DispatchState {
  switch (result.kind) {
    case 'success':
      return DispatchState.SUCCESS;
    case 'functional-failure':
      return DispatchState.FUNCTIONAL_FAILURE;
    case 'communication-failure':
      return DispatchState.COMMUNICATION_FAILURE;
  }
}

interface OperationContext {
  endpoint: TargetEndpoint;
  payloadXml: string;
  credentialSource: CredentialSource;
  bridge: CredentialBridge;
  transport: TransportClient;
  transition: (state: DispatchState) => void;
  onRelease?: (report: ReleaseReport) => void;
}

function buildRequestEnvelope(endpoint: TargetEndpoint, payloadXml: string): SoapEnvelope {
  const operationName = endpoint.operationName ?? resolveOperationName(payloadXml);
  if (operationName === null) {
    logger.warn('Payload has no single root element; operation name left empty');
    return buildEnvelope('', payloadXml, endpoint.soapAction ?? '');
  }
  return buildEnvelope(operationName, payloadXml, endpoint.soapAction);
}

/**
 * Every path settles on exactly one outcome state; release of the key
 * material is scoped by the bridge and follows the outcome.
 */
async function runOperation(ctx: OperationContext): Promise<OperationResult> {
  const { endpoint, payloadXml, bridge, transport, transition } = ctx;
  const settle = (result: OperationResult): OperationResult => {
    transition(outcomeState(result));
    return result;
  };

  let unregisterPassphrase = (): void => undefined;
  try {
    const bundle = await resolveBundle(ctx.credentialSource);
    unregisterPassphrase = registerSecret(bundle.passphrase);

    return await bridge.withKeyMaterial(
      bundle,
      async (material) => {
        try {
          transition(DispatchState.CREDENTIALS_ACQUIRED);
          logger.debug(`Client certificate loaded: ${material.subject}`);

          const envelope = buildRequestEnvelope(endpoint, payloadXml);
          transition(DispatchState.ENVELOPE_BUILT);
          logger.debug(
            `SOAP envelope built for ${envelope.operationName || '(unnamed operation)'} (${envelope.xml.length} characters)`
          );

          const response = await transport.send(endpoint, envelope, material);
          transition(DispatchState.SENT);

          const result = classifyResponse(response);
          transition(DispatchState.PARSED);
          return settle(result);
        } catch (error) {
          return settle(communicationFailure(toCause(error)));
        }
      },
      ctx.onRelease
    );
  } catch (error) {
    return settle(communicationFailure(toCause(error)));
  } finally {
    unregisterPassphrase();
  }
}

/**
 * Run one send operation end to end.
 *
 * @throws ConfigurationError when (system, environment) has no endpoint;
 *   every other failure is returned as a result variant
 */
export async function dispatchOnce(
  system: TaxSystem,
  environment: TargetEnvironment,
  payloadXml: string,
  credentialSource: CredentialSource,
  config: DispatchConfig,
  deps: DispatchDependencies = {}
): Promise<OperationResult> {
  const endpoint = resolveEndpoint(config, system, environment);
  const bridge = deps.bridge ?? new CredentialBridge();
  const transport =
    deps.transport ??
    new TransportClient({ retryPolicy: config.retryPolicy, caCertPath: config.caCertPath });

  const transition = (state: DispatchState): void => {
    logger.trace(`State → ${state}`);
    deps.onTransition?.(state);
  };

  logger.info(`Sending to ${TAX_SYSTEM_LABELS[system]} (${environment}): ${endpoint.url}`);
  transition(DispatchState.IDLE);

  const result = await runOperation({
    endpoint,
    payloadXml,
    credentialSource,
    bridge,
    transport,
    transition,
    onRelease: deps.onRelease,
  });
  transition(DispatchState.CREDENTIALS_RELEASED);
  logOutcome(result);
  return result;
}

function logOutcome(result: OperationResult): void {
  switch (result.kind) {
    case 'success':
      logger.info(`SOAP response processed without Fault (${result.responseXml.length} characters)`);
      break;
    case 'functional-failure':
      logger.error(`Functional error from the agency: ${result.error.message}`);
      break;
    case 'communication-failure':
      logger.error(`${result.cause.name}: ${result.cause.message}`);
      break;
  }
}

/**
 * dispatchOnce with the certificate taken from the configuration
 */
export function dispatchFromConfig(
  system: TaxSystem,
  environment: TargetEnvironment,
  payloadXml: string,
  config: DispatchConfig,
  deps: DispatchDependencies = {}
): Promise<OperationResult> {
  return dispatchOnce(
    system,
    environment,
    payloadXml,
    { path: config.certPath, passphrase: config.certPassword },
    config,
    deps
  );
}
