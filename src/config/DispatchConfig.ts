/**
 * Dispatch Configuration
 *
 * Loads and validates the JSON configuration file: certificate location,
 * endpoint URLs per (system, environment), timeouts and retry policy.
 *
 * File layout (timeouts in seconds):
 *   {
 *     "cert_path": "certs/client.p12",
 *     "cert_password": "…",
 *     "entornos": {
 *       "SII":       { "pruebas": "https://…", "produccion": "https://…" },
 *       "VERIFACTU": { "pruebas": "https://…", "produccion": "https://…" }
 *     },
 *     "timeouts": { "connect": 10, "read": 60 },
 *     "retry": { "max_attempts": 3, "backoff_ms": 500 }
 *   }
 */

import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { ConfigurationError, errorMessage } from '../model/DispatchErrors.js';
import { TargetEnvironment, TaxSystem } from '../model/TaxSystem.js';
import type { TargetEndpoint } from '../model/TargetEndpoint.js';
import { DEFAULT_RETRY_POLICY, RetryPolicy } from '../transport/RetryPolicy.js';

const SystemEndpointsSchema = z.object({
  pruebas: z.string().url(),
  produccion: z.string().url(),
  /** SOAPAction header value; defaults to the operation name */
  soap_action: z.string().optional(),
  /** Operation name; defaults to the payload root element */
  operation: z.string().min(1).optional(),
});

export const ConfigFileSchema = z.object({
  cert_path: z.string().min(1),
  cert_password: z.string(),
  entornos: z.object({
    SII: SystemEndpointsSchema,
    VERIFACTU: SystemEndpointsSchema,
  }),
  timeouts: z
    .object({
      connect: z.number().positive().default(10),
      read: z.number().positive().default(60),
    })
    .default({}),
  retry: z
    .object({
      max_attempts: z.number().int().min(1).max(10).default(DEFAULT_RETRY_POLICY.maxAttempts),
      backoff_ms: z.number().int().min(0).default(DEFAULT_RETRY_POLICY.backoffMs),
      backoff_factor: z.number().min(1).default(DEFAULT_RETRY_POLICY.backoffFactor),
    })
    .default({}),
  ca_cert_path: z.string().min(1).optional(),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export interface SystemEndpoints {
  urls: Record<TargetEnvironment, string>;
  soapAction?: string;
  operationName?: string;
}

/**
 * Validated configuration with paths resolved and timeouts in milliseconds
 */
export interface DispatchConfig {
  certPath: string;
  certPassword: string;
  endpoints: Record<TaxSystem, SystemEndpoints>;
  connectTimeoutMs: number;
  readTimeoutMs: number;
  retryPolicy: RetryPolicy;
  caCertPath?: string;
  /** File the configuration was read from, if any */
  sourcePath?: string;
}

/** Environment variable overriding cert_password */
export const CERT_PASSWORD_ENV = 'AEAT_CERT_PASSWORD';

function toSystemEndpoints(raw: ConfigFile['entornos']['SII']): SystemEndpoints {
  return {
    urls: {
      [TargetEnvironment.TEST]: raw.pruebas,
      [TargetEnvironment.PRODUCTION]: raw.produccion,
    },
    soapAction: raw.soap_action,
    operationName: raw.operation,
  };
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Validate an already-parsed JSON value.
 * Relative paths are resolved against `baseDir`.
 */
export function parseDispatchConfig(
  raw: unknown,
  baseDir: string,
  env: NodeJS.ProcessEnv = process.env
): DispatchConfig {
  const result = ConfigFileSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(`Invalid configuration: ${formatIssues(result.error)}`);
  }
  const file = result.data;
  const passwordOverride = env[CERT_PASSWORD_ENV];

  return {
    certPath: path.resolve(baseDir, file.cert_path),
    certPassword: passwordOverride !== undefined && passwordOverride !== '' ? passwordOverride : file.cert_password,
    endpoints: {
      [TaxSystem.SII]: toSystemEndpoints(file.entornos.SII),
      [TaxSystem.VERIFACTU]: toSystemEndpoints(file.entornos.VERIFACTU),
    },
    connectTimeoutMs: Math.round(file.timeouts.connect * 1000),
    readTimeoutMs: Math.round(file.timeouts.read * 1000),
    retryPolicy: {
      maxAttempts: file.retry.max_attempts,
      backoffMs: file.retry.backoff_ms,
      backoffFactor: file.retry.backoff_factor,
    },
    caCertPath: file.ca_cert_path ? path.resolve(baseDir, file.ca_cert_path) : undefined,
  };
}

/**
 * Read and validate a configuration file
 */
export async function loadDispatchConfig(
  configPath: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<DispatchConfig> {
  const absolutePath = path.resolve(configPath);

  let text: string;
  try {
    text = await fs.readFile(absolutePath, 'utf8');
  } catch (error) {
    const message = errorMessage(error);
    throw new ConfigurationError(`Configuration file could not be read: ${absolutePath} (${message})`, {
      cause: error,
    });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const message = errorMessage(error);
    throw new ConfigurationError(`Configuration file is not valid JSON: ${message}`, { cause: error });
  }

  return {
    ...parseDispatchConfig(raw, path.dirname(absolutePath), env),
    sourcePath: absolutePath,
  };
}

/**
 * Resolve the endpoint for a (system, environment) pair
 */
export function resolveEndpoint(
  config: DispatchConfig,
  system: TaxSystem,
  environment: TargetEnvironment
): TargetEndpoint {
  const systemEndpoints = config.endpoints[system];
  if (!systemEndpoints) {
    throw new ConfigurationError(`System not configured: ${system}`);
  }
  const url = systemEndpoints.urls[environment];
  if (!url) {
    throw new ConfigurationError(`Environment not configured for ${system}: ${environment}`);
  }

  return {
    system,
    environment,
    url,
    connectTimeoutMs: config.connectTimeoutMs,
    readTimeoutMs: config.readTimeoutMs,
    soapAction: systemEndpoints.soapAction,
    operationName: systemEndpoints.operationName,
  };
}
