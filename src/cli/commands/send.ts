/**
 * Send command
 *
 * Reads a payload file, submits it to the selected system and environment,
 * and writes the response body to the output file.
 */

import path from 'path';
import ora from 'ora';
import { loadDispatchConfig } from '../../config/DispatchConfig.js';
import type { DispatchConfig } from '../../config/DispatchConfig.js';
import { dispatchFromConfig } from '../../dispatch/DispatchOrchestrator.js';
import { XmlFileError, readXmlFile, writeXmlFile } from '../../io/XmlFiles.js';
import { ConfigurationError, errorMessage } from '../../model/DispatchErrors.js';
import type { OperationResult } from '../../model/OperationResult.js';
import {
  TAX_SYSTEM_LABELS,
  TargetEnvironment,
  TaxSystem,
  parseTargetEnvironment,
  parseTaxSystem,
} from '../../model/TaxSystem.js';
import { getLogger, registerComponent } from '../../logging/index.js';
import {
  EXIT_ARGUMENT_ERROR,
  EXIT_COMMUNICATION_ERROR,
  EXIT_CONFIG_ERROR,
  EXIT_FILE_ERROR,
  ExitCode,
  exitCodeForResult,
} from '../lib/exitCodes.js';
import { OutputFormatter } from '../lib/OutputFormatter.js';

registerComponent('cli', 'Command-line entry point');
const logger = getLogger('cli');

/** Looked up in the working directory when --config is omitted */
export const DEFAULT_CONFIG_FILE = 'config.json';

export interface SendOptions {
  system: string;
  environment: string;
  input: string;
  output: string;
  config?: string;
}

export type DispatchFn = (
  system: TaxSystem,
  environment: TargetEnvironment,
  payloadXml: string,
  config: DispatchConfig
) => Promise<OperationResult>;

export interface SendDependencies {
  dispatch?: DispatchFn;
  formatter?: OutputFormatter;
  /** Spinner while waiting for the agency; false silences it (default: stderr is a TTY) */
  interactive?: boolean;
  env?: NodeJS.ProcessEnv;
}

/**
 * Run one submission and return the process exit code.
 * Never throws.
 */
export async function runSend(options: SendOptions, deps: SendDependencies = {}): Promise<ExitCode> {
  const formatter = deps.formatter ?? new OutputFormatter();
  const dispatch = deps.dispatch ?? dispatchFromConfig;

  const system = parseTaxSystem(options.system);
  if (system === null) {
    formatter.error(`Unknown system: ${options.system}`, 'Expected one of: sii, verifactu');
    return EXIT_ARGUMENT_ERROR;
  }
  const environment = parseTargetEnvironment(options.environment);
  if (environment === null) {
    formatter.error(
      `Unknown environment: ${options.environment}`,
      'Expected one of: test, production (or pruebas, produccion)'
    );
    return EXIT_ARGUMENT_ERROR;
  }

  logger.info(`System: ${TAX_SYSTEM_LABELS[system]}, environment: ${environment}`);
  logger.info(`Input: ${options.input}`);
  logger.info(`Output: ${options.output}`);

  const configPath = options.config ?? path.resolve(DEFAULT_CONFIG_FILE);
  let config: DispatchConfig;
  try {
    config = await loadDispatchConfig(configPath, deps.env);
    logger.info(`Configuration loaded from ${configPath}`);
  } catch (error) {
    logger.error('Configuration could not be loaded', error);
    formatter.error('Configuration could not be loaded', errorMessage(error));
    return EXIT_CONFIG_ERROR;
  }

  let payload: string;
  try {
    payload = await readXmlFile(options.input);
    logger.info(`Input XML read (${payload.length} characters)`);
  } catch (error) {
    logger.error('Input file could not be read', error);
    formatter.error('Input file could not be read', errorMessage(error));
    return EXIT_FILE_ERROR;
  }

  const destination = `${TAX_SYSTEM_LABELS[system]} (${environment})`;
  const spinner = ora({
    text: `Sending to ${destination}...`,
    stream: process.stderr,
    isEnabled: deps.interactive ?? process.stderr.isTTY === true,
    isSilent: deps.interactive === false,
  }).start();
  const startedAt = Date.now();

  let result: OperationResult;
  try {
    result = await dispatch(system, environment, payload, config);
  } catch (error) {
    spinner.stop();
    if (error instanceof ConfigurationError) {
      logger.error('Endpoint configuration error', error);
      formatter.error('Endpoint configuration error', error.message);
      return EXIT_CONFIG_ERROR;
    }
    logger.error('Unexpected error during submission', error);
    formatter.error('Unexpected error during submission', errorMessage(error));
    return EXIT_COMMUNICATION_ERROR;
  }
  spinner.stop();

  let outputPath: string | undefined;
  if (result.kind === 'success') {
    try {
      await writeXmlFile(options.output, result.responseXml);
      outputPath = options.output;
      logger.info(`Response saved to ${options.output}`);
    } catch (error) {
      const message = error instanceof XmlFileError ? error.message : errorMessage(error);
      logger.error('Response could not be saved', error);
      formatter.error('Response could not be saved', message);
      return EXIT_FILE_ERROR;
    }
  }

  formatter.summary(result, { destination, durationMs: Date.now() - startedAt, outputPath });
  return exitCodeForResult(result);
}
