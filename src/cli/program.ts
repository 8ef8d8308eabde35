/**
 * Command-line program definition
 */

import { Command, CommanderError } from 'commander';
import chalk from 'chalk';
import {
  LogLevel,
  applyLoggingOverrides,
  initializeLogging,
  shutdownLogging,
} from '../logging/index.js';
import type { LoggingConfiguration } from '../logging/index.js';
import { runSend } from './commands/send.js';
import type { SendDependencies } from './commands/send.js';
import { EXIT_ARGUMENT_ERROR, EXIT_SUCCESS } from './lib/exitCodes.js';

export const VERSION = '1.0.0';

interface CliOptions {
  system: string;
  environment: string;
  input: string;
  output: string;
  config?: string;
  debug?: boolean;
  logFile?: string;
}

export interface ProgramDependencies extends SendDependencies {
  /** Receive commander's own help and error text */
  writeOut?: (text: string) => void;
  writeErr?: (text: string) => void;
  /** Set up winston from the flags (default: true) */
  configureLogging?: boolean;
}

function configureLogging(options: CliOptions): void {
  const overrides: Partial<LoggingConfiguration> = {};
  if (options.debug) {
    overrides.logLevel = LogLevel.DEBUG;
  }
  if (options.logFile) {
    overrides.logFile = options.logFile;
  }
  applyLoggingOverrides(overrides);
  initializeLogging();
}

/**
 * Build the program. The action stores its exit code through `onExit`.
 */
export function createProgram(onExit: (code: number) => void, deps: ProgramDependencies = {}): Command {
  const program = new Command();

  program
    .name('aeat-dispatch')
    .description('Submit an XML record to the SII or VERI*FACTU web services over mutual TLS')
    .version(VERSION, '-V, --version', 'Output the version number')
    .requiredOption('-s, --system <system>', 'Target system: sii | verifactu')
    .requiredOption('-e, --environment <environment>', 'Target environment: test | production')
    .requiredOption('-i, --input <file>', 'XML payload to submit')
    .requiredOption('-o, --output <file>', 'Where to write the response XML')
    .option('-c, --config <file>', 'Configuration file (default: ./config.json)')
    .option('-d, --debug', 'Enable debug logging')
    .option('--log-file <file>', 'Also write log lines to this file')
    .exitOverride()
    .action(async () => {
      const options = program.opts<CliOptions>();
      if (deps.configureLogging !== false) {
        configureLogging(options);
      }
      onExit(await runSend(options, deps));
    });

  program.configureOutput({
    ...(deps.writeOut ? { writeOut: deps.writeOut } : {}),
    ...(deps.writeErr ? { writeErr: deps.writeErr } : {}),
  });

  program.addHelpText(
    'after',
    `
${chalk.bold('Examples:')}
  ${chalk.gray('# Submit an invoice record to the SII test environment')}
  $ aeat-dispatch --system sii --environment test --input alta.xml --output respuesta.xml

  ${chalk.gray('# Production submission with an explicit configuration file')}
  $ aeat-dispatch -s verifactu -e production -i registro.xml -o resp.xml -c /etc/aeat/config.json

${chalk.bold('Exit codes:')}
  0 success, 1 argument error, 2 configuration error, 3 file error,
  4 communication error, 5 functional error (SOAP Fault)
`
  );

  return program;
}

/**
 * Parse `argv` and run. Resolves with the process exit code.
 */
export async function runCli(argv: string[], deps: ProgramDependencies = {}): Promise<number> {
  let exitCode: number = EXIT_SUCCESS;
  const program = createProgram((code) => {
    exitCode = code;
  }, deps);

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      const informational = error.code === 'commander.helpDisplayed' || error.code === 'commander.version';
      return informational ? EXIT_SUCCESS : EXIT_ARGUMENT_ERROR;
    }
    throw error;
  } finally {
    if (deps.configureLogging !== false) {
      await shutdownLogging();
    }
  }
  return exitCode;
}
