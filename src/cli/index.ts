#!/usr/bin/env node
/**
 * aeat-dispatch
 *
 * Usage: aeat-dispatch --system <sii|verifactu> --environment <test|production>
 *                      --input <file> --output <file> [--config <file>] [--debug]
 */

import 'dotenv/config';
import chalk from 'chalk';
import { runCli } from './program.js';

runCli(process.argv)
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    const message = error instanceof Error ? error.message : String(error);
    console.error(chalk.red('Fatal error:'), message);
    process.exitCode = 1;
  });
