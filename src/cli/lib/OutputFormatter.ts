/**
 * Output Formatter
 *
 * Human-readable status lines for the CLI. Everything goes to stderr so
 * that stdout stays free for scripting.
 */

import chalk from 'chalk';
import type { OperationResult } from '../../model/OperationResult.js';

export type LineWriter = (line: string) => void;

const writeStderr: LineWriter = (line) => {
  process.stderr.write(`${line}\n`);
};

/**
 * Format a duration in milliseconds
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  const minutes = Math.floor(ms / 60000);
  const seconds = Math.floor((ms % 60000) / 1000);
  return `${minutes}m ${seconds}s`;
}

export interface SummaryFields {
  destination: string;
  durationMs: number;
  outputPath?: string;
}

/**
 * Describe a send outcome as a list of plain lines (no colour)
 */
export function describeResult(result: OperationResult): string[] {
  switch (result.kind) {
    case 'success':
      return [`Response: ${result.responseXml.length} characters`];
    case 'functional-failure': {
      const lines = [`Fault code:   ${result.fault.faultCode}`, `Fault string: ${result.fault.faultString}`];
      if (result.fault.detail) {
        lines.push(`Detail:       ${result.fault.detail}`);
      }
      return lines;
    }
    case 'communication-failure':
      return [`${result.cause.name}: ${result.cause.message}`];
  }
}

export class OutputFormatter {
  private readonly write: LineWriter;

  constructor(write: LineWriter = writeStderr) {
    this.write = write;
  }

  success(message: string): void {
    this.write(chalk.green('✔') + ' ' + message);
  }

  error(message: string, details?: string): void {
    this.write(chalk.red('✖') + ' ' + message);
    if (details) {
      this.write(chalk.gray(details));
    }
  }

  warn(message: string): void {
    this.write(chalk.yellow('⚠') + ' ' + message);
  }

  info(message: string): void {
    this.write(chalk.blue('ℹ') + ' ' + message);
  }

  /**
   * Headline plus indented fields for a finished operation
   */
  summary(result: OperationResult, fields: SummaryFields): void {
    switch (result.kind) {
      case 'success':
        this.success(chalk.bold('Submission accepted'));
        break;
      case 'functional-failure':
        this.error(chalk.bold('Submission rejected by the agency'));
        break;
      case 'communication-failure':
        this.error(chalk.bold('Submission failed'));
        break;
    }
    this.write('');
    this.write(`  ${chalk.gray('Destination:')} ${fields.destination}`);
    this.write(`  ${chalk.gray('Duration:')}    ${formatDuration(fields.durationMs)}`);
    for (const line of describeResult(result)) {
      this.write(`  ${line}`);
    }
    if (fields.outputPath) {
      this.write(`  ${chalk.gray('Saved to:')}    ${fields.outputPath}`);
    }
  }
}
