/**
 * Process exit codes
 */

import type { OperationResult } from '../../model/OperationResult.js';

export const EXIT_SUCCESS = 0;
export const EXIT_ARGUMENT_ERROR = 1;
export const EXIT_CONFIG_ERROR = 2;
export const EXIT_FILE_ERROR = 3;
export const EXIT_COMMUNICATION_ERROR = 4;
export const EXIT_FUNCTIONAL_ERROR = 5;

export type ExitCode =
  | typeof EXIT_SUCCESS
  | typeof EXIT_ARGUMENT_ERROR
  | typeof EXIT_CONFIG_ERROR
  | typeof EXIT_FILE_ERROR
  | typeof EXIT_COMMUNICATION_ERROR
  | typeof EXIT_FUNCTIONAL_ERROR;

/**
 * Exit code for a finished send operation. Certificate and envelope parse
 * failures are reported as communication errors.
 */
export function exitCodeForResult(result: OperationResult): ExitCode {
  switch (result.kind) {
    case 'success':
      return EXIT_SUCCESS;
    case 'functional-failure':
      return EXIT_FUNCTIONAL_ERROR;
    case 'communication-failure':
      return EXIT_COMMUNICATION_ERROR;
  }
}
