import chalk from 'chalk';
import { ValidationError } from '../../lib/sanitization';
import { errorMessage } from '../../lib/errors';

/**
 * Print an error the way every command does: validation problems are
 * labelled as such, everything else gets the command's own prefix.
 */
export function reportError(error: unknown, prefix: string): void {
  if (error instanceof ValidationError) {
    console.error(chalk.red(`✗ Validation Error: ${error.message}`));
  } else {
    console.error(chalk.red(`✗ ${prefix}: ${errorMessage(error)}`));
  }
}

/**
 * Map a remote exit code onto a process exit status. A command that ended
 * without a status (reported as -1) exits with 1.
 */
export function toProcessExitCode(exitCode: number): number {
  return Number.isInteger(exitCode) && exitCode >= 0 && exitCode <= 255
    ? exitCode
    : 1;
}
