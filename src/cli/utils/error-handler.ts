// CLI error handling utilities

import { CheckTemplateError } from '../../core/errors.js';
import { logger } from '../../core/logger.js';

/**
 * Format an error as a single line for CLI output
 */
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return `ERROR: ${error.message.replace(/\s*\n\s*/g, ' ')}`;
  }

  return `ERROR: ${String(error)}`;
}

/**
 * Print the error and exit with status 1
 */
export function handleError(error: unknown): never {
  console.error(formatError(error));

  if (error instanceof Error && !(error instanceof CheckTemplateError)) {
    logger.debug('Unexpected error', { name: error.name, stack: error.stack });
  }

  process.exit(1);
}

/**
 * Wrap an async CLI action: errors are reported and a returned exit code is
 * applied to the process
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<number | void>
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    try {
      const exitCode = await fn(...args);
      if (typeof exitCode === 'number') {
        process.exitCode = exitCode;
      }
    } catch (error) {
      handleError(error);
    }
  };
}
