// CLI error handling utilities

import { HypermediaError, LinkNotFoundError, RouteNotFoundError, ValidationError } from '../../core/errors.js';

/**
 * Format an error for CLI output
 */
export function formatError(error: unknown): string {
  if (error instanceof ValidationError) {
    const field = error.field ? ` (field: ${error.field})` : '';
    return `Validation Error${field}: ${error.message}`;
  }

  if (error instanceof LinkNotFoundError || error instanceof RouteNotFoundError) {
    return `Not Found: ${error.message}`;
  }

  if (error instanceof HypermediaError) {
    return `Error [${error.code}]: ${error.message}`;
  }

  if (error instanceof Error) {
    return `Error: ${error.message}`;
  }

  return `Unknown error: ${String(error)}`;
}

/**
 * Exit code for an error: 2 for invalid input, 4 for missing links, 1 otherwise
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof ValidationError) {
    return 2;
  }
  if (error instanceof LinkNotFoundError || error instanceof RouteNotFoundError) {
    return 4;
  }
  return 1;
}

/**
 * Handle CLI errors with proper exit codes
 */
export function handleError(error: unknown): never {
  console.error(`\n❌ ${formatError(error)}\n`);
  process.exit(exitCodeFor(error));
}

/**
 * Wrap a CLI action with error handling
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void> | void
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    try {
      await fn(...args);
    } catch (error) {
      handleError(error);
    }
  };
}
