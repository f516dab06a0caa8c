/**
 * Shared error handling for CLI actions
 *
 * @license Apache-2.0
 */

import { ProbeError, UsageError, errorMessage } from '../../../src/lib/errors';

export const CLI_NAME = 'connector-kit';

/**
 * Print an error the way every command does and exit with status 1.
 * Usage errors go to stdout, everything else to stderr.
 */
export function exitWithError(error: unknown): never {
  if (error instanceof UsageError) {
    console.log(`Usage: ${CLI_NAME} ${error.usage}`);
    process.exit(1);
  }

  console.error(`Error: ${errorMessage(error).replace(/^Error: /, '')}`);
  if (error instanceof ProbeError && error.responseBody !== undefined) {
    console.error(`Response: ${error.responseBody}`);
  }
  if (process.env.DEBUG && error instanceof Error && error.stack) {
    console.error('\nStack trace:', error.stack);
  }
  process.exit(1);
}

export async function runAction(action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (error) {
    exitWithError(error);
  }
}
