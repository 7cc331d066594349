import { InvalidRequestError } from '@shelfwise/engine';
import { ConfigError } from '../config/config.js';

/**
 * Errors caused by the user's input; their message is shown as is.
 */
function isUsageError(error: unknown): error is Error {
  return error instanceof InvalidRequestError || error instanceof ConfigError;
}

/**
 * Run a command body, prefixing unexpected failures with what was being attempted.
 */
export async function runTask<T>(task: string, body: () => Promise<T>): Promise<T> {
  try {
    return await body();
  } catch (error) {
    if (isUsageError(error)) throw error;
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to ${task}: ${message}`, { cause: error });
  }
}
