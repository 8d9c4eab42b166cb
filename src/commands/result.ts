/**
 * Shared CommandResult conversions
 */

import type { CommandResult } from '../types.js';
import { errorMessage, isRackError } from '../errors.js';

/**
 * Convert a thrown error into a result; non-fatal rack errors become notices
 */
export function failureResult<T>(error: unknown): CommandResult<T> {
  if (isRackError(error) && !error.fatal) {
    return { success: true, notice: true, message: error.message };
  }

  return {
    success: false,
    message: errorMessage(error),
    errors: isRackError(error) && error.suggestion ? [error.suggestion] : undefined,
  };
}
