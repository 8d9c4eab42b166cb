/**
 * Parameter convergence
 *
 * Sends a parameter set to the rack. The rack answers an unchanged set with
 * an error saying no updates are to be performed; that answer is surfaced as
 * NoopUpdateError so callers can report it as a notice instead of a failure.
 */

import type { ParameterSet } from '../../api/types.js';
import type { ParameterWriter } from '../../api/client.js';
import { logger } from '../../api/logger.js';
import { NoopUpdateError, errorMessage } from '../../errors.js';

const NOOP_MESSAGE = 'No updates are to be performed';

/**
 * True when a remote failure means the values already match
 */
export function isNoopMessage(message: string): boolean {
  return message.toLowerCase().includes(NOOP_MESSAGE.toLowerCase());
}

/**
 * Apply the full parameter set to the rack
 *
 * @throws NoopUpdateError if the rack reports nothing to change
 */
export async function applyParameters(
  writer: ParameterWriter,
  systemName: string,
  params: ParameterSet
): Promise<void> {
  logger.debug('Applying rack parameters', { system: systemName, names: Object.keys(params) });

  try {
    await writer.setParameters(systemName, params);
  } catch (error) {
    if (isNoopMessage(errorMessage(error))) {
      throw new NoopUpdateError();
    }
    throw error;
  }
}
