/**
 * Parameter diff
 *
 * Compares the requested parameter values with the rack's current ones.
 * Only names present in the request are considered: parameters the caller
 * did not mention are left unchanged on the rack, so they never show up as
 * removals.
 */

import type { ParameterSet } from '../../api/types.js';
import type { ParameterChange } from '../../types.js';
import { InvalidParameterError } from '../../errors.js';

/**
 * Parse NAME=VALUE arguments, splitting at the first "="
 *
 * @throws InvalidParameterError for a token without "=" or with an empty name
 */
export function parseParameterArgs(args: readonly string[]): ParameterSet {
  const params: ParameterSet = {};

  for (const arg of args) {
    const separator = arg.indexOf('=');
    if (separator <= 0) {
      throw new InvalidParameterError(arg);
    }
    params[arg.slice(0, separator)] = arg.slice(separator + 1);
  }

  return params;
}

/**
 * Diff requested values against current values, sorted by name
 */
export function diffParameters(current: ParameterSet, desired: ParameterSet): ParameterChange[] {
  const changes: ParameterChange[] = [];

  for (const name of Object.keys(desired).sort()) {
    const to = desired[name];
    if (!Object.prototype.hasOwnProperty.call(current, name)) {
      changes.push({ name, to });
    } else if (current[name] !== to) {
      changes.push({ name, from: current[name], to });
    }
  }

  return changes;
}
