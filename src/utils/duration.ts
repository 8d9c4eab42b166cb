/**
 * Durations written the way operators type them: "10m", "1h2m10s", "500ms"
 */

import { InvalidParameterError } from '../errors.js';

const UNIT_MS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
};

/**
 * Parse a duration into milliseconds; a bare "0" is allowed
 *
 * @throws InvalidParameterError for anything else without a unit
 */
export function parseDuration(text: string): number {
  const input = text.trim();
  if (input === '0') {
    return 0;
  }

  const invalid = (): InvalidParameterError =>
    new InvalidParameterError(text, 'Durations look like 10m or 1h2m10s');
  if (input.length === 0) {
    throw invalid();
  }

  const part = /(\d+(?:\.\d+)?)(ms|h|m|s)/y;
  let total = 0;
  while (part.lastIndex < input.length) {
    const match = part.exec(input);
    if (!match) {
      throw invalid();
    }
    total += Number(match[1]) * UNIT_MS[match[2]];
  }
  return Math.round(total);
}
