/**
 * Boolean switches read from the environment
 */

const TRUE_VALUES = new Set(['1', 't', 'true', 'y', 'yes', 'on']);

/**
 * Whether an environment value turns a switch on; unset, empty, "false",
 * "0" and anything unrecognised leave it off
 */
export function parseEnvFlag(value: string | undefined): boolean {
  return value !== undefined && TRUE_VALUES.has(value.trim().toLowerCase());
}
