/**
 * Rack connection resolution
 *
 * ## Resolution Order
 *
 * 1. Explicit options (`host`, `password`, `rack`)
 * 2. RACKCTL_HOST / RACKCTL_PASSWORD environment variables
 * 3. ~/.config/rackctl/config.yaml (`host`, `password`, optional `rack`)
 * 4. A running local rack, reached at localhost:5443
 *
 * The rack name falls back along the same chain (RACKCTL_RACK, then the
 * config file) independently of where the host came from.
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { parse } from 'yaml';
import { RackConfigError, errorMessage } from '../errors.js';

export const LOCAL_RACK_HOST = 'localhost:5443';

export type RackContextSource = 'options' | 'env' | 'config' | 'local';

export interface RackContext {
  host: string;
  password?: string;
  rack?: string;
  source: RackContextSource;
}

/**
 * Contents of the user config file
 */
export interface RackConfigFile {
  host?: string;
  password?: string;
  rack?: string;
}

export interface ResolveRackContextOptions {
  host?: string;
  password?: string;
  rack?: string;
  env?: NodeJS.ProcessEnv;
  configPath?: string;
  /** Checks for a running local rack; skipped when omitted */
  isLocalRunning?: () => Promise<boolean>;
}

export function defaultConfigPath(): string {
  return path.join(os.homedir(), '.config', 'rackctl', 'config.yaml');
}

function nonEmpty(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function readStringField(record: Record<string, unknown>, key: string, file: string): string | undefined {
  const value = record[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string' && typeof value !== 'number') {
    throw new RackConfigError(`Invalid "${key}" in ${file}: expected a string`);
  }
  return nonEmpty(String(value));
}

/**
 * Load the YAML config file; undefined when it does not exist
 *
 * @throws RackConfigError if the file cannot be read or parsed
 */
export function loadConfigFile(configPath: string = defaultConfigPath()): RackConfigFile | undefined {
  if (!fs.existsSync(configPath)) {
    return undefined;
  }

  let document: unknown;
  try {
    document = parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new RackConfigError(`Could not read ${configPath}: ${errorMessage(error)}`);
  }

  if (document === null || document === undefined) {
    return {};
  }
  if (typeof document !== 'object' || Array.isArray(document)) {
    throw new RackConfigError(`Invalid ${configPath}: expected a mapping`);
  }

  const record: Record<string, unknown> = { ...document };
  return {
    host: readStringField(record, 'host', configPath),
    password: readStringField(record, 'password', configPath),
    rack: readStringField(record, 'rack', configPath),
  };
}

/**
 * Resolve which rack to talk to and how
 *
 * @throws RackConfigError if no rack can be found
 */
export async function resolveRackContext(
  options: ResolveRackContextOptions = {}
): Promise<RackContext> {
  const env = options.env ?? process.env;
  const file = loadConfigFile(options.configPath);

  const rack = nonEmpty(options.rack) ?? nonEmpty(env.RACKCTL_RACK) ?? file?.rack;

  const explicitHost = nonEmpty(options.host);
  if (explicitHost) {
    return { host: explicitHost, password: nonEmpty(options.password), rack, source: 'options' };
  }

  const envHost = nonEmpty(env.RACKCTL_HOST);
  if (envHost) {
    return { host: envHost, password: nonEmpty(env.RACKCTL_PASSWORD), rack, source: 'env' };
  }

  if (file?.host) {
    return {
      host: file.host,
      password: nonEmpty(env.RACKCTL_PASSWORD) ?? file.password,
      rack,
      source: 'config',
    };
  }

  if (options.isLocalRunning && (await options.isLocalRunning())) {
    return { host: LOCAL_RACK_HOST, password: nonEmpty(env.RACKCTL_PASSWORD), rack, source: 'local' };
  }

  throw new RackConfigError('No rack configured');
}
