/**
 * Shared types and interfaces for the rackctl CLI
 */

import type { RackClient } from './api/client.js';

// ============================================================================
// Global Options and Context
// ============================================================================

/**
 * Global options available to all commands
 */
export interface GlobalOptions {
  /** Target rack name (sent to a console as the Rack header) */
  rack?: string;
  /** Output JSON for CI/automation */
  json: boolean;
  /** Enable verbose logging */
  verbose: boolean;
}

/**
 * Output format for command results
 */
export type OutputFormat = 'human' | 'json';

/**
 * Context passed to every command
 */
export interface CommandContext {
  options: GlobalOptions;
  outputFormat: OutputFormat;
  /**
   * Resolves the rack connection and builds the client on first use, so
   * commands that never talk to the rack (local start/stop) work without
   * rack credentials
   */
  client: () => Promise<RackClient>;
}

/**
 * Result of a command execution
 */
export interface CommandResult<T = unknown> {
  success: boolean;
  message: string;
  data?: T;
  errors?: string[];
  /** Informational outcome (e.g. nothing to update); exits 0 */
  notice?: boolean;
}

/**
 * A parameter a `params set` would change; `from` is absent for a
 * parameter the rack does not have yet
 */
export interface ParameterChange {
  name: string;
  from?: string;
  to: string;
}
