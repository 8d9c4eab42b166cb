/**
 * API types for the rack management client
 */

import type { RetryPolicy } from './retry.js';

// =============================================================================
// Common Types
// =============================================================================

/**
 * HTTP methods supported by the rack API
 */
export type HttpMethod = 'GET' | 'POST' | 'PUT';

// =============================================================================
// Entity Types
// =============================================================================

/**
 * Known values of SystemState.status. The rack may report others
 * (e.g. "converging"), which the supervisor treats as in progress.
 */
export type SystemStatus = 'running' | 'updating' | 'rollback' | (string & {});

/**
 * Live snapshot of a rack
 */
export interface SystemState {
  name: string;
  status: SystemStatus;
  /** Current release id */
  version: string;
  /** Instance count */
  count?: number;
  /** Instance type */
  type?: string;
  domain?: string;
  region?: string;
}

/**
 * Entry of the rack's own release history
 */
export interface SystemRelease {
  id: string;
  createdAt?: string;
}

/**
 * Parameter name to value mapping
 */
export type ParameterSet = Record<string, string>;

/**
 * Scale request; omitted fields are left unchanged
 */
export interface ScaleRequest {
  count?: number;
  type?: string;
}

/**
 * One process running on the rack; rack-level ones have no app
 */
export interface RackProcess {
  id: string;
  app?: string;
  /** Service the process belongs to */
  name: string;
  release?: string;
  status?: string;
  command?: string;
  /** ISO start time */
  started?: string;
  /** CPU usage in percent */
  cpu?: number;
  /** Memory in use, in MB */
  memory?: number;
}

/**
 * Desired shape of one service of an app
 */
export interface FormationEntry {
  name: string;
  count?: number;
  /** Memory limit in MB */
  memory?: number;
}

export interface LogStreamOptions {
  /** Only lines containing this token */
  filter?: string;
  /** Keep the stream open for new lines */
  follow: boolean;
  /** How far back to start */
  sinceMs: number;
}

// =============================================================================
// Configuration Types
// =============================================================================

/**
 * Rack client configuration
 */
export interface RackClientConfig {
  /** Rack API host, with or without scheme (e.g. "rack.example.org" or "http://localhost:5443") */
  host: string;
  /** Rack password, sent as basic auth */
  password?: string;
  /** Rack name, sent as the Rack header when talking to a console */
  rack?: string;
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
  /** Retries for idempotent reads (writes are never retried) */
  retry?: RetryPolicy;
  /** Client version sent in the Version header */
  clientVersion?: string;
  /** Enable debug logging */
  debug?: boolean;
}
