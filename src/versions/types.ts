/**
 * Version catalog types
 */

/**
 * One published version of the rack software
 */
export interface Release {
  /** Opaque ordering key, compared as a plain string (e.g. "20200201000000") */
  id: string;
  /** Publication time, display only */
  createdAt?: string;
  /** Every upgrade path crossing this release must stop here */
  required: boolean;
  /** Unpublished releases are hidden unless explicitly requested */
  published: boolean;
  description?: string;
}

/**
 * Options for loading the catalog from the version registry
 */
export interface CatalogLoadOptions {
  /** Registry URL (default: RACKCTL_VERSIONS_URL or the public registry) */
  url?: string;
  /** Request timeout in milliseconds (default: 15000) */
  timeoutMs?: number;
  /** Keep unpublished releases in the catalog */
  includeUnpublished?: boolean;
  /** Replaces global fetch (tests) */
  fetch?: typeof fetch;
}

/**
 * The target chosen for one update invocation
 */
export interface UpdatePlan {
  /** Version the rack is currently running */
  currentVersion: string;
  /** Version the user asked for, after resolving "latest" */
  requested: Release;
  /** Version this invocation will move to */
  target: Release;
  /** True when a required release stopped the plan short of `requested` */
  gated: boolean;
  /** True when the rack already runs the target */
  upToDate: boolean;
  /** Human-readable warnings for the caller */
  warnings: string[];
}
