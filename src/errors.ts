/**
 * Error classes for rackctl
 *
 * Every failure the core can report has its own class and code so commands
 * can tell "it's just slow" from "it reverted" from "nothing to do".
 */

/**
 * Error codes for programmatic handling
 */
export type RackErrorCode =
  | 'CATALOG_UNAVAILABLE'
  | 'EMPTY_CATALOG'
  | 'NOT_FOUND'
  | 'IS_LATEST'
  | 'TRIGGER_REJECTED'
  | 'NOOP_UPDATE'
  | 'POLLING_TRANSPORT'
  | 'TIMEOUT'
  | 'ROLLBACK_DETECTED'
  | 'LOCAL_LIFECYCLE'
  | 'INVALID_PARAMETER'
  | 'CONFIG_MISSING';

/**
 * Base error class for rack operations
 */
export class RackError extends Error {
  constructor(
    message: string,
    public readonly code: RackErrorCode,
    public readonly suggestion?: string
  ) {
    super(message);
    this.name = 'RackError';
  }

  /**
   * Informational errors are reported as notices, not failures
   */
  get fatal(): boolean {
    return true;
  }

  /**
   * Get a user-friendly formatted error message
   */
  toUserMessage(): string {
    let msg = `Error: ${this.message}`;
    if (this.suggestion) {
      msg += `\n\nSuggestion: ${this.suggestion}`;
    }
    return msg;
  }
}

// =============================================================================
// Version Catalog
// =============================================================================

/**
 * The version registry could not be reached or returned malformed data
 */
export class CatalogUnavailableError extends RackError {
  constructor(
    reason: string,
    public readonly url?: string
  ) {
    super(
      `Version catalog unavailable: ${reason}`,
      'CATALOG_UNAVAILABLE',
      'Check network access to the version registry or set RACKCTL_VERSIONS_URL'
    );
    this.name = 'CatalogUnavailableError';
  }
}

export class EmptyCatalogError extends RackError {
  constructor() {
    super('No releases are published in the version catalog', 'EMPTY_CATALOG');
    this.name = 'EmptyCatalogError';
  }
}

export class ReleaseNotFoundError extends RackError {
  constructor(public readonly releaseId: string) {
    super(
      `Release not found: ${releaseId}`,
      'NOT_FOUND',
      'Run `rackctl rack releases --unpublished` to list known versions'
    );
    this.name = 'ReleaseNotFoundError';
  }
}

export class IsLatestError extends RackError {
  constructor(public readonly releaseId: string) {
    super(`Release ${releaseId} is latest`, 'IS_LATEST');
    this.name = 'IsLatestError';
  }
}

// =============================================================================
// Rollout
// =============================================================================

/**
 * The rack refused to start a transition (already at that version, unknown version)
 */
export class TriggerRejectedError extends RackError {
  constructor(
    remoteMessage: string,
    public readonly targetVersion: string
  ) {
    super(remoteMessage, 'TRIGGER_REJECTED');
    this.name = 'TriggerRejectedError';
  }
}

export class PollingTransportError extends RackError {
  constructor(
    message: string,
    public readonly polls: number,
    public readonly originalError?: Error
  ) {
    super(
      `Lost contact with rack while waiting: ${message}`,
      'POLLING_TRANSPORT',
      'The update is still running remotely; check `rackctl rack` and wait again'
    );
    this.name = 'PollingTransportError';
  }
}

export class RolloutTimeoutError extends RackError {
  constructor(
    public readonly timeoutMs: number,
    public readonly lastStatus?: string
  ) {
    super(
      'Timed out waiting for rack to converge',
      'TIMEOUT',
      lastStatus ? `Rack was last seen in status "${lastStatus}"` : undefined
    );
    this.name = 'RolloutTimeoutError';
  }
}

export class RollbackDetectedError extends RackError {
  constructor() {
    super('Update rolled back', 'ROLLBACK_DETECTED', 'Inspect the rack logs for the failed change');
    this.name = 'RollbackDetectedError';
  }
}

// =============================================================================
// Parameters
// =============================================================================

/**
 * The requested parameters already match the rack's configuration
 */
export class NoopUpdateError extends RackError {
  constructor() {
    super('No updates are to be performed', 'NOOP_UPDATE');
    this.name = 'NoopUpdateError';
  }

  override get fatal(): boolean {
    return false;
  }
}

export class InvalidParameterError extends RackError {
  constructor(
    public readonly argument: string,
    suggestion = 'Parameters are given as NAME=VALUE'
  ) {
    super(`invalid argument: ${argument}`, 'INVALID_PARAMETER', suggestion);
    this.name = 'InvalidParameterError';
  }
}

// =============================================================================
// Local rack and configuration
// =============================================================================

export class LocalLifecycleError extends RackError {
  constructor(
    message: string,
    public readonly rackName: string,
    public readonly originalError?: Error
  ) {
    super(message, 'LOCAL_LIFECYCLE', 'Ensure docker is installed and running');
    this.name = 'LocalLifecycleError';
  }
}

export class RackConfigError extends RackError {
  constructor(message: string) {
    super(
      message,
      'CONFIG_MISSING',
      'Set RACKCTL_HOST and RACKCTL_PASSWORD, or add them to ~/.config/rackctl/config.yaml'
    );
    this.name = 'RackConfigError';
  }
}

/**
 * Type guard to check if an error is a RackError
 */
export function isRackError(error: unknown): error is RackError {
  return error instanceof RackError;
}

/**
 * Format any error into a user-friendly message
 */
export function formatError(error: unknown): string {
  if (isRackError(error)) {
    return error.toUserMessage();
  }
  if (error instanceof Error) {
    return `Error: ${error.message}`;
  }
  return `Error: ${String(error)}`;
}

/**
 * Extract the plain message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
