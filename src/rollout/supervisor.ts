/**
 * Rollout supervisor
 *
 * Triggers a version transition on the rack and polls its status until it
 * converges, rolls back, or the deadline passes. The rack never pushes status
 * changes, so every decision is made from fresh /system snapshots.
 */

import type { SystemState } from '../api/types.js';
import type { SystemReader, SystemUpdater } from '../api/client.js';
import { ApiRequestError, MalformedResponseError } from '../api/errors.js';
import { sleep as defaultSleep } from '../api/retry.js';
import { logger } from '../api/logger.js';
import {
  PollingTransportError,
  RollbackDetectedError,
  RolloutTimeoutError,
  TriggerRejectedError,
  errorMessage,
} from '../errors.js';
import { RolloutObserver } from './observer.js';

// =============================================================================
// Constants
// =============================================================================

export const DEFAULT_TIMEOUT_MS = 30 * 60 * 1000;
export const DEFAULT_INTERVAL_MS = 2000;
/** Gives the rack time to flip from running to updating after a trigger */
export const DEFAULT_GRACE_MS = 5000;
export const DEFAULT_SETTLE_MS = 60 * 1000;

// =============================================================================
// Types
// =============================================================================

export interface SuperviseOptions {
  /** Deadline, measured from the first poll (default: 30 minutes) */
  timeoutMs?: number;
  /** Delay between polls (default: 2 seconds) */
  intervalMs?: number;
  /** Delay before the first poll (default: 5 seconds) */
  graceMs?: number;
  /** How long `running` without any transition is treated as "not started yet" */
  settleMs?: number;
  /** Called once, on the first `rollback` reading */
  onRollback?: (system: SystemState) => void;
  /** Called after every successful poll */
  onPoll?: (system: SystemState, poll: number) => void;
  /** Replaces the real timer (tests) */
  sleep?: (ms: number) => Promise<void>;
  /** Replaces the real clock (tests) */
  now?: () => number;
}

export type RolloutOutcome = 'converged' | 'rolled_back';

export interface SupervisionResult {
  outcome: RolloutOutcome;
  /** Number of status polls made */
  polls: number;
  /** Last snapshot observed */
  system: SystemState;
  elapsedMs: number;
}

// =============================================================================
// Trigger
// =============================================================================

/**
 * Ask the rack to begin moving to `targetVersion`; does not wait
 *
 * @returns The rack's acknowledgement snapshot, or undefined when the rack
 *   accepted the update with a body that is not a system snapshot
 * @throws TriggerRejectedError if the rack refuses the update (4xx)
 */
export async function triggerUpdate(
  updater: SystemUpdater,
  targetVersion: string
): Promise<SystemState | undefined> {
  logger.debug('Triggering rack update', { targetVersion });

  try {
    return await updater.updateSystem(targetVersion);
  } catch (error) {
    if (error instanceof MalformedResponseError) {
      logger.warn('Rack accepted the update with an unreadable acknowledgement', { targetVersion });
      return undefined;
    }
    if (error instanceof ApiRequestError && error.isRefusal()) {
      throw new TriggerRejectedError(error.message, targetVersion);
    }
    throw error;
  }
}

// =============================================================================
// Supervision
// =============================================================================

/**
 * Poll the rack until it converges or rolls back
 *
 * @throws RolloutTimeoutError if no terminal status is seen before the deadline
 * @throws PollingTransportError if a status poll fails
 */
export async function superviseRollout(
  reader: SystemReader,
  options: SuperviseOptions = {}
): Promise<SupervisionResult> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const intervalMs = options.intervalMs ?? DEFAULT_INTERVAL_MS;
  const graceMs = options.graceMs ?? DEFAULT_GRACE_MS;
  const wait = options.sleep ?? defaultSleep;
  const now = options.now ?? Date.now;

  const observer = new RolloutObserver(options.settleMs ?? DEFAULT_SETTLE_MS);

  if (graceMs > 0) {
    await wait(graceMs);
  }

  const startedAt = now();
  const deadline = startedAt + timeoutMs;
  let polls = 0;
  let last: SystemState | undefined;

  for (;;) {
    await wait(intervalMs);

    if (now() >= deadline) {
      logger.warn('Rollout supervision timed out', {
        timeoutMs,
        polls,
        lastStatus: last?.status,
      });
      throw new RolloutTimeoutError(timeoutMs, last?.status);
    }

    let system: SystemState;
    try {
      system = await reader.getSystem();
    } catch (error) {
      throw new PollingTransportError(
        errorMessage(error),
        polls,
        error instanceof Error ? error : undefined
      );
    }

    polls++;
    last = system;
    options.onPoll?.(system, polls);

    const elapsedMs = now() - startedAt;
    const observation = observer.observe(system.status, elapsedMs);

    if (observation.rollbackStarted) {
      logger.warn('Rack is rolling back', { version: system.version, polls });
      options.onRollback?.(system);
    }

    if (observation.phase !== 'pending') {
      logger.debug('Rollout reached terminal state', {
        outcome: observation.phase,
        polls,
        elapsedMs,
      });
      return { outcome: observation.phase, polls, system, elapsedMs };
    }
  }
}

/**
 * Block until the rack is running again
 *
 * @throws RollbackDetectedError if the rack reverted the change
 */
export async function waitForRack(
  reader: SystemReader,
  options: SuperviseOptions = {}
): Promise<SupervisionResult> {
  const result = await superviseRollout(reader, options);
  if (result.outcome === 'rolled_back') {
    throw new RollbackDetectedError();
  }
  return result;
}
