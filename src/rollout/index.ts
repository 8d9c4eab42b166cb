/**
 * Rollout module exports
 */

export {
  triggerUpdate,
  superviseRollout,
  waitForRack,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_INTERVAL_MS,
  DEFAULT_GRACE_MS,
  DEFAULT_SETTLE_MS,
  type SuperviseOptions,
  type SupervisionResult,
  type RolloutOutcome,
} from './supervisor.js';
export { RolloutObserver, type RolloutPhase, type Observation } from './observer.js';
