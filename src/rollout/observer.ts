/**
 * Rollout observer
 *
 * Classifies a sequence of polled rack statuses. The observer remembers the
 * worst status it has seen: once `rollback` was observed, a later `running`
 * means the update was reverted, not that it succeeded.
 */

import type { SystemStatus } from '../api/types.js';

export type RolloutPhase = 'pending' | 'converged' | 'rolled_back';

export interface Observation {
  phase: RolloutPhase;
  /** True only for the first `rollback` reading */
  rollbackStarted: boolean;
}

export class RolloutObserver {
  private sawTransition = false;
  private sawRollback = false;

  /**
   * @param settleMs - After this long without any transition, a `running`
   *   reading counts as converged (the change finished between polls)
   */
  constructor(private readonly settleMs: number) {}

  get rollbackSeen(): boolean {
    return this.sawRollback;
  }

  get transitionSeen(): boolean {
    return this.sawTransition;
  }

  /**
   * Record one status reading
   *
   * @param elapsedMs - Time since supervision started
   */
  observe(status: SystemStatus, elapsedMs: number): Observation {
    switch (status) {
      case 'running': {
        if (this.sawRollback) {
          return { phase: 'rolled_back', rollbackStarted: false };
        }
        if (this.sawTransition || elapsedMs >= this.settleMs) {
          return { phase: 'converged', rollbackStarted: false };
        }
        return { phase: 'pending', rollbackStarted: false };
      }

      case 'rollback': {
        this.sawTransition = true;
        const first = !this.sawRollback;
        this.sawRollback = true;
        return { phase: 'pending', rollbackStarted: first };
      }

      default:
        // updating, or any other in-progress status the rack reports
        this.sawTransition = true;
        return { phase: 'pending', rollbackStarted: false };
    }
  }
}
