/**
 * Update target planning
 *
 * Picks the version a single `rack update` invocation moves to. A required
 * release between the current version and the requested one always becomes
 * the target, so no rack skips a mandatory migration step.
 */

import type { Release, UpdatePlan } from './types.js';
import { LATEST_TOKEN, compareReleaseIds, type VersionCatalog } from './catalog.js';
import { IsLatestError } from '../errors.js';

export const REQUIRED_UPDATE_WARNING =
  'Required update found. Please run `rackctl rack update` again once this update completes.';

/**
 * Compute the target for one update invocation
 *
 * @param currentVersion - Version the rack runs now
 * @param requested - Requested release id, or "latest" (default)
 * @throws ReleaseNotFoundError if `requested` or `currentVersion` is unknown
 * @throws EmptyCatalogError if the catalog is empty
 */
export function planUpdate(
  catalog: VersionCatalog,
  currentVersion: string,
  requested: string = LATEST_TOKEN
): UpdatePlan {
  const desired = catalog.resolve(requested);
  catalog.find(currentVersion);

  // Oldest required release on the way wins; a downgrade or a no-op has none
  const gate = catalog.between(currentVersion, desired.id).find((release) => release.required);
  const gated = gate !== undefined;
  const target = gate ?? desired;

  return {
    currentVersion,
    requested: desired,
    target,
    gated,
    upToDate: target.id === currentVersion,
    warnings: gated ? [REQUIRED_UPDATE_WARNING] : [],
  };
}

/**
 * The next release id when it is newer than both the running version and the
 * version the rack is already updating to
 */
export function newerVersionAvailable(
  catalog: VersionCatalog,
  currentVersion: string,
  pendingVersion: string = currentVersion
): string | undefined {
  let next: Release;
  try {
    next = catalog.next(currentVersion);
  } catch (error) {
    if (error instanceof IsLatestError) {
      return undefined;
    }
    throw error;
  }

  return compareReleaseIds(next.id, pendingVersion) > 0 ? next.id : undefined;
}
