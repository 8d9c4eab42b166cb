/**
 * Version catalog
 *
 * Holds the release history of the rack software and answers resolution
 * queries. Releases are ordered by plain string comparison of their ids,
 * never by semantic versioning.
 */

import type { Release } from './types.js';
import {
  EmptyCatalogError,
  IsLatestError,
  ReleaseNotFoundError,
} from '../errors.js';

/** Token accepted by resolve() for the newest release */
export const LATEST_TOKEN = 'latest';

/**
 * Compare two release ids as plain strings
 */
export function compareReleaseIds(left: string, right: string): number {
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

export class VersionCatalog {
  /** Oldest first */
  private readonly ascending: Release[];
  private readonly byId: Map<string, Release>;

  constructor(releases: Iterable<Release>) {
    this.byId = new Map();
    for (const release of releases) {
      // First occurrence wins
      if (!this.byId.has(release.id)) {
        this.byId.set(release.id, { ...release });
      }
    }
    this.ascending = [...this.byId.values()].sort((a, b) => compareReleaseIds(a.id, b.id));
  }

  get size(): number {
    return this.ascending.length;
  }

  /**
   * Full history, newest first
   */
  all(): Release[] {
    return [...this.ascending].reverse();
  }

  /**
   * The newest release
   *
   * @throws EmptyCatalogError if the catalog has no releases
   */
  latest(): Release {
    const newest = this.ascending[this.ascending.length - 1];
    if (!newest) {
      throw new EmptyCatalogError();
    }
    return newest;
  }

  /**
   * Exact lookup by id
   *
   * @throws ReleaseNotFoundError if no release has this id
   */
  find(id: string): Release {
    const release = this.byId.get(id);
    if (!release) {
      throw new ReleaseNotFoundError(id);
    }
    return release;
  }

  /**
   * "latest" or a release id
   */
  resolve(token: string): Release {
    return token === LATEST_TOKEN ? this.latest() : this.find(token);
  }

  /**
   * Releases strictly after `fromId` and strictly before `toId`, oldest first
   */
  between(fromId: string, toId: string): Release[] {
    return this.ascending.filter(
      (release) => compareReleaseIds(release.id, fromId) > 0 && compareReleaseIds(release.id, toId) < 0
    );
  }

  /**
   * The release immediately after `currentId` in history order
   *
   * @throws ReleaseNotFoundError if `currentId` is unknown
   * @throws IsLatestError if `currentId` is the newest release
   */
  next(currentId: string): Release {
    const index = this.ascending.findIndex((release) => release.id === currentId);
    if (index === -1) {
      throw new ReleaseNotFoundError(currentId);
    }

    const following = this.ascending[index + 1];
    if (!following) {
      throw new IsLatestError(currentId);
    }
    return following;
  }
}
