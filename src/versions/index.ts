/**
 * Version catalog module exports
 */

export { VersionCatalog, compareReleaseIds, LATEST_TOKEN } from './catalog.js';
export {
  loadCatalog,
  parseReleases,
  resolveVersionsUrl,
  DEFAULT_VERSIONS_URL,
} from './registry.js';
export { planUpdate, newerVersionAvailable, REQUIRED_UPDATE_WARNING } from './plan.js';
export type { Release, CatalogLoadOptions, UpdatePlan } from './types.js';
