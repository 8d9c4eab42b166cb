/**
 * Version registry loading
 *
 * Fetches the published release history. The registry is queried fresh on
 * every load and nothing is cached or retried: a failed lookup is reported
 * as CatalogUnavailableError straight away.
 */

import type { CatalogLoadOptions, Release } from './types.js';
import { VersionCatalog } from './catalog.js';
import { CatalogUnavailableError, errorMessage } from '../errors.js';
import { logger } from '../api/logger.js';

export const DEFAULT_VERSIONS_URL = 'https://rackctl.s3.amazonaws.com/release/versions.json';

const DEFAULT_TIMEOUT_MS = 15000;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function normalizeIsoDate(raw: unknown): string | undefined {
  if (typeof raw !== 'string') {
    return undefined;
  }

  const parsed = Date.parse(raw);
  if (!Number.isFinite(parsed)) {
    return undefined;
  }

  return new Date(parsed).toISOString();
}

/**
 * Resolve the registry URL from options, then RACKCTL_VERSIONS_URL
 */
export function resolveVersionsUrl(explicit?: string): string {
  const fromEnv = process.env.RACKCTL_VERSIONS_URL;
  if (explicit && explicit.trim().length > 0) return explicit.trim();
  if (fromEnv && fromEnv.trim().length > 0) return fromEnv.trim();
  return DEFAULT_VERSIONS_URL;
}

/**
 * Validate a registry document
 *
 * @throws CatalogUnavailableError when the payload is not a list of releases
 */
export function parseReleases(payload: unknown, url?: string): Release[] {
  if (!Array.isArray(payload)) {
    throw new CatalogUnavailableError('registry response is not an array', url);
  }

  return payload.map((entry: unknown, index) => {
    if (!isRecord(entry) || typeof entry.version !== 'string' || entry.version.trim().length === 0) {
      throw new CatalogUnavailableError(`malformed release entry at index ${index}`, url);
    }

    return {
      id: entry.version.trim(),
      createdAt: normalizeIsoDate(entry.created),
      required: entry.required === true,
      published: entry.published !== false,
      description: typeof entry.description === 'string' ? entry.description : undefined,
    };
  });
}

async function fetchRegistry(url: string, options: CatalogLoadOptions): Promise<unknown> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const fetchImpl = options.fetch ?? fetch;
  const controller = new AbortController();
  const timeout = setTimeout(() => {
    controller.abort(`Version lookup timed out after ${timeoutMs}ms`);
  }, timeoutMs);

  try {
    const response = await fetchImpl(url, {
      method: 'GET',
      headers: { Accept: 'application/json' },
      signal: controller.signal,
    });

    if (!response.ok) {
      throw new CatalogUnavailableError(`registry answered ${response.status}`, url);
    }

    return await response.json();
  } catch (error) {
    if (error instanceof CatalogUnavailableError) {
      throw error;
    }
    throw new CatalogUnavailableError(errorMessage(error), url);
  } finally {
    clearTimeout(timeout);
  }
}

/**
 * Fetch the registry and build a catalog
 */
export async function loadCatalog(options: CatalogLoadOptions = {}): Promise<VersionCatalog> {
  const url = resolveVersionsUrl(options.url);
  logger.debug('Loading version catalog', { url });

  const releases = parseReleases(await fetchRegistry(url, options), url);
  const visible = options.includeUnpublished
    ? releases
    : releases.filter((release) => release.published);

  logger.debug('Version catalog loaded', { total: releases.length, visible: visible.length });
  return new VersionCatalog(visible);
}
