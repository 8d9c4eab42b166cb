/**
 * Unit Tests: Version Registry
 *
 * Parsing the registry document and loading a catalog through an injected
 * fetch. No network access.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  parseReleases,
  loadCatalog,
  resolveVersionsUrl,
  DEFAULT_VERSIONS_URL,
} from '../../src/versions/registry.js';
import { CatalogUnavailableError } from '../../src/errors.js';
import { jsonResponse } from '../fakes.js';

const REGISTRY_URL = 'https://registry.test/versions.json';

const DOCUMENT = [
  { version: '20200101000000', created: '2020-01-01T00:00:00Z', published: true },
  { version: '20200201000000', created: '2020-02-01T00:00:00Z', required: true },
  { version: '20200301000000', published: false, description: 'preview' },
];

describe('parseReleases', () => {
  it('maps registry entries to releases', () => {
    expect(parseReleases(DOCUMENT)).toEqual([
      {
        id: '20200101000000',
        createdAt: '2020-01-01T00:00:00.000Z',
        required: false,
        published: true,
        description: undefined,
      },
      {
        id: '20200201000000',
        createdAt: '2020-02-01T00:00:00.000Z',
        required: true,
        published: true,
        description: undefined,
      },
      {
        id: '20200301000000',
        createdAt: undefined,
        required: false,
        published: false,
        description: 'preview',
      },
    ]);
  });

  it('treats only a literal true as required', () => {
    const [entry] = parseReleases([{ version: '20200101000000', required: 'yes' }]);
    expect(entry.required).toBe(false);
  });

  it('drops an unparseable creation date', () => {
    const [entry] = parseReleases([{ version: '20200101000000', created: 'not a date' }]);
    expect(entry.createdAt).toBeUndefined();
  });

  it('rejects a document that is not an array', () => {
    expect(() => parseReleases({ versions: [] })).toThrow(
      'Version catalog unavailable: registry response is not an array'
    );
  });

  it('rejects an entry without a version', () => {
    expect(() => parseReleases([{ version: '20200101000000' }, { created: '2020-01-01' }])).toThrow(
      'Version catalog unavailable: malformed release entry at index 1'
    );
  });
});

describe('resolveVersionsUrl', () => {
  afterEach(() => {
    delete process.env.RACKCTL_VERSIONS_URL;
  });

  it('prefers an explicit url', () => {
    process.env.RACKCTL_VERSIONS_URL = 'https://env.test/versions.json';
    expect(resolveVersionsUrl(REGISTRY_URL)).toBe(REGISTRY_URL);
  });

  it('falls back to RACKCTL_VERSIONS_URL', () => {
    process.env.RACKCTL_VERSIONS_URL = 'https://env.test/versions.json';
    expect(resolveVersionsUrl()).toBe('https://env.test/versions.json');
  });

  it('defaults to the public registry', () => {
    expect(resolveVersionsUrl()).toBe(DEFAULT_VERSIONS_URL);
  });
});

describe('loadCatalog', () => {
  it('fetches the registry once and hides unpublished releases', async () => {
    const fetchImpl = vi.fn().mockResolvedValue(jsonResponse(DOCUMENT));

    const catalog = await loadCatalog({ url: REGISTRY_URL, fetch: fetchImpl });

    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(fetchImpl.mock.calls[0][0]).toBe(REGISTRY_URL);
    expect(catalog.all().map((r) => r.id)).toEqual(['20200201000000', '20200101000000']);
  });

  it('keeps unpublished releases on request', async () => {
    const fetchImpl = vi.fn().mockResolvedValue(jsonResponse(DOCUMENT));

    const catalog = await loadCatalog({ url: REGISTRY_URL, fetch: fetchImpl, includeUnpublished: true });

    expect(catalog.latest().id).toBe('20200301000000');
  });

  it('maps an error status to CatalogUnavailableError without retrying', async () => {
    const fetchImpl = vi.fn().mockResolvedValue(new Response('unavailable', { status: 503 }));

    await expect(loadCatalog({ url: REGISTRY_URL, fetch: fetchImpl })).rejects.toThrow(
      'Version catalog unavailable: registry answered 503'
    );
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it('wraps transport failures', async () => {
    const fetchImpl = vi.fn().mockRejectedValue(new TypeError('fetch failed'));

    const error = await loadCatalog({ url: REGISTRY_URL, fetch: fetchImpl }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CatalogUnavailableError);
    expect(error).toMatchObject({
      message: 'Version catalog unavailable: fetch failed',
      code: 'CATALOG_UNAVAILABLE',
      url: REGISTRY_URL,
    });
  });

  it('wraps a malformed document', async () => {
    const fetchImpl = vi.fn().mockResolvedValue(jsonResponse({ error: 'nope' }));

    await expect(loadCatalog({ url: REGISTRY_URL, fetch: fetchImpl })).rejects.toBeInstanceOf(
      CatalogUnavailableError
    );
  });
});
