/**
 * Rack API Client
 *
 * Provides a typed interface to the rack management API with:
 * - Basic auth from an explicit RackContext (never from ambient env)
 * - Bounded retry for idempotent reads; writes are sent exactly once
 * - JSON logging with secret redaction
 * - Console targeting via the Rack header
 */

import type {
  FormationEntry,
  HttpMethod,
  LogStreamOptions,
  ParameterSet,
  RackClientConfig,
  RackProcess,
  ScaleRequest,
  SystemRelease,
  SystemState,
} from './types.js';
import { ApiRequestError, MalformedResponseError } from './errors.js';
import { retryRead, retryAfterMs } from './retry.js';
import { logger, createLogger } from './logger.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Main rack client interface
 */
export interface RackClient {
  /** Fetch a fresh snapshot of the rack */
  getSystem(): Promise<SystemState>;
  /** Begin a version transition; resolves once the rack has accepted it */
  updateSystem(version: string): Promise<SystemState>;
  scaleSystem(request: ScaleRequest): Promise<SystemState>;
  listParameters(app: string): Promise<ParameterSet>;
  setParameters(app: string, params: ParameterSet): Promise<void>;
  listSystemReleases(): Promise<SystemRelease[]>;
  /** Rack processes; with `all`, app processes too */
  getSystemProcesses(options?: { all?: boolean }): Promise<RackProcess[]>;
  listFormation(app: string): Promise<FormationEntry[]>;
  /** Stream rack log text to `onText` until the rack closes the stream */
  streamSystemLogs(options: LogStreamOptions, onText: (text: string) => void): Promise<void>;

  /** Get current configuration (with redacted secrets) */
  getConfig(): { baseUrl: string; rack?: string; hasPassword: boolean };
}

/**
 * The slices of RackClient each core routine needs
 */
export type SystemReader = Pick<RackClient, 'getSystem'>;
export type SystemUpdater = Pick<RackClient, 'updateSystem'>;
export type ParameterWriter = Pick<RackClient, 'setParameters'>;

const AUTH_USER = 'rackctl';

// =============================================================================
// Response Parsing
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

/**
 * Validate a /system payload
 */
export function parseSystemState(payload: unknown): SystemState {
  if (!isRecord(payload) || typeof payload.status !== 'string' || typeof payload.version !== 'string') {
    throw new MalformedResponseError('system');
  }

  return {
    name: typeof payload.name === 'string' ? payload.name : '',
    status: payload.status,
    version: payload.version,
    count: optionalNumber(payload.count),
    type: optionalString(payload.type),
    domain: optionalString(payload.domain),
    region: optionalString(payload.region),
  };
}

function parseSystemReleases(payload: unknown): SystemRelease[] {
  if (!Array.isArray(payload)) {
    throw new MalformedResponseError('releases');
  }

  const releases: SystemRelease[] = [];
  for (const entry of payload) {
    if (isRecord(entry) && typeof entry.id === 'string') {
      releases.push({ id: entry.id, createdAt: optionalString(entry.created) });
    }
  }
  return releases;
}

function parseParameterSet(payload: unknown): ParameterSet {
  if (!isRecord(payload)) {
    throw new MalformedResponseError('parameters');
  }

  const params: ParameterSet = {};
  for (const [key, value] of Object.entries(payload)) {
    if (typeof value === 'string') {
      params[key] = value;
    } else if (typeof value === 'number' || typeof value === 'boolean') {
      params[key] = String(value);
    }
  }
  return params;
}

function parseProcesses(payload: unknown): RackProcess[] {
  if (!Array.isArray(payload)) {
    throw new MalformedResponseError('processes');
  }

  const processes: RackProcess[] = [];
  for (const entry of payload) {
    if (!isRecord(entry) || typeof entry.id !== 'string') continue;
    processes.push({
      id: entry.id,
      app: optionalString(entry.app),
      name: typeof entry.name === 'string' ? entry.name : '',
      release: optionalString(entry.release),
      status: optionalString(entry.status),
      command: optionalString(entry.command),
      started: optionalString(entry.started),
      cpu: optionalNumber(entry.cpu),
      memory: optionalNumber(entry.memory),
    });
  }
  return processes;
}

function parseFormation(payload: unknown): FormationEntry[] {
  if (!Array.isArray(payload)) {
    throw new MalformedResponseError('formation');
  }

  const formation: FormationEntry[] = [];
  for (const entry of payload) {
    if (isRecord(entry) && typeof entry.name === 'string') {
      formation.push({
        name: entry.name,
        count: optionalNumber(entry.count),
        memory: optionalNumber(entry.memory),
      });
    }
  }
  return formation;
}

/**
 * Pull a human-readable message out of an error body
 */
export function extractErrorMessage(body: string, status: number): string {
  const fallback = `Rack API error (${status})`;
  const trimmed = body.trim();
  if (trimmed.length === 0) {
    return fallback;
  }

  try {
    const parsed: unknown = JSON.parse(trimmed);
    if (isRecord(parsed) && typeof parsed.error === 'string' && parsed.error.length > 0) {
      return parsed.error;
    }
  } catch {
    return trimmed.substring(0, 200);
  }

  return trimmed.substring(0, 200);
}

/**
 * Add https:// when the host has no scheme
 */
export function normalizeBaseUrl(host: string): string {
  const trimmed = host.trim().replace(/\/+$/, '');
  return /^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
}

// =============================================================================
// Client Implementation
// =============================================================================

/**
 * Create a rack API client
 *
 * @param config - Client configuration options
 */
export function createRackClient(config: RackClientConfig): RackClient {
  const baseUrl = normalizeBaseUrl(config.host);
  const timeout = config.timeout ?? 30000;
  const log = config.debug
    ? createLogger({ ...logger.getConfig(), level: 'debug', context: { rack: config.rack } })
    : logger;

  const defaultHeaders: Record<string, string> = {
    Accept: 'application/json',
  };

  if (config.password) {
    const token = Buffer.from(`${AUTH_USER}:${config.password}`).toString('base64');
    defaultHeaders['Authorization'] = `Basic ${token}`;
  }

  if (config.rack) {
    defaultHeaders['Rack'] = config.rack;
  }

  if (config.clientVersion) {
    defaultHeaders['Version'] = config.clientVersion;
  }

  /**
   * Send one request and return the response once its headers are in;
   * the timeout covers only that wait
   */
  async function send(method: HttpMethod, path: string, form?: Record<string, string>): Promise<Response> {
    const url = `${baseUrl}${path}`;
    const headers: Record<string, string> = { ...defaultHeaders };
    let body: string | undefined;

    if (form) {
      headers['Content-Type'] = 'application/x-www-form-urlencoded';
      body = new URLSearchParams(form).toString();
    }

    log.request(method, url, headers);

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);
    const startTime = Date.now();

    let response: Response;
    try {
      response = await fetch(url, { method, headers, body, signal: controller.signal });
    } finally {
      clearTimeout(timeoutId);
    }

    log.response(response.status, url, Date.now() - startTime);

    if (!response.ok) {
      const text = await response.text();
      throw new ApiRequestError(
        extractErrorMessage(text, response.status),
        response.status,
        retryAfterMs(response.headers.get('Retry-After'))
      );
    }

    return response;
  }

  async function readJson(response: Response, resource: string): Promise<unknown> {
    const text = response.status === 204 ? '' : await response.text();
    if (text.trim().length === 0) {
      return undefined;
    }
    try {
      return JSON.parse(text);
    } catch {
      throw new MalformedResponseError(resource);
    }
  }

  /**
   * Read a resource; transient failures are retried
   */
  function get(path: string, resource: string): Promise<unknown> {
    return retryRead(async () => readJson(await send('GET', path), resource), config.retry, {
      onRetry: (attempt, error, delayMs) => {
        log.info(`Retrying request to ${path}`, { attempt, error: error.message, delayMs });
      },
    });
  }

  /**
   * Change something; sent exactly once
   */
  async function write(
    method: 'POST' | 'PUT',
    path: string,
    form: Record<string, string>,
    resource: string
  ): Promise<unknown> {
    return readJson(await send(method, path, form), resource);
  }

  function scaleForm(scale: ScaleRequest): Record<string, string> {
    const form: Record<string, string> = {};
    if (scale.count !== undefined) {
      form.count = String(scale.count);
    }
    if (scale.type !== undefined && scale.type.length > 0) {
      form.type = scale.type;
    }
    return form;
  }

  return {
    async getSystem(): Promise<SystemState> {
      return parseSystemState(await get('/system', 'system'));
    },

    async updateSystem(version: string): Promise<SystemState> {
      return parseSystemState(await write('PUT', '/system', { version }, 'system'));
    },

    async scaleSystem(scale: ScaleRequest): Promise<SystemState> {
      return parseSystemState(await write('PUT', '/system', scaleForm(scale), 'system'));
    },

    async listParameters(app: string): Promise<ParameterSet> {
      return parseParameterSet(await get(`/apps/${encodeURIComponent(app)}/parameters`, 'parameters'));
    },

    async setParameters(app: string, params: ParameterSet): Promise<void> {
      await write('POST', `/apps/${encodeURIComponent(app)}/parameters`, params, 'parameters');
    },

    async listSystemReleases(): Promise<SystemRelease[]> {
      return parseSystemReleases(await get('/system/releases', 'releases'));
    },

    async getSystemProcesses(options: { all?: boolean } = {}): Promise<RackProcess[]> {
      const query = options.all ? '?all=true' : '';
      return parseProcesses(await get(`/system/processes${query}`, 'processes'));
    },

    async listFormation(app: string): Promise<FormationEntry[]> {
      return parseFormation(await get(`/apps/${encodeURIComponent(app)}/formation`, 'formation'));
    },

    async streamSystemLogs(options: LogStreamOptions, onText: (text: string) => void): Promise<void> {
      const query = new URLSearchParams({
        follow: String(options.follow),
        since: String(Math.floor(options.sinceMs / 1000)),
      });
      if (options.filter) {
        query.set('filter', options.filter);
      }

      const response = await send('GET', `/system/logs?${query.toString()}`);
      if (!response.body) {
        return;
      }

      const reader = response.body.getReader();
      const decoder = new TextDecoder();
      for (;;) {
        const { done, value } = await reader.read();
        if (done) break;
        onText(decoder.decode(value, { stream: true }));
      }
      const rest = decoder.decode();
      if (rest.length > 0) {
        onText(rest);
      }
    },

    getConfig() {
      return { baseUrl, rack: config.rack, hasPassword: Boolean(config.password) };
    },
  };
}
