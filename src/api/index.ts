/**
 * Rack API client module
 */

export {
  createRackClient,
  parseSystemState,
  extractErrorMessage,
  normalizeBaseUrl,
} from './client.js';

export type { RackClient, SystemReader, SystemUpdater, ParameterWriter } from './client.js';

export { ApiRequestError, MalformedResponseError } from './errors.js';

export { retryRead, isTransient, retryAfterMs, backoffDelay, sleep, DEFAULT_RETRY_POLICY } from './retry.js';

export type { RetryPolicy, RetryHooks } from './retry.js';

export { logger, createLogger, ApiLogger, maskSecret, redactSecrets, redactContext } from './logger.js';

export type { LogLevel, LogEntry, LoggerConfig } from './logger.js';

export type {
  HttpMethod,
  SystemStatus,
  SystemState,
  SystemRelease,
  RackProcess,
  FormationEntry,
  LogStreamOptions,
  ParameterSet,
  ScaleRequest,
  RackClientConfig,
} from './types.js';
