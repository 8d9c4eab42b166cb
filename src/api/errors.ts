/**
 * Transport-level failures of the rack API
 */

/**
 * The rack answered with a non-2xx status
 */
export class ApiRequestError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    /** Delay the rack asked for in a Retry-After header */
    public readonly retryAfterMs?: number
  ) {
    super(message);
    this.name = 'ApiRequestError';
  }

  /**
   * A 4xx answer: the rack understood the request and declined it
   */
  isRefusal(): boolean {
    return this.status >= 400 && this.status < 500;
  }
}

/**
 * The rack answered 2xx but the body is not what the endpoint returns
 */
export class MalformedResponseError extends Error {
  constructor(
    /** Which payload was expected, e.g. "system" */
    public readonly resource: string
  ) {
    super(`Malformed ${resource} response from rack`);
    this.name = 'MalformedResponseError';
  }
}
