/**
 * Acquisition error taxonomy
 * Every failure the core can surface is one of these classes
 */

export type ErrorPhase = "fetch" | "download" | "persist";

interface AcquisitionErrorOptions {
  cause?: unknown;
  attempts?: number;
}

export abstract class AcquisitionError extends Error {
  abstract readonly retryable: boolean;
  readonly attempts: number;

  constructor(message: string, options: AcquisitionErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.attempts = options.attempts ?? 1;
  }
}

/**
 * Timeouts, connection resets and 5xx responses
 */
export class TransientNetworkError extends AcquisitionError {
  readonly retryable = true;

  constructor(
    message: string,
    readonly status: number | null = null,
    options: AcquisitionErrorOptions = {},
  ) {
    super(message, options);
  }
}

/**
 * The remote API throttled the request (429, or 403 with an empty quota)
 */
export class RateLimitExceeded extends AcquisitionError {
  readonly retryable = true;

  constructor(
    message: string,
    readonly retryAfter: number | null = null,
    options: AcquisitionErrorOptions = {},
  ) {
    super(message, options);
  }
}

/**
 * Any other non-2xx answer: malformed query, bad credentials, unknown route
 */
export class ClientRequestError extends AcquisitionError {
  readonly retryable = false;

  constructor(
    message: string,
    readonly status: number,
    options: AcquisitionErrorOptions = {},
  ) {
    super(message, options);
  }
}

export class DownloadFailed extends AcquisitionError {
  readonly retryable = false;

  constructor(
    message: string,
    readonly url: string,
    options: AcquisitionErrorOptions = {},
  ) {
    super(message, options);
  }
}

export class PersistenceError extends AcquisitionError {
  readonly retryable = false;
}

export class ConfigurationError extends AcquisitionError {
  readonly retryable = false;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
