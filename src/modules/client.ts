/**
 * Rate-Limited API Client
 * Fetches listing pages from the remote photo API, pacing requests to the
 * published quota and retrying throttled or transient failures
 */

import {
  AcquisitionError,
  ClientRequestError,
  RateLimitExceeded,
  TransientNetworkError,
  errorMessage,
} from "../errors";
import {
  ListResponseSchema,
  RemotePhotoSchema,
  SearchResponseSchema,
  type FetchCursor,
  type PhotoPage,
  type RejectedItem,
  type RemotePhoto,
} from "../types";
import type { ApiConfig, RetryConfig } from "../types/config";
import {
  Pacer,
  exponentialDelay,
  jitteredDelay,
  sleep as defaultSleep,
  type Clock,
  type Sleep,
} from "../utils/backoff";
import { fatal, ok, retryable, type Outcome, type Settled } from "../utils/result";
import type { Logger } from "../utils/logger";

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

export interface ClientDeps {
  logger: Logger;
  fetch?: FetchFn;
  sleep?: Sleep;
  now?: Clock;
  random?: () => number;
  // Shared by clients that draw on the same quota
  pacer?: Pacer;
}

/**
 * Stream key of the listing configured in `api`
 * A cursor is only resumed for the same stream
 *
 * @example
 * streamKey({ query: null, orderBy: "latest" }) // "photos:latest"
 * streamKey({ query: "Forest", orderBy: "relevant" }) // "search:forest:relevant"
 * streamKey({ query: "forest", orderBy: "latest", orientation: "portrait" }) // "search:forest:latest:portrait"
 */
export function streamKey(
  api: Pick<ApiConfig, "query" | "orderBy"> & Partial<Pick<ApiConfig, "orientation">>,
): string {
  const query = api.query?.trim().toLowerCase();
  if (!query) return `photos:${api.orderBy}`;
  const key = `search:${query}:${api.orderBy}`;
  return api.orientation ? `${key}:${api.orientation}` : key;
}

function parseRetryAfter(header: string | null): number | null {
  if (!header) return null;
  const seconds = Number(header);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : null;
}

function readId(item: unknown): string | null {
  if (typeof item === "object" && item !== null && "id" in item) {
    return typeof item.id === "string" ? item.id : null;
  }
  return null;
}

export class PhotoApiClient {
  private readonly fetchFn: FetchFn;
  private readonly sleep: Sleep;
  private readonly random: () => number;
  private readonly pacer: Pacer;
  private readonly logger: Logger;

  constructor(
    private readonly api: ApiConfig,
    private readonly retry: RetryConfig,
    private readonly deps: ClientDeps,
  ) {
    this.fetchFn = deps.fetch ?? ((url, init) => fetch(url, init));
    this.sleep = deps.sleep ?? defaultSleep;
    this.random = deps.random ?? Math.random;
    this.logger = deps.logger;
    this.pacer =
      deps.pacer ?? Pacer.perHour(api.requestsPerHour, deps.now, this.sleep);
  }

  get stream(): string {
    return streamKey(this.api);
  }

  get query(): string | null {
    return this.api.query;
  }

  /**
   * Client for another search query, pacing against the same quota
   */
  forQuery(query: string): PhotoApiClient {
    return new PhotoApiClient({ ...this.api, query }, this.retry, {
      ...this.deps,
      pacer: this.pacer,
    });
  }

  /**
   * Fetch the page the cursor points at
   * Throttling and transient failures are retried here; the caller only sees
   * the page or a fatal error
   */
  async fetchPage(cursor: FetchCursor): Promise<Settled<PhotoPage>> {
    let throttled = 0;
    let failures = 0;
    let lastThrottleDelay = 0;

    for (;;) {
      const outcome = await this.attempt(cursor.page);
      if (outcome.status !== "retryable") {
        return outcome;
      }

      const { error } = outcome;
      let delay: number;

      if (error instanceof RateLimitExceeded) {
        if (throttled >= this.retry.rateLimitRetries) {
          return fatal(
            new RateLimitExceeded(
              `Rate limit still exceeded after ${throttled} retries`,
              error.retryAfter,
              { cause: error, attempts: throttled + failures + 1 },
            ),
          );
        }
        // A Retry-After raise carries into the following delays
        delay = Math.min(
          this.retry.maxDelay,
          Math.max(
            exponentialDelay(throttled, this.retry),
            lastThrottleDelay * 2,
            error.retryAfter ?? 0,
          ),
        );
        lastThrottleDelay = delay;
        throttled++;
      } else {
        if (failures >= this.retry.networkRetries) {
          return fatal(
            new TransientNetworkError(
              `Page ${cursor.page} failed after ${failures} retries: ${error.message}`,
              error instanceof TransientNetworkError ? error.status : null,
              { cause: error, attempts: throttled + failures + 1 },
            ),
          );
        }
        delay = jitteredDelay(failures, this.retry, this.retry.jitter, this.random);
        failures++;
      }

      this.logger.warn(
        `${error.message}; retrying page ${cursor.page} in ${delay}ms`,
      );
      await this.sleep(delay);
    }
  }

  /**
   * One paced request, classified
   */
  private async attempt(page: number): Promise<Outcome<PhotoPage>> {
    await this.pacer.wait();

    const url = this.pageUrl(page);
    this.logger.debug(`GET ${url}`);

    let body: unknown;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.api.timeout);

    try {
      const response = await this.fetchFn(url, {
        headers: {
          Authorization: `Client-ID ${this.api.accessKey}`,
          "Accept-Version": "v1",
        },
        signal: controller.signal,
      });

      const classified = this.classify(response, page);
      if (classified) {
        return classified;
      }
      body = await response.json();
    } catch (error) {
      if (error instanceof SyntaxError) {
        return fatal(
          new ClientRequestError(`Page ${page} is not valid JSON`, 200, {
            cause: error,
          }),
        );
      }
      const reason =
        error instanceof Error && error.name === "AbortError"
          ? `timed out after ${this.api.timeout}ms`
          : errorMessage(error);
      return retryable(
        new TransientNetworkError(`Request for page ${page} ${reason}`, null, {
          cause: error,
        }),
      );
    } finally {
      clearTimeout(timeoutId);
    }

    return this.parsePage(body, page);
  }

  private classify(
    response: Response,
    page: number,
  ): Outcome<PhotoPage> | null {
    if (response.ok) return null;

    const { status } = response;
    const remaining = response.headers.get("X-Ratelimit-Remaining");

    if (status === 429 || (status === 403 && remaining === "0")) {
      return retryable(
        new RateLimitExceeded(
          `Rate limited on page ${page} (HTTP ${status})`,
          parseRetryAfter(response.headers.get("Retry-After")),
        ),
      );
    }
    if (status >= 500) {
      return retryable(
        new TransientNetworkError(`HTTP ${status} on page ${page}`, status),
      );
    }
    return fatal(
      new ClientRequestError(
        `HTTP ${status}: ${response.statusText || "request rejected"}`,
        status,
      ),
    );
  }

  private parsePage(body: unknown, page: number): Outcome<PhotoPage> {
    let raw: unknown[];
    let nextPage: number | null;

    if (this.api.query) {
      const parsed = SearchResponseSchema.safeParse(body);
      if (!parsed.success) {
        return fatal(this.unexpectedShape(page, parsed.error.message));
      }
      raw = parsed.data.results;
      nextPage = page < parsed.data.total_pages ? page + 1 : null;
    } else {
      const parsed = ListResponseSchema.safeParse(body);
      if (!parsed.success) {
        return fatal(this.unexpectedShape(page, parsed.error.message));
      }
      raw = parsed.data;
      nextPage = raw.length < this.api.perPage ? null : page + 1;
    }

    const items: RemotePhoto[] = [];
    const rejected: RejectedItem[] = [];

    for (const item of raw) {
      const parsed = RemotePhotoSchema.safeParse(item);
      if (parsed.success) {
        items.push(parsed.data);
      } else {
        rejected.push({
          id: readId(item),
          details: parsed.error.issues
            .map((i) => `${i.path.join(".")}: ${i.message}`)
            .join("; "),
        });
      }
    }

    return ok({ items, rejected, nextPage });
  }

  private unexpectedShape(page: number, details: string): AcquisitionError {
    return new ClientRequestError(
      `Unexpected response shape for page ${page}: ${details}`,
      200,
    );
  }

  private pageUrl(page: number): string {
    const base = this.api.baseUrl.replace(/\/+$/, "");
    const params = new URLSearchParams({
      page: String(page),
      per_page: String(this.api.perPage),
      order_by: this.api.orderBy,
    });

    if (this.api.query) {
      params.set("query", this.api.query);
      if (this.api.orientation) {
        params.set("orientation", this.api.orientation);
      }
      return `${base}/search/photos?${params}`;
    }
    return `${base}/photos?${params}`;
  }
}
