/**
 * Shared test fixtures: config, fake clock, scripted fetch and photo payloads
 */

import { join } from "node:path";
import { vi } from "vitest";
import type { FetchFn } from "../modules/client";
import { HarvestConfigSchema, type HarvestConfig } from "../types/config";
import { Logger } from "../utils/logger";

export function testConfig(root: string): HarvestConfig {
  return HarvestConfigSchema.parse({
    api: {
      baseUrl: "https://api.test",
      accessKey: "test-secret",
      query: null,
      orderBy: "latest",
      orientation: null,
      perPage: 3,
      timeout: 1000,
      // 1ms interval: pacing never adds a sleep after a backoff
      requestsPerHour: 3_600_000,
    },
    retry: {
      rateLimitRetries: 5,
      networkRetries: 3,
      baseDelay: 1000,
      maxDelay: 300_000,
      jitter: 0.25,
    },
    download: {
      directory: join(root, "images"),
      resolution: "raw",
      extension: "jpg",
      timeout: 1000,
      retries: 2,
      maxBytes: 1024 * 1024,
      interval: 0,
      recordUrls: true,
    },
    store: { path: ":memory:" },
    run: { maxPages: null, pagesPerCategory: 1 },
    categories: {
      fallback: "other",
      fromTags: true,
      maxTags: 10,
      catalogue: { nature: "Nature", travel: "Travel", food: "Food" },
    },
    logging: { level: "error", showProgress: false, file: null },
  });
}

/**
 * Logger that stays quiet unless something breaks
 */
export function quietLogger(): Logger {
  return new Logger("error");
}

/**
 * Clock whose sleep advances time instantly and records every delay
 */
export function fakeClock(start = 0) {
  let now = start;
  const sleeps: number[] = [];
  return {
    sleeps,
    now: (): number => now,
    sleep: async (ms: number): Promise<void> => {
      sleeps.push(ms);
      now += ms;
    },
    advance(ms: number): void {
      now += ms;
    },
  };
}

/**
 * Fetch stand-in answering with each step in turn; the last step repeats
 */
export function scriptedFetch(...steps: Array<(url: string) => Response>) {
  let calls = 0;
  return vi.fn<FetchFn>(async (url) => {
    const step = steps[Math.min(calls, steps.length - 1)];
    calls++;
    return step(url);
  });
}

export function json(body: unknown, init: ResponseInit = {}): () => Response {
  return () =>
    new Response(JSON.stringify(body), {
      status: 200,
      headers: { "Content-Type": "application/json" },
      ...init,
    });
}

export function status(
  code: number,
  headers: Record<string, string> = {},
): () => Response {
  return () => new Response(null, { status: code, headers });
}

export function bytes(payload: Uint8Array, headers: Record<string, string> = {}): Response {
  return new Response(payload, { status: 200, headers });
}

export function networkFailure(message = "fetch failed"): () => Response {
  return () => {
    throw new TypeError(message);
  };
}

export function payloadOf(id: string): Uint8Array {
  return new TextEncoder().encode(`payload-${id}`);
}

export function photo(id: string, overrides: Record<string, unknown> = {}) {
  return {
    id,
    width: 4000,
    height: 3000,
    color: "#101010",
    description: `Photo ${id}`,
    alt_description: null,
    created_at: "2024-01-01T00:00:00Z",
    urls: {
      raw: `https://images.test/${id}/raw`,
      full: `https://images.test/${id}/full`,
      regular: `https://images.test/${id}/regular`,
      small: `https://images.test/${id}/small`,
      thumb: `https://images.test/${id}/thumb`,
    },
    links: { html: `https://photos.test/${id}` },
    user: { name: "Test Author", username: "tester" },
    tags: [{ title: "Nature" }],
    ...overrides,
  };
}
