/**
 * Downloader
 * Fetches one binary payload into the download directory; the final path
 * only ever appears through an atomic rename of a complete, verified file
 */

import { mkdir, open, rename } from "fs/promises";
import { dirname } from "node:path";
import { DownloadFailed, TransientNetworkError, errorMessage } from "../errors";
import type { DownloadConfig, RetryConfig } from "../types/config";
import {
  Pacer,
  jitteredDelay,
  sleep as defaultSleep,
  type Clock,
  type Sleep,
} from "../utils/backoff";
import { checksumOf } from "../utils/checksum";
import { partialPath } from "../utils/filename";
import { removeFile } from "../utils/fs";
import type { Logger } from "../utils/logger";
import { fatal, ok, retryable, type Outcome, type Settled } from "../utils/result";
import type { FetchFn } from "./client";

export interface DownloadResult {
  path: string;
  size: number;
  checksum: string;
}

export interface DownloaderDeps {
  logger: Logger;
  fetch?: FetchFn;
  sleep?: Sleep;
  now?: Clock;
  random?: () => number;
}

type Attempt = Outcome<Uint8Array, DownloadFailed | TransientNetworkError>;

export class Downloader {
  private readonly fetchFn: FetchFn;
  private readonly sleep: Sleep;
  private readonly random: () => number;
  private readonly pacer: Pacer;
  private readonly logger: Logger;

  constructor(
    private readonly options: DownloadConfig,
    private readonly retry: Pick<RetryConfig, "baseDelay" | "maxDelay" | "jitter">,
    deps: DownloaderDeps,
  ) {
    this.fetchFn = deps.fetch ?? ((url, init) => fetch(url, init));
    this.sleep = deps.sleep ?? defaultSleep;
    this.random = deps.random ?? Math.random;
    this.logger = deps.logger;
    this.pacer = new Pacer(options.interval, deps.now, this.sleep);
  }

  /**
   * Download `url` to `targetPath` and return the payload's checksum
   *
   * @param expectedSize - Known payload size, checked in addition to Content-Length
   */
  async fetchBinary(
    url: string,
    targetPath: string,
    expectedSize?: number,
  ): Promise<Settled<DownloadResult, DownloadFailed>> {
    for (let attempt = 0; ; attempt++) {
      const outcome = await this.attempt(url, expectedSize);

      if (outcome.status === "ok") {
        return this.store(outcome.value, url, targetPath);
      }
      if (outcome.status === "fatal" || attempt >= this.options.retries) {
        return fatal(this.asDownloadFailed(outcome.error, url, attempt + 1));
      }

      const delay = jitteredDelay(attempt, this.retry, this.retry.jitter, this.random);
      this.logger.debug(`${outcome.error.message}; retrying in ${delay}ms`);
      await this.sleep(delay);
    }
  }

  private async store(
    payload: Uint8Array,
    url: string,
    targetPath: string,
  ): Promise<Settled<DownloadResult, DownloadFailed>> {
    try {
      return ok(await this.writeAtomically(payload, targetPath));
    } catch (error) {
      return fatal(
        new DownloadFailed(`Cannot write ${targetPath}: ${errorMessage(error)}`, url, {
          cause: error,
        }),
      );
    }
  }

  private async attempt(url: string, expectedSize?: number): Promise<Attempt> {
    await this.pacer.wait();

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.options.timeout);

    try {
      const response = await this.fetchFn(url, { signal: controller.signal });

      if (!response.ok) {
        const message = `HTTP ${response.status}: ${response.statusText}`;
        return response.status >= 500 || response.status === 429
          ? retryable(new TransientNetworkError(message, response.status))
          : fatal(new DownloadFailed(message, url));
      }

      const declared = response.headers.get("Content-Length");
      if (declared !== null && Number(declared) > this.options.maxBytes) {
        return fatal(
          new DownloadFailed(`Payload of ${declared} bytes exceeds limit`, url),
        );
      }

      const payload = new Uint8Array(await response.arrayBuffer());
      const problem = this.verify(payload.byteLength, declared, expectedSize);
      return problem ? fatal(new DownloadFailed(problem, url)) : ok(payload);
    } catch (error) {
      const reason =
        error instanceof Error && error.name === "AbortError"
          ? `timed out after ${this.options.timeout}ms`
          : errorMessage(error);
      return retryable(
        new TransientNetworkError(`Download of ${url} ${reason}`, null, {
          cause: error,
        }),
      );
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private verify(
    size: number,
    declared: string | null,
    expectedSize?: number,
  ): string | null {
    if (size === 0) {
      return "Empty payload";
    }
    if (size > this.options.maxBytes) {
      return `Payload of ${size} bytes exceeds limit`;
    }
    if (declared !== null && Number(declared) !== size) {
      return `Size mismatch: Content-Length ${declared}, received ${size}`;
    }
    if (expectedSize !== undefined && expectedSize !== size) {
      return `Size mismatch: expected ${expectedSize}, received ${size}`;
    }
    return null;
  }

  /**
   * Write to a sibling temp file, flush it to disk, then rename into place
   */
  private async writeAtomically(
    payload: Uint8Array,
    targetPath: string,
  ): Promise<DownloadResult> {
    const temp = partialPath(targetPath);
    await mkdir(dirname(targetPath), { recursive: true });

    try {
      const handle = await open(temp, "w");
      try {
        await handle.writeFile(payload);
        await handle.sync();
      } finally {
        await handle.close();
      }
      const checksum = checksumOf(payload);
      await rename(temp, targetPath);
      return { path: targetPath, size: payload.byteLength, checksum };
    } catch (error) {
      await removeFile(temp);
      throw error;
    }
  }

  private asDownloadFailed(
    error: DownloadFailed | TransientNetworkError,
    url: string,
    attempts: number,
  ): DownloadFailed {
    if (error instanceof DownloadFailed) {
      return new DownloadFailed(error.message, url, { cause: error.cause, attempts });
    }
    return new DownloadFailed(error.message, url, { cause: error, attempts });
  }
}
