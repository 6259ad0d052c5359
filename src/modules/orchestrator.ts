/**
 * Acquisition Orchestrator
 * Drives one run through its states:
 *
 *   START → FETCHING → FILTERING → DOWNLOADING → PERSISTING → ADVANCING
 *         → (FETCHING | DONE | ABORTED)
 *
 * The cursor is only advanced once every item of the page reached a
 * terminal outcome, so an interrupted run resumes at the page it was on.
 */

import { join } from "node:path";
import {
  AcquisitionError,
  DownloadFailed,
  PersistenceError,
  errorMessage,
  type ErrorPhase,
} from "../errors";
import type {
  AcquisitionContext,
  AcquisitionState,
  FetchCursor,
  ImageRecord,
  ImageUrl,
  RemotePhoto,
  Resolution,
  RunOutcome,
  RunState,
} from "../types";
import type { CategoriesConfig } from "../types/config";
import { photoFilename } from "../utils/filename";
import { removeFile } from "../utils/fs";
import { fatal, ok, type Settled } from "../utils/result";
import type { DownloadResult } from "./downloader";

// Preference order when the configured resolution is missing from an item
const RESOLUTIONS: readonly Resolution[] = [
  "raw",
  "full",
  "regular",
  "small",
  "thumb",
];

interface Downloaded {
  item: RemotePhoto;
  filename: string;
  file: DownloadResult;
  source: ImageUrl;
}

// ============================================================================
// Item helpers
// ============================================================================

/**
 * URL of the configured resolution, falling back to the largest one present
 */
export function pickUrl(item: RemotePhoto, preferred: Resolution): ImageUrl | null {
  for (const type of [preferred, ...RESOLUTIONS]) {
    const url = item.urls[type];
    if (url) return { type, url };
  }
  return null;
}

/**
 * Categories of an item: the search query plus its tags, or the fallback
 *
 * @example
 * categorize({ tags: [{ title: "Nature" }] }, "forest", config) // ["forest", "nature"]
 */
export function categorize(
  item: Pick<RemotePhoto, "tags">,
  query: string | null,
  config: Pick<CategoriesConfig, "fallback" | "fromTags" | "maxTags">,
): string[] {
  const names = new Set<string>();

  const normalizedQuery = query?.trim().toLowerCase();
  if (normalizedQuery) names.add(normalizedQuery);

  if (config.fromTags) {
    for (const tag of (item.tags ?? []).slice(0, config.maxTags)) {
      const name = tag.title.trim().toLowerCase();
      if (name) names.add(name);
    }
  }

  return names.size > 0 ? [...names] : [config.fallback];
}

function urlsOf(item: RemotePhoto, source: ImageUrl): ImageUrl[] {
  const urls: ImageUrl[] = [];
  for (const type of RESOLUTIONS) {
    const url = item.urls[type];
    if (url) urls.push({ type, url });
  }
  urls.push({ type: "download", url: source.url });
  return urls;
}

function toRecord({ item, filename, file }: Downloaded, runId: number): ImageRecord {
  return {
    id: item.id,
    filePath: filename,
    width: item.width,
    height: item.height,
    color: item.color ?? null,
    authorName: item.user?.name ?? null,
    authorUsername: item.user?.username ?? null,
    description: item.description ?? item.alt_description ?? null,
    link: item.links?.html ?? null,
    createdAt: item.created_at ?? null,
    downloadedAt: new Date().toISOString(),
    fileSize: file.size,
    checksum: file.checksum,
    runId,
  };
}

// ============================================================================
// Main Acquisition Function
// ============================================================================

export async function acquire(ctx: AcquisitionContext): Promise<RunOutcome> {
  const { config, store, client, downloader, dedup, tracker, signal } = ctx;
  const logger = ctx.logger.child("acquire");
  const stream = client.stream;
  const root = config.download.directory;

  let state: AcquisitionState = "START";
  let pagesThisRun = 0;

  // ============================================================================
  // START
  // ============================================================================

  const runId = store.beginRun(stream);
  const saved = store.loadCursor(stream);

  let cursor: FetchCursor =
    saved && !saved.exhausted
      ? { ...saved, runId }
      : { stream, page: 1, runId, exhausted: false };

  logger.info(
    saved && !saved.exhausted
      ? `Run ${runId}: resuming ${stream} at page ${cursor.page}`
      : `Run ${runId}: starting ${stream} at page 1`,
  );

  function transition(to: AcquisitionState): void {
    const from = state;
    state = to;
    logger.debug(`${from} → ${to} (page ${cursor.page})`);
    ctx.onTransition?.({ from, to, page: cursor.page });
  }

  function finish(
    terminal: RunState,
    reason: string,
    error?: AcquisitionError,
  ): RunOutcome {
    transition(terminal);
    try {
      store.finishRun(runId, terminal, reason);
    } catch (storeError) {
      logger.error(`Cannot record the end of run ${runId}`, storeError);
    }
    logger.info(`Run ${runId} ${terminal.toLowerCase()}: ${reason}`);
    return { state: terminal, reason, runId, cursor, error };
  }

  /**
   * Log a failure to the error table and the tracker
   * The error table is independent of image commits; if the store itself is
   * failing, the entry is only reported to the log
   */
  function recordFailure(
    phase: ErrorPhase,
    subject: string,
    error: AcquisitionError,
    details: { imageId?: string; url?: string } = {},
  ): void {
    tracker.trackError(phase, subject, error);
    try {
      store.recordError({
        imageId: details.imageId ?? null,
        phase,
        errorClass: error.name,
        message: error.message,
        url: details.url ?? null,
        retryCount: Math.max(0, error.attempts - 1),
        runId,
      });
    } catch (storeError) {
      logger.error(`Cannot record ${phase} error for ${subject}`, storeError);
    }
  }

  /**
   * Persist the cursor; a failing store ends the run
   */
  function saveCursor(next: FetchCursor): PersistenceError | null {
    try {
      store.advanceCursor(next);
      cursor = next;
      return null;
    } catch (error) {
      if (error instanceof PersistenceError) return error;
      throw error;
    }
  }

  /**
   * File name and URL of a fresh item
   * A name already taken in this page, or owned by a committed record, fails
   * the item. A store that cannot answer counts as taken.
   */
  function planDownload(
    item: RemotePhoto,
    claimed: Set<string>,
  ): Settled<{ filename: string; source: ImageUrl }, DownloadFailed> {
    const filename = photoFilename(item.id, config.download.extension);
    const source = pickUrl(item, config.download.resolution);

    if (!filename) {
      return fatal(new DownloadFailed(`Item id "${item.id}" cannot form a filename`, ""));
    }
    if (!source) {
      return fatal(new DownloadFailed(`Item ${item.id} has no downloadable URL`, ""));
    }
    if (claimed.has(filename.toLowerCase())) {
      return fatal(
        new DownloadFailed(`File name ${filename} is already used in this page`, source.url),
      );
    }

    let owner: string | null;
    try {
      owner = store.fileOwner(filename);
    } catch (error) {
      return fatal(
        new DownloadFailed(
          `Cannot check file name ${filename}: ${errorMessage(error)}`,
          source.url,
          { cause: error },
        ),
      );
    }
    if (owner !== null) {
      return fatal(
        new DownloadFailed(`File name ${filename} belongs to ${owner}`, source.url),
      );
    }
    return ok({ filename, source });
  }

  function commitWithRetry(
    record: ImageRecord,
    categories: string[],
    urls: ImageUrl[],
  ): Settled<void, PersistenceError> {
    for (let attempt = 1; ; attempt++) {
      try {
        store.commit(record, categories, urls);
        return ok(undefined);
      } catch (error) {
        if (!(error instanceof PersistenceError)) throw error;
        if (attempt >= 2) {
          return fatal(
            new PersistenceError(error.message, { cause: error.cause, attempts: attempt }),
          );
        }
        logger.warn(`${error.message}; retrying once`);
      }
    }
  }

  for (;;) {
    if (signal?.aborted) {
      return finish("ABORTED", "cancelled");
    }

    // ==========================================================================
    // FETCHING
    // ==========================================================================

    transition("FETCHING");
    const fetched = await client.fetchPage(cursor);

    if (fetched.status === "fatal") {
      const { error } = fetched;
      logger.error(`Page ${cursor.page} failed: ${error.message}`);
      recordFailure("fetch", `page ${cursor.page}`, error);
      const saveError = saveCursor(cursor);
      if (saveError) recordFailure("persist", stream, saveError);
      return finish("ABORTED", "fetch-failed", error);
    }

    const page = fetched.value;
    tracker.incrementPages(page.items.length + page.rejected.length);

    for (const rejected of page.rejected) {
      const subject = rejected.id ?? `page ${cursor.page}`;
      logger.warn(`Rejected malformed item ${subject}: ${rejected.details}`);
      tracker.incrementRejected();
      tracker.trackIssue({
        phase: "fetch",
        subject,
        reason: "invalid-item",
        details: rejected.details,
      });
      try {
        store.recordError({
          imageId: rejected.id,
          phase: "fetch",
          errorClass: "InvalidItem",
          message: rejected.details,
          url: null,
          retryCount: 0,
          runId,
        });
      } catch (storeError) {
        logger.error(`Cannot record rejected item ${subject}`, storeError);
      }
    }

    // ==========================================================================
    // FILTERING
    // ==========================================================================

    transition("FILTERING");
    const inPage = new Set<string>();
    const fresh = page.items.filter((item) => {
      if (dedup.isKnown(item.id) || inPage.has(item.id)) {
        tracker.incrementKnown();
        return false;
      }
      inPage.add(item.id);
      return true;
    });

    logger.debug(
      `Page ${cursor.page}: ${fresh.length} new of ${page.items.length}`,
    );

    // ==========================================================================
    // DOWNLOADING
    // ==========================================================================

    transition("DOWNLOADING");
    const downloaded: Downloaded[] = [];
    // Lower-cased: a case-insensitive filesystem must not see two of them either
    const claimed = new Set<string>();

    for (const item of fresh) {
      if (signal?.aborted) break;

      const target = planDownload(item, claimed);

      if (target.status === "fatal") {
        logger.warn(`Skipping ${item.id}: ${target.error.message}`);
        tracker.incrementFailedDownloads();
        recordFailure("download", item.id, target.error, { imageId: item.id });
        continue;
      }

      const { filename, source } = target.value;
      claimed.add(filename.toLowerCase());

      const result = await downloader.fetchBinary(source.url, join(root, filename));

      if (result.status === "fatal") {
        logger.warn(`Skipping ${item.id}: ${result.error.message}`);
        tracker.incrementFailedDownloads();
        recordFailure("download", item.id, result.error, {
          imageId: item.id,
          url: source.url,
        });
        continue;
      }

      tracker.incrementDownloaded(result.value.size);
      downloaded.push({ item, filename, file: result.value, source });
    }

    // ==========================================================================
    // PERSISTING
    // ==========================================================================

    transition("PERSISTING");

    for (const [index, entry] of downloaded.entries()) {
      const { item, file, source } = entry;
      const committed = commitWithRetry(
        toRecord(entry, runId),
        categorize(item, client.query, config.categories),
        config.download.recordUrls ? urlsOf(item, source) : [],
      );

      if (committed.status === "fatal") {
        const uncommitted = downloaded.slice(index);
        await Promise.all(uncommitted.map((d) => removeFile(d.file.path)));
        logger.error(
          `Cannot commit ${item.id}; removed ${uncommitted.length} uncommitted file(s)`,
          committed.error,
        );
        recordFailure("persist", item.id, committed.error, {
          imageId: item.id,
          url: source.url,
        });
        return finish("ABORTED", "persist-failed", committed.error);
      }

      dedup.markKnown(item.id);
      tracker.incrementCommitted();
      logger.debug(`Committed ${item.id} (${file.size} bytes)`);
    }

    // ==========================================================================
    // ADVANCING
    // ==========================================================================

    if (signal?.aborted) {
      return finish("ABORTED", "cancelled");
    }

    transition("ADVANCING");
    pagesThisRun++;

    const exhausted = page.nextPage === null;
    const saveError = saveCursor({
      stream,
      page: page.nextPage ?? cursor.page,
      runId,
      exhausted,
    });

    if (saveError) {
      recordFailure("persist", stream, saveError);
      return finish("ABORTED", "persist-failed", saveError);
    }
    if (exhausted) {
      return finish("DONE", "exhausted");
    }
    if (config.run.maxPages !== null && pagesThisRun >= config.run.maxPages) {
      return finish("DONE", "page-limit");
    }
  }
}
