import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readdir, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { acquire, categorize, pickUrl } from "./orchestrator";
import { PhotoApiClient, type FetchFn } from "./client";
import { DedupIndex } from "./dedup-index";
import { Downloader } from "./downloader";
import { checkHealth } from "./health";
import { MetadataStore } from "./store";
import { PersistenceError } from "../errors";
import {
  RemotePhotoSchema,
  type AcquisitionContext,
  type AcquisitionState,
  type HarvestConfig,
  type ImageRecord,
  type ImageUrl,
} from "../types";
import { checksumFile, checksumOf } from "../utils/checksum";
import { Tracker } from "../utils/tracker";
import {
  bytes,
  fakeClock,
  payloadOf,
  photo,
  quietLogger,
  testConfig,
} from "../testing/fixtures";

// ============================================================================
// Harness
// ============================================================================

interface FakeApi {
  pages: Record<number, unknown[]>;
  failingPages: Set<number>;
  failingImages: Set<string>;
  onImage?: (id: string) => void;
}

/**
 * In-process stand-in for both the photo API and the image host
 */
function fakeRemote(api: FakeApi) {
  const requests: string[] = [];

  const fetch: FetchFn = async (raw) => {
    requests.push(raw);
    const url = new URL(raw);

    if (url.hostname === "api.test") {
      const page = Number(url.searchParams.get("page"));
      if (api.failingPages.has(page)) {
        return new Response(null, { status: 401 });
      }
      return new Response(JSON.stringify(api.pages[page] ?? []), { status: 200 });
    }

    const id = url.pathname.split("/")[1];
    api.onImage?.(id);
    if (api.failingImages.has(id)) {
      return new Response(null, { status: 404 });
    }
    return bytes(payloadOf(id));
  };

  return {
    fetch,
    requests,
    pageRequests: () => requests.filter((r) => r.startsWith("https://api.test")),
    imageRequests: () => requests.filter((r) => r.startsWith("https://images.test")),
  };
}

function storedRecord(id: string): ImageRecord {
  const payload = payloadOf(id);
  return {
    id,
    filePath: `${id}.jpg`,
    width: 1,
    height: 1,
    color: null,
    authorName: null,
    authorUsername: null,
    description: null,
    link: null,
    createdAt: null,
    downloadedAt: "2025-01-01T00:00:00.000Z",
    fileSize: payload.byteLength,
    checksum: checksumOf(payload),
    runId: 0,
  };
}

describe("acquire", () => {
  let root: string;
  let config: HarvestConfig;
  let store: MetadataStore;
  let api: FakeApi;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "acquire-"));
    config = testConfig(root);
    store = new MetadataStore(":memory:");
    api = { pages: {}, failingPages: new Set(), failingImages: new Set() };
  });

  afterEach(async () => {
    store.close();
    await rm(root, { recursive: true, force: true });
  });

  function context(
    fetch: FetchFn,
    extra: Partial<AcquisitionContext> = {},
  ): AcquisitionContext {
    const clock = fakeClock();
    const deps = {
      logger: quietLogger(),
      fetch,
      sleep: clock.sleep,
      now: clock.now,
      random: () => 0,
    };
    return {
      config,
      tracker: new Tracker(clock.now),
      logger: quietLogger(),
      store,
      client: new PhotoApiClient(config.api, config.retry, deps),
      downloader: new Downloader(config.download, config.retry, deps),
      dedup: DedupIndex.fromStore(store),
      ...extra,
    };
  }

  const imagesDir = (): string => config.download.directory;

  /**
   * Ids an uninterrupted run over the same pages ends up with
   */
  async function cleanRunIds(): Promise<string[]> {
    const saved = { store, config };
    const cleanStore = new MetadataStore(":memory:");
    store = cleanStore;
    config = {
      ...config,
      download: { ...config.download, directory: join(root, "clean") },
    };
    try {
      await acquire(
        context(
          fakeRemote({
            pages: api.pages,
            failingPages: new Set(),
            failingImages: new Set(),
          }).fetch,
        ),
      );
      return [...cleanStore.imageIds()].sort();
    } finally {
      store = saved.store;
      config = saved.config;
      cleanStore.close();
    }
  }

  // ==========================================================================
  // Main flow
  // ==========================================================================
  describe("main flow", () => {
    it("downloads new items and skips known ones", async () => {
      store.commit(storedRecord("k1"), ["other"]);
      api.pages[1] = [photo("n1"), photo("k1"), photo("n2")];
      config.run.maxPages = 1;
      const remote = fakeRemote(api);
      const ctx = context(remote.fetch);

      const outcome = await acquire(ctx);

      expect(outcome.state).toBe("DONE");
      expect(outcome.reason).toBe("page-limit");
      expect(remote.imageRequests()).toEqual([
        "https://images.test/n1/raw",
        "https://images.test/n2/raw",
      ]);
      expect([...store.imageIds()].sort()).toEqual(["k1", "n1", "n2"]);
      expect(store.loadCursor("photos:latest")).toEqual({
        stream: "photos:latest",
        page: 2,
        runId: outcome.runId,
        exhausted: false,
      });
      expect(["k1", "n1", "n2"].every((id) => ctx.dedup.isKnown(id))).toBe(true);

      const stats = ctx.tracker.getStats();
      expect(stats.downloaded).toBe(2);
      expect(stats.committed).toBe(2);
      expect(stats.knownSkipped).toBe(1);
    });

    it("stores each payload under a checksum that matches the file", async () => {
      api.pages[1] = [photo("n1"), photo("n2")];
      await acquire(context(fakeRemote(api).fetch));

      const records = [...store.records()];
      expect(records).toHaveLength(2);
      for (const record of records) {
        const actual = await checksumFile(join(imagesDir(), record.filePath));
        expect(actual).toBe(record.checksum);
      }
      expect((await readdir(imagesDir())).sort()).toEqual(["n1.jpg", "n2.jpg"]);
    });

    it("records metadata, categories and URLs", async () => {
      api.pages[1] = [photo("n1", { tags: [{ title: "Nature" }, { title: "Fog" }] })];
      await acquire(context(fakeRemote(api).fetch));

      const detail = store.getImage("n1");
      expect(detail?.record.authorName).toBe("Test Author");
      expect(detail?.record.link).toBe("https://photos.test/n1");
      expect(detail?.record.fileSize).toBe(payloadOf("n1").byteLength);
      expect(detail?.categories).toEqual(["fog", "nature"]);
      expect(detail?.urls.map((u) => u.type)).toEqual([
        "raw",
        "full",
        "regular",
        "small",
        "thumb",
        "download",
      ]);
    });

    it("reports every state change", async () => {
      api.pages[1] = [photo("n1")];
      const states: AcquisitionState[] = [];

      await acquire(
        context(fakeRemote(api).fetch, {
          onTransition: ({ to }) => states.push(to),
        }),
      );

      expect(states).toEqual([
        "FETCHING",
        "FILTERING",
        "DOWNLOADING",
        "PERSISTING",
        "ADVANCING",
        "DONE",
      ]);
    });

    it("follows pages until the end of the stream", async () => {
      api.pages[1] = [photo("a1"), photo("a2"), photo("a3")];
      api.pages[2] = [photo("a4")];
      const remote = fakeRemote(api);

      const outcome = await acquire(context(remote.fetch));

      expect(outcome.state).toBe("DONE");
      expect(outcome.reason).toBe("exhausted");
      expect(outcome.cursor).toEqual({
        stream: "photos:latest",
        page: 2,
        runId: outcome.runId,
        exhausted: true,
      });
      expect(remote.pageRequests()).toHaveLength(2);
      expect([...store.imageIds()]).toHaveLength(4);
    });
  });

  // ==========================================================================
  // Invariants
  // ==========================================================================
  describe("invariants", () => {
    it("a second run over the same stream downloads nothing", async () => {
      api.pages[1] = [photo("a1"), photo("a2")];
      const remote = fakeRemote(api);

      await acquire(context(remote.fetch));
      const second = await acquire(context(remote.fetch));

      expect(second.state).toBe("DONE");
      expect(remote.pageRequests()).toHaveLength(2);
      expect(remote.imageRequests()).toHaveLength(2);
      expect([...store.imageIds()]).toHaveLength(2);
    });

    it("never downloads an id twice within a page", async () => {
      api.pages[1] = [photo("a1"), photo("a1"), photo("a2")];
      const remote = fakeRemote(api);
      const ctx = context(remote.fetch);

      await acquire(ctx);

      expect(remote.imageRequests()).toEqual([
        "https://images.test/a1/raw",
        "https://images.test/a2/raw",
      ]);
      expect(ctx.tracker.getStats().knownSkipped).toBe(1);
    });

    it("resumes from the saved cursor after a fetch failure", async () => {
      api.pages[1] = [photo("a1"), photo("a2"), photo("a3")];
      api.pages[2] = [photo("a4")];
      api.failingPages.add(2);
      const remote = fakeRemote(api);

      const first = await acquire(context(remote.fetch));

      expect(first.state).toBe("ABORTED");
      expect(first.reason).toBe("fetch-failed");
      expect(first.error?.name).toBe("ClientRequestError");
      expect(store.loadCursor("photos:latest")?.page).toBe(2);
      expect(store.listErrors()[0]).toMatchObject({
        phase: "fetch",
        errorClass: "ClientRequestError",
        imageId: null,
      });

      api.failingPages.clear();
      const second = await acquire(context(remote.fetch));

      expect(second.state).toBe("DONE");
      expect(remote.pageRequests()).toEqual([
        "https://api.test/photos?page=1&per_page=3&order_by=latest",
        "https://api.test/photos?page=2&per_page=3&order_by=latest",
        "https://api.test/photos?page=2&per_page=3&order_by=latest",
      ]);
      expect([...store.imageIds()].sort()).toEqual(["a1", "a2", "a3", "a4"]);
    });

    it("gives ids that only differ in unsafe characters separate files", async () => {
      api.pages[1] = [photo("a.b"), photo("ab")];
      const remote = fakeRemote(api);

      const outcome = await acquire(context(remote.fetch));

      expect(outcome.state).toBe("DONE");
      expect([...store.imageIds()].sort()).toEqual(["a.b", "ab"]);
      expect(store.getImage("a.b")?.record.filePath).toBe("a~002eb.jpg");
      expect((await readdir(imagesDir())).sort()).toEqual(["a~002eb.jpg", "ab.jpg"]);
      expect((await checkHealth(store, config.download)).healthy).toBe(true);
    });

    it("skips an item whose file name is already taken", async () => {
      store.commit(storedRecord("ab"), ["other"]);
      api.pages[1] = [photo("AB"), photo("c1"), photo("C1")];
      config.run.maxPages = 1;
      const remote = fakeRemote(api);
      const ctx = context(remote.fetch);

      const outcome = await acquire(ctx);

      expect(outcome.state).toBe("DONE");
      expect(outcome.cursor.page).toBe(2);
      expect(remote.imageRequests()).toEqual(["https://images.test/c1/raw"]);
      expect([...store.imageIds()].sort()).toEqual(["ab", "c1"]);
      expect(store.listErrors().map((e) => [e.imageId, e.message])).toEqual([
        ["C1", "File name C1.jpg is already used in this page"],
        ["AB", "File name AB.jpg belongs to ab"],
      ]);
      expect(ctx.tracker.getStats().failedDownloads).toBe(2);
    });
  });

  // ==========================================================================
  // Failures
  // ==========================================================================
  describe("failures", () => {
    it("skips an item whose download fails and keeps going", async () => {
      api.pages[1] = [photo("a1"), photo("a2"), photo("a3")];
      api.pages[2] = [];
      api.failingImages.add("a2");
      const ctx = context(fakeRemote(api).fetch);

      const outcome = await acquire(ctx);

      expect(outcome.state).toBe("DONE");
      expect([...store.imageIds()].sort()).toEqual(["a1", "a3"]);
      expect(ctx.dedup.isKnown("a2")).toBe(false);
      expect(store.listErrors()).toEqual([
        expect.objectContaining({
          imageId: "a2",
          phase: "download",
          errorClass: "DownloadFailed",
          url: "https://images.test/a2/raw",
        }),
      ]);
      expect(ctx.tracker.getStats().failedDownloads).toBe(1);
    });

    it("logs malformed items as fetch errors", async () => {
      api.pages[1] = [photo("a1"), { id: "bad", width: "wide" }];
      const ctx = context(fakeRemote(api).fetch);

      await acquire(ctx);

      expect([...store.imageIds()]).toEqual(["a1"]);
      expect(store.listErrors()[0]).toMatchObject({
        imageId: "bad",
        phase: "fetch",
        errorClass: "InvalidItem",
      });
      expect(ctx.tracker.getStats().rejectedItems).toBe(1);
    });

    it("rejects ids that cannot form a filename", async () => {
      const overlong = "x".repeat(201);
      api.pages[1] = [photo(overlong), photo("a1")];
      const remote = fakeRemote(api);

      await acquire(context(remote.fetch));

      expect(remote.imageRequests()).toEqual(["https://images.test/a1/raw"]);
      expect(store.listErrors()[0]).toMatchObject({
        imageId: overlong,
        phase: "download",
        message: `Item id "${overlong}" cannot form a filename`,
      });
    });

    it("aborts on a persistent store failure without leaving orphan files", async () => {
      class FailingStore extends MetadataStore {
        broken = true;
        attempts = 0;

        commit(record: ImageRecord, categories: string[], urls?: ImageUrl[]): void {
          if (this.broken && record.id === "a2") {
            this.attempts++;
            throw new PersistenceError("disk full");
          }
          super.commit(record, categories, urls);
        }
      }
      store.close();
      const failing = new FailingStore(":memory:");
      store = failing;
      api.pages[1] = [photo("a1"), photo("a2"), photo("a3")];
      const remote = fakeRemote(api);

      const outcome = await acquire(context(remote.fetch));

      expect(outcome.state).toBe("ABORTED");
      expect(outcome.reason).toBe("persist-failed");
      expect(failing.attempts).toBe(2);
      expect(await readdir(imagesDir())).toEqual(["a1.jpg"]);
      expect([...store.imageIds()]).toEqual(["a1"]);
      expect(store.loadCursor("photos:latest")).toBeNull();
      expect(store.listErrors()[0]).toMatchObject({
        imageId: "a2",
        phase: "persist",
        errorClass: "PersistenceError",
        retryCount: 1,
      });

      // Resume once the store works again
      failing.broken = false;
      const resumed = await acquire(context(remote.fetch));

      expect(resumed.state).toBe("DONE");
      expect([...store.imageIds()].sort()).toEqual(await cleanRunIds());
      expect(remote.imageRequests().filter((r) => r.includes("/a1/"))).toHaveLength(1);
      expect((await readdir(imagesDir())).sort()).toEqual(["a1.jpg", "a2.jpg", "a3.jpg"]);
      expect((await checkHealth(store, config.download)).healthy).toBe(true);
    });

    it("returns the outcome even when the run cannot be closed", async () => {
      class BrokenStore extends MetadataStore {
        commit(record: ImageRecord, categories: string[], urls?: ImageUrl[]): void {
          if (record.id === "a2") {
            throw new PersistenceError("disk I/O error");
          }
          super.commit(record, categories, urls);
        }

        finishRun(): void {
          throw new PersistenceError("disk I/O error");
        }
      }
      store.close();
      store = new BrokenStore(":memory:");
      api.pages[1] = [photo("a1"), photo("a2")];
      const states: AcquisitionState[] = [];

      const outcome = await acquire(
        context(fakeRemote(api).fetch, { onTransition: ({ to }) => states.push(to) }),
      );

      expect(outcome.state).toBe("ABORTED");
      expect(outcome.reason).toBe("persist-failed");
      expect(outcome.error?.message).toBe("disk I/O error");
      expect(states.at(-1)).toBe("ABORTED");
    });

    it("stops between items when cancelled, without advancing", async () => {
      const controller = new AbortController();
      api.pages[1] = [photo("a1"), photo("a2"), photo("a3")];
      api.onImage = () => controller.abort();
      const remote = fakeRemote(api);

      const outcome = await acquire(
        context(remote.fetch, { signal: controller.signal }),
      );

      expect(outcome.state).toBe("ABORTED");
      expect(outcome.reason).toBe("cancelled");
      expect(remote.imageRequests()).toEqual(["https://images.test/a1/raw"]);
      expect([...store.imageIds()]).toEqual(["a1"]);
      expect(store.loadCursor("photos:latest")).toBeNull();
      expect(outcome.cursor.page).toBe(1);

      api.onImage = undefined;
      const resumed = await acquire(context(remote.fetch));

      expect(resumed.state).toBe("DONE");
      expect([...store.imageIds()].sort()).toEqual(await cleanRunIds());
      expect(remote.imageRequests()).toEqual([
        "https://images.test/a1/raw",
        "https://images.test/a2/raw",
        "https://images.test/a3/raw",
      ]);
    });
  });
});

// ============================================================================
// Item helpers
// ============================================================================

describe("categorize", () => {
  const options = { fallback: "other", fromTags: true, maxTags: 2 };

  it("combines the query with lower-cased tags", () => {
    expect(
      categorize(
        { tags: [{ title: "Nature" }, { title: "forest" }, { title: "Fog" }] },
        "Forest",
        options,
      ),
    ).toEqual(["forest", "nature"]);
  });

  it("falls back when nothing applies", () => {
    expect(categorize({ tags: [] }, null, options)).toEqual(["other"]);
    expect(
      categorize({ tags: [{ title: "Nature" }] }, null, { ...options, fromTags: false }),
    ).toEqual(["other"]);
  });
});

describe("pickUrl", () => {
  it("prefers the configured resolution", () => {
    const item = RemotePhotoSchema.parse(photo("a1"));
    expect(pickUrl(item, "small")).toEqual({
      type: "small",
      url: "https://images.test/a1/small",
    });
  });

  it("falls back to the largest available resolution", () => {
    const item = RemotePhotoSchema.parse(
      photo("a1", { urls: { regular: "https://images.test/a1/regular" } }),
    );
    expect(pickUrl(item, "raw")).toEqual({
      type: "regular",
      url: "https://images.test/a1/regular",
    });
    expect(pickUrl(RemotePhotoSchema.parse(photo("a2", { urls: {} })), "raw")).toBeNull();
  });
});
