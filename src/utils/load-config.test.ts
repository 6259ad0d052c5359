import { describe, it, expect, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  envOverrides,
  loadConfig,
  loadDefaultConfig,
  mergeConfig,
  redactConfig,
  requireAccessKey,
} from "./load-config";
import { ConfigurationError } from "../errors";

describe("loadDefaultConfig", () => {
  it("loads the bundled defaults", async () => {
    const config = await loadDefaultConfig();

    expect(config.api.baseUrl).toBe("https://api.unsplash.com");
    expect(config.api.perPage).toBe(30);
    expect(config.api.requestsPerHour).toBe(50);
    expect(config.download.resolution).toBe("raw");
    expect(config.api.orientation).toBeNull();
    expect(Object.keys(config.categories.catalogue)).toHaveLength(20);
    expect(config.categories.catalogue.nature).toBe("Nature");
  });
});

describe("envOverrides", () => {
  it("maps environment variables onto config sections", () => {
    expect(
      envOverrides({
        UNSPLASH_ACCESS_KEY: "test-secret",
        PHOTO_HARVEST_PER_PAGE: "10",
        PHOTO_HARVEST_DB: "/tmp/photos.db",
      }),
    ).toEqual({
      api: { accessKey: "test-secret", perPage: 10 },
      store: { path: "/tmp/photos.db" },
    });
  });

  it("reads the search orientation", () => {
    expect(envOverrides({ PHOTO_HARVEST_ORIENTATION: "squarish" })).toEqual({
      api: { orientation: "squarish" },
    });
    expect(() => envOverrides({ PHOTO_HARVEST_ORIENTATION: "round" })).toThrow();
  });

  it("ignores unset and empty numbers", () => {
    expect(envOverrides({ PHOTO_HARVEST_PER_PAGE: "" })).toEqual({});
  });

  it("rejects values outside the schema", () => {
    expect(() => envOverrides({ PHOTO_HARVEST_PER_PAGE: "99" })).toThrow();
  });
});

describe("mergeConfig", () => {
  it("overrides only the given keys of each section", async () => {
    const base = await loadDefaultConfig();

    const merged = mergeConfig(base, { api: { perPage: 5 } });

    expect(merged.api.perPage).toBe(5);
    expect(merged.api.baseUrl).toBe(base.api.baseUrl);
    expect(merged.retry).toEqual(base.retry);
  });
});

describe("loadConfig", () => {
  let dir: string | null = null;

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
    dir = null;
  });

  it("applies a custom file, then the environment", async () => {
    dir = await mkdtemp(join(tmpdir(), "config-"));
    const custom = join(dir, "custom.json");
    await writeFile(custom, JSON.stringify({ api: { perPage: 12, query: "forest" } }));

    const { config, errors, sources } = await loadConfig(custom, {
      PHOTO_HARVEST_PER_PAGE: "20",
      PHOTO_HARVEST_DB: "/tmp/photos.db",
    });

    expect(errors).toEqual([]);
    expect(config.api.perPage).toBe(20);
    expect(config.api.query).toBe("forest");
    expect(sources.map((s) => s.kind)).toEqual(["default", "custom", "environment"]);
    expect(sources[1].location).toBe(custom);
    expect(sources[2].location).toBe("PHOTO_HARVEST_PER_PAGE, PHOTO_HARVEST_DB");
  });

  it("reports an invalid custom file and keeps loading", async () => {
    dir = await mkdtemp(join(tmpdir(), "config-"));
    const custom = join(dir, "custom.json");
    await writeFile(custom, JSON.stringify({ api: { perPage: "many" } }));

    const { config, errors } = await loadConfig(custom, {});

    expect(errors.map((e) => e.path)).toEqual([custom]);
    expect(config.api.perPage).toBe(30);
  });
});

describe("redactConfig", () => {
  it("hides the access key", async () => {
    const config = await loadDefaultConfig();

    expect(redactConfig({ ...config, api: { ...config.api, accessKey: "test-secret" } }).api.accessKey).toBe("(set)");
    expect(redactConfig(config).api.accessKey).toBe("");
    expect(redactConfig(config).download).toEqual(config.download);
  });
});

describe("requireAccessKey", () => {
  it("fails at startup without an access key", async () => {
    const config = await loadDefaultConfig();

    expect(() => requireAccessKey(config)).toThrow(ConfigurationError);
    expect(() => requireAccessKey({ ...config, api: { ...config.api, accessKey: "  " } })).toThrow(
      "Missing API access key: set UNSPLASH_ACCESS_KEY or api.accessKey",
    );
  });

  it("returns the configured key", async () => {
    const config = await loadDefaultConfig();
    const key = requireAccessKey({ ...config, api: { ...config.api, accessKey: "test-secret" } });

    expect(key).toBe("test-secret");
  });
});
