import { describe, it, expect } from "vitest";
import { DedupIndex } from "./dedup-index";
import { MetadataStore } from "./store";

describe("DedupIndex", () => {
  it("tolerates an empty store", () => {
    const store = new MetadataStore(":memory:");
    const index = DedupIndex.fromStore(store);

    expect(index.size).toBe(0);
    expect(index.isKnown("a1")).toBe(false);
    store.close();
  });

  it("loads every committed id from the store", () => {
    const index = DedupIndex.fromStore({
      *imageIds() {
        yield "a1";
        yield "a2";
      },
    });

    expect(index.size).toBe(2);
    expect(index.isKnown("a1")).toBe(true);
    expect(index.isKnown("a3")).toBe(false);
  });

  it("learns ids marked at run time", () => {
    const index = new DedupIndex(["a1"]);

    index.markKnown("a2");
    index.markKnown("a2");

    expect(index.isKnown("a2")).toBe(true);
    expect(index.size).toBe(2);
  });
});
