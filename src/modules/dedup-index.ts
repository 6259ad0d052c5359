/**
 * Deduplication Index
 * In-memory set of remote ids the store already owns
 */

import type { MetadataStore } from "./store";

export class DedupIndex {
  private readonly known: Set<string>;

  constructor(ids: Iterable<string> = []) {
    this.known = new Set(ids);
  }

  /**
   * Stream every committed id from the store's primary key once
   */
  static fromStore(store: Pick<MetadataStore, "imageIds">): DedupIndex {
    return new DedupIndex(store.imageIds());
  }

  isKnown(remoteId: string): boolean {
    return this.known.has(remoteId);
  }

  markKnown(remoteId: string): void {
    this.known.add(remoteId);
  }

  get size(): number {
    return this.known.size;
  }
}
