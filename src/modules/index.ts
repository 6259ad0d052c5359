/**
 * Acquisition modules export
 */

export { PhotoApiClient, streamKey } from "./client";
export { DedupIndex } from "./dedup-index";
export { Downloader } from "./downloader";
export { MetadataStore } from "./store";
export { acquire, categorize, pickUrl } from "./orchestrator";
export { rotate, rotationOrder } from "./rotation";
export { checkHealth, repair } from "./health";
export { stats } from "./stats";
