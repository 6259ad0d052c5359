/**
 * Utility exports
 */

// Filesystem utilities
export { fileExists, removeFile } from "./fs";
export { checksumOf, checksumFile } from "./checksum";
export { photoFilename, partialPath } from "./filename";

// Timing utilities
export { Pacer, exponentialDelay, jitteredDelay, sleep } from "./backoff";
export type { Clock, Sleep } from "./backoff";

// Phase outcomes
export { ok, retryable, fatal } from "./result";
export type { Outcome, Settled } from "./result";

// Config utilities
export {
  loadConfig,
  getUserConfigPath,
  loadDefaultConfig,
  requireAccessKey,
} from "./load-config";

// Classes
export { Logger } from "./logger";
export { Tracker } from "./tracker";
