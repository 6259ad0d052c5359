/**
 * Acquisition context - flows through the entire run
 * Every collaborator is passed explicitly; nothing is a process-wide singleton
 */

import type { HarvestConfig } from "./config";
import type { FetchCursor, RunState } from "./photos";
import type { AcquisitionError } from "../errors";
import type { Tracker } from "../utils/tracker";
import type { Logger } from "../utils/logger";
import type { MetadataStore } from "../modules/store";
import type { PhotoApiClient } from "../modules/client";
import type { Downloader } from "../modules/downloader";
import type { DedupIndex } from "../modules/dedup-index";

export type AcquisitionState =
  | "START"
  | "FETCHING"
  | "FILTERING"
  | "DOWNLOADING"
  | "PERSISTING"
  | "ADVANCING"
  | RunState;

export interface Transition {
  from: AcquisitionState;
  to: AcquisitionState;
  page: number;
}

export interface AcquisitionContext {
  config: HarvestConfig;
  tracker: Tracker;
  logger: Logger;
  store: MetadataStore;
  client: PhotoApiClient;
  downloader: Downloader;
  dedup: DedupIndex;

  // Honoured between items only
  signal?: AbortSignal;
  onTransition?: (transition: Transition) => void;
}

export interface RunOutcome {
  state: RunState;
  reason: string;
  runId: number;
  cursor: FetchCursor;
  error?: AcquisitionError;
}
