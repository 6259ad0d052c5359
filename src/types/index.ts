/**
 * Central type exports
 */

// Configuration
export type {
  ApiConfig,
  RetryConfig,
  Resolution,
  DownloadConfig,
  StoreConfig,
  RunConfig,
  CategoriesConfig,
  LoggingConfig,
  LogLevel,
  HarvestConfig,
  PartialHarvestConfig,
  ConfigError,
} from "./config";
export { HarvestConfigSchema, PartialHarvestConfigSchema } from "./config";

// Photos and records
export type {
  PhotoUrls,
  RemotePhoto,
  RejectedItem,
  PhotoPage,
  ImageRecord,
  UrlType,
  ImageUrl,
  ImageDetail,
  CategorySummary,
  FetchCursor,
  RunState,
  ErrorLogEntry,
  TableSummary,
  StoreStats,
  DownloadUrlRow,
} from "./photos";
export {
  PhotoUrlsSchema,
  RemotePhotoSchema,
  SearchResponseSchema,
  ListResponseSchema,
} from "./photos";

// Context
export type {
  AcquisitionContext,
  AcquisitionState,
  RunOutcome,
  Transition,
} from "./context";

// Tracker
export { Tracker } from "../utils/tracker";
export type { Issue, IssueReason, RunStats } from "../utils/tracker";
