/**
 * Remote photo payloads and the records persisted from them
 */

import { z } from "zod";
import type { ErrorPhase } from "../errors";
import type { Resolution } from "./config";

// ============================================================================
// Remote API payloads
// ============================================================================

export const PhotoUrlsSchema = z.object({
  raw: z.string().url().optional(),
  full: z.string().url().optional(),
  regular: z.string().url().optional(),
  small: z.string().url().optional(),
  thumb: z.string().url().optional(),
});

export const RemotePhotoSchema = z.object({
  id: z.string().min(1),
  width: z.number().int().nonnegative(),
  height: z.number().int().nonnegative(),
  color: z.string().nullish(),
  description: z.string().nullish(),
  alt_description: z.string().nullish(),
  created_at: z.string().nullish(),
  urls: PhotoUrlsSchema,
  links: z.object({ html: z.string().optional() }).partial().optional(),
  user: z
    .object({
      name: z.string().nullish(),
      username: z.string().nullish(),
    })
    .optional(),
  tags: z.array(z.object({ title: z.string() })).optional(),
});

export const SearchResponseSchema = z.object({
  total: z.number().int().nonnegative(),
  total_pages: z.number().int().nonnegative(),
  results: z.array(z.unknown()),
});

export const ListResponseSchema = z.array(z.unknown());

export type PhotoUrls = z.infer<typeof PhotoUrlsSchema>;
export type RemotePhoto = z.infer<typeof RemotePhotoSchema>;

/**
 * An item of a page that did not match the photo schema
 */
export interface RejectedItem {
  id: string | null;
  details: string;
}

export interface PhotoPage {
  items: RemotePhoto[];
  rejected: RejectedItem[];
  // null once the API signals end-of-stream
  nextPage: number | null;
}

// ============================================================================
// Persisted records
// ============================================================================

export interface ImageRecord {
  id: string;
  filePath: string; // Relative to the download directory
  width: number;
  height: number;
  color: string | null;
  authorName: string | null;
  authorUsername: string | null;
  description: string | null;
  link: string | null;
  createdAt: string | null;
  downloadedAt: string;
  fileSize: number;
  checksum: string;
  runId: number;
}

export type UrlType = Resolution | "download";

export interface ImageUrl {
  type: UrlType;
  url: string;
}

export interface ImageDetail {
  record: ImageRecord;
  categories: string[];
  urls: ImageUrl[];
}

export interface CategorySummary {
  name: string;
  count: number;
}

/**
 * Resumable position of one listing traversal
 */
export interface FetchCursor {
  stream: string;
  page: number;
  runId: number;
  exhausted: boolean;
}

export type RunState = "DONE" | "ABORTED";

export interface ErrorLogEntry {
  imageId: string | null;
  phase: ErrorPhase;
  errorClass: string;
  message: string;
  url: string | null;
  retryCount: number;
  runId: number | null;
  createdAt: string;
}

// ============================================================================
// Read-only reports
// ============================================================================

export interface TableSummary {
  name: string;
  rows: number;
}

export interface StoreStats {
  totalImages: number;
  totalBytes: number;
  totalErrors: number;
  totalRuns: number;
  today: { downloaded: number; failed: number; bytes: number };
  categories: CategorySummary[];
}

export interface DownloadUrlRow extends ImageUrl {
  imageId: string;
  recordedAt: string;
}
