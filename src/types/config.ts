/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const ApiConfigSchema = z.object({
  baseUrl: z.string().url(),
  accessKey: z.string(),
  // When set, pages come from the search endpoint and the query becomes a category
  query: z.string().nullable(),
  orderBy: z.enum(["latest", "oldest", "popular", "relevant"]),
  // Search only; the listing endpoint ignores it
  orientation: z.enum(["landscape", "portrait", "squarish"]).nullable(),
  perPage: z.number().int().min(1).max(30),
  timeout: z.number().int().positive(), // In milliseconds
  // Published quota; the minimum request interval is derived from it
  requestsPerHour: z.number().int().positive(),
});

export const RetryConfigSchema = z.object({
  rateLimitRetries: z.number().int().nonnegative(),
  networkRetries: z.number().int().nonnegative(),
  baseDelay: z.number().int().positive(), // In milliseconds
  maxDelay: z.number().int().positive(), // In milliseconds
  jitter: z.number().min(0).max(1),
});

export const ResolutionSchema = z.enum([
  "raw",
  "full",
  "regular",
  "small",
  "thumb",
]);

export const DownloadConfigSchema = z.object({
  directory: z.string(),
  resolution: ResolutionSchema,
  extension: z.string().regex(/^[a-z0-9]+$/),
  timeout: z.number().int().positive(), // In milliseconds
  retries: z.number().int().nonnegative(),
  maxBytes: z.number().int().positive(), // In bytes (default: 100MB)
  interval: z.number().int().nonnegative(), // Pause between downloads, ms
  recordUrls: z.boolean(),
});

export const StoreConfigSchema = z.object({
  path: z.string(),
});

export const RunConfigSchema = z.object({
  maxPages: z.number().int().positive().nullable(),
  // Page limit of each category when rotating through the catalogue
  pagesPerCategory: z.number().int().positive(),
});

export const CategoriesConfigSchema = z.object({
  fallback: z.string().min(1),
  fromTags: z.boolean(),
  maxTags: z.number().int().nonnegative(),
  // Search slug -> display name, visited in turn by a rotating run
  catalogue: z
    .record(z.string().min(1), z.string().min(1))
    .refine((entries) => Object.keys(entries).length > 0, {
      message: "Catalogue needs at least one category",
    }),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
  showProgress: z.boolean(),
  file: z.string().nullable(),
});

export const HarvestConfigSchema = z.object({
  api: ApiConfigSchema,
  retry: RetryConfigSchema,
  download: DownloadConfigSchema,
  store: StoreConfigSchema,
  run: RunConfigSchema,
  categories: CategoriesConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialHarvestConfigSchema = HarvestConfigSchema.partial().extend({
  api: ApiConfigSchema.partial().optional(),
  retry: RetryConfigSchema.partial().optional(),
  download: DownloadConfigSchema.partial().optional(),
  store: StoreConfigSchema.partial().optional(),
  run: RunConfigSchema.partial().optional(),
  categories: CategoriesConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

// Infer TypeScript types from Zod schemas
export type ApiConfig = z.infer<typeof ApiConfigSchema>;
export type RetryConfig = z.infer<typeof RetryConfigSchema>;
export type Resolution = z.infer<typeof ResolutionSchema>;
export type DownloadConfig = z.infer<typeof DownloadConfigSchema>;
export type StoreConfig = z.infer<typeof StoreConfigSchema>;
export type RunConfig = z.infer<typeof RunConfigSchema>;
export type CategoriesConfig = z.infer<typeof CategoriesConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type LogLevel = LoggingConfig["level"];
export type HarvestConfig = z.infer<typeof HarvestConfigSchema>;
export type PartialHarvestConfig = z.infer<typeof PartialHarvestConfigSchema>;

export interface ConfigError {
  path: string;
  error: unknown;
}
