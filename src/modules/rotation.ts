/**
 * Category Rotation
 * Visits the configured catalogue one category at a time. Every category is
 * its own search stream with its own cursor; categories that have waited
 * longest since their last run go first.
 */

import { ConfigurationError } from "../errors";
import type { AcquisitionContext, RunOutcome } from "../types";
import type { ApiConfig, CategoriesConfig } from "../types/config";
import { streamKey } from "./client";
import { acquire } from "./orchestrator";
import type { MetadataStore } from "./store";

export interface CategoryVisit {
  slug: string;
  name: string;
  outcome: RunOutcome;
}

export interface RotationOutcome extends RunOutcome {
  visits: CategoryVisit[];
}

// Run ends that stop the rest of the rotation; a failed fetch only skips the category
const STOPPING_REASONS = new Set(["cancelled", "persist-failed"]);

/**
 * Catalogue slugs, those never run first, then by how long ago they last ran
 * Ties keep catalogue order
 */
export function rotationOrder(
  catalogue: CategoriesConfig["catalogue"],
  api: Pick<ApiConfig, "orderBy" | "orientation">,
  store: Pick<MetadataStore, "lastRuns">,
): string[] {
  const lastRuns = store.lastRuns();
  const lastRunOf = (slug: string): number =>
    lastRuns.get(streamKey({ ...api, query: slug })) ?? 0;

  return Object.keys(catalogue)
    .map((slug, index) => ({ slug, index, lastRun: lastRunOf(slug) }))
    .sort((a, b) => a.lastRun - b.lastRun || a.index - b.index)
    .map(({ slug }) => slug);
}

/**
 * Run one acquisition per catalogue category, each capped at
 * `run.pagesPerCategory` pages
 */
export async function rotate(ctx: AcquisitionContext): Promise<RotationOutcome> {
  const { config, store, signal } = ctx;
  const logger = ctx.logger.child("rotate");
  const { catalogue } = config.categories;
  const perCategory = {
    ...config,
    run: { ...config.run, maxPages: config.run.pagesPerCategory },
  };

  const order = rotationOrder(catalogue, config.api, store);
  const visits: CategoryVisit[] = [];
  logger.info(`Rotating through ${order.length} categories`);

  for (const slug of order) {
    const name = catalogue[slug] ?? slug;
    logger.info(`Category ${name} (${slug})`);

    const outcome = await acquire({
      ...ctx,
      config: perCategory,
      client: ctx.client.forQuery(slug),
    });
    visits.push({ slug, name, outcome });

    if (STOPPING_REASONS.has(outcome.reason)) {
      return { ...outcome, visits };
    }
    if (outcome.state === "ABORTED") {
      logger.warn(`Category ${name} skipped: ${outcome.reason}`);
    }
    if (signal?.aborted) {
      return { ...outcome, state: "ABORTED", reason: "cancelled", visits };
    }
  }

  const last = visits.at(-1);
  if (!last) {
    throw new ConfigurationError("Category catalogue is empty");
  }
  const { runId, cursor } = last.outcome;
  return { state: "DONE", reason: "rotated", runId, cursor, visits };
}
