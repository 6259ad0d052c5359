/**
 * Run command - Loads config and drives one acquisition run
 */

import ora from "ora";
import { z } from "zod";
import { ConfigurationError } from "../../errors";
import * as modules from "../../modules";
import type { AcquisitionContext, AcquisitionState } from "../../types";
import { Tracker, requireAccessKey } from "../../utils";
import { dataDirectory, fail, loadRuntime, openStore } from "./shared";

const RunOptionsSchema = z.object({
  query: z.string().min(1).optional(),
  maxPages: z.coerce.number().int().positive().optional(),
  rotate: z.boolean().optional(),
  orientation: z.enum(["landscape", "portrait", "squarish"]).optional(),
  config: z.string().optional(),
  verbose: z.boolean().optional(),
});

type Options = z.input<typeof RunOptionsSchema>;

const STATE_TEXT: Record<AcquisitionState, string> = {
  START: "Starting...",
  FETCHING: "Fetching page",
  FILTERING: "Filtering page",
  DOWNLOADING: "Downloading page",
  PERSISTING: "Saving page",
  ADVANCING: "Advancing cursor from page",
  DONE: "Done",
  ABORTED: "Aborted",
};

export async function runCommand(opts: Options): Promise<void> {
  try {
    const options = RunOptionsSchema.parse(opts);
    const { config, logger } = await loadRuntime(options);

    if (options.query) {
      config.api.query = options.query;
    }
    if (options.orientation) {
      config.api.orientation = options.orientation;
    }
    if (options.maxPages !== undefined) {
      if (options.rotate) {
        config.run.pagesPerCategory = options.maxPages;
      } else {
        config.run.maxPages = options.maxPages;
      }
    }
    if (options.rotate && options.query) {
      throw new ConfigurationError("--rotate searches the catalogue; drop --query");
    }

    // Before any network call
    requireAccessKey(config);

    const useSpinner = config.logging.showProgress && !options.verbose;
    const spinner = ora({ text: "Initializing...", indent: 2 });
    if (useSpinner) spinner.start();

    const store = openStore(config);
    const controller = new AbortController();
    const cancel = (): void => {
      if (!controller.signal.aborted) {
        spinner.text = "Stopping after the current item...";
        logger.warn("Cancellation requested; stopping after the current item");
        controller.abort();
      }
    };
    process.on("SIGINT", cancel);
    process.on("SIGTERM", cancel);

    try {
      const tracker = new Tracker();
      const deps = { logger: logger.child("http") };

      const ctx: AcquisitionContext = {
        config,
        tracker,
        logger,
        store,
        client: new modules.PhotoApiClient(config.api, config.retry, deps),
        downloader: new modules.Downloader(config.download, config.retry, deps),
        dedup: modules.DedupIndex.fromStore(store),
        signal: controller.signal,
        onTransition: ({ to, page }) => {
          spinner.text =
            to === "DONE" || to === "ABORTED"
              ? STATE_TEXT[to]
              : `${STATE_TEXT[to]} ${page}...`;
        },
      };

      logger.debug(`${ctx.dedup.size} image(s) already in the store`);
      const outcome = options.rotate
        ? await modules.rotate(ctx)
        : await modules.acquire(ctx);

      spinner.clear();
      spinner.stop();

      await modules.stats(outcome, tracker, dataDirectory(config), options.verbose);

      if (outcome.state === "ABORTED") {
        process.exitCode = outcome.reason === "cancelled" ? 130 : 1;
      }
    } finally {
      process.off("SIGINT", cancel);
      process.off("SIGTERM", cancel);
      spinner.stop();
      store.close();
    }
  } catch (error) {
    fail(error);
  }
}
