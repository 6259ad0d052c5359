/**
 * Config command - Show where settings come from and what they resolve to
 */

import chalk from "chalk";
import { z } from "zod";
import { errorMessage } from "../../errors";
import { sectionHeader, statRow } from "../../modules/stats";
import {
  getUserConfigPath,
  loadConfig,
  redactConfig,
  type ConfigSource,
} from "../../utils/load-config";
import { fail } from "./shared";

const ConfigOptionsSchema = z.object({
  config: z.string().optional(),
});

type Options = z.input<typeof ConfigOptionsSchema>;

const SOURCE_LABEL: Record<ConfigSource["kind"], string> = {
  default: "Defaults",
  user: "User config",
  custom: "Custom config",
  environment: "Environment",
};

export async function configCommand(opts: Options): Promise<void> {
  try {
    const options = ConfigOptionsSchema.parse(opts);
    const { config, sources, errors } = await loadConfig(options.config);

    console.log(sectionHeader("Sources (later wins)"));
    for (const source of sources) {
      console.log(statRow(chalk.cyan("◉"), SOURCE_LABEL[source.kind], source.location));
    }
    if (!sources.some((s) => s.kind === "user")) {
      console.log(
        statRow(chalk.dim("◉"), SOURCE_LABEL.user, `${getUserConfigPath()} (not found)`, chalk.dim),
      );
    }
    for (const { path, error } of errors) {
      console.log(statRow(chalk.red("✖"), "Ignored", `${path}: ${errorMessage(error)}`, chalk.red));
    }

    console.log(sectionHeader("Resolved"));
    for (const line of JSON.stringify(redactConfig(config), null, 2).split("\n")) {
      console.log(`   ${line}`);
    }
    console.log("");
  } catch (error) {
    fail(error);
  }
}
