/**
 * Health commands - check, repair and initialize the store
 */

import chalk from "chalk";
import { z } from "zod";
import { checkHealth, repair } from "../../modules/health";
import { sectionHeader, statRow } from "../../modules/stats";
import { withStore } from "./shared";

const HealthOptionsSchema = z.object({
  config: z.string().optional(),
  verbose: z.boolean().optional(),
});

const RepairOptionsSchema = HealthOptionsSchema.extend({
  dryRun: z.boolean().default(false),
});

type HealthOptions = z.input<typeof HealthOptionsSchema>;
type RepairOptions = z.input<typeof RepairOptionsSchema>;

export async function healthCommand(opts: HealthOptions): Promise<void> {
  await withStore(HealthOptionsSchema.parse(opts), async (store, { config }) => {
    const report = await checkHealth(store, config.download);

    const icon = report.healthy ? chalk.green("✔") : chalk.red("✖");
    console.log("");
    console.log(`  ${icon} ${chalk.bold(report.healthy ? "Healthy" : "Issues found")}`);
    console.log(sectionHeader("Checks"));
    console.log(statRow(chalk.cyan("◉"), "Records checked", report.checked, chalk.cyan));
    console.log(statRow(chalk.red("◉"), "Missing files", report.missingFiles.length));
    console.log(statRow(chalk.red("◉"), "Checksum errors", report.checksumMismatches.length));
    console.log(statRow(chalk.yellow("◉"), "Orphan files", report.orphanFiles.length));
    console.log(statRow(chalk.red("◉"), "Missing tables", report.missingTables.join(", ") || "-"));

    for (const record of report.missingFiles) {
      console.log(`      ${chalk.dim("·")} ${record.id} ${chalk.dim(record.filePath)}`);
    }
    for (const { record } of report.checksumMismatches) {
      console.log(`      ${chalk.dim("·")} ${record.id} ${chalk.dim("checksum mismatch")}`);
    }
    for (const file of report.orphanFiles) {
      console.log(`      ${chalk.dim("·")} ${file} ${chalk.dim("orphan")}`);
    }
    console.log("");

    if (!report.healthy) {
      process.exitCode = 1;
    }
  });
}

export async function repairCommand(opts: RepairOptions): Promise<void> {
  const options = RepairOptionsSchema.parse(opts);
  await withStore(options, async (store, { config, logger }) => {
    const report = await repair(store, config.download, {
      dryRun: options.dryRun,
      logger: logger.child("repair"),
    });

    const verb = report.dryRun ? "Would remove" : "Removed";
    console.log(sectionHeader(report.dryRun ? "Repair (dry run)" : "Repair"));
    console.log(statRow(chalk.yellow("◉"), `${verb} rows`, report.removedRows.length));
    console.log(statRow(chalk.yellow("◉"), `${verb} files`, report.removedFiles.length));
    console.log("");
  });
}

/**
 * Opening the store applies pending migrations
 */
export async function initCommand(opts: HealthOptions): Promise<void> {
  await withStore(HealthOptionsSchema.parse(opts), (store, { config }) => {
    const tables = store.listTables();
    console.log(
      `  ${chalk.green("✔")} Store ready at ${config.store.path} (${tables.length} tables)`,
    );
  });
}
