/**
 * Report commands - read-only views over the metadata store
 */

import chalk from "chalk";
import { z } from "zod";
import { formatBytes, sectionHeader, statRow } from "../../modules/stats";
import type { ImageRecord } from "../../types";
import { withStore } from "./shared";

const CommonOptionsSchema = z.object({
  config: z.string().optional(),
});

const LimitOptionsSchema = CommonOptionsSchema.extend({
  limit: z.coerce.number().int().positive().default(20),
});

type CommonOptions = z.input<typeof CommonOptionsSchema>;
type LimitOptions = z.input<typeof LimitOptionsSchema>;

function printRecords(title: string, records: ImageRecord[]): void {
  console.log(sectionHeader(`${title} (${records.length})`));
  if (records.length === 0) {
    console.log(chalk.dim("   No images found"));
    return;
  }
  for (const record of records) {
    const author = record.authorName ?? record.authorUsername ?? "unknown";
    console.log(
      `   ${chalk.cyan(record.id.padEnd(14))} ${chalk.dim(`${record.width}x${record.height}`.padEnd(11))} ${author}`,
    );
    if (record.description) {
      console.log(`   ${" ".repeat(14)} ${chalk.dim(record.description)}`);
    }
  }
  console.log("");
}

export async function statsCommand(opts: CommonOptions): Promise<void> {
  await withStore(CommonOptionsSchema.parse(opts), (store) => {
    const summary = store.getStats();

    console.log(sectionHeader("Library"));
    console.log(statRow(chalk.green("◉"), "Images", summary.totalImages, chalk.green));
    console.log(statRow(chalk.cyan("◉"), "Total size", formatBytes(summary.totalBytes), chalk.cyan));
    console.log(statRow(chalk.white("◉"), "Runs", summary.totalRuns));
    console.log(statRow(chalk.red("◉"), "Errors logged", summary.totalErrors, chalk.red));

    console.log(sectionHeader("Today"));
    console.log(statRow(chalk.green("◉"), "Downloaded", summary.today.downloaded, chalk.green));
    console.log(statRow(chalk.red("◉"), "Failed", summary.today.failed, chalk.red));
    console.log(statRow(chalk.cyan("◉"), "Bytes", formatBytes(summary.today.bytes), chalk.cyan));

    if (summary.categories.length > 0) {
      console.log(sectionHeader("Top categories"));
      for (const category of summary.categories.slice(0, 10)) {
        console.log(statRow(chalk.magenta("◉"), category.name, category.count));
      }
    }
    console.log("");
  });
}

export async function tablesCommand(opts: CommonOptions): Promise<void> {
  await withStore(CommonOptionsSchema.parse(opts), (store) => {
    console.log(sectionHeader("Tables"));
    for (const table of store.listTables()) {
      console.log(statRow(chalk.cyan("◉"), table.name, table.rows));
    }
    const missing = store.missingTables();
    if (missing.length > 0) {
      console.log(statRow(chalk.red("✖"), "Missing", missing.join(", "), chalk.red));
    }
    console.log("");
  });
}

export async function searchCommand(keyword: string, opts: CommonOptions): Promise<void> {
  await withStore(CommonOptionsSchema.parse(opts), (store) => {
    printRecords(`Matches for "${keyword}"`, store.search(keyword));
  });
}

export async function categoryCommand(name: string, opts: CommonOptions): Promise<void> {
  await withStore(CommonOptionsSchema.parse(opts), (store) => {
    printRecords(`Category "${name}"`, store.listByCategory(name.toLowerCase()));
  });
}

export async function categoriesCommand(opts: CommonOptions): Promise<void> {
  await withStore(CommonOptionsSchema.parse(opts), (store) => {
    const categories = store.listCategories();
    console.log(sectionHeader(`Categories (${categories.length})`));
    for (const category of categories) {
      console.log(statRow(chalk.magenta("◉"), category.name, category.count));
    }
    console.log("");
  });
}

export async function detailCommand(id: string, opts: CommonOptions): Promise<void> {
  await withStore(CommonOptionsSchema.parse(opts), (store) => {
    const detail = store.getImage(id);
    if (!detail) {
      console.log(chalk.yellow(`  ◆ No image with id ${id}`));
      process.exitCode = 1;
      return;
    }

    const { record, categories, urls } = detail;
    console.log(sectionHeader(`Image ${record.id}`));
    console.log(statRow("·", "File", record.filePath));
    console.log(statRow("·", "Size", formatBytes(record.fileSize)));
    console.log(statRow("·", "Dimensions", `${record.width}x${record.height}`));
    console.log(statRow("·", "Color", record.color ?? "-"));
    console.log(statRow("·", "Author", record.authorName ?? "-"));
    console.log(statRow("·", "Username", record.authorUsername ?? "-"));
    console.log(statRow("·", "Description", record.description ?? "-"));
    console.log(statRow("·", "Link", record.link ?? "-"));
    console.log(statRow("·", "Created", record.createdAt ?? "-"));
    console.log(statRow("·", "Downloaded", record.downloadedAt));
    console.log(statRow("·", "Checksum", record.checksum, chalk.dim));
    console.log(statRow("·", "Categories", categories.join(", ") || "-", chalk.magenta));

    if (urls.length > 0) {
      console.log(sectionHeader("URLs"));
      for (const url of urls) {
        console.log(statRow("·", url.type, url.url, chalk.dim));
      }
    }
    console.log("");
  });
}

export async function urlsCommand(
  id: string | undefined,
  opts: LimitOptions,
): Promise<void> {
  const options = LimitOptionsSchema.parse(opts);
  await withStore(options, (store) => {
    const urls = store.getDownloadUrls(id, options.limit);
    console.log(sectionHeader(id ? `URLs of ${id}` : "Recent URLs"));
    for (const url of urls) {
      console.log(`   ${chalk.cyan(url.imageId.padEnd(14))} ${url.type.padEnd(9)} ${chalk.dim(url.url)}`);
    }
    console.log("");
  });
}

export async function errorsCommand(opts: LimitOptions): Promise<void> {
  const options = LimitOptionsSchema.parse(opts);
  await withStore(options, (store) => {
    const errors = store.listErrors(options.limit);
    console.log(sectionHeader(`Recent errors (${errors.length})`));
    for (const entry of errors) {
      console.log(
        `   ${chalk.dim(entry.createdAt)} ${chalk.red(entry.phase.padEnd(8))} ${entry.errorClass} ${chalk.dim(entry.imageId ?? "")}`,
      );
      console.log(`      ${entry.message}`);
    }
    console.log("");
  });
}
