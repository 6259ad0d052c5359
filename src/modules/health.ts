/**
 * Health Module
 * Reconciles the metadata store with the payloads on disk
 */

import path from "node:path";
import glob from "fast-glob";
import type { ImageRecord } from "../types";
import type { DownloadConfig } from "../types/config";
import { checksumFile } from "../utils/checksum";
import { fileExists, removeFile } from "../utils/fs";
import type { Logger } from "../utils/logger";
import type { MetadataStore } from "./store";

export interface ChecksumMismatch {
  record: ImageRecord;
  actual: string;
}

export interface HealthReport {
  checked: number;
  missingFiles: ImageRecord[];
  checksumMismatches: ChecksumMismatch[];
  // Paths relative to the download root, .part leftovers included
  orphanFiles: string[];
  missingTables: string[];
  healthy: boolean;
}

export interface RepairReport {
  dryRun: boolean;
  removedRows: string[];
  removedFiles: string[];
}

type HealthStore = Pick<MetadataStore, "records" | "missingTables">;
type PayloadLocation = Pick<DownloadConfig, "directory" | "extension">;

/**
 * Verify every record's file and checksum, then look for payload files no
 * record owns. Only names ending in the payload extension (or its .part
 * sibling) are considered, so a database kept in the same directory is left
 * alone.
 */
export async function checkHealth(
  store: HealthStore,
  { directory: root, extension }: PayloadLocation,
): Promise<HealthReport> {
  const missingFiles: ImageRecord[] = [];
  const checksumMismatches: ChecksumMismatch[] = [];
  const owned = new Set<string>();
  let checked = 0;

  // Materialized: the statement must not stay open across awaits
  for (const record of [...store.records()]) {
    checked++;
    owned.add(record.filePath);
    const filePath = path.join(root, record.filePath);

    if (!(await fileExists(filePath))) {
      missingFiles.push(record);
      continue;
    }

    const actual = await checksumFile(filePath);
    if (actual !== record.checksum) {
      checksumMismatches.push({ record, actual });
    }
  }

  const onDisk = (await fileExists(root))
    ? await glob([`*.${extension}`, `*.${extension}.part`], {
        cwd: root,
        onlyFiles: true,
        dot: true,
      })
    : [];
  const orphanFiles = onDisk.filter((file) => !owned.has(file)).sort();
  const missingTables = store.missingTables();

  return {
    checked,
    missingFiles,
    checksumMismatches,
    orphanFiles,
    missingTables,
    healthy:
      missingFiles.length === 0 &&
      checksumMismatches.length === 0 &&
      orphanFiles.length === 0 &&
      missingTables.length === 0,
  };
}

/**
 * Restore the one-file-per-record invariant:
 * - a record whose file is missing is deleted
 * - a file no record owns is deleted
 * - a record whose checksum disagrees is deleted with its file, so the next
 *   run acquires the item again
 */
export async function repair(
  store: HealthStore & Pick<MetadataStore, "deleteImage">,
  location: PayloadLocation,
  options: { dryRun?: boolean; logger?: Logger } = {},
): Promise<RepairReport> {
  const dryRun = options.dryRun ?? false;
  const logger = options.logger;
  const root = location.directory;
  const report = await checkHealth(store, location);

  const rows = [
    ...report.missingFiles,
    ...report.checksumMismatches.map((m) => m.record),
  ];
  const files = [
    ...report.orphanFiles,
    ...report.checksumMismatches.map((m) => m.record.filePath),
  ];

  const removedRows: string[] = [];
  const removedFiles: string[] = [];

  for (const record of rows) {
    if (dryRun || store.deleteImage(record.id)) {
      removedRows.push(record.id);
      logger?.info(`${dryRun ? "Would remove" : "Removed"} record ${record.id}`);
    }
  }

  for (const file of files) {
    if (!dryRun) {
      await removeFile(path.join(root, file));
    }
    removedFiles.push(file);
    logger?.info(`${dryRun ? "Would remove" : "Removed"} file ${file}`);
  }

  return { dryRun, removedRows, removedFiles };
}
