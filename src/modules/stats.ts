/**
 * Stats Module
 * Displays run statistics and issues with chalk formatting
 */

import chalk from "chalk";
import type { Issue, RunOutcome, RunStats, Tracker } from "../types";
import type { CategoryVisit, RotationOutcome } from "./rotation";

// ============================================================================
// Formatting Helpers
// ============================================================================

/**
 * Format duration in a human-readable way
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(2)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = (seconds % 60).toFixed(0);
  return `${minutes}m ${remainingSeconds}s`;
}

const BYTE_UNITS = ["B", "KB", "MB", "GB", "TB"];

/**
 * @example
 * formatBytes(1536) // "1.5 KB"
 */
export function formatBytes(bytes: number): string {
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < BYTE_UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0
    ? `${value} ${BYTE_UNITS[unit]}`
    : `${value.toFixed(1)} ${BYTE_UNITS[unit]}`;
}

/**
 * Create a progress bar with percentage
 */
export function progressBar(
  current: number,
  total: number,
  width: number = 24,
): string {
  if (total === 0) return chalk.dim("─".repeat(width));

  const percentage = current / total;
  const filled = Math.round(width * percentage);
  const empty = width - filled;
  const percentText = `${Math.round(percentage * 100)}%`;

  const filledBar = chalk.green("━".repeat(filled));
  const emptyBar = chalk.dim("━".repeat(empty));

  return `${filledBar}${emptyBar} ${chalk.dim(percentText)}`;
}

/**
 * Format a stat row with icon, label and value
 */
export function statRow(
  icon: string,
  label: string,
  value: string | number,
  color: (s: string) => string = chalk.white,
): string {
  return `   ${icon} ${chalk.dim(label.padEnd(18))} ${color(String(value))}`;
}

export function sectionHeader(title: string): string {
  return `\n  ${chalk.bold.white(title)}`;
}

// ============================================================================
// Main Stats Display
// ============================================================================

/**
 * Export the run summary next to the database and print it
 */
export async function stats(
  outcome: RunOutcome | RotationOutcome,
  tracker: Tracker,
  outputDir: string,
  verbose = false,
): Promise<string> {
  const exported = await tracker.exportStats(outputDir);
  const stats = tracker.getStats();

  const statusIcon =
    outcome.state === "ABORTED"
      ? chalk.red("✖")
      : stats.failedDownloads > 0 || stats.rejectedItems > 0
        ? chalk.yellow("◆")
        : chalk.green("✔");

  console.log("");
  console.log(
    `  ${statusIcon} ${chalk.bold(`Run ${outcome.runId} ${outcome.state}`)} ${chalk.dim("·")} ${chalk.dim(outcome.reason)} ${chalk.dim("·")} ${chalk.dim(formatDuration(stats.duration))}`,
  );

  if ("visits" in outcome) {
    displayVisitsSection(outcome.visits);
  }
  displayPagesSection(stats, outcome);
  displayDownloadsSection(stats);
  displayIssuesSection(tracker, verbose);

  console.log("");
  console.log(chalk.dim(`  Summary written to ${exported}`));
  console.log("");
  return exported;
}

// ============================================================================
// Section Displays
// ============================================================================

function displayVisitsSection(visits: CategoryVisit[]): void {
  console.log(sectionHeader("Categories"));
  for (const { name, outcome } of visits) {
    const icon = outcome.state === "DONE" ? chalk.green("◉") : chalk.red("◉");
    console.log(
      statRow(icon, name, `${outcome.reason} @ page ${outcome.cursor.page}`),
    );
  }
}

function displayPagesSection(stats: RunStats, outcome: RunOutcome): void {
  console.log(sectionHeader("Pages"));
  console.log(statRow(chalk.cyan("◉"), "Fetched", stats.pagesFetched, chalk.cyan));
  console.log(
    statRow(
      chalk.cyan("◉"),
      "Cursor",
      `${outcome.cursor.stream} @ ${outcome.cursor.page}${outcome.cursor.exhausted ? " (exhausted)" : ""}`,
    ),
  );
  console.log(statRow(chalk.white("◉"), "Items seen", stats.itemsSeen));
  if (stats.knownSkipped > 0) {
    console.log(statRow(chalk.dim("◉"), "Already known", stats.knownSkipped, chalk.dim));
  }
  if (stats.rejectedItems > 0) {
    console.log(
      statRow(chalk.yellow("◉"), "Rejected", stats.rejectedItems, chalk.yellow),
    );
  }
}

function displayDownloadsSection(stats: RunStats): void {
  const attempted = stats.downloaded + stats.failedDownloads;
  if (attempted === 0) {
    return;
  }

  console.log(sectionHeader("Downloads"));
  console.log(`   ${progressBar(stats.downloaded, attempted)}`);
  console.log(
    statRow(chalk.green("◉"), "Downloaded", stats.downloaded, chalk.green),
  );
  console.log(
    statRow(chalk.green("◉"), "Committed", stats.committed, chalk.green),
  );
  console.log(statRow(chalk.cyan("◉"), "Bytes", formatBytes(stats.bytes), chalk.cyan));

  if (stats.failedDownloads > 0) {
    console.log(
      statRow(chalk.red("◉"), "Failed", stats.failedDownloads, chalk.red),
    );
  }
}

function displayIssuesSection(tracker: Tracker, verbose: boolean): void {
  const phases = [
    ["fetch", "Fetch issues"],
    ["download", "Download issues"],
    ["persist", "Persist issues"],
  ] as const;

  const grouped = phases
    .map(([phase, label]) => [label, tracker.getIssues(phase)] as const)
    .filter(([, issues]) => issues.length > 0);

  if (grouped.length === 0) {
    return;
  }

  console.log(sectionHeader(chalk.red("Errors")));

  for (const [label, issues] of grouped) {
    console.log(statRow(chalk.red("✖"), label, issues.length, chalk.red));
    if (verbose) {
      displayIssueList(issues);
    }
  }
}

function displayIssueList(issues: Issue[]): void {
  for (const issue of issues.slice(0, 5)) {
    console.log(`      ${chalk.dim("·")} ${issue.subject} ${chalk.dim(`(${issue.reason})`)}`);
    console.log(`        ${chalk.dim(issue.details)}`);
  }
  if (issues.length > 5) {
    console.log(`      ${chalk.dim(`  +${issues.length - 5} more`)}`);
  }
}
