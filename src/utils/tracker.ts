/**
 * Run Tracker
 * Unified tracking for stats and issues
 */

import { mkdir, writeFile } from "fs/promises";
import { join } from "path";
import { ZodError } from "zod";
import { AcquisitionError, errorMessage, type ErrorPhase } from "../errors";

// ============================================================================
// Types
// ============================================================================

export type IssueReason =
  | "rate-limited"
  | "network"
  | "client-error"
  | "download-failed"
  | "persistence"
  | "invalid-item"
  | "unknown";

export interface Issue {
  phase: ErrorPhase;
  subject: string; // Remote id, URL or page
  reason: IssueReason;
  details: string;
}

export interface RunStats {
  pagesFetched: number;
  itemsSeen: number;
  knownSkipped: number;
  rejectedItems: number;
  downloaded: number;
  failedDownloads: number;
  committed: number;
  bytes: number;
  issues: Issue[];
  duration: number;
}

// ============================================================================
// Error Mapping (private)
// ============================================================================

function mapReason(error: unknown): IssueReason {
  if (error instanceof ZodError) {
    return "invalid-item";
  }
  if (error instanceof AcquisitionError) {
    switch (error.name) {
      case "RateLimitExceeded":
        return "rate-limited";
      case "TransientNetworkError":
        return "network";
      case "ClientRequestError":
        return "client-error";
      case "DownloadFailed":
        return "download-failed";
      case "PersistenceError":
        return "persistence";
    }
  }
  return "unknown";
}

// ============================================================================
// Tracker Class
// ============================================================================

export class Tracker {
  private pagesFetched = 0;
  private itemsSeen = 0;
  private knownSkipped = 0;
  private rejectedItems = 0;
  private downloaded = 0;
  private failedDownloads = 0;
  private committed = 0;
  private bytes = 0;
  private issues: Issue[] = [];
  private startTime: number;

  constructor(private clock: () => number = Date.now) {
    this.startTime = clock();
  }

  // ============================================================================
  // Stat counters
  // ============================================================================

  incrementPages(itemCount: number): void {
    this.pagesFetched++;
    this.itemsSeen += itemCount;
  }

  incrementKnown(count = 1): void {
    this.knownSkipped += count;
  }

  incrementRejected(): void {
    this.rejectedItems++;
  }

  incrementDownloaded(bytes: number): void {
    this.downloaded++;
    this.bytes += bytes;
  }

  incrementFailedDownloads(): void {
    this.failedDownloads++;
  }

  incrementCommitted(): void {
    this.committed++;
  }

  // ============================================================================
  // Issue tracking
  // ============================================================================

  /**
   * Track an issue, deriving its reason from the error class
   */
  trackError(phase: ErrorPhase, subject: string, error: unknown): void {
    this.issues.push({
      phase,
      subject,
      reason: mapReason(error),
      details: errorMessage(error),
    });
  }

  trackIssue(issue: Issue): void {
    this.issues.push(issue);
  }

  getIssues(phase?: ErrorPhase): Issue[] {
    if (!phase) return this.issues;
    return this.issues.filter((i) => i.phase === phase);
  }

  // ============================================================================
  // Results
  // ============================================================================

  getStats(): RunStats {
    return {
      pagesFetched: this.pagesFetched,
      itemsSeen: this.itemsSeen,
      knownSkipped: this.knownSkipped,
      rejectedItems: this.rejectedItems,
      downloaded: this.downloaded,
      failedDownloads: this.failedDownloads,
      committed: this.committed,
      bytes: this.bytes,
      issues: this.issues,
      duration: this.clock() - this.startTime,
    };
  }

  // ============================================================================
  // Export
  // ============================================================================

  async exportStats(outputDir: string): Promise<string> {
    const { issues, ...summary } = this.getStats();

    const grouped: Record<string, Issue[]> = {};
    for (const issue of issues) {
      const key = `${issue.phase}:${issue.reason}`;
      (grouped[key] ??= []).push(issue);
    }

    await mkdir(outputDir, { recursive: true });
    const outputPath = join(outputDir, "last-run.json");
    await writeFile(
      outputPath,
      JSON.stringify({ summary, issues: grouped }, null, 2),
      "utf-8",
    );
    return outputPath;
  }
}
