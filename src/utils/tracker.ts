/**
 * Conversion Tracker
 * Unified tracking for stats and issues
 */

import { ZodError } from "zod";
import type {
  Issue,
  IssueType,
  FileIssueReason,
  ResourceIssueReason,
  ProcessingStats,
} from "../types";

// ============================================================================
// Error Mapping (private)
// ============================================================================

interface IssueInfo<T> {
  reason: T;
  details: string;
}

type FileStage = "read" | "render" | "convert" | "write";

function mapResourceError(error: unknown): IssueInfo<ResourceIssueReason> {
  if (error instanceof ZodError) {
    return {
      reason: "schema-validation",
      details: error.issues.map((e) => e.message).join("; "),
    };
  }
  if (error instanceof SyntaxError) {
    return {
      reason: "invalid-json",
      details: error.message,
    };
  }
  if (error instanceof Error) {
    return {
      reason: "read-error",
      details: error.message,
    };
  }
  return {
    reason: "read-error",
    details: String(error),
  };
}

function mapFileError(
  error: unknown,
  stage: FileStage,
): IssueInfo<FileIssueReason> {
  const details = error instanceof Error ? error.message : String(error);

  switch (stage) {
    case "read":
      return { reason: "read-error", details };
    case "render":
      return { reason: "render-error", details };
    case "convert":
      return { reason: "convert-error", details };
    case "write":
      return { reason: "write-error", details };
  }
}

// ============================================================================
// Tracker Class
// ============================================================================

export class Tracker {
  private totalFiles = 0;
  private convertedFiles = 0;
  private failedFiles = 0;
  private skippedFiles = 0;
  private issues: Issue[] = [];
  private startTime = new Date();

  // ============================================================================
  // Stat counters
  // ============================================================================

  setTotalFiles(count: number): void {
    this.totalFiles = count;
  }

  incrementConverted(): void {
    this.convertedFiles++;
  }

  incrementFailed(): void {
    this.failedFiles++;
  }

  incrementSkipped(): void {
    this.skippedFiles++;
  }

  // ============================================================================
  // Issue tracking
  // ============================================================================

  trackFileError(path: string, error: unknown, stage: FileStage): void {
    const { reason, details } = mapFileError(error, stage);
    this.issues.push({ type: "file", path, reason, details });
  }

  trackResourceError(path: string, error: unknown): void {
    const { reason, details } = mapResourceError(error);
    this.issues.push({ type: "resource", path, reason, details });
  }

  trackDateFallback(path: string, rawDate: string): void {
    this.issues.push({
      type: "date",
      path,
      reason: "unrecognized-format",
      details: rawDate,
    });
  }

  // ============================================================================
  // Issue getters
  // ============================================================================

  getIssues(type?: IssueType): Issue[] {
    if (!type) return this.issues;
    return this.issues.filter((i) => i.type === type);
  }

  // ============================================================================
  // Results
  // ============================================================================

  getStats(): ProcessingStats {
    const duration = Date.now() - this.startTime.getTime();

    let dateFallbacks = 0;
    let renderFallbacks = 0;
    for (const issue of this.issues) {
      if (issue.type === "date") dateFallbacks++;
      if (issue.type === "file" && issue.reason === "render-error") {
        renderFallbacks++;
      }
    }

    return {
      totalFiles: this.totalFiles,
      convertedFiles: this.convertedFiles,
      failedFiles: this.failedFiles,
      skippedFiles: this.skippedFiles,
      dateFallbacks,
      renderFallbacks,
      issues: this.issues,
      duration,
    };
  }
}
