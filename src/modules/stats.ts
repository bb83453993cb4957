/**
 * Stats Module
 * Displays processing statistics and issues
 */

import chalk from "chalk";
import type {
  ConversionContext,
  DateIssue,
  FileIssue,
  Issue,
  ProcessingStats,
  ResourceIssue,
} from "../types";

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

function progressBar(current: number, total: number, width = 24): string {
  if (total === 0) return chalk.dim("─".repeat(width));

  const percentage = current / total;
  const filled = Math.round(width * percentage);
  const percentText = `${Math.round(percentage * 100)}%`;

  return `${chalk.green("━".repeat(filled))}${chalk.dim("━".repeat(width - filled))} ${chalk.dim(percentText)}`;
}

function statRow(
  icon: string,
  label: string,
  value: string | number,
  color: (s: string) => string = chalk.white,
): string {
  return `   ${icon} ${chalk.dim(label.padEnd(18))} ${color(String(value))}`;
}

function sectionHeader(title: string): string {
  return `\n  ${chalk.bold.white(title)}`;
}

function isFileIssue(issue: Issue): issue is FileIssue {
  return issue.type === "file";
}

function isDateIssue(issue: Issue): issue is DateIssue {
  return issue.type === "date";
}

function isResourceIssue(issue: Issue): issue is ResourceIssue {
  return issue.type === "resource";
}

// ============================================================================
// Main Stats Display
// ============================================================================

/**
 * Display processing statistics to console
 */
export async function stats(ctx: ConversionContext): Promise<void> {
  const { tracker, verbose, dryRun } = ctx;
  const stats = tracker.getStats();
  const hasErrors = stats.failedFiles > 0 || stats.skippedFiles > 0;
  const hasWarnings = stats.issues.length > 0;

  console.log("");

  const statusIcon = hasErrors
    ? chalk.red("✖")
    : hasWarnings
      ? chalk.yellow("◆")
      : chalk.green("✔");
  const title = dryRun ? "Dry Run Complete" : "Conversion Complete";

  console.log(
    `  ${statusIcon} ${chalk.bold(title)} ${chalk.dim("·")} ${chalk.dim(formatDuration(stats.duration))}`,
  );

  displayFilesSection(stats);
  displayFallbacksSection(stats, verbose);
  displayIssuesSection(stats.issues, verbose);

  console.log("");
}

// ============================================================================
// Section Displays
// ============================================================================

function displayFilesSection(stats: ProcessingStats): void {
  console.log(sectionHeader("Posts"));
  console.log(`   ${progressBar(stats.convertedFiles, stats.totalFiles)}`);

  console.log(
    statRow(chalk.green("◉"), "Converted", stats.convertedFiles, chalk.green),
  );

  if (stats.failedFiles > 0) {
    console.log(statRow(chalk.red("◉"), "Failed", stats.failedFiles, chalk.red));
  }

  if (stats.skippedFiles > 0) {
    console.log(
      statRow(chalk.yellow("◉"), "Skipped", stats.skippedFiles, chalk.yellow),
    );
  }
}

function displayFallbacksSection(
  stats: ProcessingStats,
  verbose?: boolean,
): void {
  if (stats.dateFallbacks === 0 && stats.renderFallbacks === 0) {
    return;
  }

  console.log(sectionHeader("Fallbacks"));

  if (stats.dateFallbacks > 0) {
    console.log(
      statRow(chalk.yellow("◆"), "Dates → today", stats.dateFallbacks, chalk.yellow),
    );
    if (verbose) {
      for (const issue of stats.issues.filter(isDateIssue)) {
        console.log(`      ${chalk.dim("·")} ${issue.path} ${chalk.dim(JSON.stringify(issue.details))}`);
      }
    }
  }

  if (stats.renderFallbacks > 0) {
    console.log(
      statRow(chalk.yellow("◆"), "Raw <pre> bodies", stats.renderFallbacks, chalk.yellow),
    );
  }
}

function displayIssuesSection(issues: Issue[], verbose?: boolean): void {
  const fileIssues = issues.filter(isFileIssue);
  const resourceIssues = issues.filter(isResourceIssue);

  if (fileIssues.length === 0 && resourceIssues.length === 0) {
    return;
  }

  console.log(sectionHeader(chalk.red("Issues")));

  if (fileIssues.length > 0) {
    console.log(
      statRow(chalk.red("✖"), "File problems", fileIssues.length, chalk.red),
    );
    if (verbose) {
      for (const issue of fileIssues) {
        console.log(`      ${chalk.dim("·")} ${issue.path} ${chalk.dim(`(${issue.reason})`)}`);
        if (issue.details) {
          console.log(`        ${chalk.dim(issue.details)}`);
        }
      }
    }
  }

  if (resourceIssues.length > 0) {
    console.log(
      statRow(chalk.yellow("✖"), "Config files", resourceIssues.length, chalk.yellow),
    );
    if (verbose) {
      for (const issue of resourceIssues) {
        console.log(`      ${chalk.dim("·")} ${issue.path} ${chalk.dim(`(${issue.reason})`)}`);
        if (issue.details) {
          console.log(`        ${chalk.dim(issue.details)}`);
        }
      }
    }
  }
}
