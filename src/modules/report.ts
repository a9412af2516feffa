/**
 * Report Module
 * Displays the label context, warnings, link errors and statistics
 */

import chalk from "chalk";
import { formatLinkError, toDisplayPath } from "../utils";
import type { MergeContext, ProcessingStats } from "../types";

// ============================================================================
// Formatting Helpers
// ============================================================================

/**
 * Format duration in a human-readable way
 */
function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  return `${(ms / 1000).toFixed(2)}s`;
}

/**
 * Format a stat row with icon, label and value
 */
function statRow(
  icon: string,
  label: string,
  value: string | number,
  color: (s: string) => string = chalk.white,
): string {
  return `   ${icon} ${chalk.dim(label.padEnd(18))} ${color(String(value))}`;
}

/**
 * Section header with modern styling
 */
function sectionHeader(title: string): string {
  return `\n  ${chalk.bold.white(title)}`;
}

function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? "" : "s"}`;
}

// ============================================================================
// Sections
// ============================================================================

function inputsSection(ctx: MergeContext): string[] {
  const lines = [sectionHeader("Input")];
  lines.push(statRow(chalk.cyan("◉"), "Target", toDisplayPath(ctx.output)));
  for (const file of ctx.files ?? []) {
    lines.push(`      ${chalk.dim("·")} ${file.relativePath}`);
  }
  return lines;
}

/**
 * file -> labels mapping as registered in pass 1
 */
function contextSection(ctx: MergeContext): string[] {
  const { registry, files } = ctx;
  if (!registry || !files || !ctx.config.logging.showContext) return [];

  const lines = [sectionHeader("Context")];
  for (const file of files) {
    const labels = registry.labelsOf(file.id);
    const shown = labels.length > 0 ? labels.join(", ") : chalk.dim("(no labels)");
    lines.push(`   ${file.relativePath} ${chalk.dim("->")} ${shown}`);
  }
  return lines;
}

function warningsSection(ctx: MergeContext): string[] {
  const { tracker } = ctx;
  const clashes = tracker.getClashIssues();
  const fileIssues = tracker.getFileIssues();
  const resourceIssues = tracker.getResourceIssues();

  if (clashes.length + fileIssues.length + resourceIssues.length === 0) {
    return [];
  }

  const lines = [sectionHeader(chalk.yellow("Warnings"))];

  if (clashes.length > 0) {
    lines.push(
      `   ${chalk.yellow("◆")} Some sections have the same name and therefore the same label`,
    );
    for (const { path, labels } of clashes) {
      const noun = labels.length === 1 ? "label" : "labels";
      lines.push(`      ${chalk.dim("·")} in file "${path}" for ${noun} ${labels.join(", ")}`);
    }
  }

  for (const issue of fileIssues) {
    lines.push(`   ${chalk.yellow("◆")} ${issue.path}: ${issue.reason}`);
    if (issue.details) lines.push(`        ${chalk.dim(issue.details)}`);
  }

  for (const issue of resourceIssues) {
    lines.push(`   ${chalk.yellow("◆")} config ${issue.path}: ${issue.reason}`);
    if (issue.details) lines.push(`        ${chalk.dim(issue.details)}`);
  }

  return lines;
}

/**
 * Link errors grouped by the file containing the link
 */
function errorsSection(ctx: MergeContext): string[] {
  const { report } = ctx;
  if (!report || report.size === 0) return [];

  const lines = [sectionHeader(chalk.red("Errors"))];
  for (const [source, errors] of report) {
    lines.push(`   ${chalk.red("✖")} on file ${toDisplayPath(source)}`);
    for (const error of errors) {
      lines.push(`      ${chalk.dim("·")} ${formatLinkError(error)}`);
    }
  }
  return lines;
}

function summarySection(stats: ProcessingStats): string[] {
  const lines = [sectionHeader("Summary")];
  lines.push(statRow(chalk.green("◉"), "Files", stats.totalFiles, chalk.green));
  lines.push(
    statRow(
      chalk.green("◉"),
      "Labels",
      `${stats.labels} (${plural(stats.headings, "heading")})`,
      chalk.green,
    ),
  );

  const totalLinks = stats.crossFileLinks + stats.localLinks;
  if (totalLinks > 0) {
    const color = stats.brokenLinks > 0 ? chalk.red : chalk.green;
    lines.push(
      statRow(
        color("◉"),
        "Links",
        `${totalLinks - stats.brokenLinks}/${totalLinks} valid`,
        color,
      ),
    );
  }

  if (stats.rewrittenHeadings + stats.rewrittenLinks > 0) {
    lines.push(
      statRow(
        chalk.cyan("◉"),
        "Rewritten",
        `${plural(stats.rewrittenHeadings, "heading")}, ${plural(stats.rewrittenLinks, "link")}`,
        chalk.cyan,
      ),
    );
  }

  if (stats.rewrittenAssets > 0) {
    lines.push(
      statRow(chalk.cyan("◉"), "Assets", stats.rewrittenAssets, chalk.cyan),
    );
  }

  return lines;
}

// ============================================================================
// Main Report
// ============================================================================

/**
 * All report lines for the current state of the context
 */
export function formatReport(ctx: MergeContext): string[] {
  const stats = ctx.tracker.getStats();
  const failed = (ctx.report?.size ?? 0) > 0;

  const statusIcon = failed
    ? chalk.red("✖")
    : stats.issues.length > 0
      ? chalk.yellow("◆")
      : chalk.green("✔");
  const title = failed
    ? "Link Validation Failed"
    : ctx.merged
      ? "Merge Complete"
      : "Validation Complete";

  return [
    "",
    `  ${statusIcon} ${chalk.bold(title)} ${chalk.dim("·")} ${chalk.dim(formatDuration(stats.duration))}`,
    ...inputsSection(ctx),
    ...contextSection(ctx),
    ...warningsSection(ctx),
    ...errorsSection(ctx),
    ...summarySection(stats),
    "",
  ];
}

/**
 * Display the report and export stats to JSON when requested
 */
export async function report(ctx: MergeContext): Promise<void> {
  for (const line of formatReport(ctx)) {
    console.log(line);
  }

  if (ctx.reportPath) {
    await ctx.tracker.exportStats(ctx.reportPath);
  }
}
