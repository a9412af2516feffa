/**
 * Merge Tracker
 * Unified tracking for stats and issues
 */

import { writeFile } from "fs/promises";
import { ZodError } from "zod";
import type { LinkError } from "../types";

// ============================================================================
// Types
// ============================================================================

// Type-safe reasons for each issue type
export type FileIssueReason =
  | "read-error"
  | "write-error"
  | "duplicate-input";
export type ResourceIssueReason =
  | "invalid-json"
  | "schema-validation"
  | "read-error";

export interface FileIssue {
  type: "file";
  path: string;
  reason: FileIssueReason;
  details?: string;
}

export interface ResourceIssue {
  type: "resource";
  path: string;
  reason: ResourceIssueReason;
  details?: string;
}

// Warning: labels defined more than once in the same file
export interface ClashIssue {
  type: "clash";
  path: string;
  labels: string[];
}

// Error: a link that failed validation, path is the referencing file
export interface LinkIssue {
  type: "link";
  path: string;
  error: LinkError;
}

export type Issue = FileIssue | ResourceIssue | ClashIssue | LinkIssue;
export type IssueType = Issue["type"];

export interface ProcessingStats {
  // Pass 1
  totalFiles: number;
  headings: number;
  labels: number;

  // Pass 2
  crossFileLinks: number;
  localLinks: number;
  brokenLinks: number;

  // Pass 3
  rewrittenHeadings: number;
  rewrittenLinks: number;
  rewrittenAssets: number;

  issues: Issue[];
  duration: number;
}

// ============================================================================
// Error Mapping (private)
// ============================================================================

interface IssueInfo<T> {
  reason: T;
  details: string;
}

function mapResourceError(error: unknown): IssueInfo<ResourceIssueReason> {
  if (error instanceof ZodError) {
    return {
      reason: "schema-validation",
      details: error.issues
        .map((e) => `${e.path.join(".")}: ${e.message}`)
        .join("; "),
    };
  }
  if (error instanceof SyntaxError) {
    return {
      reason: "invalid-json",
      details: error.message,
    };
  }
  return {
    reason: "read-error",
    details: error instanceof Error ? error.message : String(error),
  };
}

function mapFileError(
  error: unknown,
  context: "read" | "write",
): IssueInfo<FileIssueReason> {
  const details = error instanceof Error ? error.message : String(error);
  return { reason: context === "write" ? "write-error" : "read-error", details };
}

// ============================================================================
// Tracker Class
// ============================================================================

export class Tracker {
  private totalFiles = 0;
  private headings = 0;
  private labels = 0;
  private crossFileLinks = 0;
  private localLinks = 0;
  private rewrittenHeadings = 0;
  private rewrittenLinks = 0;
  private rewrittenAssets = 0;
  private issues: Issue[] = [];
  private startTime = new Date();

  // ============================================================================
  // Stat counters
  // ============================================================================

  setTotalFiles(count: number): void {
    this.totalFiles = count;
  }

  incrementHeadings(): void {
    this.headings++;
  }

  setLabels(count: number): void {
    this.labels = count;
  }

  incrementCrossFileLinks(): void {
    this.crossFileLinks++;
  }

  incrementLocalLinks(): void {
    this.localLinks++;
  }

  incrementRewrittenHeadings(): void {
    this.rewrittenHeadings++;
  }

  addRewrittenLinks(count: number): void {
    this.rewrittenLinks += count;
  }

  addRewrittenAssets(count: number): void {
    this.rewrittenAssets += count;
  }

  // ============================================================================
  // Issue tracking
  // ============================================================================

  /**
   * Track an issue from an error, auto-detecting the reason based on error type
   */
  trackError(
    path: string,
    error: unknown,
    type: "file" | "resource",
    context: "read" | "write" = "read",
  ): void {
    switch (type) {
      case "file": {
        const { reason, details } = mapFileError(error, context);
        this.issues.push({ type: "file", path, reason, details });
        break;
      }
      case "resource": {
        const { reason, details } = mapResourceError(error);
        this.issues.push({ type: "resource", path, reason, details });
        break;
      }
    }
  }

  trackDuplicateInput(path: string, firstSeen: string): void {
    this.issues.push({
      type: "file",
      path,
      reason: "duplicate-input",
      details: `same file as ${firstSeen}`,
    });
  }

  trackClash(path: string, labels: string[]): void {
    this.issues.push({ type: "clash", path, labels });
  }

  trackLinkError(path: string, error: LinkError): void {
    this.issues.push({ type: "link", path, error });
  }

  // ============================================================================
  // Issue getters
  // ============================================================================

  getIssues(): Issue[] {
    return this.issues;
  }

  getFileIssues(): FileIssue[] {
    return this.issues.filter((i): i is FileIssue => i.type === "file");
  }

  getResourceIssues(): ResourceIssue[] {
    return this.issues.filter((i): i is ResourceIssue => i.type === "resource");
  }

  getClashIssues(): ClashIssue[] {
    return this.issues.filter((i): i is ClashIssue => i.type === "clash");
  }

  getLinkIssues(): LinkIssue[] {
    return this.issues.filter((i): i is LinkIssue => i.type === "link");
  }

  // ============================================================================
  // Results
  // ============================================================================

  getStats(): ProcessingStats {
    const endTime = new Date();
    const duration = endTime.getTime() - this.startTime.getTime();

    return {
      totalFiles: this.totalFiles,
      headings: this.headings,
      labels: this.labels,
      crossFileLinks: this.crossFileLinks,
      localLinks: this.localLinks,
      brokenLinks: this.getLinkIssues().length,
      rewrittenHeadings: this.rewrittenHeadings,
      rewrittenLinks: this.rewrittenLinks,
      rewrittenAssets: this.rewrittenAssets,
      issues: this.issues,
      duration,
    };
  }

  // ============================================================================
  // Export
  // ============================================================================

  /**
   * Write stats and issues, grouped by type, as JSON
   */
  async exportStats(outputPath: string): Promise<void> {
    const { issues, ...summary } = this.getStats();

    const exported = {
      summary,
      issues: {
        file: this.getFileIssues(),
        resource: this.getResourceIssues(),
        clash: this.getClashIssues(),
        link: this.getLinkIssues(),
      },
      total: issues.length,
    };

    await writeFile(outputPath, JSON.stringify(exported, null, 2), "utf-8");
  }
}
