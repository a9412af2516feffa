/**
 * Merge context - flows through the entire pipeline
 * Each module reads what it needs and writes its results back
 */

import type { MergeConfig } from "./config";
import type { FileDescriptor } from "./files";
import type { ValidationReport } from "./links";
import type { Tracker } from "../utils/tracker";
import type { Logger } from "../utils/logger";
import type { IdentityResolver } from "../utils/identity-resolver";
import type { LabelRegistry } from "../utils/label-registry";

// Re-export types from tracker
export type {
  Issue,
  IssueType,
  FileIssue,
  ResourceIssue,
  ClashIssue,
  LinkIssue,
  FileIssueReason,
  ResourceIssueReason,
  ProcessingStats,
} from "../utils/tracker";

export interface MergeContext {
  // Input - provided at initialization
  config: MergeConfig;
  inputs: string[]; // Input paths or glob patterns, in document order
  output: string; // Absolute path of the merged file
  dryRun?: boolean; // Stop after validation
  verbose?: boolean;
  reportPath?: string; // Where to export stats as JSON

  // Unified tracking for stats, warnings and errors
  tracker: Tracker;
  logger: Logger;
  identities: IdentityResolver;

  files?: FileDescriptor[]; // Scanner: fragments in document order
  registry?: LabelRegistry; // Registry: frozen labels/clashes per identity
  report?: ValidationReport; // Validator: link errors per source file
  merged?: boolean; // Merger: false while writing, true once the output is complete
}
