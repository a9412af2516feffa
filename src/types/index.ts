/**
 * Central type exports
 */

// Configuration
export type {
  MergeConfig,
  PartialMergeConfig,
  MarkdownConfig,
  IdentityConfig,
  LinksConfig,
  AssetsConfig,
  OutputConfig,
  LoggingConfig,
  LogLevel,
  ConfigError,
} from "./config";
export { MergeConfigSchema, PartialMergeConfigSchema } from "./config";

// Files
export type {
  FileIdentity,
  FileDescriptor,
  Heading,
  InsertResult,
} from "./files";

// Links
export type {
  Link,
  CrossFileLink,
  LocalLink,
  LinkError,
  LinkErrorType,
  LabelClashError,
  DeadLabelError,
  DeadFileError,
  DirectLinkError,
  ValidationReport,
} from "./links";

// Context
export type {
  MergeContext,
  Issue,
  IssueType,
  FileIssue,
  ResourceIssue,
  ClashIssue,
  LinkIssue,
  FileIssueReason,
  ResourceIssueReason,
  ProcessingStats,
} from "./context";
