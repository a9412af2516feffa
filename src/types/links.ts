/**
 * Link and link-error type definitions
 */

/**
 * Link to a section of another fragment: [text](./path/to/file.md#label)
 * A missing label marks a direct (file-only) link
 */
export interface CrossFileLink {
  kind: "cross-file";
  path: string; // Target path as written, relative to the referencing file
  label?: string;
  line: number; // 0-based line index
}

/**
 * Link to a section of the same fragment: [text](#label)
 */
export interface LocalLink {
  kind: "local";
  label: string;
  line: number;
}

export type Link = CrossFileLink | LocalLink;

// Discriminated union - target is the resolved absolute path of the linked file
export interface LabelClashError {
  type: "label-clash";
  target: string;
  label: string;
}

export interface DeadLabelError {
  type: "dead-label";
  target: string;
  label: string;
}

export interface DeadFileError {
  type: "dead-file";
  target: string;
  label: string;
}

export interface DirectLinkError {
  type: "direct-link";
  target: string;
}

export type LinkError =
  | LabelClashError
  | DeadLabelError
  | DeadFileError
  | DirectLinkError;
export type LinkErrorType = LinkError["type"];

/**
 * Source file absolute path -> errors found in that file
 * Insertion order follows input order; files without errors are absent
 */
export type ValidationReport = Map<string, LinkError[]>;
