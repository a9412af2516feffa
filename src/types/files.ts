/**
 * File-related type definitions
 */

/**
 * Opaque token identifying one file on disk, independent of the relative
 * path used to reach it (e.g. "n1835021")
 */
export type FileIdentity = string;

export interface FileDescriptor {
  sourcePath: string; // Absolute path to the markdown fragment
  relativePath: string; // Path relative to the working directory (for display)
  id: FileIdentity; // Identity used as registry key and anchor prefix
  lines: string[]; // File content split into lines, without terminators
}

export interface Heading {
  line: number; // 0-based line index
  level: number; // Number of leading '#'
  marker: string; // The leading '#' run itself (e.g. "##")
  text: string; // Heading text with marker and surrounding whitespace removed
  label: string; // Normalized label derived from text
}

/**
 * Result of inserting a label into a file's LabelSet
 * "present" means the label was already defined in that file
 */
export type InsertResult = "added" | "present";
