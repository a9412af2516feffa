/**
 * Label Registry
 * Per-file sets of section labels and of labels defined more than once
 */

import type { FileIdentity, InsertResult } from "../types";

export class LabelRegistry {
  private labels = new Map<FileIdentity, Set<string>>();
  private clashes = new Map<FileIdentity, Set<string>>();
  private frozen = false;

  /**
   * Make a file known to the registry, even if it defines no label
   */
  addFile(identity: FileIdentity): void {
    this.assertWritable();
    if (!this.labels.has(identity)) {
      this.labels.set(identity, new Set());
      this.clashes.set(identity, new Set());
    }
  }

  /**
   * Record a label for a file
   * The first occurrence is kept as canonical; any repeat puts the label
   * in the file's clash set (once, however many repeats follow)
   */
  addLabel(identity: FileIdentity, label: string): InsertResult {
    this.addFile(identity);
    const labels = this.labels.get(identity) ?? new Set<string>();

    if (!labels.has(label)) {
      labels.add(label);
      return "added";
    }

    this.clashes.get(identity)?.add(label);
    return "present";
  }

  /**
   * No further insertions once validation starts
   */
  freeze(): this {
    this.frozen = true;
    return this;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  hasFile(identity: FileIdentity): boolean {
    return this.labels.has(identity);
  }

  hasLabel(identity: FileIdentity, label: string): boolean {
    return this.labels.get(identity)?.has(label) ?? false;
  }

  isClash(identity: FileIdentity, label: string): boolean {
    return this.clashes.get(identity)?.has(label) ?? false;
  }

  /** Labels of a file in first-seen order */
  labelsOf(identity: FileIdentity): string[] {
    return Array.from(this.labels.get(identity) ?? []);
  }

  /** Clashing labels of a file in detection order */
  clashesOf(identity: FileIdentity): string[] {
    return Array.from(this.clashes.get(identity) ?? []);
  }

  /** Known files in registration order */
  files(): FileIdentity[] {
    return Array.from(this.labels.keys());
  }

  /** Files with at least one clashing label */
  clashing(): Array<[FileIdentity, string[]]> {
    return this.files()
      .map((identity): [FileIdentity, string[]] => [
        identity,
        this.clashesOf(identity),
      ])
      .filter(([, labels]) => labels.length > 0);
  }

  private assertWritable(): void {
    if (this.frozen) {
      throw new Error("Label registry is frozen: labels can only be added while building");
    }
  }
}
