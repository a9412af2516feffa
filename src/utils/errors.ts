/**
 * Error classes for failures that abort a run
 */

import type { ValidationReport } from "../types";

/**
 * A path yields no identity, or an identity maps back to several paths.
 * Internal inconsistency: the pipeline cannot continue without it.
 */
export class IdentityError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "IdentityError";
  }
}

/**
 * Input arguments that cannot be turned into a list of fragments
 */
export class InputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InputError";
  }
}

/**
 * At least one link failed validation; carries the full report
 */
export class LinkValidationError extends Error {
  constructor(readonly report: ValidationReport) {
    let count = 0;
    for (const errors of report.values()) count += errors.length;
    super(`${count} broken link(s) in ${report.size} file(s)`);
    this.name = "LinkValidationError";
  }
}
