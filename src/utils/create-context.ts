import path from "node:path";
import type { MergeConfig, MergeContext } from "../types";
import { InodeIdentityResolver } from "./identity-resolver";
import type { IdentityResolver } from "./identity-resolver";
import { Logger } from "./logger";
import { Tracker } from "./tracker";

export interface CreateContextOptions {
  config: MergeConfig;
  inputs: string[];
  output: string;
  dryRun?: boolean;
  verbose?: boolean;
  reportPath?: string;
  tracker?: Tracker;
  logger?: Logger;
  identities?: IdentityResolver;
}

/**
 * Build the context shared by all pipeline modules
 * Defaults: a fresh Tracker, a Logger at the configured level (debug when
 * verbose) and inode-based identities with the configured prefix
 */
export function createContext(options: CreateContextOptions): MergeContext {
  const { config } = options;

  return {
    config,
    inputs: options.inputs,
    output: path.resolve(options.output),
    dryRun: options.dryRun,
    verbose: options.verbose,
    reportPath: options.reportPath && path.resolve(options.reportPath),
    tracker: options.tracker ?? new Tracker(),
    logger:
      options.logger ??
      new Logger(options.verbose ? "debug" : config.logging.level),
    identities:
      options.identities ?? new InodeIdentityResolver(config.identity.prefix),
  };
}
