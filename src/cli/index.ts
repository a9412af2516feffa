#!/usr/bin/env node

/**
 * CLI entry point for the markdown anchor merger
 * Handles command-line argument parsing
 */

import { Command } from "commander";
import { mergeCommand } from "./commands/merge";
import { configCommand } from "./commands/config";

const program = new Command();

program
  .name("md-anchor-merge")
  .description(
    "Check the links of a multi-file markdown document and merge it into one file with global anchors",
  )
  .version("0.1.0")
  .showHelpAfterError();

// Main merge command (default action)
program
  .argument("<output>", "Markdown file to write the merged document to")
  .argument(
    "<inputs...>",
    "Markdown files or glob patterns, in document order",
  )
  .option("-c, --config <path>", "Path to custom config file")
  .option("--dry-run", "Validate links without writing the output")
  .option("--report <path>", "Write statistics and issues as JSON")
  .option("-v, --verbose", "Verbose output")
  .action(mergeCommand);

// Config command - show config location and defaults
program
  .command("config")
  .description("Show configuration file location and default settings")
  .action(configCommand);

await program.parseAsync();
