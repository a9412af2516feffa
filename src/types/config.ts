/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const MarkdownConfigSchema = z.object({
  // Suffixes a cross-file link target must end with (e.g. ".md")
  extensions: z.array(z.string().startsWith(".")).min(1),
  // Treat lines inside ``` / ~~~ fences as plain text (no headings, no links)
  ignoreFencedCode: z.boolean(),
});

export const IdentityConfigSchema = z.object({
  // Prepended to the inode number; pandoc identifiers must start with a letter
  prefix: z.string().regex(/^[A-Za-z][A-Za-z0-9_]*$/),
});

export const LinksConfigSchema = z.object({
  // "keep": same-file (#label) links pass through untouched
  // "rewrite": they are validated and prefixed with the file identity
  local: z.enum(["keep", "rewrite"]),
});

export const AssetsConfigSchema = z.object({
  rewrite: z.boolean(),
  extensions: z.array(z.string().startsWith(".")),
});

export const OutputConfigSchema = z.object({
  pageBreak: z.string(),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
  showContext: z.boolean(),
});

export const MergeConfigSchema = z.object({
  markdown: MarkdownConfigSchema,
  identity: IdentityConfigSchema,
  links: LinksConfigSchema,
  assets: AssetsConfigSchema,
  output: OutputConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialMergeConfigSchema = z.object({
  markdown: MarkdownConfigSchema.partial().optional(),
  identity: IdentityConfigSchema.partial().optional(),
  links: LinksConfigSchema.partial().optional(),
  assets: AssetsConfigSchema.partial().optional(),
  output: OutputConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

// Infer TypeScript types from Zod schemas
export type MarkdownConfig = z.infer<typeof MarkdownConfigSchema>;
export type IdentityConfig = z.infer<typeof IdentityConfigSchema>;
export type LinksConfig = z.infer<typeof LinksConfigSchema>;
export type AssetsConfig = z.infer<typeof AssetsConfigSchema>;
export type OutputConfig = z.infer<typeof OutputConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type LogLevel = LoggingConfig["level"];
export type MergeConfig = z.infer<typeof MergeConfigSchema>;
export type PartialMergeConfig = z.infer<typeof PartialMergeConfigSchema>;

export interface ConfigError {
  path: string;
  error: unknown;
}
