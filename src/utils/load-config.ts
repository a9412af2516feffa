/**
 * Configuration Loader
 * Loads and merges configuration from defaults and user config
 */

import { readFile } from "fs/promises";
import { join } from "path";
import { existsSync } from "fs";
import envPaths from "env-paths";
import defaultConfig from "../config/default.json";
import type { ConfigError, MergeConfig, PartialMergeConfig } from "../types";
import { MergeConfigSchema, PartialMergeConfigSchema } from "../types";

// Get OS-specific paths using env-paths (follows XDG spec on Linux)
const paths = envPaths("md-anchor-merge", { suffix: "" });

/**
 * Get the OS-specific config directory
 * - Linux: $XDG_CONFIG_HOME/md-anchor-merge or ~/.config/md-anchor-merge
 * - macOS: ~/Library/Preferences/md-anchor-merge
 * - Windows: %APPDATA%\md-anchor-merge
 */
function getConfigDirectory(): string {
  return paths.config;
}

/**
 * Load default configuration with Zod validation
 */
export async function loadDefaultConfig(): Promise<MergeConfig> {
  return MergeConfigSchema.parse(defaultConfig);
}

/**
 * Load a partial configuration file with Zod validation
 * Throws if the file is not valid JSON or does not match the schema
 */
async function loadConfigFile(configPath: string): Promise<PartialMergeConfig> {
  const content = await readFile(configPath, "utf-8");
  const parsed: unknown = JSON.parse(content);
  return PartialMergeConfigSchema.parse(parsed);
}

/**
 * Load user configuration from OS-specific directory
 */
async function loadUserConfig(): Promise<PartialMergeConfig | null> {
  const userConfigPath = getUserConfigPath();

  if (!existsSync(userConfigPath)) {
    return null;
  }

  return loadConfigFile(userConfigPath);
}

/**
 * Deep merge a partial config over a complete one
 */
export function mergeConfig(
  base: MergeConfig,
  override: PartialMergeConfig,
): MergeConfig {
  return MergeConfigSchema.parse({
    markdown: { ...base.markdown, ...override.markdown },
    identity: { ...base.identity, ...override.identity },
    links: { ...base.links, ...override.links },
    assets: { ...base.assets, ...override.assets },
    output: { ...base.output, ...override.output },
    logging: { ...base.logging, ...override.logging },
  });
}

interface LoadConfigResult {
  config: MergeConfig;
  errors: ConfigError[];
}

/**
 * Load and merge configuration
 * Priority: custom path > user config > default config
 * A config file that fails to load or validate is skipped and reported
 */
export async function loadConfig(custom?: string): Promise<LoadConfigResult> {
  let config = await loadDefaultConfig();
  const errors: ConfigError[] = [];

  try {
    const userConfig = await loadUserConfig();
    if (userConfig) config = mergeConfig(config, userConfig);
  } catch (error) {
    errors.push({ path: getUserConfigPath(), error });
  }

  if (custom) {
    try {
      const customConfig = await loadConfigFile(custom);
      config = mergeConfig(config, customConfig);
    } catch (error) {
      errors.push({ path: custom, error });
    }
  }

  return { config, errors };
}

/**
 * Get the path where user config should be stored
 */
export function getUserConfigPath(): string {
  return join(getConfigDirectory(), "config.json");
}
