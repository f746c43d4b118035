/**
 * Configuration Loader
 * Loads and merges configuration from defaults and user config
 */

import { readFile } from "fs/promises";
import { join, dirname } from "path";
import { existsSync } from "fs";
import { fileURLToPath } from "url";
import envPaths from "env-paths";
import {
  HigalFetchConfigSchema,
  PartialHigalFetchConfigSchema,
  type ConfigError,
  type HigalFetchConfig,
  type PartialHigalFetchConfig,
} from "../types/config";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Get OS-specific paths using env-paths (follows XDG spec on Linux)
const paths = envPaths("higal-fetch", { suffix: "" });

/**
 * Get the OS-specific config directory
 * - Linux: $XDG_CONFIG_HOME/higal-fetch or ~/.config/higal-fetch
 * - macOS: ~/Library/Preferences/higal-fetch
 * - Windows: %APPDATA%\higal-fetch
 */
function getConfigDirectory(): string {
  return paths.config;
}

/**
 * Load default configuration with Zod validation
 * An invalid default config is fatal
 */
export async function loadDefaultConfig(): Promise<HigalFetchConfig> {
  const defaultConfigPath = join(__dirname, "..", "config", "default.json");
  const content = await readFile(defaultConfigPath, "utf-8");
  return HigalFetchConfigSchema.parse(JSON.parse(content));
}

/**
 * Load and validate a partial configuration file
 * Throws error if config is invalid
 */
async function loadPartialConfig(
  configPath: string,
): Promise<PartialHigalFetchConfig> {
  const content = await readFile(configPath, "utf-8");
  return PartialHigalFetchConfigSchema.parse(JSON.parse(content));
}

/**
 * Deep merge two configs
 * The band catalog is replaced as a whole, so a user can narrow it
 */
export function mergeConfig(
  base: HigalFetchConfig,
  override: PartialHigalFetchConfig,
): HigalFetchConfig {
  return {
    service: { ...base.service, ...override.service },
    form: {
      ...base.form,
      ...override.form,
      frameControls: {
        ...base.form.frameControls,
        ...override.form?.frameControls,
      },
    },
    bands: override.bands ?? base.bands,
    timeouts: { ...base.timeouts, ...override.timeouts },
    download: { ...base.download, ...override.download },
    output: { ...base.output, ...override.output },
    browser: { ...base.browser, ...override.browser },
    logging: { ...base.logging, ...override.logging },
  };
}

interface LoadConfigResult {
  config: HigalFetchConfig;
  errors: ConfigError[];
}

/**
 * Load and merge configuration
 * Priority: custom path > user config > default config
 * Config files that fail to load or validate are skipped and reported
 */
export async function loadConfig(custom?: string): Promise<LoadConfigResult> {
  let config = await loadDefaultConfig();
  const errors: ConfigError[] = [];

  const userConfigPath = getUserConfigPath();
  if (existsSync(userConfigPath)) {
    try {
      config = mergeConfig(config, await loadPartialConfig(userConfigPath));
    } catch (error) {
      errors.push({ path: userConfigPath, error });
    }
  }

  if (custom) {
    try {
      config = mergeConfig(config, await loadPartialConfig(custom));
    } catch (error) {
      errors.push({ path: custom, error });
    }
  }

  return {
    config: { ...config, bands: Object.freeze({ ...config.bands }) },
    errors,
  };
}

/**
 * Get the path where user config should be stored
 */
export function getUserConfigPath(): string {
  return join(getConfigDirectory(), "config.json");
}
