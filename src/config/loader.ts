/**
 * Configuration loader for release-steward
 *
 * Supports hierarchical configuration with priority:
 * 1. Explicit config path (--config or STEWARD_CONFIG_PATH)
 * 2. Project config (<cwd>/.steward/config.json)
 * 3. Global config (~/.steward/config.json)
 * 4. Built-in defaults
 *
 * Environment variables are applied on top of the merged result.
 */

import fs from "node:fs/promises";
import path from "node:path";
import JSON5 from "json5";
import { StewardConfigSchema, type StewardConfig } from "./schema.js";
import { ConfigError, toError } from "../utils/errors.js";
import { CONFIG_PATHS, PROJECT_CONFIG_RELATIVE } from "./paths.js";
import { applyEnvOverrides, type Env } from "./env.js";

type RawConfig = Record<string, unknown>;

export interface LoadConfigOptions {
  configPath?: string;
  cwd?: string;
  env?: Env;
  /** Global config location, overridable for tests */
  globalConfigPath?: string;
}

function isRecord(value: unknown): value is RawConfig {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Load configuration with hierarchical fallback
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<StewardConfig> {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();

  let merged: RawConfig = {};

  const globalConfig = await loadConfigFile(options.globalConfigPath ?? CONFIG_PATHS.config);
  if (globalConfig) {
    merged = deepMergeConfig(merged, globalConfig);
  }

  const explicitPath = options.configPath ?? env["STEWARD_CONFIG_PATH"];
  const projectPath = explicitPath ?? path.join(cwd, PROJECT_CONFIG_RELATIVE);
  const projectConfig = await loadConfigFile(projectPath, { required: explicitPath !== undefined });
  if (projectConfig) {
    merged = deepMergeConfig(merged, projectConfig);
  }

  const result = StewardConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError("Invalid configuration", {
      issues: result.error.issues.map((i) => ({
        path: i.path.join("."),
        message: i.message,
      })),
      configPath: projectConfig ? projectPath : options.globalConfigPath ?? CONFIG_PATHS.config,
    });
  }

  return applyEnvOverrides(result.data, env);
}

/**
 * Load a single config file, returning null if not found
 */
export async function loadConfigFile(
  configPath: string,
  options: { required?: boolean } = {},
): Promise<RawConfig | null> {
  let content: string;
  try {
    content = await fs.readFile(configPath, "utf-8");
  } catch (error) {
    const cause = toError(error);
    if ("code" in cause && cause.code === "ENOENT" && !options.required) {
      return null;
    }
    throw new ConfigError(`Failed to read configuration file ${configPath}`, {
      configPath,
      cause,
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON5.parse(content);
  } catch (error) {
    throw new ConfigError(`Configuration file ${configPath} is not valid JSON5`, {
      configPath,
      cause: toError(error),
    });
  }

  if (!isRecord(parsed)) {
    throw new ConfigError("Invalid configuration: expected an object", { configPath });
  }
  return parsed;
}

/**
 * Merge section by section; a later file only overrides the keys it sets
 */
export function deepMergeConfig(base: RawConfig, override: RawConfig): RawConfig {
  const result: RawConfig = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const current = result[key];
    result[key] = isRecord(current) && isRecord(value) ? { ...current, ...value } : value;
  }
  return result;
}
