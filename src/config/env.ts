/**
 * Environment configuration for release-steward
 *
 * Environment variables override file configuration:
 * - GIT_WORKSPACE: base directory of local clones
 * - STEWARD_LOG_LEVEL: log level
 * - STEWARD_LOG_TO_FILE: any value except "", 0, false, no, off enables file logs
 * - the token variable named by github.tokenEnv (GITHUB_TOKEN, falling back to GH_TOKEN)
 */

import { isLogLevel } from "../utils/logger.js";
import type { StewardConfig } from "./schema.js";

export type Env = Record<string, string | undefined>;

const FALSY = new Set(["", "0", "false", "no", "off"]);

export function isTruthyEnv(value: string | undefined): boolean {
  return value !== undefined && !FALSY.has(value.trim().toLowerCase());
}

/**
 * Bearer token for the GitHub API
 */
export function getGitHubToken(config: StewardConfig, env: Env = process.env): string | undefined {
  const fallback = config.github.tokenEnv === "GITHUB_TOKEN" ? env["GH_TOKEN"] : undefined;
  const token = env[config.github.tokenEnv] ?? fallback;
  return token && token.trim().length > 0 ? token.trim() : undefined;
}

/**
 * Apply environment overrides on top of file configuration
 */
export function applyEnvOverrides(config: StewardConfig, env: Env = process.env): StewardConfig {
  const level = env["STEWARD_LOG_LEVEL"];
  const logToFile = env["STEWARD_LOG_TO_FILE"];
  const gitDir = env["GIT_WORKSPACE"];

  return {
    ...config,
    workspace: {
      ...config.workspace,
      gitDir: gitDir && gitDir.length > 0 ? gitDir : config.workspace.gitDir,
    },
    logging: {
      ...config.logging,
      level: level && isLogLevel(level) ? level : config.logging.level,
      logToFile: logToFile === undefined ? config.logging.logToFile : isTruthyEnv(logToFile),
    },
  };
}
