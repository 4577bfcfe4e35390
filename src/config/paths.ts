/**
 * Centralized configuration paths
 *
 * User-level configuration is stored in ~/.steward/
 */

import { homedir } from "node:os";
import { join } from "node:path";

/**
 * Base directory for user configuration
 */
export const STEWARD_HOME = join(homedir(), ".steward");

export const CONFIG_PATHS = {
  /** Base directory: ~/.steward/ */
  home: STEWARD_HOME,

  /** Global config file: ~/.steward/config.json */
  config: join(STEWARD_HOME, "config.json"),

  /** Logs directory: ~/.steward/logs/ */
  logs: join(STEWARD_HOME, "logs"),
} as const;

/**
 * Project-level config, relative to the working directory
 */
export const PROJECT_CONFIG_RELATIVE = join(".steward", "config.json");

/**
 * Default base directory of local clones
 */
export const DEFAULT_GIT_DIR = join(homedir(), "git");
