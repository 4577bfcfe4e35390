/**
 * Options and setup shared by every release command
 */

import type { Command } from "commander";
import * as p from "@clack/prompts";
import chalk from "chalk";
import { loadConfig } from "../config/loader.js";
import { resolveRepoTarget } from "../config/workspace.js";
import { createCoordinator, createReleaseContext, type ReleaseContext } from "../context.js";
import type { ReleaseCoordinator } from "../coordinator/coordinator.js";
import type { OperationReport, RepoTarget } from "../coordinator/types.js";
import { InvalidInputError } from "../utils/errors.js";
import { isLogLevel, LOG_LEVELS } from "../utils/logger.js";

export interface CommonOptions {
  owner?: string;
  paramsRepo?: string;
  workspace?: string;
  config?: string;
  dryRun?: boolean;
  nonInteractive?: boolean;
  logLevel?: string;
}

export interface CliSession {
  context: ReleaseContext;
  coordinator: ReleaseCoordinator;
  target: RepoTarget;
  interactive: boolean;
}

export function addCommonOptions(command: Command): Command {
  return command
    .option("-o, --owner <owner>", "GitHub owner of the repository")
    .option("-p, --params-repo <name>", "Params repository name")
    .option("-w, --workspace <dir>", "Directory holding the local clones (default: $GIT_WORKSPACE or ~/git)")
    .option("--config <path>", "Configuration file")
    .option("--dry-run", "Show what would change without changing anything")
    .option("-n, --non-interactive", "Never ask for confirmation")
    .option("--log-level <level>", `Log level (${LOG_LEVELS.join(", ")})`);
}

/**
 * Ask on the terminal; Ctrl+C counts as "no"
 */
export async function promptConfirm(message: string): Promise<boolean> {
  const answer = await p.confirm({ message, initialValue: false });
  if (p.isCancel(answer)) return false;
  return answer;
}

/**
 * Load configuration, build the clients and locate the repository
 */
export async function openSession(repo: string, options: CommonOptions): Promise<CliSession> {
  const loaded = await loadConfig({ configPath: options.config });

  let config = loaded;
  if (options.logLevel !== undefined) {
    const level = options.logLevel;
    if (!isLogLevel(level)) {
      throw new InvalidInputError(`Unknown log level '${level}'`, {
        code: "INVALID_ARGUMENT",
        context: { level },
        suggestion: `Use one of: ${LOG_LEVELS.join(", ")}`,
      });
    }
    config = { ...loaded, logging: { ...loaded.logging, level } };
  }

  const context = createReleaseContext(config);
  const target = await resolveRepoTarget(config, repo, {
    owner: options.owner,
    paramsRepo: options.paramsRepo,
    workspace: options.workspace,
    detectOwner: (repoPath) => context.tags.remoteOwner(repoPath),
  });

  return {
    context,
    target,
    interactive: !options.nonInteractive,
    coordinator: createCoordinator(context, { confirm: promptConfirm, dryRun: options.dryRun }),
  };
}

/**
 * Print the trace of an operation
 */
export function renderReport(report: OperationReport): void {
  const title = `${report.operation} ${report.repo}${report.tag ? ` ${report.tag}` : ""}`;

  if (report.status === "cancelled") {
    p.log.warning(`${title}: cancelled, nothing changed`);
    return;
  }

  for (const step of report.steps) {
    if (step.executed) {
      p.log.success(step.action);
    } else {
      p.log.step(chalk.dim(`would ${step.action}`));
    }
  }
  for (const note of report.notes) {
    p.log.info(note);
  }

  p.outro(
    report.status === "planned"
      ? chalk.yellow(`${title}: dry run, nothing changed`)
      : chalk.green(`${title}: done`),
  );
}
