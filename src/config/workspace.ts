/**
 * Local clone layout: <gitDir>/<repo>[-<owner>]
 */

import fs from "node:fs/promises";
import path from "node:path";
import { InvalidInputError, NotFoundError, toError } from "../utils/errors.js";
import { paramsKeyFor } from "../params/document.js";
import type { RepoTarget } from "../coordinator/types.js";
import { DEFAULT_GIT_DIR } from "./paths.js";
import type { StewardConfig } from "./schema.js";

export interface ResolveTargetOptions {
  owner?: string;
  paramsRepo?: string;
  workspace?: string;
  /** Reads the owner from the clone when neither flag nor config names one */
  detectOwner?: (repoPath: string) => Promise<string | undefined>;
}

/**
 * Directory name of a clone. Clones of a non-default owner carry a
 * "-<owner>" suffix, added once.
 */
export function cloneDirName(name: string, owner: string | undefined, defaultOwner?: string): string {
  if (!owner || owner === defaultOwner) return name;
  const suffix = `-${owner}`;
  return name.endsWith(suffix) ? name : `${name}${suffix}`;
}

export function workspaceDir(config: StewardConfig, override?: string): string {
  return override ?? config.workspace.gitDir ?? DEFAULT_GIT_DIR;
}

async function requireDirectory(dir: string, what: string): Promise<void> {
  const stat = await fs.stat(dir).catch((error: unknown) => {
    throw new NotFoundError(`${what} not found at ${dir}`, {
      code: "REPO_NOT_FOUND",
      system: "workspace",
      context: { dir },
      cause: toError(error),
    });
  });
  if (!stat.isDirectory()) {
    throw new NotFoundError(`${what} at ${dir} is not a directory`, {
      code: "REPO_NOT_FOUND",
      system: "workspace",
      context: { dir },
    });
  }
}

/**
 * Resolve where a repository and its params repo live, and who owns it
 */
export async function resolveRepoTarget(
  config: StewardConfig,
  repo: string,
  options: ResolveTargetOptions = {},
): Promise<RepoTarget> {
  if (repo.trim().length === 0 || repo.includes("/")) {
    throw new InvalidInputError(`'${repo}' is not a repository name`, {
      code: "INVALID_ARGUMENT",
      context: { repo },
      suggestion: "Pass the bare repository name and the owner with --owner",
    });
  }

  const baseDir = workspaceDir(config, options.workspace);
  const flagOwner = options.owner ?? config.github.owner;
  const defaultOwner = config.workspace.defaultOwner;

  const repoPath = path.join(baseDir, cloneDirName(repo, flagOwner, defaultOwner));
  await requireDirectory(repoPath, `Clone of ${repo}`);

  const owner = flagOwner ?? (await options.detectOwner?.(repoPath));
  if (!owner) {
    throw new InvalidInputError(`Cannot tell who owns ${repo}`, {
      code: "INVALID_ARGUMENT",
      context: { repo, repoPath },
      suggestion: "Pass --owner or set github.owner in the configuration",
    });
  }

  const paramsName = options.paramsRepo ?? config.params.repo;
  const paramsRepoPath = path.join(baseDir, cloneDirName(paramsName, flagOwner, defaultOwner));
  await requireDirectory(paramsRepoPath, `Params repository ${paramsName}`);

  return {
    repo,
    owner,
    repoPath,
    paramsRepoPath,
    paramsKey: paramsKeyFor(config.params.keyTemplate, repo),
  };
}
