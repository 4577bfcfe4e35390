/**
 * Points one repository's key in the params repo at a release tag
 */

import fs from "node:fs/promises";
import path from "node:path";
import type { SimpleGit } from "simple-git";
import { ConflictError, NotFoundError, toError } from "../utils/errors.js";
import { createChildLogger, type StewardLogger } from "../utils/logger.js";
import type { RetryPolicy } from "../utils/retry.js";
import type { ParamsStore, ParamsUpdate } from "../coordinator/types.js";
import { classifyGitFailure, toGitError } from "../git/errors.js";
import { openRepository } from "../git/tags.js";
import { patchParamValue, readParamValue } from "./document.js";

export interface ParamsUpdaterOptions {
  /** File inside the params repo, relative to its root */
  file: string;
  remote: string;
  /** Branch to pull and push; the checked-out branch when unset */
  branch?: string;
  timeoutMs: number;
  retry: RetryPolicy;
  logger: StewardLogger;
}

export function paramsCommitMessage(repo: string, tag: string): string {
  return `Update ${repo} release tag to ${tag}`;
}

export class ParamsRepoUpdater implements ParamsStore {
  private readonly file: string;
  private readonly remote: string;
  private readonly branch?: string;
  private readonly timeoutMs: number;
  private readonly retry: RetryPolicy;
  private readonly logger: StewardLogger;

  constructor(options: ParamsUpdaterOptions) {
    this.file = options.file;
    this.remote = options.remote;
    this.branch = options.branch;
    this.timeoutMs = options.timeoutMs;
    this.logger = createChildLogger(options.logger, "params");
    this.retry = options.retry.withLogger(this.logger);
  }

  async getReleaseTag(paramsRepoPath: string, repoKey: string): Promise<string | undefined> {
    const content = await this.readFile(paramsRepoPath);
    if (content === undefined) return undefined;
    return readParamValue(content, repoKey, this.file);
  }

  async setReleaseTag(
    paramsRepoPath: string,
    repoKey: string,
    tag: string,
    options: { repo: string },
  ): Promise<ParamsUpdate> {
    const git = await openRepository(paramsRepoPath, this.timeoutMs);

    return this.withCheckout(git, paramsRepoPath, async (branch) => {
      await this.sync(git, branch);
      const first = await this.commitPatch(git, paramsRepoPath, repoKey, tag, options.repo);
      if (!first.changed) return first;

      try {
        await this.push(git, branch);
        return first;
      } catch (error) {
        if (classifyGitFailure(error) !== "rejected") throw error;
      }

      this.logger.warn(`Push to ${this.remote}/${branch} rejected; re-applying ${repoKey} on fresh content`);
      await git.reset(["--hard", "HEAD~1"]);
      await this.sync(git, branch);

      const second = await this.commitPatch(git, paramsRepoPath, repoKey, tag, options.repo);
      if (!second.changed) return second;

      try {
        await this.push(git, branch);
      } catch (error) {
        if (classifyGitFailure(error) === "rejected") {
          throw new ConflictError(`The params repo moved again while updating ${repoKey}`, {
            code: "PARAMS_UPDATE_CONFLICT",
            system: "params",
            context: { key: repoKey, tag, branch },
            cause: toError(error),
          });
        }
        throw error;
      }
      return second;
    });
  }

  /**
   * Scoped acquisition of the params tree: refuse local edits, and on any
   * failure reset to the commit the tree had when we started.
   */
  private async withCheckout<T>(
    git: SimpleGit,
    paramsRepoPath: string,
    fn: (branch: string) => Promise<T>,
  ): Promise<T> {
    const status = await git.status();
    if (!status.isClean()) {
      throw new ConflictError(`${paramsRepoPath} has uncommitted changes`, {
        code: "DIRTY_WORKTREE",
        system: "params",
        context: { paramsRepoPath },
      });
    }

    const start = (await git.revparse(["HEAD"])).trim();
    const branch = this.branch ?? (await git.revparse(["--abbrev-ref", "HEAD"])).trim();

    try {
      return await fn(branch);
    } catch (error) {
      try {
        await git.reset(["--hard", start]);
      } catch (resetError) {
        this.logger.error(`Could not restore ${paramsRepoPath} to ${start}`, resetError);
      }
      throw error;
    }
  }

  private async commitPatch(
    git: SimpleGit,
    paramsRepoPath: string,
    repoKey: string,
    tag: string,
    repo: string,
  ): Promise<ParamsUpdate> {
    const content = (await this.readFile(paramsRepoPath)) ?? "";
    const patched = patchParamValue(content, repoKey, tag, this.file);

    if (!patched.changed) {
      this.logger.info(`${repoKey} already points at ${tag}`);
      return { key: repoKey, previous: patched.previous, next: tag, changed: false };
    }

    await fs.writeFile(path.join(paramsRepoPath, this.file), patched.content, "utf-8");
    await git.add([this.file]);
    await git.commit(paramsCommitMessage(repo, tag));
    const commit = (await git.revparse(["HEAD"])).trim();

    return { key: repoKey, previous: patched.previous, next: tag, changed: true, commit };
  }

  private async sync(git: SimpleGit, branch: string): Promise<void> {
    await this.network("fetch", () => git.raw(["fetch", this.remote]));
    await this.network("pull", () => git.raw(["pull", "--ff-only", this.remote, branch]));
  }

  private async push(git: SimpleGit, branch: string): Promise<void> {
    await this.network("push", () => git.raw(["push", this.remote, `HEAD:${branch}`]));
  }

  private network<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    return this.retry.execute(
      async () => {
        try {
          return await fn();
        } catch (error) {
          throw toGitError(error, operation);
        }
      },
      { operation: `params ${operation}`, system: "params" },
    );
  }

  private async readFile(paramsRepoPath: string): Promise<string | undefined> {
    const filePath = path.join(paramsRepoPath, this.file);
    try {
      return await fs.readFile(filePath, "utf-8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return undefined;
      }
      throw new NotFoundError(`Cannot read ${filePath}`, {
        code: "PARAMS_FILE_NOT_FOUND",
        system: "params",
        context: { filePath },
        cause: toError(error),
      });
    }
  }
}
