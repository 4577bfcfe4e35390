/**
 * Annotated tag operations on a local clone, through simple-git
 */

import { simpleGit, type SimpleGit } from "simple-git";
import { ConflictError, NotFoundError, toError } from "../utils/errors.js";
import { createChildLogger, type StewardLogger } from "../utils/logger.js";
import type { RetryPolicy } from "../utils/retry.js";
import type {
  CreateTagOptions,
  CreatedTag,
  DeleteTagOptions,
  DeletedTag,
  TagStore,
} from "../coordinator/types.js";
import { toGitError } from "./errors.js";

export interface GitClientOptions {
  remote: string;
  /** Per-attempt timeout for a single git process */
  timeoutMs: number;
  retry: RetryPolicy;
  logger: StewardLogger;
}

/**
 * Open a working tree. simple-git throws synchronously when the directory
 * does not exist; both that and a non-repository directory are RepoNotFound.
 */
export async function openRepository(repoPath: string, timeoutMs: number): Promise<SimpleGit> {
  let git: SimpleGit;
  try {
    git = simpleGit({ baseDir: repoPath, timeout: { block: timeoutMs } });
  } catch (error) {
    throw repoNotFound(repoPath, toError(error));
  }

  let isRepo: boolean;
  try {
    isRepo = await git.checkIsRepo();
  } catch (error) {
    throw repoNotFound(repoPath, toError(error));
  }
  if (!isRepo) {
    throw repoNotFound(repoPath);
  }
  return git;
}

function repoNotFound(repoPath: string, cause?: Error): NotFoundError {
  return new NotFoundError(`${repoPath} is not a git working tree`, {
    code: "REPO_NOT_FOUND",
    system: "workspace",
    context: { repoPath },
    cause,
  });
}

/**
 * Parse the owner from a GitHub remote URL (SSH or HTTPS)
 */
export function parseGitHubRemote(url: string): { owner: string; repo: string } | undefined {
  const match = url.match(/github\.com[:/]([^/]+)\/([^/]+?)(?:\.git)?\/?$/);
  if (!match || !match[1] || !match[2]) return undefined;
  return { owner: match[1], repo: match[2] };
}

export class GitTagClient implements TagStore {
  private readonly remote: string;
  private readonly timeoutMs: number;
  private readonly retry: RetryPolicy;
  private readonly logger: StewardLogger;

  constructor(options: GitClientOptions) {
    this.remote = options.remote;
    this.timeoutMs = options.timeoutMs;
    this.logger = createChildLogger(options.logger, "git");
    this.retry = options.retry.withLogger(this.logger);
  }

  async listTags(repoPath: string): Promise<string[]> {
    const git = await openRepository(repoPath, this.timeoutMs);
    const result = await git.tags();
    return result.all;
  }

  async fetchTags(repoPath: string): Promise<void> {
    const git = await openRepository(repoPath, this.timeoutMs);
    // adds remote tags only; local-only tags are left for their owner to push or delete
    await this.network("fetch --tags", () => git.raw(["fetch", this.remote, "--tags"]));
  }

  async headCommit(repoPath: string): Promise<string> {
    const git = await openRepository(repoPath, this.timeoutMs);
    return (await git.revparse(["HEAD"])).trim();
  }

  async createTag(repoPath: string, tag: string, options: CreateTagOptions): Promise<CreatedTag> {
    const git = await openRepository(repoPath, this.timeoutMs);

    const local = await git.tags();
    if (local.all.includes(tag)) {
      throw new ConflictError(`Tag ${tag} already exists locally`, {
        code: "TAG_ALREADY_EXISTS",
        system: "git",
        context: { tag, repoPath },
      });
    }
    if (await this.remoteHasTag(git, tag)) {
      throw new ConflictError(`Tag ${tag} already exists on ${this.remote}`, {
        code: "TAG_ALREADY_EXISTS",
        system: "git",
        context: { tag, remote: this.remote },
      });
    }

    const target = options.commit ?? "HEAD";
    await git.raw(["tag", "-a", tag, "-m", options.message, target]);
    const commit = (await git.revparse([`${tag}^{commit}`])).trim();

    this.logger.debug(`Created tag ${tag} at ${commit}`);
    return { tag, commit };
  }

  async pushTag(repoPath: string, tag: string): Promise<void> {
    const git = await openRepository(repoPath, this.timeoutMs);
    await this.network(`push ${tag}`, () => git.raw(["push", this.remote, `refs/tags/${tag}`]), tag);
  }

  async deleteTag(
    repoPath: string,
    tag: string,
    options: DeleteTagOptions = {},
  ): Promise<DeletedTag> {
    const { local = true, remote = true } = options;
    const git = await openRepository(repoPath, this.timeoutMs);

    const localExists = local && (await git.tags()).all.includes(tag);
    const remoteExists = remote && (await this.remoteHasTag(git, tag));

    if (!localExists && !remoteExists) {
      throw new NotFoundError(`Tag ${tag} not found`, {
        code: "TAG_NOT_FOUND",
        system: "git",
        context: { tag, local, remote },
      });
    }

    if (localExists) {
      await git.raw(["tag", "-d", tag]);
    }
    if (remoteExists) {
      await this.network(`delete remote ${tag}`, () =>
        git.raw(["push", this.remote, `:refs/tags/${tag}`]),
      );
    }

    return { local: localExists, remote: remoteExists };
  }

  /**
   * Owner from the origin remote URL
   */
  async remoteOwner(repoPath: string): Promise<string | undefined> {
    const git = await openRepository(repoPath, this.timeoutMs);
    const remotes = await git.getRemotes(true);
    const origin = remotes.find((r) => r.name === this.remote);
    if (!origin) return undefined;
    return parseGitHubRemote(origin.refs.fetch)?.owner;
  }

  private async remoteHasTag(git: SimpleGit, tag: string): Promise<boolean> {
    const output = await this.network(`ls-remote ${tag}`, () =>
      git.listRemote(["--tags", this.remote, `refs/tags/${tag}`]),
    );
    return output.trim().length > 0;
  }

  private network<T>(operation: string, fn: () => Promise<T>, ref?: string): Promise<T> {
    return this.retry.execute(
      async () => {
        try {
          return await fn();
        } catch (error) {
          throw toGitError(error, operation, ref);
        }
      },
      { operation: `git ${operation}`, system: "git" },
    );
  }
}
