/**
 * Release lifecycle coordinator
 *
 * Drives the tag, the GitHub release and the params reference through
 * create / delete / rollback / promote. Mutations always run in the order
 * tag → release → params → pipeline, so an interrupted run stops in one of
 * the partial states reported by PartialFailureError.
 */

import path from "node:path";
import { InvalidInputError, PartialFailureError, toError } from "../utils/errors.js";
import { createChildLogger, logEvent, logTiming, type StewardLogger } from "../utils/logger.js";
import { isOk, tolerate } from "../utils/result.js";
import { pipelineNotSet } from "../concourse/pipeline.js";
import type { BumpKind, VersionResolver } from "../versioning/resolver.js";
import { OperationTracker } from "./tracker.js";
import type {
  Confirm,
  CreateOptions,
  DeleteOptions,
  OperationName,
  OperationReport,
  ParamsStore,
  PipelineSetter,
  PromoteOptions,
  Release,
  ReleaseHistory,
  ReleaseRegistry,
  RepoTarget,
  RollbackOptions,
  TagStore,
} from "./types.js";

export interface CoordinatorDeps {
  tags: TagStore;
  releases: ReleaseRegistry;
  params: ParamsStore;
  resolver: VersionResolver;
  logger: StewardLogger;
  confirm: Confirm;
  pipeline?: PipelineSetter;
  /** Pipeline definition relative to the repository clone */
  pipelineConfig?: string;
  defaultBump?: BumpKind;
  dryRun?: boolean;
  /** CLI name used in remediation hints */
  commandName?: string;
}

function shortSha(commit: string): string {
  return commit.slice(0, 7);
}

export class ReleaseCoordinator {
  private readonly tags: TagStore;
  private readonly releases: ReleaseRegistry;
  private readonly params: ParamsStore;
  private readonly resolver: VersionResolver;
  private readonly logger: StewardLogger;
  private readonly confirm: Confirm;
  private readonly pipeline?: PipelineSetter;
  private readonly pipelineConfig: string;
  private readonly defaultBump: BumpKind;
  private readonly dryRun: boolean;
  private readonly commandName: string;

  constructor(deps: CoordinatorDeps) {
    this.tags = deps.tags;
    this.releases = deps.releases;
    this.params = deps.params;
    this.resolver = deps.resolver;
    this.logger = createChildLogger(deps.logger, "coordinator");
    this.confirm = deps.confirm;
    this.pipeline = deps.pipeline;
    this.pipelineConfig = deps.pipelineConfig ?? "ci/pipeline.yml";
    this.defaultBump = deps.defaultBump ?? "patch";
    this.dryRun = deps.dryRun ?? false;
    this.commandName = deps.commandName ?? "steward";
  }

  /**
   * Tag HEAD with the next version, publish a release for it and point the
   * params repo at it.
   */
  async create(target: RepoTarget, options: CreateOptions = {}): Promise<OperationReport> {
    const run = this.begin("create", target);
    const { repo, owner, repoPath } = target;

    run.enter("resolving");
    await this.tags.fetchTags(repoPath);
    const tags = await this.orderedTags(target, run);
    const tag = this.resolver.next(tags, options.bump ?? this.defaultBump);
    const commit = options.commit ?? (await this.tags.headCommit(repoPath));
    const body = options.body ?? `Release ${tag}`;
    run.tag = tag;

    if (
      options.interactive &&
      !this.dryRun &&
      !(await this.confirm(`Create ${tag} at ${shortSha(commit)} for ${owner}/${repo} and point params at it?`))
    ) {
      return run.finish("cancelled");
    }

    run.enter("mutating-tag");
    await this.mutate(run, `create tag ${tag} at ${shortSha(commit)}`, () =>
      this.tags.createTag(repoPath, tag, { commit, message: body }),
    );
    try {
      await this.mutate(run, `push tag ${tag}`, () => this.tags.pushTag(repoPath, tag));
    } catch (error) {
      run.enter("compensating");
      await this.dropUnpushedTag(run, repoPath, tag);
      throw error;
    }

    run.enter("mutating-release");
    try {
      await this.mutate(run, `create release ${tag} in ${owner}/${repo}`, () =>
        this.releases.createRelease(owner, repo, tag, commit, body),
      );
    } catch (error) {
      run.enter("compensating");
      throw new PartialFailureError("PartialCreate: tag pushed, release creation failed", {
        stage: "mutating-release",
        system: "github",
        remediation:
          `Tag ${tag} exists without a release. Run '${this.commandName} delete ${repo} --tag ${tag} ` +
          `--owner ${owner} --non-interactive' to remove it, then re-run '${this.commandName} create ${repo}'`,
        context: { repo, owner, tag },
        cause: toError(error),
      });
    }

    run.enter("mutating-params");
    try {
      await this.updateParams(run, target, tag);
    } catch (error) {
      run.enter("compensating");
      throw new PartialFailureError("PartialCreate: release created, params not updated", {
        stage: "mutating-params",
        system: "params",
        remediation:
          `Release ${tag} is published but not deployed. Run '${this.commandName} promote ${repo} ` +
          `--tag ${tag} --owner ${owner}' once the params repo is reachable`,
        context: { repo, owner, tag, key: target.paramsKey },
        cause: toError(error),
      });
    }

    await this.setPipeline(run, target, tag, options.foundation);
    return this.complete(run);
  }

  /**
   * Remove a release and, unless kept, its tag. Absent pieces are tolerated,
   * so repeating a delete is harmless.
   */
  async delete(target: RepoTarget, tag: string, options: DeleteOptions = {}): Promise<OperationReport> {
    const { keepGitTag = false, interactive = true } = options;
    const run = this.begin("delete", target);
    const { repo, owner, repoPath } = target;
    run.tag = tag;

    run.enter("resolving");
    this.resolver.parse(tag);

    if (interactive && !this.dryRun) {
      const what = keepGitTag ? `the GitHub release ${tag}` : `the GitHub release and git tag ${tag}`;
      if (!(await this.confirm(`Delete ${what} from ${owner}/${repo}?`))) {
        return run.finish("cancelled");
      }
    }

    run.enter("mutating-release");
    if (this.dryRun) {
      const releases = await this.releases.listReleases(owner, repo);
      if (releases.some((r) => r.tag === tag)) {
        run.step(`delete release ${tag} from ${owner}/${repo}`, false);
      } else {
        run.note(`No release is bound to ${tag}; nothing to delete`);
      }
    } else {
      const deleted = await tolerate(
        () => logTiming(this.logger, "delete release", () => this.releases.deleteRelease(owner, repo, tag)),
        ["RELEASE_NOT_FOUND"],
      );
      if (isOk(deleted)) {
        run.step(`deleted release ${tag} from ${owner}/${repo}`, true);
      } else {
        run.note(`Release ${tag} already absent: ${deleted.error.message}`);
      }
    }

    if (keepGitTag) {
      run.note(`Keeping git tag ${tag}`);
      return this.complete(run);
    }

    run.enter("mutating-tag");
    if (this.dryRun) {
      const tags = await this.tags.listTags(repoPath);
      if (tags.includes(tag)) {
        run.step(`delete tag ${tag} locally and on the remote`, false);
      } else {
        run.note(`Tag ${tag} is not in the local clone; the remote copy would be removed if present`);
      }
    } else {
      const deleted = await tolerate(
        () => logTiming(this.logger, "delete tag", () => this.tags.deleteTag(repoPath, tag)),
        ["TAG_NOT_FOUND"],
      );
      if (isOk(deleted)) {
        const where = [deleted.value.local ? "locally" : "", deleted.value.remote ? "on the remote" : ""]
          .filter(Boolean)
          .join(" and ");
        run.step(`deleted tag ${tag} ${where}`, true);
      } else {
        run.note(`Tag ${tag} already absent: ${deleted.error.message}`);
      }
    }

    return this.complete(run);
  }

  /**
   * Point params back at an earlier released tag. Without an explicit tag,
   * the target is the predecessor of what params currently holds.
   */
  async rollback(target: RepoTarget, options: RollbackOptions = {}): Promise<OperationReport> {
    const run = this.begin("rollback", target);
    const { repo, owner, repoPath } = target;

    run.enter("resolving");
    await this.tags.fetchTags(repoPath);
    const tags = await this.orderedTags(target, run);
    const releases = await this.releases.listReleases(owner, repo);
    const released = new Set(releases.map((r) => r.tag));

    let rollbackTag: string;
    if (options.tag !== undefined) {
      rollbackTag = options.tag;
      if (!tags.includes(rollbackTag)) {
        throw this.invalidRollbackTarget(`${rollbackTag} is not a release tag of ${owner}/${repo}`, rollbackTag);
      }
    } else {
      const current = await this.params.getReleaseTag(target.paramsRepoPath, target.paramsKey);
      if (current === undefined) {
        throw this.invalidRollbackTarget(
          `The params repo has no value for ${target.paramsKey}; pass --tag explicitly`,
          undefined,
        );
      }
      rollbackTag = tags.includes(current)
        ? this.resolver.predecessor(tags, current)
        : this.releaseBefore(run, releases, current);
    }

    if (!released.has(rollbackTag)) {
      throw this.invalidRollbackTarget(`${rollbackTag} has no GitHub release in ${owner}/${repo}`, rollbackTag);
    }
    run.tag = rollbackTag;

    if (
      options.interactive &&
      !this.dryRun &&
      !(await this.confirm(`Point ${target.paramsKey} at ${rollbackTag}?`))
    ) {
      return run.finish("cancelled");
    }

    run.enter("mutating-params");
    await this.updateParams(run, target, rollbackTag);
    await this.setPipeline(run, target, rollbackTag, options.foundation);
    return this.complete(run);
  }

  /**
   * Point params at a released tag (default: the latest released one)
   */
  async promote(target: RepoTarget, options: PromoteOptions = {}): Promise<OperationReport> {
    const run = this.begin("promote", target);
    const { repo, owner, repoPath } = target;

    run.enter("resolving");
    await this.tags.fetchTags(repoPath);
    const tags = await this.orderedTags(target, run);
    const releases = await this.releases.listReleases(owner, repo);
    const released = new Set(releases.map((r) => r.tag));

    const candidate = options.tag ?? this.resolver.latest(tags.filter((t) => released.has(t)));
    if (candidate === undefined) {
      throw new InvalidInputError(`${owner}/${repo} has no released tags to promote`, {
        code: "UNRELEASED_TAG",
        context: { repo, owner },
      });
    }
    if (!tags.includes(candidate) || !released.has(candidate)) {
      throw new InvalidInputError(`${candidate} is not a released tag of ${owner}/${repo}`, {
        code: "UNRELEASED_TAG",
        context: { repo, owner, tag: candidate },
      });
    }
    run.tag = candidate;

    if (
      options.interactive &&
      !this.dryRun &&
      !(await this.confirm(`Point ${target.paramsKey} at ${candidate}?`))
    ) {
      return run.finish("cancelled");
    }

    run.enter("mutating-params");
    await this.updateParams(run, target, candidate);
    await this.setPipeline(run, target, candidate, options.foundation);
    return this.complete(run);
  }

  /**
   * Derived release history: ordered tags, which are released, which is live
   */
  async status(target: RepoTarget): Promise<ReleaseHistory> {
    await this.tags.fetchTags(target.repoPath);
    const { ordered, malformed } = this.resolver.order(await this.tags.listTags(target.repoPath));
    const releases = await this.releases.listReleases(target.owner, target.repo);
    const released = new Set(releases.map((r) => r.tag));
    const currentTag = await this.params.getReleaseTag(target.paramsRepoPath, target.paramsKey);

    return {
      repo: target.repo,
      owner: target.owner,
      entries: ordered.map((tag) => ({ tag, released: released.has(tag), current: tag === currentTag })),
      currentTag,
      malformedTags: malformed,
    };
  }

  private begin(operation: OperationName, target: RepoTarget): OperationTracker {
    return new OperationTracker(operation, target.repo, this.dryRun, this.logger);
  }

  private complete(run: OperationTracker): OperationReport {
    const report = run.finish();
    logEvent(this.logger, `${report.operation}.${report.status}`, {
      repo: report.repo,
      tag: report.tag,
      dryRun: report.dryRun,
    });
    return report;
  }

  private async orderedTags(target: RepoTarget, run: OperationTracker): Promise<string[]> {
    const { ordered, malformed } = this.resolver.order(await this.tags.listTags(target.repoPath));
    if (malformed.length > 0) {
      this.logger.warn(`Ignoring tags that are not release versions: ${malformed.join(", ")}`);
      run.setMalformed(malformed);
    }
    return ordered;
  }

  /**
   * Run a mutating call, or only record it in dry-run mode
   */
  private async mutate(run: OperationTracker, action: string, fn: () => Promise<unknown>): Promise<void> {
    if (this.dryRun) {
      run.step(action, false);
      return;
    }
    await logTiming(this.logger, action, fn);
    run.step(action, true);
  }

  private async updateParams(run: OperationTracker, target: RepoTarget, tag: string): Promise<void> {
    const { paramsKey, paramsRepoPath, repo } = target;

    if (this.dryRun) {
      const current = await this.params.getReleaseTag(paramsRepoPath, paramsKey);
      if (current === tag) {
        run.note(`${paramsKey} already points at ${tag}; params would not change`);
      } else {
        run.step(`set ${paramsKey} from ${current ?? "(unset)"} to ${tag} in the params repo`, false);
      }
      return;
    }

    const update = await logTiming(this.logger, "update params", () =>
      this.params.setReleaseTag(paramsRepoPath, paramsKey, tag, { repo }),
    );
    if (update.changed) {
      run.step(`set ${paramsKey} from ${update.previous ?? "(unset)"} to ${tag} in the params repo`, true);
    } else {
      run.note(`${paramsKey} already points at ${tag}; params unchanged`);
    }
  }

  private async setPipeline(
    run: OperationTracker,
    target: RepoTarget,
    tag: string,
    foundation: string | undefined,
  ): Promise<void> {
    if (!foundation || !this.pipeline) return;

    const request = {
      target: foundation,
      pipeline: `${target.repo}-${foundation}`,
      configPath: path.join(target.repoPath, this.pipelineConfig),
      vars: { release_tag: tag },
    };
    const command = this.pipeline.describe(request);
    const pipeline = this.pipeline;

    run.enter("mutating-pipeline");
    try {
      await this.mutate(run, `run ${command}`, () => pipeline.setPipeline(request));
    } catch (error) {
      run.enter("compensating");
      throw pipelineNotSet(command, error);
    }
  }

  /**
   * The remote refused the tag, so only the local copy exists; remove it so
   * a retry starts clean.
   */
  private async dropUnpushedTag(run: OperationTracker, repoPath: string, tag: string): Promise<void> {
    if (this.dryRun) return;
    try {
      await this.tags.deleteTag(repoPath, tag, { local: true, remote: false });
      run.step(`removed unpushed local tag ${tag}`, true);
    } catch (error) {
      this.logger.error(`Could not remove local tag ${tag}; delete it with 'git tag -d ${tag}'`, error);
    }
  }

  /**
   * Params holds a tag the tag list does not know (manual edit or a tag
   * deleted elsewhere): fall back to release history, newest first.
   */
  private releaseBefore(run: OperationTracker, releases: Release[], current: string): string {
    run.note(`Params tag ${current} is not in the tag list; using release history to find its predecessor`);
    const index = releases.findIndex((r) => r.tag === current);
    const previous = index === -1 ? undefined : releases[index + 1];
    if (!previous) {
      throw new InvalidInputError(`No release precedes ${current}`, {
        code: "NO_PREDECESSOR",
        context: { tag: current },
      });
    }
    return previous.tag;
  }

  private invalidRollbackTarget(message: string, tag: string | undefined): InvalidInputError {
    return new InvalidInputError(message, {
      code: "INVALID_ROLLBACK_TARGET",
      context: { tag },
    });
  }
}
