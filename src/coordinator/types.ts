import type { BumpKind } from "../versioning/resolver.js";

/**
 * Tag operations against a local clone and its remote
 */
export interface TagStore {
  listTags(repoPath: string): Promise<string[]>;
  fetchTags(repoPath: string): Promise<void>;
  headCommit(repoPath: string): Promise<string>;
  createTag(repoPath: string, tag: string, options: CreateTagOptions): Promise<CreatedTag>;
  pushTag(repoPath: string, tag: string): Promise<void>;
  deleteTag(repoPath: string, tag: string, options?: DeleteTagOptions): Promise<DeletedTag>;
}

export interface CreateTagOptions {
  message: string;
  /** Defaults to HEAD */
  commit?: string;
}

export interface CreatedTag {
  tag: string;
  commit: string;
}

export interface DeleteTagOptions {
  local?: boolean;
  remote?: boolean;
}

/** Which copies of the tag were actually removed */
export interface DeletedTag {
  local: boolean;
  remote: boolean;
}

/**
 * A release object on the hosting service
 */
export interface Release {
  id: number;
  tag: string;
  name: string;
  body: string;
  draft: boolean;
  commit: string;
  createdAt: string;
  url?: string;
}

export interface ReleaseRegistry {
  createRelease(owner: string, repo: string, tag: string, commit: string, body: string): Promise<Release>;
  deleteRelease(owner: string, repo: string, tag: string): Promise<Release>;
  /** Newest first */
  listReleases(owner: string, repo: string): Promise<Release[]>;
}

export interface ParamsUpdate {
  key: string;
  previous: string | undefined;
  next: string;
  changed: boolean;
  commit?: string;
}

export interface ParamsStore {
  getReleaseTag(paramsRepoPath: string, repoKey: string): Promise<string | undefined>;
  setReleaseTag(
    paramsRepoPath: string,
    repoKey: string,
    tag: string,
    options: { repo: string },
  ): Promise<ParamsUpdate>;
}

/**
 * Single "set pipeline" call into the deployment system
 */
export interface PipelineSetter {
  describe(request: SetPipelineRequest): string;
  setPipeline(request: SetPipelineRequest): Promise<void>;
}

export interface SetPipelineRequest {
  target: string;
  pipeline: string;
  configPath: string;
  vars: Record<string, string>;
}

/** Ask the operator; resolves false when declined or cancelled */
export type Confirm = (message: string) => Promise<boolean>;

/**
 * Where one managed repository lives
 */
export interface RepoTarget {
  /** Repository name on the hosting service */
  repo: string;
  owner: string;
  repoPath: string;
  paramsRepoPath: string;
  /** Key inside the params file */
  paramsKey: string;
}

export type OperationName = "create" | "delete" | "rollback" | "promote";

export type OperationStage =
  | "resolving"
  | "mutating-tag"
  | "mutating-release"
  | "mutating-params"
  | "mutating-pipeline"
  | "compensating"
  | "done";

/**
 * One line of the execution trace. In dry-run mode every mutating step is
 * recorded with `executed: false`.
 */
export interface PlanStep {
  stage: OperationStage;
  action: string;
  executed: boolean;
}

export type OperationStatus = "completed" | "cancelled" | "planned";

export interface OperationReport {
  operation: OperationName;
  repo: string;
  dryRun: boolean;
  status: OperationStatus;
  /** Tag the operation acted on or resolved to */
  tag?: string;
  stages: OperationStage[];
  steps: PlanStep[];
  /** Tags skipped from ordering because they are not valid semver */
  malformedTags: string[];
  /** Tolerated conditions, e.g. a release that was already gone */
  notes: string[];
}

export interface CreateOptions {
  body?: string;
  bump?: BumpKind;
  commit?: string;
  foundation?: string;
  interactive?: boolean;
}

export interface DeleteOptions {
  keepGitTag?: boolean;
  interactive?: boolean;
}

export interface RollbackOptions {
  tag?: string;
  interactive?: boolean;
  foundation?: string;
}

export interface PromoteOptions {
  tag?: string;
  interactive?: boolean;
  foundation?: string;
}

export interface ReleaseHistoryEntry {
  tag: string;
  released: boolean;
  current: boolean;
}

export interface ReleaseHistory {
  repo: string;
  owner: string;
  /** Oldest first */
  entries: ReleaseHistoryEntry[];
  currentTag?: string;
  malformedTags: string[];
}
