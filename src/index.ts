/**
 * release-steward: keeps a repository's git tags, GitHub releases and the
 * params repo's deployed tag in step.
 *
 * @packageDocumentation
 */

export { VERSION } from "./version.js";

// Coordinator
export { ReleaseCoordinator, type CoordinatorDeps } from "./coordinator/coordinator.js";
export type {
  Confirm,
  CreateOptions,
  DeleteOptions,
  OperationName,
  OperationReport,
  OperationStage,
  OperationStatus,
  ParamsStore,
  ParamsUpdate,
  PipelineSetter,
  PlanStep,
  PromoteOptions,
  Release,
  ReleaseHistory,
  ReleaseHistoryEntry,
  ReleaseRegistry,
  RepoTarget,
  RollbackOptions,
  SetPipelineRequest,
  TagStore,
} from "./coordinator/types.js";

// Clients
export { GitTagClient, parseGitHubRemote } from "./git/tags.js";
export { ReleaseRegistryClient } from "./github/releases.js";
export { ParamsRepoUpdater } from "./params/updater.js";
export { FlyPipelineSetter } from "./concourse/pipeline.js";
export { VersionResolver, type BumpKind } from "./versioning/resolver.js";

// Wiring and configuration
export { createReleaseContext, createCoordinator, type ReleaseContext } from "./context.js";
export { loadConfig } from "./config/loader.js";
export { resolveRepoTarget } from "./config/workspace.js";
export { createDefaultConfig, type StewardConfig } from "./config/schema.js";

// Utilities
export { RetryPolicy, type RetryConfig } from "./utils/retry.js";
export { createLogger, createSilentLogger, type StewardLogger } from "./utils/logger.js";
export {
  StewardError,
  NotFoundError,
  ConflictError,
  UnauthorizedError,
  RateLimitedError,
  TransientError,
  RemoteUnreachableError,
  InvalidInputError,
  PartialFailureError,
  ConfigError,
  formatError,
  type ErrorKind,
} from "./utils/errors.js";
