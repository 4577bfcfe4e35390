/**
 * Error handling for release-steward
 * Typed errors with kind, context and remediation information
 */

/**
 * Error taxonomy shared by every client and the coordinator
 */
export type ErrorKind =
  | "NotFound"
  | "Conflict"
  | "Unauthorized"
  | "RateLimited"
  | "Transient"
  | "InvalidInput"
  | "PartialFailure"
  | "Config";

/**
 * External system an error originated from
 */
export type ExternalSystem = "git" | "github" | "params" | "concourse" | "workspace";

/**
 * Base error class for release-steward
 */
export class StewardError extends Error {
  readonly code: string;
  readonly kind: ErrorKind;
  readonly context: Record<string, unknown>;
  readonly recoverable: boolean;
  readonly suggestion?: string;

  constructor(
    message: string,
    options: {
      code: string;
      kind: ErrorKind;
      context?: Record<string, unknown>;
      recoverable?: boolean;
      suggestion?: string;
      cause?: Error;
    },
  ) {
    super(message, { cause: options.cause });
    this.name = "StewardError";
    this.code = options.code;
    this.kind = options.kind;
    this.context = options.context ?? {};
    this.recoverable = options.recoverable ?? false;
    this.suggestion = options.suggestion;

    Error.captureStackTrace(this, StewardError);
  }

  /**
   * Convert to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      kind: this.kind,
      message: this.message,
      context: this.context,
      recoverable: this.recoverable,
      suggestion: this.suggestion,
      stack: this.stack,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    };
  }
}

/**
 * Tag, release, repository or params key is absent
 */
export class NotFoundError extends StewardError {
  readonly system: ExternalSystem;

  constructor(
    message: string,
    options: {
      code: "TAG_NOT_FOUND" | "RELEASE_NOT_FOUND" | "REPO_NOT_FOUND" | "PARAMS_FILE_NOT_FOUND";
      system: ExternalSystem;
      context?: Record<string, unknown>;
      suggestion?: string;
      cause?: Error;
    },
  ) {
    super(message, {
      code: options.code,
      kind: "NotFound",
      context: { system: options.system, ...options.context },
      suggestion: options.suggestion,
      cause: options.cause,
    });
    this.name = "NotFoundError";
    this.system = options.system;
  }
}

/**
 * Something already exists, or a concurrent edit won the race
 */
export class ConflictError extends StewardError {
  readonly system: ExternalSystem;

  constructor(
    message: string,
    options: {
      code: "TAG_ALREADY_EXISTS" | "RELEASE_ALREADY_EXISTS" | "PARAMS_UPDATE_CONFLICT" | "DIRTY_WORKTREE";
      system: ExternalSystem;
      context?: Record<string, unknown>;
      suggestion?: string;
      cause?: Error;
    },
  ) {
    super(message, {
      code: options.code,
      kind: "Conflict",
      context: { system: options.system, ...options.context },
      suggestion: options.suggestion,
      cause: options.cause,
    });
    this.name = "ConflictError";
    this.system = options.system;
  }
}

/**
 * Missing or rejected credential. Never retried.
 */
export class UnauthorizedError extends StewardError {
  readonly system: ExternalSystem;

  constructor(message: string, options: { system: ExternalSystem; statusCode?: number; cause?: Error }) {
    super(message, {
      code: "AUTH_ERROR",
      kind: "Unauthorized",
      context: { system: options.system, statusCode: options.statusCode },
      suggestion:
        options.system === "github"
          ? "Export a valid token in GITHUB_TOKEN (or the variable named by github.tokenEnv)"
          : "Check your git credentials for the remote",
      cause: options.cause,
    });
    this.name = "UnauthorizedError";
    this.system = options.system;
  }
}

/**
 * Server asked us to slow down
 */
export class RateLimitedError extends StewardError {
  readonly retryAfterMs: number;

  constructor(message: string, options: { retryAfterMs: number; system: ExternalSystem }) {
    super(message, {
      code: "RATE_LIMITED",
      kind: "RateLimited",
      context: { system: options.system, retryAfterMs: options.retryAfterMs },
      recoverable: true,
      suggestion: `Wait ${Math.ceil(options.retryAfterMs / 1000)}s before retrying`,
    });
    this.name = "RateLimitedError";
    this.retryAfterMs = options.retryAfterMs;
  }
}

/**
 * Network, DNS or timeout failure that may succeed on a later attempt
 */
export class TransientError extends StewardError {
  readonly system: ExternalSystem;

  constructor(
    message: string,
    options: { system: ExternalSystem; statusCode?: number; cause?: Error },
  ) {
    super(message, {
      code: "TRANSIENT",
      kind: "Transient",
      context: { system: options.system, statusCode: options.statusCode },
      recoverable: true,
      suggestion: "The request can be retried",
      cause: options.cause,
    });
    this.name = "TransientError";
    this.system = options.system;
  }
}

/**
 * Retries exhausted against a remote system
 */
export class RemoteUnreachableError extends StewardError {
  readonly attempts: number;

  constructor(
    message: string,
    options: { system: ExternalSystem; operation: string; attempts: number; cause?: Error },
  ) {
    super(message, {
      code: "REMOTE_UNREACHABLE",
      kind: "Transient",
      context: { system: options.system, operation: options.operation, attempts: options.attempts },
      recoverable: false,
      suggestion: "Check network access to the remote and re-run the command",
      cause: options.cause,
    });
    this.name = "RemoteUnreachableError";
    this.attempts = options.attempts;
  }
}

/**
 * Operator input that cannot be acted on
 */
export class InvalidInputError extends StewardError {
  constructor(
    message: string,
    options: {
      code:
        | "INVALID_TAG"
        | "NO_PREDECESSOR"
        | "INVALID_ROLLBACK_TARGET"
        | "UNRELEASED_TAG"
        | "MALFORMED_PARAMS"
        | "INVALID_ARGUMENT";
      context?: Record<string, unknown>;
      suggestion?: string;
      cause?: Error;
    },
  ) {
    super(message, {
      code: options.code,
      kind: "InvalidInput",
      context: options.context,
      suggestion: options.suggestion,
      cause: options.cause,
    });
    this.name = "InvalidInputError";
  }
}

/**
 * A multi-step operation stopped between stages
 */
export class PartialFailureError extends StewardError {
  readonly stage: string;
  readonly remediation: string;

  constructor(
    message: string,
    options: {
      stage: string;
      system: ExternalSystem;
      remediation: string;
      context?: Record<string, unknown>;
      cause?: Error;
    },
  ) {
    super(message, {
      code: "PARTIAL_FAILURE",
      kind: "PartialFailure",
      context: { stage: options.stage, system: options.system, ...options.context },
      recoverable: false,
      suggestion: options.remediation,
      cause: options.cause,
    });
    this.name = "PartialFailureError";
    this.stage = options.stage;
    this.remediation = options.remediation;
  }
}

/**
 * Configuration error
 */
export class ConfigError extends StewardError {
  readonly issues: ConfigIssue[];

  constructor(
    message: string,
    options: {
      issues?: ConfigIssue[];
      configPath?: string;
      cause?: Error;
    } = {},
  ) {
    super(message, {
      code: "CONFIG_ERROR",
      kind: "Config",
      context: { configPath: options.configPath, issues: options.issues },
      suggestion: "Check your .steward/config.json for errors",
      cause: options.cause,
    });
    this.name = "ConfigError";
    this.issues = options.issues ?? [];
  }

  /**
   * Format issues as a readable string
   */
  formatIssues(): string {
    if (this.issues.length === 0) return "";
    return this.issues.map((i) => `  - ${i.path}: ${i.message}`).join("\n");
  }
}

export interface ConfigIssue {
  path: string;
  message: string;
}

/**
 * Check if error is a specific type
 */
export function isStewardError(error: unknown): error is StewardError {
  return error instanceof StewardError;
}

/**
 * Fallback suggestions per error code
 */
export const ERROR_SUGGESTIONS: Record<string, string> = {
  TAG_NOT_FOUND: "Run 'steward status <repo>' to list the known tags.",
  RELEASE_NOT_FOUND: "Run 'steward status <repo>' to list the known releases.",
  REPO_NOT_FOUND: "Clone the repository under $GIT_WORKSPACE (default ~/git) or pass --workspace.",
  PARAMS_FILE_NOT_FOUND: "Check params.file in your configuration.",
  TAG_ALREADY_EXISTS: "Delete the tag with 'steward delete' or choose another bump kind.",
  RELEASE_ALREADY_EXISTS: "Delete the release with 'steward delete --keep-tag' before re-creating it.",
  PARAMS_UPDATE_CONFLICT: "Someone else pushed to the params repo. Re-run the command.",
  DIRTY_WORKTREE: "Commit or stash your local changes first.",
  AUTH_ERROR: "Check the token in GITHUB_TOKEN.",
  RATE_LIMITED: "Wait for the rate limit window to reset and retry.",
  TRANSIENT: "Check your network connection and retry.",
  REMOTE_UNREACHABLE: "Check your network connection and retry.",
  INVALID_TAG: "Tags look like v1.2.3 or v1.2.3-rc.1.",
  NO_PREDECESSOR: "The first release cannot be rolled back.",
  INVALID_ROLLBACK_TARGET: "Pick a tag that has a published release ('steward status <repo>').",
  UNRELEASED_TAG: "Create the release first with 'steward create <repo>'.",
  MALFORMED_PARAMS: "The params file must be a YAML mapping.",
  INVALID_ARGUMENT: "See 'steward --help' for usage.",
  CONFIG_ERROR: "Check your .steward/config.json.",
  UNEXPECTED_ERROR: "An unexpected error occurred. Re-run with --log-level debug for details.",
};

/**
 * Format error for display
 */
export function formatError(error: unknown): string {
  if (error instanceof StewardError) {
    let message = `${error.kind} [${error.code}] ${error.message}`;
    if (error instanceof ConfigError && error.issues.length > 0) {
      message += `\n${error.formatIssues()}`;
    }
    const suggestion = error.suggestion ?? ERROR_SUGGESTIONS[error.code];
    if (suggestion) {
      message += `\n  ${error instanceof PartialFailureError ? "Next step" : "Suggestion"}: ${suggestion}`;
    }
    return message;
  }

  if (error instanceof Error) {
    return `${error.message}\n  Suggestion: ${ERROR_SUGGESTIONS["UNEXPECTED_ERROR"]}`;
  }

  return String(error);
}

/**
 * Normalise an unknown thrown value into an Error for `cause`
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
