/**
 * Map git stderr onto the error taxonomy
 */

import {
  ConflictError,
  TransientError,
  UnauthorizedError,
  StewardError,
  toError,
} from "../utils/errors.js";

export type GitFailure = "transient" | "unauthorized" | "rejected" | "exists" | "unknown";

const TRANSIENT_PATTERNS = [
  /could not resolve host/i,
  /unable to access/i,
  /connection (timed out|refused|reset)/i,
  /network is unreachable/i,
  /operation timed out/i,
  /early eof/i,
  /the remote end hung up/i,
  /block timeout/i,
  /could not read from remote repository/i,
];

const UNAUTHORIZED_PATTERNS = [
  /authentication failed/i,
  /permission denied/i,
  /could not read username/i,
  /returned error: 403/i,
];

const REJECTED_PATTERNS = [/\[rejected\]/i, /non-fast-forward/i, /fetch first/i, /\(stale info\)/i];

export function classifyGitFailure(error: unknown): GitFailure {
  const message = toError(error).message;

  if (/already exists/i.test(message)) return "exists";
  if (REJECTED_PATTERNS.some((p) => p.test(message))) return "rejected";
  // permission denied (publickey) also prints "could not read from remote", so check auth first
  if (UNAUTHORIZED_PATTERNS.some((p) => p.test(message))) return "unauthorized";
  if (TRANSIENT_PATTERNS.some((p) => p.test(message))) return "transient";
  return "unknown";
}

/**
 * Translate a git failure into a StewardError where the kind is known.
 * Unknown failures are returned as-is so their stderr reaches the operator.
 */
export function toGitError(error: unknown, operation: string, ref?: string): unknown {
  if (error instanceof StewardError) return error;

  const cause = toError(error);
  switch (classifyGitFailure(error)) {
    case "transient":
      return new TransientError(`git ${operation} failed: ${cause.message.trim()}`, {
        system: "git",
        cause,
      });
    case "unauthorized":
      return new UnauthorizedError(`git ${operation} was refused by the remote`, {
        system: "git",
        cause,
      });
    case "exists":
    case "rejected":
      if (ref) {
        return new ConflictError(`${ref} already exists on the remote`, {
          code: "TAG_ALREADY_EXISTS",
          system: "git",
          context: { ref, operation },
          cause,
        });
      }
      return error;
    case "unknown":
      return error;
  }
}
