/**
 * Typed step results for failures the coordinator is allowed to absorb
 */

import { isStewardError, type StewardError } from "./errors.js";

export type StepResult<T> =
  | { status: "ok"; value: T }
  | { status: "tolerated"; error: StewardError };

/**
 * Run a step and turn errors carrying one of the listed codes into a
 * `tolerated` result. Anything else is rethrown unchanged, including other
 * errors of the same kind (a missing clone is not a missing tag).
 */
export async function tolerate<T>(
  fn: () => Promise<T>,
  codes: readonly string[],
): Promise<StepResult<T>> {
  try {
    return { status: "ok", value: await fn() };
  } catch (error) {
    if (isStewardError(error) && codes.includes(error.code)) {
      return { status: "tolerated", error };
    }
    throw error;
  }
}

export function isOk<T>(result: StepResult<T>): result is { status: "ok"; value: T } {
  return result.status === "ok";
}
