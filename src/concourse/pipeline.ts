/**
 * The one Concourse call release-steward makes: `fly set-pipeline`
 */

import { execa } from "execa";
import { PartialFailureError, TransientError, toError } from "../utils/errors.js";
import { createChildLogger, type StewardLogger } from "../utils/logger.js";
import type { PipelineSetter, SetPipelineRequest } from "../coordinator/types.js";

export interface CommandResult {
  failed: boolean;
  timedOut: boolean;
  exitCode?: number;
  stdout: string;
  stderr: string;
}

export type CommandRunner = (file: string, args: string[], timeoutMs: number) => Promise<CommandResult>;

export interface FlyOptions {
  flyPath: string;
  timeoutMs: number;
  logger: StewardLogger;
  run?: CommandRunner;
}

const runWithExeca: CommandRunner = async (file, args, timeoutMs) => {
  const result = await execa(file, args, { timeout: timeoutMs, reject: false });
  return {
    failed: result.failed,
    timedOut: result.timedOut,
    exitCode: result.exitCode,
    stdout: String(result.stdout),
    stderr: String(result.stderr),
  };
};

export function setPipelineArgs(request: SetPipelineRequest): string[] {
  const args = ["-t", request.target, "set-pipeline", "-p", request.pipeline, "-c", request.configPath];
  for (const [name, value] of Object.entries(request.vars)) {
    args.push("-v", `${name}=${value}`);
  }
  args.push("--non-interactive");
  return args;
}

export class FlyPipelineSetter implements PipelineSetter {
  private readonly flyPath: string;
  private readonly timeoutMs: number;
  private readonly logger: StewardLogger;
  private readonly run: CommandRunner;

  constructor(options: FlyOptions) {
    this.flyPath = options.flyPath;
    this.timeoutMs = options.timeoutMs;
    this.logger = createChildLogger(options.logger, "concourse");
    this.run = options.run ?? runWithExeca;
  }

  describe(request: SetPipelineRequest): string {
    return [this.flyPath, ...setPipelineArgs(request)].join(" ");
  }

  async setPipeline(request: SetPipelineRequest): Promise<void> {
    const result = await this.run(this.flyPath, setPipelineArgs(request), this.timeoutMs);

    if (result.timedOut) {
      throw new TransientError(`fly set-pipeline timed out after ${this.timeoutMs}ms`, {
        system: "concourse",
      });
    }
    if (result.failed) {
      throw new Error(
        `fly set-pipeline exited with ${result.exitCode ?? "no exit code"}: ${result.stderr || result.stdout}`,
      );
    }
    this.logger.debug(result.stdout);
  }
}

/**
 * Failure of the pipeline step after params were already updated
 */
export function pipelineNotSet(command: string, error: unknown): PartialFailureError {
  return new PartialFailureError("Params updated, pipeline not set", {
    stage: "mutating-pipeline",
    system: "concourse",
    remediation: `Re-run: ${command}`,
    cause: toError(error),
  });
}
