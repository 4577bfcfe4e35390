import type { StewardLogger } from "../utils/logger.js";
import type {
  OperationName,
  OperationReport,
  OperationStage,
  OperationStatus,
  PlanStep,
} from "./types.js";

/**
 * Stages reached and steps taken by one coordinator operation
 */
export class OperationTracker {
  readonly operation: OperationName;
  readonly repo: string;
  readonly dryRun: boolean;
  tag?: string;
  private readonly logger: StewardLogger;
  private readonly stages: OperationStage[] = [];
  private readonly steps: PlanStep[] = [];
  private readonly notes: string[] = [];
  private malformedTags: string[] = [];

  constructor(operation: OperationName, repo: string, dryRun: boolean, logger: StewardLogger) {
    this.operation = operation;
    this.repo = repo;
    this.dryRun = dryRun;
    this.logger = logger;
  }

  get stage(): OperationStage | undefined {
    return this.stages[this.stages.length - 1];
  }

  enter(stage: OperationStage): void {
    if (this.stage === stage) return;
    this.stages.push(stage);
    this.logger.debug(`${this.operation} ${this.repo}: ${stage}`);
  }

  /**
   * Record a mutating step, executed or (in dry-run) only planned
   */
  step(action: string, executed: boolean): void {
    const stage = this.stage ?? "resolving";
    this.steps.push({ stage, action, executed });
    this.logger.debug(executed ? action : `[dry-run] would ${action}`);
  }

  note(message: string): void {
    this.notes.push(message);
    this.logger.debug(message);
  }

  setMalformed(tags: string[]): void {
    this.malformedTags = [...tags];
  }

  finish(status?: OperationStatus): OperationReport {
    const finalStatus = status ?? (this.dryRun ? "planned" : "completed");
    if (finalStatus !== "cancelled") {
      this.enter("done");
    }
    return {
      operation: this.operation,
      repo: this.repo,
      dryRun: this.dryRun,
      status: finalStatus,
      tag: this.tag,
      stages: [...this.stages],
      steps: [...this.steps],
      malformedTags: [...this.malformedTags],
      notes: [...this.notes],
    };
  }
}
