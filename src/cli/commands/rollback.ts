/**
 * Rollback command - point params back at an earlier release
 */

import { Command } from "commander";
import * as p from "@clack/prompts";
import type { OperationReport } from "../../coordinator/types.js";
import { addCommonOptions, openSession, renderReport, type CommonOptions } from "../session.js";

export interface RollbackCommandOptions extends CommonOptions {
  tag?: string;
  foundation?: string;
}

export function registerRollbackCommand(program: Command): void {
  addCommonOptions(
    program
      .command("rollback")
      .description("Point params at the previous release, or at --tag")
      .argument("<repo>", "Repository name")
      .option("-t, --tag <tag>", "Release tag to roll back to (default: predecessor of the deployed tag)")
      .option("-f, --foundation <name>", "Also set the pipeline on this Concourse target"),
  ).action(async (repo: string, options: RollbackCommandOptions) => {
    await runRollback(repo, options);
  });
}

export async function runRollback(repo: string, options: RollbackCommandOptions = {}): Promise<OperationReport> {
  const session = await openSession(repo, options);

  p.intro(`Rolling back ${session.target.owner}/${repo}`);
  const report = await session.coordinator.rollback(session.target, {
    tag: options.tag,
    foundation: options.foundation,
    interactive: session.interactive,
  });
  renderReport(report);
  return report;
}
