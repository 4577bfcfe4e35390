/**
 * Promote command - point params at a released tag
 */

import { Command } from "commander";
import * as p from "@clack/prompts";
import type { OperationReport } from "../../coordinator/types.js";
import { addCommonOptions, openSession, renderReport, type CommonOptions } from "../session.js";

export interface PromoteCommandOptions extends CommonOptions {
  tag?: string;
  foundation?: string;
}

export function registerPromoteCommand(program: Command): void {
  addCommonOptions(
    program
      .command("promote")
      .description("Point params at a released tag (default: the latest release)")
      .argument("<repo>", "Repository name")
      .option("-t, --tag <tag>", "Release tag to deploy")
      .option("-f, --foundation <name>", "Also set the pipeline on this Concourse target"),
  ).action(async (repo: string, options: PromoteCommandOptions) => {
    await runPromote(repo, options);
  });
}

export async function runPromote(repo: string, options: PromoteCommandOptions = {}): Promise<OperationReport> {
  const session = await openSession(repo, options);

  p.intro(`Promoting ${session.target.owner}/${repo}`);
  const report = await session.coordinator.promote(session.target, {
    tag: options.tag,
    foundation: options.foundation,
    interactive: session.interactive,
  });
  renderReport(report);
  return report;
}
