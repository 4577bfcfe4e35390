/**
 * Delete command - remove a release and its tag
 */

import { Command } from "commander";
import * as p from "@clack/prompts";
import type { OperationReport } from "../../coordinator/types.js";
import { addCommonOptions, openSession, renderReport, type CommonOptions } from "../session.js";

export interface DeleteCommandOptions extends CommonOptions {
  tag: string;
  keepTag?: boolean;
}

export function registerDeleteCommand(program: Command): void {
  addCommonOptions(
    program
      .command("delete")
      .description("Delete a GitHub release and, unless kept, its git tag")
      .argument("<repo>", "Repository name")
      .requiredOption("-t, --tag <tag>", "Release tag to delete")
      .option("--keep-tag", "Delete only the GitHub release"),
  ).action(async (repo: string, options: DeleteCommandOptions) => {
    await runDelete(repo, options);
  });
}

export async function runDelete(repo: string, options: DeleteCommandOptions): Promise<OperationReport> {
  const session = await openSession(repo, options);

  p.intro(`Deleting ${options.tag} from ${session.target.owner}/${repo}`);
  const report = await session.coordinator.delete(session.target, options.tag, {
    keepGitTag: options.keepTag ?? false,
    interactive: session.interactive,
  });
  renderReport(report);
  return report;
}
