/**
 * Status command - show tags, releases and the deployed tag
 */

import { Command } from "commander";
import * as p from "@clack/prompts";
import chalk from "chalk";
import type { ReleaseHistory } from "../../coordinator/types.js";
import { addCommonOptions, openSession, type CommonOptions } from "../session.js";

export interface StatusCommandOptions extends CommonOptions {
  json?: boolean;
}

export function registerStatusCommand(program: Command): void {
  addCommonOptions(
    program
      .command("status")
      .description("Show release tags, which have releases, and which one params points at")
      .argument("<repo>", "Repository name")
      .option("--json", "Output as JSON"),
  ).action(async (repo: string, options: StatusCommandOptions) => {
    await runStatus(repo, options);
  });
}

export function formatHistoryLine(entry: ReleaseHistory["entries"][number]): string {
  const marker = entry.current ? chalk.green("*") : " ";
  const released = entry.released ? "released" : chalk.yellow("tag only");
  return `${marker} ${entry.tag}  ${released}`;
}

export async function runStatus(repo: string, options: StatusCommandOptions = {}): Promise<ReleaseHistory> {
  const session = await openSession(repo, options);
  const history = await session.coordinator.status(session.target);

  if (options.json) {
    console.log(JSON.stringify(history, null, 2));
    return history;
  }

  p.log.info(chalk.bold(`${history.owner}/${history.repo}`));
  if (history.entries.length === 0) {
    p.log.warning("No release tags yet");
  } else {
    // newest first on screen
    p.log.message([...history.entries].reverse().map(formatHistoryLine).join("\n"));
  }
  p.log.info(`Deployed: ${history.currentTag ?? chalk.dim("(unset)")}`);
  if (history.currentTag && !history.entries.some((e) => e.tag === history.currentTag)) {
    p.log.warning(`${history.currentTag} is not among the repository's release tags`);
  }
  if (history.malformedTags.length > 0) {
    p.log.warning(`Ignored tags: ${history.malformedTags.join(", ")}`);
  }
  return history;
}
