/**
 * Create command - tag, release and deploy the next version
 */

import { Command } from "commander";
import * as p from "@clack/prompts";
import type { OperationReport } from "../../coordinator/types.js";
import { InvalidInputError } from "../../utils/errors.js";
import { BUMP_KINDS, isBumpKind, type BumpKind } from "../../versioning/resolver.js";
import { addCommonOptions, openSession, renderReport, type CommonOptions } from "../session.js";

export interface CreateCommandOptions extends CommonOptions {
  bump?: string;
  body?: string;
  commit?: string;
  foundation?: string;
}

export function registerCreateCommand(program: Command): void {
  addCommonOptions(
    program
      .command("create")
      .description("Tag the next version, publish its release and point params at it")
      .argument("<repo>", "Repository name")
      .option("-b, --bump <kind>", `Version bump (${BUMP_KINDS.join(", ")})`)
      .option("--body <text>", "Release notes")
      .option("--commit <sha>", "Commit to tag (default: HEAD)")
      .option("-f, --foundation <name>", "Also set the pipeline on this Concourse target"),
  ).action(async (repo: string, options: CreateCommandOptions) => {
    await runCreate(repo, options);
  });
}

function parseBump(value: string | undefined): BumpKind | undefined {
  if (value === undefined) return undefined;
  if (!isBumpKind(value)) {
    throw new InvalidInputError(`Unknown bump kind '${value}'`, {
      code: "INVALID_ARGUMENT",
      context: { bump: value },
      suggestion: `Use one of: ${BUMP_KINDS.join(", ")}`,
    });
  }
  return value;
}

export async function runCreate(repo: string, options: CreateCommandOptions = {}): Promise<OperationReport> {
  const bump = parseBump(options.bump);
  const session = await openSession(repo, options);

  p.intro(`Creating a release of ${session.target.owner}/${repo}`);
  const report = await session.coordinator.create(session.target, {
    bump,
    body: options.body,
    commit: options.commit,
    foundation: options.foundation,
    interactive: session.interactive,
  });
  renderReport(report);
  return report;
}
