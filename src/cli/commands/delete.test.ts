/**
 * Tests for the delete command
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { Command } from "commander";

vi.mock("@clack/prompts", async () => (await import("../../../test/mocks/prompts.js")).createPromptsMock());

vi.mock("../session.js", async (importOriginal) => {
  const actual = await importOriginal<typeof import("../session.js")>();
  return { ...actual, openSession: vi.fn() };
});

import * as p from "@clack/prompts";
import { openSession } from "../session.js";
import { registerDeleteCommand, runDelete } from "./delete.js";
import { createFakeSession, createFakeSystems, type FakeSystems } from "../../../test/mocks/cli-session.js";

describe("delete command", () => {
  let systems: FakeSystems;

  beforeEach(() => {
    vi.clearAllMocks();
    systems = createFakeSystems(["v1.0.0", "v1.1.0"]);
    vi.mocked(openSession).mockResolvedValue(createFakeSession(systems));
  });

  it("should delete the release and its tag", async () => {
    const report = await runDelete("billing", { tag: "v1.1.0", nonInteractive: true });

    expect(report.status).toBe("completed");
    expect(systems.releases.releases.map((r) => r.tag)).toEqual(["v1.0.0"]);
    expect(systems.tags.remote.has("v1.1.0")).toBe(false);
    expect(p.log.success).toHaveBeenCalledWith("deleted tag v1.1.0 locally and on the remote");
  });

  it("should keep the git tag when asked", async () => {
    const program = new Command().exitOverride();
    registerDeleteCommand(program);

    await program.parseAsync(["delete", "billing", "--tag", "v1.1.0", "--keep-tag", "-n"], { from: "user" });

    expect(systems.releases.releases.map((r) => r.tag)).toEqual(["v1.0.0"]);
    expect(systems.tags.remote.has("v1.1.0")).toBe(true);
    expect(p.log.info).toHaveBeenCalledWith("Keeping git tag v1.1.0");
  });

  it("should refuse to run without a tag", async () => {
    const program = new Command().exitOverride().configureOutput({ writeErr: () => {} });
    registerDeleteCommand(program);

    await expect(program.parseAsync(["delete", "billing"], { from: "user" })).rejects.toMatchObject({
      code: "commander.missingMandatoryOptionValue",
    });
    expect(openSession).not.toHaveBeenCalled();
  });
});
