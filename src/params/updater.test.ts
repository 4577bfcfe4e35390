/**
 * Tests for the params repo updater
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

const git = vi.hoisted(() => ({
  checkIsRepo: vi.fn(),
  status: vi.fn(),
  revparse: vi.fn(),
  raw: vi.fn(),
  add: vi.fn(),
  commit: vi.fn(),
  reset: vi.fn(),
}));

vi.mock("simple-git", () => ({
  simpleGit: vi.fn(() => git),
}));

import { ParamsRepoUpdater, paramsCommitMessage } from "./updater.js";
import { RetryPolicy } from "../utils/retry.js";
import { createSilentLogger } from "../utils/logger.js";

const FILE = "release-tags.yml";
const REJECTED = " ! [rejected]        HEAD -> main (fetch first)";

let dir: string;
let head: string;

function createUpdater(branch?: string): ParamsRepoUpdater {
  return new ParamsRepoUpdater({
    file: FILE,
    remote: "origin",
    branch,
    timeoutMs: 5000,
    retry: new RetryPolicy({ maxAttempts: 2, initialDelayMs: 0, jitterFactor: 0 }, { sleep: async () => {} }),
    logger: createSilentLogger(),
  });
}

function pushes(): unknown[][] {
  return git.raw.mock.calls.filter(([args]) => Array.isArray(args) && args[0] === "push");
}

describe("ParamsRepoUpdater", () => {
  beforeEach(async () => {
    vi.clearAllMocks();
    dir = await mkdtemp(join(tmpdir(), "steward-params-"));
    head = "start000";
    let commits = 0;

    git.checkIsRepo.mockResolvedValue(true);
    git.status.mockResolvedValue({ isClean: () => true });
    git.revparse.mockImplementation(async (args: string[]) =>
      args[0] === "--abbrev-ref" ? "main\n" : `${head}\n`,
    );
    git.raw.mockResolvedValue("");
    git.add.mockResolvedValue(undefined);
    git.commit.mockImplementation(async () => {
      commits += 1;
      head = `commit${commits}`;
      return { commit: head };
    });
    git.reset.mockResolvedValue("");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe("getReleaseTag", () => {
    it("should read the repository's key", async () => {
      await writeFile(join(dir, FILE), "billing-release: v1.0.0\n");

      await expect(createUpdater().getReleaseTag(dir, "billing-release")).resolves.toBe("v1.0.0");
    });

    it("should treat a missing file as unset", async () => {
      await expect(createUpdater().getReleaseTag(dir, "billing-release")).resolves.toBeUndefined();
    });
  });

  describe("setReleaseTag", () => {
    it("should pull, commit the single change and push", async () => {
      await writeFile(join(dir, FILE), "billing-release: v1.0.0\nledger-release: v2.0.0\n");

      const update = await createUpdater().setReleaseTag(dir, "billing-release", "v1.1.0", { repo: "billing" });

      expect(update).toEqual({
        key: "billing-release",
        previous: "v1.0.0",
        next: "v1.1.0",
        changed: true,
        commit: "commit1",
      });
      expect(await readFile(join(dir, FILE), "utf-8")).toBe("billing-release: v1.1.0\nledger-release: v2.0.0\n");
      expect(git.raw.mock.calls.map(([args]) => args)).toEqual([
        ["fetch", "origin"],
        ["pull", "--ff-only", "origin", "main"],
        ["push", "origin", "HEAD:main"],
      ]);
      expect(git.add).toHaveBeenCalledWith([FILE]);
      expect(git.commit).toHaveBeenCalledWith("Update billing release tag to v1.1.0");
    });

    it("should use the configured branch", async () => {
      await writeFile(join(dir, FILE), "billing-release: v1.0.0\n");

      await createUpdater("deploy").setReleaseTag(dir, "billing-release", "v1.1.0", { repo: "billing" });

      expect(pushes()).toEqual([[["push", "origin", "HEAD:deploy"]]]);
    });

    it("should commit nothing when the value is already set", async () => {
      await writeFile(join(dir, FILE), "billing-release: v1.1.0\n");

      const update = await createUpdater().setReleaseTag(dir, "billing-release", "v1.1.0", { repo: "billing" });

      expect(update).toEqual({ key: "billing-release", previous: "v1.1.0", next: "v1.1.0", changed: false });
      expect(git.commit).not.toHaveBeenCalled();
      expect(pushes()).toEqual([]);
    });

    it("should refuse a tree with local changes", async () => {
      git.status.mockResolvedValue({ isClean: () => false });

      await expect(
        createUpdater().setReleaseTag(dir, "billing-release", "v1.1.0", { repo: "billing" }),
      ).rejects.toMatchObject({ code: "DIRTY_WORKTREE" });
      expect(git.raw).not.toHaveBeenCalled();
    });

    it("should re-apply the change on fresh content after a rejected push", async () => {
      await writeFile(join(dir, FILE), "billing-release: v1.0.0\n");
      let pushCount = 0;
      git.raw.mockImplementation(async (args: string[]) => {
        if (args[0] === "push" && ++pushCount === 1) throw new Error(REJECTED);
        if (args[0] === "pull" && pushCount === 1) {
          // someone else deployed ledger meanwhile
          await writeFile(join(dir, FILE), "billing-release: v1.0.0\nledger-release: v2.1.0\n");
        }
        return "";
      });

      const update = await createUpdater().setReleaseTag(dir, "billing-release", "v1.1.0", { repo: "billing" });

      expect(update.commit).toBe("commit2");
      expect(git.reset).toHaveBeenCalledWith(["--hard", "HEAD~1"]);
      expect(await readFile(join(dir, FILE), "utf-8")).toBe("billing-release: v1.1.0\nledger-release: v2.1.0\n");
      expect(pushes()).toHaveLength(2);
    });

    it("should give up after a second rejection and restore the tree", async () => {
      await writeFile(join(dir, FILE), "billing-release: v1.0.0\n");
      git.raw.mockImplementation(async (args: string[]) => {
        if (args[0] === "push") throw new Error(REJECTED);
        if (args[0] === "pull") await writeFile(join(dir, FILE), "billing-release: v1.0.0\n");
        return "";
      });

      await expect(
        createUpdater().setReleaseTag(dir, "billing-release", "v1.1.0", { repo: "billing" }),
      ).rejects.toMatchObject({ kind: "Conflict", code: "PARAMS_UPDATE_CONFLICT" });
      expect(pushes()).toHaveLength(2);
      expect(git.reset).toHaveBeenLastCalledWith(["--hard", "start000"]);
    });

    it("should restore the tree when the push cannot reach the remote", async () => {
      await writeFile(join(dir, FILE), "billing-release: v1.0.0\n");
      git.raw.mockImplementation(async (args: string[]) => {
        if (args[0] === "push") throw new Error("fatal: unable to access 'https://github.com/acme/params.git/'");
        return "";
      });

      await expect(
        createUpdater().setReleaseTag(dir, "billing-release", "v1.1.0", { repo: "billing" }),
      ).rejects.toMatchObject({ code: "REMOTE_UNREACHABLE" });
      expect(git.reset).toHaveBeenCalledWith(["--hard", "start000"]);
    });
  });
});

describe("paramsCommitMessage", () => {
  it("should name the repository and tag", () => {
    expect(paramsCommitMessage("billing", "v1.1.0")).toBe("Update billing release tag to v1.1.0");
  });
});
