/**
 * Tests for the git tag client
 */

import { describe, it, expect, vi, beforeEach } from "vitest";

const git = vi.hoisted(() => ({
  checkIsRepo: vi.fn(),
  tags: vi.fn(),
  raw: vi.fn(),
  revparse: vi.fn(),
  listRemote: vi.fn(),
  getRemotes: vi.fn(),
}));

vi.mock("simple-git", () => ({
  simpleGit: vi.fn(() => git),
}));

import { simpleGit } from "simple-git";
import { GitTagClient, parseGitHubRemote } from "./tags.js";
import { RetryPolicy } from "../utils/retry.js";
import { createSilentLogger } from "../utils/logger.js";

const REPO = "/work/git/billing";

function createClient(): GitTagClient {
  return new GitTagClient({
    remote: "origin",
    timeoutMs: 5000,
    retry: new RetryPolicy({ maxAttempts: 3, initialDelayMs: 0, jitterFactor: 0 }, { sleep: async () => {} }),
    logger: createSilentLogger(),
  });
}

describe("GitTagClient", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    git.checkIsRepo.mockResolvedValue(true);
    git.tags.mockResolvedValue({ all: ["v1.0.0", "v1.1.0"], latest: "v1.1.0" });
    git.raw.mockResolvedValue("");
    git.revparse.mockResolvedValue("0123456789abcdef\n");
    git.listRemote.mockResolvedValue("");
  });

  it("should open the clone with a per-process timeout", async () => {
    await createClient().listTags(REPO);

    expect(simpleGit).toHaveBeenCalledWith({ baseDir: REPO, timeout: { block: 5000 } });
  });

  it("should list local tags", async () => {
    await expect(createClient().listTags(REPO)).resolves.toEqual(["v1.0.0", "v1.1.0"]);
  });

  it("should report a directory that is not a clone", async () => {
    git.checkIsRepo.mockResolvedValue(false);

    await expect(createClient().listTags(REPO)).rejects.toMatchObject({
      code: "REPO_NOT_FOUND",
      message: "/work/git/billing is not a git working tree",
    });
  });

  it("should fetch remote tags without pruning local ones", async () => {
    await createClient().fetchTags(REPO);

    expect(git.raw).toHaveBeenCalledWith(["fetch", "origin", "--tags"]);
  });

  it("should retry a fetch that fails on the network", async () => {
    git.raw
      .mockRejectedValueOnce(new Error("fatal: unable to access 'https://github.com/acme/billing.git/'"))
      .mockResolvedValueOnce("");

    await createClient().fetchTags(REPO);

    expect(git.raw).toHaveBeenCalledTimes(2);
  });

  it("should create an annotated tag and return its commit", async () => {
    const created = await createClient().createTag(REPO, "v1.2.0", { message: "Release v1.2.0" });

    expect(git.listRemote).toHaveBeenCalledWith(["--tags", "origin", "refs/tags/v1.2.0"]);
    expect(git.raw).toHaveBeenCalledWith(["tag", "-a", "v1.2.0", "-m", "Release v1.2.0", "HEAD"]);
    expect(git.revparse).toHaveBeenCalledWith(["v1.2.0^{commit}"]);
    expect(created).toEqual({ tag: "v1.2.0", commit: "0123456789abcdef" });
  });

  it("should refuse a tag that exists locally", async () => {
    await expect(
      createClient().createTag(REPO, "v1.1.0", { message: "Release v1.1.0" }),
    ).rejects.toMatchObject({ code: "TAG_ALREADY_EXISTS", message: "Tag v1.1.0 already exists locally" });
    expect(git.raw).not.toHaveBeenCalled();
  });

  it("should refuse a tag that exists only on the remote", async () => {
    git.listRemote.mockResolvedValue("0123456789abcdef\trefs/tags/v1.2.0\n");

    await expect(
      createClient().createTag(REPO, "v1.2.0", { message: "Release v1.2.0", commit: "abc" }),
    ).rejects.toMatchObject({ code: "TAG_ALREADY_EXISTS", message: "Tag v1.2.0 already exists on origin" });
    expect(git.raw).not.toHaveBeenCalled();
  });

  it("should map a rejected push to a conflict without retrying", async () => {
    git.raw.mockRejectedValue(new Error(" ! [rejected]        v1.2.0 -> v1.2.0 (already exists)"));

    await expect(createClient().pushTag(REPO, "v1.2.0")).rejects.toMatchObject({
      kind: "Conflict",
      code: "TAG_ALREADY_EXISTS",
    });
    expect(git.raw).toHaveBeenCalledTimes(1);
    expect(git.raw).toHaveBeenCalledWith(["push", "origin", "refs/tags/v1.2.0"]);
  });

  it("should give up after the configured attempts", async () => {
    git.raw.mockRejectedValue(new Error("fatal: the remote end hung up unexpectedly"));

    await expect(createClient().pushTag(REPO, "v1.2.0")).rejects.toMatchObject({
      code: "REMOTE_UNREACHABLE",
      attempts: 3,
    });
    expect(git.raw).toHaveBeenCalledTimes(3);
  });

  it("should delete the local and the remote tag", async () => {
    git.listRemote.mockResolvedValue("0123456789abcdef\trefs/tags/v1.1.0\n");

    const deleted = await createClient().deleteTag(REPO, "v1.1.0");

    expect(deleted).toEqual({ local: true, remote: true });
    expect(git.raw).toHaveBeenCalledWith(["tag", "-d", "v1.1.0"]);
    expect(git.raw).toHaveBeenCalledWith(["push", "origin", ":refs/tags/v1.1.0"]);
  });

  it("should only touch the local copy when asked", async () => {
    const deleted = await createClient().deleteTag(REPO, "v1.1.0", { local: true, remote: false });

    expect(deleted).toEqual({ local: true, remote: false });
    expect(git.listRemote).not.toHaveBeenCalled();
    expect(git.raw).toHaveBeenCalledTimes(1);
  });

  it("should report a tag that exists nowhere", async () => {
    await expect(createClient().deleteTag(REPO, "v9.0.0")).rejects.toMatchObject({
      kind: "NotFound",
      code: "TAG_NOT_FOUND",
    });
  });

  it("should read the owner from the remote URL", async () => {
    git.getRemotes.mockResolvedValue([
      { name: "upstream", refs: { fetch: "git@github.com:other/billing.git", push: "" } },
      { name: "origin", refs: { fetch: "git@github.com:acme/billing.git", push: "" } },
    ]);

    await expect(createClient().remoteOwner(REPO)).resolves.toBe("acme");
  });
});

describe("parseGitHubRemote", () => {
  it("should parse SSH and HTTPS remotes", () => {
    expect(parseGitHubRemote("git@github.com:acme/billing.git")).toEqual({ owner: "acme", repo: "billing" });
    expect(parseGitHubRemote("https://github.com/acme/billing")).toEqual({ owner: "acme", repo: "billing" });
  });

  it("should ignore other hosts", () => {
    expect(parseGitHubRemote("https://gitlab.com/acme/billing.git")).toBeUndefined();
  });
});
