/**
 * Tests for configuration loader
 */

import { describe, it, expect, vi, beforeEach } from "vitest";

vi.mock("node:fs/promises", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node:fs/promises")>();
  const readFile = vi.fn();
  return { ...actual, readFile, default: { ...actual, readFile } };
});

import fs from "node:fs/promises";
import { deepMergeConfig, loadConfig, loadConfigFile } from "./loader.js";
import { ConfigError } from "../utils/errors.js";

const GLOBAL = "/home/test/.steward/config.json";
const PROJECT = "/repo/.steward/config.json";

function enoent(path: string): Error {
  return Object.assign(new Error(`ENOENT: no such file or directory, open '${path}'`), { code: "ENOENT" });
}

function withFiles(files: Record<string, string>): void {
  vi.mocked(fs.readFile).mockImplementation(async (path) => {
    const content = files[String(path)];
    if (content === undefined) throw enoent(String(path));
    return content;
  });
}

function load(env: Record<string, string> = {}, configPath?: string) {
  return loadConfig({ cwd: "/repo", globalConfigPath: GLOBAL, env, configPath });
}

describe("loadConfig", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("should return defaults when no file exists", async () => {
    withFiles({});

    const config = await load();

    expect(config.github.apiUrl).toBe("https://api.github.com");
    expect(config.params).toEqual({ repo: "params", file: "release-tags.yml", keyTemplate: "{repo}-release" });
    expect(config.tags).toEqual({ prefix: "v", defaultBump: "patch" });
  });

  it("should let the project file override the global one key by key", async () => {
    withFiles({
      [GLOBAL]: JSON.stringify({ github: { owner: "acme" }, params: { repo: "deploy-params" } }),
      [PROJECT]: JSON.stringify({ params: { file: "tags.yml" } }),
    });

    const config = await load();

    expect(config.github.owner).toBe("acme");
    expect(config.params.repo).toBe("deploy-params");
    expect(config.params.file).toBe("tags.yml");
  });

  it("should read JSON5", async () => {
    withFiles({
      [PROJECT]: `{
        // deployment settings
        tags: { prefix: "release-", },
      }`,
    });

    const config = await load();

    expect(config.tags.prefix).toBe("release-");
  });

  it("should use STEWARD_CONFIG_PATH instead of the project file", async () => {
    withFiles({
      "/etc/steward.json": JSON.stringify({ workspace: { remote: "upstream" } }),
      [PROJECT]: JSON.stringify({ workspace: { remote: "origin" } }),
    });

    const config = await load({ STEWARD_CONFIG_PATH: "/etc/steward.json" });

    expect(config.workspace.remote).toBe("upstream");
  });

  it("should require an explicit config file to exist", async () => {
    withFiles({});

    await expect(load({}, "/missing.json")).rejects.toThrow(ConfigError);
  });

  it("should report schema violations with their path", async () => {
    withFiles({ [PROJECT]: JSON.stringify({ params: { keyTemplate: "{name}-release" } }) });

    const error = await load().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toHaveProperty("issues", [{ path: "params.keyTemplate", message: "must contain {repo}" }]);
  });

  it("should report unparsable files", async () => {
    withFiles({ [PROJECT]: "{ tags: " });

    await expect(load()).rejects.toThrow(`Configuration file ${PROJECT} is not valid JSON5`);
  });

  it("should apply environment overrides last", async () => {
    withFiles({ [PROJECT]: JSON.stringify({ workspace: { gitDir: "/srv/git" }, logging: { level: "warn" } }) });

    const config = await load({
      GIT_WORKSPACE: "/home/test/src",
      STEWARD_LOG_LEVEL: "debug",
      STEWARD_LOG_TO_FILE: "yes",
    });

    expect(config.workspace.gitDir).toBe("/home/test/src");
    expect(config.logging.level).toBe("debug");
    expect(config.logging.logToFile).toBe(true);
  });
});

describe("loadConfigFile", () => {
  it("should return null for a missing optional file", async () => {
    withFiles({});

    await expect(loadConfigFile("/nowhere.json")).resolves.toBeNull();
  });

  it("should reject a file that is not an object", async () => {
    withFiles({ "/list.json": "[1, 2]" });

    await expect(loadConfigFile("/list.json")).rejects.toThrow("Invalid configuration: expected an object");
  });
});

describe("deepMergeConfig", () => {
  it("should merge sections and replace scalars", () => {
    expect(
      deepMergeConfig(
        { github: { owner: "acme", timeoutMs: 1000 }, tags: { prefix: "v" } },
        { github: { owner: "other" }, extra: 1 },
      ),
    ).toEqual({ github: { owner: "other", timeoutMs: 1000 }, tags: { prefix: "v" }, extra: 1 });
  });
});
