/**
 * Tests for the status command
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

vi.mock("@clack/prompts", async () => (await import("../../../test/mocks/prompts.js")).createPromptsMock());

vi.mock("../session.js", async (importOriginal) => {
  const actual = await importOriginal<typeof import("../session.js")>();
  return { ...actual, openSession: vi.fn() };
});

import * as p from "@clack/prompts";
import { openSession } from "../session.js";
import { formatHistoryLine, runStatus } from "./status.js";
import { createFakeSession, createFakeSystems } from "../../../test/mocks/cli-session.js";

describe("status command", () => {
  const log = vi.spyOn(console, "log").mockImplementation(() => {});

  beforeEach(() => {
    vi.clearAllMocks();
    const systems = createFakeSystems(["v1.0.0", "v1.1.0"], { "billing-release": "v1.1.0" });
    systems.tags.remote.set("v1.2.0", "0123456789abcdef0123456789abcdef01234567");
    vi.mocked(openSession).mockResolvedValue(createFakeSession(systems));
  });

  afterEach(() => {
    log.mockClear();
  });

  it("should print the history as JSON", async () => {
    const history = await runStatus("billing", { json: true });

    expect(history.currentTag).toBe("v1.1.0");
    expect(log).toHaveBeenCalledWith(JSON.stringify(history, null, 2));
    expect(p.log.message).not.toHaveBeenCalled();
  });

  it("should list tags newest first", async () => {
    const history = await runStatus("billing");

    expect(history.entries.map((e) => e.tag)).toEqual(["v1.0.0", "v1.1.0", "v1.2.0"]);
    expect(p.log.message).toHaveBeenCalledTimes(1);
    const lines = String(vi.mocked(p.log.message).mock.calls[0]?.[0]).split("\n");
    expect(lines).toHaveLength(3);
    expect(lines[0]).toContain("v1.2.0");
    expect(lines[2]).toContain("v1.0.0");
  });
});

describe("formatHistoryLine", () => {
  it("should mark released tags", () => {
    expect(formatHistoryLine({ tag: "v1.0.0", released: true, current: false })).toBe("  v1.0.0  released");
  });
});
