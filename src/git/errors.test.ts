/**
 * Tests for git failure classification
 */

import { describe, it, expect } from "vitest";
import { classifyGitFailure, toGitError } from "./errors.js";
import { ConflictError, TransientError, UnauthorizedError } from "../utils/errors.js";

const UNREACHABLE =
  "fatal: unable to access 'https://github.com/acme/billing.git/': Could not resolve host: github.com";
const TAG_EXISTS = " ! [rejected]        v1.0.0 -> v1.0.0 (already exists)";
const NON_FAST_FORWARD = " ! [rejected]        main -> main (fetch first)";
const HTTPS_DENIED =
  "remote: Permission to acme/billing.git denied to ci-bot.\n" +
  "fatal: unable to access 'https://github.com/acme/billing.git/': The requested URL returned error: 403";
const SSH_DENIED =
  "git@github.com: Permission denied (publickey).\nfatal: Could not read from remote repository.";

describe("classifyGitFailure", () => {
  it("should classify network failures as transient", () => {
    expect(classifyGitFailure(new Error(UNREACHABLE))).toBe("transient");
    expect(classifyGitFailure(new Error("fatal: the remote end hung up unexpectedly"))).toBe("transient");
  });

  it("should recognise an existing ref before a generic rejection", () => {
    expect(classifyGitFailure(new Error(TAG_EXISTS))).toBe("exists");
    expect(classifyGitFailure(new Error(NON_FAST_FORWARD))).toBe("rejected");
  });

  it("should classify credential failures as unauthorized", () => {
    expect(classifyGitFailure(new Error(HTTPS_DENIED))).toBe("unauthorized");
    expect(classifyGitFailure(new Error(SSH_DENIED))).toBe("unauthorized");
  });

  it("should leave anything else unknown", () => {
    expect(classifyGitFailure(new Error("fatal: bad object HEAD"))).toBe("unknown");
    expect(classifyGitFailure("not an error")).toBe("unknown");
  });
});

describe("toGitError", () => {
  it("should map transient failures", () => {
    const mapped = toGitError(new Error(UNREACHABLE), "fetch");

    expect(mapped).toBeInstanceOf(TransientError);
    expect(mapped).toHaveProperty("system", "git");
  });

  it("should map auth failures", () => {
    expect(toGitError(new Error(SSH_DENIED), "push")).toBeInstanceOf(UnauthorizedError);
  });

  it("should map a rejected ref to a tag conflict", () => {
    const mapped = toGitError(new Error(TAG_EXISTS), "push v1.0.0", "v1.0.0");

    expect(mapped).toBeInstanceOf(ConflictError);
    expect(mapped).toMatchObject({ code: "TAG_ALREADY_EXISTS", message: "v1.0.0 already exists on the remote" });
  });

  it("should keep rejections without a ref, unknown failures and typed errors as they are", () => {
    const rejected = new Error(NON_FAST_FORWARD);
    const unknown = new Error("fatal: bad object HEAD");
    const typed = new TransientError("already typed", { system: "params" });

    expect(toGitError(rejected, "push")).toBe(rejected);
    expect(toGitError(unknown, "tag")).toBe(unknown);
    expect(toGitError(typed, "fetch")).toBe(typed);
  });
});
