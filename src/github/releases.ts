/**
 * GitHub release objects over the REST API
 */

import { z } from "zod";
import {
  ConflictError,
  InvalidInputError,
  NotFoundError,
  RateLimitedError,
  TransientError,
  UnauthorizedError,
  toError,
} from "../utils/errors.js";
import { createChildLogger, type StewardLogger } from "../utils/logger.js";
import type { RetryPolicy } from "../utils/retry.js";
import type { Release, ReleaseRegistry } from "../coordinator/types.js";

export const DEFAULT_GITHUB_API_URL = "https://api.github.com";

const PAGE_SIZE = 100;

/** Used when a rate-limit response carries no usable hint */
const DEFAULT_RETRY_AFTER_MS = 60000;

const GitHubReleaseSchema = z.object({
  id: z.number(),
  tag_name: z.string(),
  name: z.string().nullable(),
  body: z.string().nullable().optional(),
  draft: z.boolean(),
  target_commitish: z.string(),
  created_at: z.string(),
  html_url: z.string().optional(),
});

const GitHubErrorSchema = z.object({
  message: z.string().optional(),
  errors: z.array(z.object({ code: z.string().optional(), field: z.string().optional() })).optional(),
});

type GitHubRelease = z.infer<typeof GitHubReleaseSchema>;

export interface GitHubClientOptions {
  token?: string;
  apiUrl?: string;
  /** Per-attempt timeout */
  timeoutMs: number;
  retry: RetryPolicy;
  logger: StewardLogger;
}

interface HttpResult {
  status: number;
  body: unknown;
}

function toRelease(raw: GitHubRelease): Release {
  return {
    id: raw.id,
    tag: raw.tag_name,
    name: raw.name ?? raw.tag_name,
    body: raw.body ?? "",
    draft: raw.draft,
    commit: raw.target_commitish,
    createdAt: raw.created_at,
    url: raw.html_url,
  };
}

/**
 * Milliseconds to wait, from Retry-After (seconds) or X-RateLimit-Reset (epoch seconds)
 */
export function parseRetryAfter(headers: Headers, now: number = Date.now()): number {
  const retryAfter = headers.get("retry-after");
  if (retryAfter !== null) {
    const seconds = Number(retryAfter);
    if (Number.isFinite(seconds) && seconds >= 0) return seconds * 1000;
  }

  const reset = headers.get("x-ratelimit-reset");
  if (reset !== null) {
    const epochSeconds = Number(reset);
    if (Number.isFinite(epochSeconds)) return Math.max(epochSeconds * 1000 - now, 1000);
  }

  return DEFAULT_RETRY_AFTER_MS;
}

function errorMessage(body: unknown): string {
  const parsed = GitHubErrorSchema.safeParse(body);
  return parsed.success ? (parsed.data.message ?? "") : "";
}

export class ReleaseRegistryClient implements ReleaseRegistry {
  private readonly token?: string;
  private readonly apiUrl: string;
  private readonly timeoutMs: number;
  private readonly retry: RetryPolicy;
  private readonly logger: StewardLogger;

  constructor(options: GitHubClientOptions) {
    this.token = options.token;
    this.apiUrl = (options.apiUrl ?? DEFAULT_GITHUB_API_URL).replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs;
    this.logger = createChildLogger(options.logger, "github");
    this.retry = options.retry.withLogger(this.logger);
  }

  async createRelease(
    owner: string,
    repo: string,
    tag: string,
    commit: string,
    body: string,
  ): Promise<Release> {
    let attempts = 0;
    const result = await this.request(
      "POST",
      `/repos/${owner}/${repo}/releases`,
      {
        tag_name: tag,
        target_commitish: commit,
        name: tag,
        body,
        draft: false,
        prerelease: false,
      },
      () => {
        attempts += 1;
      },
    );

    if (result.status === 422) {
      const parsed = GitHubErrorSchema.safeParse(result.body);
      const alreadyExists =
        parsed.success && (parsed.data.errors ?? []).some((e) => e.code === "already_exists");
      if (alreadyExists && attempts > 1) {
        // an earlier attempt may have landed before its response was lost
        const existing = await this.getReleaseByTag(owner, repo, tag);
        if (existing?.tag === tag) {
          this.logger.warn(`Release ${existing.id} for ${tag} was created by an earlier attempt`);
          return existing;
        }
      }
      if (alreadyExists) {
        throw new ConflictError(`A release for ${tag} already exists in ${owner}/${repo}`, {
          code: "RELEASE_ALREADY_EXISTS",
          system: "github",
          context: { owner, repo, tag },
        });
      }
      throw new InvalidInputError(
        `GitHub rejected the release for ${tag}: ${errorMessage(result.body)}`,
        { code: "INVALID_ARGUMENT", context: { owner, repo, tag, response: result.body } },
      );
    }
    this.expect(result, [201], `create release ${tag}`);

    const release = toRelease(GitHubReleaseSchema.parse(result.body));
    this.logger.debug(`Created release ${release.id} for ${tag}`);
    return release;
  }

  async getReleaseByTag(owner: string, repo: string, tag: string): Promise<Release | undefined> {
    const result = await this.request(
      "GET",
      `/repos/${owner}/${repo}/releases/tags/${encodeURIComponent(tag)}`,
    );
    if (result.status === 404) return undefined;
    this.expect(result, [200], `get release ${tag}`);
    return toRelease(GitHubReleaseSchema.parse(result.body));
  }

  async deleteRelease(owner: string, repo: string, tag: string): Promise<Release> {
    const release = await this.getReleaseByTag(owner, repo, tag);
    if (!release) {
      throw this.releaseNotFound(owner, repo, tag);
    }

    const result = await this.request("DELETE", `/repos/${owner}/${repo}/releases/${release.id}`);
    if (result.status === 404) {
      throw this.releaseNotFound(owner, repo, tag);
    }
    this.expect(result, [204], `delete release ${tag}`);
    return release;
  }

  async listReleases(owner: string, repo: string): Promise<Release[]> {
    const releases: Release[] = [];

    for (let page = 1; ; page++) {
      const result = await this.request(
        "GET",
        `/repos/${owner}/${repo}/releases?per_page=${PAGE_SIZE}&page=${page}`,
      );
      if (result.status === 404) {
        throw new NotFoundError(`Repository ${owner}/${repo} not found on GitHub`, {
          code: "REPO_NOT_FOUND",
          system: "github",
          context: { owner, repo },
        });
      }
      this.expect(result, [200], "list releases");

      const batch = z.array(GitHubReleaseSchema).parse(result.body);
      releases.push(...batch.map(toRelease));
      if (batch.length < PAGE_SIZE) break;
    }

    return releases.sort((a, b) => Date.parse(b.createdAt) - Date.parse(a.createdAt));
  }

  private releaseNotFound(owner: string, repo: string, tag: string): NotFoundError {
    return new NotFoundError(`No release is bound to ${tag} in ${owner}/${repo}`, {
      code: "RELEASE_NOT_FOUND",
      system: "github",
      context: { owner, repo, tag },
    });
  }

  private expect(result: HttpResult, statuses: number[], operation: string): void {
    if (!statuses.includes(result.status)) {
      throw new Error(
        `GitHub ${operation} returned HTTP ${result.status}: ${errorMessage(result.body)}`,
      );
    }
  }

  /**
   * One API call under the retry policy. Status codes the taxonomy covers
   * (401, 403, 429, 5xx, network) are thrown here; the rest are returned.
   */
  private async request(
    method: string,
    path: string,
    payload?: unknown,
    onAttempt?: () => void,
  ): Promise<HttpResult> {
    if (!this.token) {
      throw new UnauthorizedError("No GitHub token configured", { system: "github" });
    }
    const token = this.token;

    return this.retry.execute(() => {
      onAttempt?.();
      return this.attempt(method, path, token, payload);
    }, {
      operation: `GitHub ${method} ${path}`,
      system: "github",
    });
  }

  private async attempt(
    method: string,
    path: string,
    token: string,
    payload?: unknown,
  ): Promise<HttpResult> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    let response: Response;
    let text: string;
    try {
      response = await fetch(`${this.apiUrl}${path}`, {
        method,
        headers: {
          Accept: "application/vnd.github+json",
          Authorization: `Bearer ${token}`,
          "X-GitHub-Api-Version": "2022-11-28",
          "User-Agent": "release-steward",
          ...(payload === undefined ? {} : { "Content-Type": "application/json" }),
        },
        body: payload === undefined ? undefined : JSON.stringify(payload),
        signal: controller.signal,
      });
      text = await response.text();
    } catch (error) {
      const cause = toError(error);
      const reason = cause.name === "AbortError" ? `timed out after ${this.timeoutMs}ms` : cause.message;
      throw new TransientError(`GitHub ${method} ${path} ${reason}`, { system: "github", cause });
    } finally {
      clearTimeout(timeoutId);
    }

    let body: unknown = undefined;
    if (text.length > 0) {
      try {
        body = JSON.parse(text);
      } catch {
        body = { message: text };
      }
    }

    const message = errorMessage(body);

    if (response.status === 401) {
      throw new UnauthorizedError(`GitHub rejected the token: ${message}`, {
        system: "github",
        statusCode: 401,
      });
    }
    if (
      response.status === 429 ||
      (response.status === 403 &&
        (response.headers.get("x-ratelimit-remaining") === "0" || /rate limit/i.test(message)))
    ) {
      throw new RateLimitedError(`GitHub rate limit hit on ${method} ${path}`, {
        retryAfterMs: parseRetryAfter(response.headers),
        system: "github",
      });
    }
    if (response.status === 403) {
      throw new UnauthorizedError(`GitHub denied ${method} ${path}: ${message}`, {
        system: "github",
        statusCode: 403,
      });
    }
    if (response.status >= 500) {
      throw new TransientError(`GitHub ${method} ${path} returned HTTP ${response.status}`, {
        system: "github",
        statusCode: response.status,
      });
    }

    return { status: response.status, body };
  }
}
