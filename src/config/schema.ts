/**
 * Configuration schema for release-steward
 */

import { z } from "zod";

/**
 * GitHub API configuration
 */
export const GitHubConfigSchema = z.object({
  /** Default owner; otherwise taken from the clone's origin remote */
  owner: z.string().min(1).optional(),
  apiUrl: z.string().url().default("https://api.github.com"),
  /** Environment variable holding the bearer token */
  tokenEnv: z.string().min(1).default("GITHUB_TOKEN"),
  timeoutMs: z.number().int().min(1000).default(30000),
});

export type GitHubConfig = z.infer<typeof GitHubConfigSchema>;

/**
 * Where local clones live
 */
export const WorkspaceConfigSchema = z.object({
  gitDir: z.string().min(1).optional(),
  remote: z.string().min(1).default("origin"),
  /** Owner whose clones are not suffixed with "-<owner>" */
  defaultOwner: z.string().min(1).optional(),
  timeoutMs: z.number().int().min(1000).default(60000),
});

export type WorkspaceConfig = z.infer<typeof WorkspaceConfigSchema>;

/**
 * Params repository configuration
 */
export const ParamsConfigSchema = z.object({
  repo: z.string().min(1).default("params"),
  file: z.string().min(1).default("release-tags.yml"),
  keyTemplate: z
    .string()
    .refine((value) => value.includes("{repo}"), { message: "must contain {repo}" })
    .default("{repo}-release"),
  branch: z.string().min(1).optional(),
});

export type ParamsConfig = z.infer<typeof ParamsConfigSchema>;

export const TagsConfigSchema = z.object({
  prefix: z.string().default("v"),
  defaultBump: z.enum(["major", "minor", "patch"]).default("patch"),
});

export type TagsConfig = z.infer<typeof TagsConfigSchema>;

export const RetryConfigSchema = z.object({
  maxAttempts: z.number().int().min(1).max(10).default(3),
  initialDelayMs: z.number().int().min(0).default(1000),
  maxDelayMs: z.number().int().min(0).default(30000),
  backoffMultiplier: z.number().min(1).default(2),
  jitterFactor: z.number().min(0).max(1).default(0.1),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["silly", "trace", "debug", "info", "warn", "error", "fatal"]).default("info"),
  logToFile: z.boolean().default(false),
  logDir: z.string().optional(),
});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

export const ConcourseConfigSchema = z.object({
  flyPath: z.string().min(1).default("fly"),
  /** Pipeline definition, relative to the repository clone */
  pipelineConfig: z.string().min(1).default("ci/pipeline.yml"),
  timeoutMs: z.number().int().min(1000).default(120000),
});

export type ConcourseConfig = z.infer<typeof ConcourseConfigSchema>;

/**
 * Complete configuration schema
 */
export const StewardConfigSchema = z.object({
  github: GitHubConfigSchema.default({}),
  workspace: WorkspaceConfigSchema.default({}),
  params: ParamsConfigSchema.default({}),
  tags: TagsConfigSchema.default({}),
  retry: RetryConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
  concourse: ConcourseConfigSchema.default({}),
});

export type StewardConfig = z.infer<typeof StewardConfigSchema>;

/**
 * Validate configuration object
 */
export function validateConfig(config: unknown): {
  success: boolean;
  data?: StewardConfig;
  error?: z.ZodError;
} {
  const result = StewardConfigSchema.safeParse(config);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: result.error };
}

/**
 * Configuration with every default applied
 */
export function createDefaultConfig(): StewardConfig {
  return StewardConfigSchema.parse({});
}
