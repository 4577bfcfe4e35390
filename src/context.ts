/**
 * Per-invocation wiring: one logger, one retry policy, and the clients
 * built from configuration.
 */

import { ReleaseCoordinator } from "./coordinator/coordinator.js";
import type { Confirm } from "./coordinator/types.js";
import { FlyPipelineSetter } from "./concourse/pipeline.js";
import { getGitHubToken, type Env } from "./config/env.js";
import { CONFIG_PATHS } from "./config/paths.js";
import type { StewardConfig } from "./config/schema.js";
import { GitTagClient } from "./git/tags.js";
import { ReleaseRegistryClient } from "./github/releases.js";
import { ParamsRepoUpdater } from "./params/updater.js";
import { createLogger, type StewardLogger } from "./utils/logger.js";
import { RetryPolicy } from "./utils/retry.js";
import { VersionResolver } from "./versioning/resolver.js";

export interface ReleaseContext {
  config: StewardConfig;
  logger: StewardLogger;
  retry: RetryPolicy;
  resolver: VersionResolver;
  tags: GitTagClient;
  releases: ReleaseRegistryClient;
  params: ParamsRepoUpdater;
  pipeline: FlyPipelineSetter;
}

export interface ContextOptions {
  logger?: StewardLogger;
  env?: Env;
}

export function createReleaseContext(config: StewardConfig, options: ContextOptions = {}): ReleaseContext {
  const logger =
    options.logger ??
    createLogger({
      level: config.logging.level,
      logToFile: config.logging.logToFile,
      logDir: config.logging.logDir ?? CONFIG_PATHS.logs,
    });
  const retry = new RetryPolicy(config.retry, { logger });

  return {
    config,
    logger,
    retry,
    resolver: new VersionResolver(config.tags.prefix),
    tags: new GitTagClient({
      remote: config.workspace.remote,
      timeoutMs: config.workspace.timeoutMs,
      retry,
      logger,
    }),
    releases: new ReleaseRegistryClient({
      token: getGitHubToken(config, options.env),
      apiUrl: config.github.apiUrl,
      timeoutMs: config.github.timeoutMs,
      retry,
      logger,
    }),
    params: new ParamsRepoUpdater({
      file: config.params.file,
      remote: config.workspace.remote,
      branch: config.params.branch,
      timeoutMs: config.workspace.timeoutMs,
      retry,
      logger,
    }),
    pipeline: new FlyPipelineSetter({
      flyPath: config.concourse.flyPath,
      timeoutMs: config.concourse.timeoutMs,
      logger,
    }),
  };
}

export function createCoordinator(
  context: ReleaseContext,
  options: { confirm: Confirm; dryRun?: boolean },
): ReleaseCoordinator {
  return new ReleaseCoordinator({
    tags: context.tags,
    releases: context.releases,
    params: context.params,
    resolver: context.resolver,
    logger: context.logger,
    pipeline: context.pipeline,
    pipelineConfig: context.config.concourse.pipelineConfig,
    defaultBump: context.config.tags.defaultBump,
    confirm: options.confirm,
    dryRun: options.dryRun,
  });
}
