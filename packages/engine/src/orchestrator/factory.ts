/**
 * Orchestrator wiring from application config.
 *
 * @module @autopr/engine/orchestrator/factory
 */

import type { AppConfig } from '@autopr/core';
import { createRepositoryGateway, type RepositoryGateway } from '@autopr/integrations';
import { UnconfiguredChangeGenerator, type ChangeGenerator } from '../generation/change-generator.js';
import { HttpChangeGenerator } from '../generation/http-generator.js';
import type { BackgroundTaskRunner } from '../tasks/task-runner.js';
import { PROrchestrator } from './pr-orchestrator.js';

export interface OrchestratorOverrides {
  gateway?: RepositoryGateway;
  generator?: ChangeGenerator;
  taskRunner?: BackgroundTaskRunner;
}

export function createChangeGenerator(config: AppConfig): ChangeGenerator {
  if (!config.generator.url) {
    return new UnconfiguredChangeGenerator();
  }
  return new HttpChangeGenerator({
    url: config.generator.url,
    apiKey: config.generator.apiKey,
    timeoutMs: config.generator.timeoutMs,
  });
}

export function createOrchestrator(config: AppConfig, overrides: OrchestratorOverrides = {}): PROrchestrator {
  return new PROrchestrator({
    gateway: overrides.gateway ?? createRepositoryGateway(config),
    generator: overrides.generator ?? createChangeGenerator(config),
    taskRunner: overrides.taskRunner,
    settings: {
      maxFileBytes: config.maxFileBytes,
      branchPrefix: config.branchPrefix,
      commitStrategy: config.commitStrategy,
      defaultHost: config.github.host,
    },
  });
}
