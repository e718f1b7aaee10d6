/**
 * Gateway selection from application config.
 *
 * @module @autopr/integrations/github/factory
 */

import type { AppConfig } from '@autopr/core';
import type { RepositoryGateway } from './gateway.js';
import { InMemoryRepositoryGateway } from './memory-gateway.js';
import { OctokitRepositoryGateway } from './octokit-gateway.js';

export function createRepositoryGateway(config: AppConfig): RepositoryGateway {
  const retryPolicy = {
    maxAttempts: config.retry.maxAttempts,
    initialDelayMs: config.retry.initialDelayMs,
    maxDelayMs: config.retry.maxDelayMs,
    maxRateLimitWaitMs: config.retry.maxRateLimitWaitMs,
  };

  if (config.gatewayBackend === 'memory') {
    return new InMemoryRepositoryGateway({ retryPolicy, timeoutMs: config.requestTimeoutMs });
  }

  return new OctokitRepositoryGateway({
    token: config.github.token ?? '',
    timeoutMs: config.requestTimeoutMs,
    retryPolicy,
  });
}
