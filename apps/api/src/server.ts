/**
 * Server bootstrap
 *
 * @module @autopr/api/server
 */

import type { Server } from 'http';
import { createLogger, loadConfig, type AppConfig } from '@autopr/core';
import { createOrchestrator, type PROrchestrator } from '@autopr/engine';
import { createApp } from './app.js';

const logger = createLogger('api');

export interface RunningServer {
  server: Server;
  orchestrator: PROrchestrator;
  /** Stop accepting connections and wait for background tasks */
  close(): Promise<void>;
}

export function startServer(config: AppConfig = loadConfig()): RunningServer {
  const orchestrator = createOrchestrator(config);
  const app = createApp({ orchestrator, logger });

  const server = app.listen(config.port, () => {
    logger.info('API listening', {
      port: config.port,
      gatewayBackend: config.gatewayBackend,
      commitStrategy: config.commitStrategy,
      generatorConfigured: config.generator.url !== undefined,
    });
  });

  const close = async (): Promise<void> => {
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
    await orchestrator.drain();
  };

  return { server, orchestrator, close };
}
