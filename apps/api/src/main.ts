/**
 * API entry point, run with `npm start`
 *
 * @module @autopr/api/main
 */

import { createLogger } from '@autopr/core';
import { startServer } from './server.js';

const logger = createLogger('api');
const running = startServer();

process.once('SIGTERM', () => {
  logger.info('Shutting down; waiting for background tasks');
  running.close().then(
    () => process.exit(0),
    (error: unknown) => {
      logger.error('Shutdown failed', error);
      process.exit(1);
    }
  );
});
