/**
 * @autopr/api
 *
 * @module @autopr/api
 */

export { createApp, type AppOptions } from './app.js';
export { startServer, type RunningServer } from './server.js';
