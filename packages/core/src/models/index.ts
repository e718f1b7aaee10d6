export * from './locator.js';
export * from './pr-request.js';
export * from './change-set.js';
export * from './workflow.js';
