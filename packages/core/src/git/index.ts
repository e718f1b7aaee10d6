export * from './branch-naming.js';
export * from './diff.js';
export * from './commit-message.js';
