/**
 * @autopr/engine
 *
 * The PR workflow: repository analysis, change generation, validation,
 * branch preparation, commit and pull request creation, run in the
 * foreground or on a background worker.
 *
 * @module @autopr/engine
 */

export * from './run/state-machine.js';
export * from './run/workflow-run.js';
export * from './tasks/task-runner.js';
export * from './analysis/repository-analyzer.js';
export * from './generation/change-generator.js';
export * from './generation/http-generator.js';
export * from './validation/change-validator.js';
export * from './orchestrator/pr-content.js';
export * from './orchestrator/pr-orchestrator.js';
export * from './orchestrator/factory.js';
