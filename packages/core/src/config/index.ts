/**
 * Configuration
 *
 * Environment variables are validated once with zod and exposed as a
 * frozen, typed object. Every invalid variable is reported together.
 *
 * @module @autopr/core/config
 */

import { z } from 'zod';
import { ValidationError } from '../reliability/errors.js';
import { SEVERITIES, type Severity } from '../telemetry/context.js';

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== '' ? value.trim() : undefined));

const EnvSchema = z.object({
  GITHUB_TOKEN: optionalString,
  GITHUB_HOST: z.string().min(1).default('github.com'),
  AUTOPR_GATEWAY_BACKEND: z.enum(['github', 'memory']).default('github'),
  AUTOPR_REQUEST_TIMEOUT_MS: positiveInt(15000),
  AUTOPR_RETRY_MAX_ATTEMPTS: positiveInt(3),
  AUTOPR_RETRY_BASE_DELAY_MS: positiveInt(500),
  AUTOPR_RETRY_MAX_DELAY_MS: positiveInt(8000),
  AUTOPR_RATE_LIMIT_MAX_WAIT_MS: positiveInt(60000),
  AUTOPR_MAX_FILE_BYTES: positiveInt(1024 * 1024),
  AUTOPR_BRANCH_PREFIX: z
    .string()
    .regex(/^[a-z0-9][a-z0-9._-]*\/$/, 'must be lower-case and end with "/"')
    .default('autopr/'),
  AUTOPR_COMMIT_STRATEGY: z.enum(['tree', 'per-file']).default('tree'),
  AUTOPR_GENERATOR_URL: optionalString.pipe(z.string().url().optional()),
  AUTOPR_GENERATOR_API_KEY: optionalString,
  AUTOPR_GENERATOR_TIMEOUT_MS: positiveInt(120000),
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  LOG_LEVEL: z
    .string()
    .default('INFO')
    .transform((value) => value.toUpperCase())
    .pipe(z.enum(SEVERITIES)),
});

export type CommitStrategy = 'tree' | 'per-file';
export type GatewayBackend = 'github' | 'memory';

export interface AppConfig {
  github: {
    token?: string;
    host: string;
  };
  gatewayBackend: GatewayBackend;
  requestTimeoutMs: number;
  retry: {
    maxAttempts: number;
    initialDelayMs: number;
    maxDelayMs: number;
    maxRateLimitWaitMs: number;
  };
  maxFileBytes: number;
  branchPrefix: string;
  commitStrategy: CommitStrategy;
  generator: {
    url?: string;
    apiKey?: string;
    timeoutMs: number;
  };
  port: number;
  logLevel: Severity;
}

/**
 * Load and validate configuration from the environment
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): Readonly<AppConfig> {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const fieldErrors: Record<string, string> = {};
    for (const issue of parsed.error.issues) {
      fieldErrors[issue.path.join('.')] = issue.message;
    }
    throw new ValidationError('Invalid configuration', { fieldErrors });
  }

  const e = parsed.data;
  if (e.AUTOPR_GATEWAY_BACKEND === 'github' && !e.GITHUB_TOKEN) {
    throw new ValidationError('GITHUB_TOKEN is required for the github backend', {
      fieldErrors: { GITHUB_TOKEN: 'Required' },
    });
  }

  return Object.freeze({
    github: { token: e.GITHUB_TOKEN, host: e.GITHUB_HOST },
    gatewayBackend: e.AUTOPR_GATEWAY_BACKEND,
    requestTimeoutMs: e.AUTOPR_REQUEST_TIMEOUT_MS,
    retry: {
      maxAttempts: e.AUTOPR_RETRY_MAX_ATTEMPTS,
      initialDelayMs: e.AUTOPR_RETRY_BASE_DELAY_MS,
      maxDelayMs: e.AUTOPR_RETRY_MAX_DELAY_MS,
      maxRateLimitWaitMs: e.AUTOPR_RATE_LIMIT_MAX_WAIT_MS,
    },
    maxFileBytes: e.AUTOPR_MAX_FILE_BYTES,
    branchPrefix: e.AUTOPR_BRANCH_PREFIX,
    commitStrategy: e.AUTOPR_COMMIT_STRATEGY,
    generator: {
      url: e.AUTOPR_GENERATOR_URL,
      apiKey: e.AUTOPR_GENERATOR_API_KEY,
      timeoutMs: e.AUTOPR_GENERATOR_TIMEOUT_MS,
    },
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
  });
}
