/**
 * HTTP Change Generator
 *
 * Posts the generation input as JSON to an external service and validates
 * the reply. Transport failures and malformed replies both surface as
 * GenerationError; the workflow never retries generation.
 *
 * @module @autopr/engine/generation/http-generator
 */

import axios, { type AxiosInstance } from 'axios';
import { createLogger, GenerationError } from '@autopr/core';
import {
  parseGenerationResult,
  type ChangeGenerator,
  type GenerationInput,
  type GenerationResult,
} from './change-generator.js';

const logger = createLogger('http-generator');

export interface HttpChangeGeneratorConfig {
  /** Full URL of the generation endpoint */
  url: string;
  /** Request timeout in ms (default: 120000) */
  timeoutMs?: number;
  /** Sent as a bearer token when set */
  apiKey?: string;
}

export class HttpChangeGenerator implements ChangeGenerator {
  private readonly client: AxiosInstance;

  constructor(private readonly config: HttpChangeGeneratorConfig) {
    this.client = axios.create({
      timeout: config.timeoutMs ?? 120000,
      headers: {
        'Content-Type': 'application/json',
        ...(config.apiKey ? { Authorization: `Bearer ${config.apiKey}` } : {}),
      },
    });
  }

  async generate(input: GenerationInput): Promise<GenerationResult> {
    const started = Date.now();
    let data: unknown;
    try {
      const response = await this.client.post<unknown>(this.config.url, {
        requestId: input.requestId,
        freeTextRequest: input.freeTextRequest,
        repository: input.repository,
      });
      data = response.data;
    } catch (error) {
      const status = axios.isAxiosError(error) ? error.response?.status : undefined;
      logger.warn('Change generator call failed', { status, durationMs: Date.now() - started });
      throw new GenerationError(
        status !== undefined
          ? `Change generator responded with HTTP ${status}`
          : `Change generator unreachable: ${error instanceof Error ? error.message : String(error)}`,
        { context: status !== undefined ? { status } : undefined, cause: error }
      );
    }

    const result = parseGenerationResult(data);
    logger.info('Change generator replied', {
      changes: result.changes.length,
      durationMs: Date.now() - started,
    });
    return result;
  }
}
