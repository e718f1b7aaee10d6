/**
 * Change Generator contract
 *
 * Natural-language-to-code generation is an external collaborator: the
 * workflow hands it the analyzed repository and the free-text request and
 * gets proposed file contents back.
 *
 * @module @autopr/engine/generation/change-generator
 */

import { z } from 'zod';
import { GenerationError, ProposedChange } from '@autopr/core';
import type { RepositoryAnalysis } from '../analysis/repository-analyzer.js';

export interface GenerationInput {
  requestId: string;
  freeTextRequest: string;
  repository: RepositoryAnalysis;
}

export const GenerationResult = z.object({
  changes: z.array(ProposedChange),
  summary: z.string().optional(),
  prTitle: z.string().optional(),
  prDescription: z.string().optional(),
});
export type GenerationResult = z.infer<typeof GenerationResult>;
export type GenerationResultInput = z.input<typeof GenerationResult>;

export interface ChangeGenerator {
  generate(input: GenerationInput): Promise<GenerationResultInput>;
}

/**
 * Stand-in used when no generator endpoint is configured
 */
export class UnconfiguredChangeGenerator implements ChangeGenerator {
  async generate(): Promise<GenerationResultInput> {
    throw new GenerationError('No change generator is configured. Set AUTOPR_GENERATOR_URL.');
  }
}

/**
 * Validate whatever a generator returned
 */
export function parseGenerationResult(raw: unknown): GenerationResult {
  const parsed = GenerationResult.safeParse(raw);
  if (!parsed.success) {
    throw new GenerationError('Change generator returned a malformed result', {
      context: {
        issues: parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`),
      },
    });
  }
  return parsed.data;
}
