/**
 * Branch Naming
 *
 * Collision-resistant branch names derived from free text, and validation
 * against git ref-name rules.
 *
 * @module @autopr/core/git/branch-naming
 */

import { randomBytes } from 'crypto';
import { NameGenerationExhaustedError, ValidationError } from '../reliability/errors.js';

// =============================================================================
// Validation
// =============================================================================

export const MAX_BRANCH_NAME_LENGTH = 250;

export type BranchNameRule =
  | 'empty'
  | 'too-long'
  | 'whitespace-or-control'
  | 'forbidden-character'
  | 'double-dot'
  | 'at-brace'
  | 'lone-at'
  | 'leading-slash'
  | 'trailing-slash'
  | 'double-slash'
  | 'leading-dot'
  | 'trailing-dot'
  | 'component-leading-dot'
  | 'lock-suffix'
  | 'leading-dash';

export type BranchNameValidation =
  | { valid: true }
  | { valid: false; rule: BranchNameRule; message: string };

interface RuleCheck {
  rule: BranchNameRule;
  message: string;
  violated: (name: string) => boolean;
}

const RULES: RuleCheck[] = [
  { rule: 'empty', message: 'Branch name is empty', violated: (n) => n.length === 0 },
  {
    rule: 'too-long',
    message: `Branch name exceeds ${MAX_BRANCH_NAME_LENGTH} characters`,
    violated: (n) => n.length > MAX_BRANCH_NAME_LENGTH,
  },
  {
    rule: 'whitespace-or-control',
    message: 'Branch name contains whitespace or control characters',
    violated: (n) => /[\s\x00-\x1f\x7f]/.test(n),
  },
  {
    rule: 'forbidden-character',
    message: 'Branch name contains one of ~ ^ : ? * [ \\',
    violated: (n) => /[~^:?*[\\]/.test(n),
  },
  { rule: 'double-dot', message: "Branch name contains '..'", violated: (n) => n.includes('..') },
  { rule: 'at-brace', message: "Branch name contains '@{'", violated: (n) => n.includes('@{') },
  { rule: 'lone-at', message: "Branch name cannot be '@'", violated: (n) => n === '@' },
  { rule: 'leading-slash', message: "Branch name starts with '/'", violated: (n) => n.startsWith('/') },
  { rule: 'trailing-slash', message: "Branch name ends with '/'", violated: (n) => n.endsWith('/') },
  { rule: 'double-slash', message: "Branch name contains '//'", violated: (n) => n.includes('//') },
  { rule: 'leading-dot', message: "Branch name starts with '.'", violated: (n) => n.startsWith('.') },
  { rule: 'trailing-dot', message: "Branch name ends with '.'", violated: (n) => n.endsWith('.') },
  {
    rule: 'component-leading-dot',
    message: "A path component starts with '.'",
    violated: (n) => n.split('/').some((c) => c.startsWith('.')),
  },
  {
    rule: 'lock-suffix',
    message: "A path component ends with '.lock'",
    violated: (n) => n.split('/').some((c) => c.endsWith('.lock')),
  },
  { rule: 'leading-dash', message: "Branch name starts with '-'", violated: (n) => n.startsWith('-') },
];

/**
 * Check a branch name against ref-name rules; reports the first violated rule
 */
export function validateBranchName(name: string): BranchNameValidation {
  for (const check of RULES) {
    if (check.violated(name)) {
      return { valid: false, rule: check.rule, message: check.message };
    }
  }
  return { valid: true };
}

// =============================================================================
// Generation
// =============================================================================

export const DEFAULT_SLUG_LENGTH = 40;
export const DEFAULT_BRANCH_PREFIX = 'autopr/';
export const DEFAULT_NAME_ATTEMPTS = 5;

/**
 * Lower-case slug with non-alphanumeric runs collapsed to one hyphen
 */
export function slugifyBranchBase(text: string, maxLength = DEFAULT_SLUG_LENGTH): string {
  const slug = text
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, maxLength)
    .replace(/-+$/, '');

  return slug === '' ? 'change' : slug;
}

/**
 * `<base36 millis>-<4 hex>`
 */
export function defaultBranchSuffix(): string {
  return `${Date.now().toString(36)}-${randomBytes(2).toString('hex')}`;
}

export type BranchExistsCheck = (name: string) => Promise<boolean>;

export interface BranchNameOptions {
  prefix?: string;
  maxAttempts?: number;
  slugLength?: number;
  suffix?: () => string;
}

/**
 * Generate a branch name the existence check reports as free.
 *
 * Each attempt draws a fresh suffix. After `maxAttempts` collisions the
 * call fails with NameGenerationExhaustedError listing every candidate.
 */
export async function generateUniqueBranchName(
  baseName: string,
  isTaken: BranchExistsCheck,
  options: BranchNameOptions = {}
): Promise<string> {
  const prefix = options.prefix ?? DEFAULT_BRANCH_PREFIX;
  const maxAttempts = options.maxAttempts ?? DEFAULT_NAME_ATTEMPTS;
  const suffix = options.suffix ?? defaultBranchSuffix;
  const slug = slugifyBranchBase(baseName, options.slugLength);

  const candidates: string[] = [];
  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    const candidate = `${prefix}${slug}-${slugifyBranchBase(suffix(), 32)}`;

    const validation = validateBranchName(candidate);
    if (!validation.valid) {
      throw new ValidationError(`Generated branch name '${candidate}' is invalid: ${validation.message}`, {
        context: { rule: validation.rule, prefix },
      });
    }

    candidates.push(candidate);
    if (!(await isTaken(candidate))) {
      return candidate;
    }
  }

  throw new NameGenerationExhaustedError(baseName, candidates);
}
