/**
 * Change Validator
 *
 * Policy checks applied to a proposed change set before anything reaches
 * the Repository Gateway. Each entry ends up `valid`, `warning` or
 * `invalid`; a single invalid entry makes the whole set invalid, and only
 * valid and warning entries are handed on as accepted changes.
 *
 * @module @autopr/engine/validation/change-validator
 */

import { posix } from 'path';
import {
  generateId,
  isChangeOperation,
  validateBranchName,
  type AcceptedChange,
  type ChangeSetEntry,
  type ProposedChange,
  type ValidationIssue,
  type ValidationStatus,
} from '@autopr/core';

// =============================================================================
// Types
// =============================================================================

export interface ChangeValidatorConfig {
  /** Size ceiling for proposed content, in UTF-8 bytes */
  maxFileBytes: number;
  /** Share of the ceiling above which a warning is raised (default: 0.8) */
  warningRatio?: number;
}

export interface ValidationFinding extends ValidationIssue {
  entryId: string;
  filePath: string;
}

export interface ValidationReport {
  verdict: ValidationStatus;
  entries: readonly ChangeSetEntry[];
  accepted: AcceptedChange[];
  violations: ValidationFinding[];
  warnings: ValidationFinding[];
}

// =============================================================================
// Rules
// =============================================================================

const CONTROL_CHARS = /[\u0000-\u001f\u007f]/;
const DRIVE_LETTER = /^[a-zA-Z]:/;

const SENSITIVE_FILES: RegExp[] = [
  /^\.env(\..*)?$/i,
  /^id_(rsa|dsa|ecdsa|ed25519)(\.pub)?$/,
  /\.(pem|key|p12|pfx)$/i,
  /^\.(npmrc|netrc|pypirc)$/,
  /^authorized_keys$/,
];

const ALLOWED_HIDDEN = new Set(['.github', '.vscode', '.gitignore', '.gitattributes', '.editorconfig']);

const SUSPICIOUS_CONTENT: Array<{ pattern: RegExp; label: string }> = [
  { pattern: /rm\s+-rf\s+\/(\s|$)/, label: 'rm -rf /' },
  { pattern: /sudo\s+rm\s/, label: 'sudo rm' },
  { pattern: /curl\s+[^|\n]*\|\s*(ba)?sh\b/, label: 'curl | sh' },
  { pattern: /wget\s+[^|\n]*\|\s*(ba)?sh\b/, label: 'wget | sh' },
];

/**
 * Normalised repository-relative path, or undefined when the path leaves
 * the repository root
 */
export function normalizeRepositoryPath(filePath: string): string | undefined {
  const normalized = posix.normalize(filePath.replace(/\\/g, '/'));
  if (normalized === '..' || normalized.startsWith('../')) {
    return undefined;
  }
  return normalized.replace(/^\.\//, '').replace(/\/+$/, '');
}

function error(rule: string, message: string): ValidationIssue {
  return { rule, severity: 'error', message };
}

function warning(rule: string, message: string): ValidationIssue {
  return { rule, severity: 'warning', message };
}

function checkPath(filePath: string): { issues: ValidationIssue[]; normalized?: string } {
  if (filePath.trim() === '') {
    return { issues: [error('empty-path', 'File path is empty')] };
  }
  if (CONTROL_CHARS.test(filePath)) {
    return { issues: [error('control-characters', 'File path contains control characters')] };
  }
  if (filePath.startsWith('/') || filePath.startsWith('\\') || DRIVE_LETTER.test(filePath)) {
    return { issues: [error('absolute-path', `'${filePath}' is absolute`)] };
  }

  const normalized = normalizeRepositoryPath(filePath);
  if (normalized === undefined) {
    return { issues: [error('path-escape', `'${filePath}' escapes the repository root`)] };
  }
  if (normalized === '' || normalized === '.') {
    return { issues: [error('empty-path', `'${filePath}' resolves to the repository root`)] };
  }

  const issues: ValidationIssue[] = [];
  const segments = normalized.split('/');
  const fileName = segments[segments.length - 1];

  if (segments.some((s) => s.toLowerCase() === '.git')) {
    issues.push(error('git-internals', `'${filePath}' is inside .git`));
  }
  if (SENSITIVE_FILES.some((p) => p.test(fileName))) {
    issues.push(error('sensitive-file', `'${filePath}' looks like a credential or secret file`));
  }

  const hidden = segments.filter((s) => s.startsWith('.') && s.toLowerCase() !== '.git' && !ALLOWED_HIDDEN.has(s));
  if (hidden.length > 0 && issues.length === 0) {
    issues.push(warning('hidden-path', `'${filePath}' touches hidden path '${hidden[0]}'`));
  }

  return { issues, normalized };
}

// =============================================================================
// Validator
// =============================================================================

export class ChangeValidator {
  private readonly maxFileBytes: number;
  private readonly warningBytes: number;

  constructor(config: ChangeValidatorConfig) {
    this.maxFileBytes = config.maxFileBytes;
    this.warningBytes = Math.floor(config.maxFileBytes * (config.warningRatio ?? 0.8));
  }

  /**
   * Check a caller-supplied branch name against ref rules
   */
  checkBranchName(name: string): ValidationIssue | undefined {
    const result = validateBranchName(name);
    return result.valid ? undefined : error(`branch-${result.rule}`, result.message);
  }

  private checkEntry(change: ProposedChange, seen: Set<string>): { issues: ValidationIssue[]; normalized?: string } {
    const { issues, normalized } = checkPath(change.filePath);

    if (normalized !== undefined) {
      if (seen.has(normalized)) {
        issues.push(error('duplicate-path', `'${change.filePath}' appears more than once`));
      }
      seen.add(normalized);
    }

    const { operation, originalContent, proposedContent } = change;
    if (!isChangeOperation(operation)) {
      issues.push(error('unknown-operation', `Operation '${operation}' is not create, modify or delete`));
      return { issues, normalized };
    }

    if (operation !== 'delete' && proposedContent === undefined) {
      issues.push(error('missing-proposed-content', `${operation} of '${change.filePath}' has no proposed content`));
    }
    if (operation !== 'create' && originalContent === undefined) {
      issues.push(error('missing-original-content', `${operation} of '${change.filePath}' has no original content`));
    }
    if (operation === 'create' && originalContent !== undefined) {
      issues.push(warning('unexpected-original-content', `create of '${change.filePath}' carries original content`));
    }
    if (operation === 'delete' && proposedContent !== undefined) {
      issues.push(warning('unexpected-proposed-content', `delete of '${change.filePath}' carries proposed content`));
    }
    if (operation === 'modify' && proposedContent !== undefined && proposedContent === originalContent) {
      issues.push(warning('no-op-modify', `modify of '${change.filePath}' does not change the file`));
    }

    if (operation !== 'delete' && proposedContent !== undefined) {
      const bytes = Buffer.byteLength(proposedContent, 'utf8');
      if (bytes > this.maxFileBytes) {
        issues.push(error('size-limit', `'${change.filePath}' is ${bytes} bytes, over the ${this.maxFileBytes} byte limit`));
      } else if (bytes > this.warningBytes) {
        issues.push(warning('near-size-limit', `'${change.filePath}' is ${bytes} bytes, close to the limit`));
      }

      const suspicious = SUSPICIOUS_CONTENT.find((s) => s.pattern.test(proposedContent));
      if (suspicious) {
        issues.push(warning('suspicious-content', `'${change.filePath}' contains '${suspicious.label}'`));
      }
    }

    if (change.summary.trim() === '') {
      issues.push(warning('missing-summary', `'${change.filePath}' has no change summary`));
    }

    return { issues, normalized };
  }

  validate(requestId: string, changes: readonly ProposedChange[]): ValidationReport {
    const seen = new Set<string>();
    const entries: ChangeSetEntry[] = [];
    const accepted: AcceptedChange[] = [];
    const violations: ValidationFinding[] = [];
    const warnings: ValidationFinding[] = [];

    for (const change of changes) {
      const { issues, normalized } = this.checkEntry(change, seen);
      const status: ValidationStatus = issues.some((i) => i.severity === 'error')
        ? 'invalid'
        : issues.length > 0
          ? 'warning'
          : 'valid';

      const entry: ChangeSetEntry = Object.freeze({
        id: generateId('chg'),
        requestId,
        filePath: change.filePath,
        operation: change.operation,
        originalContent: change.originalContent,
        proposedContent: change.proposedContent,
        summary: change.summary,
        validationStatus: status,
        issues: Object.freeze(issues),
      });
      entries.push(entry);

      for (const issue of issues) {
        const finding = { ...issue, entryId: entry.id, filePath: change.filePath };
        (issue.severity === 'error' ? violations : warnings).push(finding);
      }

      if (status !== 'invalid' && normalized !== undefined && isChangeOperation(change.operation)) {
        accepted.push({
          entryId: entry.id,
          filePath: normalized,
          operation: change.operation,
          originalContent: change.originalContent,
          proposedContent: change.operation === 'delete' ? undefined : change.proposedContent,
          summary: change.summary,
        });
      }
    }

    const verdict: ValidationStatus =
      violations.length > 0 ? 'invalid' : warnings.length > 0 ? 'warning' : 'valid';

    return {
      verdict,
      entries: Object.freeze(entries),
      accepted: verdict === 'invalid' ? [] : accepted,
      violations,
      warnings,
    };
  }
}
