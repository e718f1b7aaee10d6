/**
 * Pull request title, body and next-step guidance.
 *
 * @module @autopr/engine/orchestrator/pr-content
 */

import { calculateDiff, type AcceptedChange, type ErrorBody } from '@autopr/core';
import type { ValidationFinding } from '../validation/change-validator.js';

export const TITLE_REQUEST_LENGTH = 60;

/**
 * Collapse whitespace and cut to `max` characters, marking the cut
 */
export function shortenRequest(text: string, max = TITLE_REQUEST_LENGTH): string {
  const flat = text.trim().replace(/\s+/g, ' ');
  if (flat.length <= max) return flat;
  return `${flat.slice(0, max - 3).trimEnd()}...`;
}

export function synthesizeTitle(freeTextRequest: string): string {
  return `Automated change: ${shortenRequest(freeTextRequest)}`;
}

export interface PullRequestBodyInput {
  freeTextRequest: string;
  summary?: string;
  changes: readonly AcceptedChange[];
  warnings: readonly ValidationFinding[];
  commitSha?: string;
}

/**
 * Markdown body: request, generator summary, files with diff stats,
 * validator warnings and the commit sha
 */
export function buildPullRequestBody(input: PullRequestBodyInput): string {
  const lines: string[] = ['## Request', '', `> ${input.freeTextRequest.trim().replace(/\n/g, '\n> ')}`, ''];

  if (input.summary && input.summary.trim() !== '') {
    lines.push('## Summary', '', input.summary.trim(), '');
  }

  lines.push('## Files', '');
  for (const change of input.changes) {
    const diff = calculateDiff(change.originalContent, change.proposedContent, change.filePath);
    lines.push(`- \`${change.filePath}\` (${change.operation}, +${diff.additions}/-${diff.deletions})`);
  }
  lines.push('');

  if (input.warnings.length > 0) {
    lines.push('## Validation warnings', '');
    for (const w of input.warnings) {
      lines.push(`- \`${w.filePath}\`: ${w.message}`);
    }
    lines.push('');
  }

  if (input.commitSha) {
    lines.push(`Commit: ${input.commitSha}`);
  }

  return lines.join('\n').trimEnd();
}

// =============================================================================
// Next steps
// =============================================================================

export function successNextSteps(prUrl: string, merged: boolean, existing: boolean): string[] {
  if (merged) {
    return [`The pull request was merged: ${prUrl}`, 'Delete the branch once you no longer need it'];
  }
  return [
    existing ? `An open pull request already existed for this branch: ${prUrl}` : `Review the pull request: ${prUrl}`,
    'Request reviewers and merge once checks pass',
  ];
}

export function processingNextSteps(requestId: string, pollingLocation?: string): string[] {
  return [
    pollingLocation ? `Poll ${pollingLocation} for progress` : `Poll the status of request ${requestId}`,
    'The pull request URL is reported once the run completes',
  ];
}

export interface LeftoverState {
  branchName?: string;
  commitSha?: string;
  committedFiles: readonly string[];
}

export function failureNextSteps(error: ErrorBody, leftover: LeftoverState): string[] {
  const steps = [...error.suggestions];
  if (leftover.committedFiles.length > 0 && leftover.branchName) {
    steps.push(
      `Branch '${leftover.branchName}' holds ${leftover.committedFiles.length} committed file(s): ${leftover.committedFiles.join(', ')}`
    );
  } else if (leftover.commitSha && leftover.branchName) {
    steps.push(`Branch '${leftover.branchName}' holds commit ${leftover.commitSha}; open a pull request manually or delete it`);
  } else if (leftover.branchName) {
    steps.push(`Branch '${leftover.branchName}' was created and left in place`);
  }
  return steps;
}
