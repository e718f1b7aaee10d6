/**
 * Commit message template:
 *
 * ```
 * <Imperative summary, at most 72 characters>
 *
 * - path/to/file (create)
 * - other/file (modify)
 * ```
 *
 * @module @autopr/core/git/commit-message
 */

import type { ChangeOperation } from '../models/change-set.js';

export const MAX_SUMMARY_LENGTH = 72;

export interface CommitFile {
  filePath: string;
  operation: ChangeOperation;
}

function synthesizeSummary(files: CommitFile[]): string {
  if (files.length === 0) {
    return 'Update repository';
  }
  const operations = new Set(files.map((f) => f.operation));
  const verb =
    operations.size === 1 && operations.has('create')
      ? 'Add'
      : operations.size === 1 && operations.has('delete')
        ? 'Remove'
        : 'Update';
  const subject = files.length === 1 ? files[0].filePath : `${files.length} files`;
  return `${verb} ${subject}`;
}

/**
 * Truncate to `max` code points, marking the cut with '...'
 */
export function truncateSummary(summary: string, max = MAX_SUMMARY_LENGTH): string {
  const chars = Array.from(summary);
  if (chars.length <= max) return summary;
  return `${chars.slice(0, Math.max(0, max - 3)).join('').trimEnd()}...`;
}

export function buildCommitMessage(
  summary: string,
  files: CommitFile[],
  maxSummaryLength = MAX_SUMMARY_LENGTH
): string {
  const firstLine = (summary.split('\n')[0] ?? '')
    .trim()
    .replace(/\s+/g, ' ')
    .replace(/\.+$/, '');

  const base = firstLine === '' ? synthesizeSummary(files) : firstLine;
  const subject = truncateSummary(base.charAt(0).toUpperCase() + base.slice(1), maxSummaryLength);

  if (files.length === 0) {
    return subject;
  }
  return [subject, '', ...files.map((f) => `- ${f.filePath} (${f.operation})`)].join('\n');
}
