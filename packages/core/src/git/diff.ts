/**
 * Line Diff
 *
 * Line-oriented diff between original and proposed file content, rendered
 * as unified-diff hunks. A missing side is treated as empty, so creates and
 * deletes come out as pure additions or removals.
 *
 * Contract:
 * - Deterministic: identical inputs always produce identical output
 * - `calculateDiff(x, x)` has no hunks and empty unified text
 * - Hunk line numbers are 1-based; an empty range starts at the line before
 *
 * @module @autopr/core/git/diff
 */

// =============================================================================
// Types
// =============================================================================

export type DiffChangeType = 'create' | 'modify' | 'delete' | 'unchanged';

export type DiffLineKind = 'context' | 'add' | 'remove';

export interface DiffLine {
  kind: DiffLineKind;
  text: string;
}

export interface DiffHunk {
  oldStart: number;
  oldLines: number;
  newStart: number;
  newLines: number;
  lines: DiffLine[];
}

export interface FileDiff {
  filePath: string;
  changeType: DiffChangeType;
  additions: number;
  deletions: number;
  hunks: DiffHunk[];
  /** Unified diff text, empty when nothing changed */
  unified: string;
}

export interface DiffSummary {
  files: number;
  additions: number;
  deletions: number;
  created: number;
  modified: number;
  deleted: number;
}

export const DEFAULT_CONTEXT_LINES = 3;

/**
 * Above this many LCS table cells the changed region is emitted as one
 * remove block followed by one add block.
 */
const MAX_LCS_CELLS = 4_000_000;

// =============================================================================
// Helpers
// =============================================================================

function splitLines(text: string | undefined): string[] {
  if (text === undefined || text === '') return [];
  const lines = text.split('\n');
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

interface EditOp {
  kind: DiffLineKind;
  text: string;
  /** Old-side lines before this op */
  oldBefore: number;
  /** New-side lines before this op */
  newBefore: number;
}

/**
 * Edit script for the region between the common prefix and suffix, using
 * an LCS table indexed from the end so the walk can go forward.
 */
function middleEdits(a: string[], b: string[]): Array<{ kind: DiffLineKind; text: string }> {
  const m = a.length;
  const n = b.length;
  const edits: Array<{ kind: DiffLineKind; text: string }> = [];

  if ((m + 1) * (n + 1) > MAX_LCS_CELLS) {
    for (const text of a) edits.push({ kind: 'remove', text });
    for (const text of b) edits.push({ kind: 'add', text });
    return edits;
  }

  const dp: number[][] = Array.from({ length: m + 1 }, () => new Array<number>(n + 1).fill(0));
  for (let i = m - 1; i >= 0; i--) {
    for (let j = n - 1; j >= 0; j--) {
      dp[i][j] = a[i] === b[j] ? dp[i + 1][j + 1] + 1 : Math.max(dp[i + 1][j], dp[i][j + 1]);
    }
  }

  let i = 0;
  let j = 0;
  while (i < m && j < n) {
    if (a[i] === b[j]) {
      edits.push({ kind: 'context', text: a[i] });
      i++;
      j++;
    } else if (dp[i + 1][j] >= dp[i][j + 1]) {
      edits.push({ kind: 'remove', text: a[i] });
      i++;
    } else {
      edits.push({ kind: 'add', text: b[j] });
      j++;
    }
  }
  for (; i < m; i++) edits.push({ kind: 'remove', text: a[i] });
  for (; j < n; j++) edits.push({ kind: 'add', text: b[j] });

  return edits;
}

function editScript(a: string[], b: string[]): EditOp[] {
  let prefix = 0;
  while (prefix < a.length && prefix < b.length && a[prefix] === b[prefix]) {
    prefix++;
  }
  let suffix = 0;
  while (
    suffix < a.length - prefix &&
    suffix < b.length - prefix &&
    a[a.length - 1 - suffix] === b[b.length - 1 - suffix]
  ) {
    suffix++;
  }

  const raw: Array<{ kind: DiffLineKind; text: string }> = [
    ...a.slice(0, prefix).map((text) => ({ kind: 'context' as const, text })),
    ...middleEdits(a.slice(prefix, a.length - suffix), b.slice(prefix, b.length - suffix)),
    ...a.slice(a.length - suffix).map((text) => ({ kind: 'context' as const, text })),
  ];

  let oldBefore = 0;
  let newBefore = 0;
  return raw.map((edit) => {
    const op: EditOp = { ...edit, oldBefore, newBefore };
    if (edit.kind !== 'add') oldBefore++;
    if (edit.kind !== 'remove') newBefore++;
    return op;
  });
}

function buildHunks(ops: EditOp[], context: number): DiffHunk[] {
  const changed = ops.flatMap((op, index) => (op.kind === 'context' ? [] : [index]));
  if (changed.length === 0) return [];

  // Merge change indices whose context windows touch
  const ranges: Array<[number, number]> = [];
  for (const index of changed) {
    const start = Math.max(0, index - context);
    const end = Math.min(ops.length - 1, index + context);
    const last = ranges[ranges.length - 1];
    if (last && start <= last[1] + 1) {
      last[1] = end;
    } else {
      ranges.push([start, end]);
    }
  }

  return ranges.map(([start, end]) => {
    const slice = ops.slice(start, end + 1);
    const oldLines = slice.filter((op) => op.kind !== 'add').length;
    const newLines = slice.filter((op) => op.kind !== 'remove').length;
    return {
      oldStart: oldLines > 0 ? slice[0].oldBefore + 1 : slice[0].oldBefore,
      oldLines,
      newStart: newLines > 0 ? slice[0].newBefore + 1 : slice[0].newBefore,
      newLines,
      lines: slice.map((op) => ({ kind: op.kind, text: op.text })),
    };
  });
}

function formatRange(start: number, count: number): string {
  return count === 1 ? `${start}` : `${start},${count}`;
}

const LINE_PREFIX: Record<DiffLineKind, string> = {
  context: ' ',
  add: '+',
  remove: '-',
};

function renderUnified(
  filePath: string,
  hunks: DiffHunk[],
  hasOriginal: boolean,
  hasProposed: boolean
): string {
  if (hunks.length === 0) return '';

  const out = [
    hasOriginal ? `--- a/${filePath}` : '--- /dev/null',
    hasProposed ? `+++ b/${filePath}` : '+++ /dev/null',
  ];
  for (const hunk of hunks) {
    out.push(`@@ -${formatRange(hunk.oldStart, hunk.oldLines)} +${formatRange(hunk.newStart, hunk.newLines)} @@`);
    for (const line of hunk.lines) {
      out.push(`${LINE_PREFIX[line.kind]}${line.text}`);
    }
  }
  return `${out.join('\n')}\n`;
}

function classify(original: string | undefined, proposed: string | undefined): DiffChangeType {
  if (original === undefined && proposed !== undefined) return 'create';
  if (original !== undefined && proposed === undefined) return 'delete';
  if (original === proposed) return 'unchanged';
  return 'modify';
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Diff original against proposed content
 */
export function calculateDiff(
  original: string | undefined,
  proposed: string | undefined,
  filePath = 'file',
  contextLines = DEFAULT_CONTEXT_LINES
): FileDiff {
  const ops = editScript(splitLines(original), splitLines(proposed));
  const hunks = buildHunks(ops, contextLines);

  return {
    filePath,
    changeType: classify(original, proposed),
    additions: ops.filter((op) => op.kind === 'add').length,
    deletions: ops.filter((op) => op.kind === 'remove').length,
    hunks,
    unified: renderUnified(filePath, hunks, original !== undefined, proposed !== undefined),
  };
}

export function isEmptyDiff(diff: FileDiff): boolean {
  return diff.hunks.length === 0;
}

/**
 * Totals across several file diffs
 */
export function summarizeDiffs(diffs: FileDiff[]): DiffSummary {
  return diffs.reduce<DiffSummary>(
    (acc, diff) => ({
      files: acc.files + 1,
      additions: acc.additions + diff.additions,
      deletions: acc.deletions + diff.deletions,
      created: acc.created + (diff.changeType === 'create' ? 1 : 0),
      modified: acc.modified + (diff.changeType === 'modify' ? 1 : 0),
      deleted: acc.deleted + (diff.changeType === 'delete' ? 1 : 0),
    }),
    { files: 0, additions: 0, deletions: 0, created: 0, modified: 0, deleted: 0 }
  );
}
