/**
 * PR Request State Machine
 *
 * Validates status changes of a PR request. The orchestrator is the only
 * writer of request status and goes through `validateTransition` for every
 * change.
 *
 * State Machine Diagram:
 * ```
 *        ┌─────────┐
 *        │ pending │ (initial state)
 *        └────┬────┘
 *             │
 *      ┌──────┴───────┐
 *      v              v
 * ┌────────────┐  ┌────────┐
 * │ processing │─>│ failed │
 * └─────┬──────┘  └────────┘
 *       v          (terminal)
 * ┌───────────┐
 * │ completed │
 * └───────────┘
 *   (terminal)
 * ```
 *
 * - pending -> failed: the request was rejected before the run started
 * - Terminal requests only take PR URL / error annotations, never a new status
 *
 * @module @autopr/engine/run/state-machine
 */

import { InvalidTransitionError, type PRRequestStatus } from '@autopr/core';

// =============================================================================
// State Machine Configuration
// =============================================================================

const STATE_TRANSITIONS: Record<PRRequestStatus, PRRequestStatus[]> = {
  pending: ['processing', 'failed'],
  processing: ['completed', 'failed'],
  completed: [], // terminal
  failed: [], // terminal
};

const TERMINAL_STATES: ReadonlySet<PRRequestStatus> = new Set(['completed', 'failed']);

// =============================================================================
// State Machine Functions
// =============================================================================

/**
 * Check if a status change is allowed
 *
 * @example
 * ```typescript
 * isValidTransition('pending', 'processing') // => true
 * isValidTransition('completed', 'failed')   // => false
 * ```
 */
export function isValidTransition(from: PRRequestStatus, to: PRRequestStatus): boolean {
  if (from === to) {
    return !TERMINAL_STATES.has(from);
  }
  return STATE_TRANSITIONS[from].includes(to);
}

/**
 * Validate a status change (throws on invalid)
 *
 * @throws {InvalidTransitionError} If the change is not allowed
 */
export function validateTransition(from: PRRequestStatus, to: PRRequestStatus): void {
  if (!isValidTransition(from, to)) {
    throw new InvalidTransitionError('PR request', from, to);
  }
}

export function getNextValidStates(current: PRRequestStatus): PRRequestStatus[] {
  return [...STATE_TRANSITIONS[current]];
}

export function isTerminalState(status: PRRequestStatus): boolean {
  return TERMINAL_STATES.has(status);
}

/**
 * Human-readable description of the state machine
 */
export function getStateMachineDescription(): string {
  const lines: string[] = ['PR Request State Machine', '========================', '', 'Valid Transitions:'];

  for (const [from, toStates] of Object.entries(STATE_TRANSITIONS)) {
    lines.push(toStates.length === 0 ? `  ${from} -> (terminal)` : `  ${from} -> ${toStates.join(', ')}`);
  }

  lines.push('');
  lines.push(`Terminal States: ${Array.from(TERMINAL_STATES).join(', ')}`);

  return lines.join('\n');
}
