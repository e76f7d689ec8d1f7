/**
 * Learner State Module - Recalculator
 *
 * Rebuilds a learner state from the raw submission history. Used to
 * bootstrap new learners and to repair drifted state.
 */

import { initializeFromHistory } from './mastery.js';
import { applySubmission, createEmptyLearnerState } from './pipeline.js';

import type { LearnerState, SubmissionEvent } from './types.js';

/**
 * Compares two submissions for replay order.
 * Primary: occurredAt ascending
 * Secondary: submissionId ascending (for deterministic ordering)
 */
export function compareSubmissions(a: SubmissionEvent, b: SubmissionEvent): number {
  const timeCompare = Date.parse(a.occurredAt) - Date.parse(b.occurredAt);
  if (timeCompare !== 0) {
    return timeCompare;
  }
  // Code-unit order, matching the `id < ?` comparison in the submissions query
  if (a.submissionId === b.submissionId) {
    return 0;
  }
  return a.submissionId < b.submissionId ? -1 : 1;
}

export interface RecalculateOptions {
  /** Half-life (days) of historical evidence for mastery */
  halfLifeDays?: number;
}

/**
 * Reduces a submission history to a learner state.
 *
 * This is a pure function that:
 * 1. Sorts submissions by occurredAt (then submissionId for ties)
 * 2. Replays each one through the update pipeline, which yields the streak,
 *    error patterns and review schedule
 * 3. Replaces the replayed mastery with the recency-weighted estimate over
 *    the whole history
 *
 * Input order does not matter and nothing previously persisted is read, so
 * repeated calls on the same history return equal states.
 */
export function recalculate(
  history: readonly SubmissionEvent[],
  options: RecalculateOptions = {}
): LearnerState {
  if (history.length === 0) {
    return createEmptyLearnerState();
  }

  const sorted = [...history].sort(compareSubmissions);
  const solved = new Set<string>();

  let state = createEmptyLearnerState();
  for (const event of sorted) {
    state = applySubmission(state, event, { isFirstSuccess: !solved.has(event.questionId) });
    if (event.success) {
      solved.add(event.questionId);
    }
  }

  return {
    ...state,
    mastery: initializeFromHistory(sorted, options),
  };
}
