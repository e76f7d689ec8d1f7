/**
 * Learner State Module - Error Pattern Tracker
 */

import { MAX_ERROR_PATTERNS_PER_TOPIC, type ErrorPattern, type LearnerState } from './types.js';

/**
 * Records a mistake at the front of the topic's list, evicting the oldest
 * entry past capacity. Repeated labels are not merged.
 */
export function addErrorPattern(
  state: Pick<LearnerState, 'commonErrors'>,
  topic: string,
  pattern: string,
  questionId: string,
  occurredAt: string
): Record<string, ErrorPattern[]> {
  const entry: ErrorPattern = { topic, pattern, questionId, occurredAt };
  const existing = state.commonErrors[topic] ?? [];

  return {
    ...state.commonErrors,
    [topic]: [entry, ...existing].slice(0, MAX_ERROR_PATTERNS_PER_TOPIC),
  };
}

/**
 * Records the same mistake under every topic of a question.
 */
export function addErrorPatternForTopics(
  state: Pick<LearnerState, 'commonErrors'>,
  topics: readonly string[],
  pattern: string,
  questionId: string,
  occurredAt: string
): Record<string, ErrorPattern[]> {
  let commonErrors = state.commonErrors;
  for (const topic of topics) {
    commonErrors = addErrorPattern({ commonErrors }, topic, pattern, questionId, occurredAt);
  }
  return commonErrors;
}
