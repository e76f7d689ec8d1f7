/**
 * Learner State Module - Update Pipeline
 *
 * Folds one submission into a learner state by running the mastery
 * estimator, error tracker, scheduler and streak tracker in sequence.
 * Every step is pure; persisting the result is the caller's job.
 */

import { laterTimestamp, normalizeTimestamp, toIsoDate } from './dates.js';
import { addErrorPatternForTopics } from './error-patterns.js';
import { updateMastery } from './mastery.js';
import { resetReview, scheduleReview } from './scheduler.js';
import { updateStreak } from './streak.js';
import { LEARNER_STATE_VERSION, type LearnerState, type SubmissionEvent } from './types.js';

/**
 * Creates a well-defined empty state. Callers invoke this explicitly; reads
 * never create state as a side effect.
 */
export function createEmptyLearnerState(): LearnerState {
  return {
    version: LEARNER_STATE_VERSION,
    updated: null,
    mastery: {},
    commonErrors: {},
    reviews: [],
    streak: 0,
    lastSeen: null,
  };
}

export interface ApplySubmissionOptions {
  /** True when the learner never solved this question before this event */
  isFirstSuccess: boolean;
}

/**
 * Applies a single submission to a state, returning the new state.
 *
 * The event's own timestamp is "now" for scheduling and its UTC date is
 * "today" for the streak, so replaying a history reproduces the same state.
 *
 * Out-of-order events (dated before `lastSeen`) leave the streak alone but
 * still update mastery, error patterns and reviews.
 */
export function applySubmission(
  state: LearnerState,
  event: SubmissionEvent,
  options: ApplySubmissionOptions
): LearnerState {
  const occurredAt = normalizeTimestamp(event.occurredAt);
  const now = new Date(occurredAt);
  const { topics, questionId, success } = event;

  const mastery = topics.length > 0 ? updateMastery(state, topics, success) : state.mastery;

  const commonErrors =
    !success && event.errorPattern !== undefined
      ? addErrorPatternForTopics(state, topics, event.errorPattern, questionId, occurredAt)
      : state.commonErrors;

  let reviews = state.reviews;
  if (success && topics.length > 0) {
    reviews = scheduleReview(state, questionId, topics, options.isFirstSuccess, {
      now,
      ...(event.quality !== undefined && { quality: event.quality }),
    });
  } else if (!success) {
    reviews = resetReview(state, questionId, now);
  }

  const { streak, lastSeen } = updateStreak(state, toIsoDate(now));

  return {
    ...state,
    version: LEARNER_STATE_VERSION,
    updated: laterTimestamp(state.updated, occurredAt),
    mastery,
    commonErrors,
    reviews,
    streak,
    lastSeen,
  };
}
