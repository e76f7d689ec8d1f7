/**
 * Learner State Module - Spaced-Repetition Scheduler
 *
 * Simplified SM-2. Each question is either absent from the schedule or
 * scheduled:
 *
 *   absent    --first success-->     scheduled (1 day, ease 2.5)
 *   absent    --repeat success-->    scheduled (3 days, ease 2.5)
 *   scheduled --success-->           scheduled (interval x ease)
 *   scheduled --failure-->           scheduled (1 day, ease kept)
 *
 * Ease only moves when a recall quality (0-5) is supplied.
 */

import { addDays } from './dates.js';
import {
  DEFAULT_EASE_FACTOR,
  FIRST_REVIEW_INTERVAL_DAYS,
  MAX_EASE_FACTOR,
  MAX_REVIEW_INTERVAL_DAYS,
  MAX_REVIEW_QUALITY,
  MIN_EASE_FACTOR,
  MIN_REVIEW_QUALITY,
  REENTRY_REVIEW_INTERVAL_DAYS,
  RESET_REVIEW_INTERVAL_DAYS,
  type LearnerState,
  type ReviewItem,
} from './types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

export function clampEaseFactor(easeFactor: number): number {
  return Math.min(MAX_EASE_FACTOR, Math.max(MIN_EASE_FACTOR, easeFactor));
}

/**
 * SM-2 ease update for a recall quality in [0, 5].
 */
export function adjustEaseFactor(easeFactor: number, quality: number): number {
  const q = Math.min(MAX_REVIEW_QUALITY, Math.max(MIN_REVIEW_QUALITY, Math.round(quality)));
  const delta = 0.1 - (5 - q) * (0.08 + (5 - q) * 0.02);
  return clampEaseFactor(easeFactor + delta);
}

/**
 * Next interval after a successful review: whole days, at least the current
 * interval for any ease >= 1, capped at one year.
 */
export function nextIntervalDays(intervalDays: number, easeFactor: number): number {
  const grown = Math.max(1, Math.round(intervalDays * easeFactor));
  return Math.min(MAX_REVIEW_INTERVAL_DAYS, grown);
}

function laterIso(a: string, b: Date): string {
  return Date.parse(a) >= b.getTime() ? a : b.toISOString();
}

// ─────────────────────────────────────────────────────────────────────────────
// Transitions
// ─────────────────────────────────────────────────────────────────────────────

export interface ScheduleReviewOptions {
  /** Time of the review; due dates are computed from it */
  now: Date;
  /** Optional SM-2 recall quality (0-5) */
  quality?: number;
}

/**
 * Schedules (or reschedules) a question after a successful attempt.
 *
 * An item already present is replaced in place, never duplicated. Its due
 * date never moves earlier than the one already set, even when the review
 * arrives out of order.
 *
 * @returns a new review list
 */
export function scheduleReview(
  state: Pick<LearnerState, 'reviews'>,
  questionId: string,
  topics: readonly string[],
  isFirstSuccess: boolean,
  options: ScheduleReviewOptions
): ReviewItem[] {
  const { now, quality } = options;
  const existing = state.reviews.find((review) => review.questionId === questionId);

  if (existing === undefined) {
    const intervalDays = isFirstSuccess ? FIRST_REVIEW_INTERVAL_DAYS : REENTRY_REVIEW_INTERVAL_DAYS;
    // Quality only adjusts items that are already scheduled
    return [
      ...state.reviews,
      {
        questionId,
        topics: [...topics],
        dueDate: addDays(now, intervalDays).toISOString(),
        intervalDays,
        easeFactor: DEFAULT_EASE_FACTOR,
      },
    ];
  }

  // Interval grows with the ease in effect before this review
  const intervalDays = nextIntervalDays(existing.intervalDays, existing.easeFactor);
  const updated: ReviewItem = {
    questionId,
    topics: [...topics],
    dueDate: laterIso(existing.dueDate, addDays(now, intervalDays)),
    intervalDays,
    easeFactor:
      quality !== undefined
        ? adjustEaseFactor(existing.easeFactor, quality)
        : existing.easeFactor,
  };

  return state.reviews.map((review) => (review.questionId === questionId ? updated : review));
}

/**
 * Failure transition: a scheduled item drops back to a one-day interval.
 * Absent items stay absent.
 */
export function resetReview(
  state: Pick<LearnerState, 'reviews'>,
  questionId: string,
  now: Date
): ReviewItem[] {
  if (!state.reviews.some((review) => review.questionId === questionId)) {
    return state.reviews;
  }

  return state.reviews.map((review) =>
    review.questionId === questionId
      ? {
          ...review,
          intervalDays: RESET_REVIEW_INTERVAL_DAYS,
          dueDate: addDays(now, RESET_REVIEW_INTERVAL_DAYS).toISOString(),
        }
      : review
  );
}
