/**
 * Learner State Module - Query Views
 *
 * Read-only projections over a state snapshot. Nothing here mutates its
 * inputs.
 */

import { MS_PER_DAY, toIsoDate } from './dates.js';
import { getEffectiveStreak } from './streak.js';
import { getTopicDisplayName } from './topics.js';
import {
  NEEDS_REVIEW_MASTERY_THRESHOLD,
  STALE_PRACTICE_DAYS,
  SUMMARY_TOPIC_COUNT,
  type LearnerState,
  type LearnerSummary,
  type ReviewItem,
  type SubmissionEvent,
  type TopicMasteryEntry,
  type TopicStatistics,
} from './types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Due Reviews
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Reviews due at `now`, most overdue first; ties broken by questionId.
 */
export function getDueReviews(state: Pick<LearnerState, 'reviews'>, now: Date): ReviewItem[] {
  const nowMs = now.getTime();

  return state.reviews
    .filter((review) => Date.parse(review.dueDate) <= nowMs)
    .sort((a, b) => {
      const overdueCompare = Date.parse(a.dueDate) - Date.parse(b.dueDate);
      if (overdueCompare !== 0) {
        return overdueCompare;
      }
      return a.questionId.localeCompare(b.questionId);
    });
}

/**
 * Whole days a review is past due (0 when not yet due).
 */
export function getOverdueDays(review: ReviewItem, now: Date): number {
  return Math.max(0, Math.floor((now.getTime() - Date.parse(review.dueDate)) / MS_PER_DAY));
}

// ─────────────────────────────────────────────────────────────────────────────
// Topic Statistics
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Aggregates one topic's attempts from the history and joins them with the
 * topic's current mastery and error patterns.
 */
export function getTopicStatistics(
  state: LearnerState,
  history: readonly SubmissionEvent[],
  topic: string,
  now: Date
): TopicStatistics {
  const attemptsForTopic = history.filter((event) => event.topics.includes(topic));
  const successes = attemptsForTopic.filter((event) => event.success);
  const solvedQuestions = new Set(successes.map((event) => event.questionId));

  let lastPracticedMs: number | null = null;
  for (const event of attemptsForTopic) {
    const occurredMs = Date.parse(event.occurredAt);
    if (lastPracticedMs === null || occurredMs > lastPracticedMs) {
      lastPracticedMs = occurredMs;
    }
  }

  const mastery = state.mastery[topic] ?? null;

  let needsReview = mastery === null || mastery < NEEDS_REVIEW_MASTERY_THRESHOLD;
  if (lastPracticedMs !== null) {
    const daysSince = Math.floor((now.getTime() - lastPracticedMs) / MS_PER_DAY);
    needsReview = needsReview || daysSince > STALE_PRACTICE_DAYS;
  }

  return {
    topic,
    displayName: getTopicDisplayName(topic),
    attempts: attemptsForTopic.length,
    successes: successes.length,
    problemsSolved: solvedQuestions.size,
    successRate: attemptsForTopic.length > 0 ? successes.length / attemptsForTopic.length : 0,
    mastery,
    lastPracticedAt: lastPracticedMs !== null ? new Date(lastPracticedMs).toISOString() : null,
    needsReview,
    errorPatterns: [...(state.commonErrors[topic] ?? [])],
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Summary
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Overview of a learner: averages, streak, due reviews and the strongest and
 * weakest topics.
 */
export function getLearnerSummary(state: LearnerState, now: Date): LearnerSummary {
  const entries: TopicMasteryEntry[] = Object.entries(state.mastery)
    .map(([topic, mastery]) => ({ topic, mastery }))
    .sort((a, b) => b.mastery - a.mastery || a.topic.localeCompare(b.topic));

  const total = entries.reduce((sum, entry) => sum + entry.mastery, 0);
  const averageMastery = entries.length > 0 ? Math.round((total / entries.length) * 100) / 100 : 0;

  return {
    topicsPracticed: entries.length,
    averageMastery,
    currentStreak: getEffectiveStreak(state, toIsoDate(now)),
    reviewsDue: getDueReviews(state, now).length,
    strongestTopics: entries.slice(0, SUMMARY_TOPIC_COUNT),
    needsImprovement: entries
      .slice(-SUMMARY_TOPIC_COUNT)
      .filter((entry) => entry.mastery < NEEDS_REVIEW_MASTERY_THRESHOLD)
      .reverse(),
  };
}
