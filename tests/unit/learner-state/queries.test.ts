import { describe, it, expect } from 'vitest';

import {
  getDueReviews,
  getLearnerSummary,
  getOverdueDays,
  getTopicStatistics,
} from '@/modules/learner-state/core/queries.js';

import {
  createTestLearnerState,
  createTestReviewItem,
  createTestSubmission,
} from '../../fixtures/builders.js';

// ─────────────────────────────────────────────────────────────────────────────
// getDueReviews
// ─────────────────────────────────────────────────────────────────────────────

describe('getDueReviews', () => {
  const state = {
    reviews: [
      createTestReviewItem({ questionId: 'q-b', dueDate: '2024-01-02T10:00:00.000Z' }),
      createTestReviewItem({ questionId: 'q-a', dueDate: '2024-01-02T10:00:00.000Z' }),
      createTestReviewItem({ questionId: 'q-c', dueDate: '2024-01-01T10:00:00.000Z' }),
      createTestReviewItem({ questionId: 'q-d', dueDate: '2024-01-10T10:00:00.000Z' }),
    ],
  };

  it('returns due items, most overdue first, ties by question ID', () => {
    const due = getDueReviews(state, new Date('2024-01-05T10:00:00.000Z'));

    expect(due.map((review) => review.questionId)).toEqual(['q-c', 'q-a', 'q-b']);
  });

  it('includes an item due exactly now', () => {
    const due = getDueReviews(state, new Date('2024-01-01T10:00:00.000Z'));

    expect(due.map((review) => review.questionId)).toEqual(['q-c']);
  });

  it('returns nothing when nothing is due', () => {
    expect(getDueReviews(state, new Date('2023-12-31T00:00:00.000Z'))).toEqual([]);
  });
});

describe('getOverdueDays', () => {
  it('counts whole days past due', () => {
    const review = createTestReviewItem({ dueDate: '2024-01-02T10:00:00.000Z' });

    expect(getOverdueDays(review, new Date('2024-01-05T09:00:00.000Z'))).toBe(2);
    expect(getOverdueDays(review, new Date('2024-01-01T00:00:00.000Z'))).toBe(0);
  });
});

// ─────────────────────────────────────────────────────────────────────────────
// getTopicStatistics
// ─────────────────────────────────────────────────────────────────────────────

describe('getTopicStatistics', () => {
  const errorPattern = {
    topic: 'array',
    pattern: 'off-by-one',
    questionId: 'q-1',
    occurredAt: '2024-01-02T10:00:00.000Z',
  };
  const state = createTestLearnerState({
    mastery: { array: 0.8 },
    commonErrors: { array: [errorPattern] },
  });
  const history = [
    createTestSubmission({ submissionId: 's1', questionId: 'q-1', success: true }),
    createTestSubmission({
      submissionId: 's2',
      questionId: 'q-1',
      success: false,
      occurredAt: '2024-01-02T10:00:00.000Z',
    }),
    createTestSubmission({
      submissionId: 's3',
      questionId: 'q-2',
      topics: ['array', 'graph'],
      occurredAt: '2024-01-03T10:00:00.000Z',
    }),
    createTestSubmission({
      submissionId: 's4',
      questionId: 'q-3',
      topics: ['graph'],
      occurredAt: '2024-01-04T10:00:00.000Z',
    }),
  ];

  it('aggregates attempts and joins current mastery and errors', () => {
    const stats = getTopicStatistics(state, history, 'array', new Date('2024-01-05T10:00:00.000Z'));

    expect(stats).toEqual({
      topic: 'array',
      displayName: 'Array',
      attempts: 3,
      successes: 2,
      problemsSolved: 2,
      successRate: 2 / 3,
      mastery: 0.8,
      lastPracticedAt: '2024-01-03T10:00:00.000Z',
      needsReview: false,
      errorPatterns: [errorPattern],
    });
  });

  it('flags a topic not practiced for over a week', () => {
    const stats = getTopicStatistics(state, history, 'array', new Date('2024-01-12T10:00:00.000Z'));

    expect(stats.needsReview).toBe(true);
  });

  it('flags a topic below the mastery threshold', () => {
    const stats = getTopicStatistics(state, history, 'graph', new Date('2024-01-05T10:00:00.000Z'));

    expect(stats.mastery).toBeNull();
    expect(stats.needsReview).toBe(true);
    expect(stats.attempts).toBe(2);
  });

  it('returns zeroed statistics for an unseen topic', () => {
    const stats = getTopicStatistics(state, history, 'trie', new Date('2024-01-05T10:00:00.000Z'));

    expect(stats).toEqual({
      topic: 'trie',
      displayName: 'Trie',
      attempts: 0,
      successes: 0,
      problemsSolved: 0,
      successRate: 0,
      mastery: null,
      lastPracticedAt: null,
      needsReview: true,
      errorPatterns: [],
    });
  });
});

// ─────────────────────────────────────────────────────────────────────────────
// getLearnerSummary
// ─────────────────────────────────────────────────────────────────────────────

describe('getLearnerSummary', () => {
  const state = createTestLearnerState({
    mastery: { array: 0.9, graph: 0.5, 'dynamic-programming': 0.2, 'hash-table': 0.75, math: 0.6 },
    reviews: [
      createTestReviewItem({ questionId: 'q-1', dueDate: '2024-01-04T10:00:00.000Z' }),
      createTestReviewItem({ questionId: 'q-2', dueDate: '2024-01-09T10:00:00.000Z' }),
    ],
    streak: 4,
    lastSeen: '2024-01-04',
  });

  it('summarizes mastery, streak and due reviews', () => {
    const summary = getLearnerSummary(state, new Date('2024-01-05T08:00:00.000Z'));

    expect(summary).toEqual({
      topicsPracticed: 5,
      averageMastery: 0.59,
      currentStreak: 4,
      reviewsDue: 1,
      strongestTopics: [
        { topic: 'array', mastery: 0.9 },
        { topic: 'hash-table', mastery: 0.75 },
        { topic: 'math', mastery: 0.6 },
      ],
      needsImprovement: [
        { topic: 'dynamic-programming', mastery: 0.2 },
        { topic: 'graph', mastery: 0.5 },
        { topic: 'math', mastery: 0.6 },
      ],
    });
  });

  it('reports a broken streak as 0', () => {
    expect(getLearnerSummary(state, new Date('2024-01-07T08:00:00.000Z')).currentStreak).toBe(0);
  });

  it('lists only weak topics as needing improvement', () => {
    const strong = createTestLearnerState({ mastery: { array: 0.9, graph: 0.8 } });

    expect(getLearnerSummary(strong, new Date('2024-01-05T08:00:00.000Z')).needsImprovement).toEqual(
      []
    );
  });

  it('is all zeros for an empty state', () => {
    expect(getLearnerSummary(createTestLearnerState(), new Date('2024-01-05T08:00:00.000Z'))).toEqual({
      topicsPracticed: 0,
      averageMastery: 0,
      currentStreak: 0,
      reviewsDue: 0,
      strongestTopics: [],
      needsImprovement: [],
    });
  });
});
