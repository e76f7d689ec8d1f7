import { describe, it, expect } from 'vitest';

import {
  clampMastery,
  initializeFromHistory,
  recencyWeight,
  updateMastery,
} from '@/modules/learner-state/core/mastery.js';

import { createTestSubmission } from '../../fixtures/builders.js';

// ─────────────────────────────────────────────────────────────────────────────
// updateMastery
// ─────────────────────────────────────────────────────────────────────────────

describe('updateMastery', () => {
  it('closes 10% of the gap on success and removes 15% on failure', () => {
    const afterFirst = updateMastery({ mastery: {} }, ['array'], true);
    const afterSecond = updateMastery({ mastery: afterFirst }, ['array'], true);
    const afterFailure = updateMastery({ mastery: afterSecond }, ['array'], false);

    expect(afterFirst['array']).toBeCloseTo(0.1, 10);
    expect(afterSecond['array']).toBeCloseTo(0.19, 10);
    expect(afterFailure['array']).toBeCloseTo(0.1615, 10);
  });

  it('records an unobserved topic at 0 on failure', () => {
    const mastery = updateMastery({ mastery: {} }, ['graph'], false);

    expect(mastery).toEqual({ graph: 0 });
  });

  it('updates every listed topic and leaves the others alone', () => {
    const mastery = updateMastery({ mastery: { array: 0.5, graph: 0.4 } }, ['array', 'dp'], true);

    expect(mastery['array']).toBeCloseTo(0.55, 10);
    expect(mastery['dp']).toBeCloseTo(0.1, 10);
    expect(mastery['graph']).toBe(0.4);
  });

  it('does not modify the input state', () => {
    const state = { mastery: { array: 0.5 } };

    updateMastery(state, ['array'], true);

    expect(state.mastery).toEqual({ array: 0.5 });
  });

  it('stays within [0, 1] over long runs', () => {
    let mastery: Record<string, number> = {};
    for (let i = 0; i < 500; i++) {
      mastery = updateMastery({ mastery }, ['array'], true);
    }
    expect(mastery['array']).toBeLessThanOrEqual(1);

    for (let i = 0; i < 500; i++) {
      mastery = updateMastery({ mastery }, ['array'], false);
    }
    expect(mastery['array']).toBeGreaterThanOrEqual(0);
  });
});

describe('clampMastery', () => {
  it('clamps out-of-range values and collapses NaN to 0', () => {
    expect(clampMastery(1.5)).toBe(1);
    expect(clampMastery(-0.2)).toBe(0);
    expect(clampMastery(0.42)).toBe(0.42);
    expect(clampMastery(Number.NaN)).toBe(0);
  });
});

// ─────────────────────────────────────────────────────────────────────────────
// initializeFromHistory
// ─────────────────────────────────────────────────────────────────────────────

describe('recencyWeight', () => {
  it('halves every half-life', () => {
    expect(recencyWeight(0, 14)).toBe(1);
    expect(recencyWeight(14, 14)).toBeCloseTo(0.5, 10);
    expect(recencyWeight(28, 14)).toBeCloseTo(0.25, 10);
  });

  it('treats negative ages as current', () => {
    expect(recencyWeight(-3, 14)).toBe(1);
  });
});

describe('initializeFromHistory', () => {
  it('returns an empty map for an empty history', () => {
    expect(initializeFromHistory([])).toEqual({});
  });

  it('is the plain success rate when all attempts are equally recent', () => {
    const mastery = initializeFromHistory([
      createTestSubmission({ submissionId: 's1', success: true }),
      createTestSubmission({ submissionId: 's2', success: false }),
    ]);

    expect(mastery['array']).toBe(0.5);
  });

  it('weights older attempts less', () => {
    // Success 14 days before the newest failure counts half
    const mastery = initializeFromHistory([
      createTestSubmission({
        submissionId: 's1',
        success: true,
        occurredAt: '2024-01-01T10:00:00.000Z',
      }),
      createTestSubmission({
        submissionId: 's2',
        success: false,
        occurredAt: '2024-01-15T10:00:00.000Z',
      }),
    ]);

    expect(mastery['array']).toBeCloseTo(1 / 3, 10);
  });

  it('honours a custom half-life', () => {
    const mastery = initializeFromHistory(
      [
        createTestSubmission({
          submissionId: 's1',
          success: true,
          occurredAt: '2024-01-01T10:00:00.000Z',
        }),
        createTestSubmission({
          submissionId: 's2',
          success: false,
          occurredAt: '2024-01-15T10:00:00.000Z',
        }),
      ],
      { halfLifeDays: 7 }
    );

    expect(mastery['array']).toBeCloseTo(0.2, 10);
  });

  it('tracks each topic separately and counts a repeated topic once per event', () => {
    const mastery = initializeFromHistory([
      createTestSubmission({ submissionId: 's1', topics: ['array', 'graph', 'graph'] }),
      createTestSubmission({ submissionId: 's2', topics: ['graph'], success: false }),
    ]);

    expect(mastery).toEqual({ array: 1, graph: 0.5 });
  });

  it('handles histories of several hundred thousand events', () => {
    const events = Array.from({ length: 300_000 }, (_, i) =>
      createTestSubmission({ submissionId: `s${String(i)}`, success: i % 2 === 0 })
    );

    expect(initializeFromHistory(events)).toEqual({ array: 0.5 });
  });
});
