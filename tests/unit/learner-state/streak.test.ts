import { describe, it, expect } from 'vitest';

import { getEffectiveStreak, updateStreak } from '@/modules/learner-state/core/streak.js';

describe('updateStreak', () => {
  it('starts at 1 on the first activity', () => {
    expect(updateStreak({ streak: 0, lastSeen: null }, '2024-01-01')).toEqual({
      streak: 1,
      lastSeen: '2024-01-01',
    });
  });

  it('extends on the next day', () => {
    expect(updateStreak({ streak: 3, lastSeen: '2024-01-01' }, '2024-01-02')).toEqual({
      streak: 4,
      lastSeen: '2024-01-02',
    });
  });

  it('is unchanged by more activity on the same day', () => {
    expect(updateStreak({ streak: 3, lastSeen: '2024-01-01' }, '2024-01-01')).toEqual({
      streak: 3,
      lastSeen: '2024-01-01',
    });
  });

  it('restarts at 1 after a gap', () => {
    expect(updateStreak({ streak: 7, lastSeen: '2024-01-01' }, '2024-01-03')).toEqual({
      streak: 1,
      lastSeen: '2024-01-03',
    });
  });

  it('ignores activity dated before the last seen day', () => {
    expect(updateStreak({ streak: 4, lastSeen: '2024-01-05' }, '2024-01-03')).toEqual({
      streak: 4,
      lastSeen: '2024-01-05',
    });
  });

  it('counts across month and leap-day boundaries', () => {
    expect(updateStreak({ streak: 1, lastSeen: '2024-01-31' }, '2024-02-01').streak).toBe(2);
    expect(updateStreak({ streak: 1, lastSeen: '2024-02-28' }, '2024-02-29').streak).toBe(2);
    expect(updateStreak({ streak: 1, lastSeen: '2024-02-29' }, '2024-03-01').streak).toBe(2);
  });
});

describe('getEffectiveStreak', () => {
  it('is 0 for a learner with no activity', () => {
    expect(getEffectiveStreak({ streak: 0, lastSeen: null }, '2024-01-01')).toBe(0);
  });

  it('keeps the stored streak through yesterday', () => {
    const state = { streak: 5, lastSeen: '2024-01-04' };

    expect(getEffectiveStreak(state, '2024-01-04')).toBe(5);
    expect(getEffectiveStreak(state, '2024-01-05')).toBe(5);
  });

  it('is 0 once a day has been missed', () => {
    expect(getEffectiveStreak({ streak: 5, lastSeen: '2024-01-04' }, '2024-01-06')).toBe(0);
  });
});
