/**
 * Learner State Module - Streak Tracker
 */

import { daysBetween } from './dates.js';

import type { IsoDate, LearnerState } from './types.js';

export interface StreakUpdate {
  streak: number;
  lastSeen: IsoDate | null;
}

/**
 * Folds one day of activity into the streak.
 *
 * - first activity ever: 1
 * - same day: unchanged
 * - next day: +1
 * - later day (gap): back to 1
 * - earlier day (clock skew or replay): nothing changes
 */
export function updateStreak(
  state: Pick<LearnerState, 'streak' | 'lastSeen'>,
  today: IsoDate
): StreakUpdate {
  const { streak, lastSeen } = state;

  if (lastSeen === null) {
    return { streak: 1, lastSeen: today };
  }

  const daysDiff = daysBetween(lastSeen, today);

  if (daysDiff === 1) {
    return { streak: streak + 1, lastSeen: today };
  }

  if (daysDiff > 1) {
    return { streak: 1, lastSeen: today };
  }

  // Same day or out of order
  return { streak, lastSeen };
}

/**
 * The streak as seen on `today`: a streak whose last activity is older than
 * yesterday is already broken, even though the stored counter still holds
 * its last value until the next activity.
 */
export function getEffectiveStreak(
  state: Pick<LearnerState, 'streak' | 'lastSeen'>,
  today: IsoDate
): number {
  if (state.lastSeen === null) {
    return 0;
  }
  return daysBetween(state.lastSeen, today) <= 1 ? state.streak : 0;
}
