/**
 * Learner State Module - Mastery Estimator
 *
 * Two ways to arrive at per-topic mastery:
 * - incrementally, one submission at a time (`updateMastery`)
 * - from a whole history at once (`initializeFromHistory`), where each
 *   attempt's weight halves every `halfLifeDays` of age
 */

import { MS_PER_DAY } from './dates.js';
import {
  DEFAULT_MASTERY_HALF_LIFE_DAYS,
  MASTERY_FAILURE_DECAY,
  MASTERY_MAX,
  MASTERY_MIN,
  MASTERY_SUCCESS_GAIN,
  type LearnerState,
  type SubmissionEvent,
} from './types.js';

/**
 * Clamps a mastery value into [0, 1]. NaN collapses to 0.
 */
export function clampMastery(value: number): number {
  if (Number.isNaN(value)) {
    return MASTERY_MIN;
  }
  return Math.min(MASTERY_MAX, Math.max(MASTERY_MIN, value));
}

/**
 * Applies one attempt to the mastery of each listed topic.
 *
 * Success closes 10% of the gap to 1.0; failure removes 15% of the current
 * level. Unobserved topics start from 0.
 *
 * @returns a new mastery map; the input state is not modified
 */
export function updateMastery(
  state: Pick<LearnerState, 'mastery'>,
  topics: readonly string[],
  success: boolean
): Record<string, number> {
  const mastery = { ...state.mastery };

  for (const topic of topics) {
    const current = mastery[topic] ?? MASTERY_MIN;
    const next = success
      ? current + MASTERY_SUCCESS_GAIN * (1 - current)
      : current - MASTERY_FAILURE_DECAY * current;
    mastery[topic] = clampMastery(next);
  }

  return mastery;
}

export interface InitializeFromHistoryOptions {
  /** Age (days) at which an attempt counts half as much as the newest one */
  halfLifeDays?: number;
}

interface WeightedTally {
  successWeight: number;
  totalWeight: number;
}

/**
 * Recency weight of an attempt `ageDays` older than the newest attempt.
 */
export function recencyWeight(ageDays: number, halfLifeDays: number): number {
  return Math.pow(0.5, Math.max(0, ageDays) / halfLifeDays);
}

/**
 * Estimates mastery as a recency-weighted success rate per topic.
 *
 * Age is measured from the newest event in the history, not from the wall
 * clock, so the result depends on nothing but its input.
 */
export function initializeFromHistory(
  events: readonly SubmissionEvent[],
  options: InitializeFromHistoryOptions = {}
): Record<string, number> {
  const halfLifeDays = options.halfLifeDays ?? DEFAULT_MASTERY_HALF_LIFE_DAYS;
  if (events.length === 0) {
    return {};
  }

  let newest = Number.NEGATIVE_INFINITY;
  for (const event of events) {
    newest = Math.max(newest, Date.parse(event.occurredAt));
  }
  const tallies = new Map<string, WeightedTally>();

  for (const event of events) {
    const ageDays = (newest - Date.parse(event.occurredAt)) / MS_PER_DAY;
    const weight = recencyWeight(ageDays, halfLifeDays);

    for (const topic of new Set(event.topics)) {
      const tally = tallies.get(topic) ?? { successWeight: 0, totalWeight: 0 };
      tally.totalWeight += weight;
      if (event.success) {
        tally.successWeight += weight;
      }
      tallies.set(topic, tally);
    }
  }

  const mastery: Record<string, number> = {};
  for (const [topic, tally] of tallies) {
    mastery[topic] =
      tally.totalWeight > 0 ? clampMastery(tally.successWeight / tally.totalWeight) : MASTERY_MIN;
  }
  return mastery;
}
