/**
 * Get Due Reviews Use Case
 */

import { err, ok, type Result } from 'neverthrow';

import { getDueReviews as selectDueReviews } from '../queries.js';

import type { LearnerStateError } from '../errors.js';
import type { LearnerStateRepository } from '../ports.js';
import type { ReviewItem } from '../types.js';

export interface GetDueReviewsDeps {
  repo: LearnerStateRepository;
}

export interface GetDueReviewsInput {
  userId: string;
  now: Date;
}

/**
 * Reviews due at `now`, most overdue first. A learner without state has
 * nothing due.
 */
export async function getDueReviews(
  deps: GetDueReviewsDeps,
  input: GetDueReviewsInput
): Promise<Result<ReviewItem[], LearnerStateError>> {
  const loadResult = await deps.repo.load(input.userId);
  if (loadResult.isErr()) {
    return err(loadResult.error);
  }

  const stored = loadResult.value;
  if (stored === null) {
    return ok([]);
  }

  return ok(selectDueReviews(stored.state, input.now));
}
