/**
 * Get Summary Use Case
 */

import { err, ok, type Result } from 'neverthrow';

import { createEmptyLearnerState } from '../pipeline.js';
import { getLearnerSummary } from '../queries.js';

import type { LearnerStateError } from '../errors.js';
import type { LearnerStateRepository } from '../ports.js';
import type { LearnerSummary } from '../types.js';

export interface GetSummaryDeps {
  repo: LearnerStateRepository;
}

export interface GetSummaryInput {
  userId: string;
  now: Date;
}

export async function getSummary(
  deps: GetSummaryDeps,
  input: GetSummaryInput
): Promise<Result<LearnerSummary, LearnerStateError>> {
  const loadResult = await deps.repo.load(input.userId);
  if (loadResult.isErr()) {
    return err(loadResult.error);
  }

  return ok(getLearnerSummary(loadResult.value?.state ?? createEmptyLearnerState(), input.now));
}
