/**
 * Get State Use Case
 *
 * Reads a learner's current state without ever creating one.
 */

import { err, ok, type Result } from 'neverthrow';

import { createEmptyLearnerState } from '../pipeline.js';

import type { LearnerStateError } from '../errors.js';
import type { LearnerStateRepository } from '../ports.js';
import type { LearnerState } from '../types.js';

export interface GetStateDeps {
  repo: LearnerStateRepository;
}

export interface GetStateInput {
  userId: string;
}

/**
 * Returns the stored state, or a fresh empty state (not persisted) for a
 * learner that has none.
 */
export async function getState(
  deps: GetStateDeps,
  input: GetStateInput
): Promise<Result<LearnerState, LearnerStateError>> {
  const loadResult = await deps.repo.load(input.userId);
  if (loadResult.isErr()) {
    return err(loadResult.error);
  }

  return ok(loadResult.value?.state ?? createEmptyLearnerState());
}
