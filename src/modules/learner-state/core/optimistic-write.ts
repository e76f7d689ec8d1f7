/**
 * Learner State Module - Optimistic Write Loop
 *
 * Read version, compute, write conditioned on the version; on a lost race
 * reload and recompute, up to a bounded number of attempts.
 */

import { err, ok, type Result } from 'neverthrow';

import { createConflictError, type LearnerStateError } from './errors.js';
import { DEFAULT_MAX_WRITE_ATTEMPTS, type LearnerState } from './types.js';

import type { LearnerStateRepository } from './ports.js';
import type { Logger } from 'pino';

export interface OptimisticWriteDeps {
  repo: LearnerStateRepository;
  logger: Logger;
  /** Load-compute-store attempts before a ConflictError surfaces */
  maxAttempts?: number;
}

/**
 * Computes the next state from the freshly loaded one (null when nothing is
 * stored) and stores it under optimistic concurrency.
 *
 * Only ConflictError is retried; every other error is returned unchanged.
 *
 * @returns the state that was written
 */
export async function writeWithRetry(
  deps: OptimisticWriteDeps,
  userId: string,
  compute: (current: LearnerState | null) => LearnerState
): Promise<Result<LearnerState, LearnerStateError>> {
  const { repo, logger } = deps;
  const maxAttempts = Math.max(1, deps.maxAttempts ?? DEFAULT_MAX_WRITE_ATTEMPTS);

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const loadResult = await repo.load(userId);
    if (loadResult.isErr()) {
      return err(loadResult.error);
    }

    const current = loadResult.value;
    const next = compute(current?.state ?? null);

    const storeResult = await repo.store(userId, next, current?.version ?? null);
    if (storeResult.isOk()) {
      logger.debug({ userId, attempt, version: storeResult.value }, 'Learner state stored');
      return ok(next);
    }

    if (storeResult.error.type !== 'ConflictError') {
      return err(storeResult.error);
    }

    logger.warn({ userId, attempt, maxAttempts }, 'Learner state write conflict, retrying');
  }

  return err(createConflictError(userId, maxAttempts));
}
