/**
 * Learner State Module - Input Schemas
 *
 * TypeBox schemas for data entering the core from outside. Compiled once;
 * `validate*` helpers turn failures into InvalidInputError values.
 */

import { Type, type Static } from '@sinclair/typebox';
import { TypeCompiler } from '@sinclair/typebox/compiler';
import { err, ok, type Result } from 'neverthrow';

import { normalizeTimestamp } from './dates.js';
import { createInvalidInputError, type InvalidInputError } from './errors.js';
import {
  MASTERY_MAX,
  MASTERY_MIN,
  MAX_EASE_FACTOR,
  MAX_ERROR_PATTERNS_PER_TOPIC,
  MAX_REVIEW_QUALITY,
  MIN_EASE_FACTOR,
  MIN_REVIEW_QUALITY,
  type LearnerState,
  type SubmissionEvent,
} from './types.js';

import type { ValueError } from '@sinclair/typebox/errors';

// ─────────────────────────────────────────────────────────────────────────────
// Schemas
// ─────────────────────────────────────────────────────────────────────────────

const TopicSchema = Type.String({ minLength: 1, maxLength: 100, pattern: '\\S' });

export const SubmissionEventSchema = Type.Object(
  {
    submissionId: Type.String({ minLength: 1, maxLength: 200 }),
    questionId: Type.String({ minLength: 1, maxLength: 200 }),
    topics: Type.Optional(Type.Array(TopicSchema, { maxItems: 50 })),
    success: Type.Boolean(),
    occurredAt: Type.String({ minLength: 1 }),
    errorPattern: Type.Optional(Type.String({ minLength: 1, maxLength: 100 })),
    quality: Type.Optional(
      Type.Integer({ minimum: MIN_REVIEW_QUALITY, maximum: MAX_REVIEW_QUALITY })
    ),
  },
  { additionalProperties: false }
);

export type SubmissionEventInput = Static<typeof SubmissionEventSchema>;

export const ReviewItemSchema = Type.Object({
  questionId: Type.String({ minLength: 1 }),
  topics: Type.Array(Type.String()),
  dueDate: Type.String({ minLength: 1 }),
  intervalDays: Type.Integer({ minimum: 1 }),
  easeFactor: Type.Number({ minimum: MIN_EASE_FACTOR, maximum: MAX_EASE_FACTOR }),
});

export const ErrorPatternSchema = Type.Object({
  topic: Type.String(),
  pattern: Type.String(),
  questionId: Type.String(),
  occurredAt: Type.String(),
});

/**
 * A stored learner state document, as read back through the persistence
 * gateway.
 */
export const LearnerStateSchema = Type.Object({
  version: Type.String(),
  updated: Type.Union([Type.String(), Type.Null()]),
  mastery: Type.Record(
    Type.String(),
    Type.Number({ minimum: MASTERY_MIN, maximum: MASTERY_MAX })
  ),
  commonErrors: Type.Record(
    Type.String(),
    Type.Array(ErrorPatternSchema, { maxItems: MAX_ERROR_PATTERNS_PER_TOPIC })
  ),
  reviews: Type.Array(ReviewItemSchema),
  streak: Type.Integer({ minimum: 0 }),
  lastSeen: Type.Union([Type.String({ pattern: '^\\d{4}-\\d{2}-\\d{2}$' }), Type.Null()]),
});

const submissionEventValidator = TypeCompiler.Compile(SubmissionEventSchema);
const learnerStateValidator = TypeCompiler.Compile(LearnerStateSchema);

// ─────────────────────────────────────────────────────────────────────────────
// Validation
// ─────────────────────────────────────────────────────────────────────────────

export const formatSchemaErrors = (errors: Iterable<ValueError>): string[] =>
  Array.from(errors).map((error) => `${error.path}: ${error.message}`);

const isParseableTimestamp = (value: string): boolean => !Number.isNaN(Date.parse(value));

/**
 * Validates an externally supplied submission event.
 * Missing topics become an empty set, to be filled by the topic resolver.
 */
export function validateSubmissionEvent(
  input: unknown
): Result<SubmissionEvent, InvalidInputError> {
  if (!submissionEventValidator.Check(input)) {
    return err(
      createInvalidInputError(
        'Invalid submission event',
        'event',
        formatSchemaErrors(submissionEventValidator.Errors(input))
      )
    );
  }

  if (!isParseableTimestamp(input.occurredAt)) {
    return err(
      createInvalidInputError('Invalid submission timestamp', 'occurredAt', [
        `/occurredAt: '${input.occurredAt}' is not a valid timestamp`,
      ])
    );
  }

  return ok({
    submissionId: input.submissionId,
    questionId: input.questionId,
    topics: input.topics ?? [],
    success: input.success,
    occurredAt: normalizeTimestamp(input.occurredAt),
    ...(input.errorPattern !== undefined && { errorPattern: input.errorPattern }),
    ...(input.quality !== undefined && { quality: input.quality }),
  });
}

/**
 * Validates a state document read from outside the core. Enforces the
 * stored invariants: mastery within [0, 1], at most 3 error patterns per
 * topic, review intervals of at least one day and ease factors within
 * [1.3, 2.5].
 */
export function validateLearnerState(input: unknown): Result<LearnerState, InvalidInputError> {
  if (!learnerStateValidator.Check(input)) {
    return err(
      createInvalidInputError(
        'Invalid learner state document',
        'state',
        formatSchemaErrors(learnerStateValidator.Errors(input))
      )
    );
  }

  const badDueDates = input.reviews.filter((review) => !isParseableTimestamp(review.dueDate));
  if (badDueDates.length > 0) {
    return err(
      createInvalidInputError(
        'Invalid review due date',
        'reviews',
        badDueDates.map(
          (review) => `/reviews/${review.questionId}: '${review.dueDate}' is not a valid timestamp`
        )
      )
    );
  }

  return ok(input);
}
