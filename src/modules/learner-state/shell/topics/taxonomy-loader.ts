import fs from 'node:fs/promises';

import { Type, type Static } from '@sinclair/typebox';
import { TypeCompiler } from '@sinclair/typebox/compiler';
import { err, ok, type Result } from 'neverthrow';
import { parse as parseYaml } from 'yaml';

import {
  createInvalidInputError,
  createUpstreamUnavailableError,
  type LearnerStateError,
} from '../../core/errors.js';
import { formatSchemaErrors } from '../../core/schemas.js';
import { buildTopicIndex, type TopicIndex, type TopicTaxonomy } from '../../core/topics.js';

const TopicTaxonomySchema = Type.Record(
  Type.String({ minLength: 1 }),
  Type.Array(Type.String({ minLength: 1 }))
);

type TopicTaxonomyFile = Static<typeof TopicTaxonomySchema>;

const validator = TypeCompiler.Compile(TopicTaxonomySchema);

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Reads a taxonomy YAML file (primary topic -> list of spellings).
 */
export const loadTopicTaxonomy = async (
  filePath: string
): Promise<Result<TopicTaxonomy, LearnerStateError>> => {
  let contents: string;

  try {
    contents = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    return err(
      createUpstreamUnavailableError(
        'topics',
        `Failed to read topic taxonomy at ${filePath}: ${errorMessage(error)}`,
        error,
        false
      )
    );
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(contents);
  } catch (error) {
    return err(
      createUpstreamUnavailableError(
        'topics',
        `Failed to parse YAML at ${filePath}: ${errorMessage(error)}`,
        error,
        false
      )
    );
  }

  if (!validator.Check(parsed)) {
    return err(
      createInvalidInputError(
        `Schema validation failed for ${filePath}`,
        'taxonomy',
        formatSchemaErrors(validator.Errors(parsed))
      )
    );
  }

  const taxonomy: TopicTaxonomyFile = parsed;
  return ok(taxonomy);
};

/**
 * Loads a taxonomy file and builds its alias index.
 */
export const loadTopicIndex = async (
  filePath: string
): Promise<Result<TopicIndex, LearnerStateError>> => {
  const taxonomyResult = await loadTopicTaxonomy(filePath);
  return taxonomyResult.map(buildTopicIndex);
};
