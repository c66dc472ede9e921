import type { ZodError } from 'zod';
import { createDeckSchema, type DeckSchemaOptions } from './DeckSchema.js';
import { SchemaValidationError } from '../core/errors.js';
import { DEFAULT_ENGINE_OPTIONS, type SlideDeckSpec } from '../types/index.js';
import { deepFreeze } from '../utils/deepFreeze.js';

/**
 * Validates loose deck input and returns an immutable deck.
 *
 * @throws SchemaValidationError on the first problem found, with the
 * offending slide's index when the problem is inside a slide
 */
export function createSlideDeck(input: unknown, options: Partial<DeckSchemaOptions> = {}): SlideDeckSpec {
  const schema = createDeckSchema({
    fallbackImagePath: options.fallbackImagePath ?? DEFAULT_ENGINE_OPTIONS.fallbackImagePath,
    defaultChartType: options.defaultChartType ?? DEFAULT_ENGINE_OPTIONS.defaultChartType,
  });

  const result = schema.safeParse(input);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return deepFreeze(result.data);
}

/**
 * Converts the first zod issue to a SchemaValidationError.
 */
function toValidationError(error: ZodError): SchemaValidationError {
  const [issue] = error.issues;
  if (!issue) {
    return new SchemaValidationError(error.message);
  }

  const [root, index, ...rest] = issue.path;
  if (root === 'slides' && typeof index === 'number') {
    const where = rest.join('.');
    return new SchemaValidationError(where ? `${where}: ${issue.message}` : issue.message, index);
  }

  const where = issue.path.join('.');
  return new SchemaValidationError(where ? `${where}: ${issue.message}` : issue.message);
}
