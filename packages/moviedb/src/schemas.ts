/**
 * Catalog Zod Schemas
 *
 * Runtime validation for the records accepted by insertActor/insertMovie.
 */

import { z } from 'zod';
import { createValidationError } from './errors/index.js';

// =============================================================================
// Field Schemas
// =============================================================================

/**
 * Required text column: must contain a non-whitespace character
 */
const RequiredTextSchema = z
  .string({ required_error: 'is required', invalid_type_error: 'must be a string' })
  .refine((value) => value.trim().length > 0, { message: 'must not be empty' });

/**
 * Optional integer column; `undefined` and `null` both mean unknown
 */
const OptionalIntegerSchema = z
  .number({ invalid_type_error: 'must be a number' })
  .int('must be an integer')
  .nullish()
  .transform((value) => value ?? null);

// =============================================================================
// Record Input Schemas
// =============================================================================

/**
 * Actor insert input
 */
export const ActorInputSchema = z.object({
  name: RequiredTextSchema,
  age: OptionalIntegerSchema.refine((value) => value === null || value >= 0, {
    message: 'must not be negative',
  }),
});

export type ValidatedActorInput = z.infer<typeof ActorInputSchema>;

/**
 * Movie insert input
 */
export const MovieInputSchema = z.object({
  title: RequiredTextSchema,
  releaseYear: OptionalIntegerSchema,
});

export type ValidatedMovieInput = z.infer<typeof MovieInputSchema>;

// =============================================================================
// Validation Functions
// =============================================================================

/**
 * Validate actor insert input
 *
 * @throws ValidationError if validation fails
 */
export function validateActorInput(data: unknown): ValidatedActorInput {
  const result = ActorInputSchema.safeParse(data);
  if (!result.success) {
    throw createValidationError('actor', result.error);
  }
  return result.data;
}

/**
 * Validate movie insert input
 *
 * @throws ValidationError if validation fails
 */
export function validateMovieInput(data: unknown): ValidatedMovieInput {
  const result = MovieInputSchema.safeParse(data);
  if (!result.success) {
    throw createValidationError('movie', result.error);
  }
  return result.data;
}
