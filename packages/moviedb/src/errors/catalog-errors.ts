/**
 * Catalog Error Classes
 *
 * The three failures a catalog write can raise, plus configuration errors.
 *
 * @packageDocumentation
 */

import type { ActorId, EntityKind, MovieId } from '@moviedb/shared-types';
import type { ZodError } from 'zod';
import { CatalogError, ErrorCategory, type CatalogErrorOptions } from './base.js';
import { CatalogErrorCode, ConfigErrorCode } from './codes.js';

// =============================================================================
// VALIDATION ERROR
// =============================================================================

/**
 * Error thrown when insert input is missing a required field or has the
 * wrong shape
 *
 * @example
 * ```typescript
 * try {
 *   catalog.insertActor('');
 * } catch (error) {
 *   if (error instanceof ValidationError) {
 *     console.log(error.context?.field); // 'name'
 *   }
 * }
 * ```
 */
export class ValidationError extends CatalogError {
  readonly code = CatalogErrorCode.VALIDATION;
  readonly category = ErrorCategory.VALIDATION;

  constructor(message: string, options?: CatalogErrorOptions) {
    super(message, options, 'Provide a non-empty value for every required field');
    this.name = 'ValidationError';
  }

  override toUserMessage(): string {
    const field = this.context?.field;
    return field ? `Invalid value for "${field}": ${this.message}` : this.message;
  }
}

// =============================================================================
// NOT FOUND ERROR
// =============================================================================

/**
 * Error thrown when an id does not reference an existing record
 */
export class NotFoundError extends CatalogError {
  readonly code = CatalogErrorCode.NOT_FOUND;
  readonly category = ErrorCategory.RESOURCE;

  constructor(message: string, options?: CatalogErrorOptions) {
    super(message, options);
    this.name = 'NotFoundError';
  }

  override toUserMessage(): string {
    const { entity, id } = this.context ?? {};
    if (entity && id !== undefined) {
      return `No ${entity} exists with id ${id}.`;
    }
    return this.message;
  }
}

// =============================================================================
// DUPLICATE ERROR
// =============================================================================

/**
 * Error thrown when linking a movie/actor pair that is already linked
 */
export class DuplicateError extends CatalogError {
  readonly code = CatalogErrorCode.DUPLICATE;
  readonly category = ErrorCategory.CONFLICT;

  constructor(message: string, options?: CatalogErrorOptions) {
    super(message, options, 'Check hasRole() before linking');
    this.name = 'DuplicateError';
  }

  override toUserMessage(): string {
    return 'This actor is already part of the movie cast.';
  }
}

// =============================================================================
// CONFIG ERROR
// =============================================================================

/**
 * Error thrown when a catalog configuration object is rejected
 */
export class ConfigError extends CatalogError {
  readonly code = ConfigErrorCode.INVALID;
  readonly category = ErrorCategory.VALIDATION;

  constructor(message: string, options?: CatalogErrorOptions) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

// =============================================================================
// FACTORY FUNCTIONS
// =============================================================================

/**
 * Create a NotFoundError for a missing actor or movie
 *
 * @example
 * ```typescript
 * throw createNotFoundError('actor', 7);
 * // NotFoundError: actor 7 not found
 * ```
 */
export function createNotFoundError(entity: EntityKind, id: number): NotFoundError {
  return new NotFoundError(`${entity} ${id} not found`, { context: { entity, id } });
}

/**
 * Create a DuplicateError for an existing role
 */
export function createDuplicateRoleError(movieId: MovieId, actorId: ActorId): DuplicateError {
  return new DuplicateError(`actor ${actorId} is already linked to movie ${movieId}`, {
    context: { entity: 'role', metadata: { movieId, actorId } },
  });
}

/**
 * Wrap a zod failure in a ValidationError.
 *
 * The first issue's path becomes `context.field`; every issue is kept in
 * `context.metadata.issues`.
 */
export function createValidationError(entity: EntityKind, zodError: ZodError): ValidationError {
  const issues = zodError.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
  const first = zodError.issues[0];
  const field = first && first.path.length > 0 ? String(first.path[0]) : undefined;

  return new ValidationError(
    `Invalid ${entity}: ${issues.map((i) => (i.path ? `${i.path}: ${i.message}` : i.message)).join('; ')}`,
    { cause: zodError, context: { entity, field, metadata: { issues } } }
  );
}

/**
 * Wrap a zod failure in a ConfigError
 */
export function createConfigError(zodError: ZodError): ConfigError {
  return new ConfigError(
    `Invalid catalog config: ${zodError.issues.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ')}`,
    { cause: zodError }
  );
}
