/**
 * @moviedb/shared-types - Canonical types for the movie catalog
 *
 * This package provides the type definitions shared by the catalog core
 * and anything that renders its results:
 * - branded identifiers for actors and movies
 * - the Actor, Movie and Role records
 * - the row shapes returned by the catalog's read queries
 *
 * ## Stability
 *
 * Exports are marked with stability annotations:
 *
 * - **stable**: No breaking changes in minor versions.
 * - **experimental**: May change in any version.
 *
 * @packageDocumentation
 */

// =============================================================================
// Branded Types
// =============================================================================

declare const ActorIdBrand: unique symbol;
declare const MovieIdBrand: unique symbol;

/**
 * Branded type for actor identifiers
 *
 * Actor ids are positive integers assigned by the catalog on insert. The
 * brand keeps them from being confused with movie ids.
 *
 * @example
 * ```typescript
 * import { createActorId, type ActorId } from '@moviedb/shared-types';
 *
 * const id: ActorId = createActorId(1);
 * catalog.getActor(id);
 * ```
 * @public
 * @stability stable
 */
export type ActorId = number & { readonly [ActorIdBrand]: never };

/**
 * Branded type for movie identifiers
 * @public
 * @stability stable
 */
export type MovieId = number & { readonly [MovieIdBrand]: never };

function assertValidId(kind: string, value: number): void {
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new Error(`${kind} must be a positive safe integer: ${value}`);
  }
}

/**
 * Create an ActorId.
 *
 * @throws Error if `value` is not a positive safe integer
 * @public
 * @stability stable
 */
export function createActorId(value: number): ActorId {
  assertValidId('ActorId', value);
  return value as ActorId;
}

/**
 * Create a MovieId.
 *
 * @throws Error if `value` is not a positive safe integer
 * @public
 * @stability stable
 */
export function createMovieId(value: number): MovieId {
  assertValidId('MovieId', value);
  return value as MovieId;
}

// =============================================================================
// Records
// =============================================================================

/**
 * A performer in the catalog.
 * @public
 * @stability stable
 */
export interface Actor {
  readonly id: ActorId;
  readonly name: string;
  /** Age in years, `null` when unknown */
  readonly age: number | null;
}

/**
 * A film in the catalog.
 * @public
 * @stability stable
 */
export interface Movie {
  readonly id: MovieId;
  readonly title: string;
  /** `null` when unknown */
  readonly releaseYear: number | null;
}

/**
 * Association between a movie and one of its actors.
 *
 * (movieId, actorId) is the composite key; both sides always reference
 * records that exist in the catalog.
 * @public
 * @stability stable
 */
export interface Role {
  readonly movieId: MovieId;
  readonly actorId: ActorId;
}

/**
 * Kinds of record the catalog owns.
 * @public
 * @stability stable
 */
export type EntityKind = 'actor' | 'movie';

/**
 * Reference to a record by kind and id.
 * @public
 * @stability stable
 */
export type EntityRef =
  | { readonly kind: 'actor'; readonly id: ActorId }
  | { readonly kind: 'movie'; readonly id: MovieId };

// =============================================================================
// Query Rows
// =============================================================================

/**
 * Per-actor movie count (outer join: actors without roles count 0).
 * @public
 * @stability stable
 */
export interface ActorMovieCount {
  readonly actorId: ActorId;
  readonly name: string;
  readonly movieCount: number;
}

/**
 * A movie with the comma-joined names of its cast.
 * @public
 * @stability stable
 */
export interface MovieCast {
  readonly movieId: MovieId;
  readonly title: string;
  readonly releaseYear: number | null;
  /** Actor names in link order, joined by ", " */
  readonly cast: string;
}

/**
 * A movie with the number of actors linked to it.
 * @public
 * @stability stable
 */
export interface MovieActorCount {
  readonly movieId: MovieId;
  readonly title: string;
  readonly actorCount: number;
}

/**
 * Movies released in one decade.
 * @public
 * @stability stable
 */
export interface DecadeGroup {
  /** First year of the decade, e.g. 1990 */
  readonly decade: number;
  /** Display label, e.g. "1990s" */
  readonly label: string;
  readonly movieCount: number;
  /** Titles in insertion order, joined by ", " */
  readonly titles: string;
}

// =============================================================================
// Keys
// =============================================================================

/**
 * Build the composite key of a role.
 * @public
 * @stability stable
 */
export function roleKey(movieId: MovieId, actorId: ActorId): string {
  return `${movieId}:${actorId}`;
}
