/**
 * moviedb - In-memory movie catalog
 *
 * Actors, movies and the roles linking them, with referential integrity
 * (cascade on delete), auto-increment ids and a fixed set of listing,
 * join, grouping and aggregate queries.
 *
 * @packageDocumentation
 */

// =============================================================================
// CATALOG
// =============================================================================

export { MovieCatalog, createCatalog } from './catalog.js';
export {
  DEFAULT_DATABASE_NAME,
  resolveCatalogConfig,
  type CatalogConfig,
  type ResolvedCatalogConfig,
} from './config.js';
export {
  SAMPLE_ACTORS,
  SAMPLE_MOVIES,
  SAMPLE_ROLES,
  seedSampleCatalog,
  createSampleCatalog,
  type SampleActor,
  type SampleMovie,
  type SampleRole,
  type SeedResult,
} from './seed.js';

// =============================================================================
// COMPONENTS
// =============================================================================

export { EntityStore } from './store/entity-store.js';
export type { CascadeTarget, DeleteResult, EntityLookup } from './store/types.js';
export { RelationIndex, type RoleFilter } from './relations/relation-index.js';
export { QueryEngine, TABLE_NAMES, type QueryEngineOptions } from './query/query-engine.js';
export {
  GROUP_SEPARATOR,
  groupBy,
  groupConcat,
  roundedMean,
  decadeOf,
  decadeLabel,
  maxBy,
} from './query/aggregates.js';
export {
  ActorInputSchema,
  MovieInputSchema,
  validateActorInput,
  validateMovieInput,
  type ValidatedActorInput,
  type ValidatedMovieInput,
} from './schemas.js';

// =============================================================================
// ERRORS AND LOGGING
// =============================================================================

export * from './errors/index.js';
export * from './logging/index.js';

// =============================================================================
// SHARED TYPES
// =============================================================================

export type {
  Actor,
  ActorId,
  ActorMovieCount,
  DecadeGroup,
  EntityKind,
  EntityRef,
  Movie,
  MovieActorCount,
  MovieCast,
  MovieId,
  Role,
} from '@moviedb/shared-types';
export { createActorId, createMovieId } from '@moviedb/shared-types';
