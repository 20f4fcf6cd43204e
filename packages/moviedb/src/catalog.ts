/**
 * Movie Catalog
 *
 * Wires the entity store, relation index and query engine together and
 * exposes the catalog's complete surface: inserts, deletes and links on the
 * write side, the fixed set of queries on the read side.
 *
 * All operations are synchronous and run to completion, so a caller on one
 * event loop always observes a consistent catalog.
 *
 * @example
 * ```typescript
 * const catalog = createCatalog({ logLevel: 'info' });
 * const movie = catalog.insertMovie('Example Movie', 2001);
 * const actor = catalog.insertActor('Example Actor', 40);
 * catalog.link(movie, actor);
 *
 * catalog.castOf('Example Movie'); // [{ id: 1, name: 'Example Actor', age: 40 }]
 * ```
 */

import type {
  Actor,
  ActorId,
  ActorMovieCount,
  DecadeGroup,
  Movie,
  MovieActorCount,
  MovieCast,
  MovieId,
  Role,
} from '@moviedb/shared-types';
import { resolveCatalogConfig, type CatalogConfig } from './config.js';
import { CatalogError } from './errors/index.js';
import type { StructuredLogger } from './logging/index.js';
import { QueryEngine } from './query/query-engine.js';
import { RelationIndex, type RoleFilter } from './relations/relation-index.js';
import { EntityStore } from './store/entity-store.js';
import type { DeleteResult } from './store/types.js';

// =============================================================================
// MOVIE CATALOG
// =============================================================================

export class MovieCatalog {
  private readonly store: EntityStore;
  private readonly relations: RelationIndex;
  private readonly queries: QueryEngine;
  private readonly logger: StructuredLogger;

  constructor(config: CatalogConfig = {}) {
    const resolved = resolveCatalogConfig(config);

    this.logger = resolved.logger.child({ database: resolved.databaseName });
    this.store = new EntityStore();
    this.relations = new RelationIndex(this.store);
    this.queries = new QueryEngine(this.store, this.relations, {
      databaseName: resolved.databaseName,
    });
  }

  // ===========================================================================
  // WRITES
  // ===========================================================================

  insertActor(name: string, age?: number | null): ActorId {
    const id = this.write('insertActor', { name }, () => this.store.insertActor(name, age));
    this.logger.debug('inserted actor {actorId}', { actorId: id });
    return id;
  }

  insertMovie(title: string, releaseYear?: number | null): MovieId {
    const id = this.write('insertMovie', { title }, () => this.store.insertMovie(title, releaseYear));
    this.logger.debug('inserted movie {movieId}', { movieId: id });
    return id;
  }

  link(movieId: MovieId, actorId: ActorId): Role {
    const role = this.write('link', { movieId, actorId }, () => this.relations.link(movieId, actorId));
    this.logger.debug('linked actor {actorId} to movie {movieId}', { movieId, actorId });
    return role;
  }

  unlinkAll(filter: RoleFilter): number {
    const removed = this.relations.unlinkAll(filter);
    this.logger.debug('unlinked {removed} role(s)', { ...filter, removed });
    return removed;
  }

  deleteActor(id: ActorId): DeleteResult<Actor> {
    const result = this.write('deleteActor', { actorId: id }, () => this.store.deleteActor(id));
    this.logger.info('deleted actor {actorId}, cascaded {cascaded} role(s)', {
      actorId: id,
      cascaded: result.cascaded,
    });
    return result;
  }

  deleteMovie(id: MovieId): DeleteResult<Movie> {
    const result = this.write('deleteMovie', { movieId: id }, () => this.store.deleteMovie(id));
    this.logger.info('deleted movie {movieId}, cascaded {cascaded} role(s)', {
      movieId: id,
      cascaded: result.cascaded,
    });
    return result;
  }

  /**
   * Apply a write. A rejected write is logged at warn and rethrown unchanged;
   * success is logged by the caller once the write has been applied.
   */
  private write<T>(operation: string, context: Record<string, unknown>, apply: () => T): T {
    try {
      return apply();
    } catch (error) {
      if (error instanceof CatalogError) {
        this.logger.warn(`${operation} rejected: ${error.message}`, {
          ...context,
          operation,
          ...error.toLogContext(),
        });
      }
      throw error;
    }
  }

  // ===========================================================================
  // RECORD ACCESS
  // ===========================================================================

  getActor(id: ActorId): Actor {
    return this.store.getActor(id);
  }

  getMovie(id: MovieId): Movie {
    return this.store.getMovie(id);
  }

  actorsOf(movieId: MovieId): ReadonlySet<ActorId> {
    return this.relations.actorsOf(movieId);
  }

  moviesOfActor(actorId: ActorId): ReadonlySet<MovieId> {
    return this.relations.moviesOf(actorId);
  }

  hasRole(movieId: MovieId, actorId: ActorId): boolean {
    return this.relations.hasRole(movieId, actorId);
  }

  listRoles(): Role[] {
    return this.relations.listRoles();
  }

  roleCount(): number {
    return this.relations.roleCount();
  }

  // ===========================================================================
  // QUERIES
  // ===========================================================================

  listActors(): Actor[] {
    return this.queries.listActors();
  }

  listMovies(): Movie[] {
    return this.queries.listMovies();
  }

  castOf(movieTitle: string): Actor[] {
    return this.queries.castOf(movieTitle);
  }

  moviesOf(actorName: string): Movie[] {
    return this.queries.moviesOf(actorName);
  }

  moviesInYear(year: number): Movie[] {
    return this.queries.moviesInYear(year);
  }

  actorsYoungerThan(maxAge: number): Actor[] {
    return this.queries.actorsYoungerThan(maxAge);
  }

  movieCountPerActor(): ActorMovieCount[] {
    return this.queries.movieCountPerActor();
  }

  oldestActor(): Actor | null {
    return this.queries.oldestActor();
  }

  moviesFrom(year: number): Movie[] {
    return this.queries.moviesFrom(year);
  }

  movieCasts(): MovieCast[] {
    return this.queries.movieCasts();
  }

  moviesWithMultipleActors(): MovieActorCount[] {
    return this.queries.moviesWithMultipleActors();
  }

  averageActorAge(): number | null {
    return this.queries.averageActorAge();
  }

  moviesByDecade(): DecadeGroup[] {
    return this.queries.moviesByDecade();
  }

  actorsInMultipleMovies(): ActorMovieCount[] {
    return this.queries.actorsInMultipleMovies();
  }

  mostRecentMovie(): Movie | null {
    return this.queries.mostRecentMovie();
  }

  showTables(): string[] {
    return this.queries.showTables();
  }

  currentDatabase(): string {
    return this.queries.currentDatabase();
  }
}

/**
 * Create an empty catalog
 *
 * @throws ConfigError if the configuration is rejected
 */
export function createCatalog(config?: CatalogConfig): MovieCatalog {
  return new MovieCatalog(config);
}
