/**
 * Entity Store
 *
 * Owns the Actor and Movie records. Identity works like an AUTO_INCREMENT
 * primary key: one counter per record type, starting at 1 and never
 * rewound, so an id is never handed out twice even after its record is
 * deleted.
 *
 * Deletes notify every registered CascadeTarget after the record is gone.
 */

import {
  createActorId,
  createMovieId,
  type Actor,
  type ActorId,
  type EntityRef,
  type Movie,
  type MovieId,
} from '@moviedb/shared-types';
import { createNotFoundError } from '../errors/index.js';
import { validateActorInput, validateMovieInput } from '../schemas.js';
import type { CascadeTarget, DeleteResult, EntityLookup } from './types.js';

// =============================================================================
// ENTITY STORE
// =============================================================================

export class EntityStore implements EntityLookup {
  private readonly actors = new Map<ActorId, Actor>();
  private readonly movies = new Map<MovieId, Movie>();

  /** Next id to assign; only ever incremented */
  private nextActorId = 1;
  private nextMovieId = 1;

  private readonly cascadeTargets: CascadeTarget[] = [];

  /**
   * Register a dependent that must drop rows referencing deleted records
   */
  addCascadeTarget(target: CascadeTarget): void {
    if (!this.cascadeTargets.includes(target)) {
      this.cascadeTargets.push(target);
    }
  }

  // ===========================================================================
  // INSERT
  // ===========================================================================

  /**
   * Insert an actor and return its new id
   *
   * @throws ValidationError if `name` is empty or `age` is not a
   *   non-negative integer
   */
  insertActor(name: string, age?: number | null): ActorId {
    const input = validateActorInput({ name, age });
    const id = createActorId(this.nextActorId);
    this.nextActorId++;

    this.actors.set(id, Object.freeze({ id, name: input.name, age: input.age }));
    return id;
  }

  /**
   * Insert a movie and return its new id
   *
   * @throws ValidationError if `title` is empty or `releaseYear` is not an
   *   integer
   */
  insertMovie(title: string, releaseYear?: number | null): MovieId {
    const input = validateMovieInput({ title, releaseYear });
    const id = createMovieId(this.nextMovieId);
    this.nextMovieId++;

    this.movies.set(id, Object.freeze({ id, title: input.title, releaseYear: input.releaseYear }));
    return id;
  }

  // ===========================================================================
  // LOOKUP
  // ===========================================================================

  /**
   * @throws NotFoundError if no actor has this id
   */
  getActor(id: ActorId): Actor {
    const actor = this.actors.get(id);
    if (!actor) {
      throw createNotFoundError('actor', id);
    }
    return actor;
  }

  /**
   * @throws NotFoundError if no movie has this id
   */
  getMovie(id: MovieId): Movie {
    const movie = this.movies.get(id);
    if (!movie) {
      throw createNotFoundError('movie', id);
    }
    return movie;
  }

  hasActor(id: ActorId): boolean {
    return this.actors.has(id);
  }

  hasMovie(id: MovieId): boolean {
    return this.movies.has(id);
  }

  /**
   * All actors in insertion order. The array is a snapshot; later writes do
   * not show up in it.
   */
  listActors(): Actor[] {
    return Array.from(this.actors.values());
  }

  /**
   * All movies in insertion order (snapshot)
   */
  listMovies(): Movie[] {
    return Array.from(this.movies.values());
  }

  actorCount(): number {
    return this.actors.size;
  }

  movieCount(): number {
    return this.movies.size;
  }

  // ===========================================================================
  // DELETE
  // ===========================================================================

  /**
   * Delete an actor and every role referencing it
   *
   * @throws NotFoundError if no actor has this id; nothing is changed
   */
  deleteActor(id: ActorId): DeleteResult<Actor> {
    const actor = this.getActor(id);
    this.actors.delete(id);
    return { deleted: actor, cascaded: this.cascade({ kind: 'actor', id }) };
  }

  /**
   * Delete a movie and every role referencing it
   *
   * @throws NotFoundError if no movie has this id; nothing is changed
   */
  deleteMovie(id: MovieId): DeleteResult<Movie> {
    const movie = this.getMovie(id);
    this.movies.delete(id);
    return { deleted: movie, cascaded: this.cascade({ kind: 'movie', id }) };
  }

  private cascade(ref: EntityRef): number {
    let removed = 0;
    for (const target of this.cascadeTargets) {
      removed += target.cascadeDelete(ref);
    }
    return removed;
  }
}
