/**
 * Relation Index
 *
 * Holds the Movie <-> Actor association (Roles) and enforces the two
 * foreign keys behind it:
 * - link() validates both endpoints against the entity store
 * - deleting a movie or actor cascades to every role referencing it
 *
 * Three structures are kept in lockstep on every link/unlink:
 * - roles: composite key -> Role, in link order
 * - actorsByMovie / moviesByActor: directional adjacency sets
 */

import { roleKey, type ActorId, type EntityRef, type MovieId, type Role } from '@moviedb/shared-types';
import { createDuplicateRoleError, createNotFoundError } from '../errors/index.js';
import type { CascadeTarget, EntityLookup } from '../store/types.js';

/**
 * Which roles unlinkAll() removes. At least one side must be named; naming
 * both targets a single role.
 */
export type RoleFilter =
  | { movieId: MovieId; actorId?: ActorId }
  | { movieId?: MovieId; actorId: ActorId };

// =============================================================================
// RELATION INDEX
// =============================================================================

export class RelationIndex implements CascadeTarget {
  private readonly entities: EntityLookup;

  private readonly roles = new Map<string, Role>();
  private readonly actorsByMovie = new Map<MovieId, Set<ActorId>>();
  private readonly moviesByActor = new Map<ActorId, Set<MovieId>>();

  /**
   * Registers itself as a cascade target of `entities`, so roles can never
   * outlive the records they reference.
   */
  constructor(entities: EntityLookup) {
    this.entities = entities;
    entities.addCascadeTarget(this);
  }

  // ===========================================================================
  // WRITES
  // ===========================================================================

  /**
   * Record that an actor appears in a movie
   *
   * @throws NotFoundError if either record does not exist
   * @throws DuplicateError if the pair is already linked
   */
  link(movieId: MovieId, actorId: ActorId): Role {
    if (!this.entities.hasMovie(movieId)) {
      throw createNotFoundError('movie', movieId);
    }
    if (!this.entities.hasActor(actorId)) {
      throw createNotFoundError('actor', actorId);
    }

    const key = roleKey(movieId, actorId);
    if (this.roles.has(key)) {
      throw createDuplicateRoleError(movieId, actorId);
    }

    const role: Role = Object.freeze({ movieId, actorId });
    this.roles.set(key, role);
    addToSet(this.actorsByMovie, movieId, actorId);
    addToSet(this.moviesByActor, actorId, movieId);
    return role;
  }

  /**
   * Remove every role matching the filter
   *
   * @returns number of roles removed (0 when nothing matched)
   */
  unlinkAll(filter: RoleFilter): number {
    const { movieId, actorId } = filter;

    if (movieId !== undefined && actorId !== undefined) {
      return this.unlink(movieId, actorId) ? 1 : 0;
    }

    let removed = 0;
    if (movieId !== undefined) {
      for (const linkedActor of Array.from(this.actorsByMovie.get(movieId) ?? [])) {
        if (this.unlink(movieId, linkedActor)) removed++;
      }
    } else if (actorId !== undefined) {
      for (const linkedMovie of Array.from(this.moviesByActor.get(actorId) ?? [])) {
        if (this.unlink(linkedMovie, actorId)) removed++;
      }
    }
    return removed;
  }

  cascadeDelete(ref: EntityRef): number {
    return ref.kind === 'actor'
      ? this.unlinkAll({ actorId: ref.id })
      : this.unlinkAll({ movieId: ref.id });
  }

  private unlink(movieId: MovieId, actorId: ActorId): boolean {
    if (!this.roles.delete(roleKey(movieId, actorId))) {
      return false;
    }
    removeFromSet(this.actorsByMovie, movieId, actorId);
    removeFromSet(this.moviesByActor, actorId, movieId);
    return true;
  }

  // ===========================================================================
  // READS
  // ===========================================================================

  /**
   * Ids of the actors linked to a movie, in link order (snapshot)
   */
  actorsOf(movieId: MovieId): ReadonlySet<ActorId> {
    return new Set(this.actorsByMovie.get(movieId));
  }

  /**
   * Ids of the movies linked to an actor, in link order (snapshot)
   */
  moviesOf(actorId: ActorId): ReadonlySet<MovieId> {
    return new Set(this.moviesByActor.get(actorId));
  }

  hasRole(movieId: MovieId, actorId: ActorId): boolean {
    return this.roles.has(roleKey(movieId, actorId));
  }

  /**
   * All roles in link order (snapshot)
   */
  listRoles(): Role[] {
    return Array.from(this.roles.values());
  }

  roleCount(): number {
    return this.roles.size;
  }
}

// =============================================================================
// HELPERS
// =============================================================================

function addToSet<K, V>(index: Map<K, Set<V>>, key: K, value: V): void {
  const existing = index.get(key);
  if (existing) {
    existing.add(value);
  } else {
    index.set(key, new Set([value]));
  }
}

function removeFromSet<K, V>(index: Map<K, Set<V>>, key: K, value: V): void {
  const existing = index.get(key);
  if (!existing) return;
  existing.delete(value);
  if (existing.size === 0) {
    index.delete(key);
  }
}
