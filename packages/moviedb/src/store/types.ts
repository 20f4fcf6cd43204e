/**
 * Entity store contracts shared with the relation index
 */

import type { ActorId, EntityRef, MovieId } from '@moviedb/shared-types';

/**
 * Dependent of the store that must drop rows referencing a deleted record
 * (the ON DELETE CASCADE side of a foreign key).
 */
export interface CascadeTarget {
  /**
   * Remove everything referencing `ref`
   * @returns number of rows removed
   */
  cascadeDelete(ref: EntityRef): number;
}

/**
 * Read access to record existence plus cascade registration
 */
export interface EntityLookup {
  hasActor(id: ActorId): boolean;
  hasMovie(id: MovieId): boolean;
  addCascadeTarget(target: CascadeTarget): void;
}

/**
 * Outcome of a delete
 */
export interface DeleteResult<T> {
  /** The record that was removed */
  deleted: T;
  /** Dependent rows removed by cascade */
  cascaded: number;
}
