/**
 * Query Engine
 *
 * The catalog's fixed read surface. Every query re-derives its result from
 * the current store and relation index; nothing is cached between calls.
 *
 * Join conventions:
 * - inner joins walk movies (or actors) in insertion order, then each
 *   record's links in link order
 * - rows are not de-duplicated, so two movies sharing a title each
 *   contribute their cast to castOf()
 * - "per actor" counts use outer-join semantics (actors without roles
 *   count 0); "per movie" cast listings use inner-join semantics
 */

import type {
  Actor,
  ActorMovieCount,
  DecadeGroup,
  Movie,
  MovieActorCount,
  MovieCast,
} from '@moviedb/shared-types';
import type { EntityStore } from '../store/entity-store.js';
import type { RelationIndex } from '../relations/relation-index.js';
import { decadeLabel, decadeOf, groupBy, groupConcat, maxBy, roundedMean } from './aggregates.js';

/**
 * Relation names reported by showTables()
 */
export const TABLE_NAMES = {
  actors: 'Actors',
  movies: 'Movies',
  roles: 'Movie_Actors',
} as const;

export interface QueryEngineOptions {
  /** Name reported by currentDatabase() */
  databaseName: string;
}

// =============================================================================
// QUERY ENGINE
// =============================================================================

export class QueryEngine {
  private readonly store: EntityStore;
  private readonly relations: RelationIndex;
  private readonly databaseName: string;

  constructor(store: EntityStore, relations: RelationIndex, options: QueryEngineOptions) {
    this.store = store;
    this.relations = relations;
    this.databaseName = options.databaseName;
  }

  // ===========================================================================
  // LISTINGS AND FILTERS
  // ===========================================================================

  listActors(): Actor[] {
    return this.store.listActors();
  }

  listMovies(): Movie[] {
    return this.store.listMovies();
  }

  /**
   * Cast of every movie titled exactly `movieTitle`
   */
  castOf(movieTitle: string): Actor[] {
    return this.store
      .listMovies()
      .filter(movie => movie.title === movieTitle)
      .flatMap(movie => this.castMembers(movie));
  }

  /**
   * Movies of every actor named exactly `actorName`
   */
  moviesOf(actorName: string): Movie[] {
    return this.store
      .listActors()
      .filter(actor => actor.name === actorName)
      .flatMap(actor =>
        Array.from(this.relations.moviesOf(actor.id), movieId => this.store.getMovie(movieId))
      );
  }

  moviesInYear(year: number): Movie[] {
    return this.store.listMovies().filter(movie => movie.releaseYear === year);
  }

  /**
   * Actors with a known age below `maxAge`
   */
  actorsYoungerThan(maxAge: number): Actor[] {
    return this.store.listActors().filter(actor => actor.age !== null && actor.age < maxAge);
  }

  /**
   * Movies released in or after `year`, oldest first
   */
  moviesFrom(year: number): Movie[] {
    return this.store
      .listMovies()
      .filter((movie): movie is Movie & { releaseYear: number } =>
        movie.releaseYear !== null && movie.releaseYear >= year
      )
      .sort((a, b) => a.releaseYear - b.releaseYear);
  }

  // ===========================================================================
  // SINGLE-ROW QUERIES
  // ===========================================================================

  /**
   * Actor with the greatest known age; the first inserted wins a tie
   */
  oldestActor(): Actor | null {
    return maxBy(this.store.listActors(), actor => actor.age);
  }

  /**
   * Movie with the latest known release year; the first inserted wins a tie
   */
  mostRecentMovie(): Movie | null {
    return maxBy(this.store.listMovies(), movie => movie.releaseYear);
  }

  // ===========================================================================
  // GROUPING AND AGGREGATES
  // ===========================================================================

  /**
   * Movie count for every actor, highest first
   */
  movieCountPerActor(): ActorMovieCount[] {
    return this.actorMovieCounts().sort(byMovieCountDesc);
  }

  /**
   * Actors linked to more than one movie, highest count first
   */
  actorsInMultipleMovies(): ActorMovieCount[] {
    return this.actorMovieCounts()
      .filter(row => row.movieCount > 1)
      .sort(byMovieCountDesc);
  }

  /**
   * Each movie that has a cast, with the cast's names concatenated
   */
  movieCasts(): MovieCast[] {
    const rows: MovieCast[] = [];
    for (const movie of this.store.listMovies()) {
      const cast = this.castMembers(movie);
      if (cast.length === 0) continue;
      rows.push({
        movieId: movie.id,
        title: movie.title,
        releaseYear: movie.releaseYear,
        cast: groupConcat(cast.map(actor => actor.name)),
      });
    }
    return rows;
  }

  /**
   * Movies with more than one linked actor
   */
  moviesWithMultipleActors(): MovieActorCount[] {
    return this.store
      .listMovies()
      .map(movie => ({
        movieId: movie.id,
        title: movie.title,
        actorCount: this.relations.actorsOf(movie.id).size,
      }))
      .filter(row => row.actorCount > 1);
  }

  /**
   * Mean known actor age, rounded half away from zero to one decimal
   *
   * @returns `null` when no actor has a known age
   */
  averageActorAge(): number | null {
    const ages: number[] = [];
    for (const actor of this.store.listActors()) {
      if (actor.age !== null) ages.push(actor.age);
    }
    return roundedMean(ages, 1);
  }

  /**
   * Movies grouped by decade, earliest decade first. Movies without a
   * release year belong to no decade and are left out.
   */
  moviesByDecade(): DecadeGroup[] {
    const dated = this.store
      .listMovies()
      .filter((movie): movie is Movie & { releaseYear: number } => movie.releaseYear !== null);

    const groups = groupBy(dated, movie => decadeOf(movie.releaseYear));

    return Array.from(groups, ([decade, movies]) => ({
      decade,
      label: decadeLabel(decade),
      movieCount: movies.length,
      titles: groupConcat(movies.map(movie => movie.title)),
    })).sort((a, b) => a.decade - b.decade);
  }

  // ===========================================================================
  // METADATA
  // ===========================================================================

  /**
   * Names of the catalog's relations, sorted
   */
  showTables(): string[] {
    return Object.values(TABLE_NAMES).sort();
  }

  currentDatabase(): string {
    return this.databaseName;
  }

  // ===========================================================================
  // HELPERS
  // ===========================================================================

  private castMembers(movie: Movie): Actor[] {
    return Array.from(this.relations.actorsOf(movie.id), actorId => this.store.getActor(actorId));
  }

  private actorMovieCounts(): ActorMovieCount[] {
    return this.store.listActors().map(actor => ({
      actorId: actor.id,
      name: actor.name,
      movieCount: this.relations.moviesOf(actor.id).size,
    }));
  }
}

function byMovieCountDesc(a: ActorMovieCount, b: ActorMovieCount): number {
  return b.movieCount - a.movieCount;
}
