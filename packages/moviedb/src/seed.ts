/**
 * Sample catalog: five actors, five movies and six roles.
 */

import type { ActorId, MovieId } from '@moviedb/shared-types';
import { createCatalog, type MovieCatalog } from './catalog.js';
import type { CatalogConfig } from './config.js';

export interface SampleActor {
  readonly name: string;
  readonly age: number;
}

export interface SampleMovie {
  readonly title: string;
  readonly releaseYear: number;
}

/** A role, by movie title and actor name */
export interface SampleRole {
  readonly title: string;
  readonly name: string;
}

export const SAMPLE_ACTORS: readonly SampleActor[] = [
  { name: 'Tom Hanks', age: 67 },
  { name: 'Meryl Streep', age: 74 },
  { name: 'Leonardo DiCaprio', age: 49 },
  { name: 'Scarlett Johansson', age: 39 },
  { name: 'Robert Downey Jr.', age: 58 },
];

export const SAMPLE_MOVIES: readonly SampleMovie[] = [
  { title: 'Forrest Gump', releaseYear: 1994 },
  { title: 'The Devil Wears Prada', releaseYear: 2006 },
  { title: 'Titanic', releaseYear: 1997 },
  { title: 'Avengers: Endgame', releaseYear: 2019 },
  { title: 'The Shawshank Redemption', releaseYear: 1994 },
];

export const SAMPLE_ROLES: readonly SampleRole[] = [
  { title: 'Forrest Gump', name: 'Tom Hanks' },
  { title: 'The Devil Wears Prada', name: 'Meryl Streep' },
  { title: 'Titanic', name: 'Leonardo DiCaprio' },
  { title: 'Avengers: Endgame', name: 'Scarlett Johansson' },
  { title: 'Avengers: Endgame', name: 'Robert Downey Jr.' },
  { title: 'Forrest Gump', name: 'Meryl Streep' },
];

/**
 * Ids assigned while seeding, keyed by title and name
 */
export interface SeedResult {
  actors: Map<string, ActorId>;
  movies: Map<string, MovieId>;
  roles: number;
}

/**
 * Insert the sample rows into `catalog`
 */
export function seedSampleCatalog(catalog: MovieCatalog): SeedResult {
  const actors = new Map<string, ActorId>();
  for (const actor of SAMPLE_ACTORS) {
    actors.set(actor.name, catalog.insertActor(actor.name, actor.age));
  }

  const movies = new Map<string, MovieId>();
  for (const movie of SAMPLE_MOVIES) {
    movies.set(movie.title, catalog.insertMovie(movie.title, movie.releaseYear));
  }

  for (const role of SAMPLE_ROLES) {
    const movieId = movies.get(role.title);
    const actorId = actors.get(role.name);
    if (movieId === undefined || actorId === undefined) {
      throw new Error(`Sample role references unknown row: ${role.title} / ${role.name}`);
    }
    catalog.link(movieId, actorId);
  }

  return { actors, movies, roles: SAMPLE_ROLES.length };
}

/**
 * Create a catalog holding the sample rows
 */
export function createSampleCatalog(config?: CatalogConfig): MovieCatalog {
  const catalog = createCatalog(config);
  seedSampleCatalog(catalog);
  return catalog;
}
