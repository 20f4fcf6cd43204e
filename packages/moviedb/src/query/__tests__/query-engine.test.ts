/**
 * Query Engine Tests
 *
 * Join, grouping and aggregate semantics over small hand-built catalogs:
 * unknown ages and years, ties, duplicate names and empty inputs.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { EntityStore } from '../../store/entity-store.js';
import { RelationIndex } from '../../relations/relation-index.js';
import { QueryEngine, TABLE_NAMES } from '../query-engine.js';

// =============================================================================
// TEST FIXTURES
// =============================================================================

interface Harness {
  store: EntityStore;
  relations: RelationIndex;
  engine: QueryEngine;
}

function createHarness(databaseName = 'TestDB'): Harness {
  const store = new EntityStore();
  const relations = new RelationIndex(store);
  return { store, relations, engine: new QueryEngine(store, relations, { databaseName }) };
}

// =============================================================================
// EMPTY CATALOG
// =============================================================================

describe('QueryEngine - empty catalog', () => {
  let engine: QueryEngine;

  beforeEach(() => {
    engine = createHarness().engine;
  });

  it('should return empty listings', () => {
    expect(engine.listActors()).toEqual([]);
    expect(engine.listMovies()).toEqual([]);
    expect(engine.castOf('Anything')).toEqual([]);
    expect(engine.moviesOf('Anyone')).toEqual([]);
    expect(engine.movieCountPerActor()).toEqual([]);
    expect(engine.movieCasts()).toEqual([]);
    expect(engine.moviesByDecade()).toEqual([]);
  });

  it('should return null for single-row queries and the average', () => {
    expect(engine.oldestActor()).toBeNull();
    expect(engine.mostRecentMovie()).toBeNull();
    expect(engine.averageActorAge()).toBeNull();
  });
});

// =============================================================================
// FILTERS
// =============================================================================

describe('QueryEngine - filters', () => {
  it('should skip actors with unknown age', () => {
    const { store, engine } = createHarness();
    store.insertActor('Unknown');
    store.insertActor('Young', 20);
    store.insertActor('Old', 80);

    expect(engine.actorsYoungerThan(50).map(a => a.name)).toEqual(['Young']);
  });

  it('should compare age strictly', () => {
    const { store, engine } = createHarness();
    store.insertActor('Exactly', 50);

    expect(engine.actorsYoungerThan(50)).toEqual([]);
  });

  it('should match the release year exactly', () => {
    const { store, engine } = createHarness();
    store.insertMovie('Undated');
    store.insertMovie('Match', 1994);
    store.insertMovie('Other', 1995);

    expect(engine.moviesInYear(1994).map(m => m.title)).toEqual(['Match']);
  });

  it('should sort moviesFrom ascending and include the boundary year', () => {
    const { store, engine } = createHarness();
    store.insertMovie('Late', 2019);
    store.insertMovie('Undated');
    store.insertMovie('Boundary', 2000);
    store.insertMovie('Early', 1999);
    store.insertMovie('Middle', 2006);

    expect(engine.moviesFrom(2000).map(m => m.title)).toEqual(['Boundary', 'Middle', 'Late']);
  });
});

// =============================================================================
// JOINS
// =============================================================================

describe('QueryEngine - joins', () => {
  it('should list cast in link order', () => {
    const { store, relations, engine } = createHarness();
    const movie = store.insertMovie('Ensemble', 2001);
    const first = store.insertActor('First');
    const second = store.insertActor('Second');
    relations.link(movie, second);
    relations.link(movie, first);

    expect(engine.castOf('Ensemble').map(a => a.name)).toEqual(['Second', 'First']);
  });

  it('should not de-duplicate movies sharing a title', () => {
    const { store, relations, engine } = createHarness();
    const original = store.insertMovie('Remade', 1960);
    const remake = store.insertMovie('Remade', 2010);
    const actor = store.insertActor('Both');
    relations.link(original, actor);
    relations.link(remake, actor);

    expect(engine.castOf('Remade').map(a => a.name)).toEqual(['Both', 'Both']);
    expect(engine.moviesOf('Both').map(m => m.releaseYear)).toEqual([1960, 2010]);
  });

  it('should match titles and names exactly', () => {
    const { store, relations, engine } = createHarness();
    const movie = store.insertMovie('Case', 2000);
    relations.link(movie, store.insertActor('Someone'));

    expect(engine.castOf('case')).toEqual([]);
    expect(engine.moviesOf('someone')).toEqual([]);
  });
});

// =============================================================================
// GROUPING
// =============================================================================

describe('QueryEngine - grouping', () => {
  it('should count zero movies for unlinked actors', () => {
    const { store, relations, engine } = createHarness();
    const lonely = store.insertActor('Lonely');
    const busy = store.insertActor('Busy');
    relations.link(store.insertMovie('One'), busy);

    expect(engine.movieCountPerActor()).toEqual([
      { actorId: busy, name: 'Busy', movieCount: 1 },
      { actorId: lonely, name: 'Lonely', movieCount: 0 },
    ]);
  });

  it('should keep insertion order between equal counts', () => {
    const { store, relations, engine } = createHarness();
    const movieA = store.insertMovie('A');
    const movieB = store.insertMovie('B');
    const first = store.insertActor('First');
    const second = store.insertActor('Second');
    const third = store.insertActor('Third');
    relations.link(movieA, first);
    relations.link(movieA, second);
    relations.link(movieB, second);
    relations.link(movieA, third);
    relations.link(movieB, third);

    expect(engine.actorsInMultipleMovies().map(row => row.name)).toEqual(['Second', 'Third']);
  });

  it('should report casts only for movies that have one', () => {
    const { store, relations, engine } = createHarness();
    store.insertMovie('Empty', 2000);
    const cast = store.insertMovie('Cast', null);
    relations.link(cast, store.insertActor('Lead'));
    relations.link(cast, store.insertActor('Support'));

    expect(engine.movieCasts()).toEqual([
      { movieId: cast, title: 'Cast', releaseYear: null, cast: 'Lead, Support' },
    ]);
    expect(engine.moviesWithMultipleActors()).toEqual([
      { movieId: cast, title: 'Cast', actorCount: 2 },
    ]);
  });

  it('should group by decade and leave out undated movies', () => {
    const { store, engine } = createHarness();
    store.insertMovie('Ninety Nine', 1999);
    store.insertMovie('Undated');
    store.insertMovie('Eighty', 1980);
    store.insertMovie('Ninety', 1990);

    expect(engine.moviesByDecade()).toEqual([
      { decade: 1980, label: '1980s', movieCount: 1, titles: 'Eighty' },
      { decade: 1990, label: '1990s', movieCount: 2, titles: 'Ninety Nine, Ninety' },
    ]);
  });

  it('should average known ages only', () => {
    const { store, engine } = createHarness();
    store.insertActor('A', 57);
    store.insertActor('B', 57);
    store.insertActor('Unknown');
    store.insertActor('C', 57);
    store.insertActor('D', 58);

    expect(engine.averageActorAge()).toBe(57.3);
  });
});

// =============================================================================
// SINGLE-ROW QUERIES AND METADATA
// =============================================================================

describe('QueryEngine - single-row queries', () => {
  it('should pick the first inserted on ties', () => {
    const { store, engine } = createHarness();
    store.insertActor('Unknown');
    store.insertActor('Elder', 70);
    store.insertActor('Twin', 70);
    store.insertMovie('Newest', 2020);
    store.insertMovie('Also Newest', 2020);

    expect(engine.oldestActor()?.name).toBe('Elder');
    expect(engine.mostRecentMovie()?.title).toBe('Newest');
  });

  it('should return null when no value is known', () => {
    const { store, engine } = createHarness();
    store.insertActor('Ageless');
    store.insertMovie('Timeless');

    expect(engine.oldestActor()).toBeNull();
    expect(engine.mostRecentMovie()).toBeNull();
  });
});

describe('QueryEngine - metadata', () => {
  it('should list the relation names sorted', () => {
    const { engine } = createHarness();

    expect(engine.showTables()).toEqual(['Actors', 'Movie_Actors', 'Movies']);
    expect(Object.keys(TABLE_NAMES)).toHaveLength(3);
  });

  it('should report the configured database name', () => {
    expect(createHarness('Archive').engine.currentDatabase()).toBe('Archive');
  });
});
