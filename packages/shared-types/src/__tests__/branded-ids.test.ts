/**
 * Branded Id Tests
 *
 * Verifies the id factories and the role key exported by
 * @moviedb/shared-types.
 */

import { describe, it, expect } from 'vitest';
import { createActorId, createMovieId, roleKey } from '../index.js';

describe('id factories', () => {
  it('should accept positive integers', () => {
    expect(createActorId(1)).toBe(1);
    expect(createMovieId(42)).toBe(42);
  });

  it('should reject zero, negatives and fractions', () => {
    expect(() => createActorId(0)).toThrow('ActorId must be a positive safe integer: 0');
    expect(() => createMovieId(-3)).toThrow('MovieId must be a positive safe integer: -3');
    expect(() => createActorId(1.5)).toThrow('ActorId must be a positive safe integer: 1.5');
  });

  it('should reject integers beyond the safe range', () => {
    expect(() => createMovieId(Number.MAX_SAFE_INTEGER + 1)).toThrow(
      'MovieId must be a positive safe integer'
    );
  });
});

describe('roleKey', () => {
  it('should join movie and actor ids', () => {
    expect(roleKey(createMovieId(4), createActorId(5))).toBe('4:5');
  });
});
