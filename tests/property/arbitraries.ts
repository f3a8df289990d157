/**
 * fast-check arbitraries for coordinates, patterns and selections.
 */
import * as fc from 'fast-check';
import { createCoordinate, serializeCoordinate } from '../../src/core/coordinate/parser.js';
import type { Coordinate } from '../../src/core/coordinate/types.js';
import { createPattern } from '../../src/core/patterns/loader.js';
import type { Pattern } from '../../src/core/patterns/types.js';

export const TAG_POOL = ['auth', 'jwt', 'model', 'schema', 'crud', 'api', 'cache', 'docker', 'test', 'sql'];

export const coordinateArb: fc.Arbitrary<Coordinate> = fc
  .record({
    layer: fc.integer({ min: 1, max: 7 }),
    quadrant: fc.integer({ min: 1, max: 4 }),
    lexicon: fc.stringMatching(/^[A-Z][A-Z0-9_]{0,5}$/),
    entity: fc
      .array(fc.stringMatching(/^[A-Z_][A-Z0-9_]{0,6}$/), { minLength: 1, maxLength: 3 })
      .map((segments) => segments.join('.')),
    variant: fc.option(fc.stringMatching(/^[a-z0-9][A-Za-z0-9_-]{0,5}$/), { nil: undefined }),
    coherenceClass: fc.integer({ min: 0, max: 3 }),
  })
  .map(createCoordinate);

export const tagsArb = fc.subarray(TAG_POOL);

export const patternArb: fc.Arbitrary<Pattern> = fc
  .record({ coordinate: coordinateArb, tags: tagsArb })
  .map(({ coordinate, tags }) => createPattern({
    coordinate,
    tags,
    title: serializeCoordinate(coordinate),
    body: 'pass',
    language: 'python',
  }));

/** Patterns with pairwise distinct coordinates. */
export const patternsArb = (maxLength = 20): fc.Arbitrary<Pattern[]> =>
  fc.uniqueArray(patternArb, {
    maxLength,
    selector: (pattern) => serializeCoordinate(pattern.coordinate),
  });
