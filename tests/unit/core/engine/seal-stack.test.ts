/**
 * Tests for the SealStack facade: retrieval, search and module building.
 */
import { describe, it, expect, vi, afterEach } from 'vitest';
import { SealStack } from '../../../../src/core/engine/seal-stack.js';
import { SealLayerIndex } from '../../../../src/core/seal-index/seal-index.js';
import { serializeCoordinate } from '../../../../src/core/coordinate/parser.js';
import type { SearchHit } from '../../../../src/core/engine/types.js';
import {
  AssemblyError,
  CoordinateError,
  ErrorCodes,
  StoreError,
} from '../../../../src/utils/errors.js';
import {
  AUTH_MIDDLEWARE,
  DATACLASS,
  makePattern,
  twoLayerPatterns,
  userVocabulary,
} from '../../../helpers/patterns.js';

const PASSWORD_HASH = 'L4.Q1.AUTH.PASSWORD.HASH[C3]';
const SQL_TABLE = 'L2.Q1.DATA.SQL.TABLE[C2]';

function fourPatterns() {
  return [
    ...twoLayerPatterns(),
    makePattern(PASSWORD_HASH, ['auth', 'password']),
    makePattern(SQL_TABLE, ['schema', 'table']),
  ];
}

const hitKeys = (hits: SearchHit[]) => hits.map((h) => [serializeCoordinate(h.pattern.coordinate), h.overlap]);

describe('SealStack', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('buildModule', () => {
    it('assembles the two-layer users module', () => {
      const stack = new SealStack(twoLayerPatterns(), { vocabulary: userVocabulary() });
      const result = stack.buildModule('Create a users module with auth');

      expect(result.report.present).toEqual([2, 4]);
      expect(result.report.absent).toEqual([1, 3, 5, 6, 7]);
      expect(result.completeness).toBeCloseTo(0.2857, 4);
      expect(result.coherence).toBe(2);
      expect(result.entity).toBe('user');
      expect(result.output).toContain('class User:');
      expect(result.output).toContain('def require_user():');
    });

    it('fails with EMPTY_MODULE when no layer matches', () => {
      const stack = new SealStack(twoLayerPatterns(), { vocabulary: userVocabulary() });

      expect(() => stack.buildModule('quantum teleport')).toThrow(AssemblyError);
      try {
        stack.buildModule('quantum teleport');
      } catch (error) {
        expect(error instanceof AssemblyError && error.code).toBe(ErrorCodes.EMPTY_MODULE);
      }
    });

    it('fails with EMPTY_MODULE on an empty store', () => {
      expect(() => new SealStack([]).buildModule('')).toThrow('No applicable patterns for ""');
    });

    it('uses the default entity when the query names none', () => {
      expect(new SealStack(twoLayerPatterns()).buildModule('').entity).toBe('item');
      expect(new SealStack(twoLayerPatterns(), { defaultEntity: 'widget' }).buildModule(DATACLASS).entity).toBe('widget');
    });

    it('builds a single-layer module from coordinate text', () => {
      const result = new SealStack(twoLayerPatterns()).buildModule(AUTH_MIDDLEWARE);

      expect(result.report.present).toEqual([4]);
      expect(result.coherence).toBe(3);
    });
  });

  describe('retrieve', () => {
    it('returns the stored body unchanged', () => {
      const body = 'def handle(payload):\n    return {"ok": True}\n';
      const stack = new SealStack([makePattern('L1.Q1.TECH.PYTHON.FUNCTION.BASIC[C3]', [], { body })]);

      const result = stack.retrieve('L1.Q1.TECH.PYTHON.FUNCTION.BASIC[C3]');

      expect(result.status).toBe('found');
      if (result.status === 'found') {
        expect(result.pattern.body).toBe(body);
      }
    });

    it('reports a miss with the nearest coordinates', () => {
      const stack = new SealStack([
        makePattern('L1.Q1.TECH.PYTHON.FUNCTION.BASIC[C3]'),
        ...fourPatterns(),
      ]);

      const result = stack.retrieve('L1.Q1.TECH.PYTHON.FUNCTION.BASIC[C2]');

      expect(result.status).toBe('not_found');
      if (result.status === 'not_found') {
        expect(serializeCoordinate(result.coordinate)).toBe('L1.Q1.TECH.PYTHON.FUNCTION.BASIC[C2]');
        expect(result.suggestions).toHaveLength(3);
        expect(serializeCoordinate(result.suggestions[0])).toBe('L1.Q1.TECH.PYTHON.FUNCTION.BASIC[C3]');
      }
    });

    it('throws MALFORMED_COORDINATE for bad text', () => {
      const stack = new SealStack(twoLayerPatterns());
      expect(() => stack.retrieve('bogus')).toThrow(CoordinateError);
    });
  });

  describe('retrieveBatch', () => {
    it('keeps input order and fails only the malformed slot', () => {
      const stack = new SealStack(twoLayerPatterns());

      const results = stack.retrieveBatch([AUTH_MIDDLEWARE, 'bogus', 'L2.Q3.TECH.PYTHON.CONFIG.DATACLASS[C0]', DATACLASS]);

      expect(results.map((r) => r.status)).toEqual(['found', 'malformed', 'not_found', 'found']);
      const malformed = results[1];
      if (malformed.status === 'malformed') {
        expect(malformed.text).toBe('bogus');
        expect(malformed.error.code).toBe(ErrorCodes.MALFORMED_COORDINATE);
      }
    });

    it('returns nothing for an empty list', () => {
      expect(new SealStack(twoLayerPatterns()).retrieveBatch([])).toEqual([]);
    });

    it('propagates errors other than malformed coordinates', () => {
      const stack = new SealStack(twoLayerPatterns());
      vi.spyOn(stack, 'retrieve').mockImplementation(() => {
        throw new Error('store offline');
      });

      expect(() => stack.retrieveBatch([DATACLASS])).toThrow('store offline');
    });
  });

  describe('search', () => {
    const stack = new SealStack(fourPatterns());

    it('ranks by overlap across layers', () => {
      expect(hitKeys(stack.search('auth jwt'))).toEqual([
        [AUTH_MIDDLEWARE, 2],
        [PASSWORD_HASH, 1],
      ]);
    });

    it('lists everything in fallback order for an empty query', () => {
      expect(hitKeys(stack.search(''))).toEqual([
        [DATACLASS, 0],
        [PASSWORD_HASH, 0],
        [AUTH_MIDDLEWARE, 0],
        [SQL_TABLE, 0],
      ]);
    });

    it('filters by layer, lexicon and entity glob', () => {
      expect(hitKeys(stack.search('', { layer: 4 }))).toEqual([[PASSWORD_HASH, 0], [AUTH_MIDDLEWARE, 0]]);
      expect(hitKeys(stack.search('auth jwt', { lexicon: 'AUTH' }))).toEqual([[PASSWORD_HASH, 1]]);
      expect(hitKeys(stack.search('', { entityGlob: 'PYTHON.*' }))).toEqual([[DATACLASS, 0]]);
      expect(hitKeys(stack.search('', { entityGlob: 'SQL.*' }))).toEqual([[SQL_TABLE, 0]]);
    });

    it('truncates to the limit', () => {
      expect(hitKeys(stack.search('', { limit: 2 }))).toEqual([[DATACLASS, 0], [PASSWORD_HASH, 0]]);
      expect(hitKeys(new SealStack(fourPatterns(), { searchLimit: 1 }).search(''))).toEqual([[DATACLASS, 0]]);
    });

    it('finds an exact coordinate', () => {
      expect(hitKeys(stack.search(DATACLASS))).toEqual([[DATACLASS, 0]]);
      expect(stack.search(DATACLASS, { layer: 4 })).toEqual([]);
    });
  });

  describe('route', () => {
    it('returns seven selections without assembling', () => {
      const stack = new SealStack(twoLayerPatterns(), { vocabulary: userVocabulary() });
      const selections = stack.route('quantum teleport');

      expect(selections).toHaveLength(7);
      expect(selections.every((s) => s.pattern === undefined)).toBe(true);
    });

    it('accepts a layer request', () => {
      const selections = new SealStack(fourPatterns()).route({ kind: 'layer', layer: 4, tags: ['password'] });
      const present = selections.filter((s) => s.pattern !== undefined);

      expect(present.map((s) => s.pattern && serializeCoordinate(s.pattern.coordinate))).toEqual([PASSWORD_HASH]);
    });
  });

  describe('layers and stats', () => {
    const stack = new SealStack(fourPatterns());

    it('lists layer metadata with counts', () => {
      const layers = stack.layers();

      expect(layers).toHaveLength(7);
      expect(layers[1]).toEqual({
        layer: 2,
        name: 'STRUCTURE',
        description: 'What shape does it take? Models, schemas and layout.',
        patterns: 2,
      });
      expect(layers.map((l) => l.patterns)).toEqual([0, 2, 0, 2, 0, 0, 0]);
    });

    it('summarizes the table', () => {
      expect(stack.stats()).toEqual({
        patterns: 4,
        lexicons: ['AUTH', 'DATA', 'TECH'],
        layers: { 1: 0, 2: 2, 3: 0, 4: 2, 5: 0, 6: 0, 7: 0 },
      });
    });
  });

  describe('construction', () => {
    it('rejects duplicate coordinates', () => {
      expect(() => new SealStack([...twoLayerPatterns(), makePattern(DATACLASS)])).toThrow(StoreError);
    });

    it('builds the layer index once, on first use', () => {
      const build = vi.spyOn(SealLayerIndex, 'build');
      const stack = new SealStack(fourPatterns());

      expect(build).not.toHaveBeenCalled();
      stack.search('auth');
      stack.buildModule('auth');
      stack.stats();
      expect(build).toHaveBeenCalledTimes(1);
    });
  });
});
