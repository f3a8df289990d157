/**
 * Tests for LayerRouter.
 */
import { describe, it, expect } from 'vitest';
import { LayerRouter, type LayerSelection } from '../../../../src/core/routing/router.js';
import { PatternStore } from '../../../../src/core/patterns/store.js';
import { SealLayerIndex } from '../../../../src/core/seal-index/seal-index.js';
import { KeywordInterpreter } from '../../../../src/core/query/interpreter.js';
import { parseCoordinate, serializeCoordinate } from '../../../../src/core/coordinate/parser.js';
import { AUTH_MIDDLEWARE, DATACLASS, twoLayerPatterns, userVocabulary } from '../../../helpers/patterns.js';

const describeSelections = (selections: LayerSelection[]) =>
  selections.map((s) => [s.layer, s.pattern ? serializeCoordinate(s.pattern.coordinate) : null]);

describe('LayerRouter', () => {
  const store = PatternStore.load(twoLayerPatterns());
  const router = new LayerRouter(store, SealLayerIndex.build(store));
  const interpreter = new KeywordInterpreter(userVocabulary());

  it('selects the best candidate per layer and leaves gaps elsewhere', () => {
    const selections = router.route(interpreter.interpret({ kind: 'query', text: 'Create a users module with auth' }));

    expect(describeSelections(selections)).toEqual([
      [1, null],
      [2, DATACLASS],
      [3, null],
      [4, AUTH_MIDDLEWARE],
      [5, null],
      [6, null],
      [7, null],
    ]);
    expect(selections[1].candidates).toBe(1);
    expect(selections[0].candidates).toBe(0);
  });

  it('falls back to the whole layer for an empty query', () => {
    const selections = router.route(interpreter.interpret({ kind: 'query', text: '' }));
    expect(describeSelections(selections).filter(([, key]) => key !== null)).toEqual([
      [2, DATACLASS],
      [4, AUTH_MIDDLEWARE],
    ]);
  });

  it('fills only the layer of a coordinate intent', () => {
    const selections = router.route({ kind: 'coordinate', coordinate: parseCoordinate(AUTH_MIDDLEWARE) });
    expect(describeSelections(selections).filter(([, key]) => key !== null)).toEqual([[4, AUTH_MIDDLEWARE]]);
  });

  it('returns only gaps for an unknown coordinate', () => {
    const selections = router.route({ kind: 'coordinate', coordinate: parseCoordinate('L4.Q3.TECH.WEB.MIDDLEWARE.AUTH[C2]') });
    expect(selections.every((s) => s.pattern === undefined)).toBe(true);
    expect(selections).toHaveLength(7);
  });

  it('restricts a layer intent to its layer', () => {
    const selections = router.route({ kind: 'layer', layer: 4, tags: new Set(['jwt']) });
    expect(describeSelections(selections).filter(([, key]) => key !== null)).toEqual([[4, AUTH_MIDDLEWARE]]);

    const miss = router.route({ kind: 'layer', layer: 2, tags: new Set(['jwt']) });
    expect(miss.every((s) => s.pattern === undefined)).toBe(true);
  });

  it('is deterministic', () => {
    const intent = interpreter.interpret({ kind: 'query', text: 'user model with jwt auth' });
    expect(describeSelections(router.route(intent))).toEqual(describeSelections(router.route(intent)));
  });
});
