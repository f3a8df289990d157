/**
 * Semantic distance between coordinates, used to suggest near misses
 * when an exact lookup finds nothing.
 */
import { editDistance } from '../../utils/string.js';
import { compareCoordinates, coordinatesEqual } from './parser.js';
import type { Coordinate } from './types.js';

const WEIGHTS = {
  layer: 0.3,
  quadrant: 0.3,
  lexicon: 0.2,
  entity: 0.2,
} as const;

function entityDistance(a: string, b: string): number {
  if (a === b) return 0;
  if (a.includes(b) || b.includes(a)) return 0.3;
  return editDistance(a, b) / Math.max(a.length, b.length);
}

/**
 * Weighted distance in [0, 1]. Quadrants are circular (Q4 is next to Q1).
 */
export function coordinateDistance(a: Coordinate, b: Coordinate): number {
  const layer = Math.abs(a.layer - b.layer) / 6;
  const quadrantDiff = Math.abs(a.quadrant - b.quadrant);
  const quadrant = Math.min(quadrantDiff, 4 - quadrantDiff) / 2;
  const lexicon = a.lexicon === b.lexicon ? 0 : 1;
  const entity = entityDistance(a.entity, b.entity);

  return layer * WEIGHTS.layer
    + quadrant * WEIGHTS.quadrant
    + lexicon * WEIGHTS.lexicon
    + entity * WEIGHTS.entity;
}

/**
 * The k nearest candidates to target, excluding an exact match.
 */
export function nearestCoordinates(
  target: Coordinate,
  candidates: Iterable<Coordinate>,
  k: number
): Coordinate[] {
  const scored: Array<{ coordinate: Coordinate; distance: number }> = [];
  for (const coordinate of candidates) {
    if (coordinatesEqual(coordinate, target)) continue;
    scored.push({ coordinate, distance: coordinateDistance(target, coordinate) });
  }

  return scored
    .sort((a, b) => a.distance - b.distance || compareCoordinates(a.coordinate, b.coordinate))
    .slice(0, Math.max(0, k))
    .map((s) => s.coordinate);
}
