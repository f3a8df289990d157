/**
 * Coordinate types: the structured address of one pattern.
 *
 * Text form: `L<layer>.Q<quadrant>.<LEXICON>.<ENTITY>[.<variant>][C<class>]`
 */
import type { SealLayerNumber } from '../seals/types.js';

export type Quadrant = 1 | 2 | 3 | 4;

/** Authored confidence class: 0 = experimental, 3 = production-validated. */
export type CoherenceClass = 0 | 1 | 2 | 3;

export interface Coordinate {
  readonly layer: SealLayerNumber;
  /** Namespacing facet within a layer; no cross-layer meaning */
  readonly quadrant: Quadrant;
  /** Subject-domain namespace, e.g. TECH or AUTH */
  readonly lexicon: string;
  /** Dotted concept path, e.g. PYTHON.FUNCTION.BASIC */
  readonly entity: string;
  readonly variant?: string;
  readonly coherenceClass: CoherenceClass;
}

/**
 * Unvalidated coordinate fields, as accepted by createCoordinate().
 */
export interface CoordinateFields {
  layer: number;
  quadrant: number;
  lexicon: string;
  entity: string;
  variant?: string;
  coherenceClass: number;
}
