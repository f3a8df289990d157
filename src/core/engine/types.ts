/**
 * Facade types: options, search hits, retrieval outcomes and summaries.
 */
import type { Coordinate } from '../coordinate/types.js';
import type { Pattern } from '../patterns/types.js';
import type { QueryInterpreter, Vocabulary } from '../query/types.js';
import type { SealLayer, SealLayerNumber } from '../seals/types.js';
import type { CoordinateError } from '../../utils/errors.js';

export interface SealStackOptions {
  /** Ignored when `interpreter` is given */
  vocabulary?: Vocabulary;
  interpreter?: QueryInterpreter;
  /** Search result cap when the caller passes none (default 20) */
  searchLimit?: number;
  /** Entity used when a query names none (default "item") */
  defaultEntity?: string;
}

export interface SearchOptions {
  layer?: SealLayerNumber;
  /** Exact, case-sensitive lexicon filter */
  lexicon?: string;
  /** minimatch glob over the entity path, e.g. "PYTHON.*" */
  entityGlob?: string;
  limit?: number;
}

export interface SearchHit {
  pattern: Pattern;
  /** Requested tags the pattern carries */
  overlap: number;
}

export type RetrieveResult =
  | { status: 'found'; pattern: Pattern }
  | { status: 'not_found'; coordinate: Coordinate; suggestions: Coordinate[] };

/**
 * One slot of a batch lookup; unparsable text stays in its slot.
 */
export type BatchRetrieveResult =
  | RetrieveResult
  | { status: 'malformed'; text: string; error: CoordinateError };

export interface LayerSummary extends SealLayer {
  patterns: number;
}

export interface SealStackStats {
  patterns: number;
  lexicons: string[];
  layers: Record<SealLayerNumber, number>;
}
