/**
 * Query types: what a caller asks for and what the interpreter makes of it.
 */
import type { Coordinate } from '../coordinate/types.js';
import type { SealLayerNumber } from '../seals/types.js';

/**
 * A request for patterns: free text, an explicit coordinate, or one layer with tags.
 */
export type ModuleRequest =
  | { kind: 'query'; text: string }
  | { kind: 'coordinate'; coordinate: Coordinate }
  | { kind: 'layer'; layer: SealLayerNumber; tags: readonly string[] };

/** Exact single-pattern lookup; bypasses tag matching. */
export interface CoordinateIntent {
  kind: 'coordinate';
  coordinate: Coordinate;
}

/** Tag matching restricted to one layer. */
export interface LayerIntent {
  kind: 'layer';
  layer: SealLayerNumber;
  tags: ReadonlySet<string>;
}

/** Free-text intent covering all seven layers. */
export interface QueryIntent {
  kind: 'query';
  query: string;
  /** Keywords left after tokenizing and filtering */
  tags: ReadonlySet<string>;
  /** Lower-cased entity noun */
  entity?: string;
  /** The entity with the request's capitalisation */
  entityName?: string;
  /** Matched concept from the vocabulary */
  concept?: string;
  /** Candidate tags per layer */
  layers: ReadonlyMap<SealLayerNumber, ReadonlySet<string>>;
}

export type Intent = CoordinateIntent | LayerIntent | QueryIntent;

/**
 * A concept groups extra per-layer vocabulary, selected by trigger words.
 */
export interface Concept {
  name: string;
  triggers: ReadonlySet<string>;
  layers: ReadonlyMap<SealLayerNumber, readonly string[]>;
}

export interface Vocabulary {
  stopWords: ReadonlySet<string>;
  /** Entity noun list, singular lower case */
  nouns: readonly string[];
  concepts: readonly Concept[];
}

/**
 * Swappable interpretation strategy. Router, validator and assembler only see Intents.
 */
export interface QueryInterpreter {
  interpret(request: ModuleRequest): Intent;
}
