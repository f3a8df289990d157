/**
 * Pattern types: the unit stored and retrieved by coordinate.
 */
import type { Coordinate } from '../coordinate/types.js';

/**
 * A stored code template.
 * Body placeholders `{Entity}`, `{entity}` and `{ENTITY}` are filled in at assembly.
 */
export interface Pattern {
  readonly coordinate: Coordinate;
  readonly title: string;
  readonly body: string;
  /** Test template for the body, same placeholders */
  readonly tests?: string;
  /** Lower-cased keywords used for matching */
  readonly tags: ReadonlySet<string>;
  /** Language the template renders, e.g. python or typescript */
  readonly language: string;
  readonly description?: string;
  /** Modules the template imports */
  readonly dependencies: readonly string[];
}

/**
 * A parsed pattern table file.
 */
export interface PatternTable {
  version: string;
  /** Where the table came from (file path or a caller label) */
  source: string;
  lexicon?: string;
  patterns: Pattern[];
}

/**
 * Plain-JSON shape of a pattern for CLI and MCP output.
 */
export interface PatternView {
  coordinate: string;
  title: string;
  language: string;
  tags: string[];
  description?: string;
  dependencies: string[];
  body: string;
  tests?: string;
}
