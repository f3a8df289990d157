/**
 * Pattern store - immutable mapping from Coordinate to Pattern.
 *
 * Built once from a fixed table and never mutated afterwards, so one
 * instance can be shared by any number of concurrent requests.
 */
import { ErrorCodes, StoreError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { compareCoordinates, serializeCoordinate } from '../coordinate/parser.js';
import type { Coordinate } from '../coordinate/types.js';
import type { Pattern } from './types.js';

const log = logger.child('store');

export class PatternStore {
  private readonly byKey: ReadonlyMap<string, Pattern>;

  private constructor(byKey: Map<string, Pattern>) {
    this.byKey = byKey;
  }

  /**
   * Build a store. Throws StoreError (DUPLICATE_COORDINATE) when two patterns share a coordinate.
   */
  static load(patterns: Iterable<Pattern>): PatternStore {
    const byKey = new Map<string, Pattern>();
    for (const pattern of patterns) {
      const key = serializeCoordinate(pattern.coordinate);
      const existing = byKey.get(key);
      if (existing) {
        throw new StoreError(
          ErrorCodes.DUPLICATE_COORDINATE,
          `Duplicate coordinate ${key} ("${existing.title}" and "${pattern.title}")`,
          { coordinate: key }
        );
      }
      byKey.set(key, pattern);
    }
    log.debug(`Loaded ${byKey.size} patterns`);
    return new PatternStore(byKey);
  }

  get size(): number {
    return this.byKey.size;
  }

  /**
   * Exact lookup; no fuzzy matching.
   */
  get(coordinate: Coordinate): Pattern | undefined {
    return this.byKey.get(serializeCoordinate(coordinate));
  }

  has(coordinate: Coordinate): boolean {
    return this.byKey.has(serializeCoordinate(coordinate));
  }

  /**
   * Every pattern. Each iteration starts from the beginning; order carries no meaning.
   */
  all(): Iterable<Pattern> {
    const byKey = this.byKey;
    return {
      [Symbol.iterator]: () => byKey.values(),
    };
  }

  coordinates(): Coordinate[] {
    return [...this.byKey.values()]
      .map((p) => p.coordinate)
      .sort(compareCoordinates);
  }

  lexicons(): string[] {
    const lexicons = new Set<string>();
    for (const pattern of this.byKey.values()) {
      lexicons.add(pattern.coordinate.lexicon);
    }
    return [...lexicons].sort();
  }
}
