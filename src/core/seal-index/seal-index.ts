/**
 * Seal layer index - groups patterns by layer and by tag for candidate lookup.
 *
 * Candidate order is a strict total order:
 *   1. tag overlap, descending
 *   2. coordinate class, descending
 *   3. coordinate text, ascending
 */
import { logger } from '../../utils/logger.js';
import { serializeCoordinate } from '../coordinate/parser.js';
import type { Pattern } from '../patterns/types.js';
import type { PatternStore } from '../patterns/store.js';
import { SEAL_LAYER_NUMBERS } from '../seals/layers.js';
import type { SealLayerNumber } from '../seals/types.js';

const log = logger.child('index');

/**
 * A candidate pattern with the number of requested tags it carries.
 */
export interface ScoredCandidate {
  pattern: Pattern;
  overlap: number;
  /** Serialized coordinate, the final tie-break */
  key: string;
}

interface LayerBucket {
  /** Every pattern of the layer in fallback order (class desc, key asc) */
  ordered: ScoredCandidate[];
  byTag: Map<string, ScoredCandidate[]>;
}

/**
 * Compare two candidates by the index's total order.
 */
export function compareCandidates(a: ScoredCandidate, b: ScoredCandidate): number {
  if (a.overlap !== b.overlap) return b.overlap - a.overlap;
  const classA = a.pattern.coordinate.coherenceClass;
  const classB = b.pattern.coordinate.coherenceClass;
  if (classA !== classB) return classB - classA;
  return a.key < b.key ? -1 : a.key > b.key ? 1 : 0;
}

function normalizeTags(tags: Iterable<string>): Set<string> {
  const normalized = new Set<string>();
  for (const tag of tags) {
    const value = tag.trim().toLowerCase();
    if (value) normalized.add(value);
  }
  return normalized;
}

export class SealLayerIndex {
  private readonly buckets: ReadonlyMap<SealLayerNumber, LayerBucket>;

  private constructor(buckets: Map<SealLayerNumber, LayerBucket>) {
    this.buckets = buckets;
  }

  /**
   * Build the index from a store snapshot.
   */
  static build(store: PatternStore): SealLayerIndex {
    const buckets = new Map<SealLayerNumber, LayerBucket>();
    for (const layer of SEAL_LAYER_NUMBERS) {
      buckets.set(layer, { ordered: [], byTag: new Map() });
    }

    for (const pattern of store.all()) {
      const bucket = buckets.get(pattern.coordinate.layer);
      if (!bucket) continue;
      const entry: ScoredCandidate = { pattern, overlap: 0, key: serializeCoordinate(pattern.coordinate) };
      bucket.ordered.push(entry);
      for (const tag of pattern.tags) {
        const list = bucket.byTag.get(tag);
        if (list) {
          list.push(entry);
        } else {
          bucket.byTag.set(tag, [entry]);
        }
      }
    }

    for (const bucket of buckets.values()) {
      bucket.ordered.sort(compareCandidates);
    }

    log.debug(`Indexed ${store.size} patterns across ${SEAL_LAYER_NUMBERS.length} layers`);
    return new SealLayerIndex(buckets);
  }

  /**
   * Patterns of `layer` sharing at least one tag with `tags`, in index order.
   * Empty `tags` returns every pattern of the layer (class desc, coordinate asc).
   */
  scoredCandidates(layer: SealLayerNumber, tags: Iterable<string>): ScoredCandidate[] {
    const bucket = this.buckets.get(layer);
    if (!bucket) return [];

    const wanted = normalizeTags(tags);
    if (wanted.size === 0) {
      return bucket.ordered.map((entry) => ({ ...entry }));
    }

    const overlaps = new Map<string, ScoredCandidate>();
    for (const tag of wanted) {
      for (const entry of bucket.byTag.get(tag) ?? []) {
        const scored = overlaps.get(entry.key);
        if (scored) {
          scored.overlap += 1;
        } else {
          overlaps.set(entry.key, { ...entry, overlap: 1 });
        }
      }
    }

    return [...overlaps.values()].sort(compareCandidates);
  }

  candidates(layer: SealLayerNumber, tags: Iterable<string>): Pattern[] {
    return this.scoredCandidates(layer, tags).map((c) => c.pattern);
  }

  /**
   * Pattern counts per layer.
   */
  layerCounts(): Record<SealLayerNumber, number> {
    const counts: Record<SealLayerNumber, number> = { 1: 0, 2: 0, 3: 0, 4: 0, 5: 0, 6: 0, 7: 0 };
    for (const [layer, bucket] of this.buckets) {
      counts[layer] = bucket.ordered.length;
    }
    return counts;
  }
}
