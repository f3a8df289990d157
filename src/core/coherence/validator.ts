/**
 * Coherence validator - scores how well cross-layer selections fit together.
 *
 * The score is the worst pair, not the average: one mismatched pair pulls
 * the whole module down.
 */
import type { Pattern } from '../patterns/types.js';
import type { LayerSelection } from '../routing/router.js';
import { SEAL_LAYER_NUMBERS } from '../seals/layers.js';
import type { SealLayerNumber } from '../seals/types.js';

export type CoherenceScore = 0 | 1 | 2 | 3;

export type SelectionLike = Pick<LayerSelection, 'layer' | 'pattern'>;

export interface PairCompatibility {
  lower: SealLayerNumber;
  upper: SealLayerNumber;
  sharedTags: string[];
  value: CoherenceScore;
}

export interface CoherenceReport {
  score: CoherenceScore;
  /** Present layers / 7 */
  completeness: number;
  pairs: PairCompatibility[];
  /** First pair reaching the minimum; absent with fewer than two layers */
  weakest?: PairCompatibility;
}

function clampScore(value: number): CoherenceScore {
  if (value <= 0) return 0;
  if (value >= 3) return 3;
  return value === 1 ? 1 : 2;
}

function present(selections: Iterable<SelectionLike>): Array<{ layer: SealLayerNumber; pattern: Pattern }> {
  const result: Array<{ layer: SealLayerNumber; pattern: Pattern }> = [];
  for (const { layer, pattern } of selections) {
    if (pattern) result.push({ layer, pattern });
  }
  return result.sort((a, b) => a.layer - b.layer);
}

function sharedTags(a: Pattern, b: Pattern): string[] {
  return [...a.tags].filter((tag) => b.tags.has(tag)).sort();
}

/**
 * min(class A, class B), minus one point when the two share no tag.
 */
export function pairCompatibility(a: Pattern, b: Pattern): CoherenceScore {
  const base = Math.min(a.coordinate.coherenceClass, b.coordinate.coherenceClass);
  return clampScore(sharedTags(a, b).length > 0 ? base : base - 1);
}

export function evaluateCoherence(selections: Iterable<SelectionLike>): CoherenceReport {
  const layers = present(selections);
  const pairs: PairCompatibility[] = [];

  for (let i = 0; i < layers.length; i++) {
    for (let j = i + 1; j < layers.length; j++) {
      const lower = layers[i];
      const upper = layers[j];
      pairs.push({
        lower: lower.layer,
        upper: upper.layer,
        sharedTags: sharedTags(lower.pattern, upper.pattern),
        value: pairCompatibility(lower.pattern, upper.pattern),
      });
    }
  }

  let weakest: PairCompatibility | undefined;
  for (const pair of pairs) {
    if (!weakest || pair.value < weakest.value) weakest = pair;
  }

  const report: CoherenceReport = {
    score: weakest ? weakest.value : 3,
    completeness: layers.length / SEAL_LAYER_NUMBERS.length,
    pairs,
  };
  if (weakest) report.weakest = weakest;
  return report;
}

/**
 * Worst pairwise compatibility across present layers; 3 with fewer than two.
 */
export function scoreCoherence(selections: Iterable<SelectionLike>): CoherenceScore {
  return evaluateCoherence(selections).score;
}

/**
 * Fraction of the seven layers with a selection, in [0, 1].
 */
export function completeness(selections: Iterable<SelectionLike>): number {
  return present(selections).length / SEAL_LAYER_NUMBERS.length;
}
