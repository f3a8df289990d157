/**
 * Layer router - picks one pattern (or a gap) for each of the seven layers.
 *
 * Identical intents always yield identical selections: the index order is a
 * strict total order, and nothing here reads the clock or random state.
 */
import { logger } from '../../utils/logger.js';
import { serializeCoordinate } from '../coordinate/parser.js';
import type { Pattern } from '../patterns/types.js';
import type { PatternStore } from '../patterns/store.js';
import type { Intent } from '../query/types.js';
import type { SealLayerIndex } from '../seal-index/seal-index.js';
import { SEAL_LAYER_NUMBERS } from '../seals/layers.js';
import type { SealLayerNumber } from '../seals/types.js';

const log = logger.child('router');

/**
 * The outcome for one layer. `pattern` is undefined for a gap.
 */
export interface LayerSelection {
  layer: SealLayerNumber;
  pattern: Pattern | undefined;
  /** How many candidates the layer had */
  candidates: number;
}

export class LayerRouter {
  constructor(
    private readonly store: PatternStore,
    private readonly index: SealLayerIndex
  ) {}

  /**
   * Selections for layers 1-7 in ascending order. Never fails on missing coverage.
   */
  route(intent: Intent): LayerSelection[] {
    const selections = SEAL_LAYER_NUMBERS.map((layer) => this.select(intent, layer));

    if (log.isEnabled('debug')) {
      for (const s of selections) {
        log.debug(`L${s.layer}: ${s.pattern ? serializeCoordinate(s.pattern.coordinate) : 'gap'} (${s.candidates} candidates)`);
      }
    }

    return selections;
  }

  private select(intent: Intent, layer: SealLayerNumber): LayerSelection {
    switch (intent.kind) {
      case 'coordinate': {
        if (intent.coordinate.layer !== layer) return gap(layer);
        const pattern = this.store.get(intent.coordinate);
        return { layer, pattern, candidates: pattern ? 1 : 0 };
      }
      case 'layer':
        return intent.layer === layer ? this.best(layer, intent.tags) : gap(layer);
      case 'query':
        return this.best(layer, intent.layers.get(layer) ?? new Set<string>());
    }
  }

  private best(layer: SealLayerNumber, tags: ReadonlySet<string>): LayerSelection {
    const candidates = this.index.candidates(layer, tags);
    return { layer, pattern: candidates[0], candidates: candidates.length };
  }
}

function gap(layer: SealLayerNumber): LayerSelection {
  return { layer, pattern: undefined, candidates: 0 };
}
