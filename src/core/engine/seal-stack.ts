/**
 * SealStack - the service facade over the store, index, interpreter,
 * router, validator and assembler.
 *
 * One instance is shared by every request. The store is fixed at
 * construction and the layer index is built on first use.
 */
import { minimatch } from 'minimatch';
import { CoordinateError } from '../../utils/errors.js';
import { assemble, type ModuleResult } from '../assembly/assembler.js';
import { nearestCoordinates } from '../coordinate/distance.js';
import { parseCoordinate, serializeCoordinate } from '../coordinate/parser.js';
import type { Pattern } from '../patterns/types.js';
import { PatternStore } from '../patterns/store.js';
import { KeywordInterpreter } from '../query/interpreter.js';
import type { Intent, ModuleRequest, QueryInterpreter } from '../query/types.js';
import { LayerRouter, type LayerSelection } from '../routing/router.js';
import { compareCandidates, SealLayerIndex, type ScoredCandidate } from '../seal-index/seal-index.js';
import { SEAL_LAYER_NUMBERS, SEAL_LAYERS } from '../seals/layers.js';
import type { SealLayerNumber } from '../seals/types.js';
import type {
  BatchRetrieveResult,
  LayerSummary,
  RetrieveResult,
  SealStackOptions,
  SealStackStats,
  SearchHit,
  SearchOptions,
} from './types.js';

const DEFAULT_SEARCH_LIMIT = 20;
const DEFAULT_ENTITY = 'item';
const SUGGESTION_COUNT = 3;

function toRequest(request: string | ModuleRequest): ModuleRequest {
  return typeof request === 'string' ? { kind: 'query', text: request } : request;
}

export class SealStack {
  private readonly store: PatternStore;
  private readonly interpreter: QueryInterpreter;
  private readonly searchLimit: number;
  private readonly defaultEntity: string;
  private index: SealLayerIndex | undefined;
  private router: LayerRouter | undefined;

  /**
   * @throws StoreError (DUPLICATE_COORDINATE) when two patterns share a coordinate
   */
  constructor(patterns: Iterable<Pattern>, options: SealStackOptions = {}) {
    this.store = PatternStore.load(patterns);
    this.interpreter = options.interpreter ?? new KeywordInterpreter(options.vocabulary);
    this.searchLimit = options.searchLimit ?? DEFAULT_SEARCH_LIMIT;
    this.defaultEntity = options.defaultEntity ?? DEFAULT_ENTITY;
  }

  get patterns(): PatternStore {
    return this.store;
  }

  private layerIndex(): SealLayerIndex {
    if (!this.index) {
      this.index = SealLayerIndex.build(this.store);
    }
    return this.index;
  }

  private layerRouter(): LayerRouter {
    if (!this.router) {
      this.router = new LayerRouter(this.store, this.layerIndex());
    }
    return this.router;
  }

  /**
   * Exact lookup by coordinate text. A miss carries the nearest coordinates.
   *
   * @throws CoordinateError (MALFORMED_COORDINATE) for unparsable text
   */
  retrieve(coordinateText: string): RetrieveResult {
    const coordinate = parseCoordinate(coordinateText.trim());
    const pattern = this.store.get(coordinate);
    if (pattern) {
      return { status: 'found', pattern };
    }
    return {
      status: 'not_found',
      coordinate,
      suggestions: nearestCoordinates(coordinate, this.store.coordinates(), SUGGESTION_COUNT),
    };
  }

  /**
   * Look up several coordinates in input order. Malformed text fails only its own slot.
   */
  retrieveBatch(coordinateTexts: readonly string[]): BatchRetrieveResult[] {
    return coordinateTexts.map((text): BatchRetrieveResult => {
      try {
        return this.retrieve(text);
      } catch (error) {
        if (error instanceof CoordinateError) {
          return { status: 'malformed', text, error };
        }
        throw error;
      }
    });
  }

  /**
   * Ranked pattern list without routing or assembly.
   */
  search(queryText: string, options: SearchOptions = {}): SearchHit[] {
    const intent = this.interpreter.interpret({ kind: 'query', text: queryText });
    const layers = options.layer !== undefined ? [options.layer] : SEAL_LAYER_NUMBERS;
    const limit = options.limit ?? this.searchLimit;

    const hits: ScoredCandidate[] = [];
    for (const layer of layers) {
      hits.push(...this.searchLayer(intent, layer));
    }

    return hits
      .filter(({ pattern }) => options.lexicon === undefined || pattern.coordinate.lexicon === options.lexicon)
      .filter(({ pattern }) => options.entityGlob === undefined || minimatch(pattern.coordinate.entity, options.entityGlob))
      .sort(compareCandidates)
      .slice(0, Math.max(0, limit))
      .map(({ pattern, overlap }) => ({ pattern, overlap }));
  }

  private searchLayer(intent: Intent, layer: SealLayerNumber): ScoredCandidate[] {
    switch (intent.kind) {
      case 'coordinate': {
        const pattern = intent.coordinate.layer === layer ? this.store.get(intent.coordinate) : undefined;
        return pattern ? [{ pattern, overlap: 0, key: serializeCoordinate(pattern.coordinate) }] : [];
      }
      case 'layer':
        return intent.layer === layer ? this.layerIndex().scoredCandidates(layer, intent.tags) : [];
      case 'query':
        return this.layerIndex().scoredCandidates(layer, intent.layers.get(layer) ?? []);
    }
  }

  /**
   * Per-layer selections for a request, without assembly.
   */
  route(request: string | ModuleRequest): LayerSelection[] {
    return this.layerRouter().route(this.interpreter.interpret(toRequest(request)));
  }

  /**
   * Full pipeline: interpret, route, score, assemble.
   *
   * @throws AssemblyError (EMPTY_MODULE) when no layer has a candidate
   */
  buildModule(request: string | ModuleRequest): ModuleResult {
    const moduleRequest = toRequest(request);
    const intent = this.interpreter.interpret(moduleRequest);
    const selections = this.layerRouter().route(intent);
    const entity = intent.kind === 'query' ? intent.entityName ?? this.defaultEntity : this.defaultEntity;
    const query = moduleRequest.kind === 'query' ? moduleRequest.text : undefined;
    return assemble(selections, entity, query !== undefined ? { query } : {});
  }

  layers(): LayerSummary[] {
    const counts = this.layerIndex().layerCounts();
    return SEAL_LAYERS.map((layer) => ({ ...layer, patterns: counts[layer.layer] }));
  }

  stats(): SealStackStats {
    return {
      patterns: this.store.size,
      lexicons: this.store.lexicons(),
      layers: this.layerIndex().layerCounts(),
    };
  }
}
