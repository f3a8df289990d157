/**
 * Plain-JSON views of facade results, shared by the CLI `--json` output
 * and the MCP tool responses.
 */
import type { ModuleResult } from '../assembly/assembler.js';
import type { PairCompatibility } from '../coherence/validator.js';
import { serializeCoordinate } from '../coordinate/parser.js';
import { toPatternView } from '../patterns/loader.js';
import type { PatternView } from '../patterns/types.js';
import { getSealLayer } from '../seals/layers.js';
import type { SealLayerNumber } from '../seals/types.js';
import { describeError } from '../../utils/errors.js';
import type { BatchRetrieveResult, RetrieveResult, SearchHit } from './types.js';

export type RetrieveView =
  | { status: 'found'; pattern: PatternView }
  | { status: 'not_found'; coordinate: string; suggestions: string[] };

export type BatchEntryView =
  | RetrieveView
  | { status: 'malformed'; coordinate: string; error: string };

export interface BatchRetrieveView {
  count: number;
  found: number;
  results: BatchEntryView[];
}

export interface SearchHitView {
  coordinate: string;
  title: string;
  language: string;
  overlap: number;
  tags: string[];
  description?: string;
}

export interface SelectionView {
  layer: SealLayerNumber;
  name: string;
  coordinate: string | null;
  title: string | null;
  candidates: number;
}

export interface ModuleView {
  query?: string;
  entity: string;
  coherence: number;
  completeness: number;
  present: SealLayerNumber[];
  absent: SealLayerNumber[];
  selections: SelectionView[];
  pairs: PairCompatibility[];
  weakest?: PairCompatibility;
  dependencies: string[];
  output: string;
  tests: string;
}

export function retrieveView(result: RetrieveResult): RetrieveView {
  if (result.status === 'found') {
    return { status: 'found', pattern: toPatternView(result.pattern) };
  }
  return {
    status: 'not_found',
    coordinate: serializeCoordinate(result.coordinate),
    suggestions: result.suggestions.map(serializeCoordinate),
  };
}

export function batchRetrieveView(results: readonly BatchRetrieveResult[]): BatchRetrieveView {
  const views = results.map((result): BatchEntryView =>
    result.status === 'malformed'
      ? { status: 'malformed', coordinate: result.text, error: describeError(result.error) }
      : retrieveView(result)
  );
  return {
    count: views.length,
    found: views.filter((view) => view.status === 'found').length,
    results: views,
  };
}

export function searchHitView({ pattern, overlap }: SearchHit): SearchHitView {
  const view: SearchHitView = {
    coordinate: serializeCoordinate(pattern.coordinate),
    title: pattern.title,
    language: pattern.language,
    overlap,
    tags: [...pattern.tags].sort(),
  };
  if (pattern.description !== undefined) view.description = pattern.description;
  return view;
}

export function moduleView(result: ModuleResult): ModuleView {
  const view: ModuleView = {
    entity: result.entity,
    coherence: result.coherence,
    completeness: result.completeness,
    present: result.report.present,
    absent: result.report.absent,
    selections: result.selections.map(({ layer, pattern, candidates }) => ({
      layer,
      name: getSealLayer(layer).name,
      coordinate: pattern ? serializeCoordinate(pattern.coordinate) : null,
      title: pattern ? pattern.title : null,
      candidates,
    })),
    pairs: result.report.pairs,
    dependencies: result.report.dependencies,
    output: result.output,
    tests: result.tests,
  };
  if (result.query !== undefined) view.query = result.query;
  if (result.report.weakest) view.weakest = result.report.weakest;
  return view;
}
