/**
 * Module assembler - renders the present layer selections into one output
 * and attaches the coherence report.
 */
import { AssemblyError, ErrorCodes } from '../../utils/errors.js';
import { evaluateCoherence, type CoherenceScore, type PairCompatibility } from '../coherence/validator.js';
import { serializeCoordinate } from '../coordinate/parser.js';
import type { Pattern } from '../patterns/types.js';
import type { LayerSelection } from '../routing/router.js';
import { getSealLayer } from '../seals/layers.js';
import type { SealLayerNumber } from '../seals/types.js';
import { renderTemplate } from './placeholders.js';

const HASH_COMMENT_LANGUAGES = new Set(['python', 'yaml', 'dockerfile', 'shell', 'bash', 'toml']);

export interface ModuleReport {
  present: SealLayerNumber[];
  absent: SealLayerNumber[];
  pairs: PairCompatibility[];
  weakest?: PairCompatibility;
  /** Sorted union of the present patterns' dependencies */
  dependencies: string[];
}

export interface ModuleResult {
  query?: string;
  /** Entity name substituted into the templates */
  entity: string;
  selections: LayerSelection[];
  coherence: CoherenceScore;
  completeness: number;
  output: string;
  /** Rendered test templates of the present layers; empty when none has one */
  tests: string;
  report: ModuleReport;
}

export interface AssembleOptions {
  query?: string;
}

/**
 * Line-comment marker for a template language.
 */
export function commentPrefix(language: string): string {
  const normalized = language.toLowerCase();
  if (HASH_COMMENT_LANGUAGES.has(normalized)) return '#';
  if (normalized === 'sql') return '--';
  return '//';
}

/**
 * One rendered layer: two header lines, then the template without trailing whitespace.
 * The template defaults to the pattern body; pass `pattern.tests` for the test block.
 */
export function renderBlock(
  layer: SealLayerNumber,
  pattern: Pattern,
  entityName: string,
  template: string = pattern.body
): string {
  const c = commentPrefix(pattern.language);
  const { name } = getSealLayer(layer);
  return [
    `${c} Seal ${layer}: ${name} - ${pattern.title}`,
    `${c} ${serializeCoordinate(pattern.coordinate)}`,
    renderTemplate(template, entityName).trimEnd(),
  ].join('\n');
}

/**
 * Compose selections into a ModuleResult.
 * Gaps are skipped in the output and listed under `report.absent`.
 *
 * @throws AssemblyError (EMPTY_MODULE) when no layer has a selection
 */
export function assemble(
  selections: readonly LayerSelection[],
  entityName: string,
  options: AssembleOptions = {}
): ModuleResult {
  const ordered = [...selections].sort((a, b) => a.layer - b.layer);
  const present: SealLayerNumber[] = [];
  const absent: SealLayerNumber[] = [];
  const blocks: string[] = [];
  const testBlocks: string[] = [];
  const dependencies = new Set<string>();

  for (const { layer, pattern } of ordered) {
    if (!pattern) {
      absent.push(layer);
      continue;
    }
    present.push(layer);
    blocks.push(renderBlock(layer, pattern, entityName));
    if (pattern.tests !== undefined && pattern.tests.trim() !== '') {
      testBlocks.push(renderBlock(layer, pattern, entityName, pattern.tests));
    }
    for (const dep of pattern.dependencies) dependencies.add(dep);
  }

  if (present.length === 0) {
    throw new AssemblyError(
      ErrorCodes.EMPTY_MODULE,
      options.query !== undefined
        ? `No applicable patterns for "${options.query}"`
        : 'No applicable patterns',
      { query: options.query }
    );
  }

  const coherence = evaluateCoherence(ordered);
  const report: ModuleReport = {
    present,
    absent,
    pairs: coherence.pairs,
    dependencies: [...dependencies].sort(),
  };
  if (coherence.weakest) report.weakest = coherence.weakest;

  const result: ModuleResult = {
    entity: entityName,
    selections: ordered,
    coherence: coherence.score,
    completeness: coherence.completeness,
    output: blocks.join('\n\n'),
    tests: testBlocks.join('\n\n'),
    report,
  };
  if (options.query !== undefined) result.query = options.query;
  return result;
}
