/**
 * Human-readable output for the CLI commands. Every function returns lines;
 * the commands decide where they go.
 */
import chalk from 'chalk';
import type { ModuleResult } from '../../core/assembly/assembler.js';
import { serializeCoordinate } from '../../core/coordinate/parser.js';
import type { Coordinate } from '../../core/coordinate/types.js';
import type { LayerSummary, SealStackStats, SearchHit } from '../../core/engine/types.js';
import type { Pattern } from '../../core/patterns/types.js';
import { getSealLayer, SEAL_LAYER_NUMBERS } from '../../core/seals/layers.js';
import { describeError, type CoordinateError } from '../../utils/errors.js';

const RULE = '─'.repeat(60);

/**
 * Ratio as a whole percentage, e.g. 2/7 -> "29%".
 */
export function formatPercent(ratio: number): string {
  return `${Math.round(ratio * 100)}%`;
}

export function formatPattern(pattern: Pattern): string[] {
  const lines = [
    chalk.bold.cyan(pattern.title),
    `${chalk.dim('Coordinate:')} ${serializeCoordinate(pattern.coordinate)}`,
    `${chalk.dim('Layer:')}      ${pattern.coordinate.layer} ${getSealLayer(pattern.coordinate.layer).name}`,
    `${chalk.dim('Language:')}   ${pattern.language}`,
    `${chalk.dim('Tags:')}       ${[...pattern.tags].sort().join(', ')}`,
  ];
  if (pattern.description) {
    lines.push(`${chalk.dim('About:')}      ${pattern.description}`);
  }
  if (pattern.dependencies.length > 0) {
    lines.push(`${chalk.dim('Imports:')}    ${pattern.dependencies.join(', ')}`);
  }
  lines.push(chalk.dim(RULE), pattern.body.trimEnd());
  if (pattern.tests !== undefined && pattern.tests.trim() !== '') {
    lines.push(chalk.dim(`${RULE.slice(0, 3)} tests`), pattern.tests.trimEnd());
  }
  return lines;
}

export function formatNotFound(coordinate: Coordinate, suggestions: readonly Coordinate[]): string[] {
  const lines = [chalk.yellow(`No pattern at ${serializeCoordinate(coordinate)}`)];
  if (suggestions.length > 0) {
    lines.push(chalk.dim('Nearest coordinates:'));
    for (const suggestion of suggestions) {
      lines.push(`  ${serializeCoordinate(suggestion)}`);
    }
  }
  return lines;
}

export function formatMalformed(error: CoordinateError): string {
  return chalk.red(describeError(error));
}

export function formatSearchHit({ pattern, overlap }: SearchHit): string {
  return `${serializeCoordinate(pattern.coordinate)}  ${pattern.title}  ${chalk.dim(`(overlap ${overlap})`)}`;
}

export function formatModuleReport(result: ModuleResult): string[] {
  const present = result.report.present.length;
  const lines = [
    `${chalk.bold('Coherence:')}    ${result.coherence}/3`,
    `${chalk.bold('Completeness:')} ${formatPercent(result.completeness)} (${present}/${SEAL_LAYER_NUMBERS.length} layers)`,
    `${chalk.bold('Entity:')}       ${result.entity}`,
    '',
  ];

  for (const { layer, pattern } of result.selections) {
    const name = getSealLayer(layer).name.padEnd(11);
    lines.push(pattern
      ? `  ${chalk.green('✓')} L${layer} ${name} ${serializeCoordinate(pattern.coordinate)}  ${pattern.title}`
      : `  ${chalk.dim('·')} L${layer} ${name} ${chalk.dim('(gap)')}`);
  }

  const { weakest } = result.report;
  if (weakest) {
    lines.push('', chalk.dim(`Weakest pair: L${weakest.lower} / L${weakest.upper} = ${weakest.value}`));
  }
  if (result.report.dependencies.length > 0) {
    lines.push(chalk.dim(`Dependencies: ${result.report.dependencies.join(', ')}`));
  }
  return lines;
}

export function formatLayers(layers: readonly LayerSummary[]): string[] {
  return layers.map(({ layer, name, description, patterns }) =>
    `L${layer} ${chalk.bold(name.padEnd(11))} ${String(patterns).padStart(3)}  ${chalk.dim(description)}`
  );
}

export function formatStats(stats: SealStackStats): string[] {
  const lines = [
    `${chalk.bold('Patterns:')} ${stats.patterns}`,
    `${chalk.bold('Lexicons:')} ${stats.lexicons.length > 0 ? stats.lexicons.join(', ') : '(none)'}`,
  ];
  for (const layer of SEAL_LAYER_NUMBERS) {
    lines.push(`  L${layer} ${getSealLayer(layer).name.padEnd(11)} ${stats.layers[layer]}`);
  }
  return lines;
}
