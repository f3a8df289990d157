import { Command } from 'commander';
import type { SearchOptions } from '../../core/engine/types.js';
import { searchHitView } from '../../core/engine/views.js';
import type { SealLayerNumber } from '../../core/seals/types.js';
import { formatSearchHit } from '../formatters/human.js';
import {
  DEFAULT_CONFIG,
  exitWithError,
  openSealStack,
  parseLayerOption,
  parseLimitOption,
  type CommonOptions,
} from './shared.js';

interface SearchCommandOptions extends CommonOptions {
  layer?: SealLayerNumber;
  lexicon?: string;
  entity?: string;
  limit?: number;
}

/**
 * Create the search command.
 */
export function createSearchCommand(): Command {
  return new Command('search')
    .description('List patterns matching a query, best first')
    .argument('[query...]', 'Free-text query; omit to list everything')
    .option('-l, --layer <n>', 'Only this seal layer (1-7)', parseLayerOption)
    .option('-x, --lexicon <name>', 'Only this lexicon, e.g. TECH')
    .option('-e, --entity <glob>', 'Entity path glob, e.g. "PYTHON.*"')
    .option('-n, --limit <n>', 'Maximum results', parseLimitOption)
    .option('-c, --config <path>', 'Path to config file', DEFAULT_CONFIG)
    .option('--json', 'Output as JSON')
    .action(async (words: string[], options: SearchCommandOptions) => {
      try {
        await runSearch(words.join(' '), options);
      } catch (error) {
        exitWithError(error);
      }
    });
}

async function runSearch(query: string, options: SearchCommandOptions): Promise<void> {
  const stack = await openSealStack(options);

  const filters: SearchOptions = {};
  if (options.layer !== undefined) filters.layer = options.layer;
  if (options.lexicon !== undefined) filters.lexicon = options.lexicon;
  if (options.entity !== undefined) filters.entityGlob = options.entity;
  if (options.limit !== undefined) filters.limit = options.limit;

  const hits = stack.search(query, filters);

  if (options.json) {
    console.log(JSON.stringify(hits.map(searchHitView), null, 2));
    return;
  }
  if (hits.length === 0) {
    console.log('No patterns found.');
    return;
  }
  for (const hit of hits) {
    console.log(formatSearchHit(hit));
  }
}
