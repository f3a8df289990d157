import { Command } from 'commander';
import { batchRetrieveView, retrieveView } from '../../core/engine/views.js';
import type { BatchRetrieveResult } from '../../core/engine/types.js';
import { formatMalformed, formatNotFound, formatPattern } from '../formatters/human.js';
import { DEFAULT_CONFIG, exitWithError, openSealStack, type CommonOptions } from './shared.js';

/**
 * Create the retrieve command.
 */
export function createRetrieveCommand(): Command {
  return new Command('retrieve')
    .description('Retrieve patterns by exact coordinate')
    .argument('<coordinates...>', 'One or more coordinates, e.g. L1.Q1.TECH.PYTHON.FUNCTION.BASIC[C3]')
    .option('-c, --config <path>', 'Path to config file', DEFAULT_CONFIG)
    .option('--json', 'Output as JSON')
    .action(async (coordinates: string[], options: CommonOptions) => {
      let found: boolean;
      try {
        found = coordinates.length === 1
          ? await runRetrieve(coordinates[0], options)
          : await runRetrieveBatch(coordinates, options);
      } catch (error) {
        exitWithError(error);
      }
      if (!found) process.exit(1);
    });
}

async function runRetrieve(text: string, options: CommonOptions): Promise<boolean> {
  const stack = await openSealStack(options);
  const result = stack.retrieve(text);

  if (options.json) {
    console.log(JSON.stringify(retrieveView(result), null, 2));
  } else {
    for (const line of formatRetrieveResult(result)) console.log(line);
  }

  return result.status === 'found';
}

/**
 * Several coordinates: every entry is printed, and the command fails if any missed.
 */
async function runRetrieveBatch(texts: string[], options: CommonOptions): Promise<boolean> {
  const stack = await openSealStack(options);
  const results = stack.retrieveBatch(texts);

  if (options.json) {
    console.log(JSON.stringify(batchRetrieveView(results), null, 2));
  } else {
    results.forEach((result, i) => {
      if (i > 0) console.log('');
      for (const line of formatRetrieveResult(result)) console.log(line);
    });
  }

  return results.every((result) => result.status === 'found');
}

function formatRetrieveResult(result: BatchRetrieveResult): string[] {
  switch (result.status) {
    case 'found':
      return formatPattern(result.pattern);
    case 'not_found':
      return formatNotFound(result.coordinate, result.suggestions);
    case 'malformed':
      return [formatMalformed(result.error)];
  }
}
