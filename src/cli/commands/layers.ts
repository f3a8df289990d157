import { Command } from 'commander';
import { formatLayers } from '../formatters/human.js';
import { DEFAULT_CONFIG, exitWithError, openSealStack, type CommonOptions } from './shared.js';

/**
 * Create the layers command.
 */
export function createLayersCommand(): Command {
  return new Command('layers')
    .description('List the seven seal layers with pattern counts')
    .option('-c, --config <path>', 'Path to config file', DEFAULT_CONFIG)
    .option('--json', 'Output as JSON')
    .action(async (options: CommonOptions) => {
      try {
        const stack = await openSealStack(options);
        const layers = stack.layers();
        if (options.json) {
          console.log(JSON.stringify(layers, null, 2));
          return;
        }
        for (const line of formatLayers(layers)) console.log(line);
      } catch (error) {
        exitWithError(error);
      }
    });
}
