import { Command } from 'commander';
import { formatStats } from '../formatters/human.js';
import { DEFAULT_CONFIG, exitWithError, openSealStack, type CommonOptions } from './shared.js';

/**
 * Create the stats command.
 */
export function createStatsCommand(): Command {
  return new Command('stats')
    .description('Summarize the loaded pattern table')
    .option('-c, --config <path>', 'Path to config file', DEFAULT_CONFIG)
    .option('--json', 'Output as JSON')
    .action(async (options: CommonOptions) => {
      try {
        const stack = await openSealStack(options);
        const stats = stack.stats();
        if (options.json) {
          console.log(JSON.stringify(stats, null, 2));
          return;
        }
        for (const line of formatStats(stats)) console.log(line);
      } catch (error) {
        exitWithError(error);
      }
    });
}
