import chalk from 'chalk';
import { Command } from 'commander';
import { moduleView } from '../../core/engine/views.js';
import { formatModuleReport } from '../formatters/human.js';
import { DEFAULT_CONFIG, exitWithError, openSealStack, type CommonOptions } from './shared.js';

interface BuildOptions extends CommonOptions {
  outputOnly?: boolean;
}

/**
 * Create the build command.
 */
export function createBuildCommand(): Command {
  return new Command('build')
    .description('Assemble a multi-layer module for a query and report its coherence')
    .argument('<query...>', 'What to build, e.g. "users module with auth"')
    .option('--output-only', 'Print only the assembled code')
    .option('-c, --config <path>', 'Path to config file', DEFAULT_CONFIG)
    .option('--json', 'Output as JSON')
    .action(async (words: string[], options: BuildOptions) => {
      try {
        await runBuild(words.join(' '), options);
      } catch (error) {
        exitWithError(error);
      }
    });
}

async function runBuild(query: string, options: BuildOptions): Promise<void> {
  const stack = await openSealStack(options);
  const result = stack.buildModule(query);

  if (options.json) {
    console.log(JSON.stringify(moduleView(result), null, 2));
    return;
  }
  if (options.outputOnly) {
    console.log(result.output);
    return;
  }

  for (const line of formatModuleReport(result)) console.log(line);
  console.log();
  console.log(result.output);
  if (result.tests) {
    console.log();
    console.log(chalk.bold('Tests:'));
    console.log(result.tests);
  }
}
