import { Command } from 'commander';
import { getPackageVersion } from '../utils/version.js';
import { createBuildCommand } from './commands/build.js';
import { createLayersCommand } from './commands/layers.js';
import { createMcpCommand } from './commands/mcp.js';
import { createRetrieveCommand } from './commands/retrieve.js';
import { createSearchCommand } from './commands/search.js';
import { createStatsCommand } from './commands/stats.js';

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('sealstack')
    .description('Coordinate-addressed code patterns across seven seal layers')
    .version(getPackageVersion());
  [createRetrieveCommand, createSearchCommand, createBuildCommand, createLayersCommand,
   createStatsCommand, createMcpCommand].forEach((cmd) => program.addCommand(cmd()));
  return program;
}
