import { Command } from 'commander';
import { startMcpServer } from '../../mcp/server.js';
import { getDefaultProjectRoot } from '../../mcp/utils.js';
import { DEFAULT_CONFIG, exitWithError } from './shared.js';

interface McpOptions {
  config: string;
  project?: string;
}

/**
 * Create the mcp command.
 */
export function createMcpCommand(): Command {
  return new Command('mcp')
    .description('Start the MCP server on stdio')
    .option('-p, --project <dir>', 'Project root (SEALSTACK_PROJECT_ROOT takes precedence)')
    .option('-c, --config <path>', 'Path to config file', DEFAULT_CONFIG)
    .action(async (options: McpOptions) => {
      try {
        await startMcpServer(getDefaultProjectRoot(options.project), options.config);
      } catch (error) {
        exitWithError(error);
      }
    });
}
