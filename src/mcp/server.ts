/**
 * Seal Stack MCP server - exposes retrieval, search and module assembly as MCP tools.
 *
 * stdout belongs to the protocol; every log line goes to stderr.
 */
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { loadConfig } from '../core/config/loader.js';
import { createSealStackLoader, type SealStackLoader } from '../core/engine/loader.js';
import { logger } from '../utils/logger.js';
import { getPackageVersion } from '../utils/version.js';
import { getNumber, getString, getStringArrayRequired, getStringRequired } from './arg-parser.js';
import {
  errorResult,
  handleBuildModule,
  handleLayers,
  handleRetrieve,
  handleRetrieveBatch,
  handleSearch,
  type ToolResult,
} from './handlers/index.js';
import { toolDefinitions } from './tool-definitions.js';

const log = logger.child('mcp');

type ToolArgs = Record<string, unknown> | undefined;

async function dispatch(loader: SealStackLoader, name: string, args: ToolArgs): Promise<ToolResult> {
  switch (name) {
    case 'sealstack_retrieve':
      return handleRetrieve(await loader(), getStringRequired(args, 'coordinate'));

    case 'sealstack_retrieve_batch':
      return handleRetrieveBatch(await loader(), getStringArrayRequired(args, 'coordinates'));

    case 'sealstack_search':
      return handleSearch(await loader(), {
        query: getString(args, 'query'),
        layer: getNumber(args, 'layer'),
        lexicon: getString(args, 'lexicon'),
        entity: getString(args, 'entity'),
        limit: getNumber(args, 'limit'),
      });

    case 'sealstack_build_module':
      return handleBuildModule(await loader(), getStringRequired(args, 'query'));

    case 'sealstack_layers':
      return handleLayers(await loader());

    default:
      return { content: [{ type: 'text', text: `Unknown tool: ${name}` }], isError: true };
  }
}

/**
 * Build a server over a stack loader. The stack is loaded on the first tool call.
 */
export function createMcpServer(loader: SealStackLoader): Server {
  const server = new Server(
    { name: 'sealstack', version: getPackageVersion() },
    { capabilities: { tools: {} } }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: toolDefinitions,
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    try {
      return await dispatch(loader, name, args);
    } catch (error) {
      log.debug(`Tool ${name} failed`, { error: error instanceof Error ? error.message : String(error) });
      return errorResult(error);
    }
  });

  return server;
}

/**
 * Load config for `projectRoot` and serve on stdio until the client disconnects.
 */
export async function startMcpServer(projectRoot: string, configPath?: string): Promise<void> {
  const config = await loadConfig(projectRoot, configPath);
  logger.useStderr();
  logger.setLevel(config.logging.level === 'debug' ? 'debug' : 'silent');

  const server = createMcpServer(createSealStackLoader(config, projectRoot));
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`sealstack MCP server ready (project: ${projectRoot})`);
}
