/**
 * MCP tool definitions for Seal Stack.
 */
import type { Tool } from '@modelcontextprotocol/sdk/types.js';

const coordinateExample = 'L1.Q1.TECH.PYTHON.FUNCTION.BASIC[C3]';

export const toolDefinitions: Tool[] = [
  {
    name: 'sealstack_retrieve',
    description: 'Get one code pattern by its exact coordinate. Misses return the nearest coordinates.',
    inputSchema: {
      type: 'object',
      properties: {
        coordinate: {
          type: 'string',
          description: `Coordinate text, e.g. ${coordinateExample}`,
        },
      },
      required: ['coordinate'],
    },
  },
  {
    name: 'sealstack_retrieve_batch',
    description: 'Get several patterns by coordinate in one call. Each entry reports found, not_found or malformed.',
    inputSchema: {
      type: 'object',
      properties: {
        coordinates: {
          type: 'array',
          items: { type: 'string' },
          description: `Coordinate texts, e.g. ["${coordinateExample}"]`,
        },
      },
      required: ['coordinates'],
    },
  },
  {
    name: 'sealstack_search',
    description: 'List patterns matching a free-text query, best match first',
    inputSchema: {
      type: 'object',
      properties: {
        query: {
          type: 'string',
          description: 'Free-text query (omit to list every pattern)',
        },
        layer: {
          type: 'number',
          description: 'Only this seal layer (1-7)',
        },
        lexicon: {
          type: 'string',
          description: 'Only this lexicon, e.g. TECH',
        },
        entity: {
          type: 'string',
          description: 'Glob over the entity path, e.g. "PYTHON.*"',
        },
        limit: {
          type: 'number',
          description: 'Maximum results (default from config, 20)',
        },
      },
    },
  },
  {
    name: 'sealstack_build_module',
    description: 'Assemble one pattern per seal layer for a query and report coherence (0-3) and completeness',
    inputSchema: {
      type: 'object',
      properties: {
        query: {
          type: 'string',
          description: 'What to build, e.g. "users module with auth"',
        },
      },
      required: ['query'],
    },
  },
  {
    name: 'sealstack_layers',
    description: 'List the seven seal layers with descriptions and pattern counts',
    inputSchema: {
      type: 'object',
      properties: {},
    },
  },
];
