/**
 * MCP tool handlers for pattern lookup, search and layer listing.
 */
import type { SealStack } from '../../core/engine/seal-stack.js';
import type { SearchOptions } from '../../core/engine/types.js';
import { batchRetrieveView, retrieveView, searchHitView } from '../../core/engine/views.js';
import { isSealLayerNumber } from '../../core/seals/layers.js';
import { errorResult, jsonResult, type ToolResult } from './result.js';

export interface SearchArgs {
  query?: string;
  layer?: number;
  lexicon?: string;
  entity?: string;
  limit?: number;
}

export function handleRetrieve(stack: SealStack, coordinate: string): ToolResult {
  const result = stack.retrieve(coordinate);
  const view = retrieveView(result);
  return result.status === 'found' ? jsonResult(view) : { ...jsonResult(view), isError: true };
}

/**
 * Per-entry outcomes; a malformed or missing coordinate does not fail the call.
 */
export function handleRetrieveBatch(stack: SealStack, coordinates: string[]): ToolResult {
  if (coordinates.length === 0) {
    return errorResult(new Error('coordinates must name at least one coordinate'));
  }
  return jsonResult(batchRetrieveView(stack.retrieveBatch(coordinates)));
}

export function handleSearch(stack: SealStack, args: SearchArgs): ToolResult {
  const options: SearchOptions = {};

  if (args.layer !== undefined) {
    if (!isSealLayerNumber(args.layer)) {
      return errorResult(new Error(`layer must be an integer from 1 to 7, got ${args.layer}`));
    }
    options.layer = args.layer;
  }
  if (args.limit !== undefined) {
    if (!Number.isInteger(args.limit) || args.limit < 1) {
      return errorResult(new Error(`limit must be a positive integer, got ${args.limit}`));
    }
    options.limit = args.limit;
  }
  if (args.lexicon) options.lexicon = args.lexicon;
  if (args.entity) options.entityGlob = args.entity;

  const hits = stack.search(args.query ?? '', options);
  return jsonResult({ query: args.query ?? '', count: hits.length, hits: hits.map(searchHitView) });
}

export function handleLayers(stack: SealStack): ToolResult {
  return jsonResult({ layers: stack.layers() });
}
