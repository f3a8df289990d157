/**
 * MCP tool handler for module assembly.
 */
import type { SealStack } from '../../core/engine/seal-stack.js';
import { moduleView } from '../../core/engine/views.js';
import { jsonResult, type ToolResult } from './result.js';

/**
 * EMPTY_MODULE and other library errors propagate to the server's error mapping.
 */
export function handleBuildModule(stack: SealStack, query: string): ToolResult {
  return jsonResult(moduleView(stack.buildModule(query)));
}
