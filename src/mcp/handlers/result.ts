import { describeError } from '../../utils/errors.js';

export type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

export function jsonResult(value: unknown): ToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(value, null, 2) }] };
}

export function errorResult(error: unknown): ToolResult {
  return {
    content: [{ type: 'text', text: `Error: ${describeError(error)}` }],
    isError: true,
  };
}
