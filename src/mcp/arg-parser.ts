/**
 * Type-checked argument getters for MCP tool calls.
 *
 * Tool arguments arrive as `Record<string, unknown>`; each getter checks the
 * runtime type before returning, so handlers never cast.
 */

/** The shape of arguments received from MCP tool calls. */
export type McpArgs = Record<string, unknown> | undefined;

/**
 * Optional string. `undefined` when missing, null or not a string.
 */
export function getString(args: McpArgs, key: string): string | undefined {
  const value = args?.[key];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Required string. Throws if missing or not a string.
 */
export function getStringRequired(args: McpArgs, key: string): string {
  const value = getString(args, key);
  if (value === undefined) {
    throw new Error(`Required string argument "${key}" is missing or not a string`);
  }
  return value;
}

/**
 * Optional number. Numeric strings such as "3" are accepted, since some
 * clients send every argument as text.
 */
export function getNumber(args: McpArgs, key: string): number | undefined {
  const value = args?.[key];
  if (typeof value === 'number') return Number.isNaN(value) ? undefined : value;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isNaN(parsed) ? undefined : parsed;
  }
  return undefined;
}

/**
 * Required array of strings. Throws if missing, not an array, or any
 * element is not a string.
 */
export function getStringArrayRequired(args: McpArgs, key: string): string[] {
  const value = args?.[key];
  if (!Array.isArray(value)) {
    throw new Error(`Required array argument "${key}" is missing or not an array`);
  }
  const strings: string[] = [];
  for (const item of value) {
    if (typeof item !== 'string') {
      throw new Error(`Argument "${key}" must contain only strings`);
    }
    strings.push(item);
  }
  return strings;
}
