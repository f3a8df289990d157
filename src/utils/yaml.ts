/**
 * YAML parsing helpers shared by the config, pattern-table and vocabulary loaders.
 */
import { parse } from 'yaml';
import { z } from 'zod';
import { SystemError, ErrorCodes, type ErrorCode } from './errors.js';
import { readFile } from './file-system.js';

/**
 * Parse YAML content into an untyped value.
 */
export function parseYaml(content: string): unknown {
  try {
    return parse(content);
  } catch (error) {
    throw new SystemError(
      ErrorCodes.PARSE_ERROR,
      `Failed to parse YAML: ${error instanceof Error ? error.message : 'Unknown error'}`,
      { error }
    );
  }
}

/**
 * Parse and validate YAML content with a Zod schema.
 * Validation failures are raised with `invalidCode` so each loader keeps its own error code.
 */
export function parseYamlWithSchema<T extends z.ZodTypeAny>(
  content: string,
  schema: T,
  invalidCode: ErrorCode = ErrorCodes.PARSE_ERROR
): z.infer<T> {
  const parsed = parseYaml(content);
  const result = schema.safeParse(parsed);

  if (!result.success) {
    throw new SystemError(
      invalidCode,
      `YAML validation failed: ${formatZodError(result.error)}`,
      { errors: result.error.issues }
    );
  }

  return result.data;
}

/**
 * Load and validate a YAML file with a Zod schema.
 */
export async function loadYamlWithSchema<T extends z.ZodTypeAny>(
  filePath: string,
  schema: T,
  invalidCode: ErrorCode = ErrorCodes.PARSE_ERROR
): Promise<z.infer<T>> {
  let content: string;
  try {
    content = await readFile(filePath);
  } catch (error) {
    throw new SystemError(
      ErrorCodes.PARSE_ERROR,
      `Failed to read YAML file: ${filePath}`,
      { filePath, error }
    );
  }

  try {
    return parseYamlWithSchema(content, schema, invalidCode);
  } catch (error) {
    if (error instanceof SystemError) {
      throw new SystemError(
        error.code,
        `${error.message} (file: ${filePath})`,
        { ...error.details, filePath }
      );
    }
    throw error;
  }
}

/**
 * Format Zod errors into a readable string.
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((e) => {
      const path = e.path.join('.');
      return path ? `${path}: ${e.message}` : e.message;
    })
    .join('; ');
}
