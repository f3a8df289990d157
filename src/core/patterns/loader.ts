/**
 * Pattern table loader - reads and validates the versioned YAML pattern table.
 *
 * Loading is the caller's concern: the store and everything above it only
 * ever see the resulting Pattern sequence.
 */
import { CoordinateError, ErrorCodes, SystemError } from '../../utils/errors.js';
import { readFile } from '../../utils/file-system.js';
import { parseYamlWithSchema } from '../../utils/yaml.js';
import { parseCoordinate, serializeCoordinate } from '../coordinate/parser.js';
import type { Coordinate } from '../coordinate/types.js';
import { PatternTableSchema, type PatternEntry } from './schema.js';
import type { Pattern, PatternTable, PatternView } from './types.js';

export interface PatternInput {
  coordinate: Coordinate | string;
  title: string;
  body: string;
  tests?: string;
  language: string;
  tags?: Iterable<string>;
  description?: string;
  dependencies?: Iterable<string>;
}

/**
 * Build an immutable Pattern. Tags are lower-cased and de-duplicated.
 */
export function createPattern(input: PatternInput): Pattern {
  const coordinate = typeof input.coordinate === 'string'
    ? parseCoordinate(input.coordinate)
    : input.coordinate;
  const tags = new Set<string>();
  for (const tag of input.tags ?? []) {
    const normalized = tag.trim().toLowerCase();
    if (normalized) tags.add(normalized);
  }

  return Object.freeze({
    coordinate,
    title: input.title,
    body: input.body,
    tests: input.tests,
    tags,
    language: input.language.toLowerCase(),
    description: input.description,
    dependencies: Object.freeze([...new Set(input.dependencies ?? [])]),
  });
}

function entryToPattern(entry: PatternEntry, index: number, source: string): Pattern {
  try {
    return createPattern(entry);
  } catch (error) {
    if (error instanceof CoordinateError) {
      throw new SystemError(
        ErrorCodes.INVALID_PATTERN_TABLE,
        `Pattern #${index + 1} "${entry.title}" in ${source}: ${error.message}`,
        { source, index, coordinate: entry.coordinate }
      );
    }
    throw error;
  }
}

function parseTableDocument(content: string, source: string) {
  try {
    return parseYamlWithSchema(content, PatternTableSchema, ErrorCodes.INVALID_PATTERN_TABLE);
  } catch (error) {
    if (error instanceof SystemError) {
      throw new SystemError(error.code, `${error.message} (source: ${source})`, { ...error.details, source });
    }
    throw error;
  }
}

/**
 * Parse pattern table YAML text.
 */
export function parsePatternTable(content: string, source = '<inline>'): PatternTable {
  const document = parseTableDocument(content, source);
  const table: PatternTable = {
    version: document.version,
    source,
    patterns: document.patterns.map((entry, index) => entryToPattern(entry, index, source)),
  };
  if (document.lexicon !== undefined) table.lexicon = document.lexicon;
  return table;
}

/**
 * Read and parse a pattern table file.
 */
export async function loadPatternTable(filePath: string): Promise<PatternTable> {
  let content: string;
  try {
    content = await readFile(filePath);
  } catch (error) {
    throw new SystemError(
      ErrorCodes.PARSE_ERROR,
      `Failed to read pattern table: ${filePath}`,
      { filePath, error: error instanceof Error ? error.message : String(error) }
    );
  }
  return parsePatternTable(content, filePath);
}

export function toPatternView(pattern: Pattern): PatternView {
  const view: PatternView = {
    coordinate: serializeCoordinate(pattern.coordinate),
    title: pattern.title,
    language: pattern.language,
    tags: [...pattern.tags].sort(),
    dependencies: [...pattern.dependencies],
    body: pattern.body,
  };
  if (pattern.description !== undefined) view.description = pattern.description;
  if (pattern.tests !== undefined) view.tests = pattern.tests;
  return view;
}
