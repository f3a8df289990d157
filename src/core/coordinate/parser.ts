/**
 * Coordinate parsing, validation and serialization.
 *
 * The text form is the one bit-exact external contract of the library:
 * serializeCoordinate(parseCoordinate(text)) === text for every valid text
 * written with upper-case L/Q/C prefixes.
 */
import { CoordinateError, ErrorCodes } from '../../utils/errors.js';
import { isSealLayerNumber } from '../seals/layers.js';
import type { CoherenceClass, Coordinate, CoordinateFields, Quadrant } from './types.js';

const COORDINATE_RE = /^[Ll](\d)\.[Qq](\d)\.([^.[\]]+)\.([^[\]]+)\[[Cc](\d)\]$/;
const LEXICON_RE = /^[A-Z][A-Z0-9_]*$/;
const ENTITY_SEGMENT_RE = /^[A-Z_][A-Z0-9_]*$/;
const VARIANT_RE = /^[a-z0-9][A-Za-z0-9_-]*$/;

function malformed(text: string, reason: string): CoordinateError {
  return new CoordinateError(
    ErrorCodes.MALFORMED_COORDINATE,
    `Malformed coordinate "${text}": ${reason}`,
    { coordinate: text, reason }
  );
}

function isQuadrant(value: number): value is Quadrant {
  return Number.isInteger(value) && value >= 1 && value <= 4;
}

function isCoherenceClass(value: number): value is CoherenceClass {
  return Number.isInteger(value) && value >= 0 && value <= 3;
}

/**
 * Split the part after the lexicon into entity and optional variant.
 * The variant is the last segment when it starts lower-case or with a digit.
 */
function splitEntityPath(text: string, path: string): { entity: string; variant?: string } {
  const segments = path.split('.');
  const last = segments[segments.length - 1];
  const hasVariant = segments.length > 1 && VARIANT_RE.test(last);
  const entitySegments = hasVariant ? segments.slice(0, -1) : segments;

  for (const segment of entitySegments) {
    if (!ENTITY_SEGMENT_RE.test(segment)) {
      throw malformed(text, `invalid entity segment "${segment}"`);
    }
  }

  const entity = entitySegments.join('.');
  return hasVariant ? { entity, variant: last } : { entity };
}

/**
 * Validate raw fields and build an immutable Coordinate.
 */
export function createCoordinate(fields: CoordinateFields): Coordinate {
  const label = `${fields.lexicon}.${fields.entity}`;
  const { layer, quadrant, coherenceClass } = fields;

  if (!isSealLayerNumber(layer)) {
    throw malformed(label, `layer ${layer} is outside 1-7`);
  }
  if (!isQuadrant(quadrant)) {
    throw malformed(label, `quadrant ${quadrant} is outside 1-4`);
  }
  if (!isCoherenceClass(coherenceClass)) {
    throw malformed(label, `class ${coherenceClass} is outside 0-3`);
  }
  if (!LEXICON_RE.test(fields.lexicon)) {
    throw malformed(label, `invalid lexicon "${fields.lexicon}"`);
  }
  for (const segment of fields.entity.split('.')) {
    if (!ENTITY_SEGMENT_RE.test(segment)) {
      throw malformed(label, `invalid entity segment "${segment}"`);
    }
  }
  if (fields.variant !== undefined && !VARIANT_RE.test(fields.variant)) {
    throw malformed(label, `invalid variant "${fields.variant}"`);
  }

  const coordinate: Coordinate = fields.variant === undefined
    ? { layer, quadrant, lexicon: fields.lexicon, entity: fields.entity, coherenceClass }
    : { layer, quadrant, lexicon: fields.lexicon, entity: fields.entity, variant: fields.variant, coherenceClass };
  return Object.freeze(coordinate);
}

/**
 * Parse coordinate text. Throws CoordinateError (MALFORMED_COORDINATE).
 */
export function parseCoordinate(text: string): Coordinate {
  const match = COORDINATE_RE.exec(text);
  if (!match) {
    throw malformed(text, 'expected L<layer>.Q<quadrant>.<LEXICON>.<ENTITY>[.<variant>][C<class>]');
  }

  const [, layerText, quadrantText, lexicon, path, classText] = match;
  const layer = Number(layerText);
  const quadrant = Number(quadrantText);
  const coherenceClass = Number(classText);

  if (!isSealLayerNumber(layer)) {
    throw malformed(text, `layer ${layer} is outside 1-7`);
  }
  if (!isQuadrant(quadrant)) {
    throw malformed(text, `quadrant ${quadrant} is outside 1-4`);
  }
  if (!isCoherenceClass(coherenceClass)) {
    throw malformed(text, `class ${coherenceClass} is outside 0-3`);
  }
  if (!LEXICON_RE.test(lexicon)) {
    throw malformed(text, `invalid lexicon "${lexicon}"`);
  }

  const { entity, variant } = splitEntityPath(text, path);
  return createCoordinate({ layer, quadrant, lexicon, entity, variant, coherenceClass });
}

/**
 * Like parseCoordinate, but returns undefined instead of throwing.
 */
export function tryParseCoordinate(text: string): Coordinate | undefined {
  try {
    return parseCoordinate(text);
  } catch (error) {
    if (error instanceof CoordinateError) return undefined;
    throw error;
  }
}

export function serializeCoordinate(coordinate: Coordinate): string {
  const variant = coordinate.variant === undefined ? '' : `.${coordinate.variant}`;
  return `L${coordinate.layer}.Q${coordinate.quadrant}.${coordinate.lexicon}.${coordinate.entity}${variant}[C${coordinate.coherenceClass}]`;
}

export function coordinatesEqual(a: Coordinate, b: Coordinate): boolean {
  return a.layer === b.layer
    && a.quadrant === b.quadrant
    && a.lexicon === b.lexicon
    && a.entity === b.entity
    && a.variant === b.variant
    && a.coherenceClass === b.coherenceClass;
}

/**
 * Total order by serialized text (UTF-16 code units, not locale collation).
 */
export function compareCoordinates(a: Coordinate, b: Coordinate): number {
  const left = serializeCoordinate(a);
  const right = serializeCoordinate(b);
  return left < right ? -1 : left > right ? 1 : 0;
}
