/**
 * Entity placeholder substitution for pattern bodies.
 */
import { lowerFirst, upperFirst } from '../../utils/string.js';

const PLACEHOLDER_RE = /\{(Entity|entity|ENTITY)\}/g;

export type PlaceholderName = 'Entity' | 'entity' | 'ENTITY';

/**
 * Casing applied for each placeholder spelling.
 *   {Entity} - type names (UserProfile)
 *   {entity} - variable names (userProfile)
 *   {ENTITY} - constants (USERPROFILE)
 */
export function entityForm(placeholder: PlaceholderName, entityName: string): string {
  switch (placeholder) {
    case 'Entity':
      return upperFirst(entityName);
    case 'entity':
      return lowerFirst(entityName);
    case 'ENTITY':
      return entityName.toUpperCase();
  }
}

function isPlaceholderName(value: string): value is PlaceholderName {
  return value === 'Entity' || value === 'entity' || value === 'ENTITY';
}

/**
 * Replace every entity placeholder in `body`. Other brace text is untouched.
 */
export function renderTemplate(body: string, entityName: string): string {
  return body.replace(PLACEHOLDER_RE, (match: string, name: string) =>
    isPlaceholderName(name) ? entityForm(name, entityName) : match
  );
}
