/**
 * Interpreter vocabulary: stop words, the entity noun list and concept groups.
 */
import { z } from 'zod';
import { ErrorCodes, SystemError } from '../../utils/errors.js';
import { loadYamlWithSchema, parseYamlWithSchema } from '../../utils/yaml.js';
import { isSealLayerNumber } from '../seals/layers.js';
import type { SealLayerNumber } from '../seals/types.js';
import type { Concept, Vocabulary } from './types.js';

export const BUILTIN_STOP_WORDS: readonly string[] = [
  'the', 'and', 'for', 'with', 'from', 'into', 'that', 'this',
  'create', 'build', 'make', 'generate', 'module', 'please', 'using', 'new',
];

const ConceptSchema = z.object({
  name: z.string().min(1),
  triggers: z.array(z.string().min(1)).min(1),
  /** Seal number (1-7) to extra tags */
  layers: z.record(z.string(), z.array(z.string().min(1))).default({}),
});

export const VocabularySchema = z.object({
  version: z.union([z.string(), z.number()]).transform(String).optional(),
  stop_words: z.array(z.string().min(1)).optional(),
  nouns: z.array(z.string().min(1)).default([]),
  concepts: z.array(ConceptSchema).default([]),
});

export type VocabularyDocument = z.infer<typeof VocabularySchema>;

const lower = (values: Iterable<string>): string[] => [...values].map((v) => v.trim().toLowerCase());

/**
 * Vocabulary used when none is configured: built-in stop words only.
 */
export function minimalVocabulary(): Vocabulary {
  return { stopWords: new Set(BUILTIN_STOP_WORDS), nouns: [], concepts: [] };
}

function toConcept(entry: VocabularyDocument['concepts'][number]): Concept {
  const layers = new Map<SealLayerNumber, readonly string[]>();
  for (const [key, tags] of Object.entries(entry.layers)) {
    const layer = Number(key);
    if (!isSealLayerNumber(layer)) {
      throw new SystemError(
        ErrorCodes.INVALID_VOCABULARY,
        `Concept "${entry.name}" names unknown seal layer "${key}"`,
        { concept: entry.name, layer: key }
      );
    }
    layers.set(layer, lower(tags));
  }
  return { name: entry.name.toLowerCase(), triggers: new Set(lower(entry.triggers)), layers };
}

export function vocabularyFromDocument(document: VocabularyDocument): Vocabulary {
  return {
    stopWords: new Set(lower(document.stop_words ?? BUILTIN_STOP_WORDS)),
    nouns: [...new Set(lower(document.nouns))],
    concepts: document.concepts.map(toConcept),
  };
}

export function parseVocabulary(content: string): Vocabulary {
  return vocabularyFromDocument(
    parseYamlWithSchema(content, VocabularySchema, ErrorCodes.INVALID_VOCABULARY)
  );
}

export async function loadVocabulary(filePath: string): Promise<Vocabulary> {
  return vocabularyFromDocument(
    await loadYamlWithSchema(filePath, VocabularySchema, ErrorCodes.INVALID_VOCABULARY)
  );
}
