/**
 * Keyword interpreter - turns a request into a coarse Intent.
 *
 * Deliberately a heuristic: tokens become tags, the longest noun becomes
 * the entity, and a matched concept adds per-layer vocabulary. It never fails.
 */
import { upperFirst } from '../../utils/string.js';
import { tryParseCoordinate } from '../coordinate/parser.js';
import { SEAL_LAYER_NUMBERS } from '../seals/layers.js';
import type { SealLayerNumber } from '../seals/types.js';
import { tokenize, type Token } from './tokenizer.js';
import { minimalVocabulary } from './vocabulary.js';
import type {
  Concept,
  CoordinateIntent,
  Intent,
  ModuleRequest,
  QueryInterpreter,
  QueryIntent,
  Vocabulary,
} from './types.js';

interface EntityMatch {
  entity: string;
  entityName: string;
}

/**
 * Noun a token stands for: the noun itself or its -s / -es plural.
 */
export function matchNoun(token: string, nouns: readonly string[]): string | undefined {
  return nouns.find((noun) => token === noun || token === `${noun}s` || token === `${noun}es`);
}

function longest(tokens: Token[]): Token | undefined {
  let best: Token | undefined;
  for (const token of tokens) {
    if (!best || token.value.length > best.value.length) best = token;
  }
  return best;
}

function findEntity(tokens: Token[], nouns: readonly string[]): EntityMatch | undefined {
  const nounTokens = tokens.filter((t) => matchNoun(t.value, nouns) !== undefined);
  const token = longest(nounTokens.length > 0 ? nounTokens : tokens);
  if (!token) return undefined;

  const entity = matchNoun(token.value, nouns) ?? token.value;
  const capitalized = token.raw[0] !== token.raw[0].toLowerCase();
  return { entity, entityName: capitalized ? upperFirst(entity) : entity };
}

function findConcept(
  concepts: readonly Concept[],
  entity: string | undefined,
  tokens: Token[]
): Concept | undefined {
  return concepts.find((concept) =>
    (entity !== undefined && concept.triggers.has(entity))
    || tokens.some((t) => concept.triggers.has(t.value))
  );
}

export class KeywordInterpreter implements QueryInterpreter {
  private readonly vocabulary: Vocabulary;

  constructor(vocabulary: Vocabulary = minimalVocabulary()) {
    this.vocabulary = vocabulary;
  }

  interpret(request: ModuleRequest): Intent {
    switch (request.kind) {
      case 'coordinate':
        return { kind: 'coordinate', coordinate: request.coordinate };
      case 'layer':
        return {
          kind: 'layer',
          layer: request.layer,
          tags: new Set(request.tags.map((t) => t.trim().toLowerCase()).filter(Boolean)),
        };
      case 'query':
        return this.interpretText(request.text);
    }
  }

  /**
   * Interpret free text. Text that is itself a coordinate becomes an exact lookup.
   */
  interpretText(text: string): CoordinateIntent | QueryIntent {
    const coordinate = tryParseCoordinate(text.trim());
    if (coordinate) {
      return { kind: 'coordinate', coordinate };
    }
    return this.interpretKeywords(text);
  }

  /**
   * Keyword interpretation only, for callers that never want an exact lookup.
   */
  interpretKeywords(text: string): QueryIntent {
    const { stopWords, nouns, concepts } = this.vocabulary;
    const tokens = tokenize(text, stopWords);
    const tags = new Set(tokens.map((t) => t.value));
    const match = findEntity(tokens, nouns);
    const concept = findConcept(concepts, match?.entity, tokens);

    const layers = new Map<SealLayerNumber, ReadonlySet<string>>();
    for (const layer of SEAL_LAYER_NUMBERS) {
      const layerTags = new Set(tags);
      if (match) layerTags.add(match.entity);
      for (const tag of concept?.layers.get(layer) ?? []) layerTags.add(tag);
      layers.set(layer, layerTags);
    }

    const intent: QueryIntent = { kind: 'query', query: text, tags, layers };
    if (match) {
      intent.entity = match.entity;
      intent.entityName = match.entityName;
    }
    if (concept) intent.concept = concept.name;
    return intent;
  }
}
