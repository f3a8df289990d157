/**
 * Free-text tokenizer for the keyword interpreter.
 */

const MIN_TOKEN_LENGTH = 3;

export interface Token {
  /** As written in the query */
  raw: string;
  /** Lower-cased form used for matching */
  value: string;
}

/** Anything that is not a letter, combining mark or digit, in any script. */
const SEPARATOR_RE = /[^\p{L}\p{M}\p{N}]+/u;

/**
 * Split on non-alphanumeric boundaries, drop short tokens and stop words.
 * Order of first appearance is kept; later duplicates are dropped.
 */
export function tokenize(text: string, stopWords: ReadonlySet<string>): Token[] {
  const seen = new Set<string>();
  const tokens: Token[] = [];

  for (const raw of text.split(SEPARATOR_RE)) {
    const value = raw.toLowerCase();
    if (value.length < MIN_TOKEN_LENGTH) continue;
    if (stopWords.has(value) || seen.has(value)) continue;
    seen.add(value);
    tokens.push({ raw, value });
  }

  return tokens;
}
