/**
 * String manipulation utilities.
 */

/**
 * Levenshtein edit distance between two strings.
 */
export function editDistance(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let previous = Array.from({ length: b.length + 1 }, (_, i) => i);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current.push(Math.min(previous[j] + 1, current[j - 1] + 1, previous[j - 1] + cost));
    }
    previous = current;
  }
  return previous[b.length];
}

/**
 * Upper-case the first character, keep the rest.
 */
export function upperFirst(str: string): string {
  return str.length === 0 ? str : str[0].toUpperCase() + str.slice(1);
}

/**
 * Lower-case the first character, keep the rest.
 */
export function lowerFirst(str: string): string {
  return str.length === 0 ? str : str[0].toLowerCase() + str.slice(1);
}
