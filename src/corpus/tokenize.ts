const EDGE_PUNCTUATION = /^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu;

/** Lowercases a word and strips punctuation from both ends ("Class." → "class"). */
export function normalizeTerm(word: string): string {
  return word.toLowerCase().replace(EDGE_PUNCTUATION, '');
}

/** Whitespace-split terms of `text`, normalised, in order of appearance. */
export function splitTerms(text: string): string[] {
  return text
    .split(/\s+/)
    .map(normalizeTerm)
    .filter(term => term.length > 0);
}

/** Index tokens: terms with at least `minLength` characters (code points, not UTF-16 units). */
export function indexTokens(text: string, minLength: number): string[] {
  return splitTerms(text).filter(term => Array.from(term).length >= minLength);
}
