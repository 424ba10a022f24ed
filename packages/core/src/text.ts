/**
 * Text Utilities
 *
 * Token-level normalization shared by the knowledge registry, retrieval
 * strategies and field mapper. Every comparison in the core goes through
 * these functions so that "Premises" in a field name and "premises" in a
 * document fold to the same token.
 */

const STOP_WORDS = new Set([
  'a',
  'an',
  'and',
  'are',
  'as',
  'at',
  'be',
  'by',
  'for',
  'from',
  'has',
  'in',
  'is',
  'it',
  'of',
  'on',
  'or',
  'that',
  'the',
  'this',
  'to',
  'was',
  'were',
  'with',
]);

/**
 * Fold a term for case/whitespace/punctuation-insensitive comparison.
 * "Policy  No." and "policy no" fold to the same key.
 */
export function foldTerm(term: string): string {
  return term
    .toLowerCase()
    .replace(/[^\p{L}\p{N}#&]+/gu, ' ')
    .trim()
    .replace(/\s+/g, ' ');
}

/**
 * Light suffix stripping so singular and plural forms meet.
 */
export function stem(token: string): string {
  if (token.length > 4 && token.endsWith('ies')) {
    return `${token.slice(0, -3)}y`;
  }
  if (token.length > 3 && token.endsWith('s') && !token.endsWith('ss') && !token.endsWith('us')) {
    return token.slice(0, -1);
  }
  return token;
}

/**
 * Split text into folded, stemmed tokens. Stop words are dropped.
 */
export function tokenize(text: string): string[] {
  const folded = foldTerm(text);
  if (!folded) return [];

  const tokens: string[] = [];
  for (const raw of folded.split(' ')) {
    if (!raw || STOP_WORDS.has(raw)) continue;
    tokens.push(stem(raw));
  }
  return tokens;
}

/**
 * Token set of a text
 */
export function tokenSet(text: string): Set<string> {
  return new Set(tokenize(text));
}

/**
 * Jaccard similarity of two token sets, in [0, 1]
 */
export function jaccard(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  if (a.size === 0 && b.size === 0) return 0;

  let intersection = 0;
  for (const token of a) {
    if (b.has(token)) intersection++;
  }
  const union = a.size + b.size - intersection;
  return union === 0 ? 0 : intersection / union;
}

/**
 * Bag of unigrams plus adjacent bigrams, as term frequencies
 */
export function ngramVector(text: string): Map<string, number> {
  const tokens = tokenize(text);
  const vector = new Map<string, number>();

  const add = (feature: string) => vector.set(feature, (vector.get(feature) ?? 0) + 1);

  for (let i = 0; i < tokens.length; i++) {
    add(tokens[i]);
    if (i + 1 < tokens.length) {
      add(`${tokens[i]}_${tokens[i + 1]}`);
    }
  }
  return vector;
}

/**
 * Cosine similarity of two non-negative vectors, in [0, 1]
 */
export function cosineSimilarity(a: Map<string, number>, b: Map<string, number>): number {
  if (a.size === 0 || b.size === 0) return 0;

  let dot = 0;
  for (const [feature, weight] of a) {
    const other = b.get(feature);
    if (other !== undefined) dot += weight * other;
  }

  const norm = (v: Map<string, number>) => {
    let sum = 0;
    for (const weight of v.values()) sum += weight * weight;
    return Math.sqrt(sum);
  };

  const similarity = dot / (norm(a) * norm(b));
  return Math.min(1, Math.max(0, similarity));
}

/**
 * Whether the token sequence of `phrase` occurs contiguously in `text`
 */
export function containsPhrase(text: string, phrase: string): boolean {
  const phraseTokens = tokenize(phrase);
  if (phraseTokens.length === 0) return false;

  const haystack = ` ${tokenize(text).join(' ')} `;
  return haystack.includes(` ${phraseTokens.join(' ')} `);
}

/**
 * Round to four decimals so scores compare and print stably
 */
export function roundScore(value: number): number {
  return Math.round(value * 10000) / 10000;
}

/**
 * Escape a literal string for use inside a RegExp
 */
export function escapeRegExp(literal: string): string {
  return literal.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

const patternCache = new Map<string, RegExp>();

/**
 * Compile a pattern from a knowledge-base definition. Compiled expressions are
 * cached; only non-global flags are accepted, so a shared RegExp keeps no
 * lastIndex state between calls.
 */
export function compilePattern(pattern: string, flags = ''): RegExp {
  if (/[gy]/.test(flags)) {
    throw new SyntaxError(`Unsupported regular expression flags "${flags}": g and y are not allowed`);
  }
  const key = `${flags}/${pattern}`;
  let compiled = patternCache.get(key);
  if (!compiled) {
    compiled = new RegExp(pattern, flags);
    patternCache.set(key, compiled);
  }
  return compiled;
}
