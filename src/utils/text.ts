/**
 * Text utilities: token overlap scoring, keyword matching and trimming.
 */

const STOPWORDS = new Set([
  'a', 'an', 'and', 'are', 'as', 'at', 'be', 'but', 'by', 'for', 'i', 'in', 'is', 'it',
  'me', 'my', 'of', 'on', 'or', 'so', 'that', 'the', 'this', 'to', 'was', 'we', 'you',
]);

/**
 * Tokenize text into lowercase words, split on whitespace and punctuation.
 */
export function tokenize(text: string): Set<string> {
  return new Set(
    text
      .toLowerCase()
      .split(/[\s\p{P}]+/u)
      .filter((word) => word.length > 0)
  );
}

/**
 * Tokens with common function words removed.
 */
export function contentTokens(text: string): Set<string> {
  const tokens = tokenize(text);
  for (const word of STOPWORDS) {
    tokens.delete(word);
  }
  return tokens;
}

function intersectionSize(setA: Set<string>, setB: Set<string>): number {
  const [smaller, larger] = setA.size <= setB.size ? [setA, setB] : [setB, setA];
  let count = 0;
  for (const word of smaller) {
    if (larger.has(word)) count++;
  }
  return count;
}

/**
 * Jaccard index |A ∩ B| / |A ∪ B|. Two empty sets are identical.
 */
export function jaccardSimilarity(setA: Set<string>, setB: Set<string>): number {
  if (setA.size === 0 && setB.size === 0) return 1;
  if (setA.size === 0 || setB.size === 0) return 0;
  const shared = intersectionSize(setA, setB);
  return shared / (setA.size + setB.size - shared);
}

/**
 * Jaccard similarity of two texts' word sets.
 */
export function textSimilarity(textA: string, textB: string): number {
  return jaccardSimilarity(tokenize(textA), tokenize(textB));
}

/**
 * Share of the query's content words that appear in the document, 0-1.
 * Used as the relevance score for memory lookups.
 */
export function queryCoverage(query: string, document: string): number {
  const queryTokens = contentTokens(query);
  if (queryTokens.size === 0) return 0;
  return intersectionSize(queryTokens, contentTokens(document)) / queryTokens.size;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Whole-word, case-insensitive keyword match. Multi-word keywords match as a phrase.
 */
export function containsKeyword(text: string, keyword: string): boolean {
  const boundary = '[^\\p{L}\\p{N}]';
  const pattern = new RegExp(`(^|${boundary})${escapeRegExp(keyword)}($|${boundary})`, 'iu');
  return pattern.test(text);
}

/**
 * Keywords from the list that occur in the text.
 */
export function matchKeywords(text: string, keywords: readonly string[]): string[] {
  return keywords.filter((keyword) => containsKeyword(text, keyword));
}

/**
 * Cut text to maxLength characters, ending with an ellipsis when shortened.
 */
export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  return text.slice(0, Math.max(0, maxLength - 3)) + '...';
}

/**
 * First sentence of a text (up to and including its terminator), trimmed.
 */
export function firstSentence(text: string): string {
  const match = /^[\s\S]*?[.!?](?=\s|$)/.exec(text.trim());
  return (match ? match[0] : text).trim();
}
