import type { KeywordCategory } from '../config/config-schema.js';
import { matchKeywords } from '../utils/text.js';

/**
 * Score penalty per matched category, by severity.
 */
export const SEVERITY_PENALTY: Record<KeywordCategory['severity'], number> = {
  high: 0.3,
  medium: 0.1,
};

export interface CategoryMatch {
  category: string;
  severity: KeywordCategory['severity'];
  keywords: string[];
}

export interface KeywordCategoryScore {
  /** 1 minus the penalties of every matched category, clamped to [0, 1] */
  score: number;
  matches: CategoryMatch[];
}

/**
 * Score text against keyword categories. Each category counts once however
 * many of its keywords appear.
 */
export function scoreKeywordCategories(
  text: string,
  categories: Record<string, KeywordCategory>
): KeywordCategoryScore {
  const matches: CategoryMatch[] = [];
  let score = 1;

  for (const [category, { severity, keywords }] of Object.entries(categories)) {
    const found = matchKeywords(text, keywords);
    if (found.length > 0) {
      matches.push({ category, severity, keywords: found });
      score -= SEVERITY_PENALTY[severity];
    }
  }

  return { score: Math.min(1, Math.max(0, score)), matches };
}

/**
 * One-line rationale naming the matched categories.
 */
export function describeMatches(matches: CategoryMatch[]): string {
  if (matches.length === 0) return 'No concerns found';
  return matches
    .map((m) => `${m.category.replace(/_/g, ' ')} (${m.keywords.join(', ')})`)
    .join('; ');
}
