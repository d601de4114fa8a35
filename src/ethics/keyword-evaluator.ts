import type { KeywordCategory } from '../config/config-schema.js';
import type { IEvaluator, EvaluationScore } from '../ports/evaluator.js';
import { scoreKeywordCategories, describeMatches } from './keyword-categories.js';

/**
 * Scores a response by the severity of the keyword categories it touches.
 * No model involved, so it never fails.
 */
export class KeywordEthicalEvaluator implements IEvaluator {
  readonly name = 'keyword';
  private readonly categories: Record<string, KeywordCategory>;

  constructor(categories: Record<string, KeywordCategory>) {
    this.categories = categories;
  }

  score(response: string): Promise<EvaluationScore> {
    const { score, matches } = scoreKeywordCategories(response, this.categories);
    if (matches.length === 0) {
      return Promise.resolve({ score });
    }
    return Promise.resolve({
      score,
      rationale: `Avoid touching on ${describeMatches(matches)}`,
    });
  }
}
