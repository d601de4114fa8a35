import type { IEvaluator, EvaluationContext, EvaluationScore } from '../ports/evaluator.js';
import { textSimilarity } from '../utils/text.js';

/** Responses shorter than this (trimmed) count as thin */
const SUBSTANCE_LENGTH = 20;

/**
 * Local stand-in for a judge model: rewards overlap with the query (or the
 * expected answer, when there is one) and a response of some substance.
 */
export class HeuristicEvaluator implements IEvaluator {
  readonly name = 'heuristic';

  score(response: string, context: EvaluationContext): Promise<EvaluationScore> {
    const target = context.expected ?? context.query;
    const overlap = Math.min(1, 0.4 + textSimilarity(target, response));
    const substance = response.trim().length >= SUBSTANCE_LENGTH ? 1 : 0.4;
    const score = (overlap + substance) / 2;

    return Promise.resolve({
      score,
      rationale: `overlap ${overlap.toFixed(2)}, substance ${substance.toFixed(2)}`,
    });
  }
}
