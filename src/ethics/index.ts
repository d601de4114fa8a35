/**
 * Ethics module exports.
 */

export type { CategoryMatch, KeywordCategoryScore } from './keyword-categories.js';
export { scoreKeywordCategories, describeMatches, SEVERITY_PENALTY } from './keyword-categories.js';
export { KeywordEthicalEvaluator } from './keyword-evaluator.js';
export { HeuristicEvaluator } from './heuristic-evaluator.js';
export { ModelJudgeEvaluator, FallbackEvaluator, parseVerdict } from './model-judge-evaluator.js';
export type {
  EthicalVerdict,
  ReviewRequest,
  IEthicsReviewer,
  EthicalFilterConfig,
} from './ethical-filter.js';
export { EthicalFilter, PassThroughEthicalFilter } from './ethical-filter.js';
export { EthicalInsight, summarizeVerdicts } from './ethical-insight.js';
