/**
 * Evaluation module exports.
 */

export type { TestCase, EvaluationConfig, EvaluationReport } from './external-evaluation.js';
export { ExternalEvaluation } from './external-evaluation.js';
