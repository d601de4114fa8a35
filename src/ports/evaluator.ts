/**
 * Evaluator Port
 *
 * Scores a response. Used for ethical review, external evaluation and
 * external validation.
 */

export interface EvaluationContext {
  /** The message the response answers */
  query: string;
  /** What is being judged (e.g. "ethics", "accuracy"); evaluators may ignore it */
  criterion?: string;
  /** Reference answer, when one exists */
  expected?: string;
}

export interface EvaluationScore {
  /** 0-1 */
  score: number;
  rationale?: string;
}

export interface IEvaluator {
  /** Evaluator identifier for logs */
  readonly name: string;

  score(response: string, context: EvaluationContext): Promise<EvaluationScore>;
}
