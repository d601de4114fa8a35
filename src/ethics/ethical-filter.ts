/**
 * Ethical Filter
 *
 * Scores a persona-voiced candidate. The pipeline decides what to do with a
 * failing verdict (one regeneration, then flag); the filter only judges and
 * keeps a bounded log of its verdicts for periodic ethical reflection.
 */

import type { Logger } from '../types/logger.js';
import type { IEvaluator } from '../ports/evaluator.js';

export interface EthicalVerdict {
  score: number;
  passed: boolean;
  rationale?: string;
  interactionId?: string;
  at: Date;
}

export interface ReviewRequest {
  query: string;
  interactionId?: string;
}

/**
 * IEthicsReviewer - pass/fail judgement on a candidate response.
 */
export interface IEthicsReviewer {
  readonly passThreshold: number;

  review(response: string, request: ReviewRequest): Promise<EthicalVerdict>;

  /**
   * Verdicts recorded at or after `since`, oldest first.
   */
  verdictsSince(since: Date | null): EthicalVerdict[];
}

export interface EthicalFilterConfig {
  /** Scores at or above this pass */
  passThreshold: number;
  /** Verdicts kept for reflection */
  historyLimit: number;
}

const DEFAULT_CONFIG: EthicalFilterConfig = {
  passThreshold: 0.8,
  historyLimit: 500,
};

export class EthicalFilter implements IEthicsReviewer {
  private readonly evaluator: IEvaluator;
  private readonly logger: Logger;
  private readonly config: EthicalFilterConfig;
  private readonly verdicts: EthicalVerdict[] = [];

  constructor(evaluator: IEvaluator, logger: Logger, config: Partial<EthicalFilterConfig> = {}) {
    this.evaluator = evaluator;
    this.logger = logger.child({ component: 'ethical-filter' });
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  get passThreshold(): number {
    return this.config.passThreshold;
  }

  /**
   * Judge a candidate. An evaluator error is a failing verdict, not an exception.
   */
  async review(response: string, request: ReviewRequest): Promise<EthicalVerdict> {
    let score: number;
    let rationale: string | undefined;

    try {
      const result = await this.evaluator.score(response, {
        query: request.query,
        criterion: 'ethics',
      });
      score = Number.isFinite(result.score) ? Math.min(1, Math.max(0, result.score)) : 0;
      rationale = result.rationale;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(
        { evaluator: this.evaluator.name, error: message },
        'Ethics evaluation failed'
      );
      score = 0;
      rationale = `Evaluation unavailable: ${message}`;
    }

    const verdict: EthicalVerdict = {
      score,
      passed: score >= this.config.passThreshold,
      at: new Date(),
    };
    if (rationale !== undefined) verdict.rationale = rationale;
    if (request.interactionId !== undefined) verdict.interactionId = request.interactionId;

    this.verdicts.push(verdict);
    if (this.verdicts.length > this.config.historyLimit) {
      this.verdicts.shift();
    }

    this.logger.debug({ score, passed: verdict.passed }, 'Ethics verdict');
    return verdict;
  }

  verdictsSince(since: Date | null): EthicalVerdict[] {
    if (since === null) return [...this.verdicts];
    return this.verdicts.filter((v) => v.at.getTime() >= since.getTime());
  }
}

/**
 * Reviewer used when the ethics stage is disabled: every candidate passes.
 */
export class PassThroughEthicalFilter implements IEthicsReviewer {
  readonly passThreshold = 0;

  review(_response: string, request: ReviewRequest): Promise<EthicalVerdict> {
    const verdict: EthicalVerdict = { score: 1, passed: true, at: new Date() };
    if (request.interactionId !== undefined) verdict.interactionId = request.interactionId;
    return Promise.resolve(verdict);
  }

  verdictsSince(_since: Date | null): EthicalVerdict[] {
    return [];
  }
}
