/**
 * External Validator
 *
 * Probes the agent with fixed prompts and has an independent evaluator score
 * each reply on every validation metric. Validation passes only when every
 * metric's average reaches the threshold.
 */

import type { Logger } from '../types/logger.js';
import type { IEvaluator } from '../ports/evaluator.js';

export interface ValidationConfig {
  metrics: string[];
  probes: string[];
  /** Each metric's average must reach this */
  metricThreshold: number;
}

export interface ValidationReport {
  at: Date;
  scores: Record<string, number>;
  failedMetrics: string[];
  overallPass: boolean;
}

export interface IExternalValidator {
  validate(now?: Date): Promise<ValidationReport>;
}

/**
 * Produces the agent's reply to a probe.
 */
export type ProbeResponder = (probe: string) => Promise<string>;

export class ExternalValidator implements IExternalValidator {
  private readonly respond: ProbeResponder;
  private readonly evaluator: IEvaluator;
  private readonly config: ValidationConfig;
  private readonly logger: Logger;

  constructor(
    respond: ProbeResponder,
    evaluator: IEvaluator,
    config: ValidationConfig,
    logger: Logger
  ) {
    this.respond = respond;
    this.evaluator = evaluator;
    this.config = config;
    this.logger = logger.child({ component: 'validator' });
  }

  /**
   * Score every probe on every metric. A probe the agent cannot answer, or a
   * score the evaluator cannot give, counts as 0.
   */
  async validate(now: Date = new Date()): Promise<ValidationReport> {
    const totals: Record<string, number> = {};
    for (const metric of this.config.metrics) {
      totals[metric] = 0;
    }

    for (const probe of this.config.probes) {
      let reply: string | null;
      try {
        reply = await this.respond(probe);
      } catch (error) {
        this.logger.warn(
          { probe, error: error instanceof Error ? error.message : String(error) },
          'Probe got no reply'
        );
        reply = null;
      }
      if (reply === null) continue;

      for (const metric of this.config.metrics) {
        totals[metric] = (totals[metric] ?? 0) + (await this.scoreOne(reply, probe, metric));
      }
    }

    const probeCount = Math.max(1, this.config.probes.length);
    const scores: Record<string, number> = {};
    const failedMetrics: string[] = [];
    for (const metric of this.config.metrics) {
      const score = (totals[metric] ?? 0) / probeCount;
      scores[metric] = score;
      if (score < this.config.metricThreshold) failedMetrics.push(metric);
    }

    const report: ValidationReport = {
      at: now,
      scores,
      failedMetrics,
      overallPass: failedMetrics.length === 0,
    };
    this.logger.info({ scores, overallPass: report.overallPass }, 'Validation complete');
    return report;
  }

  private async scoreOne(reply: string, probe: string, metric: string): Promise<number> {
    try {
      const result = await this.evaluator.score(reply, { query: probe, criterion: metric });
      return Number.isFinite(result.score) ? Math.min(1, Math.max(0, result.score)) : 0;
    } catch (error) {
      this.logger.warn(
        { metric, error: error instanceof Error ? error.message : String(error) },
        'Validation scoring failed'
      );
      return 0;
    }
  }
}

/**
 * Validator used when validation is disabled: always passes.
 */
export class DisabledExternalValidator implements IExternalValidator {
  validate(now: Date = new Date()): Promise<ValidationReport> {
    return Promise.resolve({ at: now, scores: {}, failedMetrics: [], overallPass: true });
  }
}
