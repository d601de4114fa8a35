/**
 * Correction Mechanism
 *
 * Mandatory final gate for every outbound text. Re-checks safety on its own
 * terms whatever upstream stages decided, and swaps unsafe text for a fixed
 * message that carries none of the original content.
 */

import type { Logger } from '../types/logger.js';
import type { KeywordCategory } from '../config/config-schema.js';
import { BlockedPatterns } from './blocked-patterns.js';
import { EthicalViolation, SafetyViolation } from '../core/errors.js';
import { scoreKeywordCategories, describeMatches } from '../ethics/keyword-categories.js';

export interface CorrectionConfig {
  /** Texts scoring below this are replaced */
  threshold: number;
  replacementMessage: string;
  /** Deterministic text used when no candidate could be produced */
  fallbackResponse: string;
  /** Corrections kept in history */
  historyLimit: number;
  categories: Record<string, KeywordCategory>;
  /** Checked whether or not the input gate is enabled */
  blockedPatterns: readonly string[];
}

export interface CorrectionResult {
  text: string;
  replaced: boolean;
  violation: SafetyViolation | null;
  /** Keyword safety score of the reviewed text */
  score: number;
}

export interface CorrectionRecord {
  at: Date;
  detail: string;
  score: number;
}

export interface ReviewOptions {
  /** Upstream flag: the ethical filter gave up on this candidate */
  flagged?: EthicalViolation | null;
}

export class CorrectionMechanism {
  private readonly config: CorrectionConfig;
  private readonly patterns: BlockedPatterns;
  private readonly logger: Logger;
  private readonly history: CorrectionRecord[] = [];

  constructor(config: CorrectionConfig, logger: Logger) {
    this.config = config;
    this.patterns = new BlockedPatterns(config.blockedPatterns, 'correction');
    this.logger = logger.child({ component: 'correction' });
  }

  get fallbackResponse(): string {
    return this.config.fallbackResponse;
  }

  get replacementMessage(): string {
    return this.config.replacementMessage;
  }

  /**
   * Review a candidate. Never throws.
   */
  review(text: string, options: ReviewOptions = {}): CorrectionResult {
    const { score, matches } = scoreKeywordCategories(text, this.config.categories);

    let detail: string | null = null;
    if (options.flagged) {
      detail = `flagged upstream: ${options.flagged.message}`;
    } else {
      const pattern = this.patterns.match(text);
      if (pattern !== null) {
        detail = `output matched blocked pattern ${pattern}`;
      } else if (score < this.config.threshold) {
        detail = `safety score ${score.toFixed(2)}: ${describeMatches(matches)}`;
      }
    }

    if (detail === null) {
      return { text, replaced: false, violation: null, score };
    }

    const violation = new SafetyViolation(detail);
    this.history.push({ at: new Date(), detail, score });
    if (this.history.length > this.config.historyLimit) {
      this.history.shift();
    }
    this.logger.warn({ detail, score }, 'Response replaced');

    return { text: this.config.replacementMessage, replaced: true, violation, score };
  }

  getHistory(): readonly CorrectionRecord[] {
    return this.history;
  }
}
