/**
 * External Evaluation
 *
 * Runs a fixed set of test cases through the agent and scores the replies on
 * each criterion. The report says whether the overall score meets the pass
 * score and suggests where to improve.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { Logger } from '../types/logger.js';
import type { Storage } from '../storage/storage.js';
import type { IEvaluator } from '../ports/evaluator.js';
import type { ProbeResponder } from '../monitoring/external-validator.js';
import { isNotFound } from '../utils/errno.js';

const testCaseSchema = z.object({
  id: z.string().min(1),
  prompt: z.string().min(1),
  expected: z.string().optional(),
  category: z.string().optional(),
});

const testCaseFileSchema = z.object({
  cases: z.array(testCaseSchema),
});

export type TestCase = z.infer<typeof testCaseSchema>;

export interface EvaluationConfig {
  testCasesFile: string;
  criteria: string[];
  /** Overall score needed to meet the threshold */
  passScore: number;
  /** Confidence attached to the report's trait feedback */
  confidence: number;
  /** Reports kept in storage */
  historyLimit: number;
}

export interface EvaluationReport {
  at: Date;
  caseCount: number;
  /** Criterion → average score over all cases */
  criteria: Record<string, number>;
  overall: number;
  meetsThreshold: boolean;
  suggestions: string[];
  confidence: number;
}

const SUGGESTIONS: Record<string, string> = {
  accuracy: 'Double-check facts before stating them.',
  coherence: 'Keep replies organised around a single line of thought.',
  relevance: 'Answer the question that was asked before adding anything else.',
  knowledge: 'Explore more widely to broaden background knowledge.',
  helpfulness: 'Close replies with something the user can act on.',
};

const HISTORY_KEY = 'evaluations';

export class ExternalEvaluation {
  private readonly respond: ProbeResponder;
  private readonly evaluator: IEvaluator;
  private readonly storage: Storage;
  private readonly config: EvaluationConfig;
  private readonly logger: Logger;

  constructor(
    respond: ProbeResponder,
    evaluator: IEvaluator,
    storage: Storage,
    config: EvaluationConfig,
    logger: Logger
  ) {
    this.respond = respond;
    this.evaluator = evaluator;
    this.storage = storage;
    this.config = config;
    this.logger = logger.child({ component: 'evaluation' });
  }

  /**
   * Read the test case file. A missing file means no cases.
   * @throws Error when the file exists but is not valid
   */
  async loadTestCases(): Promise<TestCase[]> {
    let content: string;
    try {
      content = await readFile(this.config.testCasesFile, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        this.logger.warn({ file: this.config.testCasesFile }, 'Test case file not found');
        return [];
      }
      throw error;
    }

    const parsed = testCaseFileSchema.safeParse(JSON.parse(content));
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new Error(`Test case file ${this.config.testCasesFile} is invalid: ${issues}`);
    }
    return parsed.data.cases;
  }

  /**
   * Evaluate the agent on every test case.
   * @returns The report, or null when there are no test cases
   */
  async run(now: Date = new Date(), cases?: TestCase[]): Promise<EvaluationReport | null> {
    const testCases = cases ?? (await this.loadTestCases());
    if (testCases.length === 0) return null;

    const totals: Record<string, number> = {};
    for (const criterion of this.config.criteria) {
      totals[criterion] = 0;
    }

    for (const testCase of testCases) {
      let reply: string;
      try {
        reply = await this.respond(testCase.prompt);
      } catch (error) {
        this.logger.warn(
          { caseId: testCase.id, error: error instanceof Error ? error.message : String(error) },
          'Test case got no reply'
        );
        continue;
      }

      for (const criterion of this.config.criteria) {
        const score = await this.scoreOne(reply, testCase, criterion);
        totals[criterion] = (totals[criterion] ?? 0) + score;
      }
    }

    const criteria: Record<string, number> = {};
    for (const criterion of this.config.criteria) {
      criteria[criterion] = (totals[criterion] ?? 0) / testCases.length;
    }
    const values = Object.values(criteria);
    const overall =
      values.length === 0 ? 0 : values.reduce((sum, v) => sum + v, 0) / values.length;

    const report: EvaluationReport = {
      at: now,
      caseCount: testCases.length,
      criteria,
      overall,
      meetsThreshold: overall >= this.config.passScore,
      suggestions: this.config.criteria
        .filter((c) => (criteria[c] ?? 0) < this.config.passScore)
        .map((c) => SUGGESTIONS[c] ?? `Work on ${c}.`),
      confidence: this.config.confidence,
    };

    await this.remember(report);
    this.logger.info(
      { overall: report.overall, meetsThreshold: report.meetsThreshold, cases: testCases.length },
      'Evaluation complete'
    );
    return report;
  }

  private async scoreOne(reply: string, testCase: TestCase, criterion: string): Promise<number> {
    try {
      const context =
        testCase.expected === undefined
          ? { query: testCase.prompt, criterion }
          : { query: testCase.prompt, criterion, expected: testCase.expected };
      const result = await this.evaluator.score(reply, context);
      return Number.isFinite(result.score) ? Math.min(1, Math.max(0, result.score)) : 0;
    } catch (error) {
      this.logger.warn(
        {
          caseId: testCase.id,
          criterion,
          error: error instanceof Error ? error.message : String(error),
        },
        'Scoring failed'
      );
      return 0;
    }
  }

  private async remember(report: EvaluationReport): Promise<void> {
    const stored = await this.storage.load(HISTORY_KEY);
    const history = Array.isArray(stored) ? stored : [];
    const next = [...history, report].slice(-this.config.historyLimit);
    await this.storage.save(HISTORY_KEY, next);
  }
}
