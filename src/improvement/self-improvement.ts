/**
 * Self-Improvement
 *
 * Turns reflections into parameter experiments. A planned experiment names a
 * generation parameter and the direction to move it. Running it is a trial:
 * the new value goes live and the pipeline quality score is recorded as a
 * baseline. The next run concludes the trial. A trial that held or improved
 * quality above the threshold is kept and written to the change ledger;
 * anything else is rolled back.
 */

import { randomUUID } from 'node:crypto';
import type { Logger } from '../types/logger.js';
import type { ReflectionRecord } from '../types/interaction.js';
import type { ChangeLedger, ChangeRecord } from '../safety/change-ledger.js';
import {
  type GenerationParameter,
  type GenerationSettings,
  clampParameter,
  isGenerationParameter,
} from '../llm/generation-settings.js';
import { firstSentence, truncate } from '../utils/text.js';

export interface SelfImprovementConfig {
  /** Score an experiment must reach to count as a success */
  successThreshold: number;
  /** Planned experiments kept; oldest dropped first */
  maxPlanned: number;
}

/** How a parameter is moved from its current value */
export interface Adjustment {
  parameter: GenerationParameter;
  mode: 'scale' | 'offset';
  amount: number;
}

export interface Experiment {
  id: string;
  hypothesis: string;
  reflectionId: string;
  adjustment: Adjustment;
  plannedAt: Date;
}

export interface Trial {
  experiment: Experiment;
  previous: number;
  value: number;
  baseline: number;
  startedAt: Date;
}

export interface ExperimentResult {
  experimentId: string;
  hypothesis: string;
  parameter: GenerationParameter;
  previous: number;
  trialValue: number;
  /** Quality score when the trial ended */
  score: number;
  improvement: number;
  success: boolean;
  completedAt: Date;
}

const MAX_HYPOTHESIS_LENGTH = 160;
const MAX_RESULTS = 50;

const ADJUSTMENT_RULES: { pattern: RegExp; adjustment: Adjustment }[] = [
  {
    pattern: /\b(concise|shorter|brief|briefer|verbose|rambling|too long)\b/i,
    adjustment: { parameter: 'maxTokens', mode: 'scale', amount: 0.8 },
  },
  {
    pattern: /\b(detail|detailed|elaborate|expand|thorough|too short)\b/i,
    adjustment: { parameter: 'maxTokens', mode: 'scale', amount: 1.25 },
  },
  {
    pattern: /\b(creative|varied|variety|repetitive|monotonous)\b/i,
    adjustment: { parameter: 'temperature', mode: 'offset', amount: 0.1 },
  },
];

/** Lower temperature for more coherent replies */
const DEFAULT_ADJUSTMENT: Adjustment = { parameter: 'temperature', mode: 'offset', amount: -0.1 };

/**
 * Pick the parameter a reflection points at.
 */
export function chooseAdjustment(text: string): Adjustment {
  const rule = ADJUSTMENT_RULES.find((r) => r.pattern.test(text));
  return rule ? rule.adjustment : DEFAULT_ADJUSTMENT;
}

export function applyAdjustment(adjustment: Adjustment, current: number): number {
  const target =
    adjustment.mode === 'scale' ? current * adjustment.amount : current + adjustment.amount;
  return clampParameter(adjustment.parameter, target);
}

export class SelfImprovement {
  private readonly ledger: ChangeLedger;
  private readonly settings: GenerationSettings;
  private readonly measure: () => number;
  private readonly config: SelfImprovementConfig;
  private readonly logger: Logger;
  private readonly plannedExperiments: Experiment[] = [];
  private readonly completed: ExperimentResult[] = [];
  private trial: Trial | null = null;

  constructor(
    ledger: ChangeLedger,
    settings: GenerationSettings,
    measure: () => number,
    config: SelfImprovementConfig,
    logger: Logger
  ) {
    this.ledger = ledger;
    this.settings = settings;
    this.measure = measure;
    this.config = config;
    this.logger = logger.child({ component: 'self-improvement' });
  }

  /**
   * Re-apply the parameter changes the ledger still holds as active.
   * @returns Number of changes applied
   */
  async restore(): Promise<number> {
    let restored = 0;
    for (const change of await this.ledger.list('active')) {
      const parameterChange = change.parameterChange;
      if (!parameterChange || !isGenerationParameter(parameterChange.parameter)) continue;
      this.settings.set(parameterChange.parameter, parameterChange.to);
      restored++;
    }
    if (restored > 0) {
      this.logger.info({ restored, settings: this.settings.snapshot() }, 'Restored changes');
    }
    return restored;
  }

  /**
   * Plan an experiment from a reflection's leading observation.
   */
  designExperiment(reflection: ReflectionRecord, now: Date = new Date()): Experiment | null {
    const hypothesis = truncate(firstSentence(reflection.text), MAX_HYPOTHESIS_LENGTH);
    if (hypothesis.length === 0) return null;

    const experiment: Experiment = {
      id: randomUUID(),
      hypothesis,
      reflectionId: reflection.id,
      adjustment: chooseAdjustment(reflection.text),
      plannedAt: now,
    };
    this.plannedExperiments.push(experiment);
    if (this.plannedExperiments.length > this.config.maxPlanned) {
      this.plannedExperiments.shift();
    }

    this.logger.debug(
      { experimentId: experiment.id, hypothesis, parameter: experiment.adjustment.parameter },
      'Experiment planned'
    );
    return experiment;
  }

  /**
   * Conclude the running trial, or start the oldest planned experiment.
   * @returns The result when a trial concluded, otherwise null
   */
  async runNext(now: Date = new Date()): Promise<ExperimentResult | null> {
    if (this.trial) {
      return this.conclude(this.trial, now);
    }

    while (this.plannedExperiments.length > 0) {
      const experiment = this.plannedExperiments.shift();
      if (experiment && this.start(experiment, now)) break;
    }
    return null;
  }

  /**
   * Undo a quarantined change. A trial still running is abandoned first so
   * its rollback cannot bring the quarantined value back.
   */
  revert(change: ChangeRecord): boolean {
    const parameterChange = change.parameterChange;
    if (!parameterChange || !isGenerationParameter(parameterChange.parameter)) return false;

    if (this.trial) {
      this.settings.set(this.trial.experiment.adjustment.parameter, this.trial.previous);
      this.logger.info({ experimentId: this.trial.experiment.id }, 'Trial abandoned');
      this.trial = null;
    }

    this.settings.set(parameterChange.parameter, parameterChange.from);
    this.logger.warn(
      { changeId: change.id, parameter: parameterChange.parameter, value: parameterChange.from },
      'Change reverted'
    );
    return true;
  }

  planned(): readonly Experiment[] {
    return this.plannedExperiments;
  }

  running(): Trial | null {
    return this.trial;
  }

  results(): readonly ExperimentResult[] {
    return this.completed;
  }

  private start(experiment: Experiment, now: Date): boolean {
    const { parameter } = experiment.adjustment;
    const current = this.settings.get(parameter);
    const value = applyAdjustment(experiment.adjustment, current);
    if (value === current) {
      this.logger.debug({ experimentId: experiment.id, parameter }, 'Parameter at its limit');
      return false;
    }

    this.settings.set(parameter, value);
    this.trial = { experiment, previous: current, value, baseline: this.measure(), startedAt: now };
    this.logger.info(
      { experimentId: experiment.id, parameter, from: current, to: value },
      'Trial started'
    );
    return true;
  }

  private async conclude(trial: Trial, now: Date): Promise<ExperimentResult> {
    this.trial = null;
    const { experiment, previous, value, baseline } = trial;
    const { parameter } = experiment.adjustment;

    const score = this.measure();
    const improvement = score - baseline;
    const success = score >= this.config.successThreshold && improvement >= 0;

    const result: ExperimentResult = {
      experimentId: experiment.id,
      hypothesis: experiment.hypothesis,
      parameter,
      previous,
      trialValue: value,
      score,
      improvement,
      success,
      completedAt: now,
    };
    this.completed.push(result);
    if (this.completed.length > MAX_RESULTS) {
      this.completed.shift();
    }

    if (success) {
      try {
        await this.ledger.apply(
          'parameter',
          `${experiment.hypothesis} (${parameter} ${String(previous)} -> ${String(value)})`,
          now,
          { parameter, from: previous, to: value }
        );
      } catch (error) {
        // An unrecorded change could not be quarantined later
        this.settings.set(parameter, previous);
        throw error;
      }
    } else {
      this.settings.set(parameter, previous);
    }

    this.logger.info(
      { experimentId: experiment.id, parameter, score, improvement, success },
      success ? 'Experiment kept' : 'Experiment rolled back'
    );
    return result;
  }
}
