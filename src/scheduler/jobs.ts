/**
 * Background jobs, in the order the scheduler checks them.
 */

import type { Logger } from '../types/logger.js';
import type { IPersonaStore } from '../ports/persona-store.js';
import type { PersonaTransform } from '../persona/persona-transform.js';
import type { Explorer } from '../exploration/explorer.js';
import type { DiscoveryBuffer } from '../exploration/discovery-buffer.js';
import type { ConversationInitiator } from '../initiation/conversation-initiator.js';
import type { ReflectionEngine } from '../reflection/reflection-engine.js';
import type { SelfImprovement } from '../improvement/self-improvement.js';
import type { ExternalEvaluation } from '../evaluation/external-evaluation.js';
import type { IDevelopmentMonitor } from '../monitoring/development-monitor.js';
import type { IExternalValidator } from '../monitoring/external-validator.js';
import type { ChangeLedger } from '../safety/change-ledger.js';
import type { ISafetyGate } from '../safety/safety-gate.js';
import type { EthicalInsight } from '../ethics/ethical-insight.js';
import type { PeriodicJob } from './periodic-scheduler.js';

export const JOB_ORDER = [
  'exploration',
  'conversation-initiation',
  'persona-save',
  'discovery-processing',
  'reflection',
  'external-evaluation',
  'self-improvement',
  'monitoring',
  'ethical-reflection',
] as const;

export type JobName = (typeof JOB_ORDER)[number];

export interface JobSchedule {
  explorationIntervalMs: number;
  initiationIntervalMs: number;
  personaSaveIntervalMs: number;
  personaSaveChangeThreshold: number;
  discoveryBatchThreshold: number;
  reflectionEveryInteractions: number;
  evaluationIntervalMs: number;
  improvementIntervalMs: number;
  monitoringIntervalMs: number;
  ethicalReflectionIntervalMs: number;
}

export interface JobDeps {
  persona: PersonaTransform;
  personaStore: IPersonaStore;
  explorer: Explorer;
  buffer: DiscoveryBuffer;
  initiator: ConversationInitiator;
  reflection: ReflectionEngine;
  improvement: SelfImprovement;
  evaluation: ExternalEvaluation;
  monitor: IDevelopmentMonitor;
  validator: IExternalValidator;
  ledger: ChangeLedger;
  gate: ISafetyGate;
  ethicalInsight: EthicalInsight;
  /** Monotonic count of interactions that passed the gate */
  interactionCount: () => number;
  logger: Logger;
}

/** Discoveries folded into the persona per run */
const DISCOVERIES_PER_RUN = 3;

/**
 * Build the job list. Jobs throw on failure; the scheduler isolates them.
 */
export function createJobs(deps: JobDeps, schedule: JobSchedule): PeriodicJob[] {
  const logger = deps.logger.child({ component: 'jobs' });

  const jobs: Record<JobName, PeriodicJob> = {
    exploration: {
      name: 'exploration',
      trigger: { every: schedule.explorationIntervalMs },
      run: async () => {
        await deps.explorer.explore();
      },
    },

    'conversation-initiation': {
      name: 'conversation-initiation',
      trigger: { every: schedule.initiationIntervalMs },
      run: async (ctx) => {
        const result = await deps.initiator.maybeInitiate(ctx);
        if (result.status === 'skipped') {
          logger.debug({ reason: result.reason }, 'Conversation initiation skipped');
        }
      },
    },

    'persona-save': {
      name: 'persona-save',
      trigger: {
        every: schedule.personaSaveIntervalMs,
        afterEvents: {
          threshold: schedule.personaSaveChangeThreshold,
          count: () => deps.persona.getChangeCount(),
        },
      },
      run: async () => {
        await deps.personaStore.save(deps.persona.snapshot());
        logger.debug({ changes: deps.persona.getChangeCount() }, 'Persona saved');
      },
    },

    'discovery-processing': {
      name: 'discovery-processing',
      trigger: {
        afterEvents: {
          threshold: schedule.discoveryBatchThreshold,
          count: () => deps.buffer.getAddedCount(),
        },
      },
      run: () => {
        const discoveries = deps.buffer.takeUnprocessed(DISCOVERIES_PER_RUN);
        let changes = 0;
        for (const discovery of discoveries) {
          changes += deps.persona.absorbDiscovery(discovery).length;
        }
        logger.debug({ processed: discoveries.length, changes }, 'Discoveries absorbed');
        return Promise.resolve();
      },
    },

    reflection: {
      name: 'reflection',
      trigger: {
        afterEvents: {
          threshold: schedule.reflectionEveryInteractions,
          count: deps.interactionCount,
        },
      },
      run: async (ctx) => {
        const record = await deps.reflection.reflect(ctx.now);
        if (record) {
          deps.improvement.designExperiment(record, ctx.now);
        }
      },
    },

    'external-evaluation': {
      name: 'external-evaluation',
      trigger: { every: schedule.evaluationIntervalMs },
      run: async (ctx) => {
        const report = await deps.evaluation.run(ctx.now);
        if (report) {
          deps.persona.absorbEvaluation({
            criteria: report.criteria,
            confidence: report.confidence,
          });
        }
      },
    },

    'self-improvement': {
      name: 'self-improvement',
      trigger: { every: schedule.improvementIntervalMs },
      run: async (ctx) => {
        await deps.improvement.runNext(ctx.now);
      },
    },

    monitoring: {
      name: 'monitoring',
      trigger: { every: schedule.monitoringIntervalMs },
      run: async (ctx) => {
        const report = deps.monitor.runCycle(ctx.now);
        if (report.anomalies.length === 0) return;

        logger.warn({ report: deps.gate.report(ctx.now) }, 'Security report');

        const validation = await deps.validator.validate(ctx.now);
        if (validation.overallPass) {
          logger.info({ scores: validation.scores }, 'External validation passed');
          return;
        }

        const quarantined = await deps.ledger.quarantineLatestActive(
          `External validation failed: ${validation.failedMetrics.join(', ')}`,
          ctx.now
        );
        if (quarantined) {
          deps.improvement.revert(quarantined);
        }
        logger.warn(
          { failedMetrics: validation.failedMetrics, quarantined: quarantined?.id ?? null },
          'External validation failed'
        );
      },
    },

    'ethical-reflection': {
      name: 'ethical-reflection',
      trigger: { every: schedule.ethicalReflectionIntervalMs },
      run: async (ctx) => {
        await deps.ethicalInsight.reflect(ctx.now);
      },
    },
  };

  return JOB_ORDER.map((name) => jobs[name]);
}
