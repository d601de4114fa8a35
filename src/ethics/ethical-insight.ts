import { randomUUID } from 'node:crypto';
import type { Logger } from '../types/logger.js';
import type { ReflectionRecord } from '../types/interaction.js';
import type { IResponseGenerator } from '../ports/response-generator.js';
import type { IMemoryStore } from '../ports/memory-store.js';
import type { IEthicsReviewer, EthicalVerdict } from './ethical-filter.js';

const MAX_RATIONALES = 5;

const INSIGHT_PROMPT = `You are reviewing your own recent conduct.
Given a summary of how your replies were judged, write a short first-person reflection:
what went well, what to watch for, and one concrete intention for the coming week.`;

const INSIGHT_QUESTION =
  'What do these reviews say about how I have been responding, and what should I keep in mind?';

/**
 * Ethical reflection: turns the ethics verdicts recorded since the last run
 * into a stored reflection of kind "ethical".
 */
export class EthicalInsight {
  private readonly reviewer: IEthicsReviewer;
  private readonly generator: IResponseGenerator;
  private readonly memory: IMemoryStore;
  private readonly logger: Logger;
  private lastRunAt: Date | null = null;

  constructor(
    reviewer: IEthicsReviewer,
    generator: IResponseGenerator,
    memory: IMemoryStore,
    logger: Logger
  ) {
    this.reviewer = reviewer;
    this.generator = generator;
    this.memory = memory;
    this.logger = logger.child({ component: 'ethical-insight' });
  }

  /**
   * @returns The stored reflection, or null when there was nothing new to reflect on
   */
  async reflect(now: Date = new Date()): Promise<ReflectionRecord | null> {
    const verdicts = this.reviewer.verdictsSince(this.lastRunAt);
    if (verdicts.length === 0) {
      this.logger.debug('No ethics verdicts since last reflection');
      this.lastRunAt = now;
      return null;
    }

    const summary = summarizeVerdicts(verdicts, this.reviewer.passThreshold);
    const text = await this.generator.generate(summary, INSIGHT_QUESTION, {
      systemPrompt: INSIGHT_PROMPT,
    });

    const record: ReflectionRecord = {
      id: randomUUID(),
      kind: 'ethical',
      createdAt: now,
      sourceInteractionIds: verdicts.flatMap((v) => (v.interactionId ? [v.interactionId] : [])),
      text: text.trim(),
    };
    await this.memory.storeReflection(record);
    this.lastRunAt = now;

    this.logger.info(
      { verdicts: verdicts.length, reflectionId: record.id },
      'Ethical reflection stored'
    );
    return record;
  }
}

/**
 * Plain-text summary of a set of verdicts.
 */
export function summarizeVerdicts(verdicts: EthicalVerdict[], passThreshold: number): string {
  const total = verdicts.reduce((sum, v) => sum + v.score, 0);
  const failed = verdicts.filter((v) => !v.passed);
  const lines = [
    `Reviewed ${String(verdicts.length)} replies.`,
    `Average score ${(total / verdicts.length).toFixed(2)}.`,
    `${String(failed.length)} scored below ${passThreshold.toFixed(2)}.`,
  ];

  const rationales = [
    ...new Set(failed.flatMap((v) => (v.rationale ? [v.rationale] : []))),
  ].slice(0, MAX_RATIONALES);
  if (rationales.length > 0) {
    lines.push('Concerns raised:');
    lines.push(...rationales.map((r) => `- ${r}`));
  }
  return lines.join('\n');
}
