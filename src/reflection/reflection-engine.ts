/**
 * Reflection Engine
 *
 * Periodically looks back over the latest exchanges and writes a short
 * self-analysis, stored apart from ordinary interactions.
 */

import { randomUUID } from 'node:crypto';
import type { Logger } from '../types/logger.js';
import type { ReflectionRecord } from '../types/interaction.js';
import type { IMemoryStore } from '../ports/memory-store.js';
import type { IResponseGenerator } from '../ports/response-generator.js';

export interface ReflectionConfig {
  /** Interactions looked at per reflection */
  depth: number;
}

const REFLECTION_PROMPT = `You are reflecting on your own recent conversations.
Write a brief first-person analysis: recurring themes, what you did well,
and one thing you would do differently next time.`;

const REFLECTION_QUESTION = 'What do these recent interactions tell me about myself?';

export class ReflectionEngine {
  private readonly memory: IMemoryStore;
  private readonly generator: IResponseGenerator;
  private readonly config: ReflectionConfig;
  private readonly logger: Logger;

  constructor(
    memory: IMemoryStore,
    generator: IResponseGenerator,
    config: ReflectionConfig,
    logger: Logger
  ) {
    this.memory = memory;
    this.generator = generator;
    this.config = config;
    this.logger = logger.child({ component: 'reflection' });
  }

  /**
   * Reflect on the latest interactions.
   * @returns The stored reflection, or null when there is nothing to reflect on
   * @throws GenerationFailure, PersistenceFailure
   */
  async reflect(now: Date = new Date()): Promise<ReflectionRecord | null> {
    const recent = (await this.memory.retrieveLastInteractions(this.config.depth)).reverse();
    if (recent.length === 0) {
      this.logger.debug('No interactions to reflect on');
      return null;
    }

    const transcript = recent
      .map((interaction, i) => {
        const response = interaction.response?.text ?? '(no response)';
        return (
          `Interaction ${String(i + 1)}:\n` +
          `Query: ${interaction.message.text}\nResponse: ${response}`
        );
      })
      .join('\n\n');

    const text = await this.generator.generate(transcript, REFLECTION_QUESTION, {
      systemPrompt: REFLECTION_PROMPT,
    });

    const record: ReflectionRecord = {
      id: randomUUID(),
      kind: 'interaction',
      createdAt: now,
      sourceInteractionIds: recent.map((i) => i.id),
      text: text.trim(),
    };
    await this.memory.storeReflection(record);

    this.logger.info(
      { reflectionId: record.id, interactions: recent.length },
      'Reflection stored'
    );
    return record;
  }
}
