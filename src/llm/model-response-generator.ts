/**
 * Model Response Generator
 *
 * Response generator backed by an LLM provider. The system prompt is the
 * persona description unless the caller supplies its own; context and
 * regeneration guidance are appended to it.
 */

import type { Logger } from '../types/logger.js';
import type { IResponseGenerator, GenerateOptions } from '../ports/response-generator.js';
import type { LLMProvider, Message } from './provider.js';
import { LLMError } from './provider.js';
import { GenerationFailure } from '../core/errors.js';
import { GenerationSettings } from './generation-settings.js';

export class ModelResponseGenerator implements IResponseGenerator {
  private readonly provider: LLMProvider;
  private readonly personaPrompt: () => string;
  private readonly logger: Logger;
  private readonly settings: GenerationSettings;

  constructor(
    provider: LLMProvider,
    personaPrompt: () => string,
    logger: Logger,
    settings: GenerationSettings = new GenerationSettings()
  ) {
    this.provider = provider;
    this.personaPrompt = personaPrompt;
    this.logger = logger.child({ component: 'generator' });
    this.settings = settings;
  }

  async generate(context: string, query: string, options: GenerateOptions = {}): Promise<string> {
    const messages = buildMessages(
      options.systemPrompt ?? this.personaPrompt(),
      context,
      query,
      options.guidance
    );

    let content: string | null;
    try {
      const response = await this.provider.complete({
        messages,
        temperature: this.settings.get('temperature'),
        maxTokens: this.settings.get('maxTokens'),
      });
      content = response.content;
    } catch (error) {
      throw new GenerationFailure(error instanceof Error ? error.message : String(error), {
        cause: error,
        retryable: error instanceof LLMError && error.retryable,
      });
    }

    const text = content?.trim() ?? '';
    if (text.length === 0) {
      this.logger.warn('Model returned an empty reply');
      throw new GenerationFailure('Model returned an empty reply');
    }
    return text;
  }
}

/**
 * System prompt (with context and guidance appended) plus the user query.
 */
export function buildMessages(
  systemPrompt: string,
  context: string,
  query: string,
  guidance?: string
): Message[] {
  const sections = [systemPrompt];
  if (context.trim().length > 0) {
    sections.push(`Context:\n${context}`);
  }
  if (guidance !== undefined) {
    sections.push(`Your previous reply was rejected. Guidance for this attempt: ${guidance}`);
  }

  return [
    { role: 'system', content: sections.join('\n\n') },
    { role: 'user', content: query },
  ];
}
