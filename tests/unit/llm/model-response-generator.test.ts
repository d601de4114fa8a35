import { describe, it, expect, vi } from 'vitest';
import {
  ModelResponseGenerator,
  buildMessages,
} from '../../../src/llm/model-response-generator.js';
import { LLMError, type CompletionRequest, type LLMProvider } from '../../../src/llm/provider.js';
import { GenerationFailure } from '../../../src/core/errors.js';
import { GenerationSettings } from '../../../src/llm/generation-settings.js';
import { createMockLogger } from '../../helpers/factories.js';

function fakeProvider(content: string | null | Error) {
  const complete = vi.fn((_request: CompletionRequest) =>
    content instanceof Error
      ? Promise.reject(content)
      : Promise.resolve({ content, model: 'local-model' })
  );
  const provider: LLMProvider = { name: 'fake', isAvailable: () => true, complete };
  return { provider, complete };
}

function createGenerator(provider: LLMProvider): ModelResponseGenerator {
  return new ModelResponseGenerator(provider, () => 'You are Aria.', createMockLogger());
}

describe('buildMessages', () => {
  it('appends context and guidance to the system prompt', () => {
    expect(buildMessages('You are Aria.', 'User: hi', 'How are you?', 'Be kinder.')).toEqual([
      {
        role: 'system',
        content:
          'You are Aria.\n\nContext:\nUser: hi\n\n' +
          'Your previous reply was rejected. Guidance for this attempt: Be kinder.',
      },
      { role: 'user', content: 'How are you?' },
    ]);
  });

  it('leaves out blank context', () => {
    expect(buildMessages('You are Aria.', '  ', 'Hi')[0]).toEqual({
      role: 'system',
      content: 'You are Aria.',
    });
  });
});

describe('ModelResponseGenerator', () => {
  it('uses the persona prompt and trims the reply', async () => {
    const { provider, complete } = fakeProvider('  Doing well, thanks!  ');
    const generator = new ModelResponseGenerator(
      provider,
      () => 'You are Aria.',
      createMockLogger(),
      new GenerationSettings({ temperature: 0.2, maxTokens: 100 })
    );

    expect(await generator.generate('', 'How are you?')).toBe('Doing well, thanks!');
    expect(complete).toHaveBeenCalledWith({
      messages: [
        { role: 'system', content: 'You are Aria.' },
        { role: 'user', content: 'How are you?' },
      ],
      temperature: 0.2,
      maxTokens: 100,
    });
  });

  it('reads the shared settings on every call', async () => {
    const { provider, complete } = fakeProvider('Sure.');
    const settings = new GenerationSettings();
    const generator = new ModelResponseGenerator(
      provider,
      () => 'You are Aria.',
      createMockLogger(),
      settings
    );

    await generator.generate('', 'First');
    expect(settings.set('temperature', 0.5)).toBe(0.7);
    await generator.generate('', 'Second');

    expect(complete.mock.calls.map((call) => call[0].temperature)).toEqual([0.7, 0.5]);
    expect(complete.mock.calls[1]?.[0].maxTokens).toBe(600);
  });

  it('lets the caller replace the system prompt', async () => {
    const { provider, complete } = fakeProvider('{"score": 1}');
    const generator = createGenerator(provider);

    await generator.generate('', 'Rate this', { systemPrompt: 'You are a strict reviewer.' });

    expect(complete.mock.calls[0]?.[0].messages[0]?.content).toBe('You are a strict reviewer.');
  });

  it('fails on an empty reply', async () => {
    const { provider } = fakeProvider('   ');
    const generator = createGenerator(provider);

    await expect(generator.generate('', 'Hi')).rejects.toThrow(
      new GenerationFailure('Model returned an empty reply')
    );
  });

  it('fails on a missing reply', async () => {
    const { provider } = fakeProvider(null);
    const generator = createGenerator(provider);

    await expect(generator.generate('', 'Hi')).rejects.toBeInstanceOf(GenerationFailure);
  });

  it('wraps provider errors and keeps their retryability', async () => {
    const { provider } = fakeProvider(
      new LLMError('Request timed out', 'fake', { retryable: true })
    );
    const generator = createGenerator(provider);

    const error: unknown = await generator.generate('', 'Hi').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(GenerationFailure);
    expect(error instanceof GenerationFailure ? [error.message, error.retryable] : []).toEqual([
      'Request timed out',
      true,
    ]);
  });
});

describe('GenerationSettings', () => {
  it('clamps values to their bounds', () => {
    const settings = new GenerationSettings();

    settings.set('temperature', 3);
    settings.set('maxTokens', 10.4);

    expect(settings.snapshot()).toEqual({ temperature: 1.5, maxTokens: 100 });
  });

  it('rounds temperature to two decimals', () => {
    const settings = new GenerationSettings();

    settings.set('temperature', 0.7 - 0.1);

    expect(settings.get('temperature')).toBe(0.6);
  });
});
