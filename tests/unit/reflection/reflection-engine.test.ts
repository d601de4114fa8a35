import { describe, it, expect, beforeEach } from 'vitest';
import { ReflectionEngine } from '../../../src/reflection/reflection-engine.js';
import { JsonMemoryStore } from '../../../src/storage/json-memory-store.js';
import { PersistenceFailure } from '../../../src/core/errors.js';
import type { Interaction } from '../../../src/types/interaction.js';
import {
  InMemoryStorage,
  ScriptedGenerator,
  createMessage,
  createMockLogger,
} from '../../helpers/factories.js';

function createInteraction(id: string, query: string, reply: string | null): Interaction {
  const startedAt = new Date('2024-03-01T10:00:00Z');
  return {
    id,
    message: createMessage(query),
    response: reply === null ? null : { text: reply, kind: 'generated' },
    trace: ['gate-pass'],
    ethicsScore: null,
    startedAt,
    completedAt: startedAt,
  };
}

describe('ReflectionEngine', () => {
  let storage: InMemoryStorage;
  let memory: JsonMemoryStore;
  let generator: ScriptedGenerator;
  let engine: ReflectionEngine;

  beforeEach(() => {
    storage = new InMemoryStorage();
    memory = new JsonMemoryStore(storage, createMockLogger());
    generator = new ScriptedGenerator([
      '  I keep explaining things at length. Next time: shorter.  ',
    ]);
    engine = new ReflectionEngine(memory, generator, { depth: 2 }, createMockLogger());
  });

  it('returns null without calling the generator when memory is empty', async () => {
    expect(await engine.reflect()).toBeNull();
    expect(generator.calls).toHaveLength(0);
  });

  it('reflects on the latest exchanges, oldest first', async () => {
    await memory.storeInteraction(createInteraction('a', 'first', 'one'));
    await memory.storeInteraction(createInteraction('b', 'second', 'two'));
    await memory.storeInteraction(createInteraction('c', 'third', null));
    const now = new Date('2024-03-02T08:00:00Z');

    const record = await engine.reflect(now);

    expect(generator.calls[0]?.context.split('\n')).toEqual([
      'Interaction 1:',
      'Query: second',
      'Response: two',
      '',
      'Interaction 2:',
      'Query: third',
      'Response: (no response)',
    ]);
    expect(generator.calls[0]?.query).toBe(
      'What do these recent interactions tell me about myself?'
    );
    expect(record).toMatchObject({
      kind: 'interaction',
      createdAt: now,
      sourceInteractionIds: ['b', 'c'],
      text: 'I keep explaining things at length. Next time: shorter.',
    });
    expect(await memory.retrieveReflections('interaction', 5)).toEqual([record]);
  });

  it('lets generation errors reach the caller', async () => {
    await memory.storeInteraction(createInteraction('a', 'first', 'one'));
    generator = new ScriptedGenerator([new Error('model unavailable')]);
    engine = new ReflectionEngine(memory, generator, { depth: 2 }, createMockLogger());

    await expect(engine.reflect()).rejects.toThrow('model unavailable');
    expect(await memory.retrieveReflections('interaction', 5)).toEqual([]);
  });

  it('reports a failed write as PersistenceFailure', async () => {
    await memory.storeInteraction(createInteraction('a', 'first', 'one'));
    storage.failSaves = true;

    await expect(engine.reflect()).rejects.toBeInstanceOf(PersistenceFailure);
  });
});
