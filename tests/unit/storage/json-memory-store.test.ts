import { describe, it, expect, beforeEach } from 'vitest';
import { JsonMemoryStore, formatExchange } from '../../../src/storage/json-memory-store.js';
import { PersistenceFailure } from '../../../src/core/errors.js';
import type { Interaction, ReflectionRecord } from '../../../src/types/interaction.js';
import { InMemoryStorage, createMessage, createMockLogger } from '../../helpers/factories.js';

function createInteraction(
  id: string,
  query: string,
  reply: string,
  startedAt = new Date('2024-03-01T10:00:00Z')
): Interaction {
  return {
    id,
    message: createMessage(query),
    response: { text: reply, kind: 'generated' },
    trace: [
      'gate-pass',
      'context-empty',
      'generated',
      'persona-applied',
      'ethics-pass',
      'correction-pass',
    ],
    ethicsScore: 1,
    startedAt,
    completedAt: startedAt,
  };
}

function createReflection(id: string, text: string): ReflectionRecord {
  return {
    id,
    kind: 'interaction',
    createdAt: new Date('2024-03-01T12:00:00Z'),
    sourceInteractionIds: [],
    text,
  };
}

describe('JsonMemoryStore', () => {
  let storage: InMemoryStorage;
  let memory: JsonMemoryStore;

  beforeEach(() => {
    storage = new InMemoryStorage();
    memory = new JsonMemoryStore(storage, createMockLogger());
  });

  it('returns the most recent interactions first', async () => {
    await memory.storeInteraction(createInteraction('a', 'first', 'one'));
    await memory.storeInteraction(createInteraction('b', 'second', 'two'));
    await memory.storeInteraction(createInteraction('c', 'third', 'three'));

    const recent = await memory.retrieveLastInteractions(2);
    expect(recent.map((i) => i.id)).toEqual(['c', 'b']);
    expect(await memory.retrieveLastInteractions(0)).toEqual([]);
  });

  it('refuses to store the same interaction twice', async () => {
    const interaction = createInteraction('a', 'first', 'one');
    await memory.storeInteraction(interaction);

    await expect(memory.storeInteraction(interaction)).rejects.toThrow(
      'storeInteraction: Interaction a is already stored'
    );
    expect(await memory.countInteractions()).toBe(1);
  });

  it('wraps storage errors in PersistenceFailure', async () => {
    storage.failSaves = true;

    await expect(
      memory.storeInteraction(createInteraction('a', 'first', 'one'))
    ).rejects.toBeInstanceOf(PersistenceFailure);
  });

  it('keeps nothing from a write that failed', async () => {
    await memory.storeInteraction(createInteraction('a', 'first', 'one'));
    storage.failSaves = true;
    await expect(
      memory.storeInteraction(createInteraction('b', 'second', 'two'))
    ).rejects.toBeInstanceOf(PersistenceFailure);
    await expect(memory.storeReflection(createReflection('r1', 'Lost.'))).rejects.toBeInstanceOf(
      PersistenceFailure
    );

    expect((await memory.retrieveLastInteractions(5)).map((i) => i.id)).toEqual(['a']);
    expect(await memory.retrieveReflections('interaction', 5)).toEqual([]);

    storage.failSaves = false;
    await memory.storeInteraction(createInteraction('c', 'third', 'three'));
    const stored = storage.data.get('interactions');
    expect(Array.isArray(stored) ? stored.length : -1).toBe(2);

    await memory.storeInteraction(createInteraction('b', 'second', 'two'));
    expect(await memory.countInteractions()).toBe(3);
  });

  it('ranks context by query coverage and leaves out unrelated items', async () => {
    await memory.storeInteraction(
      createInteraction('rivers', 'tell me about rivers', 'Rivers flow to the sea.')
    );
    await memory.storeInteraction(createInteraction('cats', 'do cats purr', 'Yes, cats purr.'));
    await memory.storeReflection(createReflection('r1', 'People ask about rivers and lakes.'));

    const items = await memory.retrieveRelevantContext('rivers and lakes', 5);

    expect(items.map((i) => [i.source, i.refId, i.score])).toEqual([
      ['reflection', 'r1', 1],
      ['interaction', 'rivers', 0.5],
    ]);
  });

  it('caps relevance results at k', async () => {
    await memory.storeInteraction(createInteraction('a', 'rivers', 'x'));
    await memory.storeInteraction(createInteraction('b', 'rivers', 'y'));

    expect(await memory.retrieveRelevantContext('rivers', 1)).toHaveLength(1);
    expect(await memory.retrieveRelevantContext('rivers', 0)).toEqual([]);
  });

  it('drops the oldest interactions beyond the limit', async () => {
    const small = new JsonMemoryStore(storage, createMockLogger(), { maxInteractions: 2 });
    await small.storeInteraction(createInteraction('a', 'q', 'r'));
    await small.storeInteraction(createInteraction('b', 'q', 'r'));
    await small.storeInteraction(createInteraction('c', 'q', 'r'));

    expect((await small.retrieveLastInteractions(5)).map((i) => i.id)).toEqual(['c', 'b']);
  });

  it('filters reflections by kind', async () => {
    await memory.storeReflection(createReflection('r1', 'one'));
    await memory.storeReflection({ ...createReflection('e1', 'two'), kind: 'ethical' });

    expect((await memory.retrieveReflections('ethical', 5)).map((r) => r.id)).toEqual(['e1']);
  });

  it('reloads what was stored, with dates intact', async () => {
    await memory.storeInteraction(createInteraction('a', 'first', 'one'));
    await memory.storeReflection(createReflection('r1', 'noted'));

    const reloaded = new JsonMemoryStore(storage, createMockLogger());
    const [interaction] = await reloaded.retrieveLastInteractions(1);

    expect(interaction?.id).toBe('a');
    expect(interaction?.startedAt).toEqual(new Date('2024-03-01T10:00:00Z'));
    expect(await reloaded.retrieveReflections('interaction', 1)).toHaveLength(1);
  });

  it('skips invalid stored records', async () => {
    storage.data.set('interactions', [{ id: 'broken' }]);
    const logger = createMockLogger();
    const reloaded = new JsonMemoryStore(storage, logger);

    expect(await reloaded.countInteractions()).toBe(0);
    expect(logger.messages('warn')).toEqual(['Skipped invalid stored records']);
  });

  it('formats an exchange as two lines', () => {
    expect(formatExchange(createInteraction('a', 'hi', 'hello'))).toBe(
      'User: hi\nAssistant: hello'
    );
  });
});
