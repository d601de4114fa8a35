/**
 * Full container runs against a temporary data directory: one exchange,
 * shutdown, then a restart that picks up what was saved.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createContainer, type ContainerOptions } from '../../src/core/container.js';
import { FatalStartupFailure } from '../../src/core/errors.js';
import {
  InMemoryTransport,
  ScriptedGenerator,
  StaticDiscoverySource,
  createMessage,
  createMockLogger,
} from '../helpers/factories.js';

async function readJson(path: string): Promise<unknown> {
  const value: unknown = JSON.parse(await readFile(path, 'utf-8'));
  return value;
}

describe('Agent lifecycle', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'agent-lifecycle-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function options(transport: InMemoryTransport, replies: string[] = []): ContainerOptions {
    return {
      env: { DATA_PATH: dir },
      logger: createMockLogger(),
      transport,
      generator: new ScriptedGenerator(replies),
      discoverySource: new StaticDiscoverySource(),
      random: () => 0,
    };
  }

  it('answers, persists on shutdown and restores on restart', async () => {
    const transport = new InMemoryTransport();
    const container = await createContainer(options(transport, ['Rivers carve valleys.']));

    transport.push(createMessage('tell me about rivers'));
    const report = await container.orchestrator.runTick();
    await container.shutdown();

    expect(report.processed).toBe(1);
    expect(transport.sent).toEqual([{ senderId: 'user-1', text: 'Rivers carve valleys.' }]);
    expect(transport.closed).toBe(1);

    const state = join(dir, 'state');
    expect(await readJson(join(state, 'persona.json'))).toMatchObject({
      version: 1,
      persona: { name: 'Aria' },
    });
    expect(await readJson(join(state, 'status.json'))).toMatchObject({
      state: 'shutting-down',
      tickCount: 1,
      processedInteractions: 1,
      activeSenders: ['user-1'],
    });

    const restarted = await createContainer(options(new InMemoryTransport()));
    const stored = await restarted.memory.retrieveLastInteractions(10);
    await restarted.shutdown();

    expect(stored.map((i) => [i.message.text, i.response?.text])).toEqual([
      ['tell me about rivers', 'Rivers carve valleys.'],
    ]);
    expect(stored[0]?.message.receivedAt).toEqual(new Date('2024-03-01T10:00:00Z'));
  });

  it('stops when an admin sends the shutdown command', async () => {
    const transport = new InMemoryTransport();
    const container = await createContainer({
      ...options(transport),
      env: { DATA_PATH: dir, ADMIN_SENDERS: 'console' },
    });

    transport.push(createMessage('quit', { senderId: 'console' }));
    const report = await container.orchestrator.runTick();
    await container.shutdown();

    expect(report.shutdownRequested).toBe(true);
    expect(transport.sent).toEqual([{ senderId: 'console', text: 'System shutdown initiated.' }]);
    expect(container.orchestrator.getState()).toBe('stopped');
  });

  it('refuses to start without a model endpoint', async () => {
    const error: unknown = await createContainer({
      env: { DATA_PATH: dir },
      logger: createMockLogger(),
      transport: new InMemoryTransport(),
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FatalStartupFailure);
    expect(error instanceof Error ? error.message : '').toBe(
      'Cannot start llm: LLM_BASE_URL and LLM_MODEL must be set'
    );
  });
});
