import { describe, it, expect } from 'vitest';
import { EthicalFilter, PassThroughEthicalFilter } from '../../../src/ethics/ethical-filter.js';
import { EthicalInsight, summarizeVerdicts } from '../../../src/ethics/ethical-insight.js';
import { JsonMemoryStore } from '../../../src/storage/json-memory-store.js';
import {
  InMemoryStorage,
  ScriptedEvaluator,
  ScriptedGenerator,
  createMockLogger,
} from '../../helpers/factories.js';

describe('EthicalFilter', () => {
  it('passes scores at or above the threshold', async () => {
    const filter = new EthicalFilter(new ScriptedEvaluator([0.8, 0.79]), createMockLogger(), {
      passThreshold: 0.8,
    });

    expect((await filter.review('a', { query: 'q' })).passed).toBe(true);
    expect((await filter.review('b', { query: 'q' })).passed).toBe(false);
  });

  it('asks the evaluator about ethics', async () => {
    const evaluator = new ScriptedEvaluator();
    const filter = new EthicalFilter(evaluator, createMockLogger());

    await filter.review('reply', { query: 'question', interactionId: 'i-1' });

    expect(evaluator.calls[0]).toEqual({
      response: 'reply',
      context: { query: 'question', criterion: 'ethics' },
    });
  });

  it('clamps scores and treats non-finite scores as 0', async () => {
    const filter = new EthicalFilter(
      new ScriptedEvaluator([1.7, Number.NaN]),
      createMockLogger()
    );

    expect((await filter.review('a', { query: 'q' })).score).toBe(1);
    expect((await filter.review('b', { query: 'q' })).score).toBe(0);
  });

  it('turns an evaluator error into a failing verdict', async () => {
    const filter = new EthicalFilter(
      new ScriptedEvaluator([new Error('judge offline')]),
      createMockLogger()
    );

    const verdict = await filter.review('a', { query: 'q', interactionId: 'i-9' });

    expect(verdict.score).toBe(0);
    expect(verdict.passed).toBe(false);
    expect(verdict.rationale).toBe('Evaluation unavailable: judge offline');
    expect(verdict.interactionId).toBe('i-9');
  });

  it('keeps a bounded verdict history', async () => {
    const filter = new EthicalFilter(new ScriptedEvaluator(), createMockLogger(), {
      historyLimit: 2,
    });
    for (let i = 0; i < 3; i++) {
      await filter.review(`r${String(i)}`, { query: 'q', interactionId: `i-${String(i)}` });
    }

    expect(filter.verdictsSince(null).map((v) => v.interactionId)).toEqual(['i-1', 'i-2']);
  });

  it('filters verdicts by time', async () => {
    const filter = new EthicalFilter(new ScriptedEvaluator(), createMockLogger());
    await filter.review('r', { query: 'q' });

    expect(filter.verdictsSince(new Date(Date.now() + 60_000))).toEqual([]);
    expect(filter.verdictsSince(new Date(0))).toHaveLength(1);
  });
});

describe('PassThroughEthicalFilter', () => {
  it('passes everything and remembers nothing', async () => {
    const filter = new PassThroughEthicalFilter();

    const verdict = await filter.review('anything', { query: 'q', interactionId: 'i-1' });

    expect(verdict.passed).toBe(true);
    expect(verdict.score).toBe(1);
    expect(verdict.interactionId).toBe('i-1');
    expect(filter.verdictsSince(null)).toEqual([]);
  });
});

describe('summarizeVerdicts', () => {
  it('summarizes scores and concerns', () => {
    const at = new Date('2024-03-01T10:00:00Z');
    const summary = summarizeVerdicts(
      [
        { score: 1, passed: true, at },
        { score: 0.5, passed: false, rationale: 'Too blunt', at },
        { score: 0.3, passed: false, rationale: 'Too blunt', at },
      ],
      0.8
    );

    expect(summary.split('\n')).toEqual([
      'Reviewed 3 replies.',
      'Average score 0.60.',
      '2 scored below 0.80.',
      'Concerns raised:',
      '- Too blunt',
    ]);
  });
});

describe('EthicalInsight', () => {
  it('stores an ethical reflection from recent verdicts', async () => {
    const filter = new EthicalFilter(new ScriptedEvaluator([0.9]), createMockLogger());
    await filter.review('reply', { query: 'q', interactionId: 'i-1' });
    const memory = new JsonMemoryStore(new InMemoryStorage(), createMockLogger());
    const generator = new ScriptedGenerator(['  I have been careful and kind.  ']);
    const insight = new EthicalInsight(filter, generator, memory, createMockLogger());

    const record = await insight.reflect(new Date('2099-01-01T00:00:00Z'));

    expect(record?.kind).toBe('ethical');
    expect(record?.text).toBe('I have been careful and kind.');
    expect(record?.sourceInteractionIds).toEqual(['i-1']);
    expect(generator.calls[0]?.context).toBe(
      'Reviewed 1 replies.\nAverage score 0.90.\n0 scored below 0.80.'
    );
    expect(await memory.retrieveReflections('ethical', 5)).toHaveLength(1);
  });

  it('skips the generator when there is nothing new', async () => {
    const filter = new EthicalFilter(new ScriptedEvaluator(), createMockLogger());
    const memory = new JsonMemoryStore(new InMemoryStorage(), createMockLogger());
    const generator = new ScriptedGenerator();
    const insight = new EthicalInsight(filter, generator, memory, createMockLogger());

    expect(await insight.reflect()).toBeNull();
    expect(generator.calls).toHaveLength(0);
  });
});
