import { describe, it, expect } from 'vitest';
import { KeywordEthicalEvaluator } from '../../../src/ethics/keyword-evaluator.js';
import { HeuristicEvaluator } from '../../../src/ethics/heuristic-evaluator.js';
import {
  ModelJudgeEvaluator,
  FallbackEvaluator,
  parseVerdict,
} from '../../../src/ethics/model-judge-evaluator.js';
import { scoreKeywordCategories, describeMatches } from '../../../src/ethics/keyword-categories.js';
import { DEFAULT_CONFIG } from '../../../src/config/config-schema.js';
import { GenerationFailure } from '../../../src/core/errors.js';
import {
  ScriptedEvaluator,
  ScriptedGenerator,
  createMockLogger,
} from '../../helpers/factories.js';

const categories = DEFAULT_CONFIG.ethics.categories;

describe('scoreKeywordCategories', () => {
  it('counts each category once', () => {
    const result = scoreKeywordCategories('kill the murder weapon', categories);

    expect(result.score).toBeCloseTo(0.7);
    expect(result.matches).toEqual([
      { category: 'harmful_content', severity: 'high', keywords: ['kill', 'weapon', 'murder'] },
    ]);
  });

  it('never goes below zero', () => {
    const categoriesMany = {
      a: { severity: 'high' as const, keywords: ['alpha'] },
      b: { severity: 'high' as const, keywords: ['beta'] },
      c: { severity: 'high' as const, keywords: ['gamma'] },
      d: { severity: 'high' as const, keywords: ['delta'] },
    };

    expect(scoreKeywordCategories('alpha beta gamma delta', categoriesMany).score).toBe(0);
  });

  it('matches whole words only', () => {
    expect(scoreKeywordCategories('skills and killer whales', categories).matches).toEqual([]);
  });

  it('describes matches', () => {
    expect(describeMatches([])).toBe('No concerns found');
    expect(
      describeMatches([{ category: 'privacy_violation', severity: 'high', keywords: ['password'] }])
    ).toBe('privacy violation (password)');
  });
});

describe('KeywordEthicalEvaluator', () => {
  const evaluator = new KeywordEthicalEvaluator(categories);

  it('scores clean text 1 without a rationale', async () => {
    expect(await evaluator.score('Have a lovely day.')).toEqual({ score: 1 });
  });

  it('explains what it found', async () => {
    const result = await evaluator.score('That slur is not okay.');

    expect(result.score).toBeCloseTo(0.9);
    expect(result.rationale).toBe('Avoid touching on discrimination (slur)');
  });
});

describe('HeuristicEvaluator', () => {
  const evaluator = new HeuristicEvaluator();

  it('rewards overlap and substance', async () => {
    const result = await evaluator.score('The sky is blue because of scattering.', {
      query: 'why is the sky blue',
    });

    // jaccard 4/8 → overlap 0.9; substance 1
    expect(result.score).toBeCloseTo(0.95);
  });

  it('prefers the expected answer when there is one', async () => {
    const result = await evaluator.score('ok', {
      query: 'anything',
      expected: 'ok',
    });

    // overlap min(1, 0.4 + 1) = 1; "ok" is thin → 0.4
    expect(result.score).toBeCloseTo(0.7);
    expect(result.rationale).toBe('overlap 1.00, substance 0.40');
  });
});

describe('parseVerdict', () => {
  it('extracts the JSON object from surrounding text', () => {
    expect(parseVerdict('Sure. {"score": 0.8, "rationale": "Kind and clear."} Done.')).toEqual({
      score: 0.8,
      rationale: 'Kind and clear.',
    });
  });

  it('rejects replies without JSON', () => {
    expect(() => parseVerdict('I think it is fine')).toThrow('Judge reply contains no JSON object');
  });

  it('rejects malformed JSON', () => {
    expect(() => parseVerdict('{score: 0.8}')).toThrow('Judge reply is not valid JSON');
  });

  it('rejects out-of-range scores', () => {
    expect(() => parseVerdict('{"score": 7}')).toThrow(GenerationFailure);
  });
});

describe('ModelJudgeEvaluator', () => {
  it('asks the generator for a verdict with the judge prompt', async () => {
    const generator = new ScriptedGenerator(['{"score": 0.9}']);
    const judge = new ModelJudgeEvaluator(generator, 'safety');

    const result = await judge.score('A calm reply.', { query: 'Are you okay?' });

    expect(result).toEqual({ score: 0.9 });
    expect(generator.calls[0]?.context).toBe('');
    expect(generator.calls[0]?.query).toBe(
      'Criterion: safety\nUser message: Are you okay?\nReply to rate: A calm reply.'
    );
    expect(generator.calls[0]?.options?.systemPrompt).toContain('strict reviewer');
  });

  it('includes the reference answer and explicit criterion', async () => {
    const generator = new ScriptedGenerator(['{"score": 0.5}']);
    const judge = new ModelJudgeEvaluator(generator);

    await judge.score('Paris.', {
      query: 'Capital of France?',
      criterion: 'accuracy',
      expected: 'Paris',
    });

    expect(generator.calls[0]?.query.split('\n')).toEqual([
      'Criterion: accuracy',
      'User message: Capital of France?',
      'Reference answer: Paris',
      'Reply to rate: Paris.',
    ]);
  });
});

describe('FallbackEvaluator', () => {
  it('uses the secondary evaluator when the primary throws', async () => {
    const primary = new ScriptedEvaluator([new Error('judge offline')], { score: 1 }, 'primary');
    const secondary = new ScriptedEvaluator([0.6], { score: 1 }, 'secondary');
    const logger = createMockLogger();
    const evaluator = new FallbackEvaluator(primary, secondary, logger);

    expect(evaluator.name).toBe('primary|secondary');
    expect(await evaluator.score('reply', { query: 'q' })).toEqual({ score: 0.6 });
    expect(logger.messages('warn')).toEqual(['Evaluator failed, using fallback']);
  });

  it('does not call the secondary when the primary succeeds', async () => {
    const primary = new ScriptedEvaluator([0.75]);
    const secondary = new ScriptedEvaluator();
    const evaluator = new FallbackEvaluator(primary, secondary, createMockLogger());

    expect(await evaluator.score('reply', { query: 'q' })).toEqual({ score: 0.75 });
    expect(secondary.calls).toHaveLength(0);
  });
});
