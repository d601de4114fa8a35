import { describe, it, expect } from 'vitest';
import {
  ExternalValidator,
  DisabledExternalValidator,
  type ValidationConfig,
} from '../../../src/monitoring/external-validator.js';
import { ScriptedEvaluator, createMockLogger } from '../../helpers/factories.js';

const config: ValidationConfig = {
  metrics: ['safety', 'honesty'],
  probes: ['first probe', 'second probe'],
  metricThreshold: 0.7,
};

const echo = (probe: string): Promise<string> => Promise.resolve(`About ${probe}`);

describe('ExternalValidator', () => {
  it('averages each metric over the probes', async () => {
    const evaluator = new ScriptedEvaluator([0.9, 0.6, 0.7, 0.7]);
    const validator = new ExternalValidator(echo, evaluator, config, createMockLogger());

    const report = await validator.validate(new Date('2024-03-01T10:00:00Z'));

    expect(report.scores['safety']).toBeCloseTo(0.8);
    expect(report.scores['honesty']).toBeCloseTo(0.65);
    expect(report.failedMetrics).toEqual(['honesty']);
    expect(report.overallPass).toBe(false);
    expect(evaluator.calls.map((c) => [c.response, c.context])).toEqual([
      ['About first probe', { query: 'first probe', criterion: 'safety' }],
      ['About first probe', { query: 'first probe', criterion: 'honesty' }],
      ['About second probe', { query: 'second probe', criterion: 'safety' }],
      ['About second probe', { query: 'second probe', criterion: 'honesty' }],
    ]);
  });

  it('passes when every metric reaches the threshold', async () => {
    const validator = new ExternalValidator(
      echo,
      new ScriptedEvaluator(),
      config,
      createMockLogger()
    );

    const report = await validator.validate();

    expect(report.scores).toEqual({ safety: 1, honesty: 1 });
    expect(report.overallPass).toBe(true);
  });

  it('counts an unanswered probe as zero', async () => {
    const respond = (probe: string): Promise<string> =>
      probe === 'second probe' ? Promise.reject(new Error('no reply')) : echo(probe);
    const logger = createMockLogger();
    const validator = new ExternalValidator(respond, new ScriptedEvaluator(), config, logger);

    const report = await validator.validate();

    expect(report.scores).toEqual({ safety: 0.5, honesty: 0.5 });
    expect(report.failedMetrics).toEqual(['safety', 'honesty']);
    expect(logger.messages('warn')).toEqual(['Probe got no reply']);
  });

  it('counts a score the evaluator cannot give as zero', async () => {
    const evaluator = new ScriptedEvaluator([new Error('judge offline'), 1, Number.NaN, 1]);
    const logger = createMockLogger();
    const validator = new ExternalValidator(echo, evaluator, config, logger);

    const report = await validator.validate();

    expect(report.scores).toEqual({ safety: 0, honesty: 1 });
    expect(logger.messages('warn')).toEqual(['Validation scoring failed']);
  });
});

describe('DisabledExternalValidator', () => {
  it('always passes', async () => {
    const report = await new DisabledExternalValidator().validate();

    expect(report.overallPass).toBe(true);
    expect(report.failedMetrics).toEqual([]);
  });
});
