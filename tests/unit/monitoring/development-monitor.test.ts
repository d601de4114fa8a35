import { describe, it, expect } from 'vitest';
import {
  DevelopmentMonitor,
  DisabledDevelopmentMonitor,
  type MonitorConfig,
} from '../../../src/monitoring/development-monitor.js';
import { createMockLogger } from '../../helpers/factories.js';

const config: MonitorConfig = {
  zScoreThreshold: 2,
  historyLength: 100,
  minSamples: 5,
  dropThresholds: { quality: 0.2 },
};

function monitorOver(values: Record<string, number>[], overrides: Partial<MonitorConfig> = {}) {
  const queue = [...values];
  return new DevelopmentMonitor(
    () => queue.shift() ?? {},
    { ...config, ...overrides },
    createMockLogger()
  );
}

describe('DevelopmentMonitor', () => {
  it('flags a value far outside its history', () => {
    const monitor = monitorOver([
      { latency: 0.8 },
      { latency: 0.9 },
      { latency: 0.8 },
      { latency: 0.9 },
      { latency: 0.8 },
      { latency: 0.5 },
    ]);

    for (let i = 0; i < 5; i++) {
      expect(monitor.runCycle().anomalies).toEqual([]);
    }
    const report = monitor.runCycle();

    // mean 0.84, std 0.049
    expect(report.anomalies).toHaveLength(1);
    expect(report.anomalies[0]).toMatchObject({ metric: 'latency', kind: 'z-score', value: 0.5 });
    const anomaly = report.anomalies[0];
    expect(anomaly?.kind === 'z-score' ? anomaly.zScore : 0).toBeCloseTo(-6.94, 2);
  });

  it('does not compute z-scores before enough samples', () => {
    const monitor = monitorOver([{ latency: 0.8 }, { latency: 0.9 }, { latency: 0.1 }]);

    monitor.runCycle();
    monitor.runCycle();

    expect(monitor.runCycle().anomalies).toEqual([]);
  });

  it('flags a sharp drop from the previous sample', () => {
    const monitor = monitorOver([{ quality: 1 }, { quality: 0.7 }, { quality: 0.6 }]);

    monitor.runCycle();
    const drop = monitor.runCycle();
    const gentle = monitor.runCycle();

    expect(drop.anomalies).toHaveLength(1);
    expect(drop.anomalies[0]).toMatchObject({ metric: 'quality', kind: 'drop', value: 0.7 });
    expect(gentle.anomalies).toEqual([]);
  });

  it('ignores flat history', () => {
    const monitor = monitorOver([
      { quality: 1 },
      { quality: 1 },
      { quality: 1 },
      { quality: 1 },
      { quality: 1 },
      { quality: 0.9 },
    ]);

    for (let i = 0; i < 5; i++) monitor.runCycle();

    expect(monitor.runCycle().anomalies).toEqual([]);
  });

  it('keeps a bounded history per metric', () => {
    const monitor = monitorOver(
      [1, 2, 3, 4, 5].map((n) => ({ count: n })),
      { historyLength: 3 }
    );

    for (let i = 0; i < 5; i++) monitor.runCycle();

    expect(monitor.getHistory('count')).toEqual([3, 4, 5]);
    expect(monitor.getHistory('unknown')).toEqual([]);
  });

  it('reports the sampled metrics with the cycle time', () => {
    const now = new Date('2024-03-01T10:00:00Z');
    const monitor = monitorOver([{ quality: 0.9 }]);

    expect(monitor.runCycle(now)).toEqual({ at: now, metrics: { quality: 0.9 }, anomalies: [] });
  });
});

describe('DisabledDevelopmentMonitor', () => {
  it('never reports anything', () => {
    const now = new Date('2024-03-01T10:00:00Z');

    expect(new DisabledDevelopmentMonitor().runCycle(now)).toEqual({
      at: now,
      metrics: {},
      anomalies: [],
    });
  });
});
