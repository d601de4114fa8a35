/**
 * Development Monitor
 *
 * Samples the agent's quality metrics each cycle and flags values that stray
 * from their own history: a z-score beyond the threshold, or a sharp drop
 * from the previous sample.
 */

import type { Logger } from '../types/logger.js';

export interface MonitorConfig {
  zScoreThreshold: number;
  /** Samples kept per metric */
  historyLength: number;
  /** History needed before z-scores are computed */
  minSamples: number;
  /** Metric → largest tolerated drop between consecutive samples */
  dropThresholds: Record<string, number>;
}

export type Anomaly =
  | { metric: string; kind: 'z-score'; value: number; zScore: number }
  | { metric: string; kind: 'drop'; value: number; drop: number };

export interface MonitorReport {
  at: Date;
  metrics: Record<string, number>;
  anomalies: Anomaly[];
}

export interface IDevelopmentMonitor {
  runCycle(now?: Date): MonitorReport;
}

export class DevelopmentMonitor implements IDevelopmentMonitor {
  private readonly sample: () => Record<string, number>;
  private readonly config: MonitorConfig;
  private readonly logger: Logger;
  private readonly history = new Map<string, number[]>();

  constructor(sample: () => Record<string, number>, config: MonitorConfig, logger: Logger) {
    this.sample = sample;
    this.config = config;
    this.logger = logger.child({ component: 'monitor' });
  }

  runCycle(now: Date = new Date()): MonitorReport {
    const metrics = this.sample();
    const anomalies: Anomaly[] = [];

    for (const [metric, value] of Object.entries(metrics)) {
      const history = this.history.get(metric) ?? [];
      const anomaly = this.check(metric, value, history);
      if (anomaly) anomalies.push(anomaly);

      history.push(value);
      if (history.length > this.config.historyLength) {
        history.shift();
      }
      this.history.set(metric, history);
    }

    if (anomalies.length > 0) {
      this.logger.warn({ anomalies }, 'Development anomalies detected');
    } else {
      this.logger.debug({ metrics }, 'Monitoring cycle clean');
    }
    return { at: now, metrics, anomalies };
  }

  getHistory(metric: string): readonly number[] {
    return this.history.get(metric) ?? [];
  }

  private check(metric: string, value: number, history: number[]): Anomaly | null {
    if (history.length >= this.config.minSamples) {
      const mean = history.reduce((sum, v) => sum + v, 0) / history.length;
      const variance = history.reduce((sum, v) => sum + (v - mean) ** 2, 0) / history.length;
      const std = Math.sqrt(variance);
      if (std > 0) {
        const zScore = (value - mean) / std;
        if (Math.abs(zScore) > this.config.zScoreThreshold) {
          return { metric, kind: 'z-score', value, zScore };
        }
      }
    }

    const previous = history[history.length - 1];
    const tolerated = this.config.dropThresholds[metric];
    if (previous !== undefined && tolerated !== undefined) {
      const drop = previous - value;
      if (drop > tolerated) {
        return { metric, kind: 'drop', value, drop };
      }
    }

    return null;
  }
}

/**
 * Monitor used when monitoring is disabled: samples nothing, reports nothing.
 */
export class DisabledDevelopmentMonitor implements IDevelopmentMonitor {
  runCycle(now: Date = new Date()): MonitorReport {
    return { at: now, metrics: {}, anomalies: [] };
  }
}
