/**
 * Periodic Scheduler
 *
 * Runs background jobs from the control loop. On each pass, jobs are checked
 * in their fixed order and each due job runs to completion before the next is
 * checked. A job is due by time (interval since its last attempt), by counter
 * (events since its last success), or both, whichever comes first.
 *
 * Failure isolation:
 * - A throwing job is logged and reported; the pass continues
 * - Every attempt moves lastRunAt, so a failed interval job waits a full interval
 * - Only success moves the counter mark; a failed counter job runs again only
 *   after at least one new event
 */

import type { Logger } from '../types/logger.js';
import { SchedulerJobFailure } from '../core/errors.js';
import { withTraceContext, createTraceContext } from '../core/trace-context.js';

export interface CounterTrigger {
  /** Events since the last success needed to make the job due */
  threshold: number;
  /** Monotonic event count */
  count: () => number;
}

export interface JobTrigger {
  /** Interval in ms between attempts */
  every?: number;
  afterEvents?: CounterTrigger;
  /** Due on the first pass instead of one interval after start */
  runOnStart?: boolean;
}

/**
 * What a job may touch outside its own collaborators.
 */
export interface JobContext {
  now: Date;
  /** Senders seen since startup, most recent last */
  activeSenders: readonly string[];
  /**
   * Send a message initiated by the agent. The text goes through the
   * correction mechanism first.
   * @returns true when the transport accepted it
   */
  send: (senderId: string, text: string) => Promise<boolean>;
  isCancelled: () => boolean;
}

export interface PeriodicJob {
  name: string;
  trigger: JobTrigger;
  run: (ctx: JobContext) => Promise<void>;
}

export interface ScheduleState {
  /** Last attempt, successful or not */
  lastRunAt: Date | null;
  lastSuccessAt: Date | null;
  /** Counter value at the last success */
  counterMark: number;
  /** Counter value at the last failure, cleared by a success */
  failedAtCount: number | null;
  runs: number;
  failures: number;
}

export type DueReason = 'start' | 'time' | 'counter';

export interface JobRun {
  job: string;
  reason: DueReason;
  status: 'succeeded' | 'failed';
  durationMs: number;
  error?: SchedulerJobFailure;
}

export class PeriodicScheduler {
  private readonly jobs: PeriodicJob[];
  private readonly logger: Logger;
  private readonly states = new Map<string, ScheduleState>();

  constructor(jobs: PeriodicJob[], logger: Logger, startedAt: Date = new Date()) {
    this.logger = logger.child({ component: 'scheduler' });
    this.jobs = [...jobs];

    for (const job of this.jobs) {
      if (this.states.has(job.name)) {
        throw new Error(`Duplicate job name: ${job.name}`);
      }
      if (job.trigger.every === undefined && job.trigger.afterEvents === undefined) {
        throw new Error(`Job ${job.name} has no trigger`);
      }
      this.states.set(job.name, {
        lastRunAt: job.trigger.runOnStart ? null : startedAt,
        lastSuccessAt: null,
        counterMark: job.trigger.afterEvents?.count() ?? 0,
        failedAtCount: null,
        runs: 0,
        failures: 0,
      });
    }

    this.logger.debug({ jobs: this.jobs.map((j) => j.name) }, 'Scheduler initialized');
  }

  /**
   * Why a job is due at `now`, or null when it is not.
   */
  dueReason(job: PeriodicJob, now: Date): DueReason | null {
    const state = this.stateOf(job.name);
    const { every, afterEvents } = job.trigger;

    if (every !== undefined) {
      if (state.lastRunAt === null) return 'start';
      if (now.getTime() - state.lastRunAt.getTime() >= every) return 'time';
    }

    if (afterEvents !== undefined) {
      const count = afterEvents.count();
      const enough = count - state.counterMark >= afterEvents.threshold;
      const newSinceFailure = state.failedAtCount === null || count > state.failedAtCount;
      if (enough && newSinceFailure) return 'counter';
      if (state.lastRunAt === null && every === undefined) return 'start';
    }

    return null;
  }

  /**
   * Run every due job in order. Stops early once the context reports cancellation.
   */
  async runDue(ctx: JobContext): Promise<JobRun[]> {
    const runs: JobRun[] = [];

    for (const job of this.jobs) {
      if (ctx.isCancelled()) {
        this.logger.debug({ next: job.name }, 'Scheduler pass cancelled');
        break;
      }

      const reason = this.dueReason(job, ctx.now);
      if (reason === null) continue;

      runs.push(await this.runJob(job, reason, ctx));
    }

    return runs;
  }

  getState(name: string): ScheduleState {
    return { ...this.stateOf(name) };
  }

  snapshot(): Record<string, ScheduleState> {
    const result: Record<string, ScheduleState> = {};
    for (const [name, state] of this.states) {
      result[name] = { ...state };
    }
    return result;
  }

  getJobNames(): string[] {
    return this.jobs.map((j) => j.name);
  }

  private async runJob(job: PeriodicJob, reason: DueReason, ctx: JobContext): Promise<JobRun> {
    const state = this.stateOf(job.name);
    const startedAt = Date.now();
    const traceContext = createTraceContext(`job_${job.name}_${String(state.runs + 1)}`);

    state.lastRunAt = ctx.now;
    state.runs++;

    try {
      await withTraceContext(traceContext, () => job.run(ctx));

      state.lastSuccessAt = ctx.now;
      state.counterMark = job.trigger.afterEvents?.count() ?? state.counterMark;
      state.failedAtCount = null;

      const durationMs = Date.now() - startedAt;
      this.logger.debug({ job: job.name, reason, durationMs }, 'Job completed');
      return { job: job.name, reason, status: 'succeeded', durationMs };
    } catch (error) {
      const failure = new SchedulerJobFailure(job.name, { cause: error });
      state.failures++;
      if (job.trigger.afterEvents) {
        state.failedAtCount = job.trigger.afterEvents.count();
      }

      const durationMs = Date.now() - startedAt;
      this.logger.error({ job: job.name, reason, error: failure.message }, 'Job failed');
      return { job: job.name, reason, status: 'failed', durationMs, error: failure };
    }
  }

  private stateOf(name: string): ScheduleState {
    const state = this.states.get(name);
    if (!state) {
      throw new Error(`Unknown job: ${name}`);
    }
    return state;
  }
}
