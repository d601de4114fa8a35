import type { Logger } from '../types/logger.js';
import type { Storage } from '../storage/storage.js';
import type { JobRun } from '../scheduler/periodic-scheduler.js';

export const STATUS_KEY = 'status';

/**
 * Orchestrator lifecycle states.
 */
export type OrchestratorState =
  | 'idle'
  | 'receiving'
  | 'processing'
  | 'responding'
  | 'checking-periodic'
  | 'shutting-down'
  | 'stopped';

export interface JobRunSummary {
  job: string;
  reason: JobRun['reason'];
  status: JobRun['status'];
  durationMs: number;
  error?: string;
}

/**
 * What the status file holds. Written at the end of every tick and at shutdown.
 */
export interface StatusSnapshot {
  state: OrchestratorState;
  tickCount: number;
  processedInteractions: number;
  lastJobRuns: JobRunSummary[];
  activeSenders: string[];
  updatedAt: string;
}

export function summarizeJobRun(run: JobRun): JobRunSummary {
  const summary: JobRunSummary = {
    job: run.job,
    reason: run.reason,
    status: run.status,
    durationMs: run.durationMs,
  };
  if (run.error) {
    summary.error = run.error.message;
  }
  return summary;
}

/**
 * Writes the status snapshot. A failed write is logged, never thrown.
 */
export class StatusReporter {
  private readonly storage: Storage;
  private readonly logger: Logger;
  private last: StatusSnapshot | null = null;

  constructor(storage: Storage, logger: Logger) {
    this.storage = storage;
    this.logger = logger.child({ component: 'status' });
  }

  async write(snapshot: StatusSnapshot): Promise<boolean> {
    this.last = snapshot;
    try {
      await this.storage.save(STATUS_KEY, snapshot);
      return true;
    } catch (error) {
      this.logger.warn(
        { error: error instanceof Error ? error.message : String(error) },
        'Failed to write status'
      );
      return false;
    }
  }

  /**
   * The most recent snapshot handed to write(), if any.
   */
  getLast(): StatusSnapshot | null {
    return this.last;
  }
}
