/**
 * Change Ledger
 *
 * Record of behavioural changes the agent applied to itself. External
 * validation can quarantine the latest active change when behaviour drifts.
 */

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import type { Storage } from '../storage/storage.js';
import type { Logger } from '../types/logger.js';
import { PersistenceFailure } from '../core/errors.js';

export type ChangeStatus = 'active' | 'quarantined';

/** A tunable value the change moved, so it can be reverted */
export interface ParameterChange {
  parameter: string;
  from: number;
  to: number;
}

export interface ChangeRecord {
  id: string;
  kind: string;
  description: string;
  appliedAt: Date;
  status: ChangeStatus;
  parameterChange?: ParameterChange;
  /** Why the change was quarantined */
  reason?: string;
  quarantinedAt?: Date;
}

const changeRecordSchema = z.object({
  id: z.string(),
  kind: z.string(),
  description: z.string(),
  appliedAt: z.coerce.date(),
  status: z.enum(['active', 'quarantined']),
  parameterChange: z
    .object({ parameter: z.string(), from: z.number(), to: z.number() })
    .optional(),
  reason: z.string().optional(),
  quarantinedAt: z.coerce.date().optional(),
});

const STORAGE_KEY = 'changes';

export class ChangeLedger {
  private readonly storage: Storage;
  private readonly logger: Logger;
  private changes: ChangeRecord[] = [];
  private loaded = false;

  constructor(storage: Storage, logger: Logger) {
    this.storage = storage;
    this.logger = logger.child({ component: 'change-ledger' });
  }

  /**
   * Record a newly applied change.
   */
  async apply(
    kind: string,
    description: string,
    now: Date = new Date(),
    parameterChange?: ParameterChange
  ): Promise<ChangeRecord> {
    await this.ensureLoaded();
    const record: ChangeRecord = {
      id: randomUUID(),
      kind,
      description,
      appliedAt: now,
      status: 'active',
      ...(parameterChange && { parameterChange: { ...parameterChange } }),
    };
    this.changes.push(record);
    try {
      await this.persist();
    } catch (error) {
      this.changes.pop();
      throw error;
    }

    this.logger.info({ changeId: record.id, kind }, 'Change applied');
    return record;
  }

  /**
   * Quarantine the most recently applied change that is still active.
   * @returns The quarantined change, or null when nothing is active
   */
  async quarantineLatestActive(
    reason: string,
    now: Date = new Date()
  ): Promise<ChangeRecord | null> {
    await this.ensureLoaded();

    const latest = [...this.changes].reverse().find((c) => c.status === 'active');
    if (!latest) {
      this.logger.info({ reason }, 'No active change to quarantine');
      return null;
    }

    latest.status = 'quarantined';
    latest.reason = reason;
    latest.quarantinedAt = now;
    await this.persist();

    this.logger.warn({ changeId: latest.id, kind: latest.kind, reason }, 'Change quarantined');
    return { ...latest };
  }

  async list(status?: ChangeStatus): Promise<ChangeRecord[]> {
    await this.ensureLoaded();
    return this.changes
      .filter((c) => status === undefined || c.status === status)
      .map((c) => ({ ...c }));
  }

  private async persist(): Promise<void> {
    try {
      await this.storage.save(STORAGE_KEY, this.changes.map((c) => ({ ...c })));
    } catch (error) {
      throw new PersistenceFailure(
        'saveChanges',
        error instanceof Error ? error.message : String(error),
        { cause: error }
      );
    }
  }

  private async ensureLoaded(): Promise<void> {
    if (this.loaded) return;
    this.loaded = true;

    const data = await this.storage.load(STORAGE_KEY);
    if (data === null) return;

    const parsed = z.array(changeRecordSchema).safeParse(data);
    if (parsed.success) {
      this.changes = parsed.data;
    } else {
      this.logger.error(
        { issueCount: parsed.error.issues.length },
        'Stored change ledger is invalid, starting empty'
      );
    }
  }
}
