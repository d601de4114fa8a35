import type { Storage, Flushable } from './storage.js';
import type { Logger } from '../types/logger.js';

/**
 * Configuration for DeferredStorage.
 */
export interface DeferredStorageConfig {
  /** Auto-flush interval in ms (default: 30 seconds) */
  flushIntervalMs: number;
}

const DEFAULT_CONFIG: DeferredStorageConfig = {
  flushIntervalMs: 30_000,
};

interface CacheEntry {
  data: unknown;
  dirty: boolean;
}

/**
 * DeferredStorage - write-behind cache over any Storage.
 *
 * save() only updates memory; dirty keys reach the underlying storage on
 * flush(), which runs on a timer and at shutdown. Keys are written one at a
 * time, so two writes to the same file can never interleave.
 */
export class DeferredStorage implements Storage, Flushable {
  private readonly underlying: Storage;
  private readonly logger: Logger;
  private readonly config: DeferredStorageConfig;

  private readonly cache = new Map<string, CacheEntry>();
  private flushTimer: ReturnType<typeof setInterval> | null = null;
  private flushing: Promise<void> | null = null;

  constructor(underlying: Storage, logger: Logger, config: Partial<DeferredStorageConfig> = {}) {
    this.underlying = underlying;
    this.logger = logger.child({ component: 'deferred-storage' });
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  async load(key: string): Promise<unknown> {
    const cached = this.cache.get(key);
    if (cached !== undefined) {
      return cached.data;
    }

    const data = await this.underlying.load(key);
    if (data !== null) {
      this.cache.set(key, { data, dirty: false });
    }
    return data;
  }

  save(key: string, data: unknown): Promise<void> {
    this.cache.set(key, { data, dirty: true });
    return Promise.resolve();
  }

  startAutoFlush(): void {
    if (this.flushTimer) return;

    this.flushTimer = setInterval(() => {
      this.flush().catch((error: unknown) => {
        this.logger.error(
          { error: error instanceof Error ? error.message : String(error) },
          'Auto-flush failed'
        );
      });
    }, this.config.flushIntervalMs);
    // The timer alone must not keep the process alive
    this.flushTimer.unref();

    this.logger.debug({ intervalMs: this.config.flushIntervalMs }, 'Auto-flush started');
  }

  stopAutoFlush(): void {
    if (this.flushTimer) {
      clearInterval(this.flushTimer);
      this.flushTimer = null;
    }
  }

  /**
   * Write all dirty entries to the underlying storage.
   * A call made while a flush is running waits for it and then flushes again,
   * so writes made in between are not lost.
   */
  async flush(): Promise<void> {
    while (this.flushing) {
      await this.flushing;
    }
    this.flushing = this.writeDirty();
    try {
      await this.flushing;
    } finally {
      this.flushing = null;
    }
  }

  private async writeDirty(): Promise<void> {
    const dirty: { key: string; entry: CacheEntry; data: unknown }[] = [];
    for (const [key, entry] of this.cache) {
      if (entry.dirty) dirty.push({ key, entry, data: entry.data });
    }
    if (dirty.length === 0) return;

    for (const { key, entry, data } of dirty) {
      await this.underlying.save(key, data);
      // Only clean if nobody saved a newer value while we were writing
      if (this.cache.get(key) === entry && entry.data === data) {
        entry.dirty = false;
      }
    }

    this.logger.debug({ written: dirty.map((d) => d.key) }, 'Storage flushed');
  }

  /**
   * Stop the timer and flush everything still pending.
   */
  async shutdown(): Promise<void> {
    this.stopAutoFlush();
    await this.flush();
    this.logger.debug('Deferred storage shutdown complete');
  }
}

export function createDeferredStorage(
  underlying: Storage,
  logger: Logger,
  config?: Partial<DeferredStorageConfig>
): DeferredStorage {
  return new DeferredStorage(underlying, logger, config);
}
