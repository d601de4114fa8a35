/**
 * Key-value persistence used by every durable component
 * (memory store, persona store, change ledger, status file).
 */
export interface Storage {
  /**
   * Load data by key.
   * @returns The stored value, or null when the key is absent
   */
  load(key: string): Promise<unknown>;

  /**
   * Save data under a key, replacing any previous value.
   */
  save(key: string, data: unknown): Promise<void>;
}

/**
 * Something that buffers writes and can push them to durable storage on demand.
 */
export interface Flushable {
  flush(): Promise<void>;
}

/**
 * Check whether a storage buffers writes.
 */
export function isFlushable(value: object): value is Flushable {
  return 'flush' in value && typeof value.flush === 'function';
}
