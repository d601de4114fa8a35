import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { DeferredStorage } from '../../../src/storage/deferred-storage.js';
import { InMemoryStorage, createMockLogger } from '../../helpers/factories.js';

describe('DeferredStorage', () => {
  let underlying: InMemoryStorage;
  let deferred: DeferredStorage;

  beforeEach(() => {
    underlying = new InMemoryStorage();
    deferred = new DeferredStorage(underlying, createMockLogger(), { flushIntervalMs: 100 });
  });

  afterEach(() => {
    deferred.stopAutoFlush();
    vi.useRealTimers();
  });

  it('keeps saves in memory until flushed', async () => {
    await deferred.save('persona', { name: 'Aria' });

    expect(underlying.data.has('persona')).toBe(false);
    expect(await deferred.load('persona')).toEqual({ name: 'Aria' });

    await deferred.flush();
    await deferred.flush();

    expect(underlying.data.get('persona')).toEqual({ name: 'Aria' });
    expect(underlying.saveCount).toBe(1);
  });

  it('loads through to the underlying storage and caches the result', async () => {
    underlying.data.set('changes', [1, 2]);
    const loadSpy = vi.spyOn(underlying, 'load');

    expect(await deferred.load('changes')).toEqual([1, 2]);
    expect(await deferred.load('changes')).toEqual([1, 2]);
    expect(loadSpy).toHaveBeenCalledTimes(1);
  });

  it('returns null for unknown keys', async () => {
    expect(await deferred.load('missing')).toBeNull();
  });

  it('writes only the latest value of a key', async () => {
    await deferred.save('status', { tick: 1 });
    await deferred.save('status', { tick: 2 });
    await deferred.flush();

    expect(underlying.saveCount).toBe(1);
    expect(underlying.data.get('status')).toEqual({ tick: 2 });
  });

  it('does nothing on a flush with nothing dirty', async () => {
    await deferred.flush();
    expect(underlying.saveCount).toBe(0);
  });

  it('keeps a key dirty when it is saved again during a flush', async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const originalSave = underlying.save.bind(underlying);
    vi.spyOn(underlying, 'save').mockImplementationOnce(async (key, data) => {
      await gate;
      return originalSave(key, data);
    });

    await deferred.save('status', { tick: 1 });
    const flushing = deferred.flush();
    await deferred.save('status', { tick: 2 });
    release();
    await flushing;

    expect(underlying.data.get('status')).toEqual({ tick: 1 });
    await deferred.flush();
    expect(underlying.data.get('status')).toEqual({ tick: 2 });
  });

  it('flushes on the auto-flush timer', async () => {
    vi.useFakeTimers();
    const flushSpy = vi.spyOn(deferred, 'flush');
    deferred.startAutoFlush();

    await vi.advanceTimersByTimeAsync(250);

    expect(flushSpy).toHaveBeenCalledTimes(2);
  });

  it('flushes pending writes on shutdown', async () => {
    deferred.startAutoFlush();
    await deferred.save('persona', { name: 'Aria' });

    await deferred.shutdown();

    expect(underlying.data.get('persona')).toEqual({ name: 'Aria' });
  });

  it('propagates write errors from flush', async () => {
    underlying.failSaves = true;
    await deferred.save('persona', { name: 'Aria' });

    await expect(deferred.flush()).rejects.toThrow('disk full');

    underlying.failSaves = false;
    await deferred.flush();
    expect(underlying.data.get('persona')).toEqual({ name: 'Aria' });
  });
});
