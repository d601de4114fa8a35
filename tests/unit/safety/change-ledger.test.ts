import { describe, it, expect, beforeEach } from 'vitest';
import { ChangeLedger } from '../../../src/safety/change-ledger.js';
import { PersistenceFailure } from '../../../src/core/errors.js';
import { InMemoryStorage, createMockLogger } from '../../helpers/factories.js';

describe('ChangeLedger', () => {
  let storage: InMemoryStorage;
  let ledger: ChangeLedger;

  beforeEach(() => {
    storage = new InMemoryStorage();
    ledger = new ChangeLedger(storage, createMockLogger());
  });

  it('records applied changes as active', async () => {
    const change = await ledger.apply(
      'self-improvement',
      'Ask a clarifying question first.',
      new Date('2024-03-01T10:00:00Z')
    );

    expect(change.status).toBe('active');
    expect(change.appliedAt).toEqual(new Date('2024-03-01T10:00:00Z'));
    expect(await ledger.list('active')).toHaveLength(1);
  });

  it('quarantines the most recent active change', async () => {
    await ledger.apply('self-improvement', 'first');
    await ledger.apply('self-improvement', 'second');

    const quarantined = await ledger.quarantineLatestActive(
      'External validation failed: robustness',
      new Date('2024-03-02T00:00:00Z')
    );

    expect(quarantined?.description).toBe('second');
    expect(quarantined?.status).toBe('quarantined');
    expect(quarantined?.reason).toBe('External validation failed: robustness');
    expect((await ledger.list('active')).map((c) => c.description)).toEqual(['first']);

    const next = await ledger.quarantineLatestActive('again');
    expect(next?.description).toBe('first');
  });

  it('returns null when nothing is active', async () => {
    expect(await ledger.quarantineLatestActive('nothing to do')).toBeNull();
  });

  it('reloads changes from storage', async () => {
    await ledger.apply('self-improvement', 'kept');
    await ledger.quarantineLatestActive('drift');

    const reloaded = new ChangeLedger(storage, createMockLogger());
    const changes = await reloaded.list();

    expect(changes).toHaveLength(1);
    expect(changes[0]?.status).toBe('quarantined');
    expect(changes[0]?.appliedAt).toBeInstanceOf(Date);
  });

  it('keeps the parameter change across reloads', async () => {
    await ledger.apply('parameter', 'Lower temperature.', new Date('2024-03-01T10:00:00Z'), {
      parameter: 'temperature',
      from: 0.7,
      to: 0.6,
    });

    const [change] = await new ChangeLedger(storage, createMockLogger()).list();

    expect(change?.parameterChange).toEqual({ parameter: 'temperature', from: 0.7, to: 0.6 });
  });

  it('starts empty when the stored ledger is invalid', async () => {
    storage.data.set('changes', [{ id: 1 }]);
    const logger = createMockLogger();
    const reloaded = new ChangeLedger(storage, logger);

    expect(await reloaded.list()).toEqual([]);
    expect(logger.messages('error')).toEqual(['Stored change ledger is invalid, starting empty']);
  });

  it('wraps storage errors in PersistenceFailure', async () => {
    storage.failSaves = true;

    await expect(ledger.apply('self-improvement', 'lost')).rejects.toBeInstanceOf(
      PersistenceFailure
    );
    expect(await ledger.list()).toEqual([]);
  });
});
