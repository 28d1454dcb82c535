import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import Database from 'better-sqlite3';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { StateStoreError } from '@stockwatch/shared';
import type { StockObservation } from '@stockwatch/shared';
import { openSqliteStateStore } from '../state-store.js';
import type { StateStore } from '../state-store.js';

function observation(overrides: Partial<StockObservation> = {}): StockObservation {
  return {
    productId: 'paneer',
    status: 'available',
    price: '120.00',
    title: 'Paneer 200g',
    detail: 'Add-to-cart control is enabled',
    observedAt: new Date('2026-03-01T10:00:00.000Z'),
    ...overrides,
  };
}

describe('sqlite state store', () => {
  let dir: string;
  let path: string;
  let store: StateStore;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'stock-state-'));
    path = join(dir, 'nested', 'state.db');
    store = openSqliteStateStore(path);
  });

  afterEach(async () => {
    await store.close();
    rmSync(dir, { recursive: true, force: true });
  });

  it('returns null for a product it has never seen', async () => {
    expect(await store.read('paneer')).toBeNull();
  });

  it('stores the first observation with changedAt equal to observedAt', async () => {
    const written = await store.write('paneer', observation());

    const expected = {
      productId: 'paneer',
      status: 'available',
      price: '120.00',
      title: 'Paneer 200g',
      observedAt: new Date('2026-03-01T10:00:00.000Z'),
      changedAt: new Date('2026-03-01T10:00:00.000Z'),
    };
    expect(written).toEqual(expected);
    expect(await store.read('paneer')).toEqual(expected);
  });

  it('keeps changedAt while the status stays the same', async () => {
    await store.write('paneer', observation());
    await store.write(
      'paneer',
      observation({ price: '110.00', observedAt: new Date('2026-03-01T10:05:00.000Z') }),
    );

    const state = await store.read('paneer');
    expect(state?.price).toBe('110.00');
    expect(state?.observedAt).toEqual(new Date('2026-03-01T10:05:00.000Z'));
    expect(state?.changedAt).toEqual(new Date('2026-03-01T10:00:00.000Z'));
  });

  it('moves changedAt when the status flips', async () => {
    await store.write('paneer', observation());
    await store.write(
      'paneer',
      observation({ status: 'unavailable', price: null, observedAt: new Date('2026-03-01T10:05:00.000Z') }),
    );

    const state = await store.read('paneer');
    expect(state?.status).toBe('unavailable');
    expect(state?.price).toBeNull();
    expect(state?.changedAt).toEqual(new Date('2026-03-01T10:05:00.000Z'));
  });

  it('keeps products independent', async () => {
    await store.write('paneer', observation());
    await store.write('lassi', observation({ productId: 'lassi', status: 'unavailable' }));

    expect((await store.read('paneer'))?.status).toBe('available');
    expect((await store.read('lassi'))?.status).toBe('unavailable');
  });

  it('survives a restart', async () => {
    await store.write('paneer', observation());
    await store.close();

    store = openSqliteStateStore(path);

    expect((await store.read('paneer'))?.status).toBe('available');
  });

  it('keeps the last committed state when a writer dies mid-transaction', async () => {
    await store.write('paneer', observation());

    const writer = new Database(path);
    writer.exec('BEGIN IMMEDIATE');
    writer
      .prepare('UPDATE stock_state SET status = ? WHERE product_id = ?')
      .run('unavailable', 'paneer');
    writer.close();

    expect((await store.read('paneer'))?.status).toBe('available');
  });

  it('stores, replaces and clears meta values', async () => {
    expect(await store.readMeta('health.signature')).toBeNull();

    await store.writeMeta('health.signature', 'paneer:fetch');
    await store.writeMeta('health.signature', 'lassi:parse');
    expect(await store.readMeta('health.signature')).toBe('lassi:parse');

    await store.writeMeta('health.signature', null);
    expect(await store.readMeta('health.signature')).toBeNull();
  });

  it('wraps database failures in StateStoreError', async () => {
    await store.close();

    await expect(store.write('paneer', observation())).rejects.toBeInstanceOf(StateStoreError);
    await expect(store.read('paneer')).rejects.toThrow(/^State store read failed: /);
  });
});
