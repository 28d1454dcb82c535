import { describe, it, expect } from 'vitest';
import type { Product, StockObservation, StoredState } from '@stockwatch/shared';
import { detectTransition, toNotificationEvent } from '../transitions.js';

const product: Product = {
  id: 'paneer',
  name: 'Paneer 200g',
  url: 'https://shop.example.test/paneer',
  useBrowser: false,
  pincode: null,
  pincodeSelectors: {},
  selectors: {},
};

const observedAt = new Date('2026-03-01T10:05:00.000Z');

function stored(status: StoredState['status']): StoredState {
  const at = new Date('2026-03-01T10:00:00.000Z');
  return { productId: 'paneer', status, price: null, title: null, observedAt: at, changedAt: at };
}

function observed(status: StockObservation['status']): StockObservation {
  return { productId: 'paneer', status, price: null, title: null, detail: 'test', observedAt };
}

describe('detectTransition', () => {
  it.each([
    [null, 'available', 'first_observation'],
    [null, 'unavailable', 'first_observation'],
    ['available', 'available', 'no_change'],
    ['unavailable', 'unavailable', 'no_change'],
    ['unavailable', 'available', 'restock'],
    ['available', 'unavailable', 'out_of_stock'],
  ] as const)('%s -> %s is %s', (previous, current, expected) => {
    expect(detectTransition(previous ? stored(previous) : null, observed(current))).toBe(expected);
  });
});

describe('toNotificationEvent', () => {
  const quiet = { notifyOutOfStock: false };
  const chatty = { notifyOutOfStock: true };

  it('emits a restock event', () => {
    const observation = observed('available');

    expect(toNotificationEvent('restock', product, stored('unavailable'), observation, quiet)).toEqual({
      kind: 'restock',
      product,
      previousStatus: 'unavailable',
      currentStatus: 'available',
      observation,
      occurredAt: observedAt,
    });
  });

  it('emits out-of-stock events only when enabled', () => {
    const observation = observed('unavailable');

    expect(toNotificationEvent('out_of_stock', product, stored('available'), observation, quiet)).toBeNull();
    expect(toNotificationEvent('out_of_stock', product, stored('available'), observation, chatty)?.kind).toBe(
      'out_of_stock',
    );
  });

  it('stays silent on first observations and unchanged status', () => {
    expect(toNotificationEvent('first_observation', product, null, observed('available'), chatty)).toBeNull();
    expect(toNotificationEvent('no_change', product, stored('available'), observed('available'), chatty)).toBeNull();
  });
});
