import { describe, it, expect } from 'vitest';
import { FetchError, ParseError } from '@stockwatch/shared';
import type { NotificationEvent, Product } from '@stockwatch/shared';
import { formatHealthAlert, formatStockAlert, formatTimestamp, healthSignature } from '../notifications.js';

const product: Product = {
  id: 'paneer',
  name: 'Paneer 200g',
  url: 'https://shop.example.test/paneer',
  useBrowser: false,
  pincode: null,
  pincodeSelectors: {},
  selectors: {},
};

function event(overrides: Partial<NotificationEvent> = {}): NotificationEvent {
  const observedAt = new Date('2026-03-01T10:00:00.000Z');
  return {
    kind: 'restock',
    product,
    previousStatus: 'unavailable',
    currentStatus: 'available',
    observation: {
      productId: 'paneer',
      status: 'available',
      price: '120.00',
      title: 'Paneer 200g',
      detail: 'Add-to-cart control is enabled',
      observedAt,
    },
    occurredAt: observedAt,
    ...overrides,
  };
}

describe('formatTimestamp', () => {
  it('renders UTC to the second', () => {
    expect(formatTimestamp(new Date('2026-03-01T10:00:05.999Z'))).toBe('2026-03-01 10:00:05 UTC');
  });
});

describe('formatStockAlert', () => {
  it('renders a restock alert', () => {
    expect(formatStockAlert(event())).toEqual({
      subject: 'STOCK ALERT: Paneer 200g is available!',
      text: [
        '✅ Paneer 200g is now available!',
        '',
        '🛒 Product URL: https://shop.example.test/paneer',
        '💰 Price: 120.00',
        '📦 Status: Add-to-cart control is enabled',
        '⏰ Checked at: 2026-03-01 10:00:00 UTC',
        '',
        'Visit the URL to buy it now.',
      ].join('\n'),
    });
  });

  it('omits the price line when no price was found', () => {
    const base = event();
    const message = formatStockAlert({ ...base, observation: { ...base.observation, price: null } });

    expect(message.text).not.toContain('💰');
  });

  it('renders an out-of-stock alert', () => {
    const base = event();
    const message = formatStockAlert({
      ...base,
      kind: 'out_of_stock',
      previousStatus: 'available',
      currentStatus: 'unavailable',
      observation: { ...base.observation, status: 'unavailable', detail: 'Sold-out notice found: "Sold out"' },
    });

    expect(message).toEqual({
      subject: 'STOCK UPDATE: Paneer 200g is sold out',
      text: [
        '❌ Paneer 200g is no longer available.',
        '',
        '🛒 Product URL: https://shop.example.test/paneer',
        '📦 Status: Sold-out notice found: "Sold out"',
        '⏰ Checked at: 2026-03-01 10:00:00 UTC',
      ].join('\n'),
    });
  });

  it('returns plain-text content and does not emit Markdown links', () => {
    const message = formatStockAlert(
      event({ product: { ...product, name: '[evil](https://attacker.example.test)' } }),
    );

    expect(message.text).toContain('🛒 Product URL: https://shop.example.test/paneer');
    expect(message.text).not.toContain('](https://shop.example.test/paneer)');
  });
});

describe('health alerts', () => {
  const failures = [
    { product: { ...product, id: 'lassi', name: 'Lassi' }, error: new ParseError('no stock markers') },
    { product, error: new FetchError('timed out', 'timeout') },
  ];

  it('lists every failing product', () => {
    expect(formatHealthAlert(failures, new Date('2026-03-01T10:00:00.000Z'))).toEqual({
      subject: 'MONITOR HEALTH: 2 product check(s) failing',
      text: [
        '⚠️ Stock monitor could not check 2 product(s):',
        '',
        '- Lassi [parse]: no stock markers',
        '- Paneer 200g [fetch]: timed out',
        '',
        '⏰ Checked at: 2026-03-01 10:00:00 UTC',
      ].join('\n'),
    });
  });

  it('builds an order-independent signature', () => {
    expect(healthSignature(failures)).toBe('lassi:parse|paneer:fetch');
    expect(healthSignature([...failures].reverse())).toBe('lassi:parse|paneer:fetch');
  });
});
