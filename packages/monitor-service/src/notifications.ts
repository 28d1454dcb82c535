import type { NotificationEvent, Product, StockwatchError } from '@stockwatch/shared';

export interface RenderedMessage {
  subject: string;
  text: string;
}

export interface HealthFailure {
  product: Pick<Product, 'id' | 'name' | 'url'>;
  error: StockwatchError;
}

export function formatTimestamp(date: Date): string {
  return `${date.toISOString().slice(0, 19).replace('T', ' ')} UTC`;
}

// Plain text only: product titles come from scraped pages and must not be
// able to inject markup into chat messages.
export function formatStockAlert(event: NotificationEvent): RenderedMessage {
  const { product, observation } = event;
  const checkedAt = `⏰ Checked at: ${formatTimestamp(observation.observedAt)}`;
  const price = observation.price ? [`💰 Price: ${observation.price}`] : [];

  if (event.kind === 'restock') {
    return {
      subject: `STOCK ALERT: ${product.name} is available!`,
      text: [
        `✅ ${product.name} is now available!`,
        '',
        `🛒 Product URL: ${product.url}`,
        ...price,
        `📦 Status: ${observation.detail}`,
        checkedAt,
        '',
        'Visit the URL to buy it now.',
      ].join('\n'),
    };
  }

  return {
    subject: `STOCK UPDATE: ${product.name} is sold out`,
    text: [
      `❌ ${product.name} is no longer available.`,
      '',
      `🛒 Product URL: ${product.url}`,
      `📦 Status: ${observation.detail}`,
      checkedAt,
    ].join('\n'),
  };
}

export function formatHealthAlert(failures: HealthFailure[], checkedAt: Date): RenderedMessage {
  return {
    subject: `MONITOR HEALTH: ${failures.length} product check(s) failing`,
    text: [
      `⚠️ Stock monitor could not check ${failures.length} product(s):`,
      '',
      ...failures.map(({ product, error }) => `- ${product.name} [${error.kind}]: ${error.message}`),
      '',
      `⏰ Checked at: ${formatTimestamp(checkedAt)}`,
    ].join('\n'),
  };
}

/** Stable key for the set of failing checks, used to avoid repeating health alerts. */
export function healthSignature(failures: HealthFailure[]): string {
  return failures
    .map(({ product, error }) => `${product.id}:${error.kind}`)
    .sort()
    .join('|');
}
