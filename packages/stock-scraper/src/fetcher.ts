import { FetchError, errorMessage } from '@stockwatch/shared';
import type { Product } from '@stockwatch/shared';
import { isBlockedStatus } from './page-signals.js';

export interface FetchedPage {
  url: string;
  html: string;
  statusCode: number | null;
  via: 'http' | 'browser';
}

export type PageFetcher = (product: Product) => Promise<FetchedPage>;

export interface FetchOptions {
  userAgent: string;
  timeoutSecs: number;
  maxRetries: number;
  proxyUrl?: string;
  /** Chromium binary for browser fetches; Playwright's bundled one otherwise */
  executablePath?: string;
}

export const DEFAULT_ACCEPT_HEADERS = {
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.5',
} as const;

const TIMEOUT_PATTERN = /timed? ?out|timeout/i;
const BLOCKED_PATTERN = /\bblocked\b|captcha/i;
const STATUS_PATTERN = /\b([45]\d{2})\b.*(status|error)|status code:? ?([45]\d{2})/i;
const RENDERER_PATTERN = /target (page, context or browser )?(has been )?closed|browser has disconnected|crash/i;

function describe(product: Pick<Product, 'id' | 'url'>, message: string): string {
  return `Fetching ${product.id} (${product.url}) failed: ${message}`;
}

/** Maps whatever a crawler reported into a {@link FetchError}. */
export function toFetchError(err: unknown, product: Pick<Product, 'id' | 'url'>): FetchError {
  if (err instanceof FetchError) return err;

  const message = errorMessage(err);
  if (TIMEOUT_PATTERN.test(message)) {
    return new FetchError(describe(product, message), 'timeout', { cause: err });
  }
  if (BLOCKED_PATTERN.test(message)) {
    return new FetchError(describe(product, message), 'blocked', { cause: err });
  }
  if (RENDERER_PATTERN.test(message)) {
    return new FetchError(describe(product, message), 'renderer', { cause: err });
  }

  const statusMatch = message.match(STATUS_PATTERN);
  if (statusMatch) {
    const statusCode = Number(statusMatch[1] ?? statusMatch[3]);
    // The crawler rejects some statuses before the request handler sees them
    const reason = isBlockedStatus(statusCode) ? 'blocked' : 'http_status';
    return new FetchError(describe(product, message), reason, { cause: err, statusCode });
  }

  return new FetchError(describe(product, message), 'network', { cause: err });
}
