import { randomUUID } from 'node:crypto';
import { ImpitHttpClient } from '@crawlee/impit-client';
import { CheerioCrawler, Configuration, ProxyConfiguration } from 'crawlee';
import { FetchError } from '@stockwatch/shared';
import type { Product } from '@stockwatch/shared';
import { DEFAULT_ACCEPT_HEADERS, toFetchError } from './fetcher.js';
import type { FetchOptions, FetchedPage } from './fetcher.js';
import {
  isBlockedStatus,
  isSoftBlockedPage,
  isSuccessStatus,
  resolveStockSelectors,
} from './page-signals.js';

/**
 * Fetches a product page over HTTP with a Chrome-impersonating client. The
 * crawler is built for this one request and torn down on every exit path.
 */
export async function fetchPageWithImpit(
  product: Product,
  options: FetchOptions,
): Promise<FetchedPage> {
  const results = new Map<string, FetchedPage>();
  const failures = new Map<string, Error>();

  const proxyConfiguration = options.proxyUrl
    ? new ProxyConfiguration({ proxyUrls: [options.proxyUrl] })
    : undefined;
  const selectors = resolveStockSelectors(product);

  const crawler = new CheerioCrawler(
    {
      httpClient: new ImpitHttpClient({ browser: 'chrome' }),
      proxyConfiguration,
      maxConcurrency: 1,
      maxRequestRetries: options.maxRetries,
      navigationTimeoutSecs: options.timeoutSecs,
      requestHandlerTimeoutSecs: options.timeoutSecs,
      requestHandler: async ({ $, body, response, request, log }) => {
        const statusCode = response?.statusCode ?? null;

        if (isBlockedStatus(statusCode) || isSoftBlockedPage($, selectors)) {
          const reason = isBlockedStatus(statusCode) ? `status=${statusCode}` : 'soft_block';
          log.warning(`Blocked on ${request.url} (${reason})`);
          throw new FetchError(`Blocked while fetching ${product.id} (${reason})`, 'blocked', {
            statusCode,
          });
        }
        if (!isSuccessStatus(statusCode)) {
          throw new FetchError(
            `Unexpected HTTP status ${statusCode ?? 'unknown'} for ${product.id}`,
            'http_status',
            { statusCode },
          );
        }

        results.set(product.id, {
          url: request.loadedUrl ?? request.url,
          html: typeof body === 'string' ? body : body.toString('utf8'),
          statusCode,
          via: 'http',
        });
      },
      failedRequestHandler: async (_context, error) => {
        failures.set(product.id, error);
      },
    },
    new Configuration({ persistStorage: false }),
  );

  try {
    await crawler.run([
      {
        url: product.url,
        uniqueKey: `${product.id}:${randomUUID()}`,
        userData: { productId: product.id },
        headers: { ...DEFAULT_ACCEPT_HEADERS, 'User-Agent': options.userAgent },
      },
    ]);
  } catch (err) {
    throw toFetchError(err, product);
  } finally {
    await crawler.teardown().catch(() => undefined);
  }

  const page = results.get(product.id);
  if (!page) {
    throw toFetchError(
      failures.get(product.id) ?? new Error('crawler finished without a response'),
      product,
    );
  }
  return page;
}
