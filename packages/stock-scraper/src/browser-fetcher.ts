import { randomUUID } from 'node:crypto';
import { Configuration, PlaywrightCrawler, ProxyConfiguration } from 'crawlee';
import type { Log, PlaywrightCrawlerOptions } from 'crawlee';
import { chromium } from 'playwright';
import type { Page } from 'playwright';
import { load } from 'cheerio';
import { FetchError } from '@stockwatch/shared';
import type { Product } from '@stockwatch/shared';
import { DEFAULT_ACCEPT_HEADERS, toFetchError } from './fetcher.js';
import type { FetchOptions, FetchedPage } from './fetcher.js';
import {
  isBlockedStatus,
  isSoftBlockedPage,
  isSuccessStatus,
  resolvePincodeSelectors,
  resolveStockSelectors,
} from './page-signals.js';

const MODAL_APPEAR_TIMEOUT_MS = 5_000;
const MODAL_STEP_TIMEOUT_MS = 10_000;
const MODAL_SETTLE_MS = 2_000;

/**
 * Fills the delivery-location modal some retailers show before revealing
 * stock. Pages without an active modal are left untouched.
 */
export async function handlePincodeModal(
  page: Page,
  product: Pick<Product, 'pincode' | 'pincodeSelectors'>,
  log: Pick<Log, 'info' | 'warning'>,
): Promise<void> {
  const { pincode } = product;
  if (!pincode) return;

  const selectors = resolvePincodeSelectors(product);
  const modal = page.locator(selectors.modal).first();
  const input = page.locator(selectors.input).first();

  try {
    await modal.waitFor({ state: 'visible', timeout: MODAL_APPEAR_TIMEOUT_MS });
    await input.waitFor({ state: 'visible', timeout: MODAL_APPEAR_TIMEOUT_MS });
  } catch {
    log.info('No active pincode modal found');
    return;
  }

  await input.fill(pincode);
  log.info(`Entered pincode ${pincode}`);

  const suggestion = page
    .locator('p.item-name')
    .filter({ hasText: new RegExp(`^\\s*${pincode}\\s*$`) })
    .first();
  try {
    await suggestion.click({ timeout: MODAL_STEP_TIMEOUT_MS });
  } catch {
    log.warning(`No dropdown entry for pincode ${pincode}, submitting as typed`);
  }

  const submit = page.locator(selectors.submitButton).first();
  if ((await submit.count()) > 0) {
    await submit.click();
  } else {
    await input.press('Enter');
  }

  await modal.waitFor({ state: 'hidden', timeout: MODAL_STEP_TIMEOUT_MS });
  await page.waitForTimeout(MODAL_SETTLE_MS);
}

export function browserRequestHeaders(options: Pick<FetchOptions, 'userAgent'>): Record<string, string> {
  return { ...DEFAULT_ACCEPT_HEADERS, 'User-Agent': options.userAgent };
}

interface BrowserFetchSink {
  results: Map<string, FetchedPage>;
  failures: Map<string, Error>;
}

/**
 * Crawler options for a single browser fetch. Fingerprinting stays off so the
 * configured user agent is the one the page sees.
 */
export function browserCrawlerOptions(
  product: Product,
  options: FetchOptions,
  { results, failures }: BrowserFetchSink,
): PlaywrightCrawlerOptions {
  const proxyConfiguration = options.proxyUrl
    ? new ProxyConfiguration({ proxyUrls: [options.proxyUrl] })
    : undefined;
  const selectors = resolveStockSelectors(product);

  return {
    proxyConfiguration,
    maxConcurrency: 1,
    maxRequestRetries: options.maxRetries,
    navigationTimeoutSecs: options.timeoutSecs,
    requestHandlerTimeoutSecs: options.timeoutSecs + 30,
    headless: true,
    browserPoolOptions: { useFingerprints: false },
    launchContext: {
      launcher: chromium,
      userAgent: options.userAgent,
      launchOptions: {
        executablePath: options.executablePath,
        args: [
          '--no-sandbox',
          '--disable-dev-shm-usage',
          '--disable-gpu',
          '--disable-blink-features=AutomationControlled',
        ],
      },
    },
    preNavigationHooks: [
      async ({ page }) => {
        // Stock markers live in the markup; skip heavy assets
        await page.route('**/*', (route) => {
          const type = route.request().resourceType();
          if (['image', 'font', 'media'].includes(type)) {
            return route.abort();
          }
          return route.continue();
        });
        await page.setExtraHTTPHeaders(browserRequestHeaders(options));
      },
    ],
    requestHandler: async ({ page, request, response, log }) => {
      const statusCode = response?.status() ?? null;
      log.info(`Rendering ${request.url}`);

      if (isBlockedStatus(statusCode)) {
        throw new FetchError(`Blocked while fetching ${product.id} (status=${statusCode})`, 'blocked', {
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

      await page.waitForLoadState('load', { timeout: options.timeoutSecs * 1000 });
      await handlePincodeModal(page, product, log);

      const html = await page.content();
      if (isSoftBlockedPage(load(html), selectors)) {
        log.warning(`Blocked on ${request.url} (soft_block)`);
        throw new FetchError(`Blocked while fetching ${product.id} (soft_block)`, 'blocked', {
          statusCode,
        });
      }

      results.set(product.id, { url: page.url(), html, statusCode, via: 'browser' });
    },
    failedRequestHandler: async (_context, error) => {
      failures.set(product.id, error);
    },
  };
}

/**
 * Renders a product page in headless Chromium. The browser lives only for
 * this call: the crawler is torn down in `finally`, whichever way it ends.
 */
export async function fetchPageWithBrowser(
  product: Product,
  options: FetchOptions,
): Promise<FetchedPage> {
  const results = new Map<string, FetchedPage>();
  const failures = new Map<string, Error>();

  const crawler = new PlaywrightCrawler(
    browserCrawlerOptions(product, options, { results, failures }),
    new Configuration({ persistStorage: false }),
  );

  try {
    await crawler.run([
      {
        url: product.url,
        uniqueKey: `${product.id}:${randomUUID()}`,
        userData: { productId: product.id },
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
      failures.get(product.id) ?? new Error('browser crawler finished without a response'),
      product,
    );
  }
  return page;
}
