import { FetchError } from '@stockwatch/shared';
import type { Product } from '@stockwatch/shared';
import { fetchPageWithBrowser } from './browser-fetcher.js';
import { fetchPageWithImpit } from './http-fetcher.js';
import type { FetchOptions, FetchedPage, PageFetcher } from './fetcher.js';

type FetchVia = (product: Product, options: FetchOptions) => Promise<FetchedPage>;

interface FetchWithFallbackInput {
  product: Product;
  options: FetchOptions;
  fetch: FetchVia;
  onProxyFallback?: (product: Product, directError: FetchError) => void;
}

/**
 * Fetches directly first; a `blocked` failure is retried once through the
 * proxy when one is configured. Every other failure propagates as is.
 */
export async function fetchWithFallback({
  product,
  options,
  fetch,
  onProxyFallback,
}: FetchWithFallbackInput): Promise<FetchedPage> {
  const { proxyUrl, ...directOptions } = options;

  try {
    return await fetch(product, directOptions);
  } catch (err) {
    const blocked = err instanceof FetchError && err.reason === 'blocked';
    if (!blocked || !proxyUrl) {
      throw err;
    }

    onProxyFallback?.(product, err);
    return fetch(product, { ...directOptions, proxyUrl });
  }
}

export interface PageFetcherDeps {
  http?: FetchVia;
  browser?: FetchVia;
  onProxyFallback?: (product: Product, directError: FetchError) => void;
}

/** Routes each product to the browser or the HTTP fetcher. */
export function createPageFetcher(options: FetchOptions, deps: PageFetcherDeps = {}): PageFetcher {
  const http = deps.http ?? fetchPageWithImpit;
  const browser = deps.browser ?? fetchPageWithBrowser;

  return (product) =>
    fetchWithFallback({
      product,
      options,
      fetch: product.useBrowser ? browser : http,
      onProxyFallback: deps.onProxyFallback,
    });
}
