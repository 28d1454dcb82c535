export * from './fetcher.js';
export * from './page-signals.js';
export { extractStockObservation } from './extractor.js';
export type { PageContent } from './extractor.js';
export { fetchPageWithImpit } from './http-fetcher.js';
export {
  browserCrawlerOptions,
  browserRequestHeaders,
  fetchPageWithBrowser,
  handlePincodeModal,
} from './browser-fetcher.js';
export { fetchWithFallback, createPageFetcher } from './fetch-with-fallback.js';
export type { PageFetcherDeps } from './fetch-with-fallback.js';
