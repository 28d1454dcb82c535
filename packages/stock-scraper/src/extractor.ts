import { load, type CheerioAPI } from 'cheerio';
import { ParseError } from '@stockwatch/shared';
import type { Product, StockObservation, StockSelectors } from '@stockwatch/shared';
import {
  findAddToCartControls,
  findSoldOutNotice,
  normalizePrice,
  normalizeText,
  resolveStockSelectors,
} from './page-signals.js';

export interface PageContent {
  url: string;
  html: string;
}

interface AttributeReader {
  attr(name: string): string | undefined;
}

function isDisabledControl($el: AttributeReader): boolean {
  if ($el.attr('disabled') !== undefined) return true;
  if ($el.attr('aria-disabled') === 'true') return true;
  return ($el.attr('class') ?? '').split(/\s+/).includes('disabled');
}

function extractPrice($: CheerioAPI, selectors: StockSelectors): string | null {
  const $price = $(selectors.price).first();
  if ($price.length === 0) return null;
  const content = $price.attr('content');
  return normalizePrice(content ?? normalizeText($price.text()));
}

function extractTitle($: CheerioAPI, selectors: StockSelectors): string | null {
  return normalizeText($(selectors.title).first().text()) || null;
}

/**
 * Reads the stock status off a product page. A sold-out notice wins over an
 * add-to-cart control; a page with neither is a {@link ParseError}, never
 * "unavailable".
 */
export function extractStockObservation(
  page: PageContent,
  product: Pick<Product, 'id' | 'selectors'>,
  observedAt: Date,
): StockObservation {
  const $ = load(page.html);
  const selectors = resolveStockSelectors(product);
  const base = {
    productId: product.id,
    price: extractPrice($, selectors),
    title: extractTitle($, selectors),
    observedAt,
  };

  const soldOutNotice = findSoldOutNotice($, selectors);
  if (soldOutNotice !== null) {
    return { ...base, status: 'unavailable', detail: `Sold-out notice found: "${soldOutNotice}"` };
  }

  const controls = findAddToCartControls($, selectors);
  if (controls.length > 0) {
    const enabled = controls.toArray().some((el) => !isDisabledControl($(el)));
    return enabled
      ? { ...base, status: 'available', detail: 'Add-to-cart control is enabled' }
      : { ...base, status: 'unavailable', detail: 'Add-to-cart control is disabled' };
  }

  throw new ParseError(
    `No stock markers found for ${product.id} on ${page.url} (neither a sold-out notice nor an add-to-cart control)`,
  );
}
