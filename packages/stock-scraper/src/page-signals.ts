import type { CheerioAPI } from 'cheerio';
import type { PincodeSelectors, Product, StockSelectors } from '@stockwatch/shared';

export const DEFAULT_STOCK_SELECTORS: StockSelectors = {
  addToCart: [
    'button.add-to-cart',
    'button[name="add"]',
    '[data-action="add-to-cart"]',
    '#add-to-cart-button',
  ].join(', '),
  soldOut: ['div.alert.alert-danger', '.sold-out', '.out-of-stock'].join(', '),
  soldOutText: ['sold out', 'out of stock', 'currently unavailable'],
  price: ['[itemprop="price"]', '.product-price', '.price'].join(', '),
  title: 'h1',
};

export const DEFAULT_PINCODE_SELECTORS: PincodeSelectors = {
  modal: '#locationWidgetModal',
  input: '#search',
  submitButton: '.btn-success',
};

export const ADD_TO_CART_TEXT = /\badd\s+to\s+(cart|bag|basket)\b/i;

const SOFT_BLOCK_PATTERNS = [
  'verify you are human',
  'are you a robot',
  "sorry, we just need to make sure you're not a robot",
  'enter the characters you see below',
  'checking your browser before accessing',
];

const SOFT_BLOCK_WEAK_HINTS = ['captcha', 'robot', 'automated access', 'unusual traffic', 'access denied'];

export interface SoftBlockSignals {
  titleText: string | null;
  bodyText: string | null;
  hasStockMarkers: boolean;
}

export function resolveStockSelectors(product: Pick<Product, 'selectors'>): StockSelectors {
  return { ...DEFAULT_STOCK_SELECTORS, ...product.selectors };
}

export function resolvePincodeSelectors(product: Pick<Product, 'pincodeSelectors'>): PincodeSelectors {
  return { ...DEFAULT_PINCODE_SELECTORS, ...product.pincodeSelectors };
}

export function normalizeText(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

/**
 * Parses a displayed price into a two-decimal string. The right-most of `,`
 * and `.` is the decimal separator when both appear; a lone comma followed by
 * exactly three digits is a thousands separator.
 */
export function normalizePrice(raw: string | null | undefined): string | null {
  if (!raw) return null;
  const match = raw.match(/\d[\d\s.,]*/);
  if (!match) return null;

  let numeric = match[0].replace(/\s/g, '').replace(/[.,]+$/, '');
  const lastComma = numeric.lastIndexOf(',');
  const lastDot = numeric.lastIndexOf('.');

  if (lastComma !== -1 && lastDot !== -1) {
    numeric = lastComma > lastDot
      ? numeric.replace(/\./g, '').replace(',', '.')
      : numeric.replace(/,/g, '');
  } else if (lastComma !== -1) {
    const parts = numeric.split(',');
    numeric = parts.length === 2 && parts[1].length !== 3 ? parts.join('.') : parts.join('');
  } else {
    const parts = numeric.split('.');
    if (parts.length > 2) {
      const decimal = parts.pop() ?? '';
      numeric = `${parts.join('')}.${decimal}`;
    }
  }

  const parsed = Number.parseFloat(numeric);
  if (Number.isNaN(parsed)) return null;
  return parsed.toFixed(2);
}

export function isBlockedStatus(statusCode: number | null | undefined): boolean {
  return statusCode === 403 || statusCode === 429 || statusCode === 503;
}

export function isSuccessStatus(statusCode: number | null | undefined): boolean {
  return statusCode != null && statusCode >= 200 && statusCode < 300;
}

function normalizeForMatch(value: string | null | undefined): string {
  if (!value) return '';
  return normalizeText(value).toLowerCase();
}

export function isSoftBlockedSignals(signals: SoftBlockSignals): boolean {
  const title = normalizeForMatch(signals.titleText);
  const body = normalizeForMatch(signals.bodyText);

  const hasExplicitSoftBlockPattern = SOFT_BLOCK_PATTERNS.some(
    (pattern) => title.includes(pattern) || body.includes(pattern),
  );
  if (hasExplicitSoftBlockPattern) {
    return true;
  }

  if (signals.hasStockMarkers) {
    return false;
  }

  return SOFT_BLOCK_WEAK_HINTS.some((pattern) => body.includes(pattern));
}

export function findAddToCartControls($: CheerioAPI, selectors: StockSelectors) {
  const bySelector = $(selectors.addToCart);
  const byText = $('button, input[type="submit"], a[role="button"]').filter((_, el) => {
    const $el = $(el);
    const label = $el.is('input') ? ($el.attr('value') ?? '') : $el.text();
    return ADD_TO_CART_TEXT.test(normalizeText(label));
  });
  return bySelector.add(byText);
}

export function findSoldOutNotice($: CheerioAPI, selectors: StockSelectors): string | null {
  const phrases = selectors.soldOutText.map((phrase) => phrase.toLowerCase());
  let notice: string | null = null;

  $(selectors.soldOut).each((_, el) => {
    const text = normalizeText($(el).text());
    if (phrases.some((phrase) => text.toLowerCase().includes(phrase))) {
      notice = text;
      return false;
    }
    return undefined;
  });

  return notice;
}

export function isSoftBlockedPage($: CheerioAPI, selectors: StockSelectors): boolean {
  const hasStockMarkers =
    findAddToCartControls($, selectors).length > 0 || findSoldOutNotice($, selectors) !== null;

  return isSoftBlockedSignals({
    titleText: normalizeText($('title').first().text()) || null,
    bodyText: normalizeText($('body').text()) || null,
    hasStockMarkers,
  });
}
