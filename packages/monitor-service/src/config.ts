import { z } from 'zod';
import {
  ConfigError,
  DEFAULT_CHECK_INTERVAL_SECONDS,
  DEFAULT_ERROR_BACKOFF_SECONDS,
  DEFAULT_PRODUCT_DELAY_SECONDS,
} from '@stockwatch/shared';
import type { PincodeSelectors, Product, StockSelectors } from '@stockwatch/shared';
import type { FetchOptions } from '@stockwatch/stock-scraper';
import type { LogLevelName } from './logger.js';

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export interface EmailConfig {
  smtpServer: string;
  smtpPort: number;
  senderEmail: string;
  senderPassword: string;
  recipientEmail: string;
}

export interface TelegramConfig {
  botToken: string;
  /** Chat and group targets; each one is notified separately */
  chatIds: readonly string[];
  adminChatId: string | null;
}

export interface MonitorConfig {
  products: readonly Product[];
  singleCheck: boolean;
  checkIntervalSeconds: number;
  productDelaySeconds: number;
  errorBackoffSeconds: number;
  fetch: FetchOptions;
  email: EmailConfig | null;
  telegram: TelegramConfig | null;
  notifyOutOfStock: boolean;
  stateDbPath: string;
  logLevel: LogLevelName;
}

function emptyToUndefined(v: unknown): unknown {
  return typeof v === 'string' && v.trim() === '' ? undefined : v;
}

function optionalString() {
  return z.preprocess(emptyToUndefined, z.string().trim().optional());
}

function booleanFlag(fallback: boolean) {
  return z
    .preprocess(
      (v) => (typeof v === 'string' ? emptyToUndefined(v.trim().toLowerCase()) : v),
      z.enum(['true', 'false', '1', '0', 'yes', 'no']).optional(),
    )
    .transform((v) => (v === undefined ? fallback : v === 'true' || v === '1' || v === 'yes'));
}

function seconds(fallback: number, { allowZero = false } = {}) {
  const base = z.coerce.number().int();
  return z.preprocess(
    emptyToUndefined,
    (allowZero ? base.nonnegative() : base.positive()).default(fallback),
  );
}

const selector = z.string().trim().min(1);

const productSchema = z
  .object({
    id: z.string().trim().min(1).optional(),
    name: z.string().trim().min(1).optional(),
    url: z.string().url(),
    use_browser: z.boolean().optional(),
    use_selenium: z.boolean().optional(),
    pincode: z
      .union([z.string(), z.number()])
      .transform(String)
      .pipe(z.string().regex(/^\d{3,10}$/, 'must be 3-10 digits'))
      .optional(),
    pincode_selectors: z
      .object({
        modal: selector.optional(),
        input: selector.optional(),
        submit_button: selector.optional(),
      })
      .optional(),
    selectors: z
      .object({
        add_to_cart: selector.optional(),
        sold_out: selector.optional(),
        sold_out_text: z.union([selector, z.array(selector).min(1)]).optional(),
        price: selector.optional(),
        title: selector.optional(),
      })
      .optional(),
  })
  .transform((raw): Product => {
    const pincodeSelectors: Partial<PincodeSelectors> = {};
    if (raw.pincode_selectors?.modal) pincodeSelectors.modal = raw.pincode_selectors.modal;
    if (raw.pincode_selectors?.input) pincodeSelectors.input = raw.pincode_selectors.input;
    if (raw.pincode_selectors?.submit_button) pincodeSelectors.submitButton = raw.pincode_selectors.submit_button;

    const selectors: Partial<StockSelectors> = {};
    const s = raw.selectors;
    if (s?.add_to_cart) selectors.addToCart = s.add_to_cart;
    if (s?.sold_out) selectors.soldOut = s.sold_out;
    if (s?.sold_out_text) {
      selectors.soldOutText = Array.isArray(s.sold_out_text) ? s.sold_out_text : [s.sold_out_text];
    }
    if (s?.price) selectors.price = s.price;
    if (s?.title) selectors.title = s.title;

    return {
      id: raw.id ?? raw.name ?? raw.url,
      name: raw.name ?? raw.id ?? raw.url,
      url: raw.url,
      useBrowser: raw.use_browser ?? raw.use_selenium ?? false,
      pincode: raw.pincode ?? null,
      pincodeSelectors,
      selectors,
    };
  });

const productsJson = z
  .string({ required_error: 'is required' })
  .transform((raw, ctx) => {
    try {
      const parsed: unknown = JSON.parse(raw);
      return parsed;
    } catch (err) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `is not valid JSON (${err instanceof Error ? err.message : String(err)})`,
      });
      return z.NEVER;
    }
  })
  .pipe(
    z
      .array(productSchema)
      .min(1, 'must list at least one product')
      .superRefine((products, ctx) => {
        const seen = new Set<string>();
        products.forEach((product, index) => {
          if (seen.has(product.id)) {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              path: [index, 'id'],
              message: `duplicate product id "${product.id}"`,
            });
          }
          seen.add(product.id);
        });
      }),
  );

const envSchema = z.object({
  PRODUCTS_JSON: productsJson,
  SINGLE_CHECK: booleanFlag(false),
  CHECK_INTERVAL: seconds(DEFAULT_CHECK_INTERVAL_SECONDS),
  PRODUCT_DELAY_SECONDS: seconds(DEFAULT_PRODUCT_DELAY_SECONDS, { allowZero: true }),
  ERROR_BACKOFF_SECONDS: seconds(DEFAULT_ERROR_BACKOFF_SECONDS, { allowZero: true }),
  FETCH_TIMEOUT_SECONDS: seconds(15),
  FETCH_RETRIES: seconds(1, { allowZero: true }),
  USER_AGENT: z.preprocess(emptyToUndefined, z.string().default(DEFAULT_USER_AGENT)),
  CHROME_BIN: optionalString(),
  PROXY_URL: z.preprocess(emptyToUndefined, z.string().url().optional()),

  SMTP_SERVER: z.preprocess(emptyToUndefined, z.string().default('smtp.gmail.com')),
  SMTP_PORT: z.preprocess(emptyToUndefined, z.coerce.number().int().min(1).max(65535).default(587)),
  SENDER_EMAIL: z.preprocess(emptyToUndefined, z.string().email().optional()),
  SENDER_PASSWORD: optionalString(),
  RECIPIENT_EMAIL: z.preprocess(emptyToUndefined, z.string().email().optional()),

  TELEGRAM_BOT_TOKEN: optionalString(),
  TELEGRAM_CHAT_ID: optionalString(),
  TELEGRAM_GROUP_ID: optionalString(),
  TELEGRAM_ADMIN_CHAT_ID: optionalString(),

  NOTIFY_OUT_OF_STOCK: booleanFlag(false),
  STATE_DB_PATH: z.preprocess(emptyToUndefined, z.string().default('data/stock-state.db')),
  LOG_LEVEL: z.preprocess(
    (v) => (typeof v === 'string' ? emptyToUndefined(v.trim().toLowerCase()) : v),
    z.enum(['debug', 'info', 'warning', 'error']).default('info'),
  ),
});

type Env = z.infer<typeof envSchema>;

function formatZodError(e: z.ZodError): string {
  return e.issues.map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`).join('\n');
}

function buildEmailConfig(env: Env, problems: string[]): EmailConfig | null {
  const { SENDER_EMAIL, SENDER_PASSWORD, RECIPIENT_EMAIL } = env;
  if (!SENDER_EMAIL && !SENDER_PASSWORD && !RECIPIENT_EMAIL) return null;

  if (!SENDER_EMAIL || !SENDER_PASSWORD || !RECIPIENT_EMAIL) {
    const missing = [
      !SENDER_EMAIL && 'SENDER_EMAIL',
      !SENDER_PASSWORD && 'SENDER_PASSWORD',
      !RECIPIENT_EMAIL && 'RECIPIENT_EMAIL',
    ].filter(Boolean);
    problems.push(`email: incomplete configuration, missing ${missing.join(', ')}`);
    return null;
  }

  return {
    smtpServer: env.SMTP_SERVER,
    smtpPort: env.SMTP_PORT,
    senderEmail: SENDER_EMAIL,
    senderPassword: SENDER_PASSWORD,
    recipientEmail: RECIPIENT_EMAIL,
  };
}

function buildTelegramConfig(env: Env, problems: string[]): TelegramConfig | null {
  const chatIds = [env.TELEGRAM_CHAT_ID, env.TELEGRAM_GROUP_ID].filter(
    (id): id is string => id !== undefined,
  );
  const adminChatId = env.TELEGRAM_ADMIN_CHAT_ID ?? null;

  if (!env.TELEGRAM_BOT_TOKEN) {
    if (chatIds.length > 0 || adminChatId) {
      problems.push('telegram: TELEGRAM_BOT_TOKEN is required when a Telegram chat id is set');
    }
    return null;
  }
  if (chatIds.length === 0) {
    problems.push('telegram: set TELEGRAM_CHAT_ID or TELEGRAM_GROUP_ID alongside TELEGRAM_BOT_TOKEN');
    return null;
  }

  return { botToken: env.TELEGRAM_BOT_TOKEN, chatIds: Object.freeze(chatIds), adminChatId };
}

/**
 * Validates the environment once at start-up. Throws a single
 * {@link ConfigError} listing every problem found.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): MonitorConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration:\n${formatZodError(parsed.error)}`);
  }
  const env = parsed.data;

  const problems: string[] = [];
  const email = buildEmailConfig(env, problems);
  const telegram = buildTelegramConfig(env, problems);
  if (problems.length === 0 && !email && !telegram) {
    problems.push('no notification channel configured (set the email or Telegram variables)');
  }
  if (problems.length > 0) {
    throw new ConfigError(`Invalid configuration:\n${problems.join('\n')}`);
  }

  return Object.freeze({
    products: Object.freeze(env.PRODUCTS_JSON.map((product) => Object.freeze(product))),
    singleCheck: env.SINGLE_CHECK,
    checkIntervalSeconds: env.CHECK_INTERVAL,
    productDelaySeconds: env.PRODUCT_DELAY_SECONDS,
    errorBackoffSeconds: env.ERROR_BACKOFF_SECONDS,
    fetch: Object.freeze({
      userAgent: env.USER_AGENT,
      timeoutSecs: env.FETCH_TIMEOUT_SECONDS,
      maxRetries: env.FETCH_RETRIES,
      proxyUrl: env.PROXY_URL,
      executablePath: env.CHROME_BIN,
    }),
    email: email && Object.freeze(email),
    telegram,
    notifyOutOfStock: env.NOTIFY_OUT_OF_STOCK,
    stateDbPath: env.STATE_DB_PATH,
    logLevel: env.LOG_LEVEL,
  });
}
