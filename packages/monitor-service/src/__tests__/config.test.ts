import { describe, it, expect } from 'vitest';
import { ConfigError } from '@stockwatch/shared';
import { DEFAULT_USER_AGENT, loadConfig } from '../config.js';

const PRODUCTS = JSON.stringify([
  { id: 'paneer', name: 'Paneer 200g', url: 'https://shop.example.test/paneer' },
]);

function env(overrides: Record<string, string | undefined> = {}): NodeJS.ProcessEnv {
  return {
    PRODUCTS_JSON: PRODUCTS,
    TELEGRAM_BOT_TOKEN: 'test-secret',
    TELEGRAM_CHAT_ID: '1001',
    ...overrides,
  };
}

function configError(source: NodeJS.ProcessEnv): ConfigError {
  try {
    loadConfig(source);
  } catch (err) {
    if (err instanceof ConfigError) return err;
    throw err;
  }
  throw new Error('expected loadConfig to throw');
}

describe('loadConfig', () => {
  it('applies defaults for every optional setting', () => {
    const config = loadConfig(env());

    expect(config.singleCheck).toBe(false);
    expect(config.checkIntervalSeconds).toBe(300);
    expect(config.productDelaySeconds).toBe(2);
    expect(config.errorBackoffSeconds).toBe(60);
    expect(config.notifyOutOfStock).toBe(false);
    expect(config.stateDbPath).toBe('data/stock-state.db');
    expect(config.logLevel).toBe('info');
    expect(config.email).toBeNull();
    expect(config.fetch).toEqual({
      userAgent: DEFAULT_USER_AGENT,
      timeoutSecs: 15,
      maxRetries: 1,
      proxyUrl: undefined,
      executablePath: undefined,
    });
    expect(config.telegram).toEqual({ botToken: 'test-secret', chatIds: ['1001'], adminChatId: null });
  });

  it('parses a minimal product entry', () => {
    const config = loadConfig(env());

    expect(config.products).toEqual([
      {
        id: 'paneer',
        name: 'Paneer 200g',
        url: 'https://shop.example.test/paneer',
        useBrowser: false,
        pincode: null,
        pincodeSelectors: {},
        selectors: {},
      },
    ]);
  });

  it('maps snake_case product options onto the product', () => {
    const products = JSON.stringify([
      {
        id: 'lassi',
        url: 'https://shop.example.test/lassi',
        use_selenium: true,
        pincode: 110001,
        pincode_selectors: { submit_button: '.go' },
        selectors: { sold_out_text: 'Sold out', price: '.amount' },
      },
    ]);

    const [product] = loadConfig(env({ PRODUCTS_JSON: products })).products;

    expect(product).toEqual({
      id: 'lassi',
      name: 'lassi',
      url: 'https://shop.example.test/lassi',
      useBrowser: true,
      pincode: '110001',
      pincodeSelectors: { submitButton: '.go' },
      selectors: { soldOutText: ['Sold out'], price: '.amount' },
    });
  });

  it('reads flags, intervals and the log level', () => {
    const config = loadConfig(
      env({
        SINGLE_CHECK: 'yes',
        NOTIFY_OUT_OF_STOCK: 'TRUE',
        CHECK_INTERVAL: '60',
        PRODUCT_DELAY_SECONDS: '0',
        LOG_LEVEL: 'WARNING',
      }),
    );

    expect(config.singleCheck).toBe(true);
    expect(config.notifyOutOfStock).toBe(true);
    expect(config.checkIntervalSeconds).toBe(60);
    expect(config.productDelaySeconds).toBe(0);
    expect(config.logLevel).toBe('warning');
  });

  it('treats empty strings as unset', () => {
    const config = loadConfig(env({ USER_AGENT: '', CHROME_BIN: '  ', CHECK_INTERVAL: '' }));

    expect(config.fetch.userAgent).toBe(DEFAULT_USER_AGENT);
    expect(config.fetch.executablePath).toBeUndefined();
    expect(config.checkIntervalSeconds).toBe(300);
  });

  it('rejects a zero check interval', () => {
    expect(configError(env({ CHECK_INTERVAL: '0' })).message).toMatch(/^Invalid configuration:\nCHECK_INTERVAL: /);
  });

  it('requires PRODUCTS_JSON', () => {
    expect(configError(env({ PRODUCTS_JSON: undefined })).message).toBe(
      'Invalid configuration:\nPRODUCTS_JSON: is required',
    );
  });

  it('reports malformed product JSON', () => {
    expect(configError(env({ PRODUCTS_JSON: '[{' })).message).toMatch(/PRODUCTS_JSON: is not valid JSON/);
  });

  it('rejects an empty product list', () => {
    expect(configError(env({ PRODUCTS_JSON: '[]' })).message).toBe(
      'Invalid configuration:\nPRODUCTS_JSON: must list at least one product',
    );
  });

  it('rejects duplicate product ids', () => {
    const products = JSON.stringify([
      { id: 'paneer', url: 'https://shop.example.test/a' },
      { id: 'paneer', url: 'https://shop.example.test/b' },
    ]);

    expect(configError(env({ PRODUCTS_JSON: products })).message).toBe(
      'Invalid configuration:\nPRODUCTS_JSON.1.id: duplicate product id "paneer"',
    );
  });

  it('builds the email channel when all email settings are present', () => {
    const config = loadConfig(
      env({
        SMTP_PORT: '465',
        SENDER_EMAIL: 'bot@example.test',
        SENDER_PASSWORD: 'test-secret',
        RECIPIENT_EMAIL: 'me@example.test',
      }),
    );

    expect(config.email).toEqual({
      smtpServer: 'smtp.gmail.com',
      smtpPort: 465,
      senderEmail: 'bot@example.test',
      senderPassword: 'test-secret',
      recipientEmail: 'me@example.test',
    });
  });

  it('lists the missing variables of a partial email configuration', () => {
    expect(configError(env({ SENDER_EMAIL: 'bot@example.test' })).message).toBe(
      'Invalid configuration:\nemail: incomplete configuration, missing SENDER_PASSWORD, RECIPIENT_EMAIL',
    );
  });

  it('requires a bot token when a Telegram chat id is set', () => {
    expect(configError(env({ TELEGRAM_BOT_TOKEN: undefined })).message).toBe(
      'Invalid configuration:\ntelegram: TELEGRAM_BOT_TOKEN is required when a Telegram chat id is set',
    );
  });

  it('notifies both the chat and the group', () => {
    const config = loadConfig(env({ TELEGRAM_GROUP_ID: '-2002', TELEGRAM_ADMIN_CHAT_ID: '3003' }));

    expect(config.telegram).toEqual({
      botToken: 'test-secret',
      chatIds: ['1001', '-2002'],
      adminChatId: '3003',
    });
  });

  it('fails when no notification channel is configured', () => {
    expect(
      configError({ PRODUCTS_JSON: PRODUCTS }).message,
    ).toBe('Invalid configuration:\nno notification channel configured (set the email or Telegram variables)');
  });
});
