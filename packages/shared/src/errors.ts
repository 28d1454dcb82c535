export type ErrorKind = 'config' | 'fetch' | 'parse' | 'state_store' | 'notification';

export abstract class StockwatchError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Fatal: raised before any product is processed. */
export class ConfigError extends StockwatchError {
  readonly kind = 'config';
}

export type FetchFailureReason = 'network' | 'timeout' | 'http_status' | 'blocked' | 'renderer';

export class FetchError extends StockwatchError {
  readonly kind = 'fetch';
  readonly statusCode: number | null;

  constructor(
    message: string,
    readonly reason: FetchFailureReason,
    options?: { cause?: unknown; statusCode?: number | null },
  ) {
    super(message, options);
    this.statusCode = options?.statusCode ?? null;
  }
}

/** Expected page markers are missing; the page layout probably changed. */
export class ParseError extends StockwatchError {
  readonly kind = 'parse';
}

export class StateStoreError extends StockwatchError {
  readonly kind = 'state_store';
}

export class NotificationError extends StockwatchError {
  readonly kind = 'notification';

  constructor(
    message: string,
    readonly channel: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
