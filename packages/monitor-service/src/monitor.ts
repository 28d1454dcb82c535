import {
  ParseError,
  StateStoreError,
  StockwatchError,
  errorMessage,
  secondsToMs,
  sleep as defaultSleep,
} from '@stockwatch/shared';
import type {
  NotificationEvent,
  Product,
  Sleep,
  StockObservation,
  TransitionKind,
} from '@stockwatch/shared';
import { extractStockObservation, toFetchError } from '@stockwatch/stock-scraper';
import type { PageFetcher } from '@stockwatch/stock-scraper';
import type { MonitorConfig } from './config.js';
import type { Logger } from './logger.js';
import { formatHealthAlert, formatStockAlert, healthSignature } from './notifications.js';
import type { HealthFailure } from './notifications.js';
import { dispatchNotification } from './notifier.js';
import type { DeliveryResult, NotificationChannel } from './notifier.js';
import type { StateStore } from './state-store.js';
import { detectTransition, toNotificationEvent } from './transitions.js';

export type MonitorPhase =
  | 'idle'
  | 'fetching'
  | 'extracting'
  | 'comparing'
  | 'notifying'
  | 'persisting'
  | 'waiting';

export const HEALTH_SIGNATURE_KEY = 'health.signature';

export interface MonitorDeps {
  config: Pick<
    MonitorConfig,
    'products' | 'notifyOutOfStock' | 'productDelaySeconds' | 'checkIntervalSeconds' | 'errorBackoffSeconds'
  >;
  fetchPage: PageFetcher;
  extract?: typeof extractStockObservation;
  store: StateStore;
  channels: readonly NotificationChannel[];
  healthChannels?: readonly NotificationChannel[];
  sleep?: Sleep;
  now?: () => Date;
  log: Logger;
  onPhase?: (phase: MonitorPhase, product: Product | null) => void;
}

export type ProductOutcome =
  | {
      product: Product;
      ok: true;
      transition: TransitionKind;
      observation: StockObservation;
      event: NotificationEvent | null;
      deliveries: DeliveryResult[];
    }
  | { product: Product; ok: false; error: StockwatchError };

export interface CycleReport {
  startedAt: Date;
  finishedAt: Date;
  outcomes: ProductOutcome[];
  events: NotificationEvent[];
  errors: HealthFailure[];
  aborted: boolean;
}

export interface Monitor {
  checkProduct(product: Product): Promise<ProductOutcome>;
  runCycle(signal?: AbortSignal): Promise<CycleReport>;
  /** Resolves with the number of completed cycles once `signal` aborts. */
  runContinuously(signal: AbortSignal): Promise<number>;
}

function classifyFailure(err: unknown, phase: MonitorPhase, product: Product): StockwatchError {
  if (err instanceof StockwatchError) return err;
  switch (phase) {
    case 'fetching':
      return toFetchError(err, product);
    case 'extracting':
      return new ParseError(`Extracting ${product.id} failed: ${errorMessage(err)}`, { cause: err });
    default:
      return new StateStoreError(`Checking ${product.id} failed while ${phase}: ${errorMessage(err)}`, {
        cause: err,
      });
  }
}

export function createMonitor(deps: MonitorDeps): Monitor {
  const {
    config,
    fetchPage,
    store,
    channels,
    log,
    extract = extractStockObservation,
    healthChannels = [],
    sleep = defaultSleep,
    now = () => new Date(),
    onPhase,
  } = deps;

  async function checkProduct(product: Product): Promise<ProductOutcome> {
    let phase: MonitorPhase = 'idle';
    const enter = (next: MonitorPhase) => {
      phase = next;
      onPhase?.(next, product);
    };

    try {
      enter('fetching');
      const page = await fetchPage(product);

      enter('extracting');
      const observation = extract(page, product, now());

      enter('comparing');
      const previous = await store.read(product.id);
      const transition = detectTransition(previous, observation);
      const event = toNotificationEvent(transition, product, previous, observation, config);

      let deliveries: DeliveryResult[] = [];
      if (event) {
        enter('notifying');
        deliveries = await dispatchNotification(formatStockAlert(event), channels, log);
      }

      enter('persisting');
      await store.write(product.id, observation);

      if (transition === 'first_observation') {
        log.info(`Recorded first observation for ${product.name}: ${observation.status}`);
      } else if (transition === 'restock') {
        log.info(`ALERT: ${product.name} is NOW IN STOCK!`);
      } else if (observation.status === 'available') {
        log.info(`OK: ${product.name} is in stock`);
      } else {
        log.info(`WAITING: ${product.name} is out of stock`);
      }

      return { product, ok: true, transition, observation, event, deliveries };
    } catch (err) {
      const error = classifyFailure(err, phase, product);
      if (error.kind === 'parse') {
        log.error(`Stock markers missing for ${product.name}, the page layout may have changed: ${error.message}`);
      } else {
        log.warning(`Skipping ${product.name} this cycle: ${error.message}`);
      }
      return { product, ok: false, error };
    } finally {
      onPhase?.('idle', product);
    }
  }

  async function reportHealth(failures: HealthFailure[], checkedAt: Date): Promise<void> {
    if (healthChannels.length === 0) return;

    try {
      const previous = await store.readMeta(HEALTH_SIGNATURE_KEY);
      if (failures.length === 0) {
        if (previous !== null) {
          log.info('All product checks are healthy again');
          await store.writeMeta(HEALTH_SIGNATURE_KEY, null);
        }
        return;
      }

      const signature = healthSignature(failures);
      if (signature === previous) {
        log.debug('Failing checks unchanged since the last health alert');
        return;
      }

      const deliveries = await dispatchNotification(
        formatHealthAlert(failures, checkedAt),
        healthChannels,
        log,
      );
      if (deliveries.some((delivery) => delivery.ok)) {
        await store.writeMeta(HEALTH_SIGNATURE_KEY, signature);
      }
    } catch (err) {
      log.error(`Health alert bookkeeping failed: ${errorMessage(err)}`);
    }
  }

  async function runCycle(signal?: AbortSignal): Promise<CycleReport> {
    const startedAt = now();
    const outcomes: ProductOutcome[] = [];
    let aborted = false;

    log.info(`Starting stock check of ${config.products.length} product(s)`);

    for (const [index, product] of config.products.entries()) {
      if (index > 0 && config.productDelaySeconds > 0) {
        await sleep(secondsToMs(config.productDelaySeconds), signal);
      }
      if (signal?.aborted) {
        aborted = true;
        break;
      }

      log.info(`Checking ${product.name}...`);
      outcomes.push(await checkProduct(product));
    }

    const errors: HealthFailure[] = [];
    const events: NotificationEvent[] = [];
    for (const outcome of outcomes) {
      if (!outcome.ok) {
        errors.push({ product: outcome.product, error: outcome.error });
      } else if (outcome.event) {
        events.push(outcome.event);
      }
    }

    if (!aborted) {
      await reportHealth(errors, now());
    }

    const finishedAt = now();
    log.info(
      `Check finished: ${outcomes.length - errors.length} ok, ${errors.length} failed, ${events.length} notification(s)` +
        (aborted ? ' (aborted)' : ''),
    );

    return { startedAt, finishedAt, outcomes, events, errors, aborted };
  }

  async function runContinuously(signal: AbortSignal): Promise<number> {
    let cycles = 0;
    log.info('Starting continuous stock monitor...');

    while (!signal.aborted) {
      let waitSeconds = config.checkIntervalSeconds;
      try {
        await runCycle(signal);
        cycles += 1;
      } catch (err) {
        log.exception(err instanceof Error ? err : new Error(String(err)), 'Unexpected error during check cycle');
        waitSeconds = config.errorBackoffSeconds;
      }
      if (signal.aborted) break;

      onPhase?.('waiting', null);
      log.info(`Waiting ${waitSeconds} seconds before next check...`);
      await sleep(secondsToMs(waitSeconds), signal);
      onPhase?.('idle', null);
    }

    log.info('Monitor stopped');
    return cycles;
  }

  return { checkProduct, runCycle, runContinuously };
}
