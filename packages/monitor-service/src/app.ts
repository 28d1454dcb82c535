import { ConfigError } from '@stockwatch/shared';
import type { Sleep } from '@stockwatch/shared';
import { createPageFetcher } from '@stockwatch/stock-scraper';
import type { PageFetcher } from '@stockwatch/stock-scraper';
import { loadConfig } from './config.js';
import type { MonitorConfig } from './config.js';
import { configureLogging, createLogger } from './logger.js';
import type { Logger } from './logger.js';
import { createMonitor } from './monitor.js';
import { createChannels } from './notifier.js';
import type { ChannelFactories } from './notifier.js';
import { closeResources } from './shutdown.js';
import type { Closable } from './shutdown.js';
import { openSqliteStateStore } from './state-store.js';

export interface RunMonitorDeps {
  /** Aborting stops the loop once the product in flight is persisted */
  signal?: AbortSignal;
  fetchPage?: PageFetcher;
  channelFactories?: ChannelFactories;
  sleep?: Sleep;
  now?: () => Date;
  log?: Logger;
}

/**
 * Runs one batch or the continuous loop and resolves with the process exit
 * code: 1 for invalid configuration, 0 once the loop has finished, however
 * individual products fared. Start-up failures reject.
 */
export async function runMonitor(env: NodeJS.ProcessEnv, deps: RunMonitorDeps = {}): Promise<number> {
  let config: MonitorConfig;
  try {
    config = loadConfig(env);
  } catch (err) {
    if (err instanceof ConfigError) {
      (deps.log ?? createLogger('stock-monitor')).error(err.message);
      return 1;
    }
    throw err;
  }

  // Children copy the level when created, so build them after configuring.
  configureLogging(config.logLevel);
  const log = deps.log ?? createLogger('stock-monitor');
  const signal = deps.signal ?? new AbortController().signal;

  const resources: Closable[] = [];
  try {
    const store = openSqliteStateStore(config.stateDbPath);
    resources.push({ name: 'state store', close: () => store.close() });

    const channelSet = createChannels(config, deps.channelFactories);
    resources.push({ name: 'notification channels', close: () => channelSet.close() });

    const fetchLog = createLogger('fetcher');
    const fetchPage =
      deps.fetchPage ??
      createPageFetcher(config.fetch, {
        onProxyFallback: (product, directError) =>
          fetchLog.warning(
            `Direct fetch of ${product.name} was blocked (${directError.message}), retrying via proxy`,
          ),
      });

    const monitor = createMonitor({
      config,
      fetchPage,
      store,
      channels: channelSet.channels,
      healthChannels: channelSet.healthChannels,
      sleep: deps.sleep,
      now: deps.now,
      log,
    });

    log.info(
      `Monitoring ${config.products.length} product(s) via ${channelSet.channels.map((c) => c.name).join(', ')}`,
    );

    if (config.singleCheck) {
      await monitor.runCycle(signal);
    } else {
      await monitor.runContinuously(signal);
    }
  } finally {
    await closeResources(resources, log);
  }
  return 0;
}
