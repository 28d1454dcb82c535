import type { Logger } from './logger.js';

export interface Closable {
  name: string;
  close(): Promise<void>;
}

/**
 * Signal handler that only stops the run loop. The product being checked
 * finishes and is persisted; resources are released by whoever owns them.
 */
export function createShutdownHandler(
  controller: Pick<AbortController, 'abort' | 'signal'>,
  log: Pick<Logger, 'info'>,
): (signal: NodeJS.Signals) => void {
  return (signal) => {
    if (controller.signal.aborted) return;
    log.info(`Received ${signal}, stopping after the current product...`);
    controller.abort();
  };
}

export async function closeResources(
  closables: readonly Closable[],
  log: Pick<Logger, 'error'>,
): Promise<void> {
  const results = await Promise.allSettled(closables.map((c) => c.close()));
  results.forEach((result, index) => {
    if (result.status === 'rejected') {
      log.error(`Error closing ${closables[index].name}: ${String(result.reason)}`);
    }
  });
}
