import { errorMessage } from '@stockwatch/shared';
import { runMonitor } from './app.js';
import { createLogger } from './logger.js';
import { createShutdownHandler } from './shutdown.js';

const log = createLogger('stock-monitor');
const controller = new AbortController();
const shutdown = createShutdownHandler(controller, log);
process.once('SIGTERM', shutdown);
process.once('SIGINT', shutdown);

runMonitor(process.env, { signal: controller.signal }).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    log.error(`Stock monitor failed to start: ${errorMessage(err)}`);
    process.exitCode = 1;
  },
);
