import { pino } from 'pino';
import type { Logger } from 'pino';

import { loadCoreConfig } from '../config.js';
import type { CoreConfig } from '../config.js';

export type { Logger };

let rootLogger: Logger | undefined;

export function createRootLogger(config: CoreConfig): Logger {
  return pino({ name: 'advmap', level: config.logLevel });
}

/**
 * Shared `advmap` logger, built on first use from the environment. A malformed
 * `ADVMAP_LOG_LEVEL` throws a ZodError here rather than when the package loads.
 */
export function getRootLogger(): Logger {
  if (!rootLogger) {
    rootLogger = createRootLogger(loadCoreConfig());
  }
  return rootLogger;
}

export function createLogger(module: string): Logger {
  return getRootLogger().child({ module });
}
