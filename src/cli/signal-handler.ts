/**
 * Signal Handler
 * Stops the relay gracefully on SIGTERM and SIGINT.
 */

import { createLogger } from '../utils/logger.js';

const logger = createLogger('signal-handler');

export type ShutdownSignal = 'SIGTERM' | 'SIGINT';

const SHUTDOWN_SIGNALS: readonly ShutdownSignal[] = ['SIGTERM', 'SIGINT'];

/**
 * Where signals come from; `process` in production
 */
export interface SignalSource {
  on(event: ShutdownSignal, listener: (signal: NodeJS.Signals) => void): unknown;
  removeListener(event: ShutdownSignal, listener: (signal: NodeJS.Signals) => void): unknown;
}

/**
 * Setup signal handlers for graceful shutdown.
 *
 * The first signal runs `stop` and then `exit(0)`; a second one while
 * stopping exits immediately with 1.
 *
 * @param stop - Stops the running relay
 * @param exit - Process exit
 * @param source - Emitter of the signals
 * @returns Function that removes the handlers
 */
export function setupSignalHandlers(
  stop: () => Promise<void>,
  exit: (code: number) => void = (code) => process.exit(code),
  source: SignalSource = process
): () => void {
  let shuttingDown = false;

  const onSignal = (signal: NodeJS.Signals): void => {
    if (shuttingDown) {
      logger.warn({ signal }, 'Received second shutdown signal, exiting immediately');
      exit(1);
      return;
    }
    shuttingDown = true;
    logger.info({ signal }, 'Received shutdown signal, initiating graceful shutdown');

    stop().then(
      () => exit(0),
      (error: unknown) => {
        logger.error(
          { error: error instanceof Error ? error.message : 'Unknown error' },
          'Graceful shutdown failed'
        );
        exit(1);
      }
    );
  };

  for (const signal of SHUTDOWN_SIGNALS) {
    source.on(signal, onSignal);
  }
  logger.debug('Signal handlers registered for SIGTERM and SIGINT');

  return () => {
    for (const signal of SHUTDOWN_SIGNALS) {
      source.removeListener(signal, onSignal);
    }
  };
}
