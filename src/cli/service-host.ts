/**
 * Foreground host for a ServiceLifecycle.
 *
 * Starts the service, then waits for a termination signal and stops it.
 * A signal during start() stops the service as well.
 * A second signal while stopping is logged and otherwise ignored so the
 * in-flight upload can finish.
 */

import type { Logger } from 'pino';
import type { ServiceLifecycle } from '../daemon/types.js';
import { toError } from '../errors.js';

export interface ServiceHostOptions {
  logger: Logger;
  signals?: NodeJS.Signals[];
  /** Signal source (default: process) */
  emitter?: Pick<NodeJS.EventEmitter, 'on' | 'off'>;
}

/**
 * Run `service` until one of `signals` arrives.
 * Resolves after `stop()` completes; rejects if `start()` or `stop()` fails.
 */
export async function runService(service: ServiceLifecycle, options: ServiceHostOptions): Promise<void> {
  const logger = options.logger.child({ component: 'service-host' });
  const signals = options.signals ?? ['SIGINT', 'SIGTERM'];
  const emitter = options.emitter ?? process;

  interface StopRequest {
    signal: NodeJS.Signals;
    /** Settles with the stop failure, if any */
    done: Promise<Error | null>;
  }

  let requestStop: (request: StopRequest) => void = () => undefined;
  const stopRequested = new Promise<StopRequest>((resolve) => {
    requestStop = resolve;
  });

  let stopping = false;
  const onSignal = (signal: NodeJS.Signals): void => {
    if (stopping) {
      logger.warn({ signal }, 'Already stopping, waiting for the current upload to finish');
      return;
    }
    stopping = true;
    logger.info({ signal }, 'Shutting down');
    // Stopping right away also aborts a start() still waiting for the server
    requestStop({
      signal,
      done: service.stop().then(
        () => null,
        (err: unknown) => toError(err)
      ),
    });
  };

  for (const signal of signals) {
    emitter.on(signal, onSignal);
  }

  try {
    try {
      await service.start();
    } catch (err) {
      logger.error({ err: toError(err) }, 'Service failed to start');
      throw err;
    }

    const request = await stopRequested;
    const failure = await request.done;
    if (failure) {
      logger.error({ err: failure }, 'Service failed to stop cleanly');
      throw failure;
    }
    logger.info({ signal: request.signal }, 'Stopped');
  } finally {
    for (const signal of signals) {
      emitter.off(signal, onSignal);
    }
  }
}
