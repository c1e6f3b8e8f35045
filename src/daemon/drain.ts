/**
 * Buffered replay after a connectivity recovery.
 *
 * Entries are uploaded oldest first and leave the buffer as soon as they
 * succeed. When an upload fails the server is probed again. If it is
 * unreachable the drain stops and everything not yet uploaded stays
 * buffered for the next recovery. If it still answers, a TransportError is
 * retried after the next backoff tier with no attempt cap; any other failure
 * is retried up to `maxAttemptsWhileReachable` attempts, then logged and
 * discarded.
 */

import type { Logger } from 'pino';
import type { SleepFn } from '../connectivity/types.js';
import { TransportError, errorCode, toError } from '../errors.js';
import type { UploadBuffer } from './upload-buffer.js';

export interface DrainDependencies {
  /** Upload one file (metadata lookup included) */
  upload: (filePath: string) => Promise<void>;
  /** Re-probe the server after a failed upload */
  checkReachable: () => Promise<boolean>;
  maxAttemptsWhileReachable: number;
  /** Waits between TransportError retries, one tier per consecutive failure */
  backoffTiersMs: readonly number[];
  sleep: SleepFn;
  /** Ends the drain between uploads and during backoff waits */
  signal: AbortSignal;
  logger: Logger;
  onUploaded?: (filePath: string) => void;
  onDiscarded?: (filePath: string, error: Error) => void;
}

export type DrainStatus = 'drained' | 'disconnected' | 'stopped';

export interface DrainOutcome {
  status: DrainStatus;
  uploaded: string[];
  discarded: string[];
  /** Entries left in the buffer */
  remaining: number;
}

export async function drainAndUploadAll(buffer: UploadBuffer, deps: DrainDependencies): Promise<DrainOutcome> {
  const logger = deps.logger.child({ component: 'drain' });
  const outcome: DrainOutcome = { status: 'drained', uploaded: [], discarded: [], remaining: 0 };

  logger.info({ pending: buffer.size }, 'Uploading buffered files');

  let attempts = 0;
  let transportFailures = 0;
  let next = buffer.peek();
  while (next !== undefined) {
    if (deps.signal.aborted) {
      outcome.status = 'stopped';
      break;
    }

    const filePath = next;
    try {
      await deps.upload(filePath);
      buffer.shift();
      attempts = 0;
      transportFailures = 0;
      outcome.uploaded.push(filePath);
      deps.onUploaded?.(filePath);
    } catch (err) {
      const error = toError(err);

      if (!(await deps.checkReachable())) {
        logger.warn(
          { path: filePath, code: errorCode(err), remaining: buffer.size },
          'Connectivity lost during drain, keeping remaining files buffered'
        );
        outcome.status = 'disconnected';
        break;
      }

      if (err instanceof TransportError) {
        const delayMs = tierDelay(deps.backoffTiersMs, transportFailures);
        transportFailures++;
        logger.warn(
          { path: filePath, code: errorCode(err), attempt: transportFailures, delayMs },
          'Buffered upload failed while the server answers, retrying after backoff'
        );
        try {
          await deps.sleep(delayMs, deps.signal);
        } catch (sleepErr) {
          if (!deps.signal.aborted) throw sleepErr;
          outcome.status = 'stopped';
          break;
        }
      } else {
        attempts++;
        if (attempts >= deps.maxAttemptsWhileReachable) {
          buffer.shift();
          attempts = 0;
          transportFailures = 0;
          outcome.discarded.push(filePath);
          logger.error(
            { path: filePath, code: errorCode(err), err: error, attempts: deps.maxAttemptsWhileReachable },
            'Giving up on buffered file'
          );
          deps.onDiscarded?.(filePath, error);
        } else {
          logger.warn({ path: filePath, code: errorCode(err), attempt: attempts }, 'Buffered upload failed, retrying');
        }
      }
    }
    next = buffer.peek();
  }

  outcome.remaining = buffer.size;

  logger.info(
    {
      status: outcome.status,
      uploaded: outcome.uploaded.length,
      discarded: outcome.discarded.length,
      remaining: outcome.remaining,
    },
    'Drain finished'
  );
  return outcome;
}

function tierDelay(tiers: readonly number[], failures: number): number {
  return tiers[Math.min(failures, tiers.length - 1)] ?? 0;
}
