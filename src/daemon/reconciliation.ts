/**
 * Startup reconciliation pass.
 *
 * Indexes the roots, submits every digest in one request and hands each
 * accepted path to `onAccepted`. Rejected entries (content the server
 * already holds) are only logged. Reconciliation is advisory: a response
 * the client could not parse yields no accepted files this round.
 */

import type { Logger } from 'pino';
import type { AssetServer, ReconciliationDecision } from '../client/types.js';
import { ChecksumIndexer } from '../indexer/checksum-indexer.js';

export interface ReconciliationOptions {
  client: Pick<AssetServer, 'reconcile'>;
  isSupported: (filePath: string) => boolean;
  registerDirectory?: (dirPath: string) => void;
  /** Called once per accepted path, in decision order */
  onAccepted: (filePath: string) => Promise<void>;
  logger: Logger;
}

export interface ReconciliationSummary {
  indexed: number;
  skipped: number;
  accepted: number;
  rejected: number;
  /** Decisions naming a path that was never submitted */
  unknown: number;
}

/**
 * Run one pass over `roots`.
 *
 * @throws TransportError / ServerRejection from the reconcile request;
 *   nothing has been uploaded in that case
 */
export async function runReconciliation(
  roots: readonly string[],
  options: ReconciliationOptions
): Promise<ReconciliationSummary> {
  const logger = options.logger.child({ component: 'reconciliation' });
  const indexer = new ChecksumIndexer({
    isSupported: options.isSupported,
    registerDirectory: options.registerDirectory,
    logger: options.logger,
  });

  const index = await indexer.index(roots);
  const summary: ReconciliationSummary = {
    indexed: index.entries.length,
    skipped: index.skipped.length,
    accepted: 0,
    rejected: 0,
    unknown: 0,
  };

  if (index.entries.length === 0) {
    logger.info({ roots }, 'No local files to reconcile');
    return summary;
  }

  logger.info({ files: index.entries.length }, 'Reconciling local files with server');
  const decisions = await options.client.reconcile(index.entries);

  const submitted = new Set(index.entries.map((e) => e.localId));
  const accepted: string[] = [];
  const seen = new Set<string>();

  for (const decision of decisions) {
    if (!submitted.has(decision.localId)) {
      summary.unknown++;
      logger.warn({ id: decision.localId }, 'Server answered for a path that was not submitted');
      continue;
    }
    if (seen.has(decision.localId)) continue;
    seen.add(decision.localId);

    if (decision.action === 'accept') {
      summary.accepted++;
      accepted.push(decision.localId);
    } else {
      summary.rejected++;
      logRejection(logger, decision);
    }
  }

  for (const filePath of accepted) {
    await options.onAccepted(filePath);
  }

  logger.info(summary, 'Finished syncing existing files');
  return summary;
}

function logRejection(logger: Logger, decision: ReconciliationDecision): void {
  logger.debug(
    {
      path: decision.localId,
      reason: decision.reason,
      assetId: decision.remoteAssetId,
      trashed: decision.alreadyTrashedRemotely,
    },
    'Already on server'
  );
}
