/**
 * media-sync scan - one reconciliation pass, then exit.
 *
 * Indexes every root, asks the server which files it is missing and
 * uploads those. Exits 1 if any upload failed.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { Logger } from 'pino';
import { createSupportedFilter } from '../../client/media-types.js';
import type { AssetServer } from '../../client/types.js';
import { assertValidConfig } from '../../daemon/config.js';
import { runReconciliation, type ReconciliationSummary } from '../../daemon/reconciliation.js';
import type { AgentConfig } from '../../daemon/types.js';
import { TransportError, toError } from '../../errors.js';
import type { MetadataResolver } from '../../metadata/metadata-extractor.js';
import {
  addConnectionOptions,
  createAgentServices,
  createCliLogger,
  failCommand,
  resolveConfig,
  type ConnectionOptions,
  type GlobalOptions,
} from '../context.js';

export interface ScanResult {
  summary: ReconciliationSummary;
  uploaded: string[];
  failures: Array<{ path: string; error: Error }>;
}

export interface ScanDependencies {
  client: AssetServer;
  metadataOf: MetadataResolver;
  logger: Logger;
  onUploaded?: (filePath: string) => void;
}

/**
 * Run one pass over the configured roots.
 * @throws TransportError when the server cannot be reached
 */
export async function runScan(config: AgentConfig, deps: ScanDependencies): Promise<ScanResult> {
  assertValidConfig(config);

  if (!(await deps.client.ping())) {
    throw new TransportError(`Server ${config.serverUrl} is not reachable`);
  }

  const types = await deps.client.fetchSupportedTypes();
  const isSupported = createSupportedFilter(types, { includeVideo: config.includeVideo });

  const uploaded: string[] = [];
  const failures: ScanResult['failures'] = [];

  const summary = await runReconciliation(config.roots, {
    client: deps.client,
    isSupported,
    logger: deps.logger,
    onAccepted: async (filePath: string): Promise<void> => {
      try {
        await deps.client.upload(filePath, await deps.metadataOf(filePath));
        uploaded.push(filePath);
        deps.onUploaded?.(filePath);
      } catch (err) {
        const error = toError(err);
        failures.push({ path: filePath, error });
        deps.logger.error({ path: filePath, err: error }, 'Upload failed');
      }
    },
  });

  return { summary, uploaded, failures };
}

export function registerScanCommand(program: Command): void {
  addConnectionOptions(
    program.command('scan').description('Upload files the server is missing, then exit')
  ).action(async (options: ConnectionOptions, command: Command) => {
    try {
      const globals = command.optsWithGlobals<GlobalOptions>();
      const logger = createCliLogger(globals);
      const { config } = resolveConfig(globals, options, logger);

      console.log(chalk.blue('Scanning local files...'));
      const result = await runScan(config, {
        ...createAgentServices(config, logger),
        logger,
        onUploaded: (filePath) => console.log(chalk.dim(`  ↑ ${filePath}`)),
      });

      const { summary } = result;
      console.log(chalk.dim(`  ${summary.indexed} supported file${summary.indexed !== 1 ? 's' : ''} found`));
      console.log(chalk.dim(`  ${summary.rejected} already on server`));
      if (summary.skipped > 0) {
        console.log(chalk.yellow(`  ${summary.skipped} unreadable file${summary.skipped !== 1 ? 's' : ''} skipped`));
      }

      if (result.uploaded.length === 0 && result.failures.length === 0) {
        console.log(chalk.green('Already up to date. No files to upload.'));
      } else {
        console.log(chalk.green(`Uploaded ${result.uploaded.length} file${result.uploaded.length !== 1 ? 's' : ''}.`));
      }

      if (result.failures.length > 0) {
        console.log(chalk.yellow(`  ${result.failures.length} error${result.failures.length !== 1 ? 's' : ''}:`));
        for (const failure of result.failures.slice(0, 5)) {
          console.log(chalk.red(`    - ${failure.path}: ${failure.error.message}`));
        }
        if (result.failures.length > 5) {
          console.log(chalk.dim(`    ... and ${result.failures.length - 5} more`));
        }
        process.exit(1);
      }
    } catch (error) {
      failCommand('Scan failed', error);
    }
  });
}
