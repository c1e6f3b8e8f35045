/**
 * media-sync run - watch the configured directories in the foreground.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { Logger } from 'pino';
import { buildAgentConfig } from '../../daemon/config.js';
import { SyncAgent } from '../../daemon/sync-agent.js';
import type { AgentConfig } from '../../daemon/types.js';
import { toAgentOverrides, type StoredConfig } from '../config-store.js';
import {
  addConnectionOptions,
  createAgentServices,
  createCliLogger,
  failCommand,
  resolveConfig,
  type ConnectionOptions,
  type GlobalOptions,
} from '../context.js';
import { runService } from '../service-host.js';

/**
 * Apply an edited config file to a running agent. Only the roots can
 * change at runtime; server and key need a restart.
 */
export function applyStoredChange(agent: SyncAgent, current: AgentConfig, next: StoredConfig, logger: Logger): void {
  const updated = buildAgentConfig(toAgentOverrides(next));

  if (updated.serverUrl !== current.serverUrl || updated.apiKey !== current.apiKey) {
    logger.warn('Server URL or API key changed; restart the agent to apply');
  }

  if (updated.roots.length === 0) {
    logger.warn('Configuration lists no paths; keeping the current ones');
    return;
  }
  agent.updateRoots(updated.roots);
}

export function registerRunCommand(program: Command): void {
  addConnectionOptions(
    program
      .command('run', { isDefault: true })
      .description('Watch the configured directories and upload new photos and videos')
  ).action(async (options: ConnectionOptions, command: Command) => {
    try {
      const globals = command.optsWithGlobals<GlobalOptions>();
      const logger = createCliLogger(globals);
      const { store, config } = resolveConfig(globals, options, logger);

      const agent = new SyncAgent(config, { ...createAgentServices(config, logger), logger });
      agent.on('error', (error: Error) => {
        logger.debug({ err: error }, 'Agent reported an error');
      });

      console.log(chalk.blue(`Syncing ${config.roots.length} director${config.roots.length === 1 ? 'y' : 'ies'} to ${config.serverUrl}`));
      console.log(chalk.dim(`  Config: ${store.filePath}`));

      await store.watch((next) => applyStoredChange(agent, config, next, logger));
      try {
        await runService(agent, { logger });
      } finally {
        await store.close();
      }

      const stats = agent.getStats();
      console.log(chalk.green(`Stopped. ${stats.filesUploaded} file${stats.filesUploaded !== 1 ? 's' : ''} uploaded.`));
    } catch (error) {
      failCommand('Sync failed', error);
    }
  });
}
