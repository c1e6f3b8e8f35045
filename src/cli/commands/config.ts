/**
 * media-sync config - show (and with flags, update) the configuration.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import {
  addConnectionOptions,
  createCliLogger,
  failCommand,
  maskKey,
  resolveConfig,
  type ConnectionOptions,
  type GlobalOptions,
} from '../context.js';

export function registerConfigCommand(program: Command): void {
  addConnectionOptions(
    program.command('config').description('Show the resolved configuration; flags are saved to the config file')
  ).action((options: ConnectionOptions, command: Command) => {
    try {
      const globals = command.optsWithGlobals<GlobalOptions>();
      const logger = createCliLogger(globals);
      const { store, config } = resolveConfig(globals, options, logger);

      console.log(chalk.bold('media-sync configuration'));
      console.log(`  File:          ${store.filePath}`);
      console.log(`  Server:        ${config.serverUrl || chalk.yellow('(not set)')}`);
      console.log(`  API key:       ${maskKey(config.apiKey)}`);
      console.log(`  Device id:     ${config.deviceId}`);
      console.log(`  Include video: ${config.includeVideo ? 'yes' : 'no'}`);
      if (config.roots.length === 0) {
        console.log(`  Paths:         ${chalk.yellow('(none)')}`);
      } else {
        console.log('  Paths:');
        for (const root of config.roots) {
          console.log(`    - ${root}`);
        }
      }
    } catch (error) {
      failCommand('Config failed', error);
    }
  });
}
