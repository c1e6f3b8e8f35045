/**
 * media-sync ping - one liveness check plus the supported type counts.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { validateAgentConfig } from '../../daemon/config.js';
import { ConfigurationError } from '../../errors.js';
import {
  addConnectionOptions,
  createAgentServices,
  createCliLogger,
  failCommand,
  resolveConfig,
  type ConnectionOptions,
  type GlobalOptions,
} from '../context.js';

export function registerPingCommand(program: Command): void {
  addConnectionOptions(program.command('ping').description('Check that the server is reachable')).action(
    async (options: ConnectionOptions, command: Command) => {
      try {
        const globals = command.optsWithGlobals<GlobalOptions>();
        const logger = createCliLogger(globals);
        const { config } = resolveConfig(globals, options, logger);

        // Paths are not needed to reach the server
        const problems = validateAgentConfig(config).filter((p) => !p.startsWith('roots'));
        if (problems.length > 0) {
          throw new ConfigurationError(problems);
        }

        const { client } = createAgentServices(config, logger);
        if (!(await client.ping())) {
          console.log(chalk.red(`✗ ${config.serverUrl} is not reachable`));
          process.exit(1);
        }
        console.log(chalk.green(`✓ ${config.serverUrl} is reachable`));

        const types = await client.fetchSupportedTypes();
        console.log(chalk.dim(`  Image types:   ${types.imageExtensions.size}`));
        console.log(chalk.dim(`  Video types:   ${types.videoExtensions.size}`));
        console.log(chalk.dim(`  Sidecar types: ${types.sidecarExtensions.size}`));
      } catch (error) {
        failCommand('Ping failed', error);
      }
    }
  );
}
