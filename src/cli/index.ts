#!/usr/bin/env node

/**
 * media-sync CLI - watch local directories and upload new media
 */

import { Command } from 'commander';
import { createRequire } from 'node:module';
import { registerConfigCommand } from './commands/config.js';
import { registerPingCommand } from './commands/ping.js';
import { registerRunCommand } from './commands/run.js';
import { registerScanCommand } from './commands/scan.js';

const require = createRequire(import.meta.url);
const pkg: unknown = require('../../package.json');
const version =
  typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
    ? pkg.version
    : '0.0.0';

const program = new Command();

program
  .name('media-sync')
  .description('Upload new photos and videos from local directories to a media server')
  .version(version)
  .option('-c, --config <file>', 'config file (default: $XDG_CONFIG_HOME/media-sync/config.yaml)')
  .option('-l, --log-level <level>', 'log level: fatal, error, warn, info, debug, trace, silent')
  .option('--log-file <file>', 'append logs to this file instead of stdout');

registerRunCommand(program);
registerScanCommand(program);
registerPingCommand(program);
registerConfigCommand(program);

program.parse();
