/**
 * Shared setup for CLI commands: global options, logger, resolved config
 * and the client/metadata services an agent needs.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { Logger } from 'pino';
import { RemoteClient } from '../client/remote-client.js';
import { buildAgentConfig } from '../daemon/config.js';
import type { AgentConfig } from '../daemon/types.js';
import { ConfigurationError, toError } from '../errors.js';
import { createLogger, isLogLevel, LOG_LEVELS } from '../logger.js';
import { createMetadataResolver, ExifMetadataExtractor, type MetadataResolver } from '../metadata/metadata-extractor.js';
import { ConfigStore, defaultConfigPath, mergeFlags, toAgentOverrides, type StoredConfig } from './config-store.js';

/** Options defined on the root program */
export interface GlobalOptions {
  config?: string;
  logLevel?: string;
  logFile?: string;
}

/** Options shared by commands that talk to the server */
export interface ConnectionOptions {
  server?: string;
  key?: string;
  path?: string[];
  /** false when --no-save is given */
  save: boolean;
}

export interface ResolvedConfig {
  store: ConfigStore;
  stored: StoredConfig;
  config: AgentConfig;
}

function collectPath(value: string, previous: string[] | undefined): string[] {
  return [...(previous ?? []), value];
}

/** Add --server, --key, repeatable --path and --no-save to a command */
export function addConnectionOptions(command: Command): Command {
  return command
    .option('-s, --server <url>', 'server URL')
    .option('-k, --key <key>', 'server API key')
    .option('-p, --path <dir>', 'directory to sync (repeatable)', collectPath)
    .option('--no-save', 'do not write the given flags back to the config file');
}

/**
 * @throws ConfigurationError for an unknown --log-level
 */
export function createCliLogger(options: GlobalOptions): Logger {
  const level = options.logLevel;
  if (level !== undefined && !isLogLevel(level)) {
    throw new ConfigurationError([`log level must be one of ${LOG_LEVELS.join(', ')}, got "${level}"`]);
  }
  return createLogger({ level, destination: options.logFile });
}

/**
 * Read the config file (creating it on first run), apply flags, persist
 * them unless --no-save, and build the agent configuration.
 */
export function resolveConfig(globals: GlobalOptions, flags: ConnectionOptions, logger: Logger): ResolvedConfig {
  const store = new ConfigStore(globals.config ?? defaultConfigPath(), logger);
  store.ensureExists();

  const stored = store.read();
  const merged = mergeFlags(stored, { server: flags.server, key: flags.key, paths: flags.path });

  if (flags.save && JSON.stringify(merged) !== JSON.stringify(stored)) {
    store.write(merged);
    logger.debug({ path: store.filePath }, 'Saved configuration');
  }

  return { store, stored: merged, config: buildAgentConfig(toAgentOverrides(merged)) };
}

export interface AgentServices {
  client: RemoteClient;
  metadataOf: MetadataResolver;
}

export function createAgentServices(config: AgentConfig, logger: Logger): AgentServices {
  return {
    client: new RemoteClient(
      {
        serverUrl: config.serverUrl,
        apiKey: config.apiKey,
        requestTimeoutMs: config.requestTimeoutMs,
        uploadTimeoutMs: config.uploadTimeoutMs,
        pingTimeoutMs: config.pingTimeoutMs,
      },
      logger
    ),
    metadataOf: createMetadataResolver({
      extractor: new ExifMetadataExtractor(),
      deviceId: config.deviceId,
      logger,
    }),
  };
}

/** Show only the last four characters of a key */
export function maskKey(key: string): string {
  if (key.length === 0) return '(not set)';
  if (key.length <= 4) return '****';
  return `****${key.slice(-4)}`;
}

/** Print an error the way every command does and exit 1 */
export function failCommand(prefix: string, error: unknown): never {
  if (error instanceof ConfigurationError) {
    console.error(chalk.red(`${prefix}: invalid configuration`));
    for (const problem of error.problems) {
      console.error(chalk.red(`  - ${problem}`));
    }
  } else {
    console.error(chalk.red(`${prefix}:`), toError(error).message);
  }
  process.exit(1);
}
