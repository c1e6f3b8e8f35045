/**
 * Persistent CLI configuration.
 * Stores server, key and paths in $XDG_CONFIG_HOME/media-sync/config.yaml
 * (default ~/.config/media-sync/config.yaml).
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { watch, type FSWatcher } from 'chokidar';
import { dump, load } from 'js-yaml';
import type { Logger } from 'pino';
import type { AgentConfig } from '../daemon/types.js';
import { ConfigurationError, toError } from '../errors.js';

/** Shape of config.yaml; every key is optional */
export interface StoredConfig {
  server?: string;
  key?: string;
  paths?: string[];
  deviceId?: string;
  includeVideo?: boolean;
}

/** Values given on the command line */
export interface ConfigFlags {
  server?: string;
  key?: string;
  paths?: string[];
}

/**
 * Get the config file path.
 * Respects XDG_CONFIG_HOME, otherwise ~/.config.
 */
export function defaultConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const xdg = env['XDG_CONFIG_HOME'];
  const base = xdg && xdg.trim() !== '' ? xdg : path.join(os.homedir(), '.config');
  return path.join(base, 'media-sync', 'config.yaml');
}

/**
 * Validate a parsed YAML document.
 * @throws ConfigurationError naming each key with the wrong type
 */
export function parseStoredConfig(raw: unknown, source = 'config'): StoredConfig {
  if (raw === undefined || raw === null) {
    return {};
  }
  if (typeof raw !== 'object' || Array.isArray(raw)) {
    throw new ConfigurationError([`${source} must be a mapping of keys to values`]);
  }

  const doc = new Map<string, unknown>(Object.entries(raw));
  const problems: string[] = [];
  const config: StoredConfig = {};

  const server = doc.get('server');
  if (typeof server === 'string') config.server = server;
  else if (server !== undefined && server !== null) problems.push('server must be a string');

  const key = doc.get('key');
  if (typeof key === 'string') config.key = key;
  else if (key !== undefined && key !== null) problems.push('key must be a string');

  const paths = doc.get('paths');
  if (Array.isArray(paths) && paths.every((p): p is string => typeof p === 'string')) config.paths = paths;
  else if (paths !== undefined && paths !== null) problems.push('paths must be a list of strings');

  const deviceId = doc.get('deviceId');
  if (typeof deviceId === 'string') config.deviceId = deviceId;
  else if (deviceId !== undefined && deviceId !== null) problems.push('deviceId must be a string');

  const includeVideo = doc.get('includeVideo');
  if (typeof includeVideo === 'boolean') config.includeVideo = includeVideo;
  else if (includeVideo !== undefined && includeVideo !== null) problems.push('includeVideo must be true or false');

  if (problems.length > 0) {
    throw new ConfigurationError(problems.map((p) => `${source}: ${p}`));
  }
  return config;
}

/** Flags win over stored values; an empty flag list keeps the stored paths */
export function mergeFlags(stored: StoredConfig, flags: ConfigFlags): StoredConfig {
  const merged: StoredConfig = { ...stored };
  if (flags.server !== undefined) merged.server = flags.server;
  if (flags.key !== undefined) merged.key = flags.key;
  if (flags.paths !== undefined && flags.paths.length > 0) merged.paths = [...flags.paths];
  return merged;
}

/** Map stored keys onto agent overrides, leaving absent keys to env/defaults */
export function toAgentOverrides(stored: StoredConfig): Partial<AgentConfig> {
  const overrides: { -readonly [K in keyof AgentConfig]?: AgentConfig[K] } = {};
  if (stored.server !== undefined) overrides.serverUrl = stored.server;
  if (stored.key !== undefined) overrides.apiKey = stored.key;
  if (stored.paths !== undefined) overrides.roots = stored.paths;
  if (stored.deviceId !== undefined) overrides.deviceId = stored.deviceId;
  if (stored.includeVideo !== undefined) overrides.includeVideo = stored.includeVideo;
  return overrides;
}

export class ConfigStore {
  readonly filePath: string;
  private readonly logger: Logger;
  private watcher: FSWatcher | null = null;

  constructor(filePath: string, logger: Logger) {
    this.filePath = path.resolve(filePath);
    this.logger = logger.child({ component: 'config-store' });
  }

  /**
   * Read the file. A missing file is an empty configuration.
   * @throws ConfigurationError on unreadable or malformed YAML
   */
  read(): StoredConfig {
    let text: string;
    try {
      text = fs.readFileSync(this.filePath, 'utf-8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        return {};
      }
      throw new ConfigurationError([`cannot read ${this.filePath}: ${toError(err).message}`]);
    }

    let doc: unknown;
    try {
      doc = load(text);
    } catch (err) {
      throw new ConfigurationError([`${this.filePath} is not valid YAML: ${toError(err).message}`]);
    }
    return parseStoredConfig(doc, this.filePath);
  }

  /**
   * Write the file with owner-only permissions, creating its directory.
   */
  write(config: StoredConfig): void {
    const dir = path.dirname(this.filePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
    }
    fs.writeFileSync(this.filePath, dump(config, { lineWidth: -1 }), { mode: 0o600 });
  }

  /**
   * Create an empty file if none exists.
   * @returns true if the file was created
   */
  ensureExists(): boolean {
    if (fs.existsSync(this.filePath)) {
      return false;
    }
    this.write({});
    this.logger.info({ path: this.filePath }, 'Created configuration file');
    return true;
  }

  /**
   * Watch the file and call `onChange` with each valid new version.
   * Invalid edits are logged and ignored until fixed.
   */
  async watch(onChange: (config: StoredConfig) => void): Promise<void> {
    if (this.watcher) return;

    const reload = (): void => {
      try {
        onChange(this.read());
      } catch (err) {
        this.logger.error({ err: toError(err), path: this.filePath }, 'Ignoring invalid configuration change');
      }
    };

    return new Promise<void>((resolve) => {
      this.watcher = watch(this.filePath, {
        persistent: true,
        ignoreInitial: true,
        awaitWriteFinish: { stabilityThreshold: 200, pollInterval: 50 },
      });
      this.watcher.on('add', reload);
      this.watcher.on('change', reload);
      this.watcher.on('error', (error: unknown) => {
        this.logger.error({ err: toError(error) }, 'Configuration watcher error');
      });
      this.watcher.on('ready', () => resolve());
    });
  }

  async close(): Promise<void> {
    if (this.watcher) {
      await this.watcher.close();
      this.watcher = null;
    }
  }
}
