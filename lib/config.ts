import * as os from 'os';
import * as path from 'path';
import * as log from './util/log';
import { findFilesUp, readJson } from './util/files';
import { SimpleError } from './util/flow';
import { DepcacheJson, parseDepcacheJson } from './depcache-schema';
import { DEFAULT_MANIFESTS } from './keys/manifest-hasher';

export const CONFIG_FILE = '.depcache.json';

export const DEFAULT_CACHE_DIR = path.join(os.homedir(), '.cache', 'depcache');
export const DEFAULT_REMOTE_PORT = 6379;
export const DEFAULT_TTL_SECONDS = 7 * 24 * 60 * 60;
export const DEFAULT_PREFIX = 'depcache';

export interface RemoteConfig {
  readonly host: string;
  readonly port: number;
  readonly ttlSeconds: number;
  readonly prefix: string;
}

/**
 * Fully resolved settings for a single run
 */
export interface DepcacheConfig {
  readonly cwd: string;
  readonly cacheDir: string;

  /**
   * Absent when no remote host is configured
   */
  readonly remote?: RemoteConfig;

  readonly manifests: readonly string[];
  readonly installCommand: string;
  readonly treeDirectory: string;
  readonly runtime: string;
  readonly force: boolean;
  readonly adoptExisting: boolean;
}

/**
 * Settings given on the command line
 */
export interface ConfigOverrides {
  readonly cacheDir?: string;
  readonly remoteHost?: string;
  readonly remotePort?: number;
  readonly ttlSeconds?: number;
  readonly prefix?: string;
  readonly force?: boolean;
  readonly adoptExisting?: boolean;
}

/**
 * Resolve configuration for a run in `cwd`
 *
 * Later sources win: defaults, the nearest `.depcache.json`, environment
 * variables, then command-line overrides.
 */
export async function loadConfig(
  cwd: string,
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env): Promise<DepcacheConfig> {
  cwd = path.resolve(cwd);

  const configFiles = await findFilesUp(CONFIG_FILE, cwd);
  const configFile = configFiles.length > 0 ? configFiles[configFiles.length - 1] : undefined;
  let file: DepcacheJson = {};
  if (configFile) {
    log.debug(`Using configuration from ${configFile}`);
    file = parseDepcacheJson(await readJson(configFile), configFile);
  }
  const fileDir = configFile ? path.dirname(configFile) : cwd;

  let cacheDir = DEFAULT_CACHE_DIR;
  if (file.cacheDir !== undefined) { cacheDir = path.resolve(fileDir, file.cacheDir); }
  if (env.DEPCACHE_DIR) { cacheDir = path.resolve(cwd, env.DEPCACHE_DIR); }
  if (overrides.cacheDir !== undefined) { cacheDir = path.resolve(cwd, overrides.cacheDir); }

  const host = overrides.remoteHost ?? nonEmpty(env.DEPCACHE_REMOTE_HOST) ?? file.remote?.host ?? '';
  const port = overrides.remotePort
    ?? parseEnvInt(env, 'DEPCACHE_REMOTE_PORT')
    ?? file.remote?.port
    ?? DEFAULT_REMOTE_PORT;
  const ttlSeconds = overrides.ttlSeconds
    ?? parseEnvInt(env, 'DEPCACHE_TTL')
    ?? file.remote?.ttlSeconds
    ?? DEFAULT_TTL_SECONDS;
  const prefix = overrides.prefix ?? nonEmpty(env.DEPCACHE_PREFIX) ?? file.remote?.prefix ?? DEFAULT_PREFIX;

  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new SimpleError(`Invalid remote port: ${port}`);
  }
  if (!Number.isInteger(ttlSeconds) || ttlSeconds < 1) {
    throw new SimpleError(`Invalid TTL: ${ttlSeconds} (must be a positive number of seconds)`);
  }

  const manifests = file.manifests ?? DEFAULT_MANIFESTS;
  if (manifests.length === 0) {
    throw new SimpleError(`${configFile}: manifests must not be empty`);
  }

  return {
    cwd,
    cacheDir,
    remote: host !== '' ? { host, port, ttlSeconds, prefix } : undefined,
    manifests,
    installCommand: file.installCommand ?? 'npm install',
    treeDirectory: file.treeDirectory ?? 'node_modules',
    runtime: file.runtime ?? 'node',
    force: overrides.force ?? false,
    adoptExisting: overrides.adoptExisting ?? false,
  };
}

function nonEmpty(x: string | undefined): string | undefined {
  return x !== undefined && x !== '' ? x : undefined;
}

function parseEnvInt(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const value = nonEmpty(env[name]);
  if (value === undefined) { return undefined; }
  if (!/^\d+$/.test(value)) {
    throw new SimpleError(`$${name}: expected a number, got '${value}'`);
  }
  return parseInt(value, 10);
}
