import { SimpleError } from './util/flow';

/**
 * Contents of a `.depcache.json` file
 */
export interface DepcacheJson {
  /**
   * Where local archives are kept (relative to the file)
   *
   * @default ~/.cache/depcache
   */
  readonly cacheDir?: string;

  /**
   * Shared cache, off unless `host` is set
   */
  readonly remote?: RemoteCacheJson;

  /**
   * Manifests to hash, most authoritative first
   */
  readonly manifests?: string[];

  /**
   * @default 'npm install'
   */
  readonly installCommand?: string;

  /**
   * @default 'node_modules'
   */
  readonly treeDirectory?: string;

  /**
   * Runtime asked for the platform identifier
   *
   * @default 'node'
   */
  readonly runtime?: string;
}

export interface RemoteCacheJson {
  readonly host?: string;

  /**
   * @default 6379
   */
  readonly port?: number;

  /**
   * @default 604800
   */
  readonly ttlSeconds?: number;

  /**
   * @default 'depcache'
   */
  readonly prefix?: string;
}

export function parseDepcacheJson(x: unknown, source: string): DepcacheJson {
  const obj = expectRecord(x, source);
  const remote = obj.remote !== undefined ? expectRecord(obj.remote, `${source}: remote`) : undefined;

  return {
    cacheDir: optionalString(obj.cacheDir, `${source}: cacheDir`),
    remote: remote ? {
      host: optionalString(remote.host, `${source}: remote.host`),
      port: optionalNumber(remote.port, `${source}: remote.port`),
      ttlSeconds: optionalNumber(remote.ttlSeconds, `${source}: remote.ttlSeconds`),
      prefix: optionalString(remote.prefix, `${source}: remote.prefix`),
    } : undefined,
    manifests: optionalStrings(obj.manifests, `${source}: manifests`),
    installCommand: optionalString(obj.installCommand, `${source}: installCommand`),
    treeDirectory: optionalString(obj.treeDirectory, `${source}: treeDirectory`),
    runtime: optionalString(obj.runtime, `${source}: runtime`),
  };
}

function expectRecord(x: unknown, what: string): Record<string, unknown> {
  if (typeof x !== 'object' || x === null || Array.isArray(x)) {
    throw new SimpleError(`${what}: expected an object`);
  }
  return Object.fromEntries(Object.entries(x));
}

function optionalString(x: unknown, what: string): string | undefined {
  if (x === undefined || typeof x === 'string') { return x; }
  throw new SimpleError(`${what}: expected a string, got ${JSON.stringify(x)}`);
}

function optionalNumber(x: unknown, what: string): number | undefined {
  if (x === undefined || typeof x === 'number') { return x; }
  throw new SimpleError(`${what}: expected a number, got ${JSON.stringify(x)}`);
}

function optionalStrings(x: unknown, what: string): string[] | undefined {
  if (x === undefined) { return undefined; }
  if (!Array.isArray(x) || !x.every((s): s is string => typeof s === 'string')) {
    throw new SimpleError(`${what}: expected a list of strings`);
  }
  return x;
}
