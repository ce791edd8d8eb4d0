import * as log from '../util/log';
import { DepcacheError } from '../util/flow';
import { errorMessage } from '../util/runtime';
import { CacheKey, cacheKeyString } from '../keys/cache-key';
import { IRemoteStore } from './icache';

/**
 * Anything shorter than this can't be a gzipped tarball of a dependency tree
 *
 * (The gzip header and trailer plus the tar end-of-archive blocks alone come close.)
 */
export const MIN_ARCHIVE_BYTES = 100;

export interface RemoteCacheOptions {
  /**
   * Namespace for keys, so multiple caches can share one store
   */
  readonly prefix: string;

  readonly ttlSeconds: number;

  /**
   * @default MIN_ARCHIVE_BYTES
   */
  readonly minArchiveBytes?: number;
}

/**
 * Remote cache tier
 *
 * Entries expire after the TTL unless they're used; every hit re-applies
 * the full TTL.
 */
export class RemoteCache {
  private readonly minArchiveBytes: number;

  constructor(private readonly store: IRemoteStore, private readonly options: RemoteCacheOptions) {
    this.minArchiveBytes = options.minArchiveBytes ?? MIN_ARCHIVE_BYTES;
  }

  public remoteKey(key: CacheKey): string {
    return `${this.options.prefix}-${cacheKeyString(key)}`;
  }

  /**
   * Fetch the archive for `key`, or `undefined` on a miss
   *
   * Throws a 'transport' error if the store can't be reached.
   */
  public async get(key: CacheKey): Promise<Buffer | undefined> {
    const remoteKey = this.remoteKey(key);

    let value: Buffer | null;
    try {
      value = await this.store.get(remoteKey);
    } catch (e) {
      throw new DepcacheError('transport', `Remote cache error reading ${remoteKey}: ${errorMessage(e)}`, { cause: e });
    }

    if (value === null) { return undefined; }
    if (value.length < this.minArchiveBytes) {
      log.debug(`Ignoring ${remoteKey}: ${value.length} bytes is too small to be an archive`);
      return undefined;
    }

    try {
      await this.touch(key);
    } catch (e) {
      log.warning(`${errorMessage(e)} (entry may expire early)`);
    }

    return value;
  }

  /**
   * Re-apply the TTL to `key`
   */
  public async touch(key: CacheKey): Promise<void> {
    const remoteKey = this.remoteKey(key);
    try {
      await this.store.expire(remoteKey, this.options.ttlSeconds);
    } catch (e) {
      throw new DepcacheError('transport', `Remote cache error refreshing TTL of ${remoteKey}: ${errorMessage(e)}`, { cause: e });
    }
  }

  public async put(key: CacheKey, contents: Buffer): Promise<void> {
    const remoteKey = this.remoteKey(key);
    const start = Date.now();
    try {
      await this.store.setex(remoteKey, this.options.ttlSeconds, contents);
    } catch (e) {
      throw new DepcacheError('transport', `Remote cache error writing ${remoteKey}: ${errorMessage(e)}`, { cause: e });
    }
    const delta = (Date.now() - start) / 1000;
    log.debug(`Uploaded ${remoteKey} (${contents.length} bytes) in ${delta.toFixed(1)}s`);
  }

  public close(): Promise<void> {
    return this.store.close();
  }
}
