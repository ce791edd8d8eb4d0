import * as path from 'path';
import { promises as fs } from 'fs';
import * as log from '../util/log';
import { ensureDirForFile, ignoreEnoent, isRegularFile, rimraf } from '../util/files';
import { DepcacheError } from '../util/flow';
import { errorMessage } from '../util/runtime';
import { CacheKey, cacheKeyString } from '../keys/cache-key';
import { DependencyTree } from '../tree/dependency-tree';

/**
 * Local cache tier: one `<key>.tgz` per cache key in a directory
 *
 * There is no locking. Two runs storing the same key race, and the last
 * one to finish wins.
 */
export class DirectoryCache {
  constructor(public readonly directory: string) {
  }

  public archivePath(key: CacheKey): string {
    return path.join(this.directory, `${cacheKeyString(key)}.tgz`);
  }

  public exists(key: CacheKey): Promise<boolean> {
    return isRegularFile(this.archivePath(key));
  }

  public async get(key: CacheKey): Promise<string | undefined> {
    return await this.exists(key) ? this.archivePath(key) : undefined;
  }

  public async put(key: CacheKey, tree: DependencyTree): Promise<string> {
    const archivePath = this.archivePath(key);
    await tree.pack(archivePath);
    log.debug(`Stored ${cacheKeyString(key)}`);
    return archivePath;
  }

  /**
   * Place an archive obtained elsewhere into the slot for `key`
   */
  public async write(key: CacheKey, contents: Buffer): Promise<string> {
    const archivePath = this.archivePath(key);
    try {
      await ensureDirForFile(archivePath);
      await fs.writeFile(archivePath, contents);
    } catch (e) {
      await rimraf(archivePath);
      throw new DepcacheError('pack', `Could not write ${archivePath}: ${errorMessage(e)}`, { cause: e });
    }
    return archivePath;
  }

  public read(key: CacheKey): Promise<Buffer> {
    return fs.readFile(this.archivePath(key));
  }

  public async remove(key: CacheKey): Promise<void> {
    const archivePath = this.archivePath(key);
    try {
      await ignoreEnoent(() => fs.unlink(archivePath));
    } catch (e) {
      throw new DepcacheError('remove', `Could not remove ${archivePath}: ${errorMessage(e)}`, { cause: e });
    }
  }
}
