import * as log from './util/log';
import { DepcacheError, isDepcacheError } from './util/flow';
import { errorMessage } from './util/runtime';
import { Timer } from './util/timer';
import { CacheKey, cacheKeyString } from './keys/cache-key';
import { DEFAULT_MANIFESTS, hashManifest } from './keys/manifest-hasher';
import { IPlatformProbe } from './keys/platform';
import { DirectoryCache } from './caches/directory-cache';
import { RemoteCache } from './caches/remote-cache';
import { DependencyTree } from './tree/dependency-tree';
import { IInstaller } from './installers/shell-installer';

export interface InstallOrchestratorProps {
  /**
   * Directory holding the manifests
   */
  readonly cwd: string;

  /**
   * Manifest candidates, most authoritative first
   *
   * @default DEFAULT_MANIFESTS
   */
  readonly manifests?: readonly string[];

  readonly platform: IPlatformProbe;
  readonly tree: DependencyTree;
  readonly installer: IInstaller;
  readonly localCache: DirectoryCache;

  /**
   * Shared tier, if configured
   */
  readonly remoteCache?: RemoteCache;
}

export interface InstallOptions {
  /**
   * Skip the cache lookup and always install, replacing the cached entry
   */
  readonly force?: boolean;

  /**
   * Cache the tree that's already there instead of installing
   *
   * Takes precedence over `force`.
   */
  readonly adoptExisting?: boolean;
}

export type InstallSource = 'local' | 'remote' | 'install' | 'adopted';

export interface DerivedKey {
  readonly key: CacheKey;
  readonly manifest: string;
}

export interface InstallResult extends DerivedKey {
  readonly source: InstallSource;
}

/**
 * Decides whether to restore a dependency tree from cache or install it
 */
export class InstallOrchestrator {
  constructor(private readonly props: InstallOrchestratorProps) {
  }

  public async deriveKey(): Promise<DerivedKey> {
    const { manifest, contentHash } = await hashManifest(this.props.cwd, this.props.manifests ?? DEFAULT_MANIFESTS);
    const platformId = await this.props.platform.platformId();
    const key = { platformId, contentHash };
    log.debug(`Cache key ${cacheKeyString(key)} (from ${manifest})`);
    return { key, manifest };
  }

  public async run(options: InstallOptions = {}): Promise<InstallResult> {
    const derived = await this.deriveKey();

    if (options.adoptExisting) {
      await this.adoptExisting(derived.key);
      return { ...derived, source: 'adopted' };
    }

    await this.props.tree.clear();

    if (!options.force) {
      const source = await this.restore(derived.key);
      if (source) {
        log.info(`Restored ${this.props.tree.name} from ${source} cache (${cacheKeyString(derived.key)})`);
        return { ...derived, source };
      }
    }

    await this.install();

    if (options.force) {
      await this.props.localCache.remove(derived.key);
    }

    await this.store(derived.key);
    return { ...derived, source: 'install' };
  }

  private async adoptExisting(key: CacheKey) {
    const tree = this.props.tree;
    if (!await tree.exists()) {
      throw new DepcacheError('pack', `Nothing to cache: ${tree.directory} does not exist`);
    }

    await this.store(key);
    log.info(`Cached existing ${tree.name} as ${cacheKeyString(key)}`);
  }

  /**
   * Try local, then remote. Returns which tier hit, if any.
   */
  private async restore(key: CacheKey): Promise<InstallSource | undefined> {
    const { localCache, remoteCache, tree } = this.props;

    const localArchive = await localCache.get(key);
    if (localArchive) {
      await tree.unpack(localArchive);
      return 'local';
    }

    if (!remoteCache) { return undefined; }

    const contents = await this.fetchRemote(remoteCache, key);
    if (!contents) { return undefined; }

    const archivePath = await localCache.write(key, contents);
    try {
      await tree.unpack(archivePath);
    } catch (e) {
      // Don't keep what we just downloaded, it would turn a remote problem into a local one
      await localCache.remove(key);
      throw e;
    }
    return 'remote';
  }

  private async fetchRemote(remoteCache: RemoteCache, key: CacheKey): Promise<Buffer | undefined> {
    try {
      return await remoteCache.get(key);
    } catch (e) {
      if (!isDepcacheError(e, 'transport')) { throw e; }
      log.warning(`${e.message} (treating as a cache miss)`);
      return undefined;
    }
  }

  private async install() {
    const { installer, cwd } = this.props;
    const timer = new Timer('Installed dependencies');

    let exitCode: number;
    try {
      exitCode = await installer.install(cwd);
    } catch (e) {
      throw new DepcacheError('install', `Install could not be started: ${errorMessage(e)}`, { cause: e });
    }
    if (exitCode !== 0) {
      throw new DepcacheError('install', `Install failed with exit code ${exitCode}`);
    }

    log.debug(timer.stop().toString());
  }

  /**
   * Write the current tree to every tier
   */
  private async store(key: CacheKey) {
    const { localCache, remoteCache, tree } = this.props;

    const timer = new Timer('Packed');
    await localCache.put(key, tree);
    log.debug(timer.stop().toString());

    if (remoteCache) {
      await remoteCache.put(key, await localCache.read(key));
    }
  }
}
