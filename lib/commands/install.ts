import * as path from 'path';
import { DepcacheConfig } from '../config';
import { DirectoryCache } from '../caches/directory-cache';
import { RemoteCache } from '../caches/remote-cache';
import { InstallOrchestrator, InstallResult } from '../install-orchestrator';
import { ShellInstaller } from '../installers/shell-installer';
import { RuntimePlatformProbe } from '../keys/platform';
import { RedisStore } from '../redis/redis-store';
import { DependencyTree } from '../tree/dependency-tree';

export function makeOrchestrator(config: DepcacheConfig, remoteCache?: RemoteCache) {
  return new InstallOrchestrator({
    cwd: config.cwd,
    manifests: config.manifests,
    platform: new RuntimePlatformProbe(config.runtime),
    tree: new DependencyTree(config.cwd, config.treeDirectory),
    installer: new ShellInstaller(config.installCommand),
    localCache: new DirectoryCache(path.resolve(config.cacheDir)),
    remoteCache,
  });
}

export function makeRemoteCache(config: DepcacheConfig): RemoteCache | undefined {
  if (!config.remote) { return undefined; }

  const { host, port, prefix, ttlSeconds } = config.remote;
  return new RemoteCache(new RedisStore({ host, port }), { prefix, ttlSeconds });
}

export async function install(config: DepcacheConfig): Promise<InstallResult> {
  const remoteCache = makeRemoteCache(config);
  try {
    return await makeOrchestrator(config, remoteCache).run({
      force: config.force,
      adoptExisting: config.adoptExisting,
    });
  } finally {
    await remoteCache?.close();
  }
}
