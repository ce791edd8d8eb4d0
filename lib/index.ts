export * from './install-orchestrator';
export * from './config';
export * from './keys/cache-key';
export * from './keys/manifest-hasher';
export * from './keys/platform';
export * from './caches/icache';
export * from './caches/directory-cache';
export * from './caches/remote-cache';
export * from './redis/redis-store';
export * from './tree/dependency-tree';
export * from './tree/tar-archiver';
export * from './installers/shell-installer';
export { DepcacheError, SimpleError } from './util/flow';
export type { FailureKind } from './util/flow';
