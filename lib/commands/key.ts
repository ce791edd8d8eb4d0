import * as log from '../util/log';
import { DepcacheConfig } from '../config';
import { cacheKeyString } from '../keys/cache-key';
import { makeOrchestrator } from './install';

/**
 * Print the cache key for the current directory
 */
export async function printKey(config: DepcacheConfig) {
  const { key, manifest } = await makeOrchestrator(config).deriveKey();
  log.debug(`Hashed ${manifest}`);
  process.stdout.write(cacheKeyString(key) + '\n');
}
