import Redis from 'ioredis';
import * as log from '../util/log';
import { errorMessage } from '../util/runtime';
import { IRemoteStore } from '../caches/icache';

export interface RedisStoreOptions {
  readonly host: string;
  readonly port: number;

  /**
   * @default 10000
   */
  readonly connectTimeoutMs?: number;
}

/**
 * Remote store backed by a Redis server
 */
export class RedisStore implements IRemoteStore {
  private readonly redis: Redis;

  constructor(options: RedisStoreOptions) {
    this.redis = new Redis({
      host: options.host,
      port: options.port,
      lazyConnect: true,
      connectTimeout: options.connectTimeoutMs ?? 10_000,
      maxRetriesPerRequest: 1,
      // A failed run is retried by running again, not by reconnecting forever
      retryStrategy: () => null,
    });

    // Errors also reject the pending command, this just keeps ioredis from complaining
    this.redis.on('error', (e: unknown) => {
      log.debug(`Redis ${options.host}:${options.port}: ${errorMessage(e)}`);
    });
  }

  public get(key: string): Promise<Buffer | null> {
    return this.redis.getBuffer(key);
  }

  public async setex(key: string, ttlSeconds: number, value: Buffer): Promise<void> {
    await this.redis.setex(key, ttlSeconds, value);
  }

  public async expire(key: string, ttlSeconds: number): Promise<void> {
    await this.redis.expire(key, ttlSeconds);
  }

  public async close(): Promise<void> {
    if (this.redis.status === 'ready') {
      await this.redis.quit();
    } else {
      this.redis.disconnect();
    }
  }
}
