/**
 * Key/value transport behind the remote cache tier
 *
 * Modeled after the three Redis commands we need, so that anything that
 * speaks GET/SETEX/EXPIRE can back it.
 */
export interface IRemoteStore {
  get(key: string): Promise<Buffer | null>;
  setex(key: string, ttlSeconds: number, value: Buffer): Promise<void>;
  expire(key: string, ttlSeconds: number): Promise<void>;
  close(): Promise<void>;
}
