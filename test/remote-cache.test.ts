import { MIN_ARCHIVE_BYTES, RemoteCache } from '../lib/caches/remote-cache';
import { failureKind, InMemoryRemoteStore } from './fakes';

const KEY = { platformId: 'v18-linux-x64', contentHash: 'abc123' };
const REMOTE_KEY = 'ci-v18-linux-x64-abc123';
const ARCHIVE = Buffer.alloc(MIN_ARCHIVE_BYTES, 7);

let store: InMemoryRemoteStore;
let cache: RemoteCache;

beforeEach(() => {
  store = new InMemoryRemoteStore();
  cache = new RemoteCache(store, { prefix: 'ci', ttlSeconds: 3600 });
});

test('keys are namespaced with the prefix', () => {
  expect(cache.remoteKey(KEY)).toEqual(REMOTE_KEY);
});

test('hit refreshes the TTL exactly once', async () => {
  // GIVEN
  store.values.set(REMOTE_KEY, ARCHIVE);

  // WHEN
  const value = await cache.get(KEY);

  // THEN
  expect(value).toEqual(ARCHIVE);
  expect(store.commands).toEqual([
    `GET ${REMOTE_KEY}`,
    `EXPIRE ${REMOTE_KEY} 3600`,
  ]);
});

test('missing key is a miss without TTL refresh', async () => {
  const value = await cache.get(KEY);

  expect(value).toBeUndefined();
  expect(store.commands).toEqual([`GET ${REMOTE_KEY}`]);
});

test('implausibly small value is a miss', async () => {
  store.values.set(REMOTE_KEY, Buffer.from('abc'));

  const value = await cache.get(KEY);

  expect(value).toBeUndefined();
  expect(store.commands).toEqual([`GET ${REMOTE_KEY}`]);
});

test('value just below the floor is a miss', async () => {
  store.values.set(REMOTE_KEY, Buffer.alloc(MIN_ARCHIVE_BYTES - 1));

  expect(await cache.get(KEY)).toBeUndefined();
});

test('size floor is configurable', async () => {
  cache = new RemoteCache(store, { prefix: 'ci', ttlSeconds: 3600, minArchiveBytes: 3 });
  store.values.set(REMOTE_KEY, Buffer.from('abc'));

  expect(await cache.get(KEY)).toEqual(Buffer.from('abc'));
});

test('failed TTL refresh still returns the value', async () => {
  store.values.set(REMOTE_KEY, ARCHIVE);
  store.failing.add('expire');

  expect(await cache.get(KEY)).toEqual(ARCHIVE);
});

test('failed read is a transport failure', async () => {
  store.failing.add('get');

  expect(await failureKind(cache.get(KEY))).toEqual('transport');
});

test('put sets the value with the TTL', async () => {
  await cache.put(KEY, ARCHIVE);

  expect(store.commands).toEqual([`SETEX ${REMOTE_KEY} 3600`]);
  expect(store.values.get(REMOTE_KEY)).toEqual(ARCHIVE);
});

test('put replaces an existing value', async () => {
  store.values.set(REMOTE_KEY, Buffer.from('old'));

  await cache.put(KEY, ARCHIVE);

  expect(store.values.get(REMOTE_KEY)).toEqual(ARCHIVE);
});

test('failed write is a transport failure', async () => {
  store.failing.add('setex');

  expect(await failureKind(cache.put(KEY, ARCHIVE))).toEqual('transport');
});

test('close closes the store', async () => {
  await cache.close();

  expect(store.closed).toBe(true);
});
