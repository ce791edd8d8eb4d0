import { cacheKeyString } from '../lib/keys/cache-key';

test('key is platform and content hash joined by a dash', () => {
  expect(cacheKeyString({ platformId: 'v18-linux-x64', contentHash: 'abc123' })).toEqual('v18-linux-x64-abc123');
});

test('equal components give equal keys', () => {
  const a = cacheKeyString({ platformId: 'v20.11.1-darwin-arm64', contentHash: 'deadbeef' });
  const b = cacheKeyString({ platformId: 'v20.11.1-darwin-arm64', contentHash: 'deadbeef' });

  expect(a).toEqual(b);
});
