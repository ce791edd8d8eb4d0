import { RuntimePlatformProbe } from '../lib/keys/platform';
import { failureKind } from './fakes';

test('reports version, platform and architecture of the runtime', async () => {
  const probe = new RuntimePlatformProbe(process.execPath);

  const id = await probe.platformId();

  expect(id).toEqual(`${process.version}-${process.platform}-${process.arch}`);
});

test('missing runtime is a key derivation failure', async () => {
  const probe = new RuntimePlatformProbe('/nonexistent/depcache-test-runtime');

  expect(await failureKind(probe.platformId())).toEqual('key-derivation');
});
