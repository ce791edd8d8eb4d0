import * as log from '../lib/util/log';

let lines: string[];

beforeEach(() => {
  lines = [];
  jest.spyOn(process.stderr, 'write').mockImplementation((chunk: string | Uint8Array) => {
    lines.push(chunk.toString());
    return true;
  });
});

afterEach(() => {
  jest.restoreAllMocks();
  log.setLevel('normal');
});

test('messages carry the tool prefix', () => {
  log.info('Restored node_modules');
  log.warning('remote down');
  log.error('install failed');

  expect(lines).toHaveLength(3);
  expect(lines[0]).toContain('[depcache] Restored node_modules');
  expect(lines[1]).toContain('[depcache] warning: remote down');
  expect(lines[2]).toContain('[depcache] error: install failed');
});

test('quiet drops info but keeps warnings and errors', () => {
  log.setLevel('quiet');

  log.info('Restored node_modules');
  log.debug('Cache key abc');
  log.warning('remote down');
  log.error('install failed');

  expect(lines).toHaveLength(2);
  expect(lines[0]).toContain('warning: remote down');
  expect(lines[1]).toContain('error: install failed');
});

test('debug only shows when verbose', () => {
  log.debug('hidden');
  log.setLevel('verbose');
  log.debug('Cache key abc');

  expect(lines).toHaveLength(1);
  expect(lines[0]).toContain('Cache key abc');
});

test('verbose flag wins over quiet', () => {
  expect(log.levelFromFlags({ verbose: true, quiet: true })).toEqual('verbose');
  expect(log.levelFromFlags({ quiet: true })).toEqual('quiet');
  expect(log.levelFromFlags({})).toEqual('normal');
});
