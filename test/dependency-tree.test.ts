import * as crypto from 'crypto';
import * as path from 'path';
import { promises as fs } from 'fs';
import { DependencyTree } from '../lib/tree/dependency-tree';
import { IArchiver } from '../lib/tree/tar-archiver';
import { exists } from '../lib/util/files';
import { failureKind, JsonArchiver, makeTempDir, readFiles, removeTempDir, writeFiles } from './fakes';

let dir: string;
let project: string;

beforeEach(async () => {
  dir = await makeTempDir();
  project = path.join(dir, 'project');
  await writeFiles(project, {
    'package.json': '{"name":"app"}',
    'node_modules': {
      'left-pad': {
        'package.json': '{"name":"left-pad","version":"1.3.0"}',
        'index.js': 'module.exports = leftPad;\n',
      },
      '@scope': {
        'util': {
          'lib': {
            'deep.js': 'exports.deep = true;\n',
          },
        },
      },
      '.package-lock.json': '{}',
    },
  });
});

afterEach(async () => {
  await removeTempDir(dir);
});

test('tar round trip restores the same files', async () => {
  // GIVEN
  const tree = new DependencyTree(project);
  const before = await readFiles(tree.directory);
  const archive = path.join(dir, 'cache', 'entry.tgz');

  // WHEN
  await tree.pack(archive);
  await tree.clear();
  const clearedExists = await tree.exists();
  await tree.unpack(archive);

  // THEN
  expect(clearedExists).toBe(false);
  expect(await readFiles(tree.directory)).toEqual(before);
});

test('unpacking only touches the tree directory', async () => {
  const tree = new DependencyTree(project);
  const archive = path.join(dir, 'entry.tgz');
  await tree.pack(archive);
  await tree.clear();

  await tree.unpack(archive);

  expect((await fs.readdir(project)).sort()).toEqual(['node_modules', 'package.json']);
});

test('clear is a no-op without a tree', async () => {
  const tree = new DependencyTree(project, 'not_installed');

  await tree.clear();

  expect(await tree.exists()).toBe(false);
  expect(await exists(path.join(project, 'node_modules'))).toBe(true);
});

test('failed pack leaves no archive behind', async () => {
  // GIVEN
  const archiver = new JsonArchiver();
  archiver.failPack = true;
  const tree = new DependencyTree(project, 'node_modules', archiver);
  const archive = path.join(dir, 'entry.tgz');

  // WHEN
  const kind = await failureKind(tree.pack(archive));

  // THEN
  expect(kind).toEqual('pack');
  expect(await exists(archive)).toBe(false);
});

test('failed unpack is a corrupt archive', async () => {
  const archiver: IArchiver = {
    pack: () => Promise.resolve(),
    unpack: () => Promise.reject(new Error('unexpected end of file')),
  };
  const tree = new DependencyTree(project, 'node_modules', archiver);

  expect(await failureKind(tree.unpack(path.join(dir, 'entry.tgz')))).toEqual('corrupt-archive');
});

describe('damaged tar archives', () => {
  beforeEach(async () => {
    const bulk: Record<string, string> = {};
    for (let i = 0; i < 40; i++) {
      bulk[`chunk-${i}.js`] = crypto.randomBytes(4096).toString('hex');
    }
    await writeFiles(project, { node_modules: { bulky: bulk } });
  });

  test('truncated archive is corrupt and extracts nothing', async () => {
    // GIVEN
    const tree = new DependencyTree(project);
    const archive = path.join(dir, 'entry.tgz');
    await tree.pack(archive);
    const { size } = await fs.stat(archive);
    await fs.truncate(archive, Math.floor(size * 0.6));
    await tree.clear();

    // WHEN
    const kind = await failureKind(tree.unpack(archive));

    // THEN
    expect(kind).toEqual('corrupt-archive');
    expect(await tree.exists()).toBe(false);
    await new Promise(ok => setTimeout(ok, 200));
    expect(await tree.exists()).toBe(false);
    await tree.clear();
    expect(await tree.exists()).toBe(false);
  });

  test('garbage bytes are a corrupt archive', async () => {
    const tree = new DependencyTree(project);
    const archive = path.join(dir, 'entry.tgz');
    await fs.writeFile(archive, Buffer.alloc(2048, 'x'));
    await tree.clear();

    expect(await failureKind(tree.unpack(archive))).toEqual('corrupt-archive');
    expect(await tree.exists()).toBe(false);
  });
});
