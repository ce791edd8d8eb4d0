import { promises as fs, Stats } from 'fs';
import * as path from 'path';
import * as crypto from 'crypto';
import { errorCode, errorMessage } from './runtime';
import { SimpleError } from './flow';

export function standardHash() {
  return crypto.createHash('sha1');
}

export async function fileHash(fullPath: string) {
  const hash = standardHash();
  hash.update(await fs.readFile(fullPath));
  return hash.digest('hex');
}

export async function exists(s: string, cb?: (s: Stats) => boolean) {
  try {
    const st = await fs.lstat(s);
    return cb === undefined || cb(st);
  } catch (e) {
    if (errorCode(e) === 'ENOENT') { return false; }
    throw e;
  }
}

/**
 * Whether `s` is a regular file, or a symlink to one
 */
export async function isRegularFile(s: string) {
  try {
    return (await fs.stat(s)).isFile();
  } catch (e) {
    if (errorCode(e) === 'ENOENT') { return false; }
    throw e;
  }
}

export async function rimraf(x: string) {
  try {
    const s = await fs.lstat(x);
    if (s.isDirectory()) {
      for (const child of await fs.readdir(x)) {
        await rimraf(path.join(x, child));
      }
      await fs.rmdir(x);
    } else {
      await fs.unlink(x);
    }
  } catch (e) {
    if (errorCode(e) === 'ENOENT') { return; }
    throw e;
  }
}

export async function ensureDirForFile(filePath: string) {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
}

export async function readJson(filename: string): Promise<unknown> {
  try {
    return JSON.parse(await fs.readFile(filename, { encoding: 'utf-8' }));
  } catch (e) {
    throw new SimpleError(`While reading ${filename}: ${errorMessage(e)}`, { cause: e });
  }
}

export async function ignoreEnoent(block: () => Promise<void>): Promise<void> {
  try {
    await block();
  } catch (e) {
    if (errorCode(e) !== 'ENOENT') { throw e; }
  }
}

/**
 * Find all files with the given name up from the starting directory
 *
 * Returns the most specific file at the end.
 */
export async function findFilesUp(filename: string, startDir: string): Promise<string[]> {
  const ret = new Array<string>();

  let currentDir = path.resolve(startDir);
  while (true) {
    const fullPath = path.join(currentDir, filename);
    if (await exists(fullPath)) {
      ret.push(fullPath);
    }

    const next = path.dirname(currentDir);
    if (next === currentDir) { break; }
    currentDir = next;
  }

  // Most specific file at the end
  return ret.reverse();
}
