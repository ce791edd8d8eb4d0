import * as path from 'path';
import { fileHash, isRegularFile } from '../util/files';
import { DepcacheError } from '../util/flow';

/**
 * Manifests in order of preference
 *
 * Lockfiles pin exact versions, so they win over package.json whenever present.
 */
export const DEFAULT_MANIFESTS: readonly string[] = Object.freeze([
  'npm-shrinkwrap.json',
  'package-lock.json',
  'yarn.lock',
  'pnpm-lock.yaml',
  'package.json',
]);

export interface ManifestHash {
  /**
   * The candidate that was hashed
   */
  readonly manifest: string;
  readonly contentHash: string;
}

export async function hashManifest(directory: string, candidates: readonly string[] = DEFAULT_MANIFESTS): Promise<ManifestHash> {
  for (const manifest of candidates) {
    const fullPath = path.join(directory, manifest);
    if (await isRegularFile(fullPath)) {
      return { manifest, contentHash: await fileHash(fullPath) };
    }
  }

  throw new DepcacheError('key-derivation', `No manifest found in ${directory} (looked for: ${candidates.join(', ')})`);
}
