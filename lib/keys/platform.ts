import * as child_process from 'child_process';
import * as util from 'util';
import { DepcacheError } from '../util/flow';
import { errorMessage, slugify } from '../util/runtime';

const cpExecFile = util.promisify(child_process.execFile);

export interface IPlatformProbe {
  platformId(): Promise<string>;
}

const PLATFORM_EXPRESSION = `process.version + '-' + process.platform + '-' + process.arch`;

/**
 * Asks the runtime that will load the dependency tree to describe itself
 *
 * We don't look at our own `process` here: the tree gets built by whatever
 * `node` is on the PATH, which is not necessarily the one running us.
 */
export class RuntimePlatformProbe implements IPlatformProbe {
  constructor(private readonly runtime: string = 'node') {
  }

  public async platformId(): Promise<string> {
    let stdout: string;
    try {
      ({ stdout } = await cpExecFile(this.runtime, ['-p', PLATFORM_EXPRESSION], { encoding: 'utf-8' }));
    } catch (e) {
      throw new DepcacheError('key-derivation', `Could not determine platform by running '${this.runtime}': ${errorMessage(e)}`, { cause: e });
    }

    const id = stdout.trim();
    if (id === '') {
      throw new DepcacheError('key-derivation', `'${this.runtime}' did not report a platform`);
    }
    return slugify(id);
  }
}
