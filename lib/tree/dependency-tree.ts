import * as path from 'path';
import * as log from '../util/log';
import { ensureDirForFile, exists, rimraf } from '../util/files';
import { DepcacheError } from '../util/flow';
import { errorMessage } from '../util/runtime';
import { IArchiver, TarArchiver } from './tar-archiver';

/**
 * The installed dependency tree of a project (its node_modules directory)
 */
export class DependencyTree {
  public readonly directory: string;

  constructor(
    public readonly cwd: string,
    public readonly name: string = 'node_modules',
    private readonly archiver: IArchiver = new TarArchiver()) {
    this.directory = path.join(cwd, name);
  }

  public exists(): Promise<boolean> {
    return exists(this.directory, st => st.isDirectory());
  }

  /**
   * Remove the tree, so that installs always start from nothing
   */
  public async clear(): Promise<void> {
    try {
      await rimraf(this.directory);
    } catch (e) {
      throw new DepcacheError('remove', `Could not remove ${this.directory}: ${errorMessage(e)}`, { cause: e });
    }
  }

  public async pack(archivePath: string): Promise<void> {
    log.debug(`Packing ${this.directory} -> ${archivePath}`);
    try {
      await ensureDirForFile(archivePath);
      await this.archiver.pack(this.cwd, this.name, archivePath);
    } catch (e) {
      // Never leave a half-written archive behind, it would look like a valid entry
      await rimraf(archivePath);
      throw new DepcacheError('pack', `Could not archive ${this.directory} to ${archivePath}: ${errorMessage(e)}`, { cause: e });
    }
  }

  public async unpack(archivePath: string): Promise<void> {
    log.debug(`Unpacking ${archivePath} -> ${this.cwd}`);
    try {
      await this.archiver.unpack(archivePath, this.cwd);
    } catch (e) {
      throw new DepcacheError('corrupt-archive', `Cache entry ${archivePath} could not be extracted: ${errorMessage(e)}`, { cause: e });
    }
  }
}
