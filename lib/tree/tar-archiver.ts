import * as path from 'path';
import * as tar from 'tar';

export interface IArchiver {
  /**
   * Archive `directory` (relative to `cwd`) into `archivePath`
   */
  pack(cwd: string, directory: string, archivePath: string): Promise<void>;

  /**
   * Extract `archivePath` over `cwd`
   */
  unpack(archivePath: string, cwd: string): Promise<void>;
}

export class TarArchiver implements IArchiver {
  public async pack(cwd: string, directory: string, archivePath: string): Promise<void> {
    await tar.c({
      file: archivePath,
      gzip: true,
      portable: true,
      cwd,
    }, [directory]);
  }

  public async unpack(archivePath: string, cwd: string): Promise<void> {
    // Read the whole archive once before writing anything. tar.x rejects on the
    // first bad block while earlier entries are still being written out.
    await tar.t({
      file: archivePath,
      strict: true,
    });

    await tar.x({
      file: archivePath,
      cwd: path.resolve(cwd),
      strict: true,
    });
  }
}
