import * as child_process from 'child_process';
import * as log from '../util/log';

export interface IInstaller {
  /**
   * Populate the dependency tree in `cwd`, returning the exit status
   */
  install(cwd: string): Promise<number>;
}

/**
 * Runs the package manager's install command through the shell
 *
 * Output goes straight to our own stdout/stderr, installs can take a while
 * and people want to see progress.
 */
export class ShellInstaller implements IInstaller {
  constructor(private readonly command: string = 'npm install') {
  }

  public install(cwd: string): Promise<number> {
    log.debug(`[${cwd}] ${this.command}`);

    return new Promise((ok, ko) => {
      const child = child_process.spawn(this.command, {
        cwd,
        shell: true,
        stdio: 'inherit',
      });

      child.on('error', ko);
      child.on('close', (code, signal) => {
        if (signal) {
          log.error(`'${this.command}' killed by ${signal}`);
        }
        ok(code ?? 1);
      });
    });
  }
}
