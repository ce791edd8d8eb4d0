// eslint-disable-next-line @typescript-eslint/no-require-imports
import chalk = require('chalk');

export type LogLevel = 'quiet' | 'normal' | 'verbose';

const PREFIX = '[depcache]';

let level: LogLevel = 'normal';

let startTime = Date.now();

export function setLevel(l: LogLevel) {
  level = l;
}

/**
 * Pick the level from the command line flags; `verbose` wins over `quiet`
 */
export function levelFromFlags(flags: { verbose?: boolean; quiet?: boolean }): LogLevel {
  if (flags.verbose) { return 'verbose'; }
  return flags.quiet ? 'quiet' : 'normal';
}

export function debug(s: string) {
  if (level === 'verbose') {
    write(chalk.gray(`${PREFIX} [${pad(6, elapsedTime())}] ${s}`));
  }
}

/**
 * Progress messages, suppressed in quiet mode
 */
export function info(s: string) {
  if (level !== 'quiet') {
    write(chalk.blue(`${PREFIX} ${s}`));
  }
}

export function warning(s: string) {
  write(chalk.yellow(`${PREFIX} warning: ${s}`));
}

export function error(s: string) {
  write(chalk.red(`${PREFIX} error: ${s}`));
}

export function markStartTime() {
  startTime = Date.now();
}

function write(line: string) {
  process.stderr.write(line + '\n');
}

function elapsedTime() {
  const elapsedS = (Date.now() - startTime) / 1000.0;
  return elapsedS.toFixed(1);
}

function pad(n: number, x: string) {
  return ' '.repeat(Math.max(n - x.length, 0)) + x;
}
