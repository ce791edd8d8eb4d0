#!/usr/bin/env node
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { ConfigOverrides, loadConfig } from '../lib/config';
import { install } from '../lib/commands/install';
import { printKey } from '../lib/commands/key';
import { DepcacheError, SimpleError } from '../lib/util/flow';
import { error, levelFromFlags, markStartTime, setLevel } from '../lib/util/log';

async function main() {
  const argv = yargs(hideBin(process.argv))
    .usage('$0 [install|key] [args]')
    .command(['install', '$0'], 'Restore the dependency tree from cache, or install and cache it')
    .command('key', 'Print the cache key for the current directory')
    .option('verbose', {
      alias: 'v',
      type: 'boolean',
      desc: 'Increase logging verbosity',
      default: false,
    })
    .option('quiet', {
      alias: 'q',
      type: 'boolean',
      desc: 'Only print warnings and errors',
      default: false,
    })
    .option('force', {
      alias: 'f',
      type: 'boolean',
      desc: 'Always install, and replace the cached copy',
      default: false,
    })
    .option('adopt-existing', {
      alias: 'cache-existing',
      type: 'boolean',
      desc: 'Cache the dependency tree that is already there instead of installing',
      default: false,
    })
    .option('cache-dir', {
      type: 'string',
      desc: 'Directory for local cache archives',
      requiresArg: true,
    })
    .option('remote-host', {
      type: 'string',
      desc: 'Redis host for the shared cache (empty to disable)',
    })
    .option('remote-port', {
      type: 'number',
      desc: 'Redis port',
      requiresArg: true,
    })
    .option('ttl', {
      type: 'number',
      desc: 'Seconds until an unused remote entry expires',
      requiresArg: true,
    })
    .option('prefix', {
      type: 'string',
      desc: 'Namespace for remote cache keys',
      requiresArg: true,
    })
    .help()
    .strict()
    .showHelpOnFail(false)
    .parseSync();

  setLevel(levelFromFlags(argv));
  markStartTime();

  const overrides: ConfigOverrides = {
    cacheDir: argv.cacheDir,
    remoteHost: argv.remoteHost,
    remotePort: argv.remotePort,
    ttlSeconds: argv.ttl,
    prefix: argv.prefix,
    force: argv.force,
    adoptExisting: argv.adoptExisting,
  };
  const config = await loadConfig(process.cwd(), overrides);

  if (argv._[0] === 'key') {
    await printKey(config);
  } else {
    await install(config);
  }
}

main().catch(e => {
  if (e instanceof DepcacheError) {
    error(e.message);
    process.exitCode = e.exitCode;
  } else if (e instanceof SimpleError) {
    error(e.message);
    process.exitCode = 1;
  } else {
    // eslint-disable-next-line no-console
    console.error(e);
    process.exitCode = 1;
  }
});
