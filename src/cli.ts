#!/usr/bin/env node
import { Command } from 'commander';
import { consola } from 'consola';
import { createRequire } from 'node:module';
import { runCheck, runDisplay, runPartCheck, runUri, type PartKind } from './commands.js';
import { ensureEnvLoaded, loadConfig } from './util/env.js';
import { logger } from './util/logger.js';

const require = createRequire(import.meta.url);
const packageJson = require('../package.json') as { version?: string };

type CheckCommandOptions = {
  file?: string;
  json?: boolean;
};

ensureEnvLoaded();
const config = loadConfig();
logger.setLevel(config.logLevel);

function fail(error: unknown): void {
  consola.error(error);
  process.exitCode = 1;
}

const program = new Command();

program
  .name('addrspec')
  .description('Validate email addresses against RFC 5322 and RFC 6531')
  .version(packageJson.version ?? '0.0.0');

program
  .command('check')
  .description('Validate one or more addresses')
  .argument('[addresses...]', 'Addresses to validate')
  .option('-f, --file <path>', 'Read addresses from a file, one per line')
  .option('--json', 'Print the verdicts as JSON')
  .action(async (addresses: string[], options: CheckCommandOptions) => {
    try {
      const allValid = await runCheck(addresses, {
        file: options.file,
        format: options.json ? 'json' : config.format,
      });
      if (!allValid) {
        process.exitCode = 1;
      }
    } catch (error) {
      fail(error);
    }
  });

for (const kind of ['local', 'domain'] as const satisfies readonly PartKind[]) {
  program
    .command(kind)
    .description(`Validate a lone ${kind === 'local' ? 'local-part' : 'domain'}`)
    .argument('<part>', 'The part to validate')
    .action((part: string) => {
      if (!runPartCheck(kind, part)) {
        process.exitCode = 1;
      }
    });
}

program
  .command('uri')
  .description('Print the mailto: URI of an address')
  .argument('<address>', 'A valid address')
  .action((address: string) => {
    try {
      runUri(address);
    } catch (error) {
      fail(error);
    }
  });

program
  .command('display')
  .description('Print an address with a display name')
  .argument('<address>', 'A valid address')
  .argument('<name>', 'The display name')
  .action((address: string, name: string) => {
    try {
      runDisplay(address, name);
    } catch (error) {
      fail(error);
    }
  });

await program.parseAsync(process.argv);
