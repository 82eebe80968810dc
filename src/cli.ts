import isCI from 'is-ci';
import yargs, { Argv } from 'yargs';

import { LogLevel } from './logger';
import { envToBool, setGlobals } from './utils/helpers';
import { getPackageVersion } from './utils/version';

// Commands
import * as version from './commands/version';
import * as changelog from './commands/changelog';
import * as history from './commands/history';

export const SCRIPT_NAME = 'release-ledger';

const GLOBAL_BOOLEAN_FLAGS = {
  'no-input': {
    coerce: envToBool,
    default: isCI,
    describe: 'Suppresses all user prompts',
    global: true,
  },
  'dry-run': {
    coerce: envToBool,
    default: false,
    global: true,
    describe: 'Dry run mode: no tags, file writes or API mutations',
  },
};

const LOG_LEVEL_NAMES = Object.keys(LogLevel).filter(level =>
  isNaN(Number(level))
);

/**
 * Capitalizes a log level name the way consola spells it ("debug" → "Debug")
 */
export function normalizeLogLevel(level: string): string {
  return level ? level[0].toUpperCase() + level.slice(1).toLowerCase() : level;
}

/**
 * Lets boolean global flags be given standalone (`--dry-run`) while still
 * accepting the string values of their environment variables.
 *
 * yargs would read `--dry-run no` as a positional "no", so the flags are
 * declared as strings and a truthy value is injected after a standalone
 * flag. `--flag=no` keeps working as an override of the environment.
 */
export function fixGlobalBooleanFlags(argv: readonly string[]): string[] {
  const result: string[] = [];
  for (const arg of argv) {
    result.push(arg);
    if (arg.startsWith('--') && arg.slice(2) in GLOBAL_BOOLEAN_FLAGS) {
      result.push('1');
    }
  }
  return result;
}

/**
 * Command line parser with every command and global option registered
 */
export function createParser(): Argv {
  return yargs()
    .scriptName(SCRIPT_NAME)
    .parserConfiguration({
      'boolean-negation': false,
    })
    .env('RELEASE_LEDGER')
    .command(version)
    .command(changelog)
    .command(history)
    .demandCommand()
    .version(getPackageVersion())
    .alias('v', 'version')
    .help()
    .alias('h', 'help')
    .options(GLOBAL_BOOLEAN_FLAGS)
    .option('log-level', {
      default: 'Info',
      choices: LOG_LEVEL_NAMES,
      coerce: normalizeLogLevel,
      describe: 'Logging level',
      global: true,
    })
    .strictCommands()
    .showHelpOnFail(true)
    .middleware(setGlobals);
}
