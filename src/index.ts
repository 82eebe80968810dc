#!/usr/bin/env node
import { createParser, fixGlobalBooleanFlags, SCRIPT_NAME } from './cli';
import { logger } from './logger';
import { initSentrySdk } from './utils/sentry';
import { getPackageVersion } from './utils/version';

/**
 * Main entrypoint
 */
async function main(): Promise<void> {
  if (!process.argv.includes('-v') && !process.argv.includes('--version')) {
    logger.debug(`${SCRIPT_NAME} ${getPackageVersion()}`);
  }
  initSentrySdk();

  await createParser().parse(fixGlobalBooleanFlags(process.argv.slice(2)));
}

main().catch(err => {
  logger.error(err);
  process.exitCode = 1;
});
