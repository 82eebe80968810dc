import { arch, hostname, platform, release, userInfo } from 'os';

import * as Sentry from '@sentry/node';

import { logger } from '../logger';
import { getPackageVersion } from './version';

/** Environment variable holding the DSN errors are reported to */
export const SENTRY_DSN_ENV = 'RELEASE_LEDGER_SENTRY_DSN';

/**
 * Reads the DSN from the environment. Anything but an HTTP(S) URL leaves
 * error reporting off.
 */
export function getSentryDsn(
  env: NodeJS.ProcessEnv = process.env
): string | null {
  const dsn = env[SENTRY_DSN_ENV]?.trim();
  return dsn && /^https?:\/\//.test(dsn) ? dsn : null;
}

function hostTags(): Record<string, string> {
  return {
    'os.username': userInfo().username,
    'os.hostname': hostname(),
    'os.platform': platform(),
    'os.arch': arch(),
    'os.release': release(),
  };
}

/**
 * Turns on error reporting when a DSN is configured
 */
export function initSentrySdk(): void {
  const dsn = getSentryDsn();
  if (!dsn) {
    logger.debug(`${SENTRY_DSN_ENV} is not set, not reporting errors`);
    return;
  }

  const version = getPackageVersion();
  Sentry.init({
    dsn,
    release: `release-ledger@${version}`,
    // The server name is the machine's host name
    beforeSend: event => ({ ...event, server_name: undefined }),
  });
  Sentry.setTags(hostTags());
  Sentry.setContext('invocation', {
    argv: process.argv,
    cwd: process.cwd(),
    version,
  });
  logger.debug(`Reporting errors to ${new URL(dsn).host}`);
}
