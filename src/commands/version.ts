import { Argv } from 'yargs';

import {
  computeNextRelease,
  createRuntimeContext,
  RuntimeContext,
} from '../context';
import { logger } from '../logger';
import { CommitToken } from '../parsers';
import { NO_RELEASE } from '../utils/autoVersion';
import { serializeCommits } from '../utils/changelog';
import { handleGlobalError, reportError } from '../utils/errors';
import { isDryRun, promptConfirmation } from '../utils/helpers';
import { withPendingRelease } from '../utils/releaseHistory';
import {
  BUMP_LEVELS,
  BumpLevel,
  isBumpLevel,
  isPrerelease,
  versionToString,
} from '../utils/version';
import { writeChangelogFile } from './changelog';

export const command = ['version'];
export const description = '🔖 Resolve the next version and tag the release';

/** Command line options */
export interface VersionOptions {
  /** Only print the next version */
  print?: boolean;
  /** Only print the tag of the next version */
  printTag?: boolean;
  /** Update the changelog file */
  changelog?: boolean;
  /** Publish a release on the hosting platform */
  vcsRelease?: boolean;
  asPrerelease?: boolean;
  prereleaseToken?: string;
  forceLevel?: string;
}

export const builder = (yargs: Argv) =>
  yargs
    .option('print', {
      default: false,
      description: 'Print the next version and exit',
      type: 'boolean',
    })
    .option('print-tag', {
      default: false,
      description: 'Print the tag of the next version and exit',
      type: 'boolean',
    })
    .option('changelog', {
      default: false,
      description: 'Update the changelog file with the new release',
      type: 'boolean',
    })
    .option('vcs-release', {
      default: false,
      description: 'Publish a release on the hosting platform',
      type: 'boolean',
    })
    .option('as-prerelease', {
      default: false,
      description: 'Release a prerelease whatever the branch channel says',
      type: 'boolean',
    })
    .option('prerelease-token', {
      description: 'Prerelease token to use instead of the channel one',
      type: 'string',
    })
    .option('force-level', {
      choices: BUMP_LEVELS.filter(level => level !== 'none'),
      description: 'Bump level to use instead of the one derived from commits',
      type: 'string',
    });

function getForceLevel(value: string | undefined): BumpLevel | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!isBumpLevel(value)) {
    throw new Error(`Invalid bump level: "${value}"`);
  }
  return value;
}

/**
 * Body of 'version' command
 */
export async function versionMain(
  argv: VersionOptions,
  ctx?: RuntimeContext
): Promise<void> {
  const context = ctx ?? (await createRuntimeContext());
  const next = await computeNextRelease(context, {
    asPrerelease: argv.asPrerelease,
    prereleaseToken: argv.prereleaseToken,
    forceLevel: getForceLevel(argv.forceLevel),
  });

  for (const diagnostic of next.history.diagnostics) {
    if (diagnostic.kind === 'dangling-tag') {
      logger.debug(`Ignored tag ${diagnostic.tag} (${diagnostic.sha})`);
    }
  }

  if (next.nextVersion === NO_RELEASE || next.nextTag === null) {
    logger.info('No release will be made, the pending commits do not call for one.');
    return;
  }
  const nextVersion = next.nextVersion;
  const nextTag = next.nextTag;

  if (argv.print || argv.printTag) {
    console.log(argv.printTag ? nextTag : versionToString(nextVersion));
    return;
  }

  const headSha = next.history.headSha;
  if (!headSha) {
    reportError('Nothing to tag: the branch has no commits.');
    return;
  }

  logger.info(
    `Releasing ${nextTag} from "${next.branch}" (channel "${next.channel.name}")`
  );
  if (!(await promptConfirmation(`Create the tag ${nextTag}?`))) {
    logger.info('Aborted.');
    return;
  }

  const released = withPendingRelease(next.history, nextVersion, nextTag);
  if (argv.changelog) {
    await writeChangelogFile(context, released);
  }

  if (isDryRun()) {
    logger.info(`[dry-run] Not creating the tag ${nextTag}.`);
  } else {
    await context.repository.createTag(nextTag, headSha, `Release ${nextTag}`);
    logger.success(`Tagged ${headSha} as ${nextTag}`);
  }

  if (argv.vcsRelease) {
    await publishHostingRelease(
      context,
      nextTag,
      next.history.unreleased,
      isPrerelease(nextVersion)
    );
  }
}

async function publishHostingRelease(
  ctx: RuntimeContext,
  tag: string,
  commits: readonly CommitToken[],
  prerelease: boolean
): Promise<void> {
  const { hosting, parser } = ctx;
  if (!hosting?.createRelease) {
    reportError(
      `Cannot publish a release: ${hosting ? hosting.name : 'the hosting platform'} is not supported.`
    );
    return;
  }
  if (isDryRun()) {
    logger.info(`[dry-run] Not publishing a ${hosting.name} release for ${tag}.`);
    return;
  }
  const url = await hosting.createRelease(
    tag,
    tag,
    serializeCommits(commits, parser, hosting),
    prerelease
  );
  logger.success(`Published the release: ${url}`);
}

export const handler = async (args: VersionOptions): Promise<void> => {
  try {
    return await versionMain(args);
  } catch (e) {
    handleGlobalError(e);
  }
};
