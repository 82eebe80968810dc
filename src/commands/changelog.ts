import { existsSync, promises as fsPromises } from 'fs';
import path from 'path';

import { Argv } from 'yargs';

import { getConfigFileDir } from '../config';
import {
  createRuntimeContext,
  getReleaseHistory,
  RuntimeContext,
} from '../context';
import { logger } from '../logger';
import { serializeChangelog, updateChangelog } from '../utils/changelog';
import { handleGlobalError } from '../utils/errors';
import { isDryRun } from '../utils/helpers';
import { ReleaseHistory } from '../utils/releaseHistory';

export const command = ['changelog'];
export const description = 'Generate the changelog from the git history';

/** Command line options */
export interface ChangelogOptions {
  /** Write the changelog file instead of printing it */
  write?: boolean;
}

export const builder = (yargs: Argv) =>
  yargs.option('write', {
    alias: 'w',
    default: false,
    description:
      'Write the changelog file (see "changelog.mode") instead of printing it',
    type: 'boolean',
  });

/**
 * Absolute path of the project's changelog file
 */
export function getChangelogPath(ctx: RuntimeContext): string {
  return path.resolve(getConfigFileDir() || '.', ctx.config.changelog.path);
}

/**
 * Renders the changelog document for the given history, starting from the
 * existing file in "update" mode
 */
export async function renderChangelogFile(
  ctx: RuntimeContext,
  history: ReleaseHistory
): Promise<string> {
  const { config, parser, hosting } = ctx;
  const options = { hosting, headerTemplate: config.changelog.headerTemplate };
  const changelogPath = getChangelogPath(ctx);
  if (config.changelog.mode === 'init' || !existsSync(changelogPath)) {
    return serializeChangelog(history, parser, options);
  }
  const current = (await fsPromises.readFile(changelogPath)).toString();
  return updateChangelog(current, history, parser, options);
}

/**
 * Writes the changelog file, unless in dry-run mode
 */
export async function writeChangelogFile(
  ctx: RuntimeContext,
  history: ReleaseHistory
): Promise<void> {
  const changelogPath = getChangelogPath(ctx);
  const contents = await renderChangelogFile(ctx, history);
  if (isDryRun()) {
    logger.info(`[dry-run] Not writing ${changelogPath}.`);
    return;
  }
  await fsPromises.writeFile(changelogPath, contents);
  logger.info(`Changelog written to ${changelogPath}`);
}

/**
 * Body of 'changelog' command
 */
export async function changelogMain(
  argv: ChangelogOptions,
  ctx?: RuntimeContext
): Promise<void> {
  const context = ctx ?? (await createRuntimeContext());
  const history = await getReleaseHistory(context);

  if (argv.write) {
    await writeChangelogFile(context, history);
    return;
  }
  console.log(
    serializeChangelog(history, context.parser, {
      hosting: context.hosting,
      headerTemplate: context.config.changelog.headerTemplate,
    }).trimEnd()
  );
}

export const handler = async (args: ChangelogOptions): Promise<void> => {
  try {
    return await changelogMain(args);
  } catch (e) {
    handleGlobalError(e);
  }
};
