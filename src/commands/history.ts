import { createRuntimeContext, getReleaseHistory, RuntimeContext } from '../context';
import { formatTable, logger } from '../logger';
import { handleGlobalError } from '../utils/errors';
import { ReleaseHistory } from '../utils/releaseHistory';
import { formatDate } from '../utils/strings';
import { versionToString } from '../utils/version';

export const command = ['history'];
export const description = 'List the releases found in the git history';

const TABLE_HEAD = ['Version', 'Tag', 'Date', 'Commits', 'Excluded'];

/**
 * Renders the releases of the history as a table, newest first
 */
export function formatHistoryTable(history: ReleaseHistory): string {
  const rows: string[][] = [];
  if (history.unreleased.length > 0 || history.unreleasedExcluded.length > 0) {
    rows.push([
      'Unreleased',
      '',
      '',
      String(history.unreleased.length),
      String(history.unreleasedExcluded.length),
    ]);
  }
  for (const release of history.released) {
    rows.push([
      versionToString(release.version),
      release.tag,
      formatDate(release.committedDate),
      String(release.commits.length),
      String(release.excluded.length),
    ]);
  }
  return formatTable(TABLE_HEAD, rows);
}

/**
 * Body of 'history' command
 */
export async function historyMain(ctx?: RuntimeContext): Promise<void> {
  const context = ctx ?? (await createRuntimeContext());
  const history = await getReleaseHistory(context);

  if (history.released.length === 0 && history.unreleased.length === 0) {
    logger.info('No commits found.');
    return;
  }
  console.log(formatHistoryTable(history));

  for (const diagnostic of history.diagnostics) {
    if (diagnostic.kind === 'dangling-tag') {
      logger.warn(
        `Tag "${diagnostic.tag}" is not reachable from the current branch (${diagnostic.sha})`
      );
    } else {
      logger.warn(`Commit ${diagnostic.sha}: ${diagnostic.message}`);
    }
  }
  if (history.discarded.length > 0) {
    logger.info(
      `${history.discarded.length} commits before the oldest release were discarded`
    );
  }
}

export const handler = async (): Promise<void> => {
  try {
    return await historyMain();
  } catch (e) {
    handleGlobalError(e);
  }
};
