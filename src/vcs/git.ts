import simpleGit, { type SimpleGit } from 'simple-git';

import { getConfigFileDir } from '../config';
import { logger as loggerRaw } from '../logger';
import { ConfigurationError } from '../utils/errors';
import { RawCommit, VersionControl } from './base';

const logger = loggerRaw.withScope('[git]');

/** Number of commits requested from `git log` at once */
export const COMMITS_PAGE_SIZE = 500;

const FIELD_SEPARATOR = '\x1f';
const RECORD_SEPARATOR = '\x1e';
const LOG_FORMAT = ['%H', '%P', '%aI', '%B'].join('%x1f') + '%x1e';

/**
 * Parses the output of `git log` in the LOG_FORMAT format
 */
export function parseLogOutput(output: string): RawCommit[] {
  const commits: RawCommit[] = [];
  for (const record of output.split(RECORD_SEPARATOR)) {
    const trimmed = record.replace(/^\n+/, '');
    if (!trimmed) {
      continue;
    }
    const [sha, parents, date, ...messageParts] = trimmed.split(FIELD_SEPARATOR);
    commits.push({
      sha,
      parents: parents ? parents.split(' ').filter(Boolean) : [],
      authoredDate: new Date(date),
      message: messageParts.join(FIELD_SEPARATOR).replace(/\s+$/, ''),
    });
  }
  return commits;
}

function isEmptyRepositoryError(err: unknown): boolean {
  return (
    err instanceof Error &&
    (err.message.includes('does not have any commits yet') ||
      err.message.includes('unknown revision or path not in the working tree'))
  );
}

/** The part of simple-git the repository needs */
export type GitClient = Pick<SimpleGit, 'raw' | 'revparse'>;

/**
 * VersionControl backed by the git binary through simple-git
 */
export class GitRepository implements VersionControl {
  public constructor(private readonly git: GitClient) {}

  public async *listCommits(ref: string): AsyncGenerator<RawCommit> {
    let skip = 0;
    while (true) {
      let output: string;
      try {
        output = await this.git.raw([
          'log',
          '--topo-order',
          `--format=${LOG_FORMAT}`,
          `--skip=${skip}`,
          `--max-count=${COMMITS_PAGE_SIZE}`,
          ref,
          '--',
        ]);
      } catch (err) {
        if (skip === 0 && isEmptyRepositoryError(err)) {
          logger.debug(`No commits found for "${ref}"`);
          return;
        }
        throw err;
      }
      const page = parseLogOutput(output);
      yield* page;
      if (page.length < COMMITS_PAGE_SIZE) {
        return;
      }
      skip += page.length;
    }
  }

  public async listTags(): Promise<Map<string, string>> {
    // %(*objectname) is the peeled commit of annotated tags, empty for
    // lightweight ones
    const output = await this.git.raw([
      'for-each-ref',
      '--format=%(refname:strip=2)%00%(objectname)%00%(*objectname)',
      'refs/tags',
    ]);
    const tags = new Map<string, string>();
    for (const line of output.split('\n')) {
      if (!line.trim()) {
        continue;
      }
      const [name, objectSha, peeledSha] = line.split('\0');
      tags.set(name, peeledSha || objectSha);
    }
    logger.debug(`Found ${tags.size} tags`);
    return tags;
  }

  public async createTag(
    name: string,
    targetSha: string,
    annotation: string
  ): Promise<string> {
    await this.git.raw(['tag', '-a', name, targetSha, '-m', annotation]);
    logger.debug(`Created tag "${name}" on ${targetSha}`);
    return `refs/tags/${name}`;
  }

  public async currentBranchName(): Promise<string> {
    const branch = (await this.git.revparse(['--abbrev-ref', 'HEAD'])).trim();
    if (branch !== 'HEAD') {
      return branch;
    }
    // Detached HEAD, as in most CI checkouts
    const ciBranch = process.env.GITHUB_REF_NAME || process.env.CI_COMMIT_REF_NAME;
    if (ciBranch) {
      logger.debug(`Detached HEAD, using the CI branch name "${ciBranch}"`);
      return ciBranch;
    }
    throw new ConfigurationError(
      'Cannot determine the current branch: HEAD is detached.'
    );
  }
}

/**
 * Opens the git repository that contains the configuration file, or the
 * current directory
 */
export async function getGitRepository(): Promise<GitRepository> {
  const repoDir = getConfigFileDir() || '.';
  logger.debug('Repository directory:', repoDir);

  const git = simpleGit(repoDir);
  const isRepo = await git.checkIsRepo();
  if (!isRepo) {
    throw new ConfigurationError('Not in a git repository!');
  }
  return new GitRepository(git);
}

/**
 * Returns the URL of the "origin" remote (or the first remote there is)
 */
export async function detectRemoteUrl(): Promise<string | undefined> {
  const git = simpleGit(getConfigFileDir() || '.');
  try {
    const remotes = await git.getRemotes(true);
    const defaultRemote =
      remotes.find(remote => remote.name === 'origin') || remotes[0];
    return defaultRemote && (defaultRemote.refs.push || defaultRemote.refs.fetch);
  } catch (error) {
    logger.warn('Error when trying to get git remotes: ', error);
    return undefined;
  }
}
