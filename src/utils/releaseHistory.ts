import { logger as loggerRaw } from '../logger';
import { CommitParser, CommitToken } from '../parsers/base';
import { RawCommit } from '../vcs/base';
import { ParseError } from './errors';
import { parseTag } from './tagFormat';
import { compareVersionsTotal, Version } from './version';

const logger = loggerRaw.withScope('[history]');

/**
 * A tagged release and the commits it introduced
 */
export interface Release {
  readonly version: Version;
  readonly tag: string;
  /** SHA of the tagged commit */
  readonly sha: string;
  readonly committedDate: Date;
  /** Newest first */
  readonly commits: readonly CommitToken[];
  /** Commits matching an exclusion pattern, newest first */
  readonly excluded: readonly CommitToken[];
}

export type Diagnostic =
  | { kind: 'parse-error'; sha: string; message: string }
  | { kind: 'dangling-tag'; tag: string; sha: string };

export interface ReleaseHistory {
  /** Newest first */
  readonly released: readonly Release[];
  /** Commits not part of any release yet, newest first */
  readonly unreleased: readonly CommitToken[];
  readonly unreleasedExcluded: readonly CommitToken[];
  /** Commits dropped by the "discard" boundary policy */
  readonly discarded: readonly CommitToken[];
  readonly diagnostics: readonly Diagnostic[];
  /** SHA of the newest walked commit, null for an empty history */
  readonly headSha: string | null;
  /** Author date of the head commit */
  readonly headDate: Date | null;
}

export type BoundaryCommitsPolicy = 'attach' | 'discard';

export interface BuildHistoryOptions {
  /** Topologically ordered, newest first */
  commits: AsyncIterable<RawCommit> | Iterable<RawCommit>;
  /** Tag name to commit SHA */
  tags: ReadonlyMap<string, string>;
  parser: CommitParser;
  tagFormat: string;
  excludeCommitPatterns?: readonly RegExp[];
  boundaryCommits?: BoundaryCommitsPolicy;
}

interface ManagedTag {
  name: string;
  sha: string;
  version: Version;
}

interface WalkedCommit {
  raw: RawCommit;
  token: CommitToken;
  position: number;
}

function fallbackToken(commit: RawCommit, parser: CommitParser): CommitToken {
  const subject = commit.message.split('\n')[0].trim();
  return {
    sha: commit.sha,
    message: commit.message,
    bump: 'none',
    category: parser.defaultCategory,
    breaking: false,
    scope: null,
    descriptions: subject ? [subject] : [],
    breakingDescriptions: [],
  };
}

function byPosition(a: WalkedCommit, b: WalkedCommit): number {
  return a.position - b.position;
}

/**
 * Splits history into releases.
 *
 * Each managed tag claims the commits reachable from it that no older tag
 * claimed, so commits merged from long-lived branches end up in the first
 * release that contained them. Everything left is unreleased.
 */
export async function buildReleaseHistory(
  options: BuildHistoryOptions
): Promise<ReleaseHistory> {
  const {
    parser,
    tagFormat,
    excludeCommitPatterns = [],
    boundaryCommits = 'attach',
  } = options;
  const diagnostics: Diagnostic[] = [];

  const walked = new Map<string, WalkedCommit>();
  for await (const raw of options.commits) {
    if (walked.has(raw.sha)) {
      continue;
    }
    let token: CommitToken;
    try {
      token = parser.parse(raw);
    } catch (err) {
      if (!(err instanceof ParseError)) {
        throw err;
      }
      logger.warn(err.message);
      diagnostics.push({ kind: 'parse-error', sha: raw.sha, message: err.message });
      token = fallbackToken(raw, parser);
    }
    walked.set(raw.sha, { raw, token, position: walked.size });
  }
  logger.debug(`Walked ${walked.size} commits`);

  const tagsBySha = new Map<string, ManagedTag[]>();
  for (const [name, sha] of options.tags) {
    const version = parseTag(name, tagFormat);
    if (!version) {
      logger.debug(`Ignoring tag "${name}", it doesn't match "${tagFormat}"`);
      continue;
    }
    if (!walked.has(sha)) {
      logger.warn(`Tag "${name}" points to ${sha}, which is not reachable from the walked branch`);
      diagnostics.push({ kind: 'dangling-tag', tag: name, sha });
      continue;
    }
    const sameCommit = tagsBySha.get(sha) ?? [];
    sameCommit.push({ name, sha, version });
    tagsBySha.set(sha, sameCommit);
  }

  // Oldest tagged commit first, so older releases claim shared ancestors
  const taggedShas = [...tagsBySha.keys()].sort(
    (a, b) => (walked.get(b)?.position ?? 0) - (walked.get(a)?.position ?? 0)
  );

  const claimed = new Set<string>();
  const releases: Release[] = [];
  let oldestRelease: Release | undefined;
  for (const sha of taggedShas) {
    const claimedHere: WalkedCommit[] = [];
    const stack = [sha];
    while (stack.length > 0) {
      const current = stack.pop();
      const commit = current === undefined ? undefined : walked.get(current);
      if (!commit || claimed.has(commit.raw.sha)) {
        continue;
      }
      claimed.add(commit.raw.sha);
      claimedHere.push(commit);
      stack.push(...commit.raw.parents);
    }
    claimedHere.sort(byPosition);

    const commits: CommitToken[] = [];
    const excluded: CommitToken[] = [];
    for (const { token } of claimedHere) {
      (isExcluded(token, excludeCommitPatterns) ? excluded : commits).push(token);
    }

    // The highest version on a commit owns its changes, the others are empty
    const tagsHere = (tagsBySha.get(sha) ?? []).sort((a, b) =>
      compareVersionsTotal(b.version, a.version)
    );
    const committedDate = walked.get(sha)?.raw.authoredDate ?? new Date(0);
    tagsHere.forEach((tag, index) => {
      const release: Release = {
        version: tag.version,
        tag: tag.name,
        sha,
        committedDate,
        commits: index === 0 ? commits : [],
        excluded: index === 0 ? excluded : [],
      };
      releases.push(release);
      if (index === 0 && !oldestRelease) {
        oldestRelease = release;
      }
    });
  }

  let discarded: readonly CommitToken[] = [];
  if (boundaryCommits === 'discard' && oldestRelease) {
    const index = releases.indexOf(oldestRelease);
    discarded = [...oldestRelease.commits, ...oldestRelease.excluded];
    releases[index] = { ...oldestRelease, commits: [], excluded: [] };
    logger.debug(
      `Discarded ${discarded.length} commits of the oldest release ${oldestRelease.tag}`
    );
  }

  const unreleased: CommitToken[] = [];
  const unreleasedExcluded: CommitToken[] = [];
  for (const commit of walked.values()) {
    if (!claimed.has(commit.raw.sha)) {
      (isExcluded(commit.token, excludeCommitPatterns)
        ? unreleasedExcluded
        : unreleased
      ).push(commit.token);
    }
  }

  const released = releases.sort(
    (a, b) =>
      (walked.get(a.sha)?.position ?? 0) - (walked.get(b.sha)?.position ?? 0) ||
      compareVersionsTotal(b.version, a.version)
  );

  const [head] = walked.keys();
  return {
    released,
    unreleased,
    unreleasedExcluded,
    discarded,
    diagnostics,
    headSha: head ?? null,
    headDate: head ? walked.get(head)?.raw.authoredDate ?? null : null,
  };
}

function isExcluded(token: CommitToken, patterns: readonly RegExp[]): boolean {
  return patterns.some(pattern => pattern.test(token.message));
}

/**
 * Versions of all released versions in the history
 */
export function getReleasedVersions(history: ReleaseHistory): Version[] {
  return history.released.map(release => release.version);
}

/**
 * The newest release matching the predicate, if any
 */
export function latestRelease(
  history: ReleaseHistory,
  predicate: (release: Release) => boolean = () => true
): Release | undefined {
  return history.released.find(predicate);
}

/**
 * Versions of all the managed tags among the given tag names, reachable or not
 */
export function collectVersions(
  tagNames: Iterable<string>,
  tagFormat: string
): Version[] {
  const versions: Version[] = [];
  for (const name of tagNames) {
    const version = parseTag(name, tagFormat);
    if (version) {
      versions.push(version);
    }
  }
  return versions;
}

/**
 * The history as it will look once the pending commits are released under
 * the given version. The release is dated like a tag on the head commit will
 * be once the history is read again.
 */
export function withPendingRelease(
  history: ReleaseHistory,
  version: Version,
  tag: string
): ReleaseHistory {
  if (!history.headSha || !history.headDate) {
    return history;
  }
  const release: Release = {
    version,
    tag,
    sha: history.headSha,
    committedDate: history.headDate,
    commits: history.unreleased,
    excluded: history.unreleasedExcluded,
  };
  return {
    ...history,
    released: [release, ...history.released],
    unreleased: [],
    unreleasedExcluded: [],
  };
}
