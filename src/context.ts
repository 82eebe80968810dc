import {
  getConfiguration,
  getExcludeCommitPatterns,
  getReleaseChannelRules,
  getVersioningPolicy,
} from './config';
import { createHostingClient, HostingClient } from './hosting';
import { logger } from './logger';
import { CommitParser, createCommitParser } from './parsers';
import { ProjectConfig } from './schemas/project_config';
import {
  findLatestVersions,
  matchChannel,
  NO_RELEASE,
  NoReleaseWarranted,
  ReleaseChannelRule,
  resolveNextVersion,
} from './utils/autoVersion';
import { ConfigurationError } from './utils/errors';
import {
  buildReleaseHistory,
  collectVersions,
  getReleasedVersions,
  ReleaseHistory,
} from './utils/releaseHistory';
import { renderTag } from './utils/tagFormat';
import {
  BumpLevel,
  isValidPrereleaseToken,
  Version,
  versionToString,
} from './utils/version';
import { VersionControl } from './vcs/base';
import { detectRemoteUrl, getGitRepository } from './vcs/git';

/**
 * Everything the commands need, resolved once from the configuration
 */
export interface RuntimeContext {
  config: ProjectConfig;
  repository: VersionControl;
  parser: CommitParser;
  hosting: HostingClient | null;
}

/**
 * Builds the runtime context from the configuration file
 *
 * @param repository Repository to work on, the git repository of the
 *        project when not given
 * @param remoteUrl URL of the git remote, looked up when not given
 */
export async function createRuntimeContext(
  repository?: VersionControl,
  remoteUrl?: string
): Promise<RuntimeContext> {
  const config = getConfiguration();
  const parser = createCommitParser(
    config.commitParser,
    config.commitParserOptions
  );
  const repo = repository ?? (await getGitRepository());
  const hosting = createHostingClient(
    config.remote,
    remoteUrl ?? (repository ? undefined : await detectRemoteUrl())
  );
  return { config, repository: repo, parser, hosting };
}

/**
 * Builds the release history of the current branch
 */
export async function getReleaseHistory(
  ctx: RuntimeContext,
  tags?: ReadonlyMap<string, string>
): Promise<ReleaseHistory> {
  const { config, repository, parser } = ctx;
  return buildReleaseHistory({
    commits: repository.listCommits('HEAD'),
    tags: tags ?? (await repository.listTags()),
    parser,
    tagFormat: config.tagFormat,
    excludeCommitPatterns: getExcludeCommitPatterns(config.changelog),
    boundaryCommits: config.changelog.boundaryCommits,
  });
}

export interface NextReleaseOverrides {
  /** Release as a prerelease whatever the channel says */
  asPrerelease?: boolean;
  prereleaseToken?: string;
  forceLevel?: BumpLevel;
  /** Branch to resolve the channel for instead of the checked out one */
  branch?: string;
}

export interface NextRelease {
  branch: string;
  channel: ReleaseChannelRule;
  history: ReleaseHistory;
  currentVersion: Version | null;
  nextVersion: Version | NoReleaseWarranted;
  /** Tag of the next version, null when no release is warranted */
  nextTag: string | null;
}

/**
 * Decides on the next release of the current branch
 */
export async function computeNextRelease(
  ctx: RuntimeContext,
  overrides: NextReleaseOverrides = {}
): Promise<NextRelease> {
  const { config, repository } = ctx;
  const branch = overrides.branch ?? (await repository.currentBranchName());
  let channel = matchChannel(branch, getReleaseChannelRules(config));

  if (overrides.asPrerelease || overrides.prereleaseToken) {
    const prereleaseToken = overrides.prereleaseToken ?? channel.prereleaseToken;
    if (!isValidPrereleaseToken(prereleaseToken)) {
      throw new ConfigurationError(
        `Invalid prerelease token: "${prereleaseToken}"`
      );
    }
    channel = { ...channel, prerelease: true, prereleaseToken };
  }

  const tags = await repository.listTags();
  const history = await getReleaseHistory(ctx, tags);
  const { currentVersion, latestFinalVersion } = findLatestVersions(
    getReleasedVersions(history),
    channel.prerelease ? channel.prereleaseToken : undefined
  );

  const nextVersion = resolveNextVersion({
    currentVersion,
    latestFinalVersion,
    pendingTokens: history.unreleased,
    channel,
    policy: getVersioningPolicy(config),
    forceLevel: overrides.forceLevel,
    existingVersions: collectVersions(tags.keys(), config.tagFormat),
  });

  if (nextVersion === NO_RELEASE) {
    logger.debug('No release warranted by the pending commits');
  } else {
    logger.debug(
      `Next version: ${versionToString(nextVersion)} (current: ${
        currentVersion ? versionToString(currentVersion) : 'none'
      })`
    );
  }

  return {
    branch,
    channel,
    history,
    currentVersion,
    nextVersion,
    nextTag:
      nextVersion === NO_RELEASE
        ? null
        : renderTag(nextVersion, config.tagFormat),
  };
}
