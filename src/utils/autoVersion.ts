import { logger } from '../logger';
import { CommitToken } from '../parsers/base';
import { AmbiguousChannelMatchError, NotAReleaseBranchError } from './errors';
import {
  bumpLevelBetween,
  BumpLevel,
  bumpVersion,
  compareVersions,
  compareVersionsTotal,
  finalizeVersion,
  isHigherBump,
  isPrerelease,
  maxBumpLevel,
  toPrerelease,
  Version,
  versionsEqual,
  versionToString,
} from './version';

/**
 * Branch-scoped versioning policy
 */
export interface ReleaseChannelRule {
  name: string;
  /** Matched against the start of the branch name */
  match: RegExp;
  prerelease: boolean;
  prereleaseToken: string;
}

/**
 * Project-wide versioning policy
 */
export interface VersioningPolicy {
  /** Version of the very first release */
  initialVersion: Version;
  /** Whether a breaking change on 0.x goes to 1.0.0 (otherwise: minor bump) */
  majorOnZero: boolean;
  /** When false, releases never stay on 0.x */
  allowZeroVersion: boolean;
}

export const DEFAULT_VERSIONING_POLICY: VersioningPolicy = {
  initialVersion: { major: 0, minor: 1, patch: 0 },
  majorOnZero: true,
  allowZeroVersion: true,
};

/** The pending commits don't justify a release */
export const NO_RELEASE = 'no-release';
export type NoReleaseWarranted = typeof NO_RELEASE;

/**
 * Picks the release channel for the given branch
 *
 * @throws AmbiguousChannelMatchError if several rules match
 * @throws NotAReleaseBranchError if none does
 */
export function matchChannel(
  branch: string,
  rules: readonly ReleaseChannelRule[]
): ReleaseChannelRule {
  const matching = rules.filter(rule => rule.match.test(branch));
  if (matching.length > 1) {
    throw new AmbiguousChannelMatchError(
      branch,
      matching.map(rule => rule.name)
    );
  }
  if (matching.length === 0) {
    throw new NotAReleaseBranchError(branch);
  }
  const [rule] = matching;
  logger.debug(
    `Branch "${branch}" uses release channel "${rule.name}"` +
      (rule.prerelease ? ` (prerelease "${rule.prereleaseToken}")` : '')
  );
  return rule;
}

/**
 * The biggest bump level among the given commits
 */
export function aggregateBumpLevel(tokens: readonly CommitToken[]): BumpLevel {
  return tokens.reduce<BumpLevel>(
    (level, token) => maxBumpLevel(level, token.bump),
    'none'
  );
}

/**
 * Finds the versions the next release is computed from
 *
 * @param versions Versions of the releases reachable from the branch head
 * @param prereleaseToken Token of the current channel, preferred when a
 *        version exists as prereleases with several tokens
 */
export function findLatestVersions(
  versions: readonly Version[],
  prereleaseToken?: string
): { currentVersion: Version | null; latestFinalVersion: Version | null } {
  let currentVersion: Version | null = null;
  let latestFinalVersion: Version | null = null;
  for (const version of versions) {
    if (
      !isPrerelease(version) &&
      (!latestFinalVersion || compareVersionsTotal(version, latestFinalVersion) > 0)
    ) {
      latestFinalVersion = version;
    }
    if (!currentVersion || isNewer(version, currentVersion, prereleaseToken)) {
      currentVersion = version;
    }
  }
  return { currentVersion, latestFinalVersion };
}

function isNewer(
  candidate: Version,
  current: Version,
  preferredToken?: string
): boolean {
  if (
    bumpLevelBetween(candidate, current) === 'none' &&
    isPrerelease(candidate) &&
    isPrerelease(current) &&
    candidate.prereleaseToken !== current.prereleaseToken
  ) {
    return candidate.prereleaseToken === preferredToken;
  }
  return compareVersionsTotal(candidate, current) > 0;
}

export interface ResolveOptions {
  /** Newest release reachable from the branch head, final or not */
  currentVersion: Version | null;
  /** Newest final release reachable from the branch head */
  latestFinalVersion: Version | null;
  /** Commits since the newest release, exclusions already removed */
  pendingTokens: readonly CommitToken[];
  channel: Pick<ReleaseChannelRule, 'prerelease' | 'prereleaseToken'>;
  policy?: VersioningPolicy;
  /** Use this bump level instead of the one derived from the commits */
  forceLevel?: BumpLevel;
  /**
   * Every version tagged in the repository, reachable or not. Used to skip
   * prerelease revisions already taken by another branch.
   */
  existingVersions?: readonly Version[];
}

const ZERO_VERSION: Version = { major: 0, minor: 0, patch: 0 };

function adjustForZeroVersion(
  level: BumpLevel,
  base: Version,
  policy: VersioningPolicy
): BumpLevel {
  if (base.major !== 0 || level === 'none') {
    return level;
  }
  if (!policy.allowZeroVersion) {
    return 'major';
  }
  if (!policy.majorOnZero && level === 'major') {
    return 'minor';
  }
  return level;
}

function withFreeRevision(
  candidate: Version,
  existingVersions: readonly Version[]
): Version {
  if (!isPrerelease(candidate)) {
    return candidate;
  }
  const taken = existingVersions
    .filter(
      version =>
        version.prereleaseToken === candidate.prereleaseToken &&
        bumpLevelBetween(version, candidate) === 'none'
    )
    .map(version => version.prereleaseRevision ?? 0);
  const highest = Math.max(0, ...taken);
  const revision = candidate.prereleaseRevision ?? 1;
  if (revision > highest) {
    return candidate;
  }
  logger.debug(
    `${versionToString(candidate)} is already tagged, moving to revision ${highest + 1}`
  );
  return { ...candidate, prereleaseRevision: highest + 1 };
}

function firstVersion(
  aggregate: BumpLevel,
  policy: VersioningPolicy
): Version {
  const { initialVersion } = policy;
  if (
    initialVersion.major === 0 &&
    (!policy.allowZeroVersion || (aggregate === 'major' && policy.majorOnZero))
  ) {
    return { major: 1, minor: 0, patch: 0 };
  }
  return initialVersion;
}

/**
 * Next version while the history only holds prereleases: they are all
 * candidates of the first release, whose tuple only moves up when the pending
 * commits call for a bigger first version.
 */
function resolveFirstReleaseCandidate(
  currentVersion: Version,
  aggregate: BumpLevel,
  channel: ResolveOptions['channel'],
  policy: VersioningPolicy
): Version {
  const tuple = finalizeVersion(currentVersion);
  const first = firstVersion(aggregate, policy);
  const target = compareVersions(first, tuple) > 0 ? first : tuple;
  if (!channel.prerelease) {
    return target;
  }
  if (
    currentVersion.prereleaseToken === channel.prereleaseToken &&
    versionsEqual(target, tuple)
  ) {
    return toPrerelease(
      tuple,
      channel.prereleaseToken,
      (currentVersion.prereleaseRevision ?? 0) + 1
    );
  }
  return toPrerelease(target, channel.prereleaseToken);
}

/**
 * Computes the version of the next release
 *
 * @returns The next version, or NO_RELEASE when the pending commits don't
 *          call for one
 */
export function resolveNextVersion(
  options: ResolveOptions
): Version | NoReleaseWarranted {
  const {
    currentVersion,
    pendingTokens,
    channel,
    policy = DEFAULT_VERSIONING_POLICY,
    forceLevel,
    existingVersions = [],
  } = options;
  const aggregate = forceLevel ?? aggregateBumpLevel(pendingTokens);

  if (!currentVersion) {
    // The first release happens as soon as there is anything to release
    if (pendingTokens.length === 0 && !forceLevel) {
      return NO_RELEASE;
    }
    const initial = firstVersion(aggregate, policy);
    return withFreeRevision(
      channel.prerelease
        ? toPrerelease(initial, channel.prereleaseToken)
        : initial,
      existingVersions
    );
  }

  if (aggregate === 'none') {
    return NO_RELEASE;
  }

  if (!options.latestFinalVersion && isPrerelease(currentVersion)) {
    return withFreeRevision(
      resolveFirstReleaseCandidate(currentVersion, aggregate, channel, policy),
      existingVersions
    );
  }

  const base = options.latestFinalVersion ?? ZERO_VERSION;
  // The bump that led from the last final release to the current prerelease
  const producedLevel = isPrerelease(currentVersion)
    ? bumpLevelBetween(base, currentVersion)
    : 'none';
  const level = adjustForZeroVersion(aggregate, base, policy);

  if (!channel.prerelease) {
    return bumpVersion(base, maxBumpLevel(level, producedLevel));
  }

  let candidate: Version;
  if (
    currentVersion.prereleaseToken === channel.prereleaseToken &&
    !isHigherBump(level, producedLevel)
  ) {
    candidate = toPrerelease(
      currentVersion,
      channel.prereleaseToken,
      (currentVersion.prereleaseRevision ?? 0) + 1
    );
  } else {
    candidate = toPrerelease(
      bumpVersion(base, maxBumpLevel(level, producedLevel)),
      channel.prereleaseToken
    );
  }
  return withFreeRevision(candidate, existingVersions);
}
