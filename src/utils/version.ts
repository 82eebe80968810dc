import { readFileSync } from 'fs';
import path from 'path';

import * as semver from 'semver';

import { IncomparableVersionsError } from './errors';

/**
 * Magnitude of a version increment implied by a commit.
 */
export type BumpLevel = 'none' | 'patch' | 'minor' | 'major';

/**
 * Bump level severities (higher number = bigger increment).
 */
export const BUMP_SEVERITY: ReadonlyMap<BumpLevel, number> = new Map([
  ['none', 0],
  ['patch', 1],
  ['minor', 2],
  ['major', 3],
]);

export const BUMP_LEVELS: readonly BumpLevel[] = [
  'none',
  'patch',
  'minor',
  'major',
];

/**
 * Type guard to check if a string is a valid BumpLevel.
 */
export function isBumpLevel(value: string): value is BumpLevel {
  return BUMP_LEVELS.some(level => level === value);
}

function severity(level: BumpLevel): number {
  return BUMP_SEVERITY.get(level) ?? 0;
}

/** Returns the bigger of the two bump levels */
export function maxBumpLevel(a: BumpLevel, b: BumpLevel): BumpLevel {
  return severity(a) >= severity(b) ? a : b;
}

/** Returns true if `a` implies a strictly bigger increment than `b` */
export function isHigherBump(a: BumpLevel, b: BumpLevel): boolean {
  return severity(a) > severity(b);
}

/**
 * A semantic version as managed by release-ledger.
 *
 * Prerelease versions always carry both a token and a revision
 * (`1.2.0-beta.3`), final releases carry neither.
 */
export interface Version {
  major: number;
  minor: number;
  patch: number;
  prereleaseToken?: string;
  /** Positive integer, present iff `prereleaseToken` is */
  prereleaseRevision?: number;
}

export function isPrerelease(version: Version): boolean {
  return version.prereleaseToken !== undefined;
}

export function versionsEqual(a: Version, b: Version): boolean {
  return (
    a.major === b.major &&
    a.minor === b.minor &&
    a.patch === b.patch &&
    a.prereleaseToken === b.prereleaseToken &&
    a.prereleaseRevision === b.prereleaseRevision
  );
}

/**
 * Renders the canonical version string: `M.m.p`, plus `-token.N` for
 * prereleases.
 */
export function versionToString(version: Version): string {
  const core = `${version.major}.${version.minor}.${version.patch}`;
  if (version.prereleaseToken === undefined) {
    return core;
  }
  return `${core}-${version.prereleaseToken}.${version.prereleaseRevision ?? 1}`;
}

const PRERELEASE_TOKEN_REGEX = /^[0-9A-Za-z-]+$/;

/**
 * Checks that the given string can be used as a prerelease token
 */
export function isValidPrereleaseToken(token: string): boolean {
  return PRERELEASE_TOKEN_REGEX.test(token) && !/^\d+$/.test(token);
}

/**
 * Parses a canonical version string.
 *
 * Only versions release-ledger can produce are accepted: no build metadata,
 * and prereleases of exactly the `token.N` shape.
 *
 * @param text Version string, without any tag prefix
 * @returns The parsed version or null
 */
export function parseVersion(text: string): Version | null {
  const parsed = semver.parse(text);
  if (!parsed || parsed.build.length > 0 || parsed.version !== text) {
    return null;
  }
  const version: Version = {
    major: parsed.major,
    minor: parsed.minor,
    patch: parsed.patch,
  };
  if (parsed.prerelease.length === 0) {
    return version;
  }
  const [token, revision] = parsed.prerelease;
  if (
    parsed.prerelease.length !== 2 ||
    typeof token !== 'string' ||
    !isValidPrereleaseToken(token) ||
    typeof revision !== 'number' ||
    revision < 1
  ) {
    return null;
  }
  return { ...version, prereleaseToken: token, prereleaseRevision: revision };
}

/**
 * Compares two versions.
 *
 * Numeric components are compared first; a final release sorts after any
 * prerelease of the same numbers; prereleases with the same token sort by
 * revision.
 *
 * @returns A negative number if `a` sorts before `b`, positive if after, 0 if equal
 * @throws IncomparableVersionsError for prereleases of the same numbers with
 *         different tokens
 */
export function compareVersions(a: Version, b: Version): number {
  const numeric =
    a.major - b.major || a.minor - b.minor || a.patch - b.patch;
  if (numeric !== 0) {
    return Math.sign(numeric);
  }
  if (a.prereleaseToken === undefined || b.prereleaseToken === undefined) {
    if (a.prereleaseToken === b.prereleaseToken) {
      return 0;
    }
    return a.prereleaseToken === undefined ? 1 : -1;
  }
  if (a.prereleaseToken !== b.prereleaseToken) {
    throw new IncomparableVersionsError(
      `Cannot compare "${versionToString(a)}" and "${versionToString(b)}": different prerelease tokens`
    );
  }
  return Math.sign((a.prereleaseRevision ?? 1) - (b.prereleaseRevision ?? 1));
}

/**
 * Drops the prerelease fields
 */
export function finalizeVersion(version: Version): Version {
  return { major: version.major, minor: version.minor, patch: version.patch };
}

/**
 * Applies a bump level to the numeric components, clearing the prerelease.
 *
 * A `none` bump returns the finalized version unchanged.
 */
export function bumpVersion(version: Version, level: BumpLevel): Version {
  switch (level) {
    case 'major':
      return { major: version.major + 1, minor: 0, patch: 0 };
    case 'minor':
      return { major: version.major, minor: version.minor + 1, patch: 0 };
    case 'patch':
      return {
        major: version.major,
        minor: version.minor,
        patch: version.patch + 1,
      };
    default:
      return finalizeVersion(version);
  }
}

/**
 * Attaches a prerelease token and revision
 */
export function toPrerelease(
  version: Version,
  token: string,
  revision = 1
): Version {
  return {
    ...finalizeVersion(version),
    prereleaseToken: token,
    prereleaseRevision: revision,
  };
}

/**
 * Returns the most significant numeric component in which `to` differs from
 * `from`, i.e. the bump level that leads from one to the other.
 */
export function bumpLevelBetween(from: Version, to: Version): BumpLevel {
  if (to.major !== from.major) {
    return 'major';
  }
  if (to.minor !== from.minor) {
    return 'minor';
  }
  if (to.patch !== from.patch) {
    return 'patch';
  }
  return 'none';
}

interface PackageInfo {
  version: string;
}

function isPackageInfo(value: unknown): value is PackageInfo {
  return (
    typeof value === 'object' &&
    value !== null &&
    'version' in value &&
    typeof value.version === 'string'
  );
}

/**
 * Reads the package's version from "package.json".
 */
export function getPackageVersion(): string {
  const pkg: unknown = JSON.parse(
    readFileSync(path.join(__dirname, '..', '..', 'package.json'), 'utf-8')
  );
  if (!isPackageInfo(pkg)) {
    throw new Error('Invalid package.json: no version found!');
  }
  return pkg.version;
}

/**
 * Like compareVersions(), but orders prereleases with different tokens by
 * token name instead of throwing. Only meant for presentation and
 * tie-breaking.
 */
export function compareVersionsTotal(a: Version, b: Version): number {
  if (
    a.prereleaseToken !== undefined &&
    b.prereleaseToken !== undefined &&
    a.prereleaseToken !== b.prereleaseToken &&
    bumpLevelBetween(a, b) === 'none'
  ) {
    return a.prereleaseToken < b.prereleaseToken ? -1 : 1;
  }
  return compareVersions(a, b);
}
