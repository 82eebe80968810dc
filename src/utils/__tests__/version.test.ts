import {
  BumpLevel,
  bumpLevelBetween,
  bumpVersion,
  compareVersions,
  compareVersionsTotal,
  getPackageVersion,
  isBumpLevel,
  isValidPrereleaseToken,
  maxBumpLevel,
  parseVersion,
  toPrerelease,
  Version,
  versionToString,
} from '../version';
import { IncomparableVersionsError } from '../errors';

function v(text: string): Version {
  const version = parseVersion(text);
  if (!version) {
    throw new Error(`Invalid test version: ${text}`);
  }
  return version;
}

describe('parseVersion', () => {
  test('parses a final version', () => {
    expect(parseVersion('1.2.3')).toEqual({ major: 1, minor: 2, patch: 3 });
  });

  test('parses a prerelease version', () => {
    expect(parseVersion('0.3.0-beta.12')).toEqual({
      major: 0,
      minor: 3,
      patch: 0,
      prereleaseToken: 'beta',
      prereleaseRevision: 12,
    });
  });

  test.each([
    ['leading "v"', 'v1.2.3'],
    ['build metadata', '1.2.3+build.5'],
    ['prerelease without revision', '1.2.3-rc'],
    ['prerelease with zero revision', '1.2.3-rc.0'],
    ['numeric token', '1.2.3-1.2'],
    ['prerelease with three parts', '1.2.3-rc.1.2'],
    ['missing patch', '1.2'],
    ['surrounding whitespace', ' 1.2.3'],
    ['garbage', 'latest'],
  ])('rejects %s', (_name, text) => {
    expect(parseVersion(text)).toBeNull();
  });
});

describe('versionToString', () => {
  test.each(['0.0.0', '1.2.3', '1.0.0-rc.1', '2.3.4-pre-alpha.10'])(
    'renders %s canonically',
    text => {
      expect(versionToString(v(text))).toBe(text);
    }
  );
});

describe('isValidPrereleaseToken', () => {
  test.each([
    ['rc', true],
    ['beta-2', true],
    ['alpha1', true],
    ['123', false],
    ['', false],
    ['rc.1', false],
    ['rc_1', false],
  ])('%s -> %s', (token, expected) => {
    expect(isValidPrereleaseToken(token)).toBe(expected);
  });
});

describe('compareVersions', () => {
  test.each([
    ['1.0.0', '2.0.0', -1],
    ['1.10.0', '1.9.0', 1],
    ['1.0.1', '1.0.1', 0],
    ['1.0.0-rc.1', '1.0.0', -1],
    ['1.0.0', '1.0.0-rc.5', 1],
    ['1.0.0-rc.2', '1.0.0-rc.10', -1],
    ['1.0.1-rc.1', '1.0.0', 1],
    ['0.9.9', '1.0.0-alpha.1', -1],
  ])('%s vs %s -> %s', (a, b, expected) => {
    expect(compareVersions(v(a), v(b))).toBe(expected);
  });

  test('refuses to order prereleases of the same numbers with different tokens', () => {
    expect(() => compareVersions(v('1.0.0-alpha.1'), v('1.0.0-beta.1'))).toThrow(
      IncomparableVersionsError
    );
  });

  test('orders different tokens by numbers when the numbers differ', () => {
    expect(compareVersions(v('1.0.0-beta.1'), v('1.1.0-alpha.1'))).toBe(-1);
  });
});

describe('compareVersionsTotal', () => {
  test('orders different tokens by name', () => {
    expect(compareVersionsTotal(v('1.0.0-alpha.2'), v('1.0.0-beta.1'))).toBe(-1);
    expect(compareVersionsTotal(v('1.0.0-beta.1'), v('1.0.0-alpha.2'))).toBe(1);
  });

  test('agrees with compareVersions otherwise', () => {
    expect(compareVersionsTotal(v('1.0.0-rc.1'), v('1.0.0'))).toBe(-1);
  });
});

describe('bumpVersion', () => {
  const cases: Array<[string, BumpLevel, string]> = [
    ['1.2.3', 'major', '2.0.0'],
    ['1.2.3', 'minor', '1.3.0'],
    ['1.2.3', 'patch', '1.2.4'],
    ['1.2.3', 'none', '1.2.3'],
    ['1.2.3-rc.4', 'none', '1.2.3'],
    ['1.2.3-rc.4', 'patch', '1.2.4'],
  ];
  test.each(cases)('%s + %s -> %s', (from, level, expected) => {
    expect(versionToString(bumpVersion(v(from), level))).toBe(expected);
  });
});

describe('toPrerelease', () => {
  test('attaches token and revision 1 by default', () => {
    expect(versionToString(toPrerelease(v('1.3.0'), 'rc'))).toBe('1.3.0-rc.1');
  });

  test('replaces an existing prerelease', () => {
    expect(versionToString(toPrerelease(v('1.3.0-alpha.2'), 'beta', 4))).toBe(
      '1.3.0-beta.4'
    );
  });
});

describe('bumpLevelBetween', () => {
  test.each([
    ['1.2.3', '2.0.0-rc.1', 'major'],
    ['0.2.0', '0.3.0-beta.1', 'minor'],
    ['0.1.0', '0.1.1-rc.1', 'patch'],
    ['0.1.0', '0.1.0', 'none'],
  ])('%s -> %s is %s', (from, to, expected) => {
    expect(bumpLevelBetween(v(from), v(to))).toBe(expected);
  });
});

describe('bump levels', () => {
  test('maxBumpLevel picks the bigger increment', () => {
    expect(maxBumpLevel('patch', 'minor')).toBe('minor');
    expect(maxBumpLevel('major', 'none')).toBe('major');
    expect(maxBumpLevel('none', 'none')).toBe('none');
  });

  test('isBumpLevel', () => {
    expect(isBumpLevel('minor')).toBe(true);
    expect(isBumpLevel('huge')).toBe(false);
  });
});

describe('getPackageVersion', () => {
  test('reads a canonical version from package.json', () => {
    expect(parseVersion(getPackageVersion())).not.toBeNull();
  });
});
