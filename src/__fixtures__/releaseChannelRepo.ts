import { FakeRepository } from './fakeRepository';

export type CommitConvention = 'angular' | 'emoji' | 'scipy' | 'tag';

export interface FixtureRelease {
  version: string;
  /** The changelog section each convention puts the release's commit in */
  sections: Record<CommitConvention, string>;
  messages: Record<CommitConvention, string>;
}

const FEATURE_SECTIONS: Record<CommitConvention, string> = {
  angular: 'Feature',
  emoji: ':sparkles:',
  scipy: 'Feature',
  tag: 'Feature',
};

const FEATURE_MESSAGES: Record<CommitConvention, string> = {
  angular: 'feat: add some more text',
  emoji: ':sparkles: add some more text',
  scipy: 'ENH: add some more text',
  tag: ':sparkles: add some more text',
};

/**
 * One commit per release: an initial release, a release candidate for a fix,
 * two features (release candidate, then final) on "main", and a feature
 * released on "beta-testing".
 */
export const RELEASE_CHANNEL_HISTORY: readonly FixtureRelease[] = [
  {
    version: '0.1.0',
    sections: { angular: 'Unknown', emoji: 'Other', scipy: 'None', tag: 'Unknown' },
    messages: {
      angular: 'Initial commit',
      emoji: 'Initial commit',
      scipy: 'Initial commit',
      tag: 'Initial commit',
    },
  },
  {
    version: '0.1.1-rc.1',
    sections: { angular: 'Fix', emoji: ':bug:', scipy: 'Fix', tag: 'Fix' },
    messages: {
      angular: 'fix: add some more text',
      emoji: ':bug: add some more text',
      scipy: 'MAINT: add some more text',
      tag: ':nut_and_bolt: add some more text',
    },
  },
  {
    version: '0.2.0-rc.1',
    sections: FEATURE_SECTIONS,
    messages: FEATURE_MESSAGES,
  },
  {
    version: '0.2.0',
    sections: FEATURE_SECTIONS,
    messages: FEATURE_MESSAGES,
  },
  {
    version: '0.3.0-beta.1',
    sections: FEATURE_SECTIONS,
    messages: {
      angular: 'feat: (feature) add some more text',
      emoji: ':sparkles: (feature) add some more text',
      scipy: 'ENH: (feature) add some more text',
      tag: ':sparkles: (feature) add some more text',
    },
  },
];

/** Release channel rules of the fixture */
export const RELEASE_CHANNEL_BRANCHES = {
  main: { match: '(main|master)', prerelease: false, prereleaseToken: 'rc' },
  'beta-testing': { match: 'beta.*', prerelease: true, prereleaseToken: 'beta' },
};

/**
 * Builds the history of RELEASE_CHANNEL_HISTORY with the given convention.
 * The repository is left on the "beta_testing" branch.
 */
export function buildReleaseChannelRepo(
  convention: CommitConvention,
  tagFormat = 'v{version}'
): FakeRepository {
  const repo = new FakeRepository('main');
  for (const release of RELEASE_CHANNEL_HISTORY) {
    if (release.version === '0.3.0-beta.1') {
      repo.checkout('beta_testing', true);
    }
    repo.commit(release.messages[convention]);
    repo.tag(tagFormat.replace('{version}', release.version));
  }
  return repo;
}
