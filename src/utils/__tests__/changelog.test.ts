import { vi } from 'vitest';

vi.mock('../../logger');

import {
  buildReleaseChannelRepo,
  CommitConvention,
  RELEASE_CHANNEL_HISTORY,
} from '../../__fixtures__/releaseChannelRepo';
import { FakeRepository, fakeSha } from '../../__fixtures__/fakeRepository';
import { GitHubClient } from '../../hosting/github';
import { createCommitParser } from '../../parsers';
import {
  findChangeset,
  formatChangelogEntry,
  matchRelease,
  prependChangeset,
  removeChangeset,
  renderReleaseSections,
  renderSections,
  serializeChangelog,
  serializeCommits,
  serializeRelease,
  updateChangelog,
} from '../changelog';
import { buildReleaseHistory, ReleaseHistory } from '../releaseHistory';

const angular = createCommitParser('angular');
const hosting = new GitHubClient({
  domain: 'github.com',
  owner: 'acme',
  repo: 'widgets',
});
const SHA = '1234567890abcdef1234567890abcdef12345678';

function parse(message: string, sha = SHA) {
  return angular.parse({ sha, message });
}

async function historyOf(
  repo: FakeRepository,
  convention: CommitConvention = 'angular'
): Promise<ReleaseHistory> {
  return buildReleaseHistory({
    commits: repo.listCommits('HEAD'),
    tags: await repo.listTags(),
    parser: createCommitParser(convention),
    tagFormat: 'v{version}',
  });
}

function commitLink(index: number): string {
  return `[00000000](https://github.com/acme/widgets/commit/${fakeSha(index)})`;
}

describe('renderSections', () => {
  test('groups commits in the convention order with the catch-all last', () => {
    const commits = [
      parse('feat: a', 'a'),
      parse('fix: b', 'b'),
      parse('Initial commit', 'c'),
      parse('docs: d', 'd'),
      parse('feat: e', 'e'),
    ];

    const sections = renderSections(commits, angular).map(section => [
      section.name,
      section.commits.map(commit => commit.sha),
    ]);

    expect(sections).toEqual([
      ['Feature', ['a', 'e']],
      ['Fix', ['b']],
      ['Documentation', ['d']],
      ['Unknown', ['c']],
    ]);
  });

  test('puts unknown commits in the catch-all section with no bump', () => {
    const commit = parse('Initial commit');
    expect(commit.bump).toBe('none');
    expect(renderSections([commit], angular)).toEqual([
      { name: 'Unknown', commits: [commit] },
    ]);
  });

  test('puts categories the convention does not declare in the catch-all', () => {
    const commit = { ...parse('feat: a'), category: 'Mystery' };
    expect(renderSections([commit], angular)).toEqual([
      { name: 'Unknown', commits: [commit] },
    ]);
  });

  test('returns no sections without commits', () => {
    expect(renderSections([], angular)).toEqual([]);
  });

  test('is deterministic', () => {
    const commits = [parse('fix: b', 'b'), parse('feat: a', 'a')];
    expect(renderSections(commits, angular)).toEqual(
      renderSections(commits, angular)
    );
  });
});

describe('formatChangelogEntry', () => {
  test('links the commit', () => {
    expect(formatChangelogEntry(parse('feat: add login page'), hosting)).toBe(
      `- add login page in [12345678](https://github.com/acme/widgets/commit/${SHA})`
    );
  });

  test('links the pull request instead of the commit', () => {
    expect(formatChangelogEntry(parse('fix: stop crashing (#123)'), hosting)).toBe(
      '- stop crashing in [#123](https://github.com/acme/widgets/pull/123)'
    );
  });

  test('works without a hosting platform', () => {
    expect(formatChangelogEntry(parse('fix(api): stop crashing (#7)'), null)).toBe(
      '- **api:** stop crashing in #7'
    );
    expect(formatChangelogEntry(parse('fix(api): stop crashing'), null)).toBe(
      '- **api:** stop crashing in 12345678'
    );
  });

  test('escapes leading underscores', () => {
    expect(formatChangelogEntry(parse('fix: _private helper'), null)).toBe(
      '- \\_private helper in 12345678'
    );
  });
});

describe('serializeCommits', () => {
  test('lists breaking changes first', () => {
    const commits = [
      parse('feat(api)!: drop v1', '1111111122222222'),
      parse('fix: x\n\nBREAKING CHANGE: y changed', '3333333344444444'),
    ];
    expect(serializeCommits(commits, angular)).toBe(
      [
        '### Breaking Changes',
        '',
        '- **api:** drop v1 in 11111111',
        '- y changed in 33333333',
        '',
        '### Feature',
        '',
        '- **api:** drop v1 in 11111111',
        '',
        '### Fix',
        '',
        '- x in 33333333',
      ].join('\n')
    );
  });

  test('has a placeholder for releases without commits', () => {
    expect(serializeCommits([], angular)).toBe('- No documented changes.');
  });
});

describe('serializeRelease', () => {
  test('renders the header from the template', async () => {
    const repo = new FakeRepository();
    repo.commit('Initial commit');
    repo.tag('v0.1.0');
    const [release] = (await historyOf(repo)).released;

    expect(serializeRelease(release, angular).name).toBe('v0.1.0 (2024-01-02)');
    expect(
      serializeRelease(release, angular, {
        headerTemplate: '{{version}} - {{date}} <{{tag}}>',
      }).name
    ).toBe('0.1.0 - 2024-01-02 <v0.1.0>');
  });
});

describe('serializeChangelog', () => {
  test('renders the release channel history', async () => {
    const history = await historyOf(buildReleaseChannelRepo('angular'));

    expect(serializeChangelog(history, angular, { hosting })).toBe(
      [
        '# Changelog',
        '',
        '## v0.3.0-beta.1 (2024-01-06)',
        '',
        '### Feature',
        '',
        `- (feature) add some more text in ${commitLink(5)}`,
        '',
        '## v0.2.0 (2024-01-05)',
        '',
        '### Feature',
        '',
        `- add some more text in ${commitLink(4)}`,
        '',
        '## v0.2.0-rc.1 (2024-01-04)',
        '',
        '### Feature',
        '',
        `- add some more text in ${commitLink(3)}`,
        '',
        '## v0.1.1-rc.1 (2024-01-03)',
        '',
        '### Fix',
        '',
        `- add some more text in ${commitLink(2)}`,
        '',
        '## v0.1.0 (2024-01-02)',
        '',
        '### Unknown',
        '',
        `- Initial commit in ${commitLink(1)}`,
        '',
      ].join('\n')
    );
  });

  test('renders unreleased commits on top', async () => {
    const repo = new FakeRepository();
    repo.commit('Initial commit');
    repo.tag('v0.1.0');
    repo.commit('fix: add some more text');

    expect(serializeChangelog(await historyOf(repo), angular)).toBe(
      [
        '# Changelog',
        '',
        '## Unreleased',
        '',
        '### Fix',
        '',
        '- add some more text in 00000000',
        '',
        '## v0.1.0 (2024-01-02)',
        '',
        '### Unknown',
        '',
        '- Initial commit in 00000000',
        '',
      ].join('\n')
    );
  });

  test('renders the same document every time', async () => {
    const history = await historyOf(buildReleaseChannelRepo('emoji'));
    const emoji = createCommitParser('emoji');
    expect(serializeChangelog(history, emoji, { hosting })).toBe(
      serializeChangelog(history, emoji, { hosting })
    );
  });
});

describe('release channel history sections', () => {
  const conventions: CommitConvention[] = ['angular', 'emoji', 'scipy', 'tag'];

  test.each(conventions)('matches the expected sections for %s', async convention => {
    const parser = createCommitParser(convention);
    const history = await historyOf(buildReleaseChannelRepo(convention), convention);

    for (const expected of RELEASE_CHANNEL_HISTORY) {
      const release = history.released.find(
        candidate => candidate.tag === `v${expected.version}`
      );
      expect(release).toBeDefined();
      if (!release) {
        continue;
      }
      const sections = renderReleaseSections(release, parser);
      expect(sections.map(section => section.name)).toEqual([
        expected.sections[convention],
      ]);
      expect(sections[0].commits.map(commit => commit.message)).toEqual([
        expected.messages[convention],
      ]);
    }
  });
});

const CHANGELOG = [
  '# Changelog',
  '',
  '## Unreleased',
  '',
  '- a',
  '',
  '## v1.0.0 (2024-01-01)',
  '',
  '### Fix',
  '',
  '- b',
  '',
].join('\n');

describe('findChangeset', () => {
  test('extracts the body of a release', () => {
    expect(findChangeset(CHANGELOG, 'v1.0.0 (2024-01-01)')).toEqual({
      name: 'v1.0.0 (2024-01-01)',
      body: '### Fix\n\n- b',
    });
  });

  test('stops at the next release', () => {
    expect(findChangeset(CHANGELOG, 'Unreleased')).toEqual({
      name: 'Unreleased',
      body: '- a',
    });
  });

  test('returns null for unknown releases', () => {
    expect(findChangeset(CHANGELOG, 'v2.0.0')).toBeNull();
  });
});

describe('matchRelease', () => {
  const release = {
    version: { major: 1, minor: 0, patch: 0 },
    tag: 'v1.0.0',
    sha: fakeSha(1),
    committedDate: new Date(Date.UTC(2024, 0, 2)),
    commits: [],
    excluded: [],
  };

  test('matches headings naming the tag or the version', () => {
    const matches = matchRelease(release);
    expect(matches('v1.0.0 (2024-03-01)')).toBe(true);
    expect(matches('1.0.0')).toBe(true);
    expect(matches('Version 1.0.0 - first stable')).toBe(true);
  });

  test('tells a final release from its candidates', () => {
    const matches = matchRelease(release);
    expect(matches('v1.0.0-rc.1 (2024-01-01)')).toBe(false);
    expect(matches('1.0.0-rc.1')).toBe(false);
    expect(matches('v1.0.1 (2024-01-02)')).toBe(false);
  });

  test('finds a changeset by release', () => {
    expect(findChangeset(CHANGELOG, matchRelease(release))).toEqual({
      name: 'v1.0.0 (2024-01-01)',
      body: '### Fix\n\n- b',
    });
  });
});

describe('removeChangeset', () => {
  test('removes the section up to the next release', () => {
    expect(removeChangeset(CHANGELOG, 'Unreleased')).toBe(
      '# Changelog\n\n## v1.0.0 (2024-01-01)\n\n### Fix\n\n- b\n'
    );
  });

  test('leaves the document alone for unknown releases', () => {
    expect(removeChangeset(CHANGELOG, 'v2.0.0')).toBe(CHANGELOG);
  });
});

describe('prependChangeset', () => {
  test('inserts above the top-most release', () => {
    const changelog = '# Changelog\n\n## v1.0.0 (2024-01-01)\n\n- b\n';
    expect(
      prependChangeset(changelog, { name: 'v1.1.0 (2024-02-01)', body: '- c' })
    ).toBe(
      '# Changelog\n\n## v1.1.0 (2024-02-01)\n\n- c\n\n## v1.0.0 (2024-01-01)\n\n- b\n'
    );
  });

  test('appends to a document without releases', () => {
    expect(prependChangeset('# Changelog\n', { name: 'v1.0.0', body: '- a' })).toBe(
      '# Changelog\n\n## v1.0.0\n\n- a\n\n'
    );
  });

  test('follows the Setext style of the document', () => {
    const changelog = 'Changelog\n=========\n\n1.0.0\n-----\n\n- b\n';
    expect(prependChangeset(changelog, { name: '1.1.0', body: '- c' })).toBe(
      'Changelog\n=========\n\n1.1.0\n-----\n\n- c\n\n1.0.0\n-----\n\n- b\n'
    );
  });
});

describe('updateChangelog', () => {
  test('adds new releases and refreshes the unreleased section', async () => {
    const repo = new FakeRepository();
    repo.commit('Initial commit');
    repo.tag('v0.1.0');
    repo.commit('fix: add some more text');
    const before = serializeChangelog(await historyOf(repo), angular);

    repo.tag('v0.1.1');
    repo.commit('feat: new');
    const history = await historyOf(repo);

    expect(updateChangelog(before, history, angular)).toBe(
      serializeChangelog(history, angular)
    );
  });

  test('keeps manual edits of existing releases', async () => {
    const repo = new FakeRepository();
    repo.commit('Initial commit');
    repo.tag('v0.1.0');
    const edited = '# Changelog\n\n## v0.1.0 (2024-01-02)\n\nHand-written notes.\n';
    repo.commit('fix: add some more text');
    repo.tag('v0.1.1');

    expect(updateChangelog(edited, await historyOf(repo), angular)).toBe(
      [
        '# Changelog',
        '',
        '## v0.1.1 (2024-01-03)',
        '',
        '### Fix',
        '',
        '- add some more text in 00000000',
        '',
        '## v0.1.0 (2024-01-02)',
        '',
        'Hand-written notes.',
        '',
      ].join('\n')
    );
  });

  test('recognizes releases under differently dated headings', async () => {
    const repo = new FakeRepository();
    repo.commit('Initial commit');
    repo.tag('v0.1.0');
    repo.commit('fix: add some more text');
    repo.tag('v0.1.1');
    const edited = [
      '# Changelog',
      '',
      '## v0.1.1 (2024-02-01)',
      '',
      '- b',
      '',
      '## 0.1.0',
      '',
      '- a',
      '',
    ].join('\n');

    expect(updateChangelog(edited, await historyOf(repo), angular)).toBe(
      edited
    );
  });

  test('renders the whole document for an empty file', async () => {
    const repo = new FakeRepository();
    repo.commit('Initial commit');
    repo.tag('v0.1.0');
    const history = await historyOf(repo);

    expect(updateChangelog('', history, angular)).toBe(
      serializeChangelog(history, angular)
    );
  });
});
