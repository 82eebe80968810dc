import { vi } from 'vitest';

vi.mock('../../logger');

import { ConfigurationError } from '../../utils/errors';
import { RawCommit } from '../base';
import { COMMITS_PAGE_SIZE, GitRepository, parseLogOutput } from '../git';

const SHA_A = 'a'.repeat(40);
const SHA_B = 'b'.repeat(40);
const SHA_C = 'c'.repeat(40);

function logRecord(sha: string, parents: string[], date: string, message: string): string {
  return `${[sha, parents.join(' '), date, message].join('\x1f')}\n\x1e\n`;
}

function createGit() {
  return { raw: vi.fn(), revparse: vi.fn() };
}

async function collect(commits: AsyncIterable<RawCommit>): Promise<RawCommit[]> {
  const result: RawCommit[] = [];
  for await (const commit of commits) {
    result.push(commit);
  }
  return result;
}

describe('parseLogOutput', () => {
  test('parses commits with multi-line messages', () => {
    const output =
      logRecord(SHA_A, [SHA_B, SHA_C], '2024-01-02T10:00:00+01:00', 'feat: a\n\nbody') +
      logRecord(SHA_B, [], '2024-01-01T00:00:00Z', 'Initial commit');

    expect(parseLogOutput(output)).toEqual([
      {
        sha: SHA_A,
        parents: [SHA_B, SHA_C],
        authoredDate: new Date('2024-01-02T09:00:00Z'),
        message: 'feat: a\n\nbody',
      },
      {
        sha: SHA_B,
        parents: [],
        authoredDate: new Date('2024-01-01T00:00:00Z'),
        message: 'Initial commit',
      },
    ]);
  });

  test('returns nothing for empty output', () => {
    expect(parseLogOutput('')).toEqual([]);
  });
});

describe('GitRepository', () => {
  const env = { ...process.env };

  beforeEach(() => {
    delete process.env.GITHUB_REF_NAME;
    delete process.env.CI_COMMIT_REF_NAME;
  });

  afterEach(() => {
    process.env = { ...env };
  });

  describe('listCommits', () => {
    test('walks the history in topological order', async () => {
      const git = createGit();
      git.raw.mockResolvedValue(
        logRecord(SHA_A, [SHA_B], '2024-01-02T00:00:00Z', 'fix: a')
      );

      const commits = await collect(new GitRepository(git).listCommits('HEAD'));

      expect(commits.map(commit => commit.sha)).toEqual([SHA_A]);
      expect(git.raw).toHaveBeenCalledTimes(1);
      expect(git.raw).toHaveBeenCalledWith([
        'log',
        '--topo-order',
        expect.stringMatching(/^--format=/),
        '--skip=0',
        `--max-count=${COMMITS_PAGE_SIZE}`,
        'HEAD',
        '--',
      ]);
    });

    test('pages through long histories', async () => {
      const git = createGit();
      const firstPage = Array.from({ length: COMMITS_PAGE_SIZE }, (_, index) =>
        logRecord(index.toString(16).padStart(40, '0'), [], '2024-01-01T00:00:00Z', `fix: ${index}`)
      ).join('');
      git.raw
        .mockResolvedValueOnce(firstPage)
        .mockResolvedValueOnce(logRecord(SHA_C, [], '2023-12-31T00:00:00Z', 'Initial commit'));

      const commits = await collect(new GitRepository(git).listCommits('main'));

      expect(commits).toHaveLength(COMMITS_PAGE_SIZE + 1);
      expect(commits[COMMITS_PAGE_SIZE].sha).toBe(SHA_C);
      expect(git.raw).toHaveBeenCalledTimes(2);
      expect(git.raw.mock.calls[1][0]).toContain(`--skip=${COMMITS_PAGE_SIZE}`);
    });

    test('treats a repository without commits as empty', async () => {
      const git = createGit();
      git.raw.mockRejectedValue(
        new Error("fatal: your current branch 'main' does not have any commits yet")
      );

      expect(await collect(new GitRepository(git).listCommits('HEAD'))).toEqual([]);
    });

    test('propagates other errors', async () => {
      const git = createGit();
      git.raw.mockRejectedValue(new Error('fatal: not a git repository'));

      await expect(
        collect(new GitRepository(git).listCommits('HEAD'))
      ).rejects.toThrow('fatal: not a git repository');
    });
  });

  test('listTags dereferences annotated tags', async () => {
    const git = createGit();
    git.raw.mockResolvedValue(`v1.0.0\0${SHA_A}\0${SHA_B}\nv1.1.0\0${SHA_C}\0\n`);

    const tags = await new GitRepository(git).listTags();

    expect(tags).toEqual(
      new Map([
        ['v1.0.0', SHA_B],
        ['v1.1.0', SHA_C],
      ])
    );
  });

  test('createTag creates an annotated tag', async () => {
    const git = createGit();
    git.raw.mockResolvedValue('');

    const ref = await new GitRepository(git).createTag('v1.0.0', SHA_A, 'Release v1.0.0');

    expect(ref).toBe('refs/tags/v1.0.0');
    expect(git.raw).toHaveBeenCalledWith([
      'tag',
      '-a',
      'v1.0.0',
      SHA_A,
      '-m',
      'Release v1.0.0',
    ]);
  });

  describe('currentBranchName', () => {
    test('returns the checked out branch', async () => {
      const git = createGit();
      git.revparse.mockResolvedValue('beta-testing\n');

      expect(await new GitRepository(git).currentBranchName()).toBe('beta-testing');
    });

    test('falls back to the CI branch on a detached HEAD', async () => {
      const git = createGit();
      git.revparse.mockResolvedValue('HEAD');
      process.env.GITHUB_REF_NAME = 'release/1.x';

      expect(await new GitRepository(git).currentBranchName()).toBe('release/1.x');
    });

    test('fails on a detached HEAD outside of CI', async () => {
      const git = createGit();
      git.revparse.mockResolvedValue('HEAD');

      await expect(new GitRepository(git).currentBranchName()).rejects.toThrow(
        ConfigurationError
      );
    });
  });
});
