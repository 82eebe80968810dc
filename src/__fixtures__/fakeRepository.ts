import { RawCommit, VersionControl } from '../vcs/base';

const DAY_MS = 24 * 60 * 60 * 1000;
const EPOCH = Date.UTC(2024, 0, 1);

interface FakeCommit extends RawCommit {
  /** Creation order, parents always have a lower one */
  index: number;
}

/**
 * In-memory repository with deterministic SHAs and dates: the n-th commit
 * has the SHA `n` in hex padded to 40 characters and is authored n days
 * after 2024-01-01.
 */
export class FakeRepository implements VersionControl {
  private readonly commits = new Map<string, FakeCommit>();
  private readonly branches = new Map<string, string | null>();
  private readonly tags = new Map<string, string>();
  private currentBranch: string;

  public constructor(branch = 'main') {
    this.currentBranch = branch;
    this.branches.set(branch, null);
  }

  /** SHA of the current branch head, null on an empty branch */
  public get head(): string | null {
    return this.branches.get(this.currentBranch) ?? null;
  }

  public commit(message: string): string {
    const parents = this.head ? [this.head] : [];
    return this.addCommit(message, parents);
  }

  /**
   * Switches to a branch, creating it from the current head when asked to
   */
  public checkout(branch: string, create = false): void {
    if (create) {
      this.branches.set(branch, this.head);
    } else if (!this.branches.has(branch)) {
      throw new Error(`Unknown branch "${branch}"`);
    }
    this.currentBranch = branch;
  }

  /**
   * Creates a merge commit of the given branch into the current one
   */
  public merge(branch: string, message = `Merge branch '${branch}'`): string {
    const other = this.branches.get(branch);
    if (!other) {
      throw new Error(`Nothing to merge from "${branch}"`);
    }
    const parents = this.head ? [this.head, other] : [other];
    return this.addCommit(message, parents);
  }

  public tag(name: string, sha: string | null = this.head): void {
    if (!sha || !this.commits.has(sha)) {
      throw new Error(`Cannot tag "${name}": unknown commit`);
    }
    this.tags.set(name, sha);
  }

  public async *listCommits(ref: string): AsyncGenerator<RawCommit> {
    const start = this.resolve(ref);
    if (!start) {
      return;
    }
    const reachable: FakeCommit[] = [];
    const seen = new Set<string>();
    const stack = [start];
    while (stack.length > 0) {
      const sha = stack.pop();
      const commit = sha === undefined ? undefined : this.commits.get(sha);
      if (!commit || seen.has(commit.sha)) {
        continue;
      }
      seen.add(commit.sha);
      reachable.push(commit);
      stack.push(...commit.parents);
    }
    reachable.sort((a, b) => b.index - a.index);
    for (const { sha, message, parents, authoredDate } of reachable) {
      yield { sha, message, parents, authoredDate };
    }
  }

  public async listTags(): Promise<Map<string, string>> {
    return new Map(this.tags);
  }

  public async createTag(
    name: string,
    targetSha: string,
    _annotation: string
  ): Promise<string> {
    this.tag(name, targetSha);
    return `refs/tags/${name}`;
  }

  public async currentBranchName(): Promise<string> {
    return this.currentBranch;
  }

  private addCommit(message: string, parents: string[]): string {
    const index = this.commits.size + 1;
    const sha = fakeSha(index);
    this.commits.set(sha, {
      sha,
      message,
      parents,
      authoredDate: new Date(EPOCH + index * DAY_MS),
      index,
    });
    this.branches.set(this.currentBranch, sha);
    return sha;
  }

  private resolve(ref: string): string | null {
    if (ref === 'HEAD') {
      return this.head;
    }
    return this.branches.get(ref) ?? this.tags.get(ref) ?? (this.commits.has(ref) ? ref : null);
  }
}

/**
 * Returns the fake SHA of the n-th commit
 */
export function fakeSha(index: number): string {
  return index.toString(16).padStart(40, '0');
}
