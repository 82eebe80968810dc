/**
 * A commit as read from the version-control system
 */
export interface RawCommit {
  sha: string;
  message: string;
  /** Parent SHAs, first parent first */
  parents: string[];
  authoredDate: Date;
}

/**
 * The version-control capabilities release-ledger relies on
 */
export interface VersionControl {
  /**
   * Lists the commits reachable from `ref`, newest first, never showing a
   * parent before all of its children.
   */
  listCommits(ref: string): AsyncIterable<RawCommit>;

  /** Maps each tag name to the SHA of the commit it points to */
  listTags(): Promise<Map<string, string>>;

  /**
   * Creates an annotated tag
   *
   * @returns The full tag reference, e.g. "refs/tags/v1.0.0"
   */
  createTag(name: string, targetSha: string, annotation: string): Promise<string>;

  currentBranchName(): Promise<string>;
}
