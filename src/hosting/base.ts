/**
 * Where a repository is hosted
 */
export interface RemoteInfo {
  /** Host name, e.g. "github.com" */
  domain: string;
  owner: string;
  repo: string;
}

/**
 * The hosting-platform capabilities used to enrich changelogs
 */
export interface HostingClient {
  readonly name: string;
  commitUrl(sha: string): string;
  pullRequestUrl(id: string | number): string;
  /**
   * Publishes a release on the platform, if the platform client supports it
   *
   * @returns URL of the created release
   */
  createRelease?(
    tag: string,
    title: string,
    body: string,
    prerelease: boolean
  ): Promise<string>;
}

/**
 * Base class for hosting platform clients
 */
export abstract class BaseHostingClient implements HostingClient {
  public abstract readonly name: string;

  public constructor(public readonly remote: RemoteInfo) {}

  /** Web URL of the repository */
  public get repositoryUrl(): string {
    const { domain, owner, repo } = this.remote;
    return `https://${domain}/${owner}/${repo}`;
  }

  public abstract commitUrl(sha: string): string;

  public abstract pullRequestUrl(id: string | number): string;
}
