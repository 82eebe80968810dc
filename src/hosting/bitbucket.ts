import { BaseHostingClient } from './base';

export const BITBUCKET_DOMAIN = 'bitbucket.org';

export class BitbucketClient extends BaseHostingClient {
  public readonly name = 'bitbucket';

  public commitUrl(sha: string): string {
    return `${this.repositoryUrl}/commits/${sha}`;
  }

  public pullRequestUrl(id: string | number): string {
    return `${this.repositoryUrl}/pull-requests/${id}`;
  }
}
