import { BaseHostingClient } from './base';

export const GITLAB_DOMAIN = 'gitlab.com';

export class GitLabClient extends BaseHostingClient {
  public readonly name = 'gitlab';

  public commitUrl(sha: string): string {
    return `${this.repositoryUrl}/-/commit/${sha}`;
  }

  public pullRequestUrl(id: string | number): string {
    return `${this.repositoryUrl}/-/merge_requests/${id}`;
  }
}
