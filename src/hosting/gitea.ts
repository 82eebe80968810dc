import { BaseHostingClient } from './base';

export class GiteaClient extends BaseHostingClient {
  public readonly name = 'gitea';

  public commitUrl(sha: string): string {
    return `${this.repositoryUrl}/commit/${sha}`;
  }

  public pullRequestUrl(id: string | number): string {
    return `${this.repositoryUrl}/pulls/${id}`;
  }
}
