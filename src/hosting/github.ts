import { Octokit } from '@octokit/rest';

import { logger as loggerRaw } from '../logger';
import { ConfigurationError } from '../utils/errors';
import { BaseHostingClient } from './base';

const logger = loggerRaw.withScope('[github]');

export const GITHUB_DOMAIN = 'github.com';

/**
 * Gets GitHub API token from environment
 *
 * @returns GitHub authentication token if found
 */
export function getGitHubApiToken(): string {
  const githubApiToken = process.env.GH_TOKEN || process.env.GITHUB_TOKEN;
  if (!githubApiToken) {
    throw new ConfigurationError(
      'GH_TOKEN not found. This is required to publish releases on GitHub.'
    );
  }
  return githubApiToken;
}

/**
 * GitHub and GitHub Enterprise Server
 */
export class GitHubClient extends BaseHostingClient {
  public readonly name = 'github';
  private octokit?: Octokit;

  public commitUrl(sha: string): string {
    return `${this.repositoryUrl}/commit/${sha}`;
  }

  public pullRequestUrl(id: string | number): string {
    return `${this.repositoryUrl}/pull/${id}`;
  }

  /** REST API endpoint for this GitHub instance */
  public get apiUrl(): string {
    return this.remote.domain === GITHUB_DOMAIN
      ? 'https://api.github.com'
      : `https://${this.remote.domain}/api/v3`;
  }

  protected getOctokit(): Octokit {
    if (!this.octokit) {
      this.octokit = new Octokit({
        auth: getGitHubApiToken(),
        baseUrl: this.apiUrl,
      });
    }
    return this.octokit;
  }

  public async createRelease(
    tag: string,
    title: string,
    body: string,
    prerelease: boolean
  ): Promise<string> {
    const { owner, repo } = this.remote;
    logger.debug(`Creating release "${title}" for tag ${tag} in ${owner}/${repo}`);
    const { data } = await this.getOctokit().repos.createRelease({
      owner,
      repo,
      tag_name: tag,
      name: title,
      body,
      prerelease,
    });
    return data.html_url;
  }
}
