import GitUrlParse from 'git-url-parse';

import { logger } from '../logger';
import { RemoteConfig } from '../schemas/project_config';
import { ConfigurationError } from '../utils/errors';
import { BaseHostingClient, HostingClient, RemoteInfo } from './base';
import { BITBUCKET_DOMAIN, BitbucketClient } from './bitbucket';
import { GiteaClient } from './gitea';
import { GITHUB_DOMAIN, GitHubClient } from './github';
import { GITLAB_DOMAIN, GitLabClient } from './gitlab';

export type { HostingClient, RemoteInfo };

export type HostingType = NonNullable<RemoteConfig['type']>;

export const HOSTING_CLIENT_MAP: Record<
  HostingType,
  new (remote: RemoteInfo) => BaseHostingClient
> = {
  github: GitHubClient,
  gitlab: GitLabClient,
  gitea: GiteaClient,
  bitbucket: BitbucketClient,
};

const DEFAULT_DOMAINS: Record<string, HostingType> = {
  [GITHUB_DOMAIN]: 'github',
  [GITLAB_DOMAIN]: 'gitlab',
  [BITBUCKET_DOMAIN]: 'bitbucket',
};

/**
 * Creates the hosting client for the project
 *
 * Values from the `remote` configuration win over what can be derived from
 * the git remote URL. Returns null when the repository location cannot be
 * determined: changelogs are then rendered without links.
 *
 * @param remoteConfig The `remote` section of the configuration
 * @param remoteUrl URL of the git remote, if any
 */
export function createHostingClient(
  remoteConfig: RemoteConfig | undefined,
  remoteUrl?: string
): HostingClient | null {
  let parsed: GitUrlParse.GitUrl | undefined;
  if (remoteUrl) {
    try {
      parsed = GitUrlParse(remoteUrl);
    } catch (error) {
      logger.warn(`Cannot parse the git remote URL "${remoteUrl}": `, error);
    }
  }

  const domain = remoteConfig?.domain || parsed?.resource;
  const owner = remoteConfig?.owner || parsed?.owner;
  const repo = remoteConfig?.repo || parsed?.name;
  if (!domain || !owner || !repo) {
    logger.debug(
      'Repository location unknown, changelog entries will not be linked'
    );
    return null;
  }

  const type = remoteConfig?.type ?? DEFAULT_DOMAINS[domain];
  if (!type) {
    throw new ConfigurationError(
      `Cannot tell which platform hosts "${domain}". Set "remote.type" in the configuration.`
    );
  }
  logger.debug(`Using ${type} hosting for ${domain}/${owner}/${repo}`);
  return new HOSTING_CLIENT_MAP[type]({ domain, owner, repo });
}
