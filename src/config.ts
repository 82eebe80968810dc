import { existsSync, lstatSync, readFileSync } from 'fs';
import path from 'path';

import { load } from 'js-yaml';

import { logger } from './logger';
import {
  ChangelogConfig,
  ProjectConfig,
  ProjectConfigSchema,
} from './schemas/project_config';
import { ReleaseChannelRule, VersioningPolicy } from './utils/autoVersion';
import { ConfigurationError } from './utils/errors';
import { getTagRegex } from './utils/tagFormat';
import {
  compareVersionsTotal,
  getPackageVersion,
  isPrerelease,
  isValidPrereleaseToken,
  parseVersion,
} from './utils/version';

export const CONFIG_FILE_NAME = '.release-ledger.yml';

/**
 * Cached path to the configuration file
 */
let _configPathCache: string | undefined;

/**
 * Cached configuration
 */
let _configCache: ProjectConfig | undefined;

/**
 * Searches the current and parent directories for the configuration file
 *
 * Returns "undefined" if no file was found.
 */
export function findConfigFile(): string | undefined {
  if (_configPathCache) {
    return _configPathCache;
  }

  const MAX_DEPTH = 1024;
  let depth = 0;
  let currentDir = process.cwd();
  while (depth <= MAX_DEPTH) {
    const probePath = path.join(currentDir, CONFIG_FILE_NAME);
    if (existsSync(probePath) && lstatSync(probePath).isFile()) {
      _configPathCache = probePath;
      return _configPathCache;
    }
    const parentDir = path.dirname(currentDir);
    if (currentDir === parentDir) {
      // Reached root directory
      return undefined;
    }
    currentDir = parentDir;
    depth += 1;
  }
  logger.warn('findConfigFile: Reached maximum allowed directory depth');
  return undefined;
}

/**
 * Returns the path to the directory that contains the configuration file
 *
 * Returns "undefined" if no configuration file can be found.
 */
export function getConfigFileDir(): string | undefined {
  const configFilePath = findConfigFile();
  if (!configFilePath) {
    return undefined;
  }
  return path.dirname(configFilePath);
}

/**
 * Parses and validates the passed configuration object
 *
 * Throws a ConfigurationError if the object is not a valid configuration.
 *
 * @param rawConfig Raw project configuration object
 */
export function validateConfiguration(rawConfig: unknown): ProjectConfig {
  logger.debug('Parsing and validating the configuration file...');
  const result = ProjectConfigSchema.safeParse(rawConfig ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `  ${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('\n');
    throw new ConfigurationError(`Cannot parse configuration file:\n${issues}`);
  }
  const config = result.data;
  // Fail early on an unusable tag format
  getTagRegex(config.tagFormat);
  return config;
}

/**
 * Returns the parsed configuration file contents
 *
 * Without a configuration file, every setting has its default value.
 */
export function getConfiguration(clearCache = false): ProjectConfig {
  if (!clearCache && _configCache) {
    return _configCache;
  }

  const configPath = findConfigFile();
  let rawConfig: unknown = {};
  if (configPath) {
    logger.debug('Configuration file found: ', configPath);
    rawConfig = load(readFileSync(configPath, 'utf-8'));
  } else {
    logger.debug(
      `No "${CONFIG_FILE_NAME}" found, using the default configuration`
    );
  }
  _configCache = validateConfiguration(rawConfig);
  checkMinimalConfigVersion(_configCache);
  return _configCache;
}

/**
 * Checks that the running version is compatible with the configuration
 *
 * "minVersion" specifies the minimal version of release-ledger that can work
 * with the given configuration.
 */
export function checkMinimalConfigVersion(config: ProjectConfig): void {
  const minVersionRaw = config.minVersion;
  if (!minVersionRaw) {
    logger.debug(
      'No minimal version specified in the configuration, skipping the check'
    );
    return;
  }

  const minVersion = parseVersion(minVersionRaw);
  if (!minVersion) {
    throw new ConfigurationError(
      `Cannot parse the minimal version: "${minVersionRaw}"`
    );
  }
  const currentVersionRaw = getPackageVersion();
  const currentVersion = parseVersion(currentVersionRaw);
  if (!currentVersion) {
    throw new Error(`Cannot parse the current version: "${currentVersionRaw}"`);
  }

  if (compareVersionsTotal(currentVersion, minVersion) < 0) {
    throw new ConfigurationError(
      `Incompatible release-ledger versions. Current version: ${currentVersionRaw}, minimal version: ${minVersionRaw} (taken from ${CONFIG_FILE_NAME}).`
    );
  }
}

/**
 * Compiles the "branches" section into release channel rules
 */
export function getReleaseChannelRules(
  config: ProjectConfig
): ReleaseChannelRule[] {
  return Object.entries(config.branches).map(([name, channel]) => {
    let match: RegExp;
    try {
      match = new RegExp(`^(?:${channel.match})`);
    } catch (e) {
      throw new ConfigurationError(
        `Invalid "match" pattern of release channel "${name}": ${channel.match}`
      );
    }
    if (channel.prerelease && !isValidPrereleaseToken(channel.prereleaseToken)) {
      throw new ConfigurationError(
        `Invalid prerelease token of release channel "${name}": "${channel.prereleaseToken}"`
      );
    }
    return {
      name,
      match,
      prerelease: channel.prerelease,
      prereleaseToken: channel.prereleaseToken,
    };
  });
}

/**
 * Compiles the changelog's commit exclusion patterns
 */
export function getExcludeCommitPatterns(
  changelog: ChangelogConfig
): RegExp[] {
  return changelog.excludeCommitPatterns.map(pattern => {
    try {
      return new RegExp(pattern);
    } catch (e) {
      throw new ConfigurationError(
        `Invalid commit exclusion pattern: ${pattern}`
      );
    }
  });
}

export function getVersioningPolicy(config: ProjectConfig): VersioningPolicy {
  const initialVersion = parseVersion(config.initialVersion);
  if (!initialVersion || isPrerelease(initialVersion)) {
    throw new ConfigurationError(
      `"initialVersion" must be a final version, got "${config.initialVersion}"`
    );
  }
  return {
    initialVersion,
    majorOnZero: config.majorOnZero,
    allowZeroVersion: config.allowZeroVersion,
  };
}

/**
 * Forgets the cached configuration and its location
 */
export function clearConfigCache(): void {
  _configPathCache = undefined;
  _configCache = undefined;
}
