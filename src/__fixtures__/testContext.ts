import { validateConfiguration } from '../config';
import { RuntimeContext } from '../context';
import { HostingClient } from '../hosting';
import { createCommitParser } from '../parsers';
import { VersionControl } from '../vcs/base';

/**
 * Runtime context for the given repository and raw configuration, without
 * reading any configuration file
 */
export function createTestContext(
  repository: VersionControl,
  rawConfig: Record<string, unknown> = {},
  hosting: HostingClient | null = null
): RuntimeContext {
  const config = validateConfiguration(rawConfig);
  return {
    config,
    repository,
    parser: createCommitParser(config.commitParser, config.commitParserOptions),
    hosting,
  };
}
