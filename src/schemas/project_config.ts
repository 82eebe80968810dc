import { z } from 'zod';

/**
 * Release channel: which branches it applies to and whether versions cut
 * there are prereleases
 */
export const ReleaseChannelConfigSchema = z.object({
  /** Regular expression matched against the start of the branch name */
  match: z.string(),
  prerelease: z.boolean().default(false),
  prereleaseToken: z.string().default('rc'),
});

export type ReleaseChannelConfig = z.infer<typeof ReleaseChannelConfigSchema>;

export const ChangelogConfigSchema = z.object({
  path: z.string().default('CHANGELOG.md'),
  /** init: regenerate the whole file, update: insert new releases on top */
  mode: z.enum(['init', 'update']).default('update'),
  /** Commits matching any of these are neither bumped nor rendered */
  excludeCommitPatterns: z.array(z.string()).default([]),
  /** What to do with the commits of the oldest release the walk reaches */
  boundaryCommits: z.enum(['attach', 'discard']).default('attach'),
  /** Mustache template of release headers: tag, version and date are available */
  headerTemplate: z.string().default('{{tag}} ({{date}})'),
});

export type ChangelogConfig = z.infer<typeof ChangelogConfigSchema>;

/**
 * Where the repository is hosted; anything left out is derived from the
 * "origin" remote
 */
export const RemoteConfigSchema = z.object({
  type: z.enum(['github', 'gitlab', 'gitea', 'bitbucket']).optional(),
  domain: z.string().optional(),
  owner: z.string().optional(),
  repo: z.string().optional(),
});

export type RemoteConfig = z.infer<typeof RemoteConfigSchema>;

export const DEFAULT_BRANCHES: Record<string, z.input<typeof ReleaseChannelConfigSchema>> = {
  main: { match: '(main|master)', prerelease: false, prereleaseToken: 'rc' },
};

/**
 * Project configuration (.release-ledger.yml)
 */
export const ProjectConfigSchema = z
  .object({
    /** Minimal release-ledger version this configuration needs */
    minVersion: z.string().optional(),
    tagFormat: z.string().default('v{version}'),
    commitParser: z.string().default('angular'),
    /** Validated by the selected commit parser */
    commitParserOptions: z.record(z.unknown()).default({}),
    branches: z.record(ReleaseChannelConfigSchema).default(DEFAULT_BRANCHES),
    initialVersion: z.string().default('0.1.0'),
    /** Whether breaking changes bump the major version while it is 0 */
    majorOnZero: z.boolean().default(true),
    /** When false, the first release and every 0.x release become 1.0.0 */
    allowZeroVersion: z.boolean().default(true),
    changelog: ChangelogConfigSchema.default({}),
    remote: RemoteConfigSchema.optional(),
  })
  .strict();

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;
