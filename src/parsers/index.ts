import { z } from 'zod';

import { ConfigurationError } from '../utils/errors';
import { AngularCommitParser, AngularParserOptionsSchema } from './angular';
import { CommitParser, ParserOptions } from './base';
import { EmojiCommitParser, EmojiParserOptionsSchema } from './emoji';
import { ScipyCommitParser, ScipyParserOptionsSchema } from './scipy';
import { TagCommitParser, TagParserOptionsSchema } from './tag';

export * from './base';

/**
 * How to build a commit parser of one convention
 */
export interface CommitParserDefinition<TOptions extends ParserOptions> {
  /** Validates the raw `commitParserOptions` and fills in defaults */
  optionsSchema: z.ZodType<TOptions, z.ZodTypeDef, unknown>;
  create(options: TOptions): CommitParser<TOptions>;
}

type ParserFactory = (rawOptions: unknown) => CommitParser;

const PARSER_MAP = new Map<string, ParserFactory>();

/**
 * Makes a commit convention available under the given name, so it can be
 * selected with the `commitParser` configuration key.
 */
export function registerCommitParser<TOptions extends ParserOptions>(
  name: string,
  definition: CommitParserDefinition<TOptions>
): void {
  PARSER_MAP.set(name, (rawOptions: unknown) => {
    const result = definition.optionsSchema.safeParse(rawOptions ?? {});
    if (!result.success) {
      const issues = result.error.issues
        .map(issue => `  ${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('\n');
      throw new ConfigurationError(
        `Invalid options for commit parser "${name}":\n${issues}`
      );
    }
    return definition.create(result.data);
  });
}

/**
 * Returns the names of all registered commit conventions
 */
export function getCommitParserNames(): string[] {
  return [...PARSER_MAP.keys()];
}

/**
 * Instantiates the commit parser registered under the given name
 *
 * @param name Convention name, e.g. "angular"
 * @param rawOptions Unvalidated parser options from the configuration
 */
export function createCommitParser(
  name: string,
  rawOptions?: unknown
): CommitParser {
  const factory = PARSER_MAP.get(name);
  if (!factory) {
    throw new ConfigurationError(
      `Unknown commit parser "${name}". Available parsers: ${getCommitParserNames().join(', ')}`
    );
  }
  return factory(rawOptions);
}

registerCommitParser('angular', {
  optionsSchema: AngularParserOptionsSchema,
  create: options => new AngularCommitParser(options),
});
registerCommitParser('emoji', {
  optionsSchema: EmojiParserOptionsSchema,
  create: options => new EmojiCommitParser(options),
});
registerCommitParser('scipy', {
  optionsSchema: ScipyParserOptionsSchema,
  create: options => new ScipyCommitParser(options),
});
registerCommitParser('tag', {
  optionsSchema: TagParserOptionsSchema,
  create: options => new TagCommitParser(options),
});
