import { z } from 'zod';

import {
  CommitMessage,
  CommitParser,
  CommitToken,
  ParserOptionsSchema,
  splitMessage,
} from './base';

export const EmojiParserOptionsSchema = ParserOptionsSchema.extend({
  majorTags: z.array(z.string()).default([':boom:']),
  minorTags: z
    .array(z.string())
    .default([
      ':sparkles:',
      ':children_crossing:',
      ':lipstick:',
      ':iphone:',
      ':egg:',
      ':chart_with_upwards_trend:',
    ]),
  patchTags: z
    .array(z.string())
    .default([
      ':ambulance:',
      ':lock:',
      ':bug:',
      ':zap:',
      ':goal_net:',
      ':alien:',
      ':wheelchair:',
      ':speech_balloon:',
      ':mag:',
      ':apple:',
      ':penguin:',
      ':checkered_flag:',
      ':robot:',
      ':green_apple:',
    ]),
});

export type EmojiParserOptions = z.infer<typeof EmojiParserOptionsSchema>;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Gitmoji-style convention: the first known emoji code in the subject line
 * decides the category, e.g. ":sparkles: add login page"
 */
export class EmojiCommitParser extends CommitParser<EmojiParserOptions> {
  public readonly defaultCategory = 'Other';
  public readonly sections: readonly string[];
  private readonly emojiRegex: RegExp | null;

  public constructor(options: EmojiParserOptions) {
    super(options);
    this.sections = [
      ...options.majorTags,
      ...options.minorTags,
      ...options.patchTags,
    ];
    this.emojiRegex =
      this.sections.length > 0
        ? new RegExp(this.sections.map(escapeRegExp).join('|'))
        : null;
  }

  protected parseMessage(commit: CommitMessage): CommitToken {
    const { subject, paragraphs } = splitMessage(commit.message);
    const emoji = this.emojiRegex?.exec(subject)?.[0];
    if (!emoji) {
      return this.unknownToken(commit);
    }

    const breaking = this.options.majorTags.includes(emoji);
    let bump = this.options.defaultBumpLevel;
    if (breaking) {
      bump = 'major';
    } else if (this.options.minorTags.includes(emoji)) {
      bump = 'minor';
    } else if (this.options.patchTags.includes(emoji)) {
      bump = 'patch';
    }

    return {
      sha: commit.sha,
      message: commit.message,
      bump,
      category: emoji,
      breaking,
      scope: null,
      descriptions: [subject, ...paragraphs],
      breakingDescriptions: [],
    };
  }
}
