import { z } from 'zod';

import {
  CommitMessage,
  CommitParser,
  CommitToken,
  extractBreakingFooters,
  ParserOptionsSchema,
  splitMessage,
} from './base';

export const TagParserOptionsSchema = ParserOptionsSchema.extend({
  minorTag: z.string().min(1).default(':sparkles:'),
  patchTag: z.string().min(1).default(':nut_and_bolt:'),
});

export type TagParserOptions = z.infer<typeof TagParserOptionsSchema>;

/**
 * Leading-tag convention: the subject starts with the minor or the patch tag,
 * e.g. ":nut_and_bolt: fix the cache"
 */
export class TagCommitParser extends CommitParser<TagParserOptions> {
  public readonly defaultCategory = 'Unknown';
  public readonly sections: readonly string[] = ['Feature', 'Fix'];

  protected parseMessage(commit: CommitMessage): CommitToken {
    const { subject, paragraphs } = splitMessage(commit.message);
    let category: string;
    let tag: string;
    if (subject.startsWith(this.options.minorTag)) {
      category = 'Feature';
      tag = this.options.minorTag;
    } else if (subject.startsWith(this.options.patchTag)) {
      category = 'Fix';
      tag = this.options.patchTag;
    } else {
      return this.unknownToken(commit);
    }

    const { descriptions, breakingDescriptions } =
      extractBreakingFooters(paragraphs);
    const breaking = breakingDescriptions.length > 0;
    let bump: CommitToken['bump'] = category === 'Feature' ? 'minor' : 'patch';
    if (breaking) {
      bump = 'major';
    }

    return {
      sha: commit.sha,
      message: commit.message,
      bump,
      category,
      breaking,
      scope: null,
      descriptions: [subject.slice(tag.length).trim(), ...descriptions],
      breakingDescriptions,
    };
  }
}
