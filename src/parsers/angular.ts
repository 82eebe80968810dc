import { z } from 'zod';

import {
  CommitMessage,
  CommitParser,
  CommitToken,
  extractBreakingFooters,
  ParserOptionsSchema,
  splitMessage,
} from './base';

/** Changelog section of each commit type, in rendering order */
export const ANGULAR_TYPE_SECTIONS: ReadonlyMap<string, string> = new Map([
  ['feat', 'Feature'],
  ['fix', 'Fix'],
  ['perf', 'Performance'],
  ['docs', 'Documentation'],
  ['refactor', 'Refactor'],
  ['style', 'Style'],
  ['build', 'Build'],
  ['ci', 'CI'],
  ['chore', 'Chore'],
  ['test', 'Test'],
]);

export const AngularParserOptionsSchema = ParserOptionsSchema.extend({
  allowedTags: z
    .array(z.string())
    .default([
      'build',
      'chore',
      'ci',
      'docs',
      'feat',
      'fix',
      'perf',
      'style',
      'refactor',
      'test',
    ]),
  minorTags: z.array(z.string()).default(['feat']),
  patchTags: z.array(z.string()).default(['fix', 'perf']),
});

export type AngularParserOptions = z.infer<typeof AngularParserOptionsSchema>;

// type(scope)!: subject
const SUBJECT_REGEX =
  /^(?<type>\w+)(?:\((?<scope>[^)\n]+)\))?(?<bang>!)?: (?<subject>.+)$/;

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

/**
 * Angular commit convention: "feat(scope): subject"
 */
export class AngularCommitParser extends CommitParser<AngularParserOptions> {
  public readonly defaultCategory = 'Unknown';
  public readonly sections: readonly string[];

  public constructor(options: AngularParserOptions) {
    super(options);
    const extraSections = options.allowedTags
      .filter(tag => !ANGULAR_TYPE_SECTIONS.has(tag))
      .map(capitalize);
    this.sections = [...ANGULAR_TYPE_SECTIONS.values(), ...extraSections];
  }

  protected parseMessage(commit: CommitMessage): CommitToken {
    const { subject: subjectLine, paragraphs } = splitMessage(commit.message);
    const groups = SUBJECT_REGEX.exec(subjectLine)?.groups;
    if (!groups || !this.options.allowedTags.includes(groups.type)) {
      return this.unknownToken(commit);
    }

    const { descriptions, breakingDescriptions } =
      extractBreakingFooters(paragraphs);
    const breaking = groups.bang === '!' || breakingDescriptions.length > 0;

    let bump = this.options.defaultBumpLevel;
    if (breaking) {
      bump = 'major';
    } else if (this.options.minorTags.includes(groups.type)) {
      bump = 'minor';
    } else if (this.options.patchTags.includes(groups.type)) {
      bump = 'patch';
    }

    return {
      sha: commit.sha,
      message: commit.message,
      bump,
      category:
        ANGULAR_TYPE_SECTIONS.get(groups.type) ?? capitalize(groups.type),
      breaking,
      scope: groups.scope ?? null,
      descriptions: [groups.subject.trim(), ...descriptions],
      breakingDescriptions,
    };
  }
}
