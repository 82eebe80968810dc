import { z } from 'zod';

import {
  CommitMessage,
  CommitParser,
  CommitToken,
  extractBreakingFooters,
  ParserOptionsSchema,
  splitMessage,
} from './base';

/** Changelog section of each SciPy commit tag */
export const SCIPY_TAG_SECTIONS: ReadonlyMap<string, string> = new Map([
  ['API', 'Breaking'],
  ['DEP', 'Deprecation'],
  ['ENH', 'Feature'],
  ['FEAT', 'Feature'],
  ['BUG', 'Fix'],
  ['MAINT', 'Fix'],
  ['BLD', 'Build'],
  ['DEV', 'Development'],
  ['DOC', 'Documentation'],
  ['REV', 'Other'],
  ['BENCH', 'None'],
  ['STY', 'None'],
  ['TST', 'None'],
  ['TEST', 'None'],
  ['REL', 'None'],
]);

const SCIPY_SECTIONS = [
  'Breaking',
  'Deprecation',
  'Feature',
  'Fix',
  'Build',
  'Development',
  'Documentation',
  'Other',
];

export const ScipyParserOptionsSchema = ParserOptionsSchema.extend({
  majorTags: z.array(z.string()).default(['API', 'DEP']),
  minorTags: z.array(z.string()).default(['ENH', 'FEAT', 'DEV', 'REV']),
  patchTags: z.array(z.string()).default(['BUG', 'MAINT', 'BLD']),
});

export type ScipyParserOptions = z.infer<typeof ScipyParserOptionsSchema>;

// TAG(scope): subject
const SUBJECT_REGEX = /^(?<tag>[A-Z]+)(?:\((?<scope>[^)\n]+)\))?: (?<subject>.+)$/;

/**
 * SciPy commit convention: "ENH: add a new solver"
 */
export class ScipyCommitParser extends CommitParser<ScipyParserOptions> {
  public readonly defaultCategory = 'None';
  public readonly sections: readonly string[] = SCIPY_SECTIONS;

  protected parseMessage(commit: CommitMessage): CommitToken {
    const { subject: subjectLine, paragraphs } = splitMessage(commit.message);
    const groups = SUBJECT_REGEX.exec(subjectLine)?.groups;
    const category = groups ? SCIPY_TAG_SECTIONS.get(groups.tag) : undefined;
    if (!groups || !category) {
      return this.unknownToken(commit);
    }

    const { descriptions, breakingDescriptions } =
      extractBreakingFooters(paragraphs);
    const breaking =
      this.options.majorTags.includes(groups.tag) ||
      breakingDescriptions.length > 0;

    let bump = this.options.defaultBumpLevel;
    if (breaking) {
      bump = 'major';
    } else if (this.options.minorTags.includes(groups.tag)) {
      bump = 'minor';
    } else if (this.options.patchTags.includes(groups.tag)) {
      bump = 'patch';
    }

    return {
      sha: commit.sha,
      message: commit.message,
      bump,
      category,
      breaking,
      scope: groups.scope ?? null,
      descriptions: [groups.subject.trim(), ...descriptions],
      breakingDescriptions,
    };
  }
}
