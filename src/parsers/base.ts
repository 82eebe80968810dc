import { z } from 'zod';

import { ParseError } from '../utils/errors';
import { BumpLevel } from '../utils/version';

/**
 * Classification of a single commit
 */
export interface CommitToken {
  /** Commit SHA */
  readonly sha: string;
  /** The raw commit message */
  readonly message: string;
  readonly bump: BumpLevel;
  /** Convention-specific category, also the changelog section name */
  readonly category: string;
  readonly breaking: boolean;
  readonly scope: string | null;
  /** Subject line first, then the body paragraphs */
  readonly descriptions: readonly string[];
  /** Texts of "BREAKING CHANGE:" footers, if any */
  readonly breakingDescriptions: readonly string[];
}

/** The part of a commit a parser looks at */
export interface CommitMessage {
  sha: string;
  message: string;
}

export const BumpLevelSchema = z.enum(['none', 'patch', 'minor', 'major']);

/**
 * Options every commit parser accepts
 */
export const ParserOptionsSchema = z.object({
  /** Bump level of commits that match no marker */
  defaultBumpLevel: BumpLevelSchema.default('none'),
});

export type ParserOptions = z.infer<typeof ParserOptionsSchema>;

/**
 * Base class for commit message conventions
 *
 * Subclasses receive their own, already validated, options object. The rest
 * of the system only relies on `parse()` and the changelog section layout.
 */
export abstract class CommitParser<
  TOptions extends ParserOptions = ParserOptions,
> {
  /** Ordered changelog sections, the catch-all excluded */
  public abstract readonly sections: readonly string[];
  /** Category of commits that match no marker; rendered last */
  public abstract readonly defaultCategory: string;

  public constructor(public readonly options: TOptions) {}

  /**
   * Classifies a commit message
   *
   * @throws ParseError if the message is empty or not valid text
   */
  public parse(commit: CommitMessage): CommitToken {
    assertParsableMessage(commit);
    return this.parseMessage(commit);
  }

  protected abstract parseMessage(commit: CommitMessage): CommitToken;

  /**
   * Token for a message that matched none of the convention's markers
   */
  protected unknownToken(commit: CommitMessage): CommitToken {
    const { subject, paragraphs } = splitMessage(commit.message);
    return {
      sha: commit.sha,
      message: commit.message,
      bump: this.options.defaultBumpLevel,
      category: this.defaultCategory,
      breaking: false,
      scope: null,
      descriptions: [subject, ...paragraphs],
      breakingDescriptions: [],
    };
  }
}

// U+FFFD is what decoders leave behind for bytes that are not valid UTF-8
const MALFORMED_TEXT_REGEX =
  /\uFFFD|\u0000|[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

function assertParsableMessage(commit: CommitMessage): void {
  if (commit.message.trim().length === 0) {
    throw new ParseError(`Commit ${commit.sha} has an empty message`, commit.sha);
  }
  if (MALFORMED_TEXT_REGEX.test(commit.message)) {
    throw new ParseError(
      `Commit ${commit.sha} has a message that is not valid text`,
      commit.sha
    );
  }
}

/**
 * Splits a commit message into its subject line and body paragraphs
 */
export function splitMessage(message: string): {
  subject: string;
  paragraphs: string[];
} {
  const [subject = '', ...rest] = message.replace(/\r\n/g, '\n').split('\n');
  const paragraphs = rest
    .join('\n')
    .split(/\n{2,}/)
    .map(paragraph => paragraph.trim())
    .filter(paragraph => paragraph.length > 0);
  return { subject: subject.trim(), paragraphs };
}

const BREAKING_FOOTER_REGEX = /^BREAKING[ -]CHANGE:\s*(?<text>[\s\S]+)$/;

/**
 * Separates "BREAKING CHANGE: ..." footers from the other paragraphs
 */
export function extractBreakingFooters(paragraphs: string[]): {
  descriptions: string[];
  breakingDescriptions: string[];
} {
  const descriptions: string[] = [];
  const breakingDescriptions: string[] = [];
  for (const paragraph of paragraphs) {
    const text = BREAKING_FOOTER_REGEX.exec(paragraph)?.groups?.text;
    if (text) {
      breakingDescriptions.push(text.trim());
    } else {
      descriptions.push(paragraph);
    }
  }
  return { descriptions, breakingDescriptions };
}
