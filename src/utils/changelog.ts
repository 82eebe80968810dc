import { marked, type Token, type Tokens } from 'marked';

import { HostingClient } from '../hosting/base';
import { CommitParser, CommitToken } from '../parsers/base';
import { Release, ReleaseHistory } from './releaseHistory';
import { formatDate, renderTemplateSafe } from './strings';
import { versionToString } from './version';

export const DEFAULT_CHANGELOG_PATH = 'CHANGELOG.md';
export const DEFAULT_UNRELEASED_TITLE = 'Unreleased';
export const DEFAULT_HEADER_TEMPLATE = '{{tag}} ({{date}})';
export const CHANGELOG_TITLE = '# Changelog';
export const BREAKING_CHANGES_TITLE = 'Breaking Changes';
const DEFAULT_CHANGESET_BODY = '- No documented changes.';
const VERSION_HEADER_LEVEL = 2;
const SUBSECTION_HEADER_LEVEL = VERSION_HEADER_LEVEL + 1;
// GitHub and GitLab both abbreviate to 8 characters to avoid collisions
const SHORT_SHA_LENGTH = 8;

// GitHub appends the PR number to squash-merged commit titles:
// `fix: Commit title (#123)`
export const PRExtractor = /\s*\(#(?<pr>\d+)\)$/;

/**
 * A group of commits under one changelog heading
 */
export interface ChangelogSection {
  name: string;
  commits: CommitToken[];
}

/**
 * A single changeset with name and description
 */
export interface Changeset {
  /** The name of this changeset */
  name: string;
  /** The markdown body describing the changeset */
  body: string;
}

export type SectionLayout = Pick<CommitParser, 'sections' | 'defaultCategory'>;

/**
 * Groups commits into the convention's sections.
 *
 * Sections come in the convention's order and commits keep their order.
 * Categories the convention doesn't declare end up in the catch-all
 * section, which always comes last. Empty sections are left out.
 */
export function renderSections(
  commits: readonly CommitToken[],
  layout: SectionLayout
): ChangelogSection[] {
  const known = new Set(
    layout.sections.filter(name => name !== layout.defaultCategory)
  );
  const byName = new Map<string, CommitToken[]>();
  const catchAll: CommitToken[] = [];
  for (const commit of commits) {
    if (!known.has(commit.category)) {
      catchAll.push(commit);
      continue;
    }
    const sectionCommits = byName.get(commit.category) ?? [];
    sectionCommits.push(commit);
    byName.set(commit.category, sectionCommits);
  }

  const result: ChangelogSection[] = [];
  for (const name of known) {
    const sectionCommits = byName.get(name);
    if (sectionCommits) {
      result.push({ name, commits: sectionCommits });
    }
  }
  if (catchAll.length > 0) {
    result.push({ name: layout.defaultCategory, commits: catchAll });
  }
  return result;
}

/**
 * Changelog sections of one release
 */
export function renderReleaseSections(
  release: Release,
  layout: SectionLayout
): ChangelogSection[] {
  return renderSections(release.commits, layout);
}

/**
 * Subsection heading. Pound signs are encoded so that they can't be taken for
 * a closing sequence.
 */
function subsectionHeading(title: string): string {
  return `${'#'.repeat(SUBSECTION_HEADER_LEVEL)} ${title.replaceAll('#', '&#35;')}`;
}

/**
 * Release heading, either in ATX (`## 1.0.0`) or in Setext (`1.0.0\n-----`)
 * style
 */
function releaseHeading(name: string, setext = false): string {
  return setext
    ? `${name}\n${'-'.repeat(name.length)}`
    : `${'#'.repeat(VERSION_HEADER_LEVEL)} ${name.replaceAll('#', '&#35;')}`;
}

// `_private` at a word start would open an emphasis
function escapeEmphasisStart(text: string): string {
  return text.replace(/(?<=^|\s)_/, '\\_');
}

/**
 * Formats one changelog line, linking the pull request or the commit when
 * the hosting platform is known.
 *
 * `- **scope:** Title in [#123](pr-url)` or `- Title in [abcdef12](commit-url)`
 */
export function formatChangelogEntry(
  commit: CommitToken,
  hosting: HostingClient | null,
  text: string = commit.descriptions[0] ?? ''
): string {
  const pr = PRExtractor.exec(text)?.groups?.pr;
  const title = escapeEmphasisStart(
    pr ? text.replace(PRExtractor, '') : text
  );
  const scope = commit.scope ? `**${commit.scope}:** ` : '';
  let line = `- ${scope}${title}`;

  if (pr) {
    line += hosting
      ? ` in [#${pr}](${hosting.pullRequestUrl(pr)})`
      : ` in #${pr}`;
  } else {
    const shortSha = commit.sha.slice(0, SHORT_SHA_LENGTH);
    line += hosting
      ? ` in [${shortSha}](${hosting.commitUrl(commit.sha)})`
      : ` in ${shortSha}`;
  }
  return line;
}

export interface SerializeOptions {
  hosting?: HostingClient | null;
  /** Mustache template for release headers */
  headerTemplate?: string;
}

/**
 * Renders the Markdown body of a list of commits: breaking changes first,
 * then one subsection per changelog section.
 */
export function serializeCommits(
  commits: readonly CommitToken[],
  layout: SectionLayout,
  hosting: HostingClient | null = null
): string {
  const parts: string[] = [];

  const breaking = commits.filter(commit => commit.breaking);
  if (breaking.length > 0) {
    const lines = breaking.flatMap(commit =>
      commit.breakingDescriptions.length > 0
        ? commit.breakingDescriptions.map(text =>
            formatChangelogEntry(commit, hosting, text)
          )
        : [formatChangelogEntry(commit, hosting)]
    );
    parts.push(
      `${subsectionHeading(BREAKING_CHANGES_TITLE)}\n\n${lines.join('\n')}`
    );
  }

  for (const section of renderSections(commits, layout)) {
    const lines = section.commits.map(commit =>
      formatChangelogEntry(commit, hosting)
    );
    parts.push(
      `${subsectionHeading(section.name)}\n\n${lines.join('\n')}`
    );
  }

  return parts.length > 0 ? parts.join('\n\n') : DEFAULT_CHANGESET_BODY;
}

/**
 * Renders a release as a changeset
 */
export function serializeRelease(
  release: Release,
  layout: SectionLayout,
  options: SerializeOptions = {}
): Changeset {
  const name = renderTemplateSafe(
    options.headerTemplate ?? DEFAULT_HEADER_TEMPLATE,
    {
      tag: release.tag,
      version: versionToString(release.version),
      date: formatDate(release.committedDate),
    }
  );
  return {
    name,
    body: serializeCommits(release.commits, layout, options.hosting),
  };
}

function changesetToMarkdown(changeset: Changeset): string {
  return `${releaseHeading(changeset.name)}\n\n${changeset.body}\n\n`;
}

/**
 * Renders the whole history as a changelog document
 */
export function serializeChangelog(
  history: ReleaseHistory,
  layout: SectionLayout,
  options: SerializeOptions = {}
): string {
  let markdown = `${CHANGELOG_TITLE}\n\n`;
  if (history.unreleased.length > 0) {
    markdown += changesetToMarkdown({
      name: DEFAULT_UNRELEASED_TITLE,
      body: serializeCommits(history.unreleased, layout, options.hosting),
    });
  }
  for (const release of history.released) {
    markdown += changesetToMarkdown(serializeRelease(release, layout, options));
  }
  return `${markdown.trimEnd()}\n`;
}

/**
 * A release-level heading of a changelog document and the span of text it
 * owns, up to the next heading of the same or a higher level
 */
interface ChangelogEntry {
  title: string;
  start: number;
  bodyStart: number;
  end: number;
  setext: boolean;
}

function isHeading(token: Token): token is Tokens.Heading {
  return token.type === 'heading';
}

/**
 * Lists the release entries of a changelog document in document order.
 * Offsets add up the raw text of the lexer's top-level tokens.
 */
function outlineChangelog(markdown: string): ChangelogEntry[] {
  const entries: ChangelogEntry[] = [];
  let open: ChangelogEntry | null = null;
  let offset = 0;
  for (const token of marked.lexer(markdown)) {
    if (isHeading(token) && token.depth <= VERSION_HEADER_LEVEL) {
      if (open) {
        open.end = offset;
        open = null;
      }
      if (token.depth === VERSION_HEADER_LEVEL) {
        open = {
          title: token.text,
          start: offset,
          bodyStart: offset + token.raw.length,
          end: markdown.length,
          setext: !/^ {0,3}#/.test(token.raw),
        };
        entries.push(open);
      }
    }
    offset += token.raw.length;
  }
  return entries;
}

/** Decides whether a changelog heading stands for some release */
export type HeadingMatcher = (title: string) => boolean;

const VERSION_IN_HEADING = /\d+\.\d+\.\d+(?:-[0-9A-Za-z-]+\.\d+)?/g;

/**
 * Matches the headings of a release, whatever date or wording they carry:
 * the heading has to name the release's tag or its version.
 */
export function matchRelease(release: Release): HeadingMatcher {
  const version = versionToString(release.version);
  return title =>
    title.split(/[\s()[\]]+/).includes(release.tag) ||
    (title.match(VERSION_IN_HEADING) ?? new Array<string>()).includes(version);
}

function toMatcher(heading: string | HeadingMatcher): HeadingMatcher {
  return typeof heading === 'string' ? title => title === heading : heading;
}

/**
 * Extracts a changeset from a changelog document, by its exact heading or by
 * a matcher
 */
export function findChangeset(
  markdown: string,
  heading: string | HeadingMatcher
): Changeset | null {
  const matches = toMatcher(heading);
  const entry = outlineChangelog(markdown).find(({ title }) => matches(title));
  return entry
    ? {
        name: entry.title,
        body: markdown.slice(entry.bodyStart, entry.end).trim(),
      }
    : null;
}

/**
 * Cuts a changeset out of a changelog document. Unknown headings leave the
 * document as it is.
 */
export function removeChangeset(
  markdown: string,
  heading: string | HeadingMatcher
): string {
  const matches = toMatcher(heading);
  const entry = outlineChangelog(markdown).find(({ title }) => matches(title));
  return entry
    ? `${markdown.slice(0, entry.start)}${markdown.slice(entry.end)}`
    : markdown;
}

/**
 * Puts a changeset on top of the existing ones, in the heading style the
 * document already uses. Anything above them (such as the document title)
 * stays where it is. A document without any changeset gets it appended.
 */
export function prependChangeset(markdown: string, changeset: Changeset): string {
  const [top] = outlineChangelog(markdown);
  const section = `${releaseHeading(changeset.name, top?.setext)}\n\n${
    changeset.body || DEFAULT_CHANGESET_BODY
  }\n\n`;
  if (top) {
    return `${markdown.slice(0, top.start)}${section}${markdown.slice(top.start)}`;
  }
  return markdown.trim() ? `${markdown.trimEnd()}\n\n${section}` : section;
}

/**
 * Brings an existing changelog document up to date: releases that are not
 * in it yet are inserted on top (oldest first), and the "Unreleased" section
 * is replaced. A release counts as present when any heading names its tag or
 * its version, so a heading dated differently doesn't get the release
 * written twice.
 */
export function updateChangelog(
  markdown: string,
  history: ReleaseHistory,
  layout: SectionLayout,
  options: SerializeOptions = {}
): string {
  if (!markdown.trim()) {
    return serializeChangelog(history, layout, options);
  }
  let updated = removeChangeset(markdown, DEFAULT_UNRELEASED_TITLE);
  for (const release of [...history.released].reverse()) {
    if (!findChangeset(updated, matchRelease(release))) {
      updated = prependChangeset(
        updated,
        serializeRelease(release, layout, options)
      );
    }
  }
  if (history.unreleased.length > 0) {
    updated = prependChangeset(updated, {
      name: DEFAULT_UNRELEASED_TITLE,
      body: serializeCommits(history.unreleased, layout, options.hosting),
    });
  }
  return `${updated.trimEnd()}\n`;
}
