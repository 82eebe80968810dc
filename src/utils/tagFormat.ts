import { ConfigurationError } from './errors';
import { parseVersion, Version, versionToString } from './version';

export const VERSION_PLACEHOLDER = '{version}';
export const DEFAULT_TAG_FORMAT = `v${VERSION_PLACEHOLDER}`;

// Loose enough to capture every canonical version, parseVersion() does the
// actual validation.
const VERSION_CAPTURE =
  '(?<version>\\d+\\.\\d+\\.\\d+(?:-[0-9A-Za-z-]+(?:\\.[0-9A-Za-z-]+)*)?)';

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

const tagRegexCache = new Map<string, RegExp>();

/**
 * Validates a tag template and returns the regular expression matching the
 * tags it produces.
 *
 * @throws ConfigurationError if the template doesn't contain exactly one
 *         "{version}" placeholder
 */
export function getTagRegex(template: string): RegExp {
  const cached = tagRegexCache.get(template);
  if (cached) {
    return cached;
  }
  const parts = template.split(VERSION_PLACEHOLDER);
  if (parts.length !== 2) {
    throw new ConfigurationError(
      `Invalid tag format "${template}": it must contain the "${VERSION_PLACEHOLDER}" placeholder exactly once.`
    );
  }
  const [prefix, suffix] = parts;
  const regex = new RegExp(
    `^${escapeRegExp(prefix)}${VERSION_CAPTURE}${escapeRegExp(suffix)}$`
  );
  tagRegexCache.set(template, regex);
  return regex;
}

/**
 * Returns the git tag for the given version.
 *
 * @param version Version we're releasing
 * @param template Tag template, e.g. "v{version}"
 */
export function renderTag(
  version: Version,
  template: string = DEFAULT_TAG_FORMAT
): string {
  getTagRegex(template);
  return template.replace(VERSION_PLACEHOLDER, versionToString(version));
}

/**
 * Recovers the version from a tag name.
 *
 * Tags that don't follow the template are not managed by release-ledger and
 * yield null.
 *
 * @param tag Tag name, e.g. "v1.2.3-rc.1"
 * @param template Tag template, e.g. "v{version}"
 */
export function parseTag(
  tag: string,
  template: string = DEFAULT_TAG_FORMAT
): Version | null {
  const match = getTagRegex(template).exec(tag);
  const versionString = match?.groups?.version;
  if (!versionString) {
    return null;
  }
  return parseVersion(versionString);
}
