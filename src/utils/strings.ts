import mustache from 'mustache';

export type TemplateContext = Record<string, string | number | boolean | undefined>;

/**
 * Renders the given template in a safe way
 *
 * No expressions or logic is allowed, only values. Under the hood, Mustache
 * templates are used; values are not HTML-escaped since the output is
 * Markdown.
 *
 * @param template Mustache template
 * @param context Template data
 * @returns Rendered template
 */
export function renderTemplateSafe(
  template: string,
  context: TemplateContext
): string {
  return mustache.render(template, context, undefined, {
    escape: (value: unknown) => String(value),
  });
}

/**
 * Formats a date as YYYY-MM-DD in UTC
 */
export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}
