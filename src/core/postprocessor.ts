/**
 * HTML postprocessor.
 *
 * Transformations applied to sanitized body HTML before it is placed in the
 * export document.
 *
 * @module core/postprocessor
 */

/**
 * Wrap `<table>` elements in a horizontally scrollable container so wide
 * tables do not overflow the page.
 */
function wrapTablesForOverflow(html: string): string {
  return html
    .replace(/<table\b/g, '<div class="table-wrapper"><table')
    .replace(/<\/table>/g, '</table></div>');
}

/**
 * Derive a URL fragment from heading text: tags removed, lowercased,
 * whitespace to `-`, punctuation dropped. CJK characters are kept.
 */
export function slugify(text: string): string {
  return text
    .replace(/<[^>]*>/g, '')
    .replace(/&[a-z0-9#]+;/gi, '')
    .toLowerCase()
    .trim()
    .replace(/[^\p{L}\p{N}\s-]/gu, '')
    .replace(/\s+/g, '-');
}

/**
 * Give every `<h1>`–`<h6>` without an id a unique `id` derived from its
 * text, so the exported page can be linked into. Repeats get `-1`, `-2`, ….
 */
function addHeadingAnchors(html: string): string {
  const seen = new Map<string, number>();
  return html.replace(/<h([1-6])>([\s\S]*?)<\/h\1>/g, (match, depth: string, inner: string) => {
    const base = slugify(inner) || 'section';
    const count = seen.get(base) ?? 0;
    seen.set(base, count + 1);
    const id = count === 0 ? base : `${base}-${count}`;
    return `<h${depth} id="${id}">${inner}</h${depth}>`;
  });
}

/** Postprocessor toggles. All default to `true`. */
export interface PostprocessOptions {
  wrapTables?: boolean;
  headingAnchors?: boolean;
}

/**
 * Apply the enabled postprocessor transformations in sequence.
 *
 * @param html - Sanitized body HTML.
 */
export function postprocessHtml(html: string, options: PostprocessOptions = {}): string {
  let result = html;
  if (options.wrapTables ?? true) result = wrapTablesForOverflow(result);
  if (options.headingAnchors ?? true) result = addHeadingAnchors(result);
  return result;
}
