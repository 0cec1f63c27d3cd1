/**
 * HTML sanitizer for exported documents.
 *
 * Markdown may embed raw HTML, which the renderer passes through. Before the
 * body is written into a standalone page, active content is removed: script
 * and embedding elements, inline event handlers and script-capable URLs.
 * Everything else is left as written.
 *
 * @module core/sanitizer
 */

/** Elements removed together with their content. */
export const BLOCKED_ELEMENTS = [
  'script',
  'iframe',
  'frame',
  'frameset',
  'embed',
  'object',
  'applet',
  'style',
  'link',
  'form',
  'base',
  'meta',
  'svg',
  'math',
  'template',
] as const;

/** Attributes whose value is a URL. */
const URL_ATTRIBUTES = 'href|src|action|formaction|xlink:href';

const SCRIPT_SCHEME_RE = /^\s*(?:javascript|vbscript|data)\s*:/i;

type SanitizePass = (html: string) => string;

function stripElement(tag: string): SanitizePass {
  const paired = new RegExp(`<${tag}\\b[^>]*>[\\s\\S]*?<\\/${tag}\\s*>`, 'gi');
  const single = new RegExp(`<\\/?${tag}\\b[^>]*>`, 'gi');
  return (html) => html.replace(paired, '').replace(single, '');
}

/** Decode numeric character references so encoded schemes are visible. */
function decodeNumericEntities(value: string): string {
  return value
    .replace(/&#x([0-9a-f]+);?/gi, (_m, hex: string) => String.fromCodePoint(parseInt(hex, 16)))
    .replace(/&#(\d+);?/g, (_m, dec: string) => String.fromCodePoint(parseInt(dec, 10)));
}

/**
 * A start tag. Quoted values may contain `>`; an unbalanced quote runs to
 * the next `>`.
 */
const START_TAG_RE = /<[A-Za-z][^\s/>]*(?:"[^"]*"|'[^']*'|[^'">])*(?:['"][^>]*)?>/g;

/** Apply an attribute pass to start tags only, leaving text and escaped code alone. */
function withinStartTags(pass: SanitizePass): SanitizePass {
  return (html) => html.replace(START_TAG_RE, (tag) => pass(tag));
}

const removeEventHandlers: SanitizePass = withinStartTags((tag) =>
  tag.replace(/\s+on[a-z]+\s*=\s*(?:"[^"]*"|'[^']*'|[^\s>]+)/gi, ''),
);

/**
 * Blank out URL attributes that resolve to a script-capable scheme, after
 * decoding entities and dropping control characters the browser would
 * ignore (`jav&#x09;ascript:`).
 */
const neutralizeUrls: SanitizePass = withinStartTags((tag) =>
  tag.replace(
    new RegExp(`(\\s)(${URL_ATTRIBUTES})\\s*=\\s*(?:"([^"]*)"|'([^']*)'|([^\\s>]+))`, 'gi'),
    (match, space: string, attr: string, dq?: string, sq?: string, bare?: string) => {
      const raw = dq ?? sq ?? bare ?? '';
      const decoded = decodeNumericEntities(raw).replace(/[\x00-\x20]+/g, '');
      return SCRIPT_SCHEME_RE.test(decoded) ? `${space}${attr}=""` : match;
    },
  ),
);

const PASSES: readonly SanitizePass[] = [
  (html) => html.replace(/\x00/g, ''),
  ...BLOCKED_ELEMENTS.map(stripElement),
  removeEventHandlers,
  neutralizeUrls,
];

/**
 * Remove active content from an HTML fragment.
 *
 * @example
 * ```ts
 * sanitizeHtml('<p onclick="alert(1)">hi</p><script>x()</script>');
 * // => '<p>hi</p>'
 * ```
 */
export function sanitizeHtml(html: string): string {
  if (!html.includes('<')) return html;
  return PASSES.reduce((result, pass) => pass(result), html);
}
