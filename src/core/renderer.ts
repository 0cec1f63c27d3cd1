/**
 * HTML renderer for marked.
 *
 * Produces body HTML for the standalone export document. Presentation comes
 * from the stylesheet in `styles.ts`, so the markup carries no inline
 * styles except table column widths.
 *
 * - Tables get a `<colgroup>` sized from their content
 * - List items are not wrapped in `<p>` (loose lists would gain blank lines)
 * - External links open in a new tab
 */

import {
  Marked,
  Renderer,
  type Token,
  type TokensList,
  type Tokens,
  type RendererObject,
} from 'marked';

// ---------------------------------------------------------------------------
// HTML entity escaping
// ---------------------------------------------------------------------------

const ENTITY_MAP: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

/** Escape HTML special characters. */
export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => ENTITY_MAP[ch] ?? ch);
}

// ---------------------------------------------------------------------------
// Table column widths
// ---------------------------------------------------------------------------

/**
 * Estimate the visual width of text for column sizing.
 * CJK and full-width characters count 2, everything else 1.
 */
export function measureTextWidth(text: string): number {
  let width = 0;
  for (const ch of text) {
    const code = ch.codePointAt(0) ?? 0;
    if (
      (code >= 0x3000 && code <= 0x9fff) ||
      (code >= 0xf900 && code <= 0xfaff) ||
      (code >= 0xff00 && code <= 0xff60)
    ) {
      width += 2;
    } else {
      width += 1;
    }
  }
  return width;
}

const MIN_COL_WIDTH = 8;
const MAX_COL_WIDTH = 60;

/**
 * Turn per-column content widths into percentages that sum to 100.
 *
 * Each column is clamped to 8-60% before normalising, so an "ID" column stays
 * readable next to a long "Description" column.
 */
export function computeColumnWidths(colMaxLen: number[]): number[] {
  const colCount = colMaxLen.length;
  if (colCount === 0) return [];
  if (colCount === 1) return [100];

  const adjusted = colMaxLen.map((w) => Math.max(w, 2));
  const total = adjusted.reduce((a, b) => a + b, 0);

  let widths = adjusted.map((w) => {
    const pct = (w / total) * 100;
    return Math.max(MIN_COL_WIDTH, Math.min(MAX_COL_WIDTH, pct));
  });

  const sum = widths.reduce((a, b) => a + b, 0);
  widths = widths.map((w) => Math.round((w / sum) * 100 * 10) / 10);

  // Put the rounding drift on the widest column.
  const drift = Math.round((100 - widths.reduce((a, b) => a + b, 0)) * 10) / 10;
  if (drift !== 0) {
    const maxIdx = widths.indexOf(Math.max(...widths));
    widths[maxIdx] = Math.round((widths[maxIdx] + drift) * 10) / 10;
  }

  return widths;
}

/** Widest cell per column, measured with `measureTextWidth`. */
export function measureColumns(token: Tokens.Table): number[] {
  const colMaxLen = token.header.map((cell) => measureTextWidth(cell.text));
  for (const row of token.rows) {
    row.forEach((cell, i) => {
      if (i < colMaxLen.length) {
        colMaxLen[i] = Math.max(colMaxLen[i], measureTextWidth(cell.text));
      }
    });
  }
  return colMaxLen;
}

function tableColumnWidths(token: Tokens.Table): number[] {
  return computeColumnWidths(measureColumns(token));
}

function isSafeHref(href: string): boolean {
  return !/^\s*(?:javascript|vbscript|data)\s*:/i.test(href);
}

// ---------------------------------------------------------------------------
// Renderer overrides
// ---------------------------------------------------------------------------

/**
 * Renderer overrides for export HTML.
 *
 * marked binds these methods to its internal `Renderer`, so `this.parser`
 * is available for recursive rendering. marked 15 leaves escaping of code
 * span text to the renderer.
 */
const htmlRendererOverrides: RendererObject = {
  heading(this: Renderer, { tokens, depth }: Tokens.Heading): string {
    return `<h${depth}>${this.parser.parseInline(tokens)}</h${depth}>\n`;
  },

  code(this: Renderer, { text, lang }: Tokens.Code): string {
    const language = (lang ?? '').trim().split(/\s+/)[0];
    const classAttr = language ? ` class="language-${escapeHtml(language)}"` : '';
    return `<pre><code${classAttr}>${escapeHtml(text)}</code></pre>\n`;
  },

  blockquote(this: Renderer, { tokens }: Tokens.Blockquote): string {
    return `<blockquote>\n${this.parser.parse(tokens)}</blockquote>\n`;
  },

  hr(): string {
    return '<hr />\n';
  },

  list(this: Renderer, token: Tokens.List): string {
    const tag = token.ordered ? 'ol' : 'ul';
    const startAttr =
      token.ordered && typeof token.start === 'number' && token.start !== 1
        ? ` start="${String(token.start)}"`
        : '';

    const body = token.items.map((item) => this.listitem(item)).join('');
    return `<${tag}${startAttr}>\n${body}</${tag}>\n`;
  },

  listitem(this: Renderer, item: Tokens.ListItem): string {
    let content = '';
    for (const tok of item.tokens) {
      if (tok.type === 'paragraph' || tok.type === 'text') {
        const inline = (tok as Tokens.Paragraph | Tokens.Text).tokens;
        content += inline ? this.parser.parseInline(inline) : escapeHtml(tok.raw);
      } else if (tok.type === 'list') {
        content += this.list(tok as Tokens.List);
      } else if (tok.type !== 'checkbox') {
        content += this.parser.parse([tok]);
      }
    }

    // Reached only when the preprocessor did not already replace the box.
    if (item.task) {
      content = (item.checked ? '&#9745; ' : '&#9744; ') + content;
    }

    return `<li>${content}</li>\n`;
  },

  paragraph(this: Renderer, { tokens }: Tokens.Paragraph): string {
    return `<p>${this.parser.parseInline(tokens)}</p>\n`;
  },

  table(this: Renderer, token: Tokens.Table): string {
    const widths = tableColumnWidths(token);
    const colgroup = widths.map((w) => `<col style="width: ${w}%" />`).join('');

    const cell = (c: Tokens.TableCell): string => {
      const tag = c.header ? 'th' : 'td';
      const alignAttr = c.align ? ` align="${c.align}"` : '';
      return `<${tag}${alignAttr}>${this.parser.parseInline(c.tokens)}</${tag}>`;
    };

    const head = `<thead>\n<tr>${token.header.map(cell).join('')}</tr>\n</thead>\n`;
    const rows = token.rows.map((row) => `<tr>${row.map(cell).join('')}</tr>\n`).join('');
    const body = rows ? `<tbody>\n${rows}</tbody>\n` : '';

    return `<table>\n<colgroup>${colgroup}</colgroup>\n${head}${body}</table>\n`;
  },

  strong(this: Renderer, { tokens }: Tokens.Strong): string {
    return `<strong>${this.parser.parseInline(tokens)}</strong>`;
  },

  em(this: Renderer, { tokens }: Tokens.Em): string {
    return `<em>${this.parser.parseInline(tokens)}</em>`;
  },

  codespan({ text }: Tokens.Codespan): string {
    return `<code>${escapeHtml(text)}</code>`;
  },

  del(this: Renderer, { tokens }: Tokens.Del): string {
    return `<del>${this.parser.parseInline(tokens)}</del>`;
  },

  link(this: Renderer, { href, title, tokens }: Tokens.Link): string {
    const text = this.parser.parseInline(tokens);
    const titleAttr = title ? ` title="${escapeHtml(title)}"` : '';
    const safeHref = isSafeHref(href) ? escapeHtml(href) : '';
    const external = /^https?:\/\//i.test(href) ? ' target="_blank" rel="noopener noreferrer"' : '';
    return `<a href="${safeHref}"${titleAttr}${external}>${text}</a>`;
  },

  image({ href, title, text }: Tokens.Image): string {
    const altAttr = ` alt="${escapeHtml(text)}"`;
    const titleAttr = title ? ` title="${escapeHtml(title)}"` : '';
    const src = isSafeHref(href) ? escapeHtml(href) : '';
    return `<img src="${src}"${altAttr}${titleAttr} />`;
  },

  br(): string {
    return '<br />';
  },

  space(): string {
    return '';
  },

  html({ text }: Tokens.HTML | Tokens.Tag): string {
    // Raw HTML passes through; sanitizeHtml() runs on the final output.
    return text;
  },
};

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Class wrapper around a `Marked` instance configured with the export
 * renderer.
 *
 * @example
 * ```ts
 * const renderer = new HtmlRenderer();
 * renderer.render('# Hello **world**');
 * // => '<h1>Hello <strong>world</strong></h1>\n'
 * ```
 */
export class HtmlRenderer {
  private readonly marked: Marked;

  constructor(options: { gfm?: boolean; breaks?: boolean } = {}) {
    this.marked = new Marked({
      gfm: options.gfm ?? true,
      breaks: options.breaks ?? false,
      renderer: htmlRendererOverrides,
    });
  }

  /** Convert Markdown source to HTML. */
  render(markdown: string): string {
    return this.marked.parse(markdown, { async: false }) as string;
  }

  /** Render a pre-lexed token list to HTML. */
  renderTokens(tokens: Token[] | TokensList): string {
    return this.marked.parser(tokens) as string;
  }
}

const defaultRenderer = new HtmlRenderer();

/**
 * Render a pre-lexed token list to HTML.
 *
 * @param tokens - Tokens from {@link parseMarkdown} or `Lexer.lex()`.
 *
 * @example
 * ```ts
 * renderHtml(Lexer.lex('## Scope'));
 * // => '<h2>Scope</h2>\n'
 * ```
 */
export function renderHtml(tokens: Token[] | TokensList): string {
  return defaultRenderer.renderTokens(tokens);
}
