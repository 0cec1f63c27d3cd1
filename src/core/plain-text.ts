/**
 * Plain-text extraction from rendered body HTML.
 *
 * The HTML is parsed with xmldom and the tree is walked in document order.
 * Block elements end with a blank line, list items and table rows with a
 * newline, and table cells are separated by tabs. Elements the sanitizer
 * blocks contribute no text.
 *
 * @module core/plain-text
 */

import { DOMParser } from '@xmldom/xmldom';
import { BLOCKED_ELEMENTS } from './sanitizer';

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
};

/** Decode the named and numeric entities the renderer and marked emit. */
export function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, body: string) => {
    if (body[0] === '#') {
      const hex = body[1] === 'x' || body[1] === 'X';
      const code = parseInt(body.slice(hex ? 2 : 1), hex ? 16 : 10);
      return Number.isNaN(code) ? match : String.fromCodePoint(code);
    }
    return NAMED_ENTITIES[body.toLowerCase()] ?? match;
  });
}

const ELEMENT_NODE = 1;
const TEXT_NODE = 3;
const CDATA_SECTION_NODE = 4;

const SKIPPED = new Set<string>(BLOCKED_ELEMENTS);

const BLOCKS = new Set([
  'p', 'h1', 'h2', 'h3', 'h4', 'h5', 'h6',
  'pre', 'blockquote', 'table', 'ul', 'ol', 'div', 'hr',
]);

/** Elements whose whitespace-only text is layout, not content. */
const CONTAINERS = new Set([
  'body', 'ul', 'ol', 'table', 'thead', 'tbody', 'tfoot', 'tr', 'colgroup', 'blockquote', 'div',
]);

interface WalkContext {
  /** Lower-cased name of the parent element. */
  parent: string;
  inPre: boolean;
  inListItem: boolean;
}

class TextWriter {
  private out = '';

  write(text: string): void {
    this.out += text;
  }

  atLineStart(): boolean {
    return !this.out || this.out.endsWith('\n');
  }

  /** End the current line unless it is already ended. */
  breakLine(): void {
    if (this.out && !this.out.endsWith('\n')) this.out += '\n';
  }

  endBlock(): void {
    this.breakLine();
    this.out += '\n';
  }

  toString(): string {
    return this.out;
  }
}

function isList(tag: string): boolean {
  return tag === 'ul' || tag === 'ol';
}

function writeChildren(node: Node, writer: TextWriter, context: WalkContext): void {
  const children = node.childNodes;
  for (let i = 0; i < children.length; i++) {
    writeNode(children[i], writer, context);
  }
}

function writeNode(node: Node, writer: TextWriter, context: WalkContext): void {
  if (node.nodeType === TEXT_NODE || node.nodeType === CDATA_SECTION_NODE) {
    const text = node.nodeValue ?? '';
    const layout = CONTAINERS.has(context.parent) || writer.atLineStart();
    if (!context.inPre && layout && !text.trim()) return;
    writer.write(text);
    return;
  }
  if (node.nodeType !== ELEMENT_NODE) return;

  const tag = node.nodeName.toLowerCase();
  if (SKIPPED.has(tag)) return;

  if (tag === 'br') writer.write('\n');
  // A nested list starts on the line after its item's text.
  if (isList(tag) && context.inListItem) writer.breakLine();

  writeChildren(node, writer, {
    parent: tag,
    inPre: context.inPre || tag === 'pre',
    inListItem: tag === 'li' || (context.inListItem && !isList(tag)),
  });

  if (tag === 'th' || tag === 'td') {
    writer.write('\t');
  } else if (tag === 'li' || tag === 'tr') {
    writer.breakLine();
  } else if (BLOCKS.has(tag) && !(isList(tag) && context.inListItem)) {
    // A nested list leaves the line break to its enclosing item.
    writer.endBlock();
  }
}

/**
 * Convert rendered body HTML into plain text.
 *
 * Parsing is lenient: xmldom recovers from malformed raw HTML and its
 * reports are not surfaced, since whatever text it recovers is still wanted.
 *
 * @returns Text ending in exactly one newline, or `''` when nothing visible
 *   remains.
 *
 * @example
 * ```ts
 * htmlToPlainText('<h1>Title</h1>\n<p>Hello <strong>world</strong></p>\n');
 * // => 'Title\n\nHello world\n'
 * ```
 */
export function htmlToPlainText(html: string): string {
  const ignore = (): void => undefined;
  const parser = new DOMParser({
    errorHandler: { warning: ignore, error: ignore, fatalError: ignore },
  });
  const doc = parser.parseFromString(`<body>${html}</body>`, 'text/html');
  if (!doc.documentElement) return '';

  const writer = new TextWriter();
  writeNode(doc.documentElement, writer, { parent: '', inPre: false, inListItem: false });

  const text = writer
    .toString()
    .replace(/\t+\n/g, '\n')
    .replace(/\n{3,}/g, '\n\n')
    .replace(/^\n+|\s+$/g, '');

  return text ? `${text}\n` : '';
}
