/**
 * Markdown to DOCX block converter.
 *
 * Converts each top-level `marked` token into one or more Word body elements
 * (paragraphs and tables). Headings take the style resolved for their depth;
 * everything else maps to the closest Word construct.
 *
 * @module docx/block-converter
 */

import { BorderStyle, Paragraph, type ParagraphChild } from 'docx';
import type { Token, Tokens } from 'marked';
import { makeTextRun, parseInlineTokens } from './inline-parser';
import { buildTable } from './table-builder';
import type { OrderedListNumbering } from './numbering';
import type { DocxBlock, DocxStyleMap } from './types';

/** State shared by one conversion. */
export interface ConversionContext {
  styles: DocxStyleMap;
  numbering: OrderedListNumbering;
  /** Style forced onto plain paragraphs, set inside block quotes. */
  paragraphStyle?: string;
}

type ListMarker = { kind: 'bullet' } | { kind: 'ordered'; reference: string };

function clampDepth(depth: number): number {
  return Math.min(Math.max(depth, 1), 6);
}

function headingParagraph(token: Tokens.Heading, ctx: ConversionContext): Paragraph {
  return new Paragraph({
    style: ctx.styles.headings[clampDepth(token.depth) - 1],
    children: parseInlineTokens(token.tokens, ctx.styles),
  });
}

/** One paragraph per source line, so indentation survives. */
function codeParagraphs(token: Tokens.Code, ctx: ConversionContext): Paragraph[] {
  return token.text.split('\n').map(
    (line) =>
      new Paragraph({
        style: ctx.styles.code,
        children: [makeTextRun(line, { code: true })],
      }),
  );
}

function horizontalRule(): Paragraph {
  return new Paragraph({
    children: [],
    border: { bottom: { style: BorderStyle.SINGLE, size: 6, color: 'auto', space: 1 } },
  });
}

function taskMarker(item: Tokens.ListItem): ParagraphChild[] {
  if (!item.task) return [];
  return [makeTextRun(item.checked ? '☑ ' : '☐ ', {})];
}

function listItemParagraph(
  children: ParagraphChild[],
  marker: ListMarker,
  level: number,
  ctx: ConversionContext,
): Paragraph {
  const style = ctx.styles.listParagraph;
  if (marker.kind === 'bullet') {
    return new Paragraph({ children, style, bullet: { level } });
  }
  return new Paragraph({ children, style, numbering: { reference: marker.reference, level } });
}

/**
 * Flatten a (possibly nested) list. The first inline block of each item
 * carries the bullet or number; nested lists go one level deeper and other
 * blocks follow unmarked.
 */
function convertList(token: Tokens.List, ctx: ConversionContext, level: number): DocxBlock[] {
  const marker: ListMarker = token.ordered
    ? { kind: 'ordered', reference: ctx.numbering.register(typeof token.start === 'number' ? token.start : 1) }
    : { kind: 'bullet' };

  const blocks: DocxBlock[] = [];
  for (const item of token.items) {
    let marked = false;
    if (!item.tokens.some((child) => child.type === 'text' || child.type === 'paragraph')) {
      blocks.push(listItemParagraph(taskMarker(item), marker, level, ctx));
      marked = true;
    }
    for (const child of item.tokens) {
      if (child.type === 'list') {
        blocks.push(...convertList(child as Tokens.List, ctx, Math.min(level + 1, 5)));
      } else if (!marked && (child.type === 'text' || child.type === 'paragraph')) {
        const inline = (child as Tokens.Text | Tokens.Paragraph).tokens ?? [];
        blocks.push(
          listItemParagraph([...taskMarker(item), ...parseInlineTokens(inline, ctx.styles)], marker, level, ctx),
        );
        marked = true;
      } else {
        blocks.push(...convertToken(child, ctx));
      }
    }
  }
  return blocks;
}

/**
 * Convert a single `marked` token to zero or more body elements.
 *
 * @param token - A block-level token from `Lexer.lex()`.
 */
export function convertToken(token: Token, ctx: ConversionContext): DocxBlock[] {
  switch (token.type) {
    case 'heading':
      return [headingParagraph(token as Tokens.Heading, ctx)];

    case 'paragraph': {
      const t = token as Tokens.Paragraph;
      return [new Paragraph({ style: ctx.paragraphStyle, children: parseInlineTokens(t.tokens, ctx.styles) })];
    }

    case 'text': {
      const t = token as Tokens.Text;
      const children = t.tokens ? parseInlineTokens(t.tokens, ctx.styles) : [makeTextRun(t.text, {})];
      return [new Paragraph({ style: ctx.paragraphStyle, children })];
    }

    case 'code':
      return codeParagraphs(token as Tokens.Code, ctx);

    case 'blockquote': {
      const t = token as Tokens.Blockquote;
      return convertTokens(t.tokens, { ...ctx, paragraphStyle: ctx.styles.quote });
    }

    case 'list':
      return convertList(token as Tokens.List, ctx, 0);

    case 'table':
      return [buildTable(token as Tokens.Table, ctx.styles)];

    case 'hr':
      return [horizontalRule()];

    case 'html': {
      const t = token as Tokens.HTML;
      const text = t.text.trim();
      return text ? [new Paragraph({ children: [makeTextRun(text, {})] })] : [];
    }

    case 'space':
      return [];

    default:
      // Unknown token type -- skip.
      return [];
  }
}

/** Convert a list of block tokens, in order. */
export function convertTokens(tokens: Token[], ctx: ConversionContext): DocxBlock[] {
  const blocks: DocxBlock[] = [];
  for (const token of tokens) {
    blocks.push(...convertToken(token, ctx));
  }
  return blocks;
}
