/**
 * Inline token parser for DOCX paragraphs.
 *
 * Shared by the block converter and the table builder:
 *   block-converter.ts  -->  inline-parser.ts  <--  table-builder.ts
 *
 * @module docx/inline-parser
 */

import { ExternalHyperlink, TextRun, type ParagraphChild } from 'docx';
import type { Token, Tokens } from 'marked';
import { decodeEntities } from '../core/plain-text';
import type { DocxStyleMap, RunStyle } from './types';

export const CODE_FONT = 'Courier New';

/** Create a run carrying the inherited formatting. */
export function makeTextRun(text: string, style: RunStyle): TextRun {
  return new TextRun({
    text,
    bold: style.bold,
    italics: style.italics,
    strike: style.strike,
    font: style.code ? CODE_FONT : undefined,
  });
}

/**
 * Convert inline `marked` tokens into paragraph children.
 *
 * Nested styles merge into the parent style, so `**_x_**` yields one run that
 * is both bold and italic.
 */
export function parseInlineTokens(
  tokens: Token[],
  styles: DocxStyleMap,
  parentStyle: RunStyle = {},
): ParagraphChild[] {
  const children: ParagraphChild[] = [];

  for (const token of tokens) {
    switch (token.type) {
      case 'text': {
        const t = token as Tokens.Text;
        if (t.tokens && t.tokens.length > 0) {
          children.push(...parseInlineTokens(t.tokens, styles, parentStyle));
        } else {
          children.push(makeTextRun(decodeEntities(t.text), parentStyle));
        }
        break;
      }

      case 'strong': {
        const t = token as Tokens.Strong;
        children.push(...parseInlineTokens(t.tokens, styles, { ...parentStyle, bold: true }));
        break;
      }

      case 'em': {
        const t = token as Tokens.Em;
        children.push(...parseInlineTokens(t.tokens, styles, { ...parentStyle, italics: true }));
        break;
      }

      case 'del': {
        const t = token as Tokens.Del;
        children.push(...parseInlineTokens(t.tokens, styles, { ...parentStyle, strike: true }));
        break;
      }

      case 'codespan': {
        const t = token as Tokens.Codespan;
        children.push(makeTextRun(decodeEntities(t.text), { ...parentStyle, code: true }));
        break;
      }

      case 'link': {
        const t = token as Tokens.Link;
        children.push(makeHyperlink(t, styles, parentStyle));
        break;
      }

      case 'image': {
        const t = token as Tokens.Image;
        children.push(makeTextRun(`[${t.text}]`, parentStyle));
        break;
      }

      case 'br': {
        children.push(new TextRun({ break: 1 }));
        break;
      }

      case 'escape': {
        const t = token as Tokens.Escape;
        children.push(makeTextRun(decodeEntities(t.text), parentStyle));
        break;
      }

      default: {
        // Inline HTML and unknown extensions keep their source text.
        const raw = token.raw;
        if (raw) {
          children.push(makeTextRun(raw, parentStyle));
        }
        break;
      }
    }
  }

  return children;
}

/**
 * Build a hyperlink whose runs use the hyperlink character style, or blue
 * underlined text when no such style is available.
 */
function makeHyperlink(token: Tokens.Link, styles: DocxStyleMap, parentStyle: RunStyle): ExternalHyperlink {
  const text = flattenLinkText(token);
  const run = new TextRun({
    text,
    bold: parentStyle.bold,
    italics: parentStyle.italics,
    strike: parentStyle.strike,
    style: styles.hyperlink,
    color: styles.hyperlink ? undefined : '0563C1',
    underline: styles.hyperlink ? undefined : {},
  });
  return new ExternalHyperlink({ link: token.href, children: [run] });
}

function flattenLinkText(token: Tokens.Link): string {
  let text = '';
  for (const t of token.tokens) {
    if ('text' in t && typeof t.text === 'string') text += t.text;
  }
  return decodeEntities(text || token.text);
}
