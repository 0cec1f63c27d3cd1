/**
 * Markdown parser module.
 *
 * Tokenizes Markdown source with the `marked` lexer and collects document
 * metadata (outline, code blocks, languages, tables, images) in a single
 * walk over the token tree.
 *
 * @module core/parser
 */
import { Lexer } from 'marked';
import type { Token, Tokens } from 'marked';
import type { OutlineEntry, ParserOptions, ParseResult, ParseMetadata } from './types';

/**
 * Walk a token tree depth-first, invoking `visitor` on every token.
 *
 * Handles the child-token shapes `marked` uses (`tokens`, `items`, table
 * `header` / `rows`) so callers need not know each token's structure.
 */
export function walkTokens(
  tokens: Token[],
  visitor: (token: Token) => void,
): void {
  for (const token of tokens) {
    visitor(token);

    if ('tokens' in token && Array.isArray(token.tokens)) {
      walkTokens(token.tokens, visitor);
    }

    if (token.type === 'list') {
      walkTokens((token as Tokens.List).items, visitor);
    }

    if (token.type === 'table') {
      const table = token as Tokens.Table;
      const cells = [...table.header, ...table.rows.flat()];
      for (const cell of cells) {
        walkTokens(cell.tokens, visitor);
      }
    }
  }
}

/**
 * Flatten inline tokens into their visible text.
 */
export function flattenInlineText(tokens: Token[]): string {
  let text = '';
  for (const t of tokens) {
    if ('tokens' in t && Array.isArray(t.tokens) && t.tokens.length > 0) {
      text += flattenInlineText(t.tokens);
    } else if (t.type === 'br') {
      text += ' ';
    } else if ('text' in t && typeof t.text === 'string') {
      text += t.text;
    }
  }
  return text;
}

function extractMetadata(tokens: Token[]): ParseMetadata {
  let hasCodeBlocks = false;
  const languageSet = new Set<string>();
  let hasTables = false;
  let hasImages = false;

  walkTokens(tokens, (token) => {
    switch (token.type) {
      case 'code': {
        hasCodeBlocks = true;
        const lang = (token as Tokens.Code).lang;
        if (lang) {
          languageSet.add(lang);
        }
        break;
      }
      case 'table':
        hasTables = true;
        break;
      case 'image':
        hasImages = true;
        break;
      default:
        break;
    }
  });

  // Headings nested in lists or quotes are not part of the outline.
  const outline: OutlineEntry[] = tokens
    .filter((t) => t.type === 'heading')
    .map((t) => {
      const heading = t as Tokens.Heading;
      return { depth: heading.depth, text: flattenInlineText(heading.tokens).trim() };
    });

  return {
    hasCodeBlocks,
    languages: Array.from(languageSet),
    hasTables,
    hasImages,
    outline,
  };
}

/**
 * Parse a Markdown string into a token tree with metadata.
 *
 * GFM is on by default so tables and strikethrough are recognised.
 *
 * @param markdown - Markdown source. Empty or whitespace-only input yields an
 *   empty token list with every metadata flag `false`.
 * @param options - Optional parser configuration.
 *
 * @example
 * ```ts
 * const result = parseMarkdown('# Hello\n\nWorld');
 * result.tokens[0].type;     // 'heading'
 * result.metadata.outline;   // [{ depth: 1, text: 'Hello' }]
 * ```
 */
export function parseMarkdown(
  markdown: string,
  options?: ParserOptions,
): ParseResult {
  if (markdown.trim().length === 0) {
    return {
      tokens: [],
      metadata: {
        hasCodeBlocks: false,
        languages: [],
        hasTables: false,
        hasImages: false,
        outline: [],
      },
    };
  }

  const gfm = options?.gfm ?? true;
  const breaks = options?.breaks ?? false;

  const tokens: Token[] = Lexer.lex(markdown, { gfm, breaks });

  return {
    tokens,
    metadata: extractMetadata(tokens),
  };
}
