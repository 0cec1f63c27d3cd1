import type {
  ConvertMetadata,
  ConvertOptions,
  ConvertResult,
  DocxConvertResult,
  OutputFormat,
  TextConvertResult,
} from './types';
import { OUTPUT_FORMATS } from './types';
import type { ParseResult } from './core/types';
import { parseMarkdown } from './core/parser';
import { renderHtml } from './core/renderer';
import { sanitizeHtml } from './core/sanitizer';
import { preprocessMarkdown } from './core/preprocessor';
import { postprocessHtml } from './core/postprocessor';
import { htmlToPlainText } from './core/plain-text';
import { wrapHtmlDocument } from './core/document';
import { buildDocx } from './docx/builder';
import { UnsupportedFormatError } from './errors';

/**
 * Count words in a plain text string.
 *
 * Latin words are split on whitespace; each CJK character counts as one
 * word.
 *
 * @example
 * ```ts
 * countWords('Hello world 你好'); // => 4
 * ```
 */
export function countWords(text: string): number {
  if (!text.trim()) {
    return 0;
  }

  const cjkRegex = /[\u3040-\u30ff\u3400-\u9fff\uf900-\ufaff\u{20000}-\u{2fa1f}]/gu;
  const cjkMatches = text.match(cjkRegex);
  const cjkCount = cjkMatches ? cjkMatches.length : 0;

  const withoutCjk = text.replace(cjkRegex, ' ');
  const latinWords = withoutCjk.split(/\s+/).filter((w) => w.length > 0);

  return latinWords.length + cjkCount;
}

/**
 * Pick the document title: the first level-1 or level-2 heading of the
 * outline.
 */
export function extractTitle(parsed: ParseResult): string | undefined {
  const heading = parsed.metadata.outline.find((entry) => entry.depth <= 2 && entry.text);
  return heading?.text;
}

export function isOutputFormat(format: string): format is OutputFormat {
  return OUTPUT_FORMATS.some((candidate) => candidate === format);
}

interface RenderedBody {
  parsed: ParseResult;
  /** Body HTML as rendered, before sanitizing. */
  html: string;
  /** Plain text of the body. Blocked elements contribute nothing. */
  text: string;
}

/** Preprocess, parse, render and extract the plain text. */
function renderBody(markdown: string, options: ConvertOptions): RenderedBody {
  const preprocessed = preprocessMarkdown(markdown, options.preprocess);
  const parsed = parseMarkdown(preprocessed, { gfm: options.gfm });
  const html = renderHtml(parsed.tokens);
  return { parsed, html, text: htmlToPlainText(html) };
}

function buildMetadata(parsed: ParseResult, plainText: string, options: ConvertOptions): ConvertMetadata {
  return {
    title: options.title ?? extractTitle(parsed) ?? 'Untitled',
    wordCount: countWords(plainText),
    hasCodeBlocks: parsed.metadata.hasCodeBlocks,
    languages: parsed.metadata.languages,
    hasTables: parsed.metadata.hasTables,
    hasImages: parsed.metadata.hasImages,
    outline: parsed.metadata.outline,
  };
}

/**
 * Convert Markdown to a standalone HTML page.
 *
 * Pipeline:
 * 1. Preprocess (math, checkboxes, footnotes, spacing placeholders)
 * 2. Parse into tokens (via `marked` lexer)
 * 3. Render body HTML
 * 4. Sanitize (strip scripts, event handlers, script-capable URLs)
 * 5. Postprocess (table wrappers, heading anchors)
 * 6. Wrap in a document with the theme's stylesheet
 *
 * @example
 * ```ts
 * const result = convertToHtml('# Hello\n\nWorld');
 * result.metadata.title; // 'Hello'
 * ```
 */
export function convertToHtml(markdown: string, options: ConvertOptions = {}): TextConvertResult {
  const { parsed, html, text } = renderBody(markdown, options);
  const metadata = buildMetadata(parsed, text, options);
  const content = wrapHtmlDocument(postprocessHtml(sanitizeHtml(html)), {
    title: metadata.title,
    theme: options.theme,
  });
  return { format: 'html', content, metadata, warnings: [] };
}

/**
 * Convert Markdown to plain text.
 *
 * @example
 * ```ts
 * convertToText('# Title\n\nHello **world**').content;
 * // => 'Title\n\nHello world\n'
 * ```
 */
export function convertToText(markdown: string, options: ConvertOptions = {}): TextConvertResult {
  const { parsed, text } = renderBody(markdown, options);
  return { format: 'txt', content: text, metadata: buildMetadata(parsed, text, options), warnings: [] };
}

/**
 * Convert Markdown to a `.docx` buffer.
 *
 * Heading depth N maps to the paragraph style "Heading N" (or the template's
 * equivalent). A template that cannot be used yields a warning, not an error.
 */
export async function convertToDocx(markdown: string, options: ConvertOptions = {}): Promise<DocxConvertResult> {
  const { parsed, text } = renderBody(markdown, options);
  const metadata = buildMetadata(parsed, text, options);
  const { buffer, warnings } = await buildDocx(parsed.tokens, {
    title: metadata.title,
    template: options.template,
  });
  return { format: 'docx', content: buffer, metadata, warnings };
}

/**
 * Convert Markdown to the named format.
 *
 * @throws {UnsupportedFormatError} When `format` is not `docx`, `html` or
 *   `txt`. Raised before any parsing.
 */
export async function convertMarkdown(
  markdown: string,
  format: string,
  options: ConvertOptions = {},
): Promise<ConvertResult> {
  if (!isOutputFormat(format)) {
    throw new UnsupportedFormatError(format, OUTPUT_FORMATS);
  }

  switch (format) {
    case 'docx':
      return convertToDocx(markdown, options);
    case 'html':
      return convertToHtml(markdown, options);
    case 'txt':
      return convertToText(markdown, options);
  }
}
