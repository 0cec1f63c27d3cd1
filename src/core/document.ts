/**
 * Standalone HTML document wrapper for exported bodies.
 *
 * @module core/document
 */
import { escapeHtml } from './renderer';
import { buildStylesheet, getStyleTemplate } from './styles';

export interface HtmlDocumentOptions {
  title: string;
  /** Style template name; unknown names fall back to `minimal`. */
  theme?: string;
  /** Value for the `<html lang>` attribute. Omitted when not set. */
  lang?: string;
}

/**
 * Wrap body HTML in a complete page with an embedded stylesheet.
 *
 * The body is inserted as given, so it must already be sanitized.
 */
export function wrapHtmlDocument(body: string, options: HtmlDocumentOptions): string {
  const stylesheet = buildStylesheet(getStyleTemplate(options.theme ?? 'minimal'));
  const langAttr = options.lang ? ` lang="${escapeHtml(options.lang)}"` : '';

  return [
    '<!DOCTYPE html>',
    `<html${langAttr}>`,
    '<head>',
    '<meta charset="utf-8" />',
    '<meta name="viewport" content="width=device-width, initial-scale=1" />',
    `<title>${escapeHtml(options.title)}</title>`,
    '<style>',
    stylesheet,
    '</style>',
    '</head>',
    '<body>',
    `${body}</body>`,
    '</html>',
    '',
  ].join('\n');
}
