/**
 * Core module barrel exports.
 *
 * Re-exports the Markdown pipeline shared by the HTML, TXT and DOCX outputs.
 *
 * @module core
 */

// Parser
export { parseMarkdown, walkTokens, flattenInlineText } from './parser';

// Renderer
export { renderHtml, HtmlRenderer, escapeHtml } from './renderer';

// Sanitizer
export { sanitizeHtml } from './sanitizer';

// Preprocessor
export { preprocessMarkdown } from './preprocessor';
export type { PreprocessOptions } from './preprocessor';

// Postprocessor
export { postprocessHtml, slugify } from './postprocessor';
export type { PostprocessOptions } from './postprocessor';

// Plain text
export { htmlToPlainText, decodeEntities } from './plain-text';

// Document wrapper
export { wrapHtmlDocument } from './document';
export type { HtmlDocumentOptions } from './document';

// Styles
export {
  getStyleTemplate,
  getElementStyle,
  buildStylesheet,
  isStyleTemplateName,
  STYLE_TEMPLATES,
  STYLE_TEMPLATE_NAMES,
} from './styles';
export type { StyleTemplate, StyleTemplateName } from './styles';

// Types
export type {
  OutlineEntry,
  ParsedToken,
  ParserOptions,
  ParseResult,
  ParseMetadata,
} from './types';
