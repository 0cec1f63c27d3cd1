/**
 * markdown-tools - Markdown heading editor and DOCX/HTML/TXT converter
 */

// Heading editor
export {
  editMarkdown,
  isEditAction,
  scanDocument,
  stripPrefix,
  detectPrefix,
  getNumberingStyle,
  toChineseNumeral,
  EDIT_ACTIONS,
  NUMBERING_STYLES,
  NUMBERING_STYLE_NAMES,
} from './editor/index';

export type {
  EditAction,
  EditOptions,
  EditResult,
  HeadingLevel,
  HeadingLine,
  LineRecord,
  NumberingStyle,
  NumberingStyleName,
  ScannedDocument,
} from './editor/index';

// High-level conversion API
export {
  convertMarkdown,
  convertToDocx,
  convertToHtml,
  convertToText,
  countWords,
  isOutputFormat,
} from './converter';

// Types
export { OUTPUT_FORMATS } from './types';
export type {
  ConvertOptions,
  ConvertResult,
  ConvertMetadata,
  DocxConvertResult,
  OutputFormat,
  TextConvertResult,
} from './types';

// Errors
export {
  ErrorCode,
  MarkdownToolsError,
  InvalidActionError,
  MissingStyleError,
  UnknownStyleError,
  UnsupportedFormatError,
  FileNotFoundError,
  FileAccessError,
  MalformedTemplateError,
  ConfigError,
  InvalidArgumentsError,
} from './errors';

// Core and DOCX module re-exports
export {
  parseMarkdown,
  renderHtml,
  HtmlRenderer,
  sanitizeHtml,
  htmlToPlainText,
  STYLE_TEMPLATES,
} from './core/index';

export { buildDocx, loadTemplate } from './docx/index';

export type {
  ParsedToken,
  ParserOptions,
  ParseResult,
  ParseMetadata,
  StyleTemplateName,
} from './core/index';
