/**
 * DOCX module barrel exports.
 *
 * @module docx
 */

export { buildDocx, DEFAULT_STYLE_MAP } from './builder';
export { convertToken, convertTokens } from './block-converter';
export type { ConversionContext } from './block-converter';
export { parseInlineTokens, makeTextRun, CODE_FONT } from './inline-parser';
export { buildTable, buildCellContent, calculateColumnWidths, TABLE_WIDTH_TWIPS } from './table-builder';
export { OrderedListNumbering } from './numbering';
export {
  loadTemplate,
  readStyleCatalog,
  readStylesXml,
  resolveStyleId,
  styleMapFromCatalog,
  STYLE_NAME_CANDIDATES,
  STYLES_PART_PATH,
} from './template';
export type {
  DocxBlock,
  DocxBuildOptions,
  DocxBuildResult,
  DocxStyleMap,
  HeadingStyleIds,
  LoadedTemplate,
  RunStyle,
  StyleCatalogEntry,
} from './types';
