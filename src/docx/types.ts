/**
 * Type definitions for the DOCX builder.
 *
 * @module docx/types
 */
import type { Paragraph, Table } from 'docx';

/** Style ids for the six heading depths, index 0 being depth 1. */
export type HeadingStyleIds = readonly [string, string, string, string, string, string];

/**
 * Paragraph and character style ids the block converter applies.
 *
 * Ids come either from the built-in styles or, with a template, from the
 * template's `word/styles.xml`. An absent id means "no style": the converter
 * falls back to direct run formatting.
 */
export interface DocxStyleMap {
  headings: HeadingStyleIds;
  code?: string;
  quote?: string;
  listParagraph?: string;
  tableHeader?: string;
  tableContents?: string;
  /** Character style for hyperlink runs. */
  hyperlink?: string;
}

/** Top-level body element produced by the block converter. */
export type DocxBlock = Paragraph | Table;

/** Run formatting inherited from enclosing inline tokens. */
export interface RunStyle {
  bold?: boolean;
  italics?: boolean;
  strike?: boolean;
  code?: boolean;
}

/** A style entry read from a `word/styles.xml` part. */
export interface StyleCatalogEntry {
  id: string;
  name: string;
  /** `paragraph`, `character`, `table` or `numbering`. */
  type: string;
}

/** A usable template: its styles part plus the ids resolved from it. */
export interface LoadedTemplate {
  stylesXml: string;
  styles: DocxStyleMap;
}

export interface DocxBuildOptions {
  /** Core-properties title of the generated document. */
  title?: string;
  /** Template `.docx` whose styles replace the built-in ones. */
  template?: Buffer;
}

export interface DocxBuildResult {
  buffer: Buffer;
  /** Recoverable problems, such as a template that could not be used. */
  warnings: string[];
}
