/**
 * Type definitions for the Markdown heading editor.
 *
 * @module editor/types
 */

/** Markdown heading depth (number of leading `#` characters). */
export type HeadingLevel = 1 | 2 | 3 | 4 | 5 | 6;

export const MIN_HEADING_LEVEL: HeadingLevel = 1;
export const MAX_HEADING_LEVEL: HeadingLevel = 6;

/** A line that matched the ATX heading marker syntax. */
export interface HeadingLine {
  kind: 'heading';
  /** Index of the line in the source document. */
  lineIndex: number;
  level: HeadingLevel;
  /** Whitespace between the marker and the title, re-emitted unchanged. */
  gap: string;
  /** Title as emitted after the marker, including any numbering prefix. */
  text: string;
  /** Title with any numbering prefix removed. */
  title: string;
  /** The numbering token detected at the start of {@link text}, e.g. `1.2` or `一、`. */
  numberPrefix?: string;
}

/** Any line that is not a heading. Re-emitted verbatim. */
export interface ContentLine {
  kind: 'content';
  lineIndex: number;
  raw: string;
}

export type LineRecord = HeadingLine | ContentLine;

/** Line terminator detected in the source. */
export type LineEnding = '\n' | '\r\n';

/** Result of scanning a document. */
export interface ScannedDocument {
  /** One record per source line, in order. */
  lines: LineRecord[];
  /** Terminator after each line but the last. */
  breaks: LineEnding[];
  /** CRLF only when every line break in the source is CRLF. */
  lineEnding: LineEnding;
}

/** Options for {@link scanDocument}. */
export interface ScanOptions {
  /**
   * Treat lines inside fenced code blocks as content.
   * @default false
   */
  ignoreFencedCode?: boolean;
}

/** Editor actions. */
export const EDIT_ACTIONS = ['upgrade', 'downgrade', 'remove_numbers', 'add_numbers'] as const;

export type EditAction = (typeof EDIT_ACTIONS)[number];

/** Options for {@link editMarkdown}. */
export interface EditOptions extends ScanOptions {
  action: string;
  /** Numbering style name; required for `add_numbers`. */
  style?: string;
}

/** Result of an edit. */
export interface EditResult {
  /** The transformed document. */
  text: string;
  action: EditAction;
  /** Number of heading lines found. */
  headingCount: number;
  /** Number of heading lines whose rendered form changed. */
  changedCount: number;
}
