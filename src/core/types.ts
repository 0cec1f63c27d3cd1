/**
 * Core type definitions for the Markdown parsing pipeline.
 *
 * Wraps the relevant `marked` types so the converter, the HTML renderer and
 * the DOCX builder share one vocabulary.
 */
import type { Token } from 'marked';

/**
 * A parsed token from the marked lexer.
 *
 * Re-exported so downstream modules do not depend on the marked version
 * directly.
 */
export type ParsedToken = Token;

/**
 * Options that control how Markdown source is parsed.
 */
export interface ParserOptions {
  /**
   * Enable GitHub Flavored Markdown extensions (tables, strikethrough, etc.).
   * @default true
   */
  gfm?: boolean;

  /**
   * Treat single newlines inside paragraphs as hard line breaks.
   * @default false
   */
  breaks?: boolean;
}

/** A heading found while walking the token tree. */
export interface OutlineEntry {
  depth: number;
  /** Heading text with inline markup flattened. */
  text: string;
}

/**
 * Metadata extracted from the parsed token tree.
 */
export interface ParseMetadata {
  /** Whether the document contains any fenced or indented code blocks. */
  hasCodeBlocks: boolean;

  /** Deduplicated list of languages declared on fenced code blocks. */
  languages: string[];

  /** Whether the document contains any GFM tables. */
  hasTables: boolean;

  /** Whether the document contains any images. */
  hasImages: boolean;

  /** Top-level headings in document order. */
  outline: OutlineEntry[];
}

/**
 * The result of parsing a Markdown string.
 */
export interface ParseResult {
  /** The top-level token list produced by the marked lexer. */
  tokens: Token[];

  /** Metadata extracted by walking the token tree. */
  metadata: ParseMetadata;
}
