import type { OutlineEntry } from './core/types';
import type { PreprocessOptions } from './core/preprocessor';

/** Output formats the converter can produce. */
export const OUTPUT_FORMATS = ['docx', 'html', 'txt'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

/**
 * Options for Markdown conversion.
 */
export interface ConvertOptions {
  /** Document title. Defaults to the first level-1/2 heading, then "Untitled". */
  title?: string;
  /** HTML style template: `minimal` (default), `enhanced` or `document`. */
  theme?: string;
  /** DOCX template whose styles replace the built-in ones. */
  template?: Buffer;
  /** Enable GitHub Flavored Markdown. @default true */
  gfm?: boolean;
  /** Preprocessor pass toggles. */
  preprocess?: PreprocessOptions;
}

/**
 * Metadata about the converted document.
 */
export interface ConvertMetadata {
  /** Document title (from options, else first heading, else "Untitled") */
  title: string;
  /** Approximate word count; each CJK character counts as one word */
  wordCount: number;
  /** Whether the document contains fenced or indented code blocks */
  hasCodeBlocks: boolean;
  /** Languages declared on fenced code blocks */
  languages: string[];
  /** Whether the document contains GFM tables */
  hasTables: boolean;
  /** Whether the document contains images */
  hasImages: boolean;
  /** Top-level headings in document order */
  outline: OutlineEntry[];
}

interface ConvertResultBase {
  metadata: ConvertMetadata;
  /** Recoverable problems met during conversion. */
  warnings: string[];
}

export interface TextConvertResult extends ConvertResultBase {
  format: 'html' | 'txt';
  content: string;
}

export interface DocxConvertResult extends ConvertResultBase {
  format: 'docx';
  content: Buffer;
}

/**
 * Result of a conversion: the output in the requested format plus metadata.
 */
export type ConvertResult = TextConvertResult | DocxConvertResult;
