/**
 * Heading scanner.
 *
 * Splits a Markdown document into one record per line, tagging ATX heading
 * lines with their level, title and numbering prefix. Everything else is
 * content and is carried through untouched.
 *
 * @module editor/scanner
 */

import { clampLevel } from './levels';
import { detectPrefix } from './prefixes';
import type {
  HeadingLevel,
  HeadingLine,
  LineEnding,
  LineRecord,
  ScannedDocument,
  ScanOptions,
} from './types';

/** `#` run of length 1-6, then at least one whitespace character. */
const HEADING_RE = /^(#{1,6})([ \t]+)(.*)$/;

/** Opening or closing code fence (``` or ~~~, up to three spaces of indent). */
const FENCE_RE = /^ {0,3}(`{3,}|~{3,})/;

/**
 * Build a heading record from its parts. Exposed for the transformers,
 * which produce new records rather than mutating scanned ones.
 */
export function makeHeading(
  lineIndex: number,
  level: HeadingLevel,
  gap: string,
  text: string,
): HeadingLine {
  const match = detectPrefix(text);
  const heading: HeadingLine = {
    kind: 'heading',
    lineIndex,
    level,
    gap,
    text,
    title: match ? match.title : text,
  };
  if (match) {
    heading.numberPrefix = match.prefix;
  }
  return heading;
}

/**
 * Parse a single line as a heading.
 *
 * @returns The heading record, or `null` if the line is not a heading.
 */
export function parseHeadingLine(line: string, lineIndex: number): HeadingLine | null {
  const m = HEADING_RE.exec(line);
  if (!m) return null;
  return makeHeading(lineIndex, clampLevel(m[1].length), m[2], m[3]);
}

/** Detect the document's line terminator. Mixed input is treated as LF. */
export function detectLineEnding(text: string): LineEnding {
  const crlf = (text.match(/\r\n/g) ?? []).length;
  const lf = (text.match(/\n/g) ?? []).length;
  return crlf > 0 && crlf === lf ? '\r\n' : '\n';
}

/** Lines of `text` and the terminator that followed each one. */
export interface SplitLines {
  lines: string[];
  /** `breaks[i]` ends `lines[i]`; one shorter than `lines`. */
  breaks: LineEnding[];
}

/** Split on LF or CRLF, remembering which terminator each line had. */
export function splitLines(text: string): SplitLines {
  const lines: string[] = [];
  const breaks: LineEnding[] = [];
  const re = /\r?\n/g;
  let start = 0;
  let m: RegExpExecArray | null;
  while ((m = re.exec(text)) !== null) {
    lines.push(text.slice(start, m.index));
    breaks.push(m[0] === '\r\n' ? '\r\n' : '\n');
    start = m.index + m[0].length;
  }
  lines.push(text.slice(start));
  return { lines, breaks };
}

/**
 * Scan a Markdown document into line records.
 *
 * A line is a heading iff it starts with 1-6 `#` characters followed by
 * whitespace. LF and CRLF may be mixed; each line keeps its own
 * terminator. With `ignoreFencedCode`, lines inside fenced code blocks are
 * always content.
 *
 * @example
 * ```ts
 * const doc = scanDocument('# 1 Intro\n\nText\n');
 * doc.lines[0]; // { kind: 'heading', level: 1, title: 'Intro', numberPrefix: '1', ... }
 * doc.lines[2]; // { kind: 'content', raw: 'Text', ... }
 * ```
 */
export function scanDocument(text: string, options: ScanOptions = {}): ScannedDocument {
  const { lines: rawLines, breaks } = splitLines(text);
  const lines: LineRecord[] = [];

  let openFence: string | null = null;

  rawLines.forEach((raw, lineIndex) => {
    if (options.ignoreFencedCode) {
      const fence = FENCE_RE.exec(raw);
      if (fence) {
        const marker = fence[1];
        if (openFence === null) {
          openFence = marker;
        } else if (marker[0] === openFence[0] && marker.length >= openFence.length) {
          openFence = null;
        }
        lines.push({ kind: 'content', lineIndex, raw });
        return;
      }
      if (openFence !== null) {
        lines.push({ kind: 'content', lineIndex, raw });
        return;
      }
    }

    const heading = parseHeadingLine(raw, lineIndex);
    lines.push(heading ?? { kind: 'content', lineIndex, raw });
  });

  return { lines, breaks, lineEnding: detectLineEnding(text) };
}

/** Collect the heading records of a scanned document. */
export function headingsOf(doc: ScannedDocument): HeadingLine[] {
  return doc.lines.filter((line): line is HeadingLine => line.kind === 'heading');
}
