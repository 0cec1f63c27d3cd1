/**
 * Document reassembler.
 *
 * @module editor/reassembler
 */

import type { HeadingLine, LineEnding, LineRecord } from './types';

/** Render a heading record back to its Markdown line. */
export function renderHeading(heading: HeadingLine): string {
  return `${'#'.repeat(heading.level)}${heading.gap}${heading.text}`;
}

/** Render any line record back to its Markdown line. */
export function renderLine(line: LineRecord): string {
  return line.kind === 'heading' ? renderHeading(line) : line.raw;
}

/**
 * Join line records back into a document.
 *
 * Records are emitted in `lineIndex` order. `breaks` is either one
 * terminator for every line or the scanner's per-line list, indexed by
 * `lineIndex`. The scanner keeps a trailing empty record when the input ends
 * with a newline, so the output ends with one exactly when the input did.
 */
export function reassemble(
  lines: readonly LineRecord[],
  breaks: LineEnding | readonly LineEnding[],
): string {
  const sorted = [...lines].sort((a, b) => a.lineIndex - b.lineIndex);
  let out = '';
  sorted.forEach((line, i) => {
    if (i > 0) {
      const prev = sorted[i - 1].lineIndex;
      out += typeof breaks === 'string' ? breaks : (breaks[prev] ?? '\n');
    }
    out += renderLine(line);
  });
  return out;
}
