/**
 * Heading numbering engine.
 *
 * `removeNumbers` strips recognised prefixes; `addNumbers` renumbers every
 * heading in document order with a numbering style. Both return new line
 * records and leave content lines untouched.
 *
 * @module editor/numbering
 */

import { makeHeading } from './scanner';
import type { NumberingStyle } from './styles';
import type { HeadingLevel, HeadingLine, LineRecord } from './types';
import { MAX_HEADING_LEVEL } from './types';

/**
 * Per-level counters for one numbering pass.
 *
 * Advancing a level resets every deeper level to zero. Skipped levels are
 * never back-filled, so `# A` followed by `### B` counts as `1` and `1.0.1`.
 */
export class NumberingState {
  private readonly counters: number[] = new Array<number>(MAX_HEADING_LEVEL).fill(0);

  /** Count a heading at `level` and return a snapshot of all counters. */
  advance(level: HeadingLevel): readonly number[] {
    for (let i = level; i < this.counters.length; i++) {
      this.counters[i] = 0;
    }
    this.counters[level - 1] += 1;
    return [...this.counters];
  }
}

/** Join a prefix and a title with a single space; an empty title gets the bare prefix. */
function withPrefix(prefix: string, title: string): string {
  return title.length > 0 ? `${prefix} ${title}` : prefix;
}

function retitle(heading: HeadingLine, text: string): HeadingLine {
  return makeHeading(heading.lineIndex, heading.level, heading.gap, text);
}

/** Remove the numbering prefix from every heading. */
export function removeNumbers(lines: readonly LineRecord[]): LineRecord[] {
  return lines.map((line) =>
    line.kind === 'heading' && line.numberPrefix !== undefined
      ? retitle(line, line.title)
      : line,
  );
}

/**
 * Number every heading with `style`.
 *
 * Existing prefixes are stripped first, so applying this twice gives the
 * same text as applying it once.
 */
export function addNumbers(lines: readonly LineRecord[], style: NumberingStyle): LineRecord[] {
  const state = new NumberingState();
  return lines.map((line) => {
    if (line.kind !== 'heading') return line;
    const counters = state.advance(line.level);
    const prefix = style.render(line.level, counters);
    return retitle(line, withPrefix(prefix, line.title));
  });
}
