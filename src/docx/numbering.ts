/**
 * Numbering definitions for ordered lists.
 *
 * Every ordered list gets its own reference so its count restarts and its
 * start number is honoured. Bullet lists use the document's built-in bullet
 * numbering and need no registration.
 *
 * @module docx/numbering
 */

import { AlignmentType, LevelFormat, type ILevelsOptions } from 'docx';

/** Levels 0-5, matching the six heading depths Markdown nests to in practice. */
const LEVEL_COUNT = 6;

/** Indent per nesting level, in twips. */
const INDENT_STEP = 360;

export interface OrderedListConfig {
  reference: string;
  levels: ILevelsOptions[];
}

/** Only the outermost level takes the list's start number. */
function levelsStartingAt(start: number): ILevelsOptions[] {
  return Array.from({ length: LEVEL_COUNT }, (_, level) => ({
    level,
    format: LevelFormat.DECIMAL,
    text: `%${level + 1}.`,
    alignment: AlignmentType.START,
    start: level === 0 ? start : 1,
    style: {
      paragraph: {
        indent: { left: INDENT_STEP * (level + 2), hanging: INDENT_STEP },
      },
    },
  }));
}

export class OrderedListNumbering {
  private readonly configs: OrderedListConfig[] = [];

  /** Register a new ordered list and return its numbering reference. */
  register(start = 1): string {
    const reference = `ordered-${this.configs.length + 1}`;
    this.configs.push({ reference, levels: levelsStartingAt(start) });
    return reference;
  }

  get size(): number {
    return this.configs.length;
  }

  toConfig(): OrderedListConfig[] {
    return [...this.configs];
  }
}
