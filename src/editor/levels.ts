/**
 * Heading level transformer.
 *
 * Shifts every heading one level up or down. Levels are clamped to 1-6;
 * numbering prefixes are left as they are.
 *
 * @module editor/levels
 */

import type { HeadingLevel, LineRecord } from './types';
import { MAX_HEADING_LEVEL, MIN_HEADING_LEVEL } from './types';

const LEVELS: readonly HeadingLevel[] = [1, 2, 3, 4, 5, 6];

/** Clamp an arbitrary integer to a valid heading level. */
export function clampLevel(level: number): HeadingLevel {
  const bounded = Math.min(Math.max(Math.trunc(level), MIN_HEADING_LEVEL), MAX_HEADING_LEVEL);
  return LEVELS[bounded - 1];
}

/** Direction of a level shift: `-1` promotes (h2 → h1), `1` demotes (h1 → h2). */
export type LevelShift = -1 | 1;

/**
 * Shift every heading by `delta` levels, clamping at the bounds.
 *
 * Content lines are returned as-is; heading records are replaced, never
 * mutated.
 */
export function shiftLevels(lines: readonly LineRecord[], delta: LevelShift): LineRecord[] {
  return lines.map((line) =>
    line.kind === 'heading' ? { ...line, level: clampLevel(line.level + delta) } : line,
  );
}

/** Promote every heading by one level; level 1 stays level 1. */
export function upgradeHeadings(lines: readonly LineRecord[]): LineRecord[] {
  return shiftLevels(lines, -1);
}

/** Demote every heading by one level; level 6 stays level 6. */
export function downgradeHeadings(lines: readonly LineRecord[]): LineRecord[] {
  return shiftLevels(lines, 1);
}
