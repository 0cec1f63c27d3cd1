import { clampLevel, downgradeHeadings, shiftLevels, upgradeHeadings } from '../../src/editor/levels';
import { scanDocument } from '../../src/editor/scanner';
import type { HeadingLine, LineRecord } from '../../src/editor/types';

function levels(lines: LineRecord[]): number[] {
  return lines.filter((l): l is HeadingLine => l.kind === 'heading').map((h) => h.level);
}

describe('clampLevel', () => {
  it.each([
    [0, 1],
    [-3, 1],
    [1, 1],
    [4, 4],
    [6, 6],
    [7, 6],
  ])('clamps %i to %i', (input, expected) => {
    expect(clampLevel(input)).toBe(expected);
  });
});

describe('shiftLevels', () => {
  const doc = scanDocument('# A\n## B\nbody\n###### F');

  it('promotes every heading, keeping level 1', () => {
    expect(levels(upgradeHeadings(doc.lines))).toEqual([1, 1, 5]);
  });

  it('demotes every heading, keeping level 6', () => {
    expect(levels(downgradeHeadings(doc.lines))).toEqual([2, 3, 6]);
  });

  it('returns content lines by identity', () => {
    const shifted = shiftLevels(doc.lines, 1);
    expect(shifted[2]).toBe(doc.lines[2]);
  });

  it('does not mutate the input records', () => {
    shiftLevels(doc.lines, -1);
    expect(levels(doc.lines)).toEqual([1, 2, 6]);
  });

  it('leaves numbering prefixes alone', () => {
    const [heading] = upgradeHeadings(scanDocument('## 1.2 Scope').lines);
    expect(heading).toMatchObject({ level: 1, text: '1.2 Scope' });
  });
});
