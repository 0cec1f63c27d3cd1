import { Lexer, type Tokens } from 'marked';
import { Table } from 'docx';
import { TABLE_WIDTH_TWIPS, buildTable, calculateColumnWidths } from '../../src/docx/table-builder';
import { DEFAULT_STYLE_MAP } from '../../src/docx/builder';

function tableToken(md: string): Tokens.Table {
  const token = Lexer.lex(md).find((t): t is Tokens.Table => t.type === 'table');
  if (!token) throw new Error('no table in input');
  return token;
}

describe('calculateColumnWidths', () => {
  it('splits equal columns evenly across the text width', () => {
    const token = tableToken('| A | B |\n|---|---|\n| 1 | 2 |');
    expect(calculateColumnWidths(token)).toEqual([4513, 4513]);
  });

  it('scales to a custom total width', () => {
    const token = tableToken('| A | B |\n|---|---|\n| 1 | 2 |');
    expect(calculateColumnWidths(token, 1000)).toEqual([500, 500]);
  });

  it('gives wider content more room', () => {
    const token = tableToken('| A | Description |\n|---|---|\n| 1 | a much longer cell |');
    const [first, second] = calculateColumnWidths(token);
    expect(first).toBeLessThan(second);
    expect(first + second).toBeGreaterThanOrEqual(TABLE_WIDTH_TWIPS - 1);
  });
});

describe('buildTable', () => {
  it('returns a Word table', () => {
    const token = tableToken('| A |\n|---|\n| 1 |');
    expect(buildTable(token, DEFAULT_STYLE_MAP)).toBeInstanceOf(Table);
  });
});
