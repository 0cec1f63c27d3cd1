/**
 * Table builder for DOCX output.
 *
 * Maps a GFM table token to a Word table spanning the text width. The first
 * row is a repeating header row with bold text; column widths follow the
 * same content-based estimate the HTML renderer uses for its `<colgroup>`.
 *
 * @module docx/table-builder
 */

import {
  AlignmentType,
  Paragraph,
  Table,
  TableCell,
  TableRow,
  WidthType,
} from 'docx';
import type { Tokens } from 'marked';
import { computeColumnWidths, measureColumns } from '../core/renderer';
import { parseInlineTokens } from './inline-parser';
import type { DocxStyleMap } from './types';

/** Usable text width of an A4 page with default margins, in twips. */
export const TABLE_WIDTH_TWIPS = 9026;

type CellAlignment = Tokens.TableCell['align'];

function toAlignment(align: CellAlignment): (typeof AlignmentType)[keyof typeof AlignmentType] | undefined {
  switch (align) {
    case 'center':
      return AlignmentType.CENTER;
    case 'right':
      return AlignmentType.RIGHT;
    case 'left':
      return AlignmentType.LEFT;
    default:
      return undefined;
  }
}

/**
 * Column widths in twips, summing to `totalWidth` up to rounding.
 */
export function calculateColumnWidths(token: Tokens.Table, totalWidth: number = TABLE_WIDTH_TWIPS): number[] {
  return computeColumnWidths(measureColumns(token)).map((pct) => Math.round((pct / 100) * totalWidth));
}

/** Build the single paragraph held by one cell. */
export function buildCellContent(cell: Tokens.TableCell, styles: DocxStyleMap, header: boolean): Paragraph {
  return new Paragraph({
    children: parseInlineTokens(cell.tokens, styles, header ? { bold: true } : {}),
    style: header ? styles.tableHeader : styles.tableContents,
    alignment: toAlignment(cell.align),
  });
}

/**
 * Convert a `marked` table token into a Word table.
 */
export function buildTable(token: Tokens.Table, styles: DocxStyleMap): Table {
  const headerRow = new TableRow({
    tableHeader: true,
    children: token.header.map(
      (cell) => new TableCell({ children: [buildCellContent(cell, styles, true)] }),
    ),
  });

  const bodyRows = token.rows.map(
    (row) =>
      new TableRow({
        children: row.map((cell) => new TableCell({ children: [buildCellContent(cell, styles, false)] })),
      }),
  );

  return new Table({
    rows: [headerRow, ...bodyRows],
    width: { size: 100, type: WidthType.PERCENTAGE },
    columnWidths: calculateColumnWidths(token),
  });
}
