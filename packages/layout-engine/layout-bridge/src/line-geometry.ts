import { geometryKeyFor, type LineGeometry, type TextMetrics } from '@leafline/contracts';

export type LineGeometryInput = {
  pageId: number;
  columnId: number;
  /** 1-based terminal row. */
  row: number;
  /** 1-based terminal column of the line's first cell. */
  columnOrigin: number;
  lineOffset: number;
  plainText: string;
  styledText: string;
};

/**
 * Builds the geometry record for a rendered line. Plain text is stored
 * tab-expanded so cell character offsets index into it.
 */
export function buildLineGeometry(input: LineGeometryInput, metrics: TextMetrics): LineGeometry {
  const cells = metrics.cellDataFor(input.plainText);
  return {
    key: geometryKeyFor(input.pageId, input.columnId, input.row, input.columnOrigin),
    pageId: input.pageId,
    columnId: input.columnId,
    row: input.row,
    columnOrigin: input.columnOrigin,
    lineOffset: input.lineOffset,
    plainText: cells.map((cell) => cell.cluster).join(''),
    styledText: input.styledText,
    cells,
  };
}

/** Cells spanned by the line; 0 for image placeholders and blank lines. */
export const geometryWidth = (geometry: LineGeometry): number => {
  const last = geometry.cells[geometry.cells.length - 1];
  return last ? last.screenX + last.displayWidth : 0;
};

/** Reading order: page, line offset, column, row, column origin. */
export function compareGeometries(a: LineGeometry, b: LineGeometry): number {
  return (
    a.pageId - b.pageId ||
    a.lineOffset - b.lineOffset ||
    a.columnId - b.columnId ||
    a.row - b.row ||
    a.columnOrigin - b.columnOrigin
  );
}
