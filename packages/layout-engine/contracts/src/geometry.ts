import type { SelectionAnchor } from './index';

/** Deterministic key for one rendered line within a frame. */
export const geometryKeyFor = (pageId: number, columnId: number, row: number, columnOrigin: number): string =>
  `${pageId}:${columnId}:${row}:${columnOrigin}`;

/**
 * Reading-order tuple for an anchor: page, line offset, column, row, column
 * origin, then cell index.
 */
export const anchorTuple = (anchor: SelectionAnchor): number[] => [
  anchor.pageId,
  anchor.lineOffset,
  anchor.columnId,
  anchor.row,
  anchor.columnOrigin,
  anchor.cellIndex,
];

/** Lexicographic comparison of {@link anchorTuple}s. */
export function compareAnchors(a: SelectionAnchor, b: SelectionAnchor): number {
  const left = anchorTuple(a);
  const right = anchorTuple(b);
  for (let i = 0; i < left.length; i++) {
    if (left[i] !== right[i]) return left[i] - right[i];
  }
  return 0;
}
