/**
 * Coordinate Service
 *
 * Maps terminal mouse points onto rendered line geometry.
 *
 * Coordinate systems:
 * - Mouse points are 0-based `{ x, y }` as reported by the terminal
 * - Geometry rows and column origins are 1-based terminal cells
 *
 * A point resolves to the geometry on its row whose cell span contains the
 * column, or the nearest geometry on that row. The cell boundary is chosen by
 * bias: `leading` takes the boundary before the hit cell, `trailing` the one
 * after it, `nearest` the closer edge. Points left of a line resolve to
 * boundary 0, points right of it to `cells.length`.
 */

import {
  compareAnchors,
  type AnchorBias,
  type Bounds,
  type LineGeometry,
  type NormalizedSelection,
  type RenderedLines,
  type ScreenPoint,
  type SelectionAnchor,
  type SelectionEndpoint,
  type SelectionRange,
} from '@leafline/contracts';
import { geometryWidth } from './line-geometry';

export const isSelectionAnchor = (endpoint: SelectionEndpoint): endpoint is SelectionAnchor =>
  'geometryKey' in endpoint;

/** Horizontal distance from `column` to the geometry's cell span. */
const distanceToGeometry = (geometry: LineGeometry, column: number): number => {
  const start = geometry.columnOrigin;
  const end = start + geometryWidth(geometry);
  if (column < start) return start - column;
  if (column >= end) return column - end + (end > start ? 1 : 0);
  return 0;
};

/** Cell boundary for a 0-based column offset within the line. */
export function cellIndexForColumn(geometry: LineGeometry, relativeColumn: number, bias: AnchorBias): number {
  if (relativeColumn < 0) return 0;

  const index = geometry.cells.findIndex(
    (cell) => relativeColumn >= cell.screenX && relativeColumn < cell.screenX + cell.displayWidth,
  );
  if (index === -1) return geometry.cells.length;

  const cell = geometry.cells[index];
  switch (bias) {
    case 'leading':
      return index;
    case 'trailing':
      return index + 1;
    case 'nearest':
      return (relativeColumn - cell.screenX) * 2 < cell.displayWidth ? index : index + 1;
  }
}

export class CoordinateService {
  /** 0-based mouse point to 1-based terminal cell. */
  mouseToTerminal(point: ScreenPoint): ScreenPoint {
    return { x: point.x + 1, y: point.y + 1 };
  }

  /** 1-based terminal cell to 0-based mouse point, floored at 0. */
  terminalToMouse(point: ScreenPoint): ScreenPoint {
    return { x: Math.max(point.x - 1, 0), y: Math.max(point.y - 1, 0) };
  }

  /** Whether a 1-based terminal cell lies inside `bounds`. */
  withinBounds(point: ScreenPoint, bounds: Bounds): boolean {
    return (
      point.x >= bounds.x &&
      point.x < bounds.x + bounds.width &&
      point.y >= bounds.y &&
      point.y < bounds.y + bounds.height
    );
  }

  /** Geometry under a 1-based terminal cell, or the nearest one on its row. */
  geometryAt(point: ScreenPoint, renderedLines: RenderedLines): LineGeometry | null {
    let best: LineGeometry | null = null;
    let bestDistance = Number.POSITIVE_INFINITY;

    for (const geometry of renderedLines.values()) {
      if (geometry.row !== point.y) continue;
      const distance = distanceToGeometry(geometry, point.x);
      if (distance < bestDistance || (distance === bestDistance && best && geometry.columnOrigin < best.columnOrigin)) {
        best = geometry;
        bestDistance = distance;
      }
    }

    return best;
  }

  anchorFromPoint(
    point: ScreenPoint,
    renderedLines: RenderedLines,
    bias: AnchorBias = 'nearest',
  ): SelectionAnchor | null {
    const terminal = this.mouseToTerminal(point);
    const geometry = this.geometryAt(terminal, renderedLines);
    if (!geometry) return null;

    return {
      pageId: geometry.pageId,
      columnId: geometry.columnId,
      geometryKey: geometry.key,
      lineOffset: geometry.lineOffset,
      cellIndex: cellIndexForColumn(geometry, terminal.x - geometry.columnOrigin, bias),
      row: geometry.row,
      columnOrigin: geometry.columnOrigin,
    };
  }

  /**
   * Resolves both endpoints to anchors and orders them. Raw points are first
   * resolved to their nearest boundary to find reading order; then the
   * earlier one takes `leading` bias and the later one `trailing`.
   */
  normalizeSelectionRange(range: SelectionRange, renderedLines: RenderedLines): NormalizedSelection | null {
    const startHit = this.resolveEndpoint(range.start, renderedLines, 'nearest');
    const endHit = this.resolveEndpoint(range.end, renderedLines, 'nearest');
    if (!startHit || !endHit) return null;

    const forward = compareAnchors(startHit, endHit) <= 0;
    const [first, second] = forward ? [range.start, range.end] : [range.end, range.start];
    const startAnchor = this.resolveEndpoint(first, renderedLines, 'leading');
    const endAnchor = this.resolveEndpoint(second, renderedLines, 'trailing');
    if (!startAnchor || !endAnchor) return null;

    return compareAnchors(startAnchor, endAnchor) <= 0
      ? { start: startAnchor, end: endAnchor }
      : { start: endAnchor, end: startAnchor };
  }

  private resolveEndpoint(
    endpoint: SelectionEndpoint,
    renderedLines: RenderedLines,
    bias: AnchorBias,
  ): SelectionAnchor | null {
    return isSelectionAnchor(endpoint) ? endpoint : this.anchorFromPoint(endpoint, renderedLines, bias);
  }
}
