import type { LineGeometry, RenderedLines, SelectionRange } from '@leafline/contracts';
import { CoordinateService } from './coordinate-service';
import { compareGeometries } from './line-geometry';

const charIndexForCell = (geometry: LineGeometry, cellIndex: number): number => {
  const { cells } = geometry;
  if (cells.length === 0 || cellIndex <= 0) return 0;
  if (cellIndex >= cells.length) return geometry.plainText.length;
  return cells[cellIndex].charStart;
};

/** Extracts selected text from the current frame's rendered lines. */
export class SelectionService {
  constructor(private readonly coordinates: CoordinateService = new CoordinateService()) {}

  /**
   * Text between the selection's anchors in reading order, one line per
   * geometry. Interior lines are taken whole; zero-width lines (image
   * placeholders) are skipped. Empty when either anchor's line is not on
   * screen.
   */
  extractText(range: SelectionRange | null, renderedLines: RenderedLines): string {
    if (!range || renderedLines.size === 0) return '';

    const normalized = this.coordinates.normalizeSelectionRange(range, renderedLines);
    if (!normalized) return '';
    const { start, end } = normalized;

    const ordered = [...renderedLines.values()].sort(compareGeometries);
    const startIndex = ordered.findIndex((geometry) => geometry.key === start.geometryKey);
    const endIndex = ordered.findIndex((geometry) => geometry.key === end.geometryKey);
    if (startIndex === -1 || endIndex === -1) return '';

    const lines: string[] = [];
    for (const geometry of ordered.slice(startIndex, endIndex + 1)) {
      if (geometry.cells.length === 0) continue;

      const startCell = geometry.key === start.geometryKey ? start.cellIndex : 0;
      const endCell = geometry.key === end.geometryKey ? end.cellIndex : geometry.cells.length;
      if (endCell < startCell) continue;

      lines.push(geometry.plainText.slice(charIndexForCell(geometry, startCell), charIndexForCell(geometry, endCell)));
    }

    return lines.join('\n');
  }
}
