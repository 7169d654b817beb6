/**
 * Line Drawer
 *
 * Writes one display line into a bounded region of the terminal surface and
 * records its geometry for the frame being built. Image placeholder rows are
 * recorded with no cells so selection steps over them.
 */

import {
  debugLog,
  isDisplayLine,
  type Bounds,
  type LineGeometry,
  type PageLine,
  type Surface,
  type TextMetrics,
} from '@leafline/contracts';
import { buildLineGeometry } from '@leafline/layout-bridge';
import { terminalTextMetrics } from '@leafline/measuring-terminal';
import type { RenderedLinesBuffer } from './rendered-lines-buffer';
import { composeLine, SGR_RESET } from './styles';

export type DrawLineRequest = {
  surface: Surface;
  bounds: Bounds;
  line: PageLine;
  /** Absolute 1-based terminal row. */
  row: number;
  /** Absolute 1-based terminal column of the line's first cell. */
  col: number;
  width: number;
  pageId: number;
  columnId: number;
  lineOffset: number;
};

export type DrawColumnRequest = Omit<DrawLineRequest, 'line' | 'row' | 'lineOffset'> & {
  lines: readonly PageLine[];
  /** Row of the first line. */
  row: number;
  /** Line offset of the first line within its chapter. */
  startOffset: number;
};

const isImagePlaceholder = (line: PageLine): boolean => isDisplayLine(line) && line.metadata.imageRender !== undefined;

/** Appends a reset when clipping cut a styled run before its reset. */
const closeOpenStyles = (text: string): string => {
  const sequences = text.match(/\u001b\[[0-9;]*m/g);
  const last = sequences ? sequences[sequences.length - 1] : undefined;
  return last !== undefined && last !== SGR_RESET ? text + SGR_RESET : text;
};

export class LineDrawer {
  constructor(
    private readonly buffer: RenderedLinesBuffer,
    private readonly metrics: TextMetrics = terminalTextMetrics,
  ) {}

  drawLine(request: DrawLineRequest): LineGeometry | null {
    const { bounds, row, col } = request;
    if (!this.inside(bounds, row, col)) {
      debugLog('verbose', '[LineDrawer] Line outside bounds', { row, col, bounds });
      return null;
    }

    const position = {
      pageId: request.pageId,
      columnId: request.columnId,
      row,
      columnOrigin: col,
      lineOffset: request.lineOffset,
    };

    if (isImagePlaceholder(request.line)) {
      const geometry = buildLineGeometry({ ...position, plainText: '', styledText: '' }, this.metrics);
      this.buffer.record(geometry);
      return geometry;
    }

    const maxWidth = Math.min(Math.floor(request.width), bounds.x + bounds.width - col);
    const composed = composeLine(request.line, maxWidth, this.metrics);
    const clipped = closeOpenStyles(this.metrics.truncateTo(composed.styledText, maxWidth, { startColumn: col - 1 }));
    const plainText = this.metrics.stripAnsi(clipped);

    const geometry = buildLineGeometry({ ...position, plainText, styledText: clipped }, this.metrics);
    this.buffer.record(geometry);
    if (clipped !== '') request.surface.write(bounds, row, col, clipped);
    return geometry;
  }

  /** Draws consecutive lines from `row` down, stopping at the bottom of `bounds`. */
  drawColumn(request: DrawColumnRequest): LineGeometry[] {
    const { lines, startOffset, ...rest } = request;
    const drawn: LineGeometry[] = [];
    lines.forEach((line, index) => {
      const row = request.row + index;
      if (row >= request.bounds.y + request.bounds.height) return;
      const geometry = this.drawLine({ ...rest, line, row, lineOffset: startOffset + index });
      if (geometry) drawn.push(geometry);
    });
    return drawn;
  }

  private inside(bounds: Bounds, row: number, col: number): boolean {
    return row >= bounds.y && row < bounds.y + bounds.height && col >= bounds.x && col < bounds.x + bounds.width;
  }
}
