import {
  LINE_SPACING_MULTIPLIERS,
  LayoutError,
  type LayoutConfig,
  type LineSpacing,
  type ViewMode,
} from '@leafline/contracts';

/** Terminal rows reserved for the header and footer. */
export const CHROME_ROWS = 3;
export const SPLIT_OUTER_MARGIN = 4;
export const SPLIT_GUTTER = 4;
export const MIN_SPLIT_CONTENT_WIDTH = 40;
export const MIN_SPLIT_COLUMN_WIDTH = 20;
export const MIN_SINGLE_COLUMN_WIDTH = 30;
export const MAX_SINGLE_COLUMN_WIDTH = 120;
export const SINGLE_COLUMN_RATIO = 0.9;

export type LayoutMetrics = {
  columnWidth: number;
  contentHeight: number;
  linesPerPage: number;
};

/** Throws `INVALID_GEOMETRY` unless both dimensions are positive finite numbers. */
export function assertValidGeometry(width: number, height: number): void {
  if (!Number.isFinite(width) || !Number.isFinite(height) || width <= 0 || height <= 0) {
    throw new LayoutError('INVALID_GEOMETRY', `Invalid terminal geometry ${width}x${height}`, { width, height });
  }
}

export function splitColumnWidth(width: number): number {
  const content = Math.max(Math.floor(width) - SPLIT_OUTER_MARGIN, MIN_SPLIT_CONTENT_WIDTH);
  return Math.max(Math.floor((content - SPLIT_GUTTER) / 2), MIN_SPLIT_COLUMN_WIDTH);
}

export function singleColumnWidth(width: number): number {
  const preferred = Math.floor(width * SINGLE_COLUMN_RATIO);
  return Math.min(Math.max(preferred, MIN_SINGLE_COLUMN_WIDTH), MAX_SINGLE_COLUMN_WIDTH);
}

export const columnWidthFor = (width: number, viewMode: ViewMode): number =>
  viewMode === 'split' ? splitColumnWidth(width) : singleColumnWidth(width);

export const contentHeightFor = (height: number): number => Math.max(Math.floor(height) - CHROME_ROWS, 1);

/** Text rows that fit in `contentHeight` at the given line spacing. */
export function linesPerPageFor(contentHeight: number, lineSpacing: LineSpacing): number {
  if (lineSpacing === 'relaxed') return Math.max(Math.floor((contentHeight + 1) / 2), 1);
  return Math.max(Math.floor(contentHeight * LINE_SPACING_MULTIPLIERS[lineSpacing]), 1);
}

/** Column width, content height and lines per page for a terminal size. */
export function computeLayoutMetrics(width: number, height: number, config: LayoutConfig): LayoutMetrics {
  assertValidGeometry(width, height);
  const contentHeight = contentHeightFor(height);
  return {
    columnWidth: columnWidthFor(width, config.viewMode),
    contentHeight,
    linesPerPage: linesPerPageFor(contentHeight, config.lineSpacing),
  };
}
