import type { PageNumberingMode, ViewMode } from '@leafline/contracts';
import type { PageCalculator } from './page-calculator';

export type PageCount = {
  current: number;
  total: number;
};

/** Page numbers shown in the footer: one count, or one per column in split view. */
export type PageInfo = ({ type: 'single' } & PageCount) | { type: 'split'; left: PageCount; right: PageCount };

export type PageInfoSource = Pick<PageCalculator, 'mode' | 'linesPerPage' | 'totalPages' | 'chapterPageCounts'>;

/**
 * Where the reader is. Dynamic mode reads `pageIndex`; absolute mode reads
 * the chapter and the line offsets of the visible columns.
 */
export type ReaderPosition = {
  pageIndex?: number;
  chapterIndex?: number;
  lineOffset?: number;
  /** Right column offset in split view; defaults to one page past the left column. */
  rightLineOffset?: number | null;
};

export type PageInfoOptions = {
  viewMode: ViewMode;
  showPageNumbers: boolean;
  /** Overrides the mode of the calculator's last build. */
  mode?: PageNumberingMode;
};

const EMPTY_COUNT: PageCount = { current: 0, total: 0 };

export const emptyPageInfo = (viewMode: ViewMode): PageInfo =>
  viewMode === 'split'
    ? { type: 'split', left: { ...EMPTY_COUNT }, right: { ...EMPTY_COUNT } }
    : { type: 'single', ...EMPTY_COUNT };

const whole = (value: number | null | undefined): number => {
  const numeric = Math.floor(value ?? 0);
  return Number.isFinite(numeric) ? numeric : 0;
};

/**
 * Current and total page numbers for the footer.
 *
 * Hidden page numbers report `{ type: 'single', current: 0, total: 0 }`.
 */
export function pageInfoFor(source: PageInfoSource, position: ReaderPosition, options: PageInfoOptions): PageInfo {
  if (!options.showPageNumbers) return emptyPageInfo('single');

  const mode = options.mode ?? source.mode ?? 'dynamic';
  if (mode === 'dynamic') return dynamicPageInfo(source, position, options.viewMode);
  return absolutePageInfo(source, position, options.viewMode);
}

function dynamicPageInfo(source: PageInfoSource, position: ReaderPosition, viewMode: ViewMode): PageInfo {
  const total = Math.max(source.totalPages(), 0);
  const current = whole(position.pageIndex) + 1;
  if (viewMode === 'single') return { type: 'single', current, total };

  return {
    type: 'split',
    left: { current, total },
    right: { current: Math.min(current + 1, total), total },
  };
}

function absolutePageInfo(source: PageInfoSource, position: ReaderPosition, viewMode: ViewMode): PageInfo {
  const linesPerPage = source.linesPerPage;
  if (linesPerPage <= 0) return emptyPageInfo(viewMode);

  const counts = source.chapterPageCounts();
  const total = counts.reduce((sum, count) => sum + count, 0);
  const pagesBefore = counts.slice(0, Math.max(whole(position.chapterIndex), 0)).reduce((sum, count) => sum + count, 0);
  const pageAt = (offset: number) => pagesBefore + Math.floor(offset / linesPerPage) + 1;

  const left = pageAt(whole(position.lineOffset));
  if (viewMode === 'single') return { type: 'single', current: left, total };
  if (total <= 0) return emptyPageInfo('split');

  const right = Math.min(pageAt(whole(position.rightLineOffset ?? linesPerPage)), total);
  return { type: 'split', left: { current: left, total }, right: { current: right, total } };
}
