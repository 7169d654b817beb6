import {
  debugLog,
  isDisplayLine,
  toLayoutError,
  type Document,
  type LayoutConfig,
  type PageRecord,
} from '@leafline/contracts';
import type { WrappedLinesFetcher } from './wrapped-lines-fetcher';

export type HydrationLayout = {
  columnWidth: number;
  linesPerPage: number;
  config: LayoutConfig;
};

/**
 * Fills cache-loaded page stubs with wrapped lines.
 *
 * Pages loaded from disk only know their line range; their lines are
 * fetched again through the window cache on first access.
 */
export class PageHydrator {
  constructor(private readonly fetcher: WrappedLinesFetcher) {}

  /** Stubs without lines and pages holding plain fallback lines both need hydration. */
  needsHydration(page: PageRecord): boolean {
    return page.lines === undefined || page.lines.some((line) => !isDisplayLine(line));
  }

  hydrate(page: PageRecord, document: Document, layout: HydrationLayout): PageRecord {
    try {
      const lines = this.fetcher.fetch(document, page.chapterIndex, layout.columnWidth, {
        offset: page.startLine,
        length: page.endLine - page.startLine + 1,
        config: layout.config,
        linesPerPage: layout.linesPerPage,
      });
      if (lines.length === 0) return page;
      return { ...page, lines: [...lines] };
    } catch (error) {
      debugLog('warn', '[PageHydrator] Hydration failed', {
        chapterIndex: page.chapterIndex,
        startLine: page.startLine,
        message: toLayoutError(error).message,
      });
      return page;
    }
  }
}
