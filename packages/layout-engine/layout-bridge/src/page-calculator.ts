/**
 * Page Calculator
 *
 * Owns the page map for the current document and terminal size.
 *
 * Dynamic mode builds one flat page sequence through the formatting service,
 * or loads its compact form from the pagination cache; cache-loaded pages are
 * stubs hydrated on first access. Absolute mode only keeps page counts per
 * chapter and never touches the pagination cache.
 *
 * Builds may overlap (a resize while the cache is being read). Each build
 * takes a generation number; only the newest one commits its layout and
 * pages, and both are committed together.
 *
 * Invalid geometry is the one failure surfaced to callers; cache and
 * formatting problems degrade to a rebuild or to plain lines.
 */

import {
  debugLog,
  toLayoutError,
  type CompactPage,
  type Document,
  type LayoutConfig,
  type PageNumberingMode,
  type PageRecord,
  type PaginationCache,
  type ProgressCallback,
} from '@leafline/contracts';
import {
  buildAbsolutePageMap,
  buildDynamicPageMap,
  computeLayoutMetrics,
  type ChapterLineWrapper,
  type LayoutMetrics,
} from '@leafline/layout-engine';
import type { FormattingService } from './formatting-service';
import { compactPages } from './pagination-cache';
import { PageHydrator } from './page-hydrator';
import { WrappedLinesFetcher } from './wrapped-lines-fetcher';

export type PageMapResult = {
  mode: PageNumberingMode;
  /** Global pages; empty in absolute mode. */
  pages: PageRecord[];
  /** Page count per chapter, in either mode. */
  chapterPageCounts: number[];
  /** The page map came from the pagination cache. */
  cached: boolean;
  /** A newer build started before this one finished; nothing was committed. */
  superseded: boolean;
};

/** Saved reading position. `lineOffset` wins over `pageInChapter`. */
export type ReadingProgress = {
  chapterIndex: number;
  lineOffset?: number | null;
  pageInChapter?: number | null;
};

export type PageCalculatorOptions = {
  formatting: FormattingService;
  cache?: PaginationCache | null;
  /** Window source for page hydration; defaults to a fetcher over `formatting`. */
  fetcher?: WrappedLinesFetcher;
  hydrator?: PageHydrator;
};

type ChapterPageEntry = {
  endLine: number;
  pageIndex: number;
};

type ActiveLayout = LayoutMetrics & {
  document: Document;
  config: LayoutConfig;
};

const countPagesPerChapter = (pages: readonly CompactPage[], chapterCount: number): number[] => {
  const counts = new Array<number>(Math.max(chapterCount, 0)).fill(0);
  for (const page of pages) {
    if (page.chapterIndex < counts.length) counts[page.chapterIndex] += 1;
  }
  return counts;
};

export class PageCalculator {
  private readonly formatting: FormattingService;
  private readonly cache: PaginationCache | null;
  private readonly hydrator: PageHydrator;

  private pages: PageRecord[] = [];
  private chapterPages = new Map<number, ChapterPageEntry[]>();
  private chapterCounts: number[] = [];
  private layout: ActiveLayout | null = null;
  private generation = 0;

  constructor(options: PageCalculatorOptions) {
    this.formatting = options.formatting;
    this.cache = options.cache ?? null;
    this.hydrator =
      options.hydrator ?? new PageHydrator(options.fetcher ?? new WrappedLinesFetcher(options.formatting));
  }

  /** Lines per page of the last committed build; 0 before any build. */
  get linesPerPage(): number {
    return this.layout?.linesPerPage ?? 0;
  }

  get columnWidth(): number {
    return this.layout?.columnWidth ?? 0;
  }

  /** Numbering mode of the last committed build; `null` before any build. */
  get mode(): PageNumberingMode | null {
    return this.layout?.config.pageNumberingMode ?? null;
  }

  /**
   * Builds the page map for `config.pageNumberingMode`: in dynamic mode the
   * global page sequence (loaded from the pagination cache when possible), in
   * absolute mode the per-chapter page counts.
   *
   * @throws LayoutError `INVALID_GEOMETRY` for non-positive or non-finite sizes
   */
  async buildPageMap(
    width: number,
    height: number,
    document: Document,
    config: LayoutConfig,
    onProgress?: ProgressCallback,
  ): Promise<PageMapResult> {
    if (config.pageNumberingMode === 'absolute') {
      const chapterPageCounts = this.buildAbsolutePageMap(width, height, document, config, onProgress);
      return { mode: 'absolute', pages: [], chapterPageCounts, cached: false, superseded: false };
    }

    const layout = this.layoutFor(width, height, document, config);
    const generation = ++this.generation;
    const key = this.cache?.layoutKey(Math.floor(width), Math.floor(height), config.viewMode, config.lineSpacing);

    if (this.cache && key !== undefined) {
      const cached = await this.loadCached(this.cache, document, key);
      if (generation !== this.generation) return this.superseded(key);
      if (cached) {
        const pages = this.commit(layout, cached, countPagesPerChapter(cached, document.chapterCount));
        debugLog('info', '[PageCalculator] Loaded page map from cache', { key, pages: pages.length });
        return { mode: 'dynamic', pages, chapterPageCounts: this.chapterCounts, cached: true, superseded: false };
      }
    }

    const built = buildDynamicPageMap(
      document,
      layout.columnWidth,
      layout.linesPerPage,
      this.wrapperFor(config),
      onProgress,
    );
    const pages = this.commit(layout, built, countPagesPerChapter(built, document.chapterCount));
    const chapterPageCounts = this.chapterCounts;
    debugLog('info', '[PageCalculator] Built page map', { pages: pages.length });

    if (this.cache && key !== undefined) {
      const saved = await this.cache.saveForDocument(document, key, compactPages(built));
      if (!saved) debugLog('warn', '[PageCalculator] Page map was not cached', { key });
    }

    return { mode: 'dynamic', pages, chapterPageCounts, cached: false, superseded: false };
  }

  /**
   * Absolute mode: page counts per chapter, kept for {@link chapterPageCount}.
   *
   * @throws LayoutError `INVALID_GEOMETRY` for non-positive or non-finite sizes
   */
  buildAbsolutePageMap(
    width: number,
    height: number,
    document: Document,
    config: LayoutConfig,
    onProgress?: ProgressCallback,
  ): number[] {
    const layout = this.layoutFor(width, height, document, { ...config, pageNumberingMode: 'absolute' });
    this.generation += 1;
    const counts = buildAbsolutePageMap(
      document,
      layout.columnWidth,
      layout.linesPerPage,
      this.wrapperFor(config),
      onProgress,
    );
    this.commit(layout, [], counts);
    return counts;
  }

  chapterPageCount(chapterIndex: number): number {
    return this.chapterCounts[chapterIndex] ?? 0;
  }

  /** Page counts per chapter of the last committed build. */
  chapterPageCounts(): readonly number[] {
    return this.chapterCounts;
  }

  totalPages(): number {
    return this.pages.length;
  }

  /** Page at `index` (clamped), with its lines hydrated. `null` when there are no pages. */
  getPage(index: number): PageRecord | null {
    if (this.pages.length === 0) return null;

    const clamped = Math.min(Math.max(Math.floor(Number.isFinite(index) ? index : 0), 0), this.pages.length - 1);
    const page = this.pages[clamped];
    if (!this.layout || !this.hydrator.needsHydration(page)) return page;

    const hydrated = this.hydrator.hydrate(page, this.layout.document, this.layout);
    this.pages[clamped] = hydrated;
    return hydrated;
  }

  /**
   * Global index of the page showing `lineOffset` in the chapter: the first
   * page whose `endLine >= lineOffset`, else the chapter's last page; 0 when
   * the chapter has no pages.
   */
  findPageIndex(chapterIndex: number, lineOffset: number): number {
    const entries = this.chapterPages.get(chapterIndex);
    if (!entries || entries.length === 0) return 0;

    let low = 0;
    let high = entries.length - 1;
    let found = -1;
    while (low <= high) {
      const mid = (low + high) >> 1;
      if (entries[mid].endLine >= lineOffset) {
        found = mid;
        high = mid - 1;
      } else {
        low = mid + 1;
      }
    }

    return entries[found === -1 ? entries.length - 1 : found].pageIndex;
  }

  /** Page index for a saved position: the exact line offset, else page-in-chapter × lines per page. */
  restorePosition(progress: ReadingProgress): number {
    const { chapterIndex, lineOffset, pageInChapter } = progress;
    if (typeof lineOffset === 'number' && Number.isFinite(lineOffset) && lineOffset >= 0) {
      return this.findPageIndex(chapterIndex, lineOffset);
    }
    if (typeof pageInChapter === 'number' && Number.isFinite(pageInChapter) && pageInChapter >= 0) {
      return this.findPageIndex(chapterIndex, Math.floor(pageInChapter) * this.linesPerPage);
    }
    return this.findPageIndex(chapterIndex, 0);
  }

  private layoutFor(width: number, height: number, document: Document, config: LayoutConfig): ActiveLayout {
    return { ...computeLayoutMetrics(width, height, config), document, config };
  }

  /** Commits layout, pages and counts together; returns the committed pages. */
  private commit(layout: ActiveLayout, pages: readonly PageRecord[], counts: number[]): PageRecord[] {
    this.layout = layout;
    this.chapterCounts = counts;
    this.setPages(pages);
    return this.pages;
  }

  private superseded(key: string): PageMapResult {
    debugLog('verbose', '[PageCalculator] Page map build superseded', { key });
    return { mode: 'dynamic', pages: [], chapterPageCounts: [], cached: false, superseded: true };
  }

  private wrapperFor(config: LayoutConfig): ChapterLineWrapper {
    return {
      wrapAll: (document, chapterIndex, width, options) =>
        this.formatting.wrapAll(document, chapterIndex, width, { config, linesPerPage: options.linesPerPage }),
    };
  }

  private async loadCached(cache: PaginationCache, document: Document, key: string): Promise<CompactPage[] | null> {
    let pages: CompactPage[] | null;
    try {
      pages = await cache.loadForDocument(document, key);
    } catch (error) {
      debugLog('warn', '[PageCalculator] Pagination cache lookup failed', {
        key,
        message: toLayoutError(error).message,
      });
      return null;
    }
    if (!pages) return null;

    if (pages.some((page) => page.chapterIndex >= document.chapterCount)) {
      debugLog('info', '[PageCalculator] Cached page map does not match the document', { key });
      return null;
    }
    return pages;
  }

  private setPages(pages: readonly PageRecord[]): void {
    this.pages = [...pages];
    this.chapterPages = new Map();
    this.pages.forEach((page, pageIndex) => {
      const entries = this.chapterPages.get(page.chapterIndex) ?? [];
      entries.push({ endLine: page.endLine, pageIndex });
      this.chapterPages.set(page.chapterIndex, entries);
    });
    for (const entries of this.chapterPages.values()) {
      entries.sort((a, b) => a.endLine - b.endLine);
    }
  }
}
