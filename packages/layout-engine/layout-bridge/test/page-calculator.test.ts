import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  DEFAULT_LAYOUT_CONFIG,
  LayoutError,
  pageLineText,
  type CompactPage,
  type Document,
  type LayoutConfig,
  type PaginationCache,
} from '@leafline/contracts';
import { FormattingService } from '../src/formatting-service';
import { PageCalculator } from '../src/page-calculator';
import { MemoryPaginationCache, layoutKey } from '../src/pagination-cache';
import { createDocument, rowsDocument, rowsParser } from './mock-data';

// 80x33 split/compact: 36-column pages of 30 lines.
const WIDTH = 80;
const HEIGHT = 33;
const KEY = layoutKey(WIDTH, HEIGHT, 'split', 'compact');
const config: LayoutConfig = { ...DEFAULT_LAYOUT_CONFIG };

const createCalculator = (cache: PaginationCache | null = null) =>
  new PageCalculator({ formatting: new FormattingService({ parser: rowsParser }), cache });

const ranges = (pages: readonly CompactPage[]) =>
  pages.map((page) => [page.chapterIndex, page.startLine, page.endLine]);

/** Holds every cache lookup until it is released by index. */
class GatedPaginationCache implements PaginationCache {
  readonly layoutKey = layoutKey;
  private readonly memory = new MemoryPaginationCache();
  private readonly gates: Array<() => void> = [];

  get pendingLookups(): number {
    return this.gates.length;
  }

  get size(): number {
    return this.memory.size;
  }

  release(index: number): void {
    this.gates[index]?.();
  }

  async loadForDocument(document: Document, key: string): Promise<CompactPage[] | null> {
    await new Promise<void>((resolve) => this.gates.push(resolve));
    return this.memory.loadForDocument(document, key);
  }

  saveForDocument(document: Document, key: string, pages: CompactPage[]): Promise<boolean> {
    return this.memory.saveForDocument(document, key, pages);
  }
}

describe('PageCalculator', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('buildPageMap', () => {
    it('pages a 100-line chapter by 30 lines', async () => {
      const calculator = createCalculator();
      const result = await calculator.buildPageMap(WIDTH, HEIGHT, rowsDocument([100]), config);

      expect(result.cached).toBe(false);
      expect(ranges(result.pages)).toEqual([
        [0, 0, 29],
        [0, 30, 59],
        [0, 60, 89],
        [0, 90, 99],
      ]);
      expect(calculator.totalPages()).toBe(4);
      expect(calculator.linesPerPage).toBe(30);
      expect(calculator.columnWidth).toBe(36);
    });

    it('attaches the wrapped lines to each page', async () => {
      const calculator = createCalculator();
      const { pages } = await calculator.buildPageMap(WIDTH, HEIGHT, rowsDocument([100]), config);
      expect(pages[3].lines?.map(pageLineText)).toEqual(Array.from({ length: 10 }, (_, i) => `c0-${90 + i}`));
    });

    it('uses fewer lines per page at normal spacing', async () => {
      const calculator = createCalculator();
      const { pages } = await calculator.buildPageMap(WIDTH, HEIGHT, rowsDocument([100]), {
        ...config,
        lineSpacing: 'normal',
      });
      expect(calculator.linesPerPage).toBe(22);
      expect(pages).toHaveLength(5);
    });

    it('reports progress per chapter', async () => {
      const onProgress = vi.fn();
      await createCalculator().buildPageMap(WIDTH, HEIGHT, rowsDocument([100, 0, 45]), config, onProgress);
      expect(onProgress.mock.calls).toEqual([
        [1, 3],
        [2, 3],
        [3, 3],
      ]);
    });

    it.each([
      [0, HEIGHT],
      [WIDTH, -1],
      [Number.NaN, HEIGHT],
      [WIDTH, Number.POSITIVE_INFINITY],
    ])('rejects invalid geometry %s x %s', async (width, height) => {
      await expect(createCalculator().buildPageMap(width, height, rowsDocument([10]), config)).rejects.toBeInstanceOf(
        LayoutError,
      );
      await expect(createCalculator().buildPageMap(width, height, rowsDocument([10]), config)).rejects.toMatchObject({
        code: 'INVALID_GEOMETRY',
      });
    });
  });

  describe('page numbering mode', () => {
    it('builds and caches the global page sequence in dynamic mode', async () => {
      const cache = new MemoryPaginationCache();
      const calculator = createCalculator(cache);

      const result = await calculator.buildPageMap(WIDTH, HEIGHT, rowsDocument([100, 0, 45]), config);

      expect(result.mode).toBe('dynamic');
      expect(result.pages).toHaveLength(6);
      expect(result.chapterPageCounts).toEqual([4, 0, 2]);
      expect(calculator.mode).toBe('dynamic');
      expect(cache.size).toBe(1);
    });

    it('only counts pages per chapter in absolute mode and leaves the cache alone', async () => {
      const cache = new MemoryPaginationCache();
      const calculator = createCalculator(cache);

      const result = await calculator.buildPageMap(WIDTH, HEIGHT, rowsDocument([100, 0, 45]), {
        ...config,
        pageNumberingMode: 'absolute',
      });

      expect(result).toEqual({
        mode: 'absolute',
        pages: [],
        chapterPageCounts: [4, 0, 2],
        cached: false,
        superseded: false,
      });
      expect(calculator.mode).toBe('absolute');
      expect(calculator.totalPages()).toBe(0);
      expect(calculator.chapterPageCount(0)).toBe(4);
      expect(cache.size).toBe(0);
    });
  });

  describe('overlapping builds', () => {
    it('keeps the newest build when an older cache lookup resolves last', async () => {
      const cache = new GatedPaginationCache();
      const calculator = createCalculator(cache);
      const document = rowsDocument([100]);

      const older = calculator.buildPageMap(WIDTH, HEIGHT, document, config);
      const newer = calculator.buildPageMap(120, 43, document, config);
      expect(cache.pendingLookups).toBe(2);

      cache.release(1);
      const newerResult = await newer;
      cache.release(0);
      const olderResult = await older;

      expect(newerResult.superseded).toBe(false);
      expect(olderResult).toMatchObject({ superseded: true, pages: [] });
      expect(calculator.linesPerPage).toBe(40);
      expect(calculator.columnWidth).toBe(56);
      expect(calculator.totalPages()).toBe(3);
      expect(calculator.getPage(0)).toMatchObject({ startLine: 0, endLine: 39 });
      expect(cache.size).toBe(1);
    });

    it('drops an older build whose lookup resolves first', async () => {
      const cache = new GatedPaginationCache();
      const calculator = createCalculator(cache);
      const document = rowsDocument([100]);

      const older = calculator.buildPageMap(WIDTH, HEIGHT, document, config);
      const newer = calculator.buildPageMap(120, 43, document, config);

      cache.release(0);
      expect(await older).toMatchObject({ superseded: true });
      expect(calculator.totalPages()).toBe(0);

      cache.release(1);
      await newer;
      expect(calculator.linesPerPage).toBe(40);
      expect(calculator.getPage(2)).toMatchObject({ chapterIndex: 0, startLine: 80, endLine: 99 });
    });
  });

  describe('pagination cache', () => {
    it('saves the compact page map and loads it on the next build', async () => {
      const cache = new MemoryPaginationCache();
      const document = rowsDocument([100]);

      await createCalculator(cache).buildPageMap(WIDTH, HEIGHT, document, config);
      expect(await cache.loadForDocument(document, KEY)).toHaveLength(4);

      const calculator = createCalculator(cache);
      const result = await calculator.buildPageMap(WIDTH, HEIGHT, document, config);
      expect(result.cached).toBe(true);
      expect(result.pages.every((page) => page.lines === undefined)).toBe(true);
      expect(ranges(result.pages)).toEqual([
        [0, 0, 29],
        [0, 30, 59],
        [0, 60, 89],
        [0, 90, 99],
      ]);
    });

    it('hydrates cached stubs on access and stores them back', async () => {
      const cache = new MemoryPaginationCache();
      const document = rowsDocument([100]);
      await createCalculator(cache).buildPageMap(WIDTH, HEIGHT, document, config);

      const calculator = createCalculator(cache);
      await calculator.buildPageMap(WIDTH, HEIGHT, document, config);
      const page = calculator.getPage(1);

      expect(page?.lines).toHaveLength(30);
      expect(page?.lines?.map(pageLineText).slice(0, 2)).toEqual(['c0-30', 'c0-31']);
      expect(calculator.getPage(1)).toBe(page);
    });

    it('keeps the stub when hydration yields nothing', async () => {
      const cache = new MemoryPaginationCache();
      await createCalculator(cache).buildPageMap(WIDTH, HEIGHT, rowsDocument([100]), config);

      const calculator = createCalculator(cache);
      await calculator.buildPageMap(WIDTH, HEIGHT, createDocument([null]), config);
      const page = calculator.getPage(0);
      expect(page?.startLine).toBe(0);
      expect(page?.lines).toBeUndefined();
    });

    it.each([
      ['a malformed payload', { version: 1, pages: [{ chapterIndex: 'x' }] }],
      ['a newer schema version', { version: 2, pages: [] }],
      ['a missing payload version', { pages: [] }],
      [
        'pages for chapters the document lacks',
        {
          version: 1,
          pages: [{ chapterIndex: 5, pageInChapter: 0, totalPagesInChapter: 1, startLine: 0, endLine: 9 }],
        },
      ],
    ])('rebuilds when the cache holds %s', async (_label, payload) => {
      const cache = new MemoryPaginationCache();
      const document = rowsDocument([100]);
      cache.putRaw(document, KEY, payload);

      const result = await createCalculator(cache).buildPageMap(WIDTH, HEIGHT, document, config);
      expect(result.cached).toBe(false);
      expect(result.pages).toHaveLength(4);
      expect(await cache.loadForDocument(document, KEY)).toHaveLength(4);
    });

    it('rebuilds when the cache fails', async () => {
      const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const failing: PaginationCache = {
        layoutKey,
        loadForDocument: async () => {
          throw new Error('disk unavailable');
        },
        saveForDocument: async () => false,
      };

      const result = await createCalculator(failing).buildPageMap(WIDTH, HEIGHT, rowsDocument([100]), config);
      expect(result).toMatchObject({ cached: false });
      expect(result.pages).toHaveLength(4);
      expect(warnSpy).toHaveBeenCalledWith('[PageCalculator] Pagination cache lookup failed', {
        key: KEY,
        message: 'disk unavailable',
      });
      expect(warnSpy).toHaveBeenCalledWith('[PageCalculator] Page map was not cached', { key: KEY });
    });
  });

  describe('page lookup', () => {
    const build = async () => {
      const calculator = createCalculator();
      await calculator.buildPageMap(WIDTH, HEIGHT, rowsDocument([100, 0, 45]), config);
      return calculator;
    };

    it('finds the page covering a line offset', async () => {
      const calculator = await build();
      expect(calculator.findPageIndex(0, 95)).toBe(3);
      expect(calculator.getPage(calculator.findPageIndex(0, 95))).toMatchObject({ startLine: 90, endLine: 99 });
      expect(calculator.findPageIndex(0, 29)).toBe(0);
      expect(calculator.findPageIndex(0, 30)).toBe(1);
      expect(calculator.findPageIndex(2, 0)).toBe(4);
      expect(calculator.findPageIndex(2, 31)).toBe(5);
    });

    it('falls back to the last page of the chapter, or 0 for chapters without pages', async () => {
      const calculator = await build();
      expect(calculator.findPageIndex(0, 500)).toBe(3);
      expect(calculator.findPageIndex(1, 0)).toBe(0);
      expect(calculator.findPageIndex(7, 0)).toBe(0);
    });

    it('clamps page indices', async () => {
      const calculator = await build();
      expect(calculator.getPage(-5)).toMatchObject({ chapterIndex: 0, startLine: 0 });
      expect(calculator.getPage(99)).toMatchObject({ chapterIndex: 2, startLine: 30, endLine: 44 });
      expect(calculator.getPage(Number.NaN)).toMatchObject({ chapterIndex: 0, startLine: 0 });
    });

    it('returns null before any page exists', () => {
      expect(createCalculator().getPage(0)).toBeNull();
      expect(createCalculator().totalPages()).toBe(0);
    });

    it('restores saved positions', async () => {
      const calculator = await build();
      expect(calculator.restorePosition({ chapterIndex: 0, lineOffset: 95 })).toBe(3);
      expect(calculator.restorePosition({ chapterIndex: 0, pageInChapter: 2 })).toBe(2);
      expect(calculator.restorePosition({ chapterIndex: 2, pageInChapter: 1 })).toBe(5);
      expect(calculator.restorePosition({ chapterIndex: 2, lineOffset: 3, pageInChapter: 1 })).toBe(4);
      expect(calculator.restorePosition({ chapterIndex: 2, lineOffset: null, pageInChapter: null })).toBe(4);
    });
  });

  describe('buildAbsolutePageMap', () => {
    it('counts pages per chapter', () => {
      const calculator = createCalculator();
      const counts = calculator.buildAbsolutePageMap(WIDTH, HEIGHT, rowsDocument([100, 0, 45]), {
        ...config,
        pageNumberingMode: 'absolute',
      });

      expect(counts).toEqual([4, 0, 2]);
      expect(calculator.chapterPageCount(2)).toBe(2);
      expect(calculator.chapterPageCount(9)).toBe(0);
    });

    it('throws on invalid geometry', () => {
      expect(() => createCalculator().buildAbsolutePageMap(0, HEIGHT, rowsDocument([10]), config)).toThrow(LayoutError);
    });
  });
});
