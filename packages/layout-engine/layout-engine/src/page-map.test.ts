import { describe, expect, it, vi } from 'vitest';
import type { Document, PageLine } from '@leafline/contracts';
import { buildAbsolutePageMap, buildDynamicPageMap, type ChapterLineWrapper } from './page-map';

const makeDocument = (count: number, missing: number[] = []): Document => ({
  canonicalPath: '/books/sample.epub',
  chapterCount: count,
  getChapter: (index) => (missing.includes(index) ? null : { rawContent: null, lines: [] }),
});

const wrapperFor = (sizes: number[]) => {
  const wrapAll = vi.fn(
    (_document: Document, chapterIndex: number, _width: number, _options: { linesPerPage: number }): PageLine[] =>
      Array.from({ length: sizes[chapterIndex] ?? 0 }, (_, line) => `c${chapterIndex}l${line}`),
  );
  const wrapper: ChapterLineWrapper = { wrapAll };
  return { wrapper, wrapAll };
};

describe('buildDynamicPageMap', () => {
  it('slices a 100-line chapter into pages of 30 lines', () => {
    const { wrapper } = wrapperFor([100]);
    const pages = buildDynamicPageMap(makeDocument(1), 40, 30, wrapper);
    expect(pages.map((page) => [page.startLine, page.endLine])).toEqual([
      [0, 29],
      [30, 59],
      [60, 89],
      [90, 99],
    ]);
    expect(pages.map((page) => page.pageInChapter)).toEqual([0, 1, 2, 3]);
    expect(pages.every((page) => page.totalPagesInChapter === 4)).toBe(true);
    expect(pages[3].lines).toHaveLength(10);
    expect(pages[3].lines?.[0]).toBe('c0l90');
  });

  it('spans chapters in order and skips empty ones', () => {
    const { wrapper } = wrapperFor([100, 0, 45]);
    const pages = buildDynamicPageMap(makeDocument(3), 40, 30, wrapper);
    expect(pages.map((page) => [page.chapterIndex, page.startLine, page.endLine])).toEqual([
      [0, 0, 29],
      [0, 30, 59],
      [0, 60, 89],
      [0, 90, 99],
      [2, 0, 29],
      [2, 30, 44],
    ]);
  });

  it('keeps page ranges contiguous within each chapter', () => {
    const sizes = [1, 29, 30, 31, 77];
    const { wrapper } = wrapperFor(sizes);
    const pages = buildDynamicPageMap(makeDocument(sizes.length), 40, 30, wrapper);
    sizes.forEach((size, chapterIndex) => {
      const ranges = pages.filter((page) => page.chapterIndex === chapterIndex);
      let expectedStart = 0;
      for (const page of ranges) {
        expect(page.startLine).toBe(expectedStart);
        expect(page.endLine).toBeGreaterThanOrEqual(page.startLine);
        expectedStart = page.endLine + 1;
      }
      expect(expectedStart).toBe(size);
    });
  });

  it('reports progress after each chapter', () => {
    const { wrapper } = wrapperFor([5, 5, 5]);
    const progress: Array<[number, number]> = [];
    buildDynamicPageMap(makeDocument(3), 40, 30, wrapper, (done, total) => progress.push([done, total]));
    expect(progress).toEqual([
      [1, 3],
      [2, 3],
      [3, 3],
    ]);
  });

  it('passes the column width and page height to the wrapper', () => {
    const { wrapper, wrapAll } = wrapperFor([5]);
    const document = makeDocument(1);
    buildDynamicPageMap(document, 36, 21, wrapper);
    expect(wrapAll).toHaveBeenCalledWith(document, 0, 36, { linesPerPage: 21 });
  });
});

describe('buildAbsolutePageMap', () => {
  it('counts pages per chapter', () => {
    const { wrapper } = wrapperFor([100, 0, 45, 30]);
    expect(buildAbsolutePageMap(makeDocument(4), 40, 30, wrapper)).toEqual([4, 0, 2, 1]);
  });

  it('counts missing chapters as empty without wrapping them', () => {
    const { wrapper, wrapAll } = wrapperFor([10, 10]);
    expect(buildAbsolutePageMap(makeDocument(2, [1]), 40, 30, wrapper)).toEqual([1, 0]);
    expect(wrapAll).toHaveBeenCalledTimes(1);
  });

  it('reports progress after each chapter', () => {
    const { wrapper } = wrapperFor([1, 2]);
    const onProgress = vi.fn();
    buildAbsolutePageMap(makeDocument(2), 40, 30, wrapper, onProgress);
    expect(onProgress.mock.calls).toEqual([
      [1, 2],
      [2, 2],
    ]);
  });
});
