import type { Document, PageLine, PageRecord, ProgressCallback } from '@leafline/contracts';

/** Source of a chapter's wrapped lines for page map construction. */
export interface ChapterLineWrapper {
  wrapAll(
    document: Document,
    chapterIndex: number,
    width: number,
    options: { linesPerPage: number },
  ): readonly PageLine[];
}

const pageCountFor = (lineCount: number, linesPerPage: number): number =>
  lineCount === 0 ? 0 : Math.ceil(lineCount / linesPerPage);

const normalizeLinesPerPage = (linesPerPage: number): number => Math.max(Math.floor(linesPerPage), 1);

/**
 * Absolute mode: page count per chapter. Readers address positions by
 * `(chapterIndex, lineOffset)` directly, so no page records are built.
 */
export function buildAbsolutePageMap(
  document: Document,
  columnWidth: number,
  linesPerPage: number,
  wrapper: ChapterLineWrapper,
  onProgress?: ProgressCallback,
): number[] {
  const perPage = normalizeLinesPerPage(linesPerPage);
  const total = document.chapterCount;
  const counts: number[] = [];

  for (let chapterIndex = 0; chapterIndex < total; chapterIndex++) {
    const lines = document.getChapter(chapterIndex)
      ? wrapper.wrapAll(document, chapterIndex, columnWidth, { linesPerPage: perPage })
      : [];
    counts.push(pageCountFor(lines.length, perPage));
    onProgress?.(chapterIndex + 1, total);
  }

  return counts;
}

/**
 * Dynamic mode: one flat sequence of pages across the whole book.
 *
 * Each page carries its chapter, its inclusive local line range and the
 * wrapped lines it shows. Empty chapters contribute no page and a chapter's
 * last page is not padded.
 */
export function buildDynamicPageMap(
  document: Document,
  columnWidth: number,
  linesPerPage: number,
  wrapper: ChapterLineWrapper,
  onProgress?: ProgressCallback,
): PageRecord[] {
  const perPage = normalizeLinesPerPage(linesPerPage);
  const total = document.chapterCount;
  const pages: PageRecord[] = [];

  for (let chapterIndex = 0; chapterIndex < total; chapterIndex++) {
    const lines = document.getChapter(chapterIndex)
      ? wrapper.wrapAll(document, chapterIndex, columnWidth, { linesPerPage: perPage })
      : [];
    const pageCount = pageCountFor(lines.length, perPage);

    for (let pageInChapter = 0; pageInChapter < pageCount; pageInChapter++) {
      const startLine = pageInChapter * perPage;
      const endLine = Math.min(startLine + perPage, lines.length) - 1;
      pages.push({
        chapterIndex,
        pageInChapter,
        totalPagesInChapter: pageCount,
        startLine,
        endLine,
        lines: lines.slice(startLine, endLine + 1),
      });
    }

    onProgress?.(chapterIndex + 1, total);
  }

  return pages;
}
