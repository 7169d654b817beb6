import type {
  Chapter,
  ChapterParser,
  ContentBlock,
  Document,
  LineGeometry,
  SelectionAnchor,
} from '@leafline/contracts';
import { terminalTextMetrics } from '@leafline/measuring-terminal';
import { buildLineGeometry, type LineGeometryInput } from '../src/line-geometry';

export type MutableChapter = {
  rawContent: string | null;
  lines: string[];
  blocks?: ContentBlock[];
  metadata?: { sourcePath?: string };
};

export const createChapter = (rawContent: string | null, lines: string[] = []): MutableChapter => ({
  rawContent,
  lines,
  metadata: { sourcePath: 'OEBPS/chapter.xhtml' },
});

export const createDocument = (chapters: Array<Chapter | null>, canonicalPath = '/library/sample.epub'): Document => ({
  canonicalPath,
  chapterCount: chapters.length,
  getChapter: (index) => chapters[index] ?? null,
});

export const xhtml = (body: string): string =>
  `<?xml version="1.0" encoding="utf-8"?><html xmlns="http://www.w3.org/1999/xhtml"><body>${body}</body></html>`;

/**
 * Treats the raw chapter as preformatted text, so every raw line becomes
 * exactly one wrapped line.
 */
export const rowsParser: ChapterParser = (raw) => [
  { kind: 'code', level: 0, segments: [{ text: raw, styles: {} }], metadata: { preserveWhitespace: true } },
];

/** Raw chapter of `count` rows named `${prefix}${index}`. */
export const numberedRows = (count: number, prefix = 'L'): string =>
  Array.from({ length: count }, (_, index) => `${prefix}${index}`).join('\n');

/** A document whose chapters hold the given numbers of rows (rows of chapter `c` are `c{c}-{i}`). */
export const rowsDocument = (sizes: number[], canonicalPath?: string): Document =>
  createDocument(
    sizes.map((size, chapterIndex) => createChapter(numberedRows(size, `c${chapterIndex}-`))),
    canonicalPath,
  );

export const geometry = (input: Partial<LineGeometryInput> & { plainText: string }): LineGeometry =>
  buildLineGeometry(
    {
      pageId: 0,
      columnId: 0,
      row: 2,
      columnOrigin: 3,
      lineOffset: 0,
      styledText: input.plainText,
      ...input,
    },
    terminalTextMetrics,
  );

export const renderedLinesOf = (geometries: LineGeometry[]): Map<string, LineGeometry> =>
  new Map(geometries.map((entry) => [entry.key, entry]));

export const anchorOn = (target: LineGeometry, cellIndex: number): SelectionAnchor => ({
  pageId: target.pageId,
  columnId: target.columnId,
  geometryKey: target.key,
  lineOffset: target.lineOffset,
  cellIndex,
  row: target.row,
  columnOrigin: target.columnOrigin,
});

/**
 * A split-view frame: the left column shows page 0, the right column page 1.
 *
 * Left rows 2-6: "Hello world", "Second line", an image placeholder, "After
 * image", "a漢b". Right row 2: "Right side".
 */
export const buildSplitFrame = () => {
  const first = geometry({ row: 2, lineOffset: 0, plainText: 'Hello world' });
  const second = geometry({ row: 3, lineOffset: 1, plainText: 'Second line' });
  const image = geometry({ row: 4, lineOffset: 2, plainText: '' });
  const afterImage = geometry({ row: 5, lineOffset: 3, plainText: 'After image' });
  const wide = geometry({ row: 6, lineOffset: 4, plainText: 'a漢b' });
  const right = geometry({
    pageId: 1,
    columnId: 1,
    row: 2,
    columnOrigin: 43,
    lineOffset: 30,
    plainText: 'Right side',
  });

  return {
    first,
    second,
    image,
    afterImage,
    wide,
    right,
    renderedLines: renderedLinesOf([right, wide, afterImage, image, second, first]),
  };
};
