/**
 * Formatting Service
 *
 * Bridges raw chapter markup and wrapped display lines:
 * - Parses each chapter once per content checksum (SHA-1 of the raw markup)
 * - Memoizes semantic blocks, and plain lines when the chapter has none, onto
 *   the chapter itself
 * - Caches wrapped lines per chapter under `width|variant` keys, where the
 *   variant is `txt` or `img` (`img|rows` when a page-height hint caps images)
 *
 * Formatting failures never reach callers: they are logged and the chapter's
 * plain lines are served instead.
 */

import { createHash } from 'node:crypto';
import {
  debugLog,
  toLayoutError,
  type Chapter,
  type ChapterParser,
  type ContentBlock,
  type DisplayLine,
  type Document,
  type LayoutConfig,
  type PageLine,
  type TextMetrics,
} from '@leafline/contracts';
import { buildDisplayLines, type ChapterLineWrapper } from '@leafline/layout-engine';
import { buildPlainLines, xhtmlChapterParser } from '@leafline/xhtml-adapter';

export type FormattedChapter = {
  blocks: ContentBlock[];
  plainLines: string[];
  checksum: string;
};

export type WrapOptions = {
  /** Only `imageRendering` is read; absent means the text variant. */
  config?: Pick<LayoutConfig, 'imageRendering'> | null;
  /** Page-height hint capping image placeholder rows. */
  linesPerPage?: number | null;
};

export type WindowRequest = WrapOptions & {
  offset: number;
  length: number;
};

export type FormattingServiceOptions = {
  parser?: ChapterParser;
  metrics?: TextMetrics;
};

export const checksumFor = (content: string): string => createHash('sha1').update(content).digest('hex');

const maxImageRowsFor = (linesPerPage: number | null | undefined): number | null => {
  const rows = Math.floor(linesPerPage ?? 0);
  return rows > 0 ? rows : null;
};

/** `txt`, `img`, or `img|rows` when image rows are capped by the page height. */
export function wrapVariantKey(options: WrapOptions = {}): string {
  if (options.config?.imageRendering !== true) return 'txt';
  const rows = maxImageRowsFor(options.linesPerPage);
  return rows === null ? 'img' : `img|${rows}`;
}

export const chapterCacheKey = (document: Document, chapterIndex: number): string =>
  `${document.canonicalPath}:${chapterIndex}`;

const sliceWindow = <T>(lines: readonly T[], offset: number, length: number): T[] => {
  const start = Math.max(Math.floor(offset), 0);
  return lines.slice(start, start + length);
};

export class FormattingService implements ChapterLineWrapper {
  private readonly chapterCache = new Map<string, FormattedChapter>();
  private readonly wrappedCache = new Map<string, Map<string, DisplayLine[]>>();
  private readonly parser: ChapterParser;
  private readonly metrics?: TextMetrics;

  constructor(options: FormattingServiceOptions = {}) {
    this.parser = options.parser ?? xhtmlChapterParser;
    this.metrics = options.metrics;
  }

  /**
   * Parses `chapter` unless its checksum matches the cached result.
   *
   * Returns `null` when the chapter has no raw content or parsing fails.
   */
  ensureFormatted(document: Document, chapterIndex: number, chapter: Chapter): FormattedChapter | null {
    const raw = chapter.rawContent;
    if (raw === null) return null;

    const cacheKey = chapterCacheKey(document, chapterIndex);
    const checksum = checksumFor(raw);
    const cached = this.chapterCache.get(cacheKey);
    if (cached && cached.checksum === checksum) {
      this.applyToChapter(chapter, cached);
      return cached;
    }

    let blocks: ContentBlock[];
    try {
      blocks = this.parser(raw);
    } catch (error) {
      const layoutError = toLayoutError(error);
      debugLog('error', '[FormattingService] Chapter formatting failed', {
        chapterIndex,
        code: layoutError.code,
        message: layoutError.message,
      });
      return null;
    }

    const formatted: FormattedChapter = { blocks, plainLines: buildPlainLines(blocks), checksum };
    this.chapterCache.set(cacheKey, formatted);
    this.wrappedCache.delete(cacheKey);
    this.applyToChapter(chapter, formatted);
    debugLog('verbose', '[FormattingService] Formatted chapter', { chapterIndex, blocks: blocks.length });
    return formatted;
  }

  /** The `[offset, offset + length)` slice of the chapter's wrapped lines. */
  wrapWindow(document: Document, chapterIndex: number, width: number, request: WindowRequest): PageLine[] {
    const columns = Math.floor(width);
    const length = Math.floor(request.length);
    if (!(columns > 0) || !(length > 0)) return [];

    const chapter = document.getChapter(chapterIndex);
    if (!chapter) return [];

    const formatted = this.ensureFormatted(document, chapterIndex, chapter);
    if (!formatted) return sliceWindow(chapter.lines, request.offset, length);

    const wrapped = this.wrappedLinesFor(document, chapterIndex, chapter, formatted, columns, request);
    return sliceWindow(wrapped, request.offset, length);
  }

  /** Every wrapped line of the chapter; plain lines when formatting is unavailable. */
  wrapAll(document: Document, chapterIndex: number, width: number, options: WrapOptions = {}): readonly PageLine[] {
    const columns = Math.floor(width);
    if (!(columns > 0)) return [];

    const chapter = document.getChapter(chapterIndex);
    if (!chapter) return [];

    const formatted = this.ensureFormatted(document, chapterIndex, chapter);
    if (!formatted) return chapter.lines;

    return this.wrappedLinesFor(document, chapterIndex, chapter, formatted, columns, options);
  }

  /** Drops cached parses and wraps for `document`, or for every document. */
  invalidate(document?: Document): void {
    if (!document) {
      this.chapterCache.clear();
      this.wrappedCache.clear();
      return;
    }

    const prefix = `${document.canonicalPath}:`;
    for (const key of [...this.chapterCache.keys()]) {
      if (key.startsWith(prefix)) this.chapterCache.delete(key);
    }
    for (const key of [...this.wrappedCache.keys()]) {
      if (key.startsWith(prefix)) this.wrappedCache.delete(key);
    }
  }

  private wrappedLinesFor(
    document: Document,
    chapterIndex: number,
    chapter: Chapter,
    formatted: FormattedChapter,
    width: number,
    options: WrapOptions,
  ): DisplayLine[] {
    const cacheKey = chapterCacheKey(document, chapterIndex);
    const compositeKey = `${width}|${wrapVariantKey(options)}`;

    let entries = this.wrappedCache.get(cacheKey);
    if (!entries) {
      entries = new Map();
      this.wrappedCache.set(cacheKey, entries);
    }

    const cached = entries.get(compositeKey);
    if (cached) return cached;

    const lines = buildDisplayLines(formatted.blocks, width, {
      chapterIndex,
      chapterSourcePath: chapter.metadata?.sourcePath ?? chapter.metadata?.href,
      imageRendering: options.config?.imageRendering === true,
      maxImageRows: maxImageRowsFor(options.linesPerPage),
      metrics: this.metrics,
    });
    entries.set(compositeKey, lines);
    return lines;
  }

  private applyToChapter(chapter: Chapter, formatted: FormattedChapter): void {
    chapter.blocks = formatted.blocks;
    if (chapter.lines.length === 0) chapter.lines = formatted.plainLines;
  }
}
