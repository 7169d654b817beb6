/**
 * Wrapped Lines Fetcher
 *
 * Foreground access to wrapped windows:
 * - Serves windows from the {@link WindowCache}, wrapping through the
 *   formatting service on a miss
 * - Schedules a prefetch of the neighbouring pages after each window served
 * - Snaps windows that would start inside an image placeholder block back to
 *   the block's render line
 */

import type { Document, LayoutConfig, PageLine } from '@leafline/contracts';
import { wrapVariantKey, type FormattingService } from './formatting-service';
import { snapOffsetToImageStart } from './offset-snapping';
import {
  DEFAULT_PREFETCH_PAGES,
  WindowCache,
  isCacheableWindow,
  schedulePrefetch,
  type WindowKey,
} from './window-cache';

export type FetchRequest = {
  offset: number;
  length: number;
  config?: Pick<LayoutConfig, 'imageRendering'> | null;
  /** Page height: caps image rows and sizes prefetched windows. Defaults to `length`. */
  linesPerPage?: number | null;
};

export type FetchedWindow = {
  lines: readonly PageLine[];
  /** Offset the lines start at, after image snapping. */
  offset: number;
};

export type WrappedLinesFetcherOptions = {
  cache?: WindowCache;
  /** Pages pre-wrapped on each side of a served window; 0 turns prefetching off. */
  prefetchPages?: number;
};

export class WrappedLinesFetcher {
  private readonly cache: WindowCache;
  private readonly prefetchPages: number;

  constructor(
    private readonly formatting: FormattingService,
    options: WrappedLinesFetcherOptions = {},
  ) {
    this.cache = options.cache ?? new WindowCache();
    this.prefetchPages = Math.max(Math.floor(options.prefetchPages ?? DEFAULT_PREFETCH_PAGES), 0);
  }

  get windowCache(): WindowCache {
    return this.cache;
  }

  /** The `[offset, offset + length)` window of wrapped lines. */
  fetch(document: Document, chapterIndex: number, width: number, request: FetchRequest): readonly PageLine[] {
    const columns = Math.floor(width);
    const length = Math.floor(request.length);
    if (!(columns > 0) || !(length > 0)) return [];

    const offset = Math.max(Math.floor(request.offset), 0);
    const linesPerPage = request.linesPerPage ?? length;
    const key: WindowKey = {
      document,
      chapterIndex,
      width: columns,
      variant: wrapVariantKey({ config: request.config, linesPerPage }),
      offset,
      length,
    };

    let lines = this.cache.get(key);
    if (lines === undefined) {
      const wrapped = this.formatting.wrapWindow(document, chapterIndex, columns, {
        offset,
        length,
        config: request.config,
        linesPerPage,
      });
      lines = isCacheableWindow(wrapped) ? this.cache.set(key, wrapped) : wrapped;
    }

    if (this.prefetchPages > 0 && lines.length > 0) {
      schedulePrefetch(this.formatting, this.cache, {
        document,
        chapterIndex,
        width: columns,
        offset,
        linesPerPage,
        config: request.config,
        pagesBefore: this.prefetchPages,
        pagesAfter: this.prefetchPages,
      });
    }
    return lines;
  }

  /** Like {@link fetch}, but a window starting inside an image moves back to the image's first row. */
  fetchWithOffset(document: Document, chapterIndex: number, width: number, request: FetchRequest): FetchedWindow {
    const offset = Math.max(Math.floor(request.offset), 0);
    const lines = this.fetch(document, chapterIndex, width, { ...request, offset });
    const snapped = snapOffsetToImageStart(lines, offset);
    if (snapped === offset) return { lines, offset };

    return { lines: this.fetch(document, chapterIndex, width, { ...request, offset: snapped }), offset: snapped };
  }

  /** Drops cached windows and formatting results of `document`, or of every document. */
  invalidate(document?: Document): void {
    this.formatting.invalidate(document);
    if (document) this.cache.invalidate(document);
    else this.cache.clear();
  }
}
