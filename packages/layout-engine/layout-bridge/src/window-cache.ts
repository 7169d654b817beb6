import {
  debugLog,
  isDisplayLine,
  toLayoutError,
  type Document,
  type LayoutConfig,
  type PageLine,
} from '@leafline/contracts';
import { wrapVariantKey, type FormattingService } from './formatting-service';

export const DEFAULT_WINDOW_CACHE_CAPACITY = 64;
export const DEFAULT_PREFETCH_PAGES = 2;

export type WindowKey = {
  document: Document;
  chapterIndex: number;
  width: number;
  variant: string;
  offset: number;
  length: number;
};

const serializeWindowKey = (key: WindowKey): string =>
  [key.document.canonicalPath, key.chapterIndex, key.width, key.variant, key.offset, key.length].join('|');

/** Formatted, non-empty windows only; plain fallback lines are served uncached. */
export const isCacheableWindow = (lines: readonly PageLine[]): boolean =>
  lines.length > 0 && lines.every((line) => isDisplayLine(line));

/**
 * Bounded LRU of wrapped windows.
 *
 * Writes are insert-if-absent: a window computed twice (a prefetch racing the
 * frame that needs it) keeps the first result.
 */
export class WindowCache {
  private readonly entries = new Map<string, readonly PageLine[]>();
  private readonly capacity: number;

  constructor(capacity = DEFAULT_WINDOW_CACHE_CAPACITY) {
    this.capacity = Math.max(Math.floor(capacity), 1);
  }

  get size(): number {
    return this.entries.size;
  }

  has(key: WindowKey): boolean {
    return this.entries.has(serializeWindowKey(key));
  }

  get(key: WindowKey): readonly PageLine[] | undefined {
    const id = serializeWindowKey(key);
    const lines = this.entries.get(id);
    if (lines === undefined) return undefined;
    this.entries.delete(id);
    this.entries.set(id, lines);
    return lines;
  }

  /** Stores `lines` unless the window is already cached; returns the stored value. */
  set(key: WindowKey, lines: readonly PageLine[]): readonly PageLine[] {
    const existing = this.get(key);
    if (existing !== undefined) return existing;

    this.entries.set(serializeWindowKey(key), lines);
    while (this.entries.size > this.capacity) {
      const oldest = this.entries.keys().next();
      if (oldest.done === true) break;
      this.entries.delete(oldest.value);
    }
    return lines;
  }

  fetch(key: WindowKey, compute: () => readonly PageLine[]): readonly PageLine[] {
    return this.get(key) ?? this.set(key, compute());
  }

  clear(): void {
    this.entries.clear();
  }

  /** Drops the windows of `document`. */
  invalidate(document: Document): void {
    const prefix = `${document.canonicalPath}|`;
    for (const id of [...this.entries.keys()]) {
      if (id.startsWith(prefix)) this.entries.delete(id);
    }
  }
}

export type PrefetchRequest = {
  document: Document;
  chapterIndex: number;
  width: number;
  /** Line offset of the window on screen. */
  offset: number;
  linesPerPage: number;
  config?: Pick<LayoutConfig, 'imageRendering'> | null;
  pagesBefore?: number;
  pagesAfter?: number;
};

/**
 * Wraps the windows around the current one into `cache`.
 *
 * Resolves with the number of windows newly stored.
 */
export async function prefetchWindows(
  formatting: FormattingService,
  cache: WindowCache,
  request: PrefetchRequest,
): Promise<number> {
  await Promise.resolve();

  const width = Math.floor(request.width);
  const length = Math.floor(request.linesPerPage);
  if (!(length > 0)) return 0;

  const before = request.pagesBefore ?? DEFAULT_PREFETCH_PAGES;
  const after = request.pagesAfter ?? DEFAULT_PREFETCH_PAGES;
  const variant = wrapVariantKey({ config: request.config, linesPerPage: request.linesPerPage });
  let stored = 0;

  for (let page = -before; page <= after; page++) {
    if (page === 0) continue;
    const offset = request.offset + page * length;
    if (offset < 0) continue;

    const key: WindowKey = {
      document: request.document,
      chapterIndex: request.chapterIndex,
      width,
      variant,
      offset,
      length,
    };
    if (cache.has(key)) continue;

    const lines = formatting.wrapWindow(request.document, request.chapterIndex, width, {
      offset,
      length,
      config: request.config,
      linesPerPage: request.linesPerPage,
    });
    if (!isCacheableWindow(lines)) continue;
    cache.set(key, lines);
    stored += 1;
  }

  return stored;
}

/** Fire-and-forget {@link prefetchWindows}; failures are logged at verbose level. */
export function schedulePrefetch(formatting: FormattingService, cache: WindowCache, request: PrefetchRequest): void {
  void prefetchWindows(formatting, cache, request).catch((error: unknown) => {
    const layoutError = toLayoutError(error);
    debugLog('verbose', '[WindowCache] Prefetch failed', {
      chapterIndex: request.chapterIndex,
      message: layoutError.message,
    });
  });
}
