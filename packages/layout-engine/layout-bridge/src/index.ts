export {
  FormattingService,
  checksumFor,
  chapterCacheKey,
  wrapVariantKey,
  type FormattedChapter,
  type FormattingServiceOptions,
  type WindowRequest,
  type WrapOptions,
} from './formatting-service';
export {
  WindowCache,
  DEFAULT_PREFETCH_PAGES,
  DEFAULT_WINDOW_CACHE_CAPACITY,
  isCacheableWindow,
  prefetchWindows,
  schedulePrefetch,
  type PrefetchRequest,
  type WindowKey,
} from './window-cache';
export {
  JsonPaginationCache,
  MemoryPaginationCache,
  MAX_LAYOUT_KEY_BYTES,
  PAGINATION_CACHE_VERSION,
  assertValidLayoutKey,
  compactPages,
  documentCacheId,
  isValidLayoutKey,
  layoutKey,
  parseCachedPages,
  type PaginationPayload,
} from './pagination-cache';
export { PageHydrator, type HydrationLayout } from './page-hydrator';
export {
  PageCalculator,
  type PageCalculatorOptions,
  type PageMapResult,
  type ReadingProgress,
} from './page-calculator';
export { snapOffsetToImageStart } from './offset-snapping';
export {
  WrappedLinesFetcher,
  type FetchRequest,
  type FetchedWindow,
  type WrappedLinesFetcherOptions,
} from './wrapped-lines-fetcher';
export {
  emptyPageInfo,
  pageInfoFor,
  type PageCount,
  type PageInfo,
  type PageInfoOptions,
  type PageInfoSource,
  type ReaderPosition,
} from './page-info';
export { buildLineGeometry, compareGeometries, geometryWidth, type LineGeometryInput } from './line-geometry';
export { CoordinateService, cellIndexForColumn, isSelectionAnchor } from './coordinate-service';
export { SelectionService } from './selection-service';
