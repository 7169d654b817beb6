export {
  LayoutError,
  ParseError,
  isLayoutError,
  toLayoutError,
  type LayoutErrorCode,
} from './errors';
export { debugLog, isLayoutDebugEnabled, type DebugLevel } from './debug';
export {
  DEFAULT_LAYOUT_CONFIG,
  DEFAULT_LINE_SPACING,
  LINE_SPACING_MULTIPLIERS,
  LINE_SPACING_VALUES,
  VIEW_MODES,
  resolveLayoutConfig,
  type LayoutConfig,
  type LineSpacing,
  type PageNumberingMode,
  type ViewMode,
} from './config';
export { geometryKeyFor, compareAnchors, anchorTuple } from './geometry';

// ============================================================================
// Semantic block model
// ============================================================================

/** Kinds of semantic content produced by the chapter parser. */
export type BlockKind =
  | 'heading'
  | 'paragraph'
  | 'list_item'
  | 'quote'
  | 'code'
  | 'table'
  | 'separator'
  | 'break'
  | 'image';

/** Source reference for an image (block-level or inline). */
export type ImageRef = {
  src: string | null;
  alt?: string | null;
};

/**
 * Inline styles carried by a text segment.
 *
 * Every field is optional; two segments are style-equal when the same keys are
 * set to the same values (see `stylesEqual` in the layout engine).
 */
export type SegmentStyles = {
  bold?: boolean;
  italic?: boolean;
  underline?: boolean;
  /** Monospace content; whitespace is preserved. */
  code?: boolean;
  preserveWhitespace?: boolean;
  /** Segment came from a `<br>` and carries a literal newline. */
  break?: boolean;
  /** Hyperlink target. */
  link?: string;
  /** Inline image reference; the segment text is the alt fallback. */
  inlineImage?: ImageRef;
  /** Synthetic prefix token (quote bar, list marker). */
  prefix?: boolean;
  separator?: boolean;
};

/** Smallest styled unit of content. */
export type TextSegment = {
  text: string;
  styles: SegmentStyles;
};

export type BlockMetadata = {
  /** List marker (`•`, `1.`). */
  marker?: string;
  /** Block sits inside a blockquote. */
  quoted?: boolean;
  preserveWhitespace?: boolean;
  image?: ImageRef;
};

/** A semantic block of chapter content. Immutable once produced. */
export type ContentBlock = {
  kind: BlockKind;
  /** Heading level (1-6) or list nesting depth (1-based). 0 otherwise. */
  level: number;
  segments: TextSegment[];
  metadata: BlockMetadata;
};

// ============================================================================
// Display lines
// ============================================================================

/** Placement hints for a terminal image placeholder block. */
export type ImageRenderHint = {
  cols: number;
  rows: number;
  /** Stable 32-bit placement id (never 0). */
  placementId: number;
  /** Column offset for inline images drawn after a continuation indent. */
  colOffset?: number;
};

/**
 * Per-line metadata so renderers can special-case lines without re-deriving
 * block context.
 */
export type LineMetadata = {
  blockType?: BlockKind;
  /** Blank line inserted between blocks. */
  spacer?: boolean;
  list?: boolean;
  quoted?: boolean;
  chapterIndex?: number;
  chapterSourcePath?: string;
  image?: ImageRef;
  inlineImage?: boolean;
  imageRender?: ImageRenderHint;
  /** First row of an image placeholder block (the row that draws the image). */
  imageRenderLine?: boolean;
  imageLineIndex?: number;
  imageSpacer?: boolean;
};

/** One screen row of wrapped content. */
export type DisplayLine = {
  /** Plain text, right-trimmed. */
  text: string;
  segments: TextSegment[];
  metadata: LineMetadata;
};

/** A wrapped line as stored on pages: formatted, or plain on fallback paths. */
export type PageLine = DisplayLine | string;

export const isDisplayLine = (line: unknown): line is DisplayLine => {
  if (!line || typeof line !== 'object') return false;
  if (!('text' in line) || !('segments' in line)) return false;
  return typeof line.text === 'string' && Array.isArray(line.segments);
};

/** Plain text of a page line regardless of its representation. */
export const pageLineText = (line: PageLine): string => (typeof line === 'string' ? line : line.text);

// ============================================================================
// Pagination
// ============================================================================

/** Persisted page entry (no lines). */
export type CompactPage = {
  chapterIndex: number;
  pageInChapter: number;
  totalPagesInChapter: number;
  startLine: number;
  endLine: number;
};

/**
 * A page of the dynamic page map. `lines` is absent on cache-loaded stubs
 * until hydrated.
 */
export type PageRecord = CompactPage & {
  lines?: PageLine[];
};

/** Reports `(doneChapters, totalChapters)` after each chapter is paginated. */
export type ProgressCallback = (done: number, total: number) => void;

// ============================================================================
// Screen geometry
// ============================================================================

/** One grapheme cluster within a rendered line. */
export type LineCell = {
  cluster: string;
  /** UTF-16 offset of the cluster within the line's plain text. */
  charStart: number;
  charEnd: number;
  /** Terminal columns occupied (0, 1 or 2; tabs are expanded beforehand). */
  displayWidth: number;
  /** Column offset from the line's origin. */
  screenX: number;
};

/**
 * Layout of one rendered line within a frame.
 *
 * `row` and `columnOrigin` are 1-based terminal cells. `key` is derived from
 * `(pageId, columnId, row, columnOrigin)` so re-rendering the same screen
 * position overwrites the previous record.
 */
export type LineGeometry = {
  key: string;
  pageId: number;
  columnId: number;
  row: number;
  columnOrigin: number;
  lineOffset: number;
  plainText: string;
  styledText: string;
  cells: LineCell[];
};

/** Rendered lines of the current frame, keyed by geometry key. */
export type RenderedLines = ReadonlyMap<string, LineGeometry>;

/** One boundary of a text selection, in geometry terms. */
export type SelectionAnchor = {
  pageId: number;
  columnId: number;
  geometryKey: string;
  lineOffset: number;
  /** Boundary index in `[0, cells.length]`. */
  cellIndex: number;
  row: number;
  columnOrigin: number;
};

/** 0-based screen coordinate as reported by terminal mouse events. */
export type ScreenPoint = {
  x: number;
  y: number;
};

export type SelectionEndpoint = SelectionAnchor | ScreenPoint;

export type SelectionRange = {
  start: SelectionEndpoint;
  end: SelectionEndpoint;
};

export type NormalizedSelection = {
  start: SelectionAnchor;
  end: SelectionAnchor;
};

/** How a point between two cell boundaries snaps. */
export type AnchorBias = 'leading' | 'trailing' | 'nearest';

/** 1-based rectangle on the terminal. */
export type Bounds = {
  x: number;
  y: number;
  width: number;
  height: number;
};

// ============================================================================
// Collaborators
// ============================================================================

export type ChapterMetadata = {
  sourcePath?: string;
  href?: string;
};

/**
 * A chapter as provided by the document loader. The formatting service
 * memoizes `blocks` (and `lines` when empty) back onto it.
 */
export interface Chapter {
  readonly rawContent: string | null;
  lines: string[];
  blocks?: ContentBlock[];
  readonly metadata?: ChapterMetadata;
}

export interface Document {
  readonly canonicalPath: string;
  readonly chapterCount: number;
  getChapter(index: number): Chapter | null;
}

/** Cell data for one grapheme cluster, as produced by {@link TextMetrics.cellDataFor}. */
export type CellData = LineCell;

export interface TextMetrics {
  /** Display width of `text` after stripping ANSI sequences. */
  visibleLength(text: string): number;
  cellDataFor(text: string): CellData[];
  truncateTo(text: string, width: number, options?: { startColumn?: number }): string;
  stripAnsi(text: string): string;
}

/** Render sink. `row` and `col` are absolute 1-based terminal cells inside `bounds`. */
export interface Surface {
  write(bounds: Bounds, row: number, col: number, text: string): void;
}

/** Persistence for compact page maps, scoped per document and layout key. */
export interface PaginationCache {
  layoutKey(width: number, height: number, viewMode: string, lineSpacing: string): string;
  loadForDocument(document: Document, key: string): Promise<CompactPage[] | null>;
  saveForDocument(document: Document, key: string, pages: CompactPage[]): Promise<boolean>;
}

/** Turns raw chapter markup into semantic blocks. */
export type ChapterParser = (raw: string) => ContentBlock[];
