export type ViewMode = 'single' | 'split';
export type LineSpacing = 'compact' | 'normal' | 'relaxed';
export type PageNumberingMode = 'absolute' | 'dynamic';

export const VIEW_MODES: readonly ViewMode[] = ['split', 'single'];
export const LINE_SPACING_VALUES: readonly LineSpacing[] = ['compact', 'normal', 'relaxed'];

export const DEFAULT_LINE_SPACING: LineSpacing = 'compact';

/** Fraction of the content height used for text at each spacing. */
export const LINE_SPACING_MULTIPLIERS: Readonly<Record<LineSpacing, number>> = {
  compact: 1.0,
  normal: 0.75,
  relaxed: 0.5,
};

/**
 * Reader settings that affect layout.
 *
 * Passed explicitly to every layout entry point; wrapped-line and pagination
 * cache keys are derived from it.
 */
export type LayoutConfig = {
  viewMode: ViewMode;
  lineSpacing: LineSpacing;
  pageNumberingMode: PageNumberingMode;
  /** Inline terminal image placeholders. Changes the wrapped-line cache variant. */
  imageRendering: boolean;
};

export const DEFAULT_LAYOUT_CONFIG: Readonly<LayoutConfig> = {
  viewMode: 'split',
  lineSpacing: DEFAULT_LINE_SPACING,
  pageNumberingMode: 'dynamic',
  imageRendering: false,
};

export const resolveLayoutConfig = (partial?: Partial<LayoutConfig> | null): LayoutConfig => ({
  viewMode: partial?.viewMode ?? DEFAULT_LAYOUT_CONFIG.viewMode,
  lineSpacing: partial?.lineSpacing ?? DEFAULT_LAYOUT_CONFIG.lineSpacing,
  pageNumberingMode: partial?.pageNumberingMode ?? DEFAULT_LAYOUT_CONFIG.pageNumberingMode,
  imageRendering: partial?.imageRendering ?? DEFAULT_LAYOUT_CONFIG.imageRendering,
});
