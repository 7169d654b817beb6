export {
  LineAssembler,
  buildDisplayLines,
  DEFAULT_LIST_MARKER,
  MIN_LINE_WIDTH,
  QUOTE_PREFIX,
  SEPARATOR_MAX_WIDTH,
  type LineAssemblerOptions,
} from './line-assembler';
export { TextWrapper, mergeTokensIntoSegments, stylesEqual, type WrapOptions } from './text-wrapper';
export {
  tokenize,
  tokenizeText,
  splitWords,
  type ImageToken,
  type NewlineToken,
  type TextToken,
  type WrapToken,
} from './tokenizer';
export { ImageBuilder, isRenderableImageSource, placementIdFor, type ImageBuilderOptions } from './image-builder';
export {
  assertValidGeometry,
  columnWidthFor,
  computeLayoutMetrics,
  contentHeightFor,
  linesPerPageFor,
  singleColumnWidth,
  splitColumnWidth,
  type LayoutMetrics,
} from './layout-metrics';
export { buildAbsolutePageMap, buildDynamicPageMap, type ChapterLineWrapper } from './page-map';
