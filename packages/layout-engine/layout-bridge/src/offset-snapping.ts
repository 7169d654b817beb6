import { isDisplayLine, type PageLine } from '@leafline/contracts';

/**
 * Moves a window start that lands inside an image placeholder block back to
 * the block's render line, so the image is drawn whole.
 *
 * `window` holds the lines fetched at `offset`; only its first line is read.
 */
export function snapOffsetToImageStart(window: readonly PageLine[], offset: number): number {
  if (offset <= 0) return Math.max(offset, 0);

  const first = window[0];
  if (!isDisplayLine(first)) return offset;

  const { imageRender, imageRenderLine, imageLineIndex } = first.metadata;
  if (!imageRender || imageRenderLine === true) return offset;

  return Math.max(offset - (imageLineIndex ?? 0), 0);
}
