import { createHash } from 'node:crypto';
import type { ContentBlock, DisplayLine, ImageRef, ImageRenderHint, LineMetadata } from '@leafline/contracts';

const RENDERABLE_EXTENSIONS: ReadonlySet<string> = new Set(['.png', '.jpg', '.jpeg']);

export const MIN_IMAGE_ROWS = 4;
export const MAX_IMAGE_ROWS = 18;

export type ImageBuilderOptions = {
  width: number;
  chapterIndex?: number;
  chapterSourcePath?: string;
  /** Page-height hint; image placeholders never exceed it. */
  maxImageRows?: number | null;
};

/** Whether a terminal image protocol can draw `src` (PNG or JPEG, ignoring query and fragment). */
export function isRenderableImageSource(src: string | null | undefined): boolean {
  if (!src) return false;
  const path = src.split(/[?#]/, 1)[0];
  const dot = path.lastIndexOf('.');
  if (dot <= path.lastIndexOf('/')) return false;
  return RENDERABLE_EXTENSIONS.has(path.slice(dot).toLowerCase());
}

/** First four bytes of the SHA-1 of `seed`, big-endian; never 0. */
export function placementIdFor(seed: string): number {
  const id = createHash('sha1').update(seed).digest().readUInt32BE(0);
  return id === 0 ? 1 : id;
}

/**
 * Builds placeholder display lines for block-level and inline images.
 *
 * An image occupies `rows` lines: the first carries `imageRenderLine` and is
 * where the painter draws, the rest are spacers reserving the area.
 */
export class ImageBuilder {
  private readonly width: number;
  private readonly chapterIndex?: number;
  private readonly chapterSourcePath?: string;
  private readonly maxImageRows: number | null;
  private inlineCounter = 0;

  constructor(options: ImageBuilderOptions) {
    this.width = Math.max(Math.floor(options.width), 1);
    this.chapterIndex = options.chapterIndex;
    this.chapterSourcePath = options.chapterSourcePath;
    const rows = Math.floor(options.maxImageRows ?? 0);
    this.maxImageRows = rows > 0 ? rows : null;
  }

  isRenderableBlock(block: ContentBlock): boolean {
    return isRenderableImageSource(block.metadata.image?.src);
  }

  blockLines(block: ContentBlock, blockIndex: number, baseMetadata: LineMetadata): DisplayLine[] {
    const src = block.metadata.image?.src ?? '';
    const render: ImageRenderHint = {
      cols: this.width,
      rows: this.rowsFor(this.width),
      placementId: placementIdFor(`${this.chapterSourcePath ?? ''}|${src}|${blockIndex}`),
    };
    return this.imageLines({ ...baseMetadata, imageRender: render });
  }

  inlineLines(image: ImageRef, indentCols: number): DisplayLine[] {
    this.inlineCounter += 1;
    const cols = Math.max(this.width - indentCols, 1);
    const metadata: LineMetadata = {
      blockType: 'image',
      chapterIndex: this.chapterIndex,
      chapterSourcePath: this.chapterSourcePath,
      image: { src: image.src, alt: image.alt ?? null },
      inlineImage: true,
      imageRender: {
        cols,
        rows: this.rowsFor(cols),
        placementId: placementIdFor(`${this.chapterSourcePath ?? ''}|${image.src ?? ''}|inline|${this.inlineCounter}`),
        colOffset: indentCols,
      },
    };
    return this.imageLines(metadata);
  }

  /** Half the column count, clamped to [4, 18] and to the max-rows hint; at least 1. */
  rowsFor(cols: number): number {
    let rows = Math.min(Math.max(Math.round(cols * 0.5), MIN_IMAGE_ROWS), MAX_IMAGE_ROWS);
    if (this.maxImageRows !== null) rows = Math.min(rows, this.maxImageRows);
    return Math.max(rows, 1);
  }

  private imageLines(metadata: LineMetadata): DisplayLine[] {
    const rows = metadata.imageRender?.rows ?? 1;
    return Array.from({ length: rows }, (_, index) => ({
      text: '',
      segments: [],
      metadata: {
        ...metadata,
        imageRenderLine: index === 0,
        imageLineIndex: index,
        imageSpacer: index !== 0,
      },
    }));
  }
}
