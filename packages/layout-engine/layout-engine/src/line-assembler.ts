/**
 * Block-to-Line Assembler
 *
 * Converts semantic content blocks into fixed-width display lines:
 * - Headings, paragraphs, quotes and list items are greedy word-wrapped,
 *   with quote bars and list markers as line prefixes
 * - Code and table blocks keep their physical lines (right-trimmed)
 * - Separators become a box-drawing rule, breaks a blank line
 * - Renderable images become placeholder rows when image rendering is on
 *
 * One blank spacer line separates consecutive blocks, except between adjacent
 * list items; code, table and image blocks are always followed by one.
 */

import type { ContentBlock, DisplayLine, LineMetadata, TextMetrics } from '@leafline/contracts';
import { terminalTextMetrics } from '@leafline/measuring-terminal';
import { ImageBuilder, isRenderableImageSource } from './image-builder';
import { TextWrapper, type WrapOptions } from './text-wrapper';
import { tokenize } from './tokenizer';

export const MIN_LINE_WIDTH = 10;
export const SEPARATOR_MAX_WIDTH = 40;
export const QUOTE_PREFIX = '│ ';
export const DEFAULT_LIST_MARKER = '•';

export type LineAssemblerOptions = {
  chapterIndex?: number;
  chapterSourcePath?: string;
  /** Emit image placeholder rows for renderable images. */
  imageRendering?: boolean;
  /** Page-height hint capping image placeholder rows. */
  maxImageRows?: number | null;
  metrics?: TextMetrics;
};

const blankLine = (): DisplayLine => ({ text: '', segments: [], metadata: { spacer: true } });

const isPreformatted = (block: ContentBlock): boolean => block.kind === 'code' || block.kind === 'table';

const forcesSpacerAfter = (block: ContentBlock): boolean => isPreformatted(block) || block.kind === 'image';

export class LineAssembler {
  private readonly width: number;
  private readonly metrics: TextMetrics;
  private readonly imageRendering: boolean;
  private readonly imageBuilder: ImageBuilder;
  private readonly textWrapper: TextWrapper;

  constructor(
    width: number,
    private readonly options: LineAssemblerOptions = {},
  ) {
    this.width = Number.isFinite(width) ? Math.max(Math.floor(width), MIN_LINE_WIDTH) : MIN_LINE_WIDTH;
    this.metrics = options.metrics ?? terminalTextMetrics;
    this.imageRendering = options.imageRendering === true;
    this.imageBuilder = new ImageBuilder({
      width: this.width,
      chapterIndex: options.chapterIndex,
      chapterSourcePath: options.chapterSourcePath,
      maxImageRows: options.maxImageRows,
    });
    this.textWrapper = new TextWrapper(this.width, this.metrics, this.imageBuilder);
  }

  build(blocks: readonly ContentBlock[]): DisplayLine[] {
    const produced = blocks
      .map((block, index) => ({ block, lines: this.linesForBlock(block, index) }))
      .filter((entry) => entry.lines.length > 0);

    const lines: DisplayLine[] = [];
    produced.forEach((entry, index) => {
      lines.push(...entry.lines);
      const next = produced[index + 1];
      if (!next) return;
      if (forcesSpacerAfter(entry.block) || !(entry.block.kind === 'list_item' && next.block.kind === 'list_item')) {
        lines.push(blankLine());
      }
    });
    return lines;
  }

  private metadataFor(block: ContentBlock): LineMetadata {
    const metadata: LineMetadata = { blockType: block.kind };
    if (block.metadata.quoted) metadata.quoted = true;
    if (block.metadata.image) metadata.image = block.metadata.image;
    if (this.options.chapterIndex !== undefined) metadata.chapterIndex = this.options.chapterIndex;
    if (this.options.chapterSourcePath !== undefined) metadata.chapterSourcePath = this.options.chapterSourcePath;
    return metadata;
  }

  private linesForBlock(block: ContentBlock, index: number): DisplayLine[] {
    if (isPreformatted(block)) return this.preformattedLines(block);
    if (block.kind === 'separator') return [this.separatorLine()];
    if (block.kind === 'break') return [blankLine()];
    if (block.kind === 'image' && this.imageRendering && this.imageBuilder.isRenderableBlock(block)) {
      return this.imageBuilder.blockLines(block, index, this.metadataFor(block));
    }
    return this.wrappedBlockLines(block);
  }

  private wrappedBlockLines(block: ContentBlock): DisplayLine[] {
    const tokens = tokenize(block.segments, {
      imageRendering: this.imageRendering,
      isRenderableSource: isRenderableImageSource,
    });
    const hasContent = tokens.some((token) => token.kind !== 'text' || token.text.trim() !== '');
    if (!hasContent) return [];

    return this.textWrapper.wrap(tokens, this.wrapOptionsFor(block));
  }

  private wrapOptionsFor(block: ContentBlock): WrapOptions {
    const metadata = this.metadataFor(block);

    switch (block.kind) {
      case 'heading':
        return { metadata, prefix: '', continuationPrefix: '' };
      case 'list_item': {
        const indent = '  '.repeat(Math.max(block.level - 1, 0));
        const marker = block.metadata.marker ?? DEFAULT_LIST_MARKER;
        return {
          metadata: { ...metadata, list: true },
          prefix: `${indent}${marker} `,
          continuationPrefix: indent + ' '.repeat(this.metrics.visibleLength(marker) + 1),
        };
      }
      case 'quote':
        return { metadata, prefix: QUOTE_PREFIX, continuationPrefix: QUOTE_PREFIX };
      default:
        return { metadata };
    }
  }

  private preformattedLines(block: ContentBlock): DisplayLine[] {
    const text = block.segments.map((segment) => segment.text).join('');
    const styles = { ...(block.segments[0]?.styles ?? {}), code: true };
    const metadata = this.metadataFor(block);

    const rows = text.split(/\r?\n/).map((row) => row.trimEnd());
    while (rows.length > 0 && rows[rows.length - 1] === '') rows.pop();

    return rows.map((row) => ({
      text: row,
      segments: row === '' ? [] : [{ text: row, styles }],
      metadata,
    }));
  }

  private separatorLine(): DisplayLine {
    const bar = '─'.repeat(Math.min(this.width, SEPARATOR_MAX_WIDTH));
    return {
      text: bar,
      segments: [{ text: bar, styles: { separator: true } }],
      metadata: { blockType: 'separator' },
    };
  }
}

/** Wraps `blocks` into display lines at `width` (clamped to at least 10). */
export function buildDisplayLines(
  blocks: readonly ContentBlock[],
  width: number,
  options: LineAssemblerOptions = {},
): DisplayLine[] {
  return new LineAssembler(width, options).build(blocks);
}
