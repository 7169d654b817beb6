import type { DisplayLine, LineMetadata, SegmentStyles, TextMetrics, TextSegment } from '@leafline/contracts';
import type { ImageBuilder } from './image-builder';
import { isWhitespaceToken, prefixTokens, type TextToken, type WrapToken } from './tokenizer';

export type WrapOptions = {
  metadata: LineMetadata;
  /** Prefix of the first line (quote bar, list marker). */
  prefix?: string | null;
  /** Prefix of continuation lines; defaults to blanks as wide as `prefix`. */
  continuationPrefix?: string | null;
};

const sameImageRef = (a: SegmentStyles['inlineImage'], b: SegmentStyles['inlineImage']): boolean => {
  if (a === b) return true;
  if (!a || !b) return false;
  return a.src === b.src && (a.alt ?? null) === (b.alt ?? null);
};

/** Two style records are equal when they set the same keys to the same values. */
export function stylesEqual(a: SegmentStyles, b: SegmentStyles): boolean {
  return (
    Boolean(a.bold) === Boolean(b.bold) &&
    Boolean(a.italic) === Boolean(b.italic) &&
    Boolean(a.underline) === Boolean(b.underline) &&
    Boolean(a.code) === Boolean(b.code) &&
    Boolean(a.preserveWhitespace) === Boolean(b.preserveWhitespace) &&
    Boolean(a.break) === Boolean(b.break) &&
    Boolean(a.prefix) === Boolean(b.prefix) &&
    Boolean(a.separator) === Boolean(b.separator) &&
    a.link === b.link &&
    sameImageRef(a.inlineImage, b.inlineImage)
  );
}

/** Merges adjacent tokens with equal styles; empty segments are dropped. */
export function mergeTokensIntoSegments(tokens: readonly TextToken[]): TextSegment[] {
  const merged: TextSegment[] = [];
  for (const token of tokens) {
    const last = merged[merged.length - 1];
    if (last && stylesEqual(last.styles, token.styles)) {
      merged[merged.length - 1] = { text: last.text + token.text, styles: last.styles };
    } else {
      merged.push({ text: token.text, styles: token.styles });
    }
  }
  return merged.filter((segment) => segment.text !== '');
}

/** In-progress line while tokens stream through the wrapper. */
class LineState {
  tokens: TextToken[] = [];
  width = 0;
  hasContent = false;

  constructor(
    firstPrefix: TextToken[],
    private readonly continuationPrefix: TextToken[],
    private readonly measure: (text: string) => number,
  ) {
    this.start(firstPrefix);
  }

  get indentCols(): number {
    return this.widthOf(this.continuationPrefix);
  }

  push(token: TextToken, width: number): void {
    this.tokens.push(token);
    this.width += width;
    this.hasContent = true;
  }

  resetToContinuation(): void {
    this.start(this.continuationPrefix);
  }

  private start(prefix: TextToken[]): void {
    this.tokens = [...prefix];
    this.width = this.widthOf(prefix);
    this.hasContent = false;
  }

  private widthOf(tokens: readonly TextToken[]): number {
    return tokens.reduce((sum, token) => sum + this.measure(token.text), 0);
  }
}

/**
 * Greedy word wrapper.
 *
 * Tokens are appended while `currentWidth + tokenWidth <= width`; whitespace
 * never starts a line. A word wider than a whole line is split between
 * grapheme clusters.
 */
export class TextWrapper {
  constructor(
    private readonly width: number,
    private readonly metrics: TextMetrics,
    private readonly imageBuilder: ImageBuilder,
  ) {}

  wrap(tokens: readonly WrapToken[], options: WrapOptions): DisplayLine[] {
    if (tokens.length === 0) return [];

    const prefix = options.prefix ?? null;
    const continuation =
      options.continuationPrefix ?? (prefix ? ' '.repeat(this.metrics.visibleLength(prefix)) : null);
    const state = new LineState(prefixTokens(prefix), prefixTokens(continuation), (text) =>
      this.metrics.visibleLength(text),
    );
    const wrapped: DisplayLine[] = [];

    for (const token of tokens) {
      switch (token.kind) {
        case 'image':
          if (state.hasContent) wrapped.push(this.finalizeLine(state, options.metadata));
          wrapped.push(...this.imageBuilder.inlineLines(token.image, state.indentCols));
          state.resetToContinuation();
          break;
        case 'newline':
          wrapped.push(this.finalizeLine(state, options.metadata));
          state.resetToContinuation();
          break;
        case 'text':
          this.appendText(token, state, options.metadata, wrapped);
          break;
      }
    }

    if (state.hasContent) wrapped.push(this.finalizeLine(state, options.metadata));
    return wrapped;
  }

  private appendText(token: TextToken, state: LineState, metadata: LineMetadata, wrapped: DisplayLine[]): void {
    const whitespace = isWhitespaceToken(token);
    const tokenWidth = this.metrics.visibleLength(token.text);

    if (state.hasContent && state.width + tokenWidth > this.width) {
      wrapped.push(this.finalizeLine(state, metadata));
      state.resetToContinuation();
      if (whitespace) return;
    }

    if (!state.hasContent && whitespace) return;

    if (state.width + tokenWidth > this.width) {
      this.appendOversized(token, state, metadata, wrapped);
      return;
    }

    state.push(token, tokenWidth);
  }

  private appendOversized(token: TextToken, state: LineState, metadata: LineMetadata, wrapped: DisplayLine[]): void {
    let chunk = '';
    let chunkWidth = 0;

    for (const cell of this.metrics.cellDataFor(token.text)) {
      if (chunk !== '' && state.width + chunkWidth + cell.displayWidth > this.width) {
        state.push({ kind: 'text', text: chunk, styles: token.styles }, chunkWidth);
        wrapped.push(this.finalizeLine(state, metadata));
        state.resetToContinuation();
        chunk = '';
        chunkWidth = 0;
      }
      chunk += cell.cluster;
      chunkWidth += cell.displayWidth;
    }

    if (chunk.trim() !== '') state.push({ kind: 'text', text: chunk, styles: token.styles }, chunkWidth);
  }

  private finalizeLine(state: LineState, metadata: LineMetadata): DisplayLine {
    return {
      text: state.tokens
        .map((token) => token.text)
        .join('')
        .trimEnd(),
      segments: mergeTokensIntoSegments(state.tokens),
      metadata,
    };
  }
}
