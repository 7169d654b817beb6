import type { ImageRef, SegmentStyles, TextSegment } from '@leafline/contracts';

export type TextToken = {
  kind: 'text';
  text: string;
  styles: SegmentStyles;
};

export type NewlineToken = {
  kind: 'newline';
};

export type ImageToken = {
  kind: 'image';
  image: ImageRef;
};

/** Unit of work for the text wrapper. */
export type WrapToken = TextToken | NewlineToken | ImageToken;

export type TokenizeOptions = {
  imageRendering: boolean;
  isRenderableSource: (src: string | null | undefined) => boolean;
};

// Leading whitespace is its own token so it can be dropped at line starts;
// every word keeps its trailing whitespace.
const WORD_PATTERN = /^\s+|\S+\s*/g;

export const isWhitespaceToken = (token: TextToken): boolean => token.text.trim() === '';

export function splitWords(text: string, styles: SegmentStyles): TextToken[] {
  if (text === '') return [];
  const parts = text.match(WORD_PATTERN);
  if (!parts) return [{ kind: 'text', text, styles }];
  return parts.map((part) => ({ kind: 'text', text: part, styles }));
}

export function tokenizeText(text: string, styles: SegmentStyles): WrapToken[] {
  if (text === '') return [];
  if (!text.includes('\n')) return splitWords(text, styles);

  const tokens: WrapToken[] = [];
  for (const piece of text.split(/(\n)/)) {
    if (piece === '\n') tokens.push({ kind: 'newline' });
    else tokens.push(...splitWords(piece, styles));
  }
  return tokens;
}

/**
 * Turns styled segments into wrapping tokens. Inline image segments become
 * image tokens when image rendering is on and the source is renderable;
 * otherwise their placeholder text is wrapped like any other text.
 */
export function tokenize(segments: readonly TextSegment[], options: TokenizeOptions): WrapToken[] {
  const tokens: WrapToken[] = [];

  for (const segment of segments) {
    const inline = segment.styles.inlineImage;
    if (inline && options.imageRendering && options.isRenderableSource(inline.src)) {
      tokens.push({ kind: 'image', image: inline });
      continue;
    }
    tokens.push(...tokenizeText(segment.text, segment.styles));
  }

  return tokens;
}

export const prefixTokens = (prefix: string | null): TextToken[] =>
  prefix ? [{ kind: 'text', text: prefix, styles: { prefix: true } }] : [];
