import type { LineMetadata, PageLine, SegmentStyles, TextMetrics } from '@leafline/contracts';

export const SGR_RESET = '\u001b[0m';

/** SGR parameters used by the painter. */
export const SGR = {
  bold: 1,
  dim: 2,
  italic: 3,
  underline: 4,
  blue: 34,
  cyan: 36,
} as const;

/** SGR parameters for a segment, in a stable order. */
export function sgrCodesFor(styles: SegmentStyles, metadata: LineMetadata = {}): number[] {
  const codes = new Set<number>();
  if (styles.bold || metadata.blockType === 'heading') codes.add(SGR.bold);
  if (styles.prefix || styles.separator) codes.add(SGR.dim);
  if (styles.italic || (metadata.quoted && !styles.prefix)) codes.add(SGR.italic);
  if (styles.underline || styles.link) codes.add(SGR.underline);
  if (styles.link) codes.add(SGR.blue);
  if (styles.code) codes.add(SGR.cyan);
  return [...codes].sort((a, b) => a - b);
}

export function styleText(text: string, styles: SegmentStyles, metadata?: LineMetadata): string {
  const codes = sgrCodesFor(styles, metadata);
  if (codes.length === 0 || text === '') return text;
  return `\u001b[${codes.join(';')}m${text}${SGR_RESET}`;
}

export type ComposedLine = {
  plainText: string;
  styledText: string;
};

/**
 * Plain and SGR-styled text of a line, cut to `width` cells.
 *
 * Each segment is styled on its own and closed with a reset, so a cut never
 * leaves an attribute open.
 */
export function composeLine(line: PageLine, width: number, metrics: TextMetrics): ComposedLine {
  const columns = Math.floor(width);
  if (!(columns > 0)) return { plainText: '', styledText: '' };

  if (typeof line === 'string' || line.segments.length === 0) {
    const text = metrics.truncateTo(typeof line === 'string' ? line : line.text, columns);
    return { plainText: text, styledText: text };
  }

  let plainText = '';
  let styledText = '';
  let remaining = columns;

  for (const segment of line.segments) {
    if (remaining <= 0) break;
    if (segment.text === '') continue;

    const chunk =
      metrics.visibleLength(segment.text) <= remaining ? segment.text : metrics.truncateTo(segment.text, remaining);
    if (chunk === '') continue;

    plainText += chunk;
    styledText += styleText(chunk, segment.styles, line.metadata);
    remaining -= metrics.visibleLength(chunk);
  }

  return { plainText, styledText };
}
