/**
 * Terminal text measurer for the layout engine
 *
 * Measures strings in terminal cells, grapheme cluster by grapheme cluster.
 *
 * Responsibilities:
 * - Segment text into user-perceived characters (Intl.Segmenter)
 * - Resolve per-cluster cell width (string-width: East Asian wide = 2,
 *   combining marks merge into their base, emoji sequences = 2)
 * - Strip ANSI SGR/CSI sequences before measuring
 * - Expand tabs to the next tab stop
 * - Truncate styled text to a width without splitting clusters or escapes
 *
 * Width rules:
 * - Tab: expanded to TAB_SIZE stops before measuring
 * - Soft hyphen (U+00AD): 0 cells
 * - Any other non-empty cluster the width table reports as 0 counts as 1, so
 *   every visible cell keeps a distinct screen column
 */

import stringWidth from 'string-width';
import stripAnsiSequences from 'strip-ansi';
import type { CellData, TextMetrics } from '@leafline/contracts';

export const TAB_SIZE = 4;

const SOFT_HYPHEN = '\u00ad';
const CSI_PATTERN = /\u001b\[[0-?]*[ -\/]*[@-~]/g;

const WIDTH_CACHE_SIZE = 5000;

const clusterWidthCache = new Map<string, number>();

export function clearMeasurementCache(): void {
  clusterWidthCache.clear();
}

function evictOldest(): void {
  const oldest = clusterWidthCache.keys().next();
  if (oldest.done === true) return;
  clusterWidthCache.delete(oldest.value);
}

const graphemeSegmenter = new Intl.Segmenter(undefined, { granularity: 'grapheme' });

/** Splits `text` into grapheme clusters. */
export function graphemeClusters(text: string): string[] {
  const clusters: string[] = [];
  for (const { segment } of graphemeSegmenter.segment(text)) {
    clusters.push(segment);
  }
  return clusters;
}

/** Cell width of a single grapheme cluster. */
export function displayWidthFor(cluster: string): number {
  if (cluster === '\t') return TAB_SIZE;
  if (cluster === SOFT_HYPHEN) return 0;

  const cached = clusterWidthCache.get(cluster);
  if (cached !== undefined) return cached;

  let width = stringWidth(cluster);
  if (width <= 0 && cluster.length > 0) width = 1;

  if (clusterWidthCache.size >= WIDTH_CACHE_SIZE) evictOldest();
  clusterWidthCache.set(cluster, width);
  return width;
}

export function stripAnsi(text: string): string {
  return stripAnsiSequences(text);
}

/**
 * Replaces tabs with spaces up to the next multiple of `tabSize`, counting
 * columns from `startColumn`.
 */
export function expandTabs(text: string, tabSize = TAB_SIZE, startColumn = 0): string {
  if (!text.includes('\t')) return text;

  let column = startColumn;
  let buffer = '';
  for (const cluster of graphemeClusters(text)) {
    if (cluster === '\t') {
      const spaces = tabSize - (column % tabSize);
      buffer += ' '.repeat(spaces);
      column += spaces;
    } else {
      buffer += cluster;
      column += displayWidthFor(cluster);
    }
  }
  return buffer;
}

/**
 * Per-cluster layout of plain text (tabs expanded first).
 *
 * Character offsets index into the expanded string; `screenX` is the running
 * cell offset.
 */
export function cellDataFor(text: string): CellData[] {
  const expanded = expandTabs(text);
  const cells: CellData[] = [];
  let charIndex = 0;
  let screenX = 0;

  for (const cluster of graphemeClusters(expanded)) {
    const displayWidth = displayWidthFor(cluster);
    cells.push({
      cluster,
      charStart: charIndex,
      charEnd: charIndex + cluster.length,
      displayWidth,
      screenX,
    });
    charIndex += cluster.length;
    screenX += displayWidth;
  }

  return cells;
}

export function visibleLength(text: string): number {
  let total = 0;
  for (const cell of cellDataFor(stripAnsi(text))) total += cell.displayWidth;
  return total;
}

/** Splits styled text into CSI escapes and grapheme clusters, in order. */
function styledTokens(text: string): string[] {
  const tokens: string[] = [];
  let last = 0;
  for (const match of text.matchAll(CSI_PATTERN)) {
    const index = match.index ?? 0;
    if (index > last) tokens.push(...graphemeClusters(text.slice(last, index)));
    tokens.push(match[0]);
    last = index + match[0].length;
  }
  if (last < text.length) tokens.push(...graphemeClusters(text.slice(last)));
  return tokens;
}

/**
 * Truncates possibly-styled text to `width` cells.
 *
 * Escape sequences pass through untouched. Tabs expand relative to
 * `startColumn`; newlines become single spaces. A wide cluster that does not
 * fit is dropped rather than split.
 */
export function truncateTo(text: string, width: number, options: { startColumn?: number } = {}): string {
  const maxWidth = Math.floor(width);
  if (!(maxWidth > 0) || text.length === 0) return '';

  if (!/[\t\n\r]/.test(text) && maxWidth >= visibleLength(text)) return text;

  let buffer = '';
  let currentWidth = 0;
  let column = options.startColumn ?? 0;

  for (const token of styledTokens(text)) {
    if (token.startsWith('\u001b[')) {
      buffer += token;
      continue;
    }
    if (token === '\u001b') continue;

    const remaining = maxWidth - currentWidth;
    if (remaining <= 0) break;

    if (token === '\t') {
      const take = Math.min(TAB_SIZE - (column % TAB_SIZE), remaining);
      buffer += ' '.repeat(take);
      currentWidth += take;
      column += take;
    } else if (token === '\n' || token === '\r' || token === '\r\n') {
      buffer += ' ';
      currentWidth += 1;
      column += 1;
    } else {
      const tokenWidth = displayWidthFor(token);
      if (tokenWidth > remaining) break;
      buffer += token;
      currentWidth += tokenWidth;
      column += tokenWidth;
    }
  }

  return buffer;
}

export function padCenter(text: string, width: number, pad = ' '): string {
  if (width <= 0) return '';
  const clipped = truncateTo(text, width);
  const padLength = width - visibleLength(clipped);
  if (padLength <= 0) return clipped;
  const left = Math.floor(padLength / 2);
  return pad.repeat(left) + clipped + pad.repeat(padLength - left);
}

/** The default {@link TextMetrics} used by the layout packages. */
export const terminalTextMetrics: TextMetrics = {
  visibleLength,
  cellDataFor,
  truncateTo,
  stripAnsi,
};
