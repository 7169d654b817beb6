import type { ContentBlock } from '@leafline/contracts';
import { segmentsText } from './segments';

/**
 * Plain-text rendition of parsed blocks, used as the chapter's fallback lines.
 *
 * One entry per physical line of each block, with a blank line between blocks.
 */
export function buildPlainLines(blocks: readonly ContentBlock[]): string[] {
  const lines: string[] = [];

  blocks.forEach((block, index) => {
    if (index > 0) lines.push('');
    if (block.kind === 'break') return;

    const text = segmentsText(block.segments);
    const rows = text.split(/\r?\n/).map((row) => row.trimEnd());
    if (rows.length > 1 && rows[rows.length - 1] === '') rows.pop();
    lines.push(...rows);
  });

  return lines;
}
