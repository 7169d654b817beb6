import { describe, expect, it } from 'vitest';
import type { DisplayLine, PageLine } from '@leafline/contracts';
import { snapOffsetToImageStart } from '../src/offset-snapping';

const textLine = (text: string): DisplayLine => ({ text, segments: [{ text, styles: {} }], metadata: {} });

const imageLine = (index: number): DisplayLine => ({
  text: '',
  segments: [],
  metadata: {
    blockType: 'image',
    imageRender: { cols: 36, rows: 3, placementId: 7 },
    imageRenderLine: index === 0,
    imageLineIndex: index,
    imageSpacer: index !== 0,
  },
});

const lines: PageLine[] = [
  textLine('before'),
  { text: '', segments: [], metadata: { spacer: true } },
  imageLine(0),
  imageLine(1),
  imageLine(2),
  textLine('after'),
];

const windowAt = (offset: number): PageLine[] => lines.slice(offset, offset + 3);

describe('snapOffsetToImageStart', () => {
  it('moves a window starting inside an image block back to its render line', () => {
    expect(snapOffsetToImageStart(windowAt(3), 3)).toBe(2);
    expect(snapOffsetToImageStart(windowAt(4), 4)).toBe(2);
  });

  it('leaves other offsets alone', () => {
    expect(snapOffsetToImageStart(windowAt(2), 2)).toBe(2);
    expect(snapOffsetToImageStart(windowAt(5), 5)).toBe(5);
    expect(snapOffsetToImageStart(windowAt(1), 1)).toBe(1);
    expect(snapOffsetToImageStart([], 40)).toBe(40);
  });

  it('never returns a negative offset', () => {
    expect(snapOffsetToImageStart(windowAt(0), -3)).toBe(0);
    expect(snapOffsetToImageStart([imageLine(2)], 1)).toBe(0);
  });

  it('ignores plain fallback lines', () => {
    expect(snapOffsetToImageStart(['two'], 1)).toBe(1);
  });
});
