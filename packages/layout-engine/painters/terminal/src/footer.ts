import type { PageCount, PageInfo } from '@leafline/layout-bridge';
import { padCenter } from '@leafline/measuring-terminal';
import { SGR, SGR_RESET, type ComposedLine } from './styles';

const pageLabel = (count: PageCount): string => (count.total > 0 ? `${count.current} / ${count.total}` : '');

const withCodes = (text: string, code: number): string =>
  text.trim() === '' ? text : `\u001b[${code}m${text}${SGR_RESET}`;

/**
 * The footer row, `width` cells wide.
 *
 * Page numbers are centred under the page, or under each column in split
 * view; a transient message replaces them while it is shown.
 */
export function composeFooter(info: PageInfo, width: number, message?: string | null): ComposedLine {
  const columns = Math.floor(width);
  if (!(columns > 0)) return { plainText: '', styledText: '' };

  if (message) {
    const plainText = padCenter(` ${message} `, columns);
    return { plainText, styledText: withCodes(plainText, SGR.bold) };
  }

  let plainText: string;
  if (info.type === 'single') {
    plainText = padCenter(pageLabel(info), columns);
  } else {
    const half = Math.floor(columns / 2);
    plainText = padCenter(pageLabel(info.left), half) + padCenter(pageLabel(info.right), columns - half);
  }
  return { plainText, styledText: withCodes(plainText, SGR.dim) };
}
