import type { ChapterParser } from '@leafline/contracts';
import { parseChapterXhtml } from './parser';

export { parseChapterXhtml } from './parser';
export { buildPlainLines } from './plain-lines';
export {
  IMAGE_PLACEHOLDER,
  collectSegments,
  normalizeText,
  segmentsText,
  stylesFor,
  tidySegments,
} from './segments';
export { parseXmlTree, findElement, textContent } from './xml-tree';
export type { XmlElement, XmlNode, XmlText } from './xml-tree';

/** Default {@link ChapterParser} for EPUB chapter documents. */
export const xhtmlChapterParser: ChapterParser = parseChapterXhtml;
