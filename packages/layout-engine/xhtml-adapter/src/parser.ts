/**
 * Chapter XHTML Parser
 *
 * Converts chapter markup into semantic content blocks:
 * - Headings, paragraphs and block containers → `heading` / `paragraph`
 * - Lists → one `list_item` per `<li>` with marker and nesting level
 * - `<blockquote>` → `quote`; `<pre>` → `code`; `<table>` → `table`
 * - `<hr>` → `separator`; top-level `<br>` → `break`; `<img>` → `image`
 *
 * Inline formatting (bold, italic, underline, code, links, inline images)
 * becomes segment styles.
 */

import { LayoutError, debugLog, type BlockMetadata, type ContentBlock, type TextSegment } from '@leafline/contracts';
import {
  IMAGE_PLACEHOLDER,
  INLINE_NEWLINE,
  SKIPPED_ELEMENTS,
  collectSegments,
  imageRefFor,
  segmentsText,
  textSegment,
  tidySegments,
} from './segments';
import {
  childElements,
  findDescendants,
  findElement,
  isElement,
  parseXmlTree,
  textContent,
  type XmlElement,
  type XmlNode,
} from './xml-tree';

const BLOCK_TYPES: ReadonlySet<string> = new Set([
  'p',
  'div',
  'section',
  'article',
  'aside',
  'header',
  'footer',
  'figure',
  'figcaption',
  'main',
  'nav',
  'dd',
  'dt',
]);
const HEADING_TYPES: ReadonlySet<string> = new Set(['h1', 'h2', 'h3', 'h4', 'h5', 'h6']);
const LIST_TYPES: ReadonlySet<string> = new Set(['ul', 'ol']);
const STRUCTURAL_TYPES: ReadonlySet<string> = new Set([
  ...BLOCK_TYPES,
  ...HEADING_TYPES,
  ...LIST_TYPES,
  'li',
  'blockquote',
  'pre',
  'hr',
  'table',
  'dl',
]);

const SEPARATOR_TEXT = '─'.repeat(40);

type ListContext = {
  ordered: boolean;
  index: number;
};

type ParseContext = {
  listStack: ListContext[];
  inBlockquote: boolean;
};

const baseMetadata = (context: ParseContext): BlockMetadata => (context.inBlockquote ? { quoted: true } : {});

const createBlock = (
  kind: ContentBlock['kind'],
  segments: TextSegment[],
  context: ParseContext,
  extra: Partial<Pick<ContentBlock, 'level'>> & { metadata?: BlockMetadata } = {},
): ContentBlock => ({
  kind,
  level: extra.level ?? 0,
  segments,
  metadata: { ...baseMetadata(context), ...extra.metadata },
});

const blockViaStyle = (element: XmlElement): boolean =>
  /display\s*:\s*(block|list-item)/i.test(element.attributes.style ?? '');

const hasStructuralChildren = (element: XmlElement): boolean =>
  childElements(element).some((child) => STRUCTURAL_TYPES.has(child.name) || blockViaStyle(child));

function buildHeading(element: XmlElement, context: ParseContext): ContentBlock | null {
  const segments = tidySegments(collectSegments(element.children));
  if (segments.length === 0) return null;
  return createBlock('heading', segments, context, { level: Number(element.name.slice(1)) });
}

function buildQuote(element: XmlElement, context: ParseContext): ContentBlock | null {
  const inner: ParseContext = { ...context, inBlockquote: true };
  const segments = tidySegments(collectSegments(element.children));
  if (segments.length === 0) return null;
  return createBlock('quote', segments, inner);
}

function buildListItem(element: XmlElement, blocks: ContentBlock[], context: ParseContext): void {
  const list = context.listStack[context.listStack.length - 1];
  const marker = list?.ordered ? `${list.index}.` : '•';
  if (list?.ordered) list.index += 1;

  const inline = element.children.filter((child) => !isElement(child) || !LIST_TYPES.has(child.name));
  const segments = tidySegments(collectSegments(inline));
  if (segments.length > 0) {
    const level = context.listStack.length;
    blocks.push(createBlock('list_item', segments, context, { level, metadata: { marker } }));
  }

  for (const child of childElements(element)) {
    if (LIST_TYPES.has(child.name)) handleElement(child, blocks, context);
  }
}

function traverseList(element: XmlElement, blocks: ContentBlock[], context: ParseContext): void {
  const ordered = element.name === 'ol';
  const start = Number.parseInt(element.attributes.start ?? '', 10);
  const nested: ParseContext = {
    listStack: [...context.listStack, { ordered, index: Number.isFinite(start) ? start : 1 }],
    inBlockquote: context.inBlockquote,
  };
  for (const child of childElements(element)) {
    handleElement(child, blocks, nested);
  }
}

function buildPreformatted(element: XmlElement, context: ParseContext): ContentBlock | null {
  const code = childElements(element).find((child) => child.name === 'code');
  const text = textContent(code ?? element);
  if (text.trim() === '') return null;
  return createBlock('code', [textSegment(text, { code: true, preserveWhitespace: true })], context, {
    metadata: { preserveWhitespace: true },
  });
}

function buildTable(element: XmlElement, context: ParseContext): ContentBlock | null {
  const rows = findDescendants(element, 'tr');
  if (rows.length === 0) return null;

  const lines = rows.map((row) =>
    childElements(row)
      .filter((cell) => cell.name === 'td' || cell.name === 'th')
      .map((cell) => segmentsText(tidySegments(collectSegments(cell.children))).trim())
      .filter((cell) => cell !== '')
      .join(' | '),
  );

  return createBlock('table', [textSegment(lines.join(INLINE_NEWLINE), { preserveWhitespace: true })], context, {
    metadata: { preserveWhitespace: true },
  });
}

function buildImage(element: XmlElement, context: ParseContext): ContentBlock {
  return createBlock('image', [textSegment(IMAGE_PLACEHOLDER)], context, {
    metadata: { image: imageRefFor(element) },
  });
}

function buildParagraph(nodes: XmlNode[], context: ParseContext): ContentBlock | null {
  const segments = tidySegments(collectSegments(nodes));
  if (segments.length === 0) return null;
  return createBlock('paragraph', segments, context);
}

function pushBlock(blocks: ContentBlock[], block: ContentBlock | null): void {
  if (block) blocks.push(block);
}

function handleElement(element: XmlElement, blocks: ContentBlock[], context: ParseContext): void {
  const name = element.name;
  if (SKIPPED_ELEMENTS.has(name)) return;

  if (HEADING_TYPES.has(name)) {
    pushBlock(blocks, buildHeading(element, context));
  } else if (name === 'blockquote') {
    pushBlock(blocks, buildQuote(element, context));
  } else if (LIST_TYPES.has(name)) {
    traverseList(element, blocks, context);
  } else if (name === 'li') {
    buildListItem(element, blocks, context);
  } else if (name === 'pre') {
    pushBlock(blocks, buildPreformatted(element, context));
  } else if (name === 'hr') {
    blocks.push(createBlock('separator', [textSegment(SEPARATOR_TEXT)], context));
  } else if (name === 'table') {
    pushBlock(blocks, buildTable(element, context));
  } else if (name === 'img' || name === 'image') {
    blocks.push(buildImage(element, context));
  } else if (name === 'br') {
    blocks.push(createBlock('break', [], context));
  } else if (BLOCK_TYPES.has(name) || blockViaStyle(element)) {
    if (hasStructuralChildren(element)) traverseChildren(element.children, blocks, context);
    else pushBlock(blocks, buildParagraph(element.children, context));
  } else {
    traverseChildren(element.children, blocks, context);
  }
}

function traverseChildren(nodes: XmlNode[], blocks: ContentBlock[], context: ParseContext): void {
  for (const node of nodes) {
    if (isElement(node)) {
      handleElement(node, blocks, context);
    } else if (node.value.trim() !== '') {
      pushBlock(blocks, buildParagraph([node], context));
    }
  }
}

const compactBlocks = (blocks: ContentBlock[]): ContentBlock[] =>
  blocks.filter((block) => block.kind === 'break' || segmentsText(block.segments).trim() !== '');

/**
 * Parses chapter XHTML into semantic blocks.
 *
 * @throws ParseError when the markup is not well-formed
 * @throws LayoutError (`EMPTY_FORMATTING`) when the chapter has visible text but
 * no block could be built from it
 */
export function parseChapterXhtml(markup: string): ContentBlock[] {
  if (markup.trim() === '') return [];

  const nodes = parseXmlTree(markup);
  const body = findElement(nodes, 'body');
  const roots = body ? body.children : nodes;

  const blocks: ContentBlock[] = [];
  traverseChildren(roots, blocks, { listStack: [], inBlockquote: false });
  const compacted = compactBlocks(blocks);

  if (compacted.length === 0) {
    const sample = roots
      .map((node) => textContent(node, SKIPPED_ELEMENTS))
      .join('')
      .trim();
    if (sample !== '') {
      debugLog('error', '[XhtmlParser] Formatting produced no blocks', { sample: sample.slice(0, 120) });
      throw new LayoutError('EMPTY_FORMATTING', 'Normalized block list was empty', { sample: sample.slice(0, 120) });
    }
  }

  return compacted;
}
