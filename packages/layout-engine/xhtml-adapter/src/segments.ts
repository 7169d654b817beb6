import type { SegmentStyles, TextSegment } from '@leafline/contracts';
import { isElement, type XmlElement, type XmlNode } from './xml-tree';

export const INLINE_NEWLINE = '\n';
export const IMAGE_PLACEHOLDER = '[Image]';

export const SKIPPED_ELEMENTS: ReadonlySet<string> = new Set(['script', 'style', 'head']);

const WHITESPACE_PATTERN = /\s+/g;

const preservesWhitespace = (styles: SegmentStyles): boolean =>
  styles.code === true || styles.preserveWhitespace === true;

/** Segment text with runs of whitespace collapsed to one space, unless the styles preserve it. */
export function normalizeText(text: string, styles: SegmentStyles): string {
  if (preservesWhitespace(styles)) return text;
  if (styles.break) return text;
  return text.replace(WHITESPACE_PATTERN, ' ');
}

export const textSegment = (text: string, styles: SegmentStyles = {}): TextSegment => ({
  text: normalizeText(text, styles),
  styles,
});

const spanStyles = (element: XmlElement): SegmentStyles => {
  const style = element.attributes.style;
  if (!style) return {};

  const styles: SegmentStyles = {};
  if (/font-weight\s*:\s*(bold|[6-9]00)/i.test(style)) styles.bold = true;
  if (/font-style\s*:\s*italic/i.test(style)) styles.italic = true;
  if (/text-decoration[-a-z]*\s*:[^;]*underline/i.test(style)) styles.underline = true;
  return styles;
};

/** Inline styles contributed by an element, merged over the inherited ones by the caller. */
export function stylesFor(element: XmlElement): SegmentStyles {
  switch (element.name) {
    case 'strong':
    case 'b':
      return { bold: true };
    case 'em':
    case 'i':
    case 'cite':
      return { italic: true };
    case 'u':
      return { underline: true };
    case 'code':
    case 'kbd':
    case 'samp':
    case 'tt':
      return { code: true, preserveWhitespace: true };
    case 'span':
      return spanStyles(element);
    case 'a': {
      const href = element.attributes.href;
      return href ? { link: href, ...spanStyles(element) } : spanStyles(element);
    }
    default:
      return {};
  }
}

/** Image source and alt text; alt text that looks like a file name is dropped. */
export function imageRefFor(element: XmlElement): { src: string | null; alt: string | null } {
  const src = element.attributes.src || element.attributes.href || null;
  const rawAlt = (element.attributes.alt ?? '').trim();
  const alt = rawAlt === '' || /\.(png|jpe?g|gif|svg|webp)$/i.test(rawAlt) ? null : rawAlt;
  return { src, alt };
}

/**
 * Collects styled segments from inline content.
 *
 * Whitespace-only text between inline elements survives as a single space;
 * {@link tidySegments} removes the spaces that end up at block edges.
 */
export function collectSegments(nodes: XmlNode[], inherited: SegmentStyles = {}): TextSegment[] {
  const segments: TextSegment[] = [];

  for (const node of nodes) {
    if (!isElement(node)) {
      if (node.value === '') continue;
      if (!preservesWhitespace(inherited) && node.value.trim() === '') {
        segments.push({ text: ' ', styles: inherited });
        continue;
      }
      segments.push(textSegment(node.value, inherited));
      continue;
    }

    if (SKIPPED_ELEMENTS.has(node.name)) continue;

    if (node.name === 'br') {
      segments.push(textSegment(INLINE_NEWLINE, { ...inherited, break: true }));
      continue;
    }

    if (node.name === 'img' || node.name === 'image') {
      segments.push({ text: IMAGE_PLACEHOLDER, styles: { ...inherited, inlineImage: imageRefFor(node) } });
      continue;
    }

    segments.push(...collectSegments(node.children, { ...inherited, ...stylesFor(node) }));
  }

  return segments;
}

/**
 * Drops whitespace doubled across segment boundaries and trims the block's
 * leading and trailing spaces. Whitespace-preserving segments pass through.
 */
export function tidySegments(segments: TextSegment[]): TextSegment[] {
  const result: TextSegment[] = [];
  let afterWhitespace = true;

  for (const segment of segments) {
    if (preservesWhitespace(segment.styles) || segment.styles.break) {
      if (segment.text === '') continue;
      result.push(segment);
      afterWhitespace = /\s$/.test(segment.text);
      continue;
    }

    const text = afterWhitespace ? segment.text.replace(/^ /, '') : segment.text;
    if (text === '') continue;
    result.push(text === segment.text ? segment : { text, styles: segment.styles });
    afterWhitespace = text.endsWith(' ');
  }

  while (result.length > 0) {
    const last = result[result.length - 1];
    if (preservesWhitespace(last.styles) || last.styles.break) break;
    const trimmed = last.text.replace(/ +$/, '');
    if (trimmed !== '') {
      result[result.length - 1] = { text: trimmed, styles: last.styles };
      break;
    }
    result.pop();
  }

  return result;
}

export const segmentsText = (segments: readonly TextSegment[]): string => segments.map((s) => s.text).join('');
