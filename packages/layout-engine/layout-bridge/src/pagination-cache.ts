/**
 * Pagination cache adapters
 *
 * Persist the compact dynamic page map (no wrapped lines) per document and
 * layout key. Payloads are `{ version, pages }`; a payload written by a newer
 * schema, one that fails validation or one that cannot be read is a miss.
 */

import { createHash } from 'node:crypto';
import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import {
  LayoutError,
  debugLog,
  type CompactPage,
  type Document,
  type PageRecord,
  type PaginationCache,
} from '@leafline/contracts';

export const PAGINATION_CACHE_VERSION = 1;
export const MAX_LAYOUT_KEY_BYTES = 200;

const LAYOUT_KEY_PATTERN = /^[a-zA-Z0-9][a-zA-Z0-9._-]*$/;

const compactPageSchema = z
  .object({
    chapterIndex: z.number().int().nonnegative(),
    pageInChapter: z.number().int().nonnegative(),
    totalPagesInChapter: z.number().int().positive(),
    startLine: z.number().int().nonnegative(),
    endLine: z.number().int().nonnegative(),
  })
  .refine((page) => page.endLine >= page.startLine && page.pageInChapter < page.totalPagesInChapter);

const payloadSchema = z.object({
  version: z.number().int(),
  pages: z.array(compactPageSchema),
});

export type PaginationPayload = z.infer<typeof payloadSchema>;

export const layoutKey = (width: number, height: number, viewMode: string, lineSpacing: string): string =>
  `${width}x${height}_${viewMode}_${lineSpacing}`;

export const isValidLayoutKey = (key: string): boolean =>
  LAYOUT_KEY_PATTERN.test(key) && Buffer.byteLength(key, 'utf8') <= MAX_LAYOUT_KEY_BYTES;

export function assertValidLayoutKey(key: string): void {
  if (!isValidLayoutKey(key)) {
    throw new LayoutError('INVALID_LAYOUT_KEY', `Invalid pagination layout key: ${key}`, { key });
  }
}

/** Strips wrapped lines, leaving the persisted page shape. */
export const compactPages = (pages: readonly PageRecord[]): CompactPage[] =>
  pages.map(({ chapterIndex, pageInChapter, totalPagesInChapter, startLine, endLine }) => ({
    chapterIndex,
    pageInChapter,
    totalPagesInChapter,
    startLine,
    endLine,
  }));

/** Validated pages of a stored payload, or `null` for anything unusable. */
export function parseCachedPages(data: unknown): CompactPage[] | null {
  const result = payloadSchema.safeParse(data);
  if (!result.success) return null;
  if (result.data.version > PAGINATION_CACHE_VERSION) return null;
  return result.data.pages;
}

const buildPayload = (pages: readonly CompactPage[]): PaginationPayload => ({
  version: PAGINATION_CACHE_VERSION,
  pages: compactPages(pages),
});

export const documentCacheId = (document: Document): string =>
  createHash('sha1').update(document.canonicalPath).digest('hex');

const errorCode = (error: unknown): string | undefined =>
  error instanceof Error && 'code' in error && typeof error.code === 'string' ? error.code : undefined;

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/** One JSON file per `(document, layout key)` under `rootDir`. */
export class JsonPaginationCache implements PaginationCache {
  constructor(private readonly rootDir: string) {}

  layoutKey(width: number, height: number, viewMode: string, lineSpacing: string): string {
    return layoutKey(width, height, viewMode, lineSpacing);
  }

  pathFor(document: Document, key: string): string {
    assertValidLayoutKey(key);
    return join(this.rootDir, documentCacheId(document), `${key}.json`);
  }

  async loadForDocument(document: Document, key: string): Promise<CompactPage[] | null> {
    if (!isValidLayoutKey(key)) {
      debugLog('warn', '[PaginationCache] Rejected layout key', { key, code: 'INVALID_LAYOUT_KEY' });
      return null;
    }

    const path = this.pathFor(document, key);
    let raw: string;
    try {
      raw = await readFile(path, 'utf8');
    } catch (error) {
      if (errorCode(error) !== 'ENOENT') {
        debugLog('warn', '[PaginationCache] Unable to read cache entry', { path, message: errorMessage(error) });
      }
      return null;
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      debugLog('warn', '[PaginationCache] Ignoring corrupt cache entry', { path, message: errorMessage(error) });
      return null;
    }

    const pages = parseCachedPages(data);
    if (!pages) debugLog('info', '[PaginationCache] Ignoring incompatible cache entry', { path });
    return pages;
  }

  async saveForDocument(document: Document, key: string, pages: CompactPage[]): Promise<boolean> {
    if (!isValidLayoutKey(key)) {
      debugLog('warn', '[PaginationCache] Rejected layout key', { key, code: 'INVALID_LAYOUT_KEY' });
      return false;
    }

    const path = this.pathFor(document, key);
    try {
      await mkdir(join(this.rootDir, documentCacheId(document)), { recursive: true });
      const tempPath = `${path}.${process.pid}.${Date.now()}.tmp`;
      await writeFile(tempPath, JSON.stringify(buildPayload(pages)), 'utf8');
      await rename(tempPath, path);
      return true;
    } catch (error) {
      debugLog('error', '[PaginationCache] Failed to write cache entry', {
        path,
        code: 'CACHE_WRITE_FAILED',
        message: errorMessage(error),
      });
      return false;
    }
  }
}

/** In-process cache holding payloads as they would be persisted. */
export class MemoryPaginationCache implements PaginationCache {
  private readonly payloads = new Map<string, unknown>();

  layoutKey(width: number, height: number, viewMode: string, lineSpacing: string): string {
    return layoutKey(width, height, viewMode, lineSpacing);
  }

  async loadForDocument(document: Document, key: string): Promise<CompactPage[] | null> {
    return parseCachedPages(this.payloads.get(this.entryKey(document, key)));
  }

  async saveForDocument(document: Document, key: string, pages: CompactPage[]): Promise<boolean> {
    if (!isValidLayoutKey(key)) return false;
    this.payloads.set(this.entryKey(document, key), buildPayload(pages));
    return true;
  }

  /** Stores an arbitrary payload under `key`, bypassing validation. */
  putRaw(document: Document, key: string, payload: unknown): void {
    this.payloads.set(this.entryKey(document, key), payload);
  }

  get size(): number {
    return this.payloads.size;
  }

  private entryKey(document: Document, key: string): string {
    return `${documentCacheId(document)}/${key}`;
  }
}
