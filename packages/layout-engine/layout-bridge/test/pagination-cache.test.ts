import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { CompactPage } from '@leafline/contracts';
import {
  JsonPaginationCache,
  MemoryPaginationCache,
  compactPages,
  documentCacheId,
  isValidLayoutKey,
  layoutKey,
  parseCachedPages,
} from '../src/pagination-cache';
import { createDocument } from './mock-data';

const PAGES: CompactPage[] = [
  { chapterIndex: 0, pageInChapter: 0, totalPagesInChapter: 2, startLine: 0, endLine: 29 },
  { chapterIndex: 0, pageInChapter: 1, totalPagesInChapter: 2, startLine: 30, endLine: 41 },
];

describe('layoutKey', () => {
  it('joins geometry and layout settings', () => {
    expect(layoutKey(80, 24, 'split', 'compact')).toBe('80x24_split_compact');
  });

  it('validates keys', () => {
    expect(isValidLayoutKey('80x24_split_compact')).toBe(true);
    expect(isValidLayoutKey('a'.repeat(200))).toBe(true);
    expect(isValidLayoutKey('a'.repeat(201))).toBe(false);
    expect(isValidLayoutKey('../80x24')).toBe(false);
    expect(isValidLayoutKey('_hidden')).toBe(false);
    expect(isValidLayoutKey('')).toBe(false);
  });
});

describe('parseCachedPages', () => {
  it('accepts current payloads', () => {
    expect(parseCachedPages({ version: 1, pages: PAGES })).toEqual(PAGES);
  });

  it.each([
    ['a newer version', { version: 2, pages: PAGES }],
    ['a reversed range', { version: 1, pages: [{ ...PAGES[0], startLine: 10, endLine: 5 }] }],
    ['a page past its chapter', { version: 1, pages: [{ ...PAGES[0], pageInChapter: 2 }] }],
    ['missing pages', { version: 1 }],
    ['a string', 'not a payload'],
    ['null', null],
  ])('rejects %s', (_label, payload) => {
    expect(parseCachedPages(payload)).toBeNull();
  });
});

describe('compactPages', () => {
  it('drops wrapped lines', () => {
    expect(compactPages([{ ...PAGES[0], lines: ['one', 'two'] }])).toEqual([PAGES[0]]);
  });
});

describe('MemoryPaginationCache', () => {
  it('round-trips pages per document and key', async () => {
    const cache = new MemoryPaginationCache();
    const first = createDocument([], '/library/first.epub');
    const second = createDocument([], '/library/second.epub');

    expect(await cache.saveForDocument(first, '80x24_split_compact', PAGES)).toBe(true);
    expect(await cache.loadForDocument(first, '80x24_split_compact')).toEqual(PAGES);
    expect(await cache.loadForDocument(second, '80x24_split_compact')).toBeNull();
    expect(await cache.loadForDocument(first, '100x40_split_compact')).toBeNull();
  });

  it('refuses invalid keys', async () => {
    const cache = new MemoryPaginationCache();
    expect(await cache.saveForDocument(createDocument([]), '../escape', PAGES)).toBe(false);
    expect(cache.size).toBe(0);
  });
});

describe('JsonPaginationCache', () => {
  let rootDir = '';
  const document = createDocument([], '/library/sample.epub');
  const key = '80x24_split_compact';

  beforeEach(async () => {
    rootDir = await mkdtemp(join(tmpdir(), 'leafline-pagination-'));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(rootDir, { recursive: true, force: true });
  });

  it('stores one file per document and layout key', async () => {
    const cache = new JsonPaginationCache(rootDir);

    expect(await cache.saveForDocument(document, key, PAGES)).toBe(true);
    expect(cache.pathFor(document, key)).toBe(join(rootDir, documentCacheId(document), `${key}.json`));

    const stored: unknown = JSON.parse(await readFile(cache.pathFor(document, key), 'utf8'));
    expect(stored).toEqual({ version: 1, pages: PAGES });
    expect(await cache.loadForDocument(document, key)).toEqual(PAGES);
  });

  it('treats missing entries as a miss', async () => {
    expect(await new JsonPaginationCache(rootDir).loadForDocument(document, key)).toBeNull();
  });

  it('treats corrupt entries as a miss', async () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const cache = new JsonPaginationCache(rootDir);
    const path = cache.pathFor(document, key);
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, '{"version":1,"pages":[', 'utf8');

    expect(await cache.loadForDocument(document, key)).toBeNull();
    expect(warnSpy).toHaveBeenCalledWith(
      '[PaginationCache] Ignoring corrupt cache entry',
      expect.objectContaining({ path }),
    );
  });

  it('treats payloads from a newer schema as a miss', async () => {
    const cache = new JsonPaginationCache(rootDir);
    const path = cache.pathFor(document, key);
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, JSON.stringify({ version: 2, pages: PAGES }), 'utf8');

    expect(await cache.loadForDocument(document, key)).toBeNull();
  });

  it('rejects invalid layout keys', async () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const cache = new JsonPaginationCache(rootDir);

    expect(await cache.saveForDocument(document, '../outside', PAGES)).toBe(false);
    expect(await cache.loadForDocument(document, '../outside')).toBeNull();
    expect(warnSpy).toHaveBeenCalledTimes(2);
    expect(() => cache.pathFor(document, '../outside')).toThrow(/Invalid pagination layout key/);
  });

  it('reports write failures without throwing', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const blocker = join(rootDir, 'blocker');
    await writeFile(blocker, 'not a directory', 'utf8');
    const cache = new JsonPaginationCache(blocker);

    expect(await cache.saveForDocument(document, key, PAGES)).toBe(false);
    expect(errorSpy).toHaveBeenCalledWith(
      '[PaginationCache] Failed to write cache entry',
      expect.objectContaining({ code: 'CACHE_WRITE_FAILED' }),
    );
  });
});
