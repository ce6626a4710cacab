import { describe, it, expect, vi, afterEach, beforeEach } from 'vitest';
import { mkdtemp, readdir, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { CollaboratorUnavailableError } from '../errors.js';
import { createMemoryCache, FileMemoryCache, InMemoryCache, Mem0Cache } from '../storage/memory-cache.js';

describe('InMemoryCache', () => {
  it('stores and looks up by paper id', async () => {
    const cache = new InMemoryCache();
    expect(await cache.lookup('1')).toBeUndefined();
    await cache.store('1', 'analysis');
    await cache.store('1', 'analysis');
    expect(await cache.lookup('1')).toBe('analysis');
    expect(cache.size).toBe(1);
  });
});

describe('FileMemoryCache', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'lit-research-cache-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('persists entries across instances', async () => {
    await new FileMemoryCache(dir).store('cs/0601001', 'old-style id analysis');
    expect(await new FileMemoryCache(dir).lookup('cs/0601001')).toBe('old-style id analysis');
    expect(await readdir(dir)).toEqual(['cs%2F0601001.json']);
  });

  it('treats a corrupt entry as a miss', async () => {
    await writeFile(join(dir, '1.json'), '{not json', 'utf-8');
    expect(await new FileMemoryCache(dir).lookup('1')).toBeUndefined();
  });

  it('passes its health check and leaves no probe behind', async () => {
    expect(await new FileMemoryCache(dir).healthCheck()).toBe(true);
    expect(await readdir(dir)).toEqual([]);
  });

  it('fails its health check when the directory cannot be created', async () => {
    const blocker = join(dir, 'blocker');
    await writeFile(blocker, 'x', 'utf-8');
    expect(await new FileMemoryCache(join(blocker, 'cache')).healthCheck()).toBe(false);
  });
});

describe('Mem0Cache', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('filters lookups by paper id', async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => Response.json([{ id: 'm1', memory: 'cached analysis' }]));
    vi.stubGlobal('fetch', fetchMock);

    const cache = new Mem0Cache('test-secret', 'https://mem0.test/');
    expect(await cache.lookup('2401.00001')).toBe('cached analysis');

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://mem0.test/v2/memories/search/');
    expect(JSON.parse(String(init?.body))).toEqual({
      query: '*',
      filters: { AND: [{ user_id: 'lit-research' }, { metadata: { eq: { id: '2401.00001' } } }] },
    });
  });

  it('reports unhealthy when the API rejects requests', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('', { status: 401, statusText: 'Unauthorized' })));
    expect(await new Mem0Cache('test-secret').healthCheck()).toBe(false);
  });

  it('deletes the ping memory after a successful health check', async () => {
    const fetchMock = vi.fn(async (url: string, _init?: RequestInit) => {
      if (url.endsWith('/v1/memories/')) return Response.json([{ id: 'ping-1' }]);
      if (url.endsWith('/v2/memories/search/')) return Response.json({ results: [{ id: 'ping-1', memory: 'ping' }] });
      return new Response(null, { status: 204 });
    });
    vi.stubGlobal('fetch', fetchMock);

    expect(await new Mem0Cache('test-secret').healthCheck()).toBe(true);
    expect(fetchMock.mock.calls[2][0]).toBe('https://api.mem0.ai/v1/memories/ping-1/');
    expect(fetchMock.mock.calls[2][1]?.method).toBe('DELETE');
  });
});

describe('createMemoryCache', () => {
  it('requires a mem0 key', () => {
    expect(() => createMemoryCache({ kind: 'mem0' }, {})).toThrow(CollaboratorUnavailableError);
    expect(createMemoryCache({ kind: 'mem0' }, { MEM0_API_KEY: 'test-secret' })).toBeInstanceOf(Mem0Cache);
  });

  it('builds the in-process and file caches', () => {
    expect(createMemoryCache({ kind: 'memory' }, {})).toBeInstanceOf(InMemoryCache);
    expect(createMemoryCache({ kind: 'file' }, { RESEARCH_CACHE_DIR: '/tmp/unused' })).toBeInstanceOf(FileMemoryCache);
  });
});
