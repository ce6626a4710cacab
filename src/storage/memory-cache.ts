import { mkdir, readFile, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { homedir } from 'os';
import { randomUUID } from 'crypto';
import { z } from 'zod';
import { CacheSpec, Env } from '../config.js';
import { CollaboratorUnavailableError } from '../errors.js';

/**
 * Memory-cache capability: analyzed-paper text keyed by paper id.
 * Shared read-through/write-through by every concurrent analyzer; no locking,
 * a duplicate write of an equivalent analysis is acceptable.
 */
export interface MemoryCache {
  lookup(paperId: string): Promise<string | undefined>;
  store(paperId: string, text: string): Promise<void>;
  healthCheck(): Promise<boolean>;
}

export const DEFAULT_CACHE_DIR = join(homedir(), '.research-cache');

/**
 * In-process cache, lives as long as the process
 */
export class InMemoryCache implements MemoryCache {
  private readonly entries = new Map<string, string>();

  async lookup(paperId: string): Promise<string | undefined> {
    return this.entries.get(paperId);
  }

  async store(paperId: string, text: string): Promise<void> {
    this.entries.set(paperId, text);
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  get size(): number {
    return this.entries.size;
  }
}

const cachedAnalysisSchema = z.object({
  id: z.string(),
  text: z.string(),
  storedAt: z.string(),
});

/**
 * File-backed cache: one JSON document per paper under the cache directory
 */
export class FileMemoryCache implements MemoryCache {
  constructor(private readonly dir: string = DEFAULT_CACHE_DIR) {}

  private pathFor(paperId: string): string {
    return join(this.dir, `${encodeURIComponent(paperId)}.json`);
  }

  async lookup(paperId: string): Promise<string | undefined> {
    let raw: string;
    try {
      raw = await readFile(this.pathFor(paperId), 'utf-8');
    } catch {
      return undefined;
    }
    try {
      const parsed = cachedAnalysisSchema.safeParse(JSON.parse(raw));
      return parsed.success && parsed.data.id === paperId ? parsed.data.text : undefined;
    } catch (error) {
      console.error(`[Cache] Ignoring unreadable entry for ${paperId}:`, error);
      return undefined;
    }
  }

  async store(paperId: string, text: string): Promise<void> {
    await mkdir(this.dir, { recursive: true });
    const entry = { id: paperId, text, storedAt: new Date().toISOString() };
    await writeFile(this.pathFor(paperId), JSON.stringify(entry, null, 2), 'utf-8');
  }

  /**
   * Write and read back a probe entry
   */
  async healthCheck(): Promise<boolean> {
    const probeId = `__health_${randomUUID()}__`;
    try {
      await this.store(probeId, probeId);
      const readBack = await this.lookup(probeId);
      return readBack === probeId;
    } catch (error) {
      console.error(`[Cache] Health check failed for ${this.dir}:`, error);
      return false;
    } finally {
      await rm(this.pathFor(probeId), { force: true }).catch(() => undefined);
    }
  }
}

const mem0SearchSchema = z.union([
  z.array(z.object({ id: z.string().optional(), memory: z.string().optional() })),
  z.object({ results: z.array(z.object({ id: z.string().optional(), memory: z.string().optional() })) }),
]);

const mem0AddSchema = z.union([
  z.array(z.object({ id: z.string().optional() })),
  z.object({ id: z.string().optional(), results: z.array(z.object({ id: z.string().optional() })).optional() }),
]);

/**
 * mem0 REST API cache. Analyses are stored raw (infer=false) with metadata.id = paper id.
 */
export class Mem0Cache implements MemoryCache {
  constructor(
    private readonly apiKey: string,
    private readonly baseUrl: string = 'https://api.mem0.ai',
    private readonly userId: string = 'lit-research'
  ) {}

  private async request(method: 'POST' | 'DELETE', path: string, body?: unknown): Promise<unknown> {
    const response = await fetch(`${this.baseUrl.replace(/\/$/, '')}${path}`, {
      method,
      headers: {
        Authorization: `Token ${this.apiKey}`,
        'Content-Type': 'application/json',
      },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
    if (!response.ok) {
      throw new Error(`mem0 API error (${response.status}): ${response.statusText}`);
    }
    const text = await response.text();
    return text ? JSON.parse(text) : null;
  }

  private async search(query: string, filters: unknown): Promise<Array<{ id?: string; memory?: string }>> {
    const data = await this.request('POST', '/v2/memories/search/', { query, filters });
    const parsed = mem0SearchSchema.safeParse(data);
    if (!parsed.success) return [];
    return Array.isArray(parsed.data) ? parsed.data : parsed.data.results;
  }

  async lookup(paperId: string): Promise<string | undefined> {
    const hits = await this.search('*', {
      AND: [{ user_id: this.userId }, { metadata: { eq: { id: paperId } } }],
    });
    return hits.find(hit => hit.memory)?.memory;
  }

  async store(paperId: string, text: string): Promise<void> {
    console.error(`[Cache] mem0 add: ${paperId}`);
    await this.request('POST', '/v1/memories/', {
      messages: [{ role: 'user', content: text }],
      metadata: { id: paperId },
      user_id: this.userId,
      infer: false,
      output_format: 'v1.1',
    });
  }

  /**
   * Write a ping memory, read it back, then delete it
   */
  async healthCheck(): Promise<boolean> {
    const ping = `__health_${randomUUID()}__`;
    const healthUser = '__health_check__';
    let memoryId: string | undefined;
    try {
      const added = mem0AddSchema.safeParse(await this.request('POST', '/v1/memories/', {
        messages: [{ role: 'user', content: ping }],
        user_id: healthUser,
        infer: false,
        output_format: 'v1.1',
      }));
      if (added.success) {
        memoryId = Array.isArray(added.data) ? added.data[0]?.id : added.data.id ?? added.data.results?.[0]?.id;
      }
      const hits = await this.search(ping, { AND: [{ user_id: healthUser }] });
      return hits.length > 0;
    } catch (error) {
      console.error('[Cache] mem0 health check failed:', error);
      return false;
    } finally {
      if (memoryId) {
        await this.request('DELETE', `/v1/memories/${memoryId}/`).catch(error => {
          console.error('[Cache] Unable to delete mem0 ping memory:', error);
        });
      }
    }
  }
}

export function createMemoryCache(spec: CacheSpec, env: Env): MemoryCache {
  switch (spec.kind) {
    case 'memory':
      return new InMemoryCache();
    case 'file':
      return new FileMemoryCache(spec.dir ?? env.RESEARCH_CACHE_DIR ?? DEFAULT_CACHE_DIR);
    case 'mem0': {
      const apiKey = spec.apiKey ?? env.MEM0_API_KEY;
      if (!apiKey) {
        throw new CollaboratorUnavailableError('memory-cache', 'MEM0_API_KEY is required for the mem0 cache');
      }
      return new Mem0Cache(apiKey, spec.baseUrl, spec.userId);
    }
  }
}
