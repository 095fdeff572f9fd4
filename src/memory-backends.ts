import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { z } from 'zod';
import { parseRecord } from './memory-gateway.js';
import { writeFileAtomic } from './persistence.js';
import type { MemoryBackend, MemorySearchHit } from './types.js';

export interface SupermemoryBackendOptions {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
}

const SearchResponseSchema = z.object({
  results: z
    .array(
      z.object({
        content: z.string().nullish(),
        memory: z.string().nullish(),
        summary: z.string().nullish(),
        chunks: z.array(z.object({ content: z.string() })).nullish(),
      })
    )
    .nullish(),
});

type SearchResult = NonNullable<z.infer<typeof SearchResponseSchema>['results']>[number];

function resultText(result: SearchResult): string {
  if (result.content) return result.content;
  if (result.memory) return result.memory;
  if (result.chunks?.length) return result.chunks.map(c => c.content).join('\n');
  return result.summary ?? '';
}

/**
 * SuperMemory REST client
 */
export class SupermemoryBackend implements MemoryBackend {
  readonly name = 'supermemory';
  private apiKey: string;
  private baseUrl: string;
  private timeoutMs: number;
  private fetchImpl: typeof fetch;

  constructor(options: SupermemoryBackendOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = (options.baseUrl ?? 'https://api.supermemory.ai').replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async add(content: string): Promise<void> {
    await this.post('/v3/memories', { content });
  }

  async search(query: string, limit: number): Promise<MemorySearchHit[]> {
    const body = await this.post('/v3/search', { q: query, limit });
    const parsed = SearchResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new Error('Malformed search response');
    }

    return (parsed.data.results ?? [])
      .map(r => ({ content: resultText(r) }))
      .filter(hit => hit.content.length > 0);
  }

  private async post(path: string, payload: Record<string, unknown>): Promise<unknown> {
    const response = await this.fetchImpl(`${this.baseUrl}${path}`, {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${this.apiKey}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(payload),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      throw new Error(`Memory request ${path} failed with HTTP ${response.status}`);
    }
    return response.json();
  }
}

const LocalMemoryFileSchema = z.object({
  version: z.number(),
  entries: z.array(
    z.object({
      content: z.string(),
      createdAt: z.string(),
    })
  ),
});

type LocalMemoryFile = z.infer<typeof LocalMemoryFileSchema>;

function queryWords(query: string): string[] {
  return query
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter(w => w.length > 1);
}

/**
 * Memory kept in a JSON file in the data directory. Search ranks entries by
 * how many distinct query words their fact text contains, newest first on
 * ties. The `[category] [owner:id]` tag is never matched against.
 */
export class LocalMemoryBackend implements MemoryBackend {
  readonly name = 'local';
  // Serializes read-modify-write cycles on the file.
  private writing: Promise<void> = Promise.resolve();

  constructor(private readonly path: string) {}

  async add(content: string): Promise<void> {
    const next = this.writing.then(async () => {
      const state = await this.load();
      state.entries.push({ content, createdAt: new Date().toISOString() });
      await writeFileAtomic(this.path, JSON.stringify(state, null, 2));
    });
    this.writing = next.catch(() => undefined);
    await next;
  }

  async search(query: string, limit: number, ownerId?: string): Promise<MemorySearchHit[]> {
    const words = [...new Set(queryWords(query))];
    if (words.length === 0) {
      return [];
    }

    const state = await this.load();
    const candidates: { content: string; score: number; index: number }[] = [];
    state.entries.forEach((entry, index) => {
      const record = parseRecord(entry.content);
      if (ownerId !== undefined && record?.ownerId !== ownerId) {
        return;
      }
      const text = (record ? record.content : entry.content).toLowerCase();
      const score = words.filter(w => text.includes(w)).length;
      candidates.push({ content: entry.content, score, index });
    });

    return candidates
      .filter(e => e.score > 0)
      .sort((a, b) => b.score - a.score || b.index - a.index)
      .slice(0, limit)
      .map(e => ({ content: e.content }));
  }

  private async load(): Promise<LocalMemoryFile> {
    if (!existsSync(this.path)) {
      return { version: 1, entries: [] };
    }

    const data = await readFile(this.path, 'utf-8');
    const parsed = LocalMemoryFileSchema.safeParse(JSON.parse(data));
    if (!parsed.success) {
      throw new Error(`Malformed memory file: ${this.path}`);
    }
    return parsed.data;
  }
}
