import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import type {
  CompletionBackend,
  CompletionRequest,
  MemoryBackend,
  MemorySearchHit,
  ProfileSelector,
  RealtimeSession,
  SessionSeed,
  SettingsStore,
} from '../types.js';

export async function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'tutor-persona-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/**
 * Promise that resolves when release() is called
 */
export function gate(): { wait: Promise<void>; release: () => void } {
  let release: () => void = () => undefined;
  const wait = new Promise<void>(resolve => {
    release = resolve;
  });
  return { wait, release };
}

/**
 * fetch that never answers; it rejects only once the request signal aborts
 */
export function stalledFetch(): typeof fetch {
  return (_url: string | URL | Request, init?: RequestInit) =>
    new Promise<Response>((_resolve, reject) => {
      const signal = init?.signal;
      signal?.addEventListener('abort', () => reject(signal.reason));
    });
}

export class FakeCompletionBackend implements CompletionBackend {
  requests: CompletionRequest[] = [];
  hold: Promise<void> | null = null;

  constructor(private reply: string | Error = 'GENERATED PROFILE') {}

  async complete(request: CompletionRequest): Promise<string> {
    this.requests.push(request);
    if (this.hold) await this.hold;
    if (this.reply instanceof Error) throw this.reply;
    return this.reply;
  }
}

export class InMemoryMemoryBackend implements MemoryBackend {
  readonly name = 'in-memory';
  contents: string[] = [];
  adds = 0;
  searches = 0;
  failWith: Error | null = null;
  hold: Promise<void> | null = null;

  async add(content: string): Promise<void> {
    this.adds++;
    if (this.hold) await this.hold;
    if (this.failWith) throw this.failWith;
    this.contents.push(content);
  }

  async search(query: string, limit: number): Promise<MemorySearchHit[]> {
    this.searches++;
    if (this.failWith) throw this.failWith;
    const words = query.toLowerCase().split(/\s+/).filter(Boolean);
    return this.contents
      .filter(c => words.some(w => c.toLowerCase().includes(w)))
      .slice(0, limit)
      .map(content => ({ content }));
  }
}

export class FakeSession implements RealtimeSession {
  seeds: SessionSeed[] = [];
  failWith: Error | null = null;
  hold: Promise<void> | null = null;

  async configure(seed: SessionSeed): Promise<void> {
    if (this.hold) await this.hold;
    if (this.failWith) throw this.failWith;
    this.seeds.push(seed);
  }
}

export class MemorySettingsStore implements SettingsStore {
  saved: ProfileSelector[] = [];
  failWith: Error | null = null;

  constructor(private initial: ProfileSelector | null = null) {}

  async load(): Promise<ProfileSelector | null> {
    return this.initial;
  }

  async save(selection: ProfileSelector): Promise<void> {
    if (this.failWith) throw this.failWith;
    this.saved.push(selection);
  }
}
