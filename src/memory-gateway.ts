import { errorMessage } from './errors.js';
import { pairKey } from './languages.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';
import { DEFAULT_PERSONA } from './instruction-store.js';
import { MEMORY_CATEGORIES } from './types.js';
import type {
  MemoryBackend,
  MemoryCategory,
  MemoryRecord,
  ProfileSelector,
  RecallResult,
  RememberResult,
} from './types.js';

export interface MemoryGatewayConfig {
  contextLimit: number;
  searchLimit: number;
  /** How many raw hits to ask for per wanted result, since other owners' hits are dropped */
  overfetch: number;
}

export const DEFAULT_MEMORY_CONFIG: MemoryGatewayConfig = {
  contextLimit: 10,
  searchLimit: 5,
  overfetch: 4,
};

const CONTEXT_QUERY =
  'Learner name, personal information, learning progress, preferences, and recent sessions';

/**
 * Key naming the active profile: the persona id, "<source>_to_<target>", or "default"
 */
export function profileKey(selector: ProfileSelector): string {
  switch (selector.kind) {
    case 'persona':
      return selector.personaId;
    case 'language_pair':
      return pairKey(selector.pair);
    case 'default':
      return DEFAULT_PERSONA;
  }
}

/**
 * Owner id memories are filed under. Profiles listed in `sharedOwners` use the
 * mapped name instead of their own key.
 */
export function ownerIdFor(
  selector: ProfileSelector,
  sharedOwners: Readonly<Record<string, string>> = {}
): string {
  const key = profileKey(selector);
  const base = Object.hasOwn(sharedOwners, key) ? sharedOwners[key] : key;
  return `${base}_learner`;
}

export function isMemoryCategory(value: string): value is MemoryCategory {
  return (MEMORY_CATEGORIES as readonly string[]).includes(value);
}

/**
 * Backend content format: `[category] [owner:id] text`
 */
export function formatRecord(record: MemoryRecord): string {
  return `[${record.category}] [owner:${record.ownerId}] ${record.content}`;
}

const RECORD_PATTERN = /^\[([a-z]+)\] \[owner:([^\]\s]+)\] ([\s\S]*)$/;

export function parseRecord(content: string): MemoryRecord | null {
  const match = RECORD_PATTERN.exec(content.trim());
  if (!match) {
    return null;
  }
  const [, category, ownerId, text] = match;
  if (!isMemoryCategory(category)) {
    return null;
  }
  return { category, ownerId, content: text };
}

/**
 * Learner memory scoped to one owner id per call. Every operation fails soft:
 * a missing or broken backend yields an error field or empty result, never a throw.
 */
export class MemoryGateway {
  private config: MemoryGatewayConfig;
  private logger: Logger;

  constructor(
    private backend: MemoryBackend | null,
    config: Partial<MemoryGatewayConfig> = {},
    logger?: Logger
  ) {
    this.config = { ...DEFAULT_MEMORY_CONFIG, ...config };
    this.logger = (logger ?? silentLogger()).child({ component: 'memory' });
  }

  get available(): boolean {
    return this.backend !== null;
  }

  async recall(ownerId: string, query: string): Promise<RecallResult> {
    if (!this.backend) {
      return { error: 'Memory not available', memories: [] };
    }
    if (!query.trim()) {
      return { error: 'No query provided', memories: [] };
    }

    try {
      const records = await this.searchOwned(this.backend, ownerId, query, this.config.searchLimit);
      const memories = records.map(r => r.content);
      return { memories, count: memories.length };
    } catch (err) {
      this.logUnavailable('recall', ownerId, err);
      return { error: 'Memory unavailable', memories: [] };
    }
  }

  async remember(ownerId: string, fact: string, category: MemoryCategory): Promise<RememberResult> {
    if (!fact.trim()) {
      return { error: 'No fact provided', stored: false };
    }
    if (!this.backend) {
      return { error: 'Memory not available', stored: false };
    }

    try {
      await this.backend.add(formatRecord({ category, content: fact, ownerId }));
      this.logger.debug({ ownerId, category, fact: fact.slice(0, 50) }, 'Stored memory');
      return { stored: true, fact, category };
    } catch (err) {
      this.logUnavailable('remember', ownerId, err);
      return { error: 'Memory unavailable', stored: false };
    }
  }

  /**
   * Bulleted summary of the owner's most relevant facts, or "" when there are none
   */
  async getContext(ownerId: string, limit = this.config.contextLimit): Promise<string> {
    if (!this.backend || limit <= 0) {
      return '';
    }

    try {
      const records = await this.searchOwned(this.backend, ownerId, CONTEXT_QUERY, limit);
      return records.map(r => `- [${r.category}] ${r.content}`).join('\n');
    } catch (err) {
      this.logUnavailable('getContext', ownerId, err);
      return '';
    }
  }

  private async searchOwned(
    backend: MemoryBackend,
    ownerId: string,
    query: string,
    limit: number
  ): Promise<MemoryRecord[]> {
    const hits = await backend.search(query, limit * this.config.overfetch, ownerId);
    const owned: MemoryRecord[] = [];

    for (const hit of hits) {
      const record = parseRecord(hit.content);
      if (record && record.ownerId === ownerId) {
        owned.push(record);
      }
      if (owned.length >= limit) break;
    }
    return owned;
  }

  private logUnavailable(operation: string, ownerId: string, err: unknown): void {
    this.logger.warn(
      { code: 'MemoryUnavailable', operation, ownerId, backend: this.backend?.name, error: errorMessage(err) },
      'Memory call failed'
    );
  }
}
