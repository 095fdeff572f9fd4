import { join } from 'path';
import { z } from 'zod';
import { LOG_LEVELS } from './logger.js';
import type { LogLevel } from './logger.js';
import { PACKAGED_PROFILES_DIR, PACKAGED_PROMPTS_DIR } from './instruction-store.js';
import { DEFAULT_DATA_DIR } from './persistence.js';

/**
 * Resolved configuration. Built once at startup; the core only ever sees this object.
 */
export interface TutorConfig {
  dataDir: string;
  profilesDir: string;
  promptsDir: string;
  cacheDir: string;
  generation: {
    apiKey: string | null;
    baseUrl: string;
    model: string;
    timeoutMs: number;
    temperature: number;
    maxTokens: number;
  };
  memory: {
    backend: 'supermemory' | 'local' | 'none';
    apiKey: string | null;
    baseUrl: string;
    timeoutMs: number;
    contextLimit: number;
    searchLimit: number;
    sharedOwners: Record<string, string>;
  };
  log: {
    level: LogLevel;
    pretty: boolean;
  };
}

const optionalString = z
  .string()
  .optional()
  .transform(v => (v && v.trim() ? v.trim() : undefined));

const flag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no', ''])
  .optional()
  .transform(v => v === 'true' || v === '1' || v === 'yes');

const EnvSchema = z.object({
  TUTOR_DATA_DIR: optionalString,
  TUTOR_PROFILES_DIR: optionalString,
  TUTOR_PROMPTS_DIR: optionalString,
  OPENAI_API_KEY: optionalString,
  TUTOR_GENERATION_MODEL: optionalString,
  TUTOR_GENERATION_BASE_URL: z.string().url().optional(),
  TUTOR_GENERATION_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  TUTOR_MEMORY_BACKEND: z.enum(['auto', 'supermemory', 'local', 'none']).default('auto'),
  SUPERMEMORY_API_KEY: optionalString,
  SUPERMEMORY_BASE_URL: z.string().url().optional(),
  TUTOR_MEMORY_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  TUTOR_MEMORY_CONTEXT_LIMIT: z.coerce.number().int().min(0).default(10),
  TUTOR_MEMORY_SHARED_OWNERS: optionalString,
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  LOG_PRETTY: flag,
});

/**
 * Parse "french_tutor=family,spanish_tutor=family" into a profile → owner map
 */
export function parseSharedOwners(value: string | undefined): Record<string, string> {
  const owners: Record<string, string> = {};
  if (!value) return owners;

  for (const entry of value.split(',')) {
    const [profile, owner] = entry.split('=').map(s => s.trim());
    if (!profile || !owner) {
      throw new Error(`Invalid TUTOR_MEMORY_SHARED_OWNERS entry: "${entry.trim()}"`);
    }
    owners[profile] = owner;
  }
  return owners;
}

/**
 * Build the configuration from an environment map. Throws with every problem listed.
 */
export function loadConfig(env: Record<string, string | undefined>): TutorConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }

  const e = parsed.data;
  const dataDir = e.TUTOR_DATA_DIR ?? DEFAULT_DATA_DIR;
  const memoryKey = e.SUPERMEMORY_API_KEY ?? null;

  let backend: TutorConfig['memory']['backend'];
  if (e.TUTOR_MEMORY_BACKEND === 'auto') {
    backend = memoryKey ? 'supermemory' : 'local';
  } else {
    backend = e.TUTOR_MEMORY_BACKEND;
  }
  if (backend === 'supermemory' && !memoryKey) {
    throw new Error('Invalid configuration: TUTOR_MEMORY_BACKEND=supermemory needs SUPERMEMORY_API_KEY');
  }

  return {
    dataDir,
    profilesDir: e.TUTOR_PROFILES_DIR ?? PACKAGED_PROFILES_DIR,
    promptsDir: e.TUTOR_PROMPTS_DIR ?? PACKAGED_PROMPTS_DIR,
    cacheDir: join(dataDir, 'generated_profiles'),
    generation: {
      apiKey: e.OPENAI_API_KEY ?? null,
      baseUrl: e.TUTOR_GENERATION_BASE_URL ?? 'https://api.openai.com/v1',
      model: e.TUTOR_GENERATION_MODEL ?? 'gpt-4o-mini',
      timeoutMs: e.TUTOR_GENERATION_TIMEOUT_MS,
      temperature: 0.7,
      maxTokens: 4000,
    },
    memory: {
      backend,
      apiKey: memoryKey,
      baseUrl: e.SUPERMEMORY_BASE_URL ?? 'https://api.supermemory.ai',
      timeoutMs: e.TUTOR_MEMORY_TIMEOUT_MS,
      contextLimit: e.TUTOR_MEMORY_CONTEXT_LIMIT,
      searchLimit: 5,
      sharedOwners: parseSharedOwners(e.TUTOR_MEMORY_SHARED_OWNERS),
    },
    log: {
      level: e.LOG_LEVEL,
      pretty: e.LOG_PRETTY,
    },
  };
}
