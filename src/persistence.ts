import { readFile, writeFile, mkdir, rename, rm } from 'fs/promises';
import { existsSync } from 'fs';
import { homedir } from 'os';
import { dirname, join } from 'path';
import { randomUUID } from 'crypto';
import { z } from 'zod';
import { TutorError, errorMessage } from './errors.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';
import type { PersistedSettings, ProfileSelector, SettingsStore } from './types.js';

export const DEFAULT_DATA_DIR = join(homedir(), '.tutor-persona');

const SETTINGS_VERSION = 1;

/**
 * Get the settings file path
 */
export function getSettingsPath(dataDir: string): string {
  return join(dataDir, 'settings.json');
}

/**
 * Get the session seed file path (read by the voice host)
 */
export function getSessionPath(dataDir: string): string {
  return join(dataDir, 'session', 'instructions.md');
}

/**
 * Get the local memory file path
 */
export function getLocalMemoryPath(dataDir: string): string {
  return join(dataDir, 'memory', 'memories.json');
}

/**
 * Ensure a directory exists
 */
export async function ensureDir(dir: string): Promise<void> {
  if (!existsSync(dir)) {
    await mkdir(dir, { recursive: true });
  }
}

/**
 * Write a file so that readers see either the old or the new content, never a partial one.
 * The content goes to a unique temp file beside the target and is renamed over it.
 */
export async function writeFileAtomic(path: string, content: string): Promise<void> {
  await ensureDir(dirname(path));
  const tmp = `${path}.${process.pid}.${randomUUID()}.tmp`;

  try {
    await writeFile(tmp, content, 'utf-8');
    await rename(tmp, path);
  } catch (err) {
    await rm(tmp, { force: true });
    throw err;
  }
}

const LanguagePairSchema = z.object({
  source: z.string().min(1),
  target: z.string().min(1),
});

const ProfileSelectorSchema: z.ZodType<ProfileSelector> = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('persona'), personaId: z.string().min(1) }),
  z.object({ kind: z.literal('language_pair'), pair: LanguagePairSchema }),
  z.object({ kind: z.literal('default') }),
]);

const PersistedSettingsSchema = z.object({
  version: z.number(),
  selection: ProfileSelectorSchema,
  updatedAt: z.string(),
});

/**
 * Settings persisted as JSON in the data directory
 */
export class FileSettingsStore implements SettingsStore {
  private logger: Logger;

  constructor(
    private readonly dataDir: string,
    logger?: Logger
  ) {
    this.logger = (logger ?? silentLogger()).child({ component: 'settings' });
  }

  /**
   * Load the saved selection. Missing or unreadable settings yield null.
   */
  async load(): Promise<ProfileSelector | null> {
    const path = getSettingsPath(this.dataDir);

    if (!existsSync(path)) {
      return null;
    }

    try {
      const data = await readFile(path, 'utf-8');
      const parsed = PersistedSettingsSchema.safeParse(JSON.parse(data));
      if (!parsed.success) {
        this.logger.warn({ path, issues: parsed.error.issues }, 'Ignoring malformed settings file');
        return null;
      }
      return parsed.data.selection;
    } catch (err) {
      this.logger.warn({ path, err }, 'Failed to load settings');
      return null;
    }
  }

  /**
   * Save the selection. Throws PersistenceFailed.
   */
  async save(selection: ProfileSelector): Promise<void> {
    const settings: PersistedSettings = {
      version: SETTINGS_VERSION,
      selection,
      updatedAt: new Date().toISOString(),
    };

    try {
      await writeFileAtomic(getSettingsPath(this.dataDir), JSON.stringify(settings, null, 2));
    } catch (err) {
      throw new TutorError('PersistenceFailed', `Failed to save settings: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }
}
