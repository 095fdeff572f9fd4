import { readFile, readdir } from 'fs/promises';
import { existsSync } from 'fs';
import { join } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { TutorError } from './errors.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';
import type { InstructionSet, PersonaId, PersonaMetadata, PersonaSummary } from './types.js';

export const DEFAULT_PERSONA: PersonaId = 'default';

export const PACKAGED_PROFILES_DIR = fileURLToPath(new URL('../profiles', import.meta.url));
export const PACKAGED_PROMPTS_DIR = fileURLToPath(new URL('../prompts', import.meta.url));

const INSTRUCTIONS_FILE = 'instructions.txt';
const METADATA_FILE = 'metadata.json';

const PERSONA_ID = /^[A-Za-z0-9_-]+$/;
// "_to_" is reserved for language pair keys, which share the owner id namespace.
const PAIR_SEPARATOR = '_to_';

function isPersonaId(id: string): boolean {
  return PERSONA_ID.test(id) && !id.includes(PAIR_SEPARATOR);
}
// A whole line reading e.g. "[language_tutoring/memory_usage]"
const PLACEHOLDER_LINE = /^\[([A-Za-z0-9_-]+(?:\/[A-Za-z0-9_-]+)*)\]$/;

const PersonaMetadataSchema = z.object({
  displayName: z.string().optional(),
  language: z.string().optional(),
  flag: z.string().optional(),
  voice: z.string().optional(),
  description: z.string().optional(),
});

const MetadataFileSchema = z.record(PersonaMetadataSchema);

export interface InstructionStoreOptions {
  profilesDir?: string;
  promptsDir?: string;
  logger?: Logger;
}

/**
 * File-backed persona definitions with shared prompt fragments.
 *
 * Personas live in `<profilesDir>/<id>/instructions.txt`; fragments in
 * `<promptsDir>/<namespace>/<name>.txt` and are pulled in by a line holding
 * only `[namespace/name]`.
 */
export class InstructionStore {
  readonly profilesDir: string;
  readonly promptsDir: string;
  private logger: Logger;
  private metadata: Record<string, PersonaMetadata> | null = null;

  constructor(options: InstructionStoreOptions = {}) {
    this.profilesDir = options.profilesDir ?? PACKAGED_PROFILES_DIR;
    this.promptsDir = options.promptsDir ?? PACKAGED_PROMPTS_DIR;
    this.logger = (options.logger ?? silentLogger()).child({ component: 'instruction-store' });
  }

  /**
   * Load and expand a persona. Throws NotFound.
   */
  async load(personaId: PersonaId): Promise<InstructionSet> {
    if (!isPersonaId(personaId)) {
      throw new TutorError('NotFound', `Profile not found: ${personaId}`);
    }

    const path = join(this.profilesDir, personaId, INSTRUCTIONS_FILE);
    let raw: string;
    try {
      raw = await readFile(path, 'utf-8');
    } catch (err) {
      throw new TutorError('NotFound', `Profile not found: ${personaId}`, { cause: err });
    }

    return this.expand(raw);
  }

  /**
   * Replace fragment placeholders with fragment text. Single pass: fragment
   * content is inserted as-is. Unknown placeholders stay untouched.
   */
  async expand(rawText: string): Promise<InstructionSet> {
    const lines = rawText.split('\n');
    const expanded: string[] = [];

    for (const line of lines) {
      const match = PLACEHOLDER_LINE.exec(line.trim());
      if (!match) {
        expanded.push(line);
        continue;
      }

      const fragment = await this.readFragment(match[1]);
      expanded.push(fragment ?? line);
    }

    return expanded.join('\n');
  }

  /**
   * Persona ids with an instructions file, sorted, with display metadata
   */
  async listPersonas(): Promise<PersonaSummary[]> {
    if (!existsSync(this.profilesDir)) {
      return [];
    }

    const entries = await readdir(this.profilesDir, { withFileTypes: true });
    const metadata = await this.loadMetadata();

    return entries
      .filter(e => e.isDirectory() && isPersonaId(e.name))
      .filter(e => existsSync(join(this.profilesDir, e.name, INSTRUCTIONS_FILE)))
      .map(e => e.name)
      .sort()
      .map(id => ({ id, ...metadata[id] }));
  }

  async getMetadata(personaId: PersonaId): Promise<PersonaMetadata> {
    const metadata = await this.loadMetadata();
    return Object.hasOwn(metadata, personaId) ? metadata[personaId] : {};
  }

  private async readFragment(name: string): Promise<string | null> {
    const path = join(this.promptsDir, `${name}.txt`);
    if (!existsSync(path)) {
      this.logger.debug({ fragment: name }, 'Leaving unknown placeholder unexpanded');
      return null;
    }

    try {
      const content = await readFile(path, 'utf-8');
      return content.trimEnd();
    } catch (err) {
      this.logger.warn({ fragment: name, err }, 'Failed to read prompt fragment');
      return null;
    }
  }

  private async loadMetadata(): Promise<Record<string, PersonaMetadata>> {
    if (this.metadata) {
      return this.metadata;
    }

    const path = join(this.profilesDir, METADATA_FILE);
    if (!existsSync(path)) {
      this.metadata = {};
      return this.metadata;
    }

    try {
      const parsed = MetadataFileSchema.safeParse(JSON.parse(await readFile(path, 'utf-8')));
      if (parsed.success) {
        this.metadata = parsed.data;
      } else {
        this.logger.warn({ path, issues: parsed.error.issues }, 'Ignoring malformed persona metadata');
        this.metadata = {};
      }
    } catch (err) {
      this.logger.warn({ path, err }, 'Failed to load persona metadata');
      this.metadata = {};
    }
    return this.metadata;
  }
}
