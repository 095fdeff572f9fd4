import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { join } from 'path';
import { errorMessage } from './errors.js';
import { normalizePair, pairKey } from './languages.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';
import { writeFileAtomic } from './persistence.js';
import type { ProfileGenerator } from './profile-generator.js';
import type { InstructionSet, LanguagePair } from './types.js';

/**
 * Disk-backed instruction sets per language pair, one `<source>_to_<target>.txt`
 * per pair. A present file is a hit; there is no expiry.
 */
export class ProfileCache {
  private logger: Logger;
  // One resolution per key at a time; concurrent callers share the pending result.
  private inflight = new Map<string, Promise<InstructionSet>>();

  constructor(
    readonly cacheDir: string,
    private generator: ProfileGenerator,
    logger?: Logger
  ) {
    this.logger = (logger ?? silentLogger()).child({ component: 'profile-cache' });
  }

  getCachePath(pair: LanguagePair): string {
    return join(this.cacheDir, `${pairKey(pair)}.txt`);
  }

  /**
   * Cached instructions for the pair, generating and storing them on a miss. Throws InvalidPair.
   */
  async resolve(source: string, target: string): Promise<InstructionSet> {
    const pair = normalizePair(source, target);
    const key = pairKey(pair);

    const pending = this.inflight.get(key);
    if (pending) {
      this.logger.debug({ key }, 'Joining in-flight resolution');
      return pending;
    }

    const task = this.readOrGenerate(pair).finally(() => {
      this.inflight.delete(key);
    });
    this.inflight.set(key, task);
    return task;
  }

  private async readOrGenerate(pair: LanguagePair): Promise<InstructionSet> {
    const cached = await this.read(pair);
    if (cached !== null) {
      this.logger.info({ key: pairKey(pair) }, 'Using cached profile');
      return cached;
    }
    return this.generateAndStore(pair);
  }

  private async read(pair: LanguagePair): Promise<InstructionSet | null> {
    const path = this.getCachePath(pair);
    if (!existsSync(path)) {
      return null;
    }

    try {
      return await readFile(path, 'utf-8');
    } catch (err) {
      this.logger.warn({ path, error: errorMessage(err) }, 'Failed to read cached profile');
      return null;
    }
  }

  private async generateAndStore(pair: LanguagePair): Promise<InstructionSet> {
    this.logger.info({ key: pairKey(pair) }, 'Generating new profile');
    const instructions = await this.generator.generate(pair.source, pair.target);

    const path = this.getCachePath(pair);
    try {
      await writeFileAtomic(path, instructions);
      this.logger.info({ path }, 'Cached profile saved');
    } catch (err) {
      this.logger.warn(
        { code: 'PersistenceFailed', path, error: errorMessage(err) },
        'Failed to cache profile'
      );
    }

    return instructions;
  }
}
