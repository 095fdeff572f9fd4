import { writeFileAtomic } from './persistence.js';
import type { RealtimeSession, SessionSeed } from './types.js';

/**
 * Render a seed the way the voice host reads it: a small header then the instructions
 */
export function renderSeed(seed: SessionSeed): string {
  return `<!-- voice: ${seed.voice} -->
<!-- owner: ${seed.ownerId} -->

${seed.instructions}
`;
}

/**
 * Realtime session port backed by a file the voice host watches. The last
 * configured seed is also kept in memory.
 */
export class FileSessionSink implements RealtimeSession {
  private current: SessionSeed | null = null;

  constructor(readonly path: string) {}

  async configure(seed: SessionSeed): Promise<void> {
    await writeFileAtomic(this.path, renderSeed(seed));
    this.current = seed;
  }

  getSeed(): SessionSeed | null {
    return this.current;
  }
}
