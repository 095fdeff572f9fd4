import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import { FileSessionSink, renderSeed } from './session-sink.js';
import { makeTempDir, removeTempDir } from './test-support/fakes.js';
import type { SessionSeed } from './types.js';

const SEED: SessionSeed = {
  instructions: '## IDENTITY\nYou are Lukas.',
  memoryContext: '',
  voice: 'ash',
  ownerId: 'german_tutor_learner',
};

describe('FileSessionSink', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('renders the voice and owner header before the instructions', () => {
    expect(renderSeed(SEED)).toBe(
      '<!-- voice: ash -->\n<!-- owner: german_tutor_learner -->\n\n## IDENTITY\nYou are Lukas.\n'
    );
  });

  it('writes the seed and remembers it', async () => {
    const sink = new FileSessionSink(join(dir, 'session', 'instructions.md'));
    expect(sink.getSeed()).toBeNull();

    await sink.configure(SEED);

    expect(sink.getSeed()).toEqual(SEED);
    expect(await readFile(sink.path, 'utf-8')).toBe(renderSeed(SEED));
  });

  it('keeps the previous seed when the write fails', async () => {
    const blocked = join(dir, 'blocked');
    await writeFile(blocked, 'file, not a directory');
    const sink = new FileSessionSink(join(blocked, 'instructions.md'));

    await expect(sink.configure(SEED)).rejects.toThrow();
    expect(sink.getSeed()).toBeNull();
  });
});
