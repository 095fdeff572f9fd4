import { describe, it, expect, beforeEach } from 'vitest';
import { MemoryGateway, formatRecord, ownerIdFor, parseRecord, profileKey } from './memory-gateway.js';
import { InMemoryMemoryBackend } from './test-support/fakes.js';

describe('owner ids', () => {
  it('derives a stable owner per profile', () => {
    expect(ownerIdFor({ kind: 'default' })).toBe('default_learner');
    expect(ownerIdFor({ kind: 'persona', personaId: 'french_tutor' })).toBe('french_tutor_learner');
    expect(ownerIdFor({ kind: 'language_pair', pair: { source: 'spanish', target: 'english' } })).toBe(
      'spanish_to_english_learner'
    );
  });

  it('lets configured profiles share an owner', () => {
    const shared = { french_tutor: 'family', spanish_tutor: 'family' };
    expect(ownerIdFor({ kind: 'persona', personaId: 'french_tutor' }, shared)).toBe('family_learner');
    expect(ownerIdFor({ kind: 'persona', personaId: 'spanish_tutor' }, shared)).toBe('family_learner');
    expect(ownerIdFor({ kind: 'persona', personaId: 'german_tutor' }, shared)).toBe('german_tutor_learner');
  });

  it('names the profile key', () => {
    expect(profileKey({ kind: 'language_pair', pair: { source: 'hindi', target: 'english' } })).toBe('hindi_to_english');
  });
});

describe('record format', () => {
  it('tags content inline and parses it back', () => {
    const text = formatRecord({ category: 'struggle', ownerId: 'a_learner', content: 'Mixes up ser and estar' });
    expect(text).toBe('[struggle] [owner:a_learner] Mixes up ser and estar');
    expect(parseRecord(text)).toEqual({ category: 'struggle', ownerId: 'a_learner', content: 'Mixes up ser and estar' });
  });

  it('ignores untagged or unknown-category content', () => {
    expect(parseRecord('Likes soccer')).toBeNull();
    expect(parseRecord('[hobby] [owner:a_learner] Likes soccer')).toBeNull();
  });
});

describe('MemoryGateway', () => {
  let backend: InMemoryMemoryBackend;
  let memory: MemoryGateway;

  beforeEach(() => {
    backend = new InMemoryMemoryBackend();
    memory = new MemoryGateway(backend);
  });

  it('rejects an empty fact without contacting the backend', async () => {
    expect(await memory.remember('a_learner', '', 'progress')).toEqual({ error: 'No fact provided', stored: false });
    expect(backend.adds).toBe(0);
  });

  it('stores a fact and recalls it', async () => {
    expect(await memory.remember('a_learner', 'Likes soccer', 'preference')).toEqual({
      stored: true,
      fact: 'Likes soccer',
      category: 'preference',
    });
    expect(backend.contents).toEqual(['[preference] [owner:a_learner] Likes soccer']);

    expect(await memory.recall('a_learner', 'soccer')).toEqual({ memories: ['Likes soccer'], count: 1 });
  });

  it("never surfaces another owner's facts", async () => {
    await memory.remember('a_learner', 'Likes soccer', 'preference');
    await memory.remember('b_learner', 'Plays soccer on Sundays', 'personal');

    expect(await memory.recall('b_learner', 'soccer')).toEqual({ memories: ['Plays soccer on Sundays'], count: 1 });
    expect(await memory.recall('c_learner', 'soccer')).toEqual({ memories: [], count: 0 });
  });

  it('caps recall at the search limit', async () => {
    const limited = new MemoryGateway(backend, { searchLimit: 2 });
    for (const n of [1, 2, 3]) {
      await limited.remember('a_learner', `Word ${n} learned`, 'progress');
    }
    expect(await limited.recall('a_learner', 'word')).toEqual({
      memories: ['Word 1 learned', 'Word 2 learned'],
      count: 2,
    });
  });

  it('rejects an empty query', async () => {
    expect(await memory.recall('a_learner', '  ')).toEqual({ error: 'No query provided', memories: [] });
    expect(backend.searches).toBe(0);
  });

  it('fails soft when the backend throws', async () => {
    backend.failWith = new Error('503');

    expect(await memory.recall('a_learner', 'soccer')).toEqual({ error: 'Memory unavailable', memories: [] });
    expect(await memory.remember('a_learner', 'Likes soccer', 'preference')).toEqual({
      error: 'Memory unavailable',
      stored: false,
    });
    expect(await memory.getContext('a_learner')).toBe('');
  });

  it('reports memory as not available without a backend', async () => {
    const none = new MemoryGateway(null);
    expect(none.available).toBe(false);
    expect(await none.recall('a_learner', 'soccer')).toEqual({ error: 'Memory not available', memories: [] });
    expect(await none.remember('a_learner', 'Likes soccer', 'preference')).toEqual({
      error: 'Memory not available',
      stored: false,
    });
    expect(await none.getContext('a_learner')).toBe('');
  });

  it('renders the owner context as bullet lines', async () => {
    await memory.remember('a_learner', 'Name is Ana', 'personal');
    await memory.remember('b_learner', 'Name is Ben', 'personal');
    await memory.remember('a_learner', 'Finished lesson on greetings', 'progress');

    expect(await memory.getContext('a_learner')).toBe('- [personal] Name is Ana\n- [progress] Finished lesson on greetings');
    expect(await memory.getContext('a_learner', 1)).toBe('- [personal] Name is Ana');
    expect(await memory.getContext('a_learner', 0)).toBe('');
  });
});
