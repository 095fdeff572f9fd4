import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { join } from 'path';
import { InstructionStore } from './instruction-store.js';
import { MemoryGateway } from './memory-gateway.js';
import { ProfileCache } from './profile-cache.js';
import { ProfileGenerator } from './profile-generator.js';
import { SessionController } from './session-controller.js';
import { FileSessionSink } from './session-sink.js';
import { TOOLS, handleToolCall } from './tools.js';
import type { ToolContext } from './tools.js';
import { InMemoryMemoryBackend, gate, makeTempDir, removeTempDir } from './test-support/fakes.js';

function textOf(result: CallToolResult): string {
  const [first] = result.content;
  if (first?.type !== 'text') {
    throw new Error('expected a text result');
  }
  return first.text;
}

function jsonOf(result: CallToolResult): unknown {
  return JSON.parse(textOf(result));
}

describe('tools', () => {
  let dir: string;
  let backend: InMemoryMemoryBackend;
  let sink: FileSessionSink;
  let ctx: ToolContext;

  beforeEach(async () => {
    dir = await makeTempDir();
    backend = new InMemoryMemoryBackend();
    sink = new FileSessionSink(join(dir, 'session', 'instructions.md'));
    const store = new InstructionStore();
    const memory = new MemoryGateway(backend);
    const controller = new SessionController({
      store,
      cache: new ProfileCache(join(dir, 'cache'), new ProfileGenerator(null)),
      session: sink,
      memory,
    });
    ctx = { controller, memory, store, getSeed: () => sink.getSeed() };
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('declares recall and remember with their parameter contracts', () => {
    const recall = TOOLS.find(t => t.name === 'recall');
    const remember = TOOLS.find(t => t.name === 'remember');

    expect(recall?.inputSchema.required).toEqual(['query']);
    expect(remember?.inputSchema.required).toEqual(['fact', 'category']);
    expect(remember?.inputSchema.properties).toMatchObject({
      category: { enum: ['progress', 'preference', 'struggle', 'success', 'personal', 'conversation'] },
    });
  });

  it('remembers and recalls under the active owner', async () => {
    await handleToolCall(ctx, 'tutor_apply_profile', { profile: 'french_tutor' });

    const stored = await handleToolCall(ctx, 'remember', { fact: 'Likes soccer', category: 'preference' });
    expect(jsonOf(stored)).toEqual({ stored: true, fact: 'Likes soccer', category: 'preference' });
    expect(backend.contents).toEqual(['[preference] [owner:french_tutor_learner] Likes soccer']);

    const recalled = await handleToolCall(ctx, 'recall', { query: 'soccer' });
    expect(jsonOf(recalled)).toEqual({ memories: ['Likes soccer'], count: 1 });

    await handleToolCall(ctx, 'tutor_apply_profile', { profile: 'german_tutor' });
    expect(jsonOf(await handleToolCall(ctx, 'recall', { query: 'soccer' }))).toEqual({ memories: [], count: 0 });
  });

  it('files a fact under the owner that was active when the call began', async () => {
    await handleToolCall(ctx, 'tutor_apply_profile', { profile: 'french_tutor' });
    const release = gate();
    backend.hold = release.wait;

    const pending = handleToolCall(ctx, 'remember', { fact: 'Likes soccer', category: 'preference' });
    const applied = await handleToolCall(ctx, 'tutor_apply_profile', { profile: 'german_tutor' });
    expect(jsonOf(applied)).toMatchObject({ ok: true, generation: 2 });

    release.release();
    expect(jsonOf(await pending)).toEqual({ stored: true, fact: 'Likes soccer', category: 'preference' });
    expect(backend.contents).toEqual(['[preference] [owner:french_tutor_learner] Likes soccer']);
    expect(ctx.controller.currentOwnerId()).toBe('german_tutor_learner');
  });

  it('returns a structured error for an empty fact', async () => {
    const result = await handleToolCall(ctx, 'remember', { fact: '', category: 'progress' });
    expect(result.isError).toBeUndefined();
    expect(jsonOf(result)).toEqual({ error: 'No fact provided', stored: false });
    expect(backend.adds).toBe(0);
  });

  it('returns a structured error for an unknown category', async () => {
    const result = await handleToolCall(ctx, 'remember', { fact: 'Likes soccer', category: 'hobby' });
    expect(jsonOf(result)).toEqual({ error: 'Invalid category', stored: false });
  });

  it('applies a language pair and reports status', async () => {
    const applied = await handleToolCall(ctx, 'tutor_apply_language_pair', { source: 'Spanish', target: 'English' });
    expect(jsonOf(applied)).toEqual({ ok: true, status: 'Applied language pair Español → English', generation: 1 });

    expect(jsonOf(await handleToolCall(ctx, 'tutor_status'))).toEqual({
      phase: 'active',
      selector: { kind: 'language_pair', pair: { source: 'spanish', target: 'english' } },
      profile: 'spanish_to_english',
      description: 'language pair Español → English',
      generation: 1,
      ownerId: 'spanish_to_english_learner',
      memory_available: true,
    });
  });

  it('marks a failed apply as an error result', async () => {
    const result = await handleToolCall(ctx, 'tutor_apply_language_pair', { source: 'english', target: 'english' });
    expect(result.isError).toBe(true);
    expect(jsonOf(result)).toEqual({
      ok: false,
      code: 'InvalidPair',
      status: 'Source and target languages must be different',
    });
  });

  it('resets to the default profile without a profile argument', async () => {
    await handleToolCall(ctx, 'tutor_apply_profile', { profile: 'italian_tutor' });
    const result = await handleToolCall(ctx, 'tutor_apply_profile', {});
    expect(jsonOf(result)).toEqual({ ok: true, status: 'Applied default profile', generation: 2 });
  });

  it('rejects malformed apply arguments', async () => {
    const result = await handleToolCall(ctx, 'tutor_apply_language_pair', { source: 'english' });
    expect(result.isError).toBe(true);
    expect(textOf(result)).toBe('Invalid arguments for tutor_apply_language_pair: target: Required');
  });

  it('returns the bound session seed', async () => {
    expect((await handleToolCall(ctx, 'tutor_get_session')).isError).toBe(true);

    await handleToolCall(ctx, 'tutor_apply_profile', { profile: 'german_tutor' });
    const seed = jsonOf(await handleToolCall(ctx, 'tutor_get_session'));
    expect(seed).toMatchObject({ voice: 'ash', ownerId: 'german_tutor_learner', memoryContext: '' });
  });

  it('lists profiles and languages', async () => {
    const profiles = jsonOf(await handleToolCall(ctx, 'tutor_list_profiles'));
    expect(profiles).toContainEqual(expect.objectContaining({ id: 'spanish_tutor', displayName: 'Sofia' }));

    const languages = jsonOf(await handleToolCall(ctx, 'tutor_list_languages'));
    expect(languages).toContainEqual({ code: 'german', nativeName: 'Deutsch', flag: '🇩🇪', voice: 'ash' });
  });

  it('reports unknown tools as errors', async () => {
    const result = await handleToolCall(ctx, 'dance');
    expect(result).toEqual({ content: [{ type: 'text', text: 'Unknown tool: dance' }], isError: true });
  });
});
