import { describe, it, expect } from 'vitest';
import { join } from 'path';
import { loadConfig, parseSharedOwners } from './config.js';
import { PACKAGED_PROFILES_DIR } from './instruction-store.js';
import { DEFAULT_DATA_DIR } from './persistence.js';

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.dataDir).toBe(DEFAULT_DATA_DIR);
    expect(config.cacheDir).toBe(join(DEFAULT_DATA_DIR, 'generated_profiles'));
    expect(config.profilesDir).toBe(PACKAGED_PROFILES_DIR);
    expect(config.generation).toEqual({
      apiKey: null,
      baseUrl: 'https://api.openai.com/v1',
      model: 'gpt-4o-mini',
      timeoutMs: 60_000,
      temperature: 0.7,
      maxTokens: 4000,
    });
    expect(config.memory.backend).toBe('local');
    expect(config.memory.contextLimit).toBe(10);
    expect(config.log).toEqual({ level: 'info', pretty: false });
  });

  it('reads credentials and overrides', () => {
    const config = loadConfig({
      TUTOR_DATA_DIR: '/srv/tutor',
      OPENAI_API_KEY: 'test-openai',
      TUTOR_GENERATION_TIMEOUT_MS: '5000',
      SUPERMEMORY_API_KEY: 'test-memory',
      TUTOR_MEMORY_SHARED_OWNERS: 'french_tutor=family, spanish_tutor=family',
      LOG_LEVEL: 'debug',
      LOG_PRETTY: 'true',
    });

    expect(config.cacheDir).toBe(join('/srv/tutor', 'generated_profiles'));
    expect(config.generation.apiKey).toBe('test-openai');
    expect(config.generation.timeoutMs).toBe(5000);
    expect(config.memory.backend).toBe('supermemory');
    expect(config.memory.sharedOwners).toEqual({ french_tutor: 'family', spanish_tutor: 'family' });
    expect(config.log).toEqual({ level: 'debug', pretty: true });
  });

  it('treats blank credentials as missing', () => {
    expect(loadConfig({ OPENAI_API_KEY: '  ' }).generation.apiKey).toBeNull();
  });

  it('honours an explicit memory backend', () => {
    expect(loadConfig({ TUTOR_MEMORY_BACKEND: 'none', SUPERMEMORY_API_KEY: 'test-memory' }).memory.backend).toBe('none');
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig({ TUTOR_GENERATION_TIMEOUT_MS: 'soon' })).toThrow(/TUTOR_GENERATION_TIMEOUT_MS/);
    expect(() => loadConfig({ TUTOR_MEMORY_BACKEND: 'redis' })).toThrow(/TUTOR_MEMORY_BACKEND/);
    expect(() => loadConfig({ TUTOR_MEMORY_BACKEND: 'supermemory' })).toThrow(/SUPERMEMORY_API_KEY/);
  });
});

describe('parseSharedOwners', () => {
  it('rejects entries without an owner', () => {
    expect(() => parseSharedOwners('french_tutor')).toThrow('Invalid TUTOR_MEMORY_SHARED_OWNERS entry: "french_tutor"');
  });
});
