import type { Server } from '@modelcontextprotocol/sdk/server/index.js';
import type { TutorConfig } from './config.js';
import { InstructionStore } from './instruction-store.js';
import type { Logger } from './logger.js';
import { LocalMemoryBackend, SupermemoryBackend } from './memory-backends.js';
import { MemoryGateway } from './memory-gateway.js';
import { FileSettingsStore, getLocalMemoryPath, getSessionPath } from './persistence.js';
import { ProfileCache } from './profile-cache.js';
import { OpenAIChatBackend, ProfileGenerator } from './profile-generator.js';
import { createServer } from './server.js';
import { SessionController } from './session-controller.js';
import { FileSessionSink } from './session-sink.js';
import type { MemoryBackend } from './types.js';

export interface TutorApp {
  store: InstructionStore;
  cache: ProfileCache;
  memory: MemoryGateway;
  sink: FileSessionSink;
  controller: SessionController;
  server: Server;
}

export interface TutorAppOverrides {
  fetch?: typeof fetch;
}

function createMemoryBackend(config: TutorConfig, overrides: TutorAppOverrides): MemoryBackend | null {
  const { memory } = config;
  switch (memory.backend) {
    case 'supermemory':
      return memory.apiKey
        ? new SupermemoryBackend({
            apiKey: memory.apiKey,
            baseUrl: memory.baseUrl,
            timeoutMs: memory.timeoutMs,
            fetch: overrides.fetch,
          })
        : null;
    case 'local':
      return new LocalMemoryBackend(getLocalMemoryPath(config.dataDir));
    case 'none':
      return null;
  }
}

/**
 * Wire every component from configuration
 */
export function createTutorApp(config: TutorConfig, logger: Logger, overrides: TutorAppOverrides = {}): TutorApp {
  const store = new InstructionStore({
    profilesDir: config.profilesDir,
    promptsDir: config.promptsDir,
    logger,
  });

  const { generation } = config;
  const completionBackend = generation.apiKey
    ? new OpenAIChatBackend({ apiKey: generation.apiKey, baseUrl: generation.baseUrl, fetch: overrides.fetch })
    : null;
  const generator = new ProfileGenerator(
    completionBackend,
    {
      model: generation.model,
      temperature: generation.temperature,
      maxTokens: generation.maxTokens,
      timeoutMs: generation.timeoutMs,
    },
    logger
  );
  const cache = new ProfileCache(config.cacheDir, generator, logger);

  const memoryBackend = createMemoryBackend(config, overrides);
  const memory = new MemoryGateway(
    memoryBackend,
    { contextLimit: config.memory.contextLimit, searchLimit: config.memory.searchLimit },
    logger
  );

  const sink = new FileSessionSink(getSessionPath(config.dataDir));
  const controller = new SessionController({
    store,
    cache,
    session: sink,
    memory,
    settings: new FileSettingsStore(config.dataDir, logger),
    sharedOwners: config.memory.sharedOwners,
    contextLimit: config.memory.contextLimit,
    logger,
  });

  const server = createServer({
    controller,
    memory,
    store,
    getSeed: () => sink.getSeed(),
  });

  logger.info(
    {
      dataDir: config.dataDir,
      generation: completionBackend ? generation.model : 'fallback-template',
      memory: memoryBackend?.name ?? 'none',
    },
    'Tutor components ready'
  );

  return { store, cache, memory, sink, controller, server };
}
