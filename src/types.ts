/**
 * Fully expanded system-prompt text that seeds a conversational session
 */
export type InstructionSet = string;

/**
 * Identifier of a static, file-backed persona (e.g. "french_tutor")
 */
export type PersonaId = string;

/**
 * Ordered (source, target) language selector, lower-cased
 */
export interface LanguagePair {
  source: string;
  target: string;
}

/**
 * What the learner picked: a persona, a language pair, or nothing (default persona)
 */
export type ProfileSelector =
  | { kind: 'persona'; personaId: PersonaId }
  | { kind: 'language_pair'; pair: LanguagePair }
  | { kind: 'default' };

/**
 * Committed profile state. Exactly one selector kind is ever set.
 */
export interface ActiveProfileState {
  selector: ProfileSelector;
  instructions: InstructionSet | null;
  ownerId: string;
  generation: number;
}

/**
 * Session controller lifecycle
 */
export type ControllerPhase = 'idle' | 'active' | 'swapping';

/**
 * Everything handed to the realtime session on a swap
 */
export interface SessionSeed {
  instructions: InstructionSet;
  memoryContext: string;
  voice: string;
  ownerId: string;
}

/**
 * Port to the live realtime voice session
 */
export interface RealtimeSession {
  configure(seed: SessionSeed): Promise<void>;
}

/**
 * Memory categories the tutor may file a fact under
 */
export const MEMORY_CATEGORIES = [
  'progress',
  'preference',
  'struggle',
  'success',
  'personal',
  'conversation',
] as const;

export type MemoryCategory = (typeof MEMORY_CATEGORIES)[number];

/**
 * A learner fact as stored by the memory backend
 */
export interface MemoryRecord {
  category: MemoryCategory;
  content: string;
  ownerId: string;
}

/**
 * Raw search hit from a memory backend, best first
 */
export interface MemorySearchHit {
  content: string;
}

/**
 * Port to a memory service
 */
export interface MemoryBackend {
  readonly name: string;
  add(content: string): Promise<void>;
  /**
   * Ranked hits for the query. A backend that can read the inline owner tag
   * drops other owners' records before ranking when `ownerId` is given;
   * others may ignore it, so callers still filter.
   */
  search(query: string, limit: number, ownerId?: string): Promise<MemorySearchHit[]>;
}

export type RecallResult =
  | { memories: string[]; count: number }
  | { error: string; memories: string[] };

export type RememberResult =
  | { stored: true; fact: string; category: MemoryCategory }
  | { stored: false; error: string };

/**
 * Request sent to a text-generation service
 */
export interface CompletionRequest {
  model: string;
  system: string;
  user: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
}

/**
 * Port to a text-generation service. Resolves with the completion text or rejects.
 */
export interface CompletionBackend {
  complete(request: CompletionRequest): Promise<string>;
}

/**
 * Selection persisted across restarts
 */
export interface PersistedSettings {
  version: number;
  selection: ProfileSelector;
  updatedAt: string;
}

/**
 * Port that stores the active selection
 */
export interface SettingsStore {
  load(): Promise<ProfileSelector | null>;
  save(selection: ProfileSelector): Promise<void>;
}

/**
 * Display metadata for a persona
 */
export interface PersonaMetadata {
  displayName?: string;
  language?: string;
  flag?: string;
  voice?: string;
  description?: string;
}

export interface PersonaSummary extends PersonaMetadata {
  id: PersonaId;
}
