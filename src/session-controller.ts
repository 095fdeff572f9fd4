import { TutorError, errorMessage, isTutorError } from './errors.js';
import type { TutorErrorCode } from './errors.js';
import type { InstructionStore } from './instruction-store.js';
import { DEFAULT_PERSONA } from './instruction-store.js';
import { DEFAULT_VOICE, describePair, normalizePair, voiceFor } from './languages.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';
import type { MemoryGateway } from './memory-gateway.js';
import { ownerIdFor } from './memory-gateway.js';
import type { ProfileCache } from './profile-cache.js';
import type {
  ActiveProfileState,
  ControllerPhase,
  InstructionSet,
  ProfileSelector,
  RealtimeSession,
  SessionSeed,
  SettingsStore,
} from './types.js';

export type ApplyErrorCode = Extract<TutorErrorCode, 'NotFound' | 'InvalidPair' | 'SwapRejected' | 'Busy'>;

export type ApplyOutcome =
  | { ok: true; status: string; state: ActiveProfileState }
  | { ok: false; code: ApplyErrorCode; status: string };

export interface SessionControllerOptions {
  store: InstructionStore;
  cache: ProfileCache;
  session: RealtimeSession;
  memory?: MemoryGateway | null;
  settings?: SettingsStore | null;
  sharedOwners?: Readonly<Record<string, string>>;
  contextLimit?: number;
  logger?: Logger;
}

const SURFACED_CODES: readonly TutorErrorCode[] = ['NotFound', 'InvalidPair', 'SwapRejected', 'Busy'];

function isSurfaced(code: TutorErrorCode): code is ApplyErrorCode {
  return SURFACED_CODES.includes(code);
}

/**
 * Map "no persona" and the default persona id onto the default selector, and
 * normalize language pairs. Throws InvalidPair.
 */
export function normalizeSelector(selector: ProfileSelector): ProfileSelector {
  switch (selector.kind) {
    case 'persona':
      return selector.personaId === DEFAULT_PERSONA ? { kind: 'default' } : selector;
    case 'language_pair':
      return { kind: 'language_pair', pair: normalizePair(selector.pair.source, selector.pair.target) };
    case 'default':
      return selector;
  }
}

export function describeSelector(selector: ProfileSelector): string {
  switch (selector.kind) {
    case 'persona':
      return `profile "${selector.personaId}"`;
    case 'language_pair':
      return `language pair ${describePair(selector.pair)}`;
    case 'default':
      return 'default profile';
  }
}

/**
 * Append recalled learner facts to the instructions
 */
export function composeInstructions(instructions: InstructionSet, memoryContext: string): InstructionSet {
  if (!memoryContext) {
    return instructions;
  }
  return `${instructions.trimEnd()}

## LEARNER MEMORY
What you remember about this learner from earlier sessions:
${memoryContext}
`;
}

/**
 * Owns the active profile and swaps it under the live session.
 *
 * All changes go through apply(), which holds a single critical section from
 * resolution to commit. A second apply while one is running is rejected with
 * Busy. getCurrent() only ever returns committed state.
 */
export class SessionController {
  private state: ActiveProfileState;
  private phase: ControllerPhase = 'idle';
  private store: InstructionStore;
  private cache: ProfileCache;
  private session: RealtimeSession;
  private memory: MemoryGateway | null;
  private settings: SettingsStore | null;
  private sharedOwners: Readonly<Record<string, string>>;
  private contextLimit: number | undefined;
  private logger: Logger;

  constructor(options: SessionControllerOptions) {
    this.store = options.store;
    this.cache = options.cache;
    this.session = options.session;
    this.memory = options.memory ?? null;
    this.settings = options.settings ?? null;
    this.sharedOwners = options.sharedOwners ?? {};
    this.contextLimit = options.contextLimit;
    this.logger = (options.logger ?? silentLogger()).child({ component: 'session-controller' });

    const selector: ProfileSelector = { kind: 'default' };
    this.state = Object.freeze({
      selector,
      instructions: null,
      ownerId: ownerIdFor(selector, this.sharedOwners),
      generation: 0,
    });
  }

  getCurrent(): ActiveProfileState {
    return this.state;
  }

  getPhase(): ControllerPhase {
    return this.phase;
  }

  /**
   * Owner id of the committed profile. Tool calls capture this once when they start.
   */
  currentOwnerId(): string {
    return this.state.ownerId;
  }

  /**
   * Seed the session from the persisted selection, falling back to the default profile
   */
  async restore(): Promise<ApplyOutcome> {
    const saved = this.settings ? await this.settings.load() : null;
    if (!saved) {
      return this.apply({ kind: 'default' });
    }

    const outcome = await this.apply(saved);
    if (outcome.ok || outcome.code === 'Busy') {
      return outcome;
    }

    this.logger.warn({ selection: saved, status: outcome.status }, 'Saved profile could not be applied, using default');
    return this.apply({ kind: 'default' });
  }

  async apply(selector: ProfileSelector): Promise<ApplyOutcome> {
    if (this.phase === 'swapping') {
      this.logger.info({ requested: selector }, 'Rejecting apply while another is in flight');
      return { ok: false, code: 'Busy', status: 'Another profile change is already in progress' };
    }

    const previous = this.phase;
    this.phase = 'swapping';

    try {
      const next = normalizeSelector(selector);
      const instructions = await this.resolveInstructions(next);
      const ownerId = ownerIdFor(next, this.sharedOwners);
      const memoryContext = this.memory ? await this.memory.getContext(ownerId, this.contextLimit) : '';

      const seed: SessionSeed = {
        instructions: composeInstructions(instructions, memoryContext),
        memoryContext,
        voice: await this.resolveVoice(next),
        ownerId,
      };

      try {
        await this.session.configure(seed);
      } catch (err) {
        throw new TutorError('SwapRejected', `Session rejected the new configuration: ${errorMessage(err)}`, {
          cause: err,
        });
      }

      this.state = Object.freeze({
        selector: next,
        instructions,
        ownerId,
        generation: this.state.generation + 1,
      });
      await this.persist(next);
      this.phase = 'active';

      const status = `Applied ${describeSelector(next)}`;
      this.logger.info({ generation: this.state.generation, ownerId }, status);
      return { ok: true, status, state: this.state };
    } catch (err) {
      this.phase = previous;
      return this.failure(err, selector);
    }
  }

  private async resolveInstructions(selector: ProfileSelector): Promise<InstructionSet> {
    switch (selector.kind) {
      case 'persona':
        return this.store.load(selector.personaId);
      case 'language_pair':
        return this.cache.resolve(selector.pair.source, selector.pair.target);
      case 'default':
        return this.store.load(DEFAULT_PERSONA);
    }
  }

  private async resolveVoice(selector: ProfileSelector): Promise<string> {
    if (selector.kind === 'language_pair') {
      return voiceFor(selector.pair.target);
    }
    const personaId = selector.kind === 'persona' ? selector.personaId : DEFAULT_PERSONA;
    const metadata = await this.store.getMetadata(personaId);
    return metadata.voice ?? DEFAULT_VOICE;
  }

  private async persist(selector: ProfileSelector): Promise<void> {
    if (!this.settings) return;

    try {
      await this.settings.save(selector);
    } catch (err) {
      this.logger.warn(
        { code: 'PersistenceFailed', error: errorMessage(err) },
        'Active profile applied but not saved'
      );
    }
  }

  private failure(err: unknown, selector: ProfileSelector): ApplyOutcome {
    if (isTutorError(err) && isSurfaced(err.code)) {
      this.logger.warn({ code: err.code, requested: selector }, err.message);
      return { ok: false, code: err.code, status: err.message };
    }

    this.logger.error({ err, requested: selector }, 'Unexpected failure while applying profile');
    return {
      ok: false,
      code: 'SwapRejected',
      status: `Could not apply ${selector.kind === 'persona' ? selector.personaId : selector.kind}: ${errorMessage(err)}`,
    };
  }
}
