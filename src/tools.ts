import type { CallToolResult, Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { errorMessage } from './errors.js';
import type { InstructionStore } from './instruction-store.js';
import { LANGUAGES } from './languages.js';
import type { MemoryGateway } from './memory-gateway.js';
import { profileKey } from './memory-gateway.js';
import type { ApplyOutcome, SessionController } from './session-controller.js';
import { describeSelector } from './session-controller.js';
import { MEMORY_CATEGORIES } from './types.js';
import type { ProfileSelector, SessionSeed } from './types.js';

export interface ToolContext {
  controller: SessionController;
  memory: MemoryGateway;
  store: InstructionStore;
  getSeed: () => SessionSeed | null;
}

export const TOOLS: Tool[] = [
  {
    name: 'recall',
    description:
      'Search your memory for information about this learner from previous sessions. ' +
      'Use this to check their progress, preferences, or past struggles before giving advice.',
    inputSchema: {
      type: 'object',
      properties: {
        query: {
          type: 'string',
          description:
            "What to search for, e.g., 'vocabulary struggles', 'preferred topics', " +
            "'last session progress', 'grammar they find difficult'",
        },
      },
      required: ['query'],
    },
  },
  {
    name: 'remember',
    description:
      'Store an important fact about this learner for future sessions. ' +
      'Use this to record progress, struggles, preferences, or successes ' +
      'so you can provide personalized tutoring next time.',
    inputSchema: {
      type: 'object',
      properties: {
        fact: {
          type: 'string',
          description:
            "The fact to remember, e.g., 'Learner struggles with subjunctive', " +
            "'Prefers topics about Mexican culture', 'Successfully used preterite vs imperfect today'",
        },
        category: {
          type: 'string',
          enum: [...MEMORY_CATEGORIES],
          description:
            'Category of the memory: progress (general notes), preference (what they like), ' +
            "struggle (what's difficult), success (what they mastered), personal (name and life details), " +
            'conversation (what was talked about)',
        },
      },
      required: ['fact', 'category'],
    },
  },
  {
    name: 'tutor_apply_profile',
    description: 'Switch the live session to a preset tutor profile. Omit profile (or pass "default") for the default tutor.',
    inputSchema: {
      type: 'object',
      properties: {
        profile: { type: 'string', description: 'Profile id, e.g. "french_tutor"' },
      },
    },
  },
  {
    name: 'tutor_apply_language_pair',
    description:
      'Switch the live session to a tutor for a language pair, generating the tutor on first use (may take 10-30 s).',
    inputSchema: {
      type: 'object',
      properties: {
        source: { type: 'string', description: "Learner's native language, e.g. \"chinese\"" },
        target: { type: 'string', description: 'Language being learned, e.g. "english"' },
      },
      required: ['source', 'target'],
    },
  },
  {
    name: 'tutor_status',
    description: 'Get the active profile, its generation counter, and the memory owner.',
    inputSchema: { type: 'object', properties: {} },
  },
  {
    name: 'tutor_list_profiles',
    description: 'List preset tutor profiles with their display metadata.',
    inputSchema: { type: 'object', properties: {} },
  },
  {
    name: 'tutor_list_languages',
    description: 'List languages with native names and voices for language-pair tutors.',
    inputSchema: { type: 'object', properties: {} },
  },
  {
    name: 'tutor_get_session',
    description: 'Get the instructions and voice currently bound to the live session.',
    inputSchema: { type: 'object', properties: {} },
  },
];

const RecallArgs = z.object({ query: z.string().default('') });

const RememberArgs = z.object({
  fact: z.string().default(''),
  category: z.enum(MEMORY_CATEGORIES).default('progress'),
});

const ApplyProfileArgs = z.object({ profile: z.string().optional() });

const ApplyLanguagePairArgs = z.object({ source: z.string(), target: z.string() });

function json(value: unknown, isError = false): CallToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify(value, null, 2) }],
    ...(isError ? { isError: true } : {}),
  };
}

function text(value: string, isError = false): CallToolResult {
  return {
    content: [{ type: 'text', text: value }],
    ...(isError ? { isError: true } : {}),
  };
}

function invalidArgs(name: string, error: z.ZodError): CallToolResult {
  const problems = error.issues.map(i => `${i.path.join('.') || 'arguments'}: ${i.message}`).join('; ');
  return text(`Invalid arguments for ${name}: ${problems}`, true);
}

function applyResult(outcome: ApplyOutcome): CallToolResult {
  if (outcome.ok) {
    return json({ ok: true, status: outcome.status, generation: outcome.state.generation });
  }
  return json({ ok: false, code: outcome.code, status: outcome.status }, true);
}

function selectorForProfile(profile: string | undefined): ProfileSelector {
  return profile && profile.trim() ? { kind: 'persona', personaId: profile.trim() } : { kind: 'default' };
}

/**
 * Dispatch one tool call. Never throws: failures come back as results.
 */
export async function handleToolCall(
  ctx: ToolContext,
  name: string,
  args: Record<string, unknown> = {}
): Promise<CallToolResult> {
  try {
    switch (name) {
      case 'recall': {
        const ownerId = ctx.controller.currentOwnerId();
        const parsed = RecallArgs.safeParse(args);
        if (!parsed.success) {
          return json({ error: 'Invalid query', memories: [] });
        }
        return json(await ctx.memory.recall(ownerId, parsed.data.query));
      }

      case 'remember': {
        const ownerId = ctx.controller.currentOwnerId();
        const parsed = RememberArgs.safeParse(args);
        if (!parsed.success) {
          const problem = parsed.error.issues[0]?.path[0] === 'category' ? 'Invalid category' : 'Invalid fact';
          return json({ error: problem, stored: false });
        }
        return json(await ctx.memory.remember(ownerId, parsed.data.fact, parsed.data.category));
      }

      case 'tutor_apply_profile': {
        const parsed = ApplyProfileArgs.safeParse(args);
        if (!parsed.success) return invalidArgs(name, parsed.error);
        return applyResult(await ctx.controller.apply(selectorForProfile(parsed.data.profile)));
      }

      case 'tutor_apply_language_pair': {
        const parsed = ApplyLanguagePairArgs.safeParse(args);
        if (!parsed.success) return invalidArgs(name, parsed.error);
        const { source, target } = parsed.data;
        return applyResult(await ctx.controller.apply({ kind: 'language_pair', pair: { source, target } }));
      }

      case 'tutor_status': {
        const state = ctx.controller.getCurrent();
        return json({
          phase: ctx.controller.getPhase(),
          selector: state.selector,
          profile: profileKey(state.selector),
          description: describeSelector(state.selector),
          generation: state.generation,
          ownerId: state.ownerId,
          memory_available: ctx.memory.available,
        });
      }

      case 'tutor_list_profiles': {
        return json(await ctx.store.listPersonas());
      }

      case 'tutor_list_languages': {
        return json(
          Object.entries(LANGUAGES).map(([code, info]) => ({ code, ...info }))
        );
      }

      case 'tutor_get_session': {
        const seed = ctx.getSeed();
        if (!seed) {
          return text('No session has been configured yet', true);
        }
        return json(seed);
      }

      default:
        return text(`Unknown tool: ${name}`, true);
    }
  } catch (error) {
    return text(`Error: ${errorMessage(error)}`, true);
  }
}
