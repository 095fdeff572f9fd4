import { z } from 'zod';
import { errorMessage } from './errors.js';
import { displayName } from './languages.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';
import type { CompletionBackend, CompletionRequest, InstructionSet } from './types.js';

export interface GeneratorConfig {
  model: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
}

export const DEFAULT_GENERATOR_CONFIG: GeneratorConfig = {
  model: 'gpt-4o-mini',
  temperature: 0.7,
  maxTokens: 4000,
  timeoutMs: 60_000,
};

const SYSTEM_PROMPT = 'You are an expert in language education and cross-linguistic pedagogy.';

/**
 * Prompt asking for a complete tutor persona for `target` taught to `source` speakers
 */
export function buildGenerationPrompt(source: string, target: string): string {
  const s = displayName(source);
  const t = displayName(target);

  return `Create a language tutor profile for teaching ${t} to native ${s} speakers.

The profile should be a system prompt for an AI language tutor robot. Include:

1. IDENTITY: A friendly tutor persona with a name appropriate for the target language
2. LANGUAGE PAIR: Clearly state source (${s}) and target (${t}) languages
3. PROACTIVE ENGAGEMENT: How to greet learners, check memory for returning users
4. LANGUAGE BEHAVIOR: When to use ${s} for explanations vs ${t} for practice
5. ADAPTIVE SUPPORT: How to detect and respond to learner struggles
6. LANGUAGE-SPECIFIC CHALLENGES: Common difficulties ${s} speakers have learning ${t}:
   - Pronunciation challenges (sounds that don't exist in ${s})
   - Grammar differences (structures that work differently)
   - Cultural/communication style differences
7. CORRECTION STYLE: How to gently correct mistakes
8. GRAMMAR EXPLANATION: How to explain grammar in ${s}
9. ROBOT EXPRESSIVENESS: Use dance, emotions, head movements for engagement
10. MEMORY USAGE: Store learner name, track struggles, celebrate progress

Format as a system prompt with ## headers. Be specific about the linguistic challenges between these two languages.
Include example phrases in both languages where helpful.
The tutor should primarily explain in ${s} while teaching ${t} phrases.`;
}

/**
 * Minimal persona used whenever generation is unavailable or fails
 */
export function fallbackInstructions(source: string, target: string): InstructionSet {
  const s = displayName(source);
  const t = displayName(target);

  return `## IDENTITY
You are a friendly ${t} tutor for ${s} speakers.

## LANGUAGE PAIR
- Learner's native language: ${s}
- Language being learned: ${t}

## APPROACH
- Explain concepts in ${s}
- Teach ${t} phrases with translations
- Be patient and encouraging
- Celebrate progress with dances and emotions

## MEMORY
- Remember learner's name
- Track their progress and struggles
`;
}

/**
 * Synthesizes instruction sets for language pairs. Never fails: any backend
 * problem, or no backend at all, yields the fallback template.
 */
export class ProfileGenerator {
  private config: GeneratorConfig;
  private logger: Logger;

  constructor(
    private backend: CompletionBackend | null,
    config: Partial<GeneratorConfig> = {},
    logger?: Logger
  ) {
    this.config = { ...DEFAULT_GENERATOR_CONFIG, ...config };
    this.logger = (logger ?? silentLogger()).child({ component: 'profile-generator' });
  }

  async generate(source: string, target: string): Promise<InstructionSet> {
    if (!this.backend) {
      this.logger.warn(
        { code: 'GenerationFailed', source, target },
        'No generation credential configured, using fallback template'
      );
      return fallbackInstructions(source, target);
    }

    const request: CompletionRequest = {
      model: this.config.model,
      system: SYSTEM_PROMPT,
      user: buildGenerationPrompt(source, target),
      temperature: this.config.temperature,
      maxTokens: this.config.maxTokens,
      timeoutMs: this.config.timeoutMs,
    };

    try {
      const text = await this.backend.complete(request);
      if (!text.trim()) {
        throw new Error('Empty completion');
      }
      this.logger.info({ source, target, chars: text.length }, 'Generated tutor profile');
      return text;
    } catch (err) {
      this.logger.warn(
        { code: 'GenerationFailed', source, target, error: errorMessage(err) },
        'Profile generation failed, using fallback template'
      );
      return fallbackInstructions(source, target);
    }
  }
}

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string() }),
      })
    )
    .min(1),
});

export interface OpenAIChatBackendOptions {
  apiKey: string;
  baseUrl?: string;
  fetch?: typeof fetch;
}

/**
 * Chat-completions client for OpenAI-compatible endpoints
 */
export class OpenAIChatBackend implements CompletionBackend {
  private apiKey: string;
  private baseUrl: string;
  private fetchImpl: typeof fetch;

  constructor(options: OpenAIChatBackendOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = (options.baseUrl ?? 'https://api.openai.com/v1').replace(/\/+$/, '');
    this.fetchImpl = options.fetch ?? fetch;
  }

  async complete(request: CompletionRequest): Promise<string> {
    const response = await this.fetchImpl(`${this.baseUrl}/chat/completions`, {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${this.apiKey}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({
        model: request.model,
        messages: [
          { role: 'system', content: request.system },
          { role: 'user', content: request.user },
        ],
        temperature: request.temperature,
        max_tokens: request.maxTokens,
      }),
      signal: AbortSignal.timeout(request.timeoutMs),
    });

    if (!response.ok) {
      throw new Error(`Generation request failed with HTTP ${response.status}`);
    }

    const parsed = ChatCompletionSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error('Malformed completion response');
    }
    return parsed.data.choices[0].message.content;
  }
}
