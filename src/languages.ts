import { TutorError } from './errors.js';
import type { LanguagePair } from './types.js';

export interface LanguageInfo {
  nativeName: string;
  flag: string;
  voice: string;
}

export const DEFAULT_VOICE = 'coral';

// Voice is the realtime voice used when the language is the one being learned.
export const LANGUAGES: Readonly<Record<string, LanguageInfo>> = {
  english: { nativeName: 'English', flag: '🇬🇧', voice: 'shimmer' },
  chinese: { nativeName: '中文 (Mandarin)', flag: '🇨🇳', voice: 'coral' },
  spanish: { nativeName: 'Español', flag: '🇪🇸', voice: 'coral' },
  french: { nativeName: 'Français', flag: '🇫🇷', voice: 'coral' },
  german: { nativeName: 'Deutsch', flag: '🇩🇪', voice: 'ash' },
  italian: { nativeName: 'Italiano', flag: '🇮🇹', voice: 'coral' },
  portuguese: { nativeName: 'Português', flag: '🇧🇷', voice: 'coral' },
  japanese: { nativeName: '日本語', flag: '🇯🇵', voice: 'coral' },
  korean: { nativeName: '한국어', flag: '🇰🇷', voice: 'coral' },
  arabic: { nativeName: 'العربية', flag: '🇸🇦', voice: 'coral' },
  russian: { nativeName: 'Русский', flag: '🇷🇺', voice: 'coral' },
  dutch: { nativeName: 'Nederlands', flag: '🇳🇱', voice: 'coral' },
  hindi: { nativeName: 'हिन्दी', flag: '🇮🇳', voice: 'coral' },
};

// No "_": it separates source from target in cache keys.
const LANGUAGE_CODE = /^[a-z][a-z0-9-]*$/;

function lookup(code: string): LanguageInfo | undefined {
  const key = code.trim().toLowerCase();
  return Object.hasOwn(LANGUAGES, key) ? LANGUAGES[key] : undefined;
}

function titleCase(code: string): string {
  return code
    .trim()
    .toLowerCase()
    .split(/[\s_-]+/)
    .filter(Boolean)
    .map(w => w.charAt(0).toUpperCase() + w.slice(1))
    .join(' ');
}

/**
 * Native display name, or the code title-cased when the language is not catalogued
 */
export function displayName(code: string): string {
  return lookup(code)?.nativeName ?? titleCase(code);
}

export function voiceFor(code: string): string {
  return lookup(code)?.voice ?? DEFAULT_VOICE;
}

/**
 * Lower-case and validate a pair. Throws InvalidPair.
 */
export function normalizePair(source: string, target: string): LanguagePair {
  const s = source.trim().toLowerCase();
  const t = target.trim().toLowerCase();

  if (!s || !t) {
    throw new TutorError('InvalidPair', 'Both source and target languages are required');
  }
  if (!LANGUAGE_CODE.test(s) || !LANGUAGE_CODE.test(t)) {
    throw new TutorError('InvalidPair', `Invalid language code in pair "${source}" → "${target}"`);
  }
  if (s === t) {
    throw new TutorError('InvalidPair', 'Source and target languages must be different');
  }

  return { source: s, target: t };
}

/**
 * Deterministic key for a normalized pair, e.g. "spanish_to_english"
 */
export function pairKey(pair: LanguagePair): string {
  return `${pair.source}_to_${pair.target}`;
}

export function describePair(pair: LanguagePair): string {
  return `${displayName(pair.source)} → ${displayName(pair.target)}`;
}
