/**
 * Language code normalization
 */

import type { MediaItem } from './types.js';

const THREE_LETTER_CODES: Readonly<Record<string, string>> = {
  eng: 'en',
  spa: 'es',
  fra: 'fr',
  fre: 'fr',
  deu: 'de',
  ger: 'de',
  ita: 'it',
  por: 'pt',
  nld: 'nl',
  dut: 'nl',
  rus: 'ru',
  jpn: 'ja',
  zho: 'zh',
  chi: 'zh',
  kor: 'ko',
  ara: 'ar',
  swe: 'sv',
  pol: 'pl',
  tur: 'tr',
  heb: 'he',
};

/**
 * Reduces a language code to its 2-letter form. Unknown 3-letter codes keep
 * their first two letters, which is wrong for some languages (e.g. "ces").
 */
export function normalizeLanguage(code: string): string {
  const lowered = code.trim().toLowerCase();
  if (lowered.length === 3) {
    return THREE_LETTER_CODES[lowered] ?? lowered.slice(0, 2);
  }
  return lowered;
}

/** Normalizes and de-duplicates, keeping first-seen order */
export function normalizeLanguageSet(codes: Iterable<string>): string[] {
  const result = new Set<string>();
  for (const code of codes) {
    const normalized = normalizeLanguage(code);
    if (normalized) result.add(normalized);
  }
  return [...result];
}

export function existingLanguages(item: Pick<MediaItem, 'subtitleLanguages'>): Set<string> {
  return new Set(normalizeLanguageSet(item.subtitleLanguages));
}

export function missingLanguages(item: Pick<MediaItem, 'subtitleLanguages'>, wanted: Iterable<string>): string[] {
  const existing = existingLanguages(item);
  return normalizeLanguageSet(wanted).filter((language) => !existing.has(language));
}

export function isTwoLetterCode(code: string): boolean {
  return /^[a-z]{2}$/.test(code);
}
