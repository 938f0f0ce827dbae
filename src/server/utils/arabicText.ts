/**
 * Arabic text utility
 *
 * Generic normalization and keyword mining used by the legal extractors.
 * The pipeline depends on the ArabicTextUtility interface only, so callers
 * can plug in their own implementation.
 */

import stopWordList from '../data/arabic-stopwords.json';

export interface ArabicTextUtility {
  normalize(text: string): string;
  extractGenericKeywords(text: string, maxKeywords: number): string[];
}

const ARABIC_CHARACTERS = /[\u0600-\u06FF]/;
const ARABIC_WORD = /[\u0600-\u06FF]+/g;
const STOP_WORDS: ReadonlySet<string> = new Set(stopWordList);
const MIN_KEYWORD_LENGTH = 3;

export function isArabicText(text: string): boolean {
  return Boolean(text) && ARABIC_CHARACTERS.test(text);
}

/**
 * Convert Arabic-Indic (٠-٩) and Extended Arabic-Indic (۰-۹) digits to ASCII
 */
export function normalizeArabicDigits(value: string): string {
  return value
    .replace(/[٠-٩]/g, (d) => String(d.charCodeAt(0) - 0x0660))
    .replace(/[۰-۹]/g, (d) => String(d.charCodeAt(0) - 0x06f0));
}

export function normalizeArabicText(text: string): string {
  if (!text) return text;

  return text
    .normalize('NFC')
    .replace(/\s+/g, ' ')
    .replace(/،/g, ',')
    .replace(/[\u201C\u201D]/g, '"')
    .replace(/[\u2018\u2019]/g, "'")
    .replace(/\.{2,}/g, '...')
    .trim();
}

/**
 * Unique Arabic words of three letters or more, stop words removed, in order of appearance
 */
export function extractArabicKeywords(text: string, maxKeywords: number = 10): string[] {
  if (!isArabicText(text)) return [];

  const words = normalizeArabicText(text).match(ARABIC_WORD) ?? [];
  const keywords = new Set<string>();
  for (const word of words) {
    if (word.length >= MIN_KEYWORD_LENGTH && !STOP_WORDS.has(word)) {
      keywords.add(word);
    }
  }

  return [...keywords].slice(0, maxKeywords);
}

export const defaultArabicTextUtility: ArabicTextUtility = {
  normalize: normalizeArabicText,
  extractGenericKeywords: extractArabicKeywords,
};
