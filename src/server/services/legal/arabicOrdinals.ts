/**
 * Spelled-out Arabic ordinals used to number articles ("المادة الحادية عشرة")
 *
 * Covers 1-109 and 200-209. The table is read once from data/arabic-ordinals.json.
 */

import ordinalTable from '../../data/arabic-ordinals.json';

export const ARABIC_ORDINALS: ReadonlyMap<string, string> = new Map(Object.entries(ordinalTable));

function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Regex source matching any ordinal phrase in the table.
 *
 * Longest phrases come first so "الثانية عشرة" is not cut short at "الثانية";
 * words may be separated by any run of whitespace, including line breaks.
 */
export const ORDINAL_PHRASE_SOURCE: string = [...ARABIC_ORDINALS.keys()]
  .sort((a, b) => b.length - a.length)
  .map((phrase) => phrase.split(' ').map(escapeRegex).join('\\s+'))
  .join('|');

/**
 * Decimal numeral for an ordinal phrase, or null when the phrase is not in the table
 */
export function ordinalToNumeral(phrase: string): string | null {
  return ARABIC_ORDINALS.get(phrase.trim().replace(/\s+/g, ' ')) ?? null;
}
