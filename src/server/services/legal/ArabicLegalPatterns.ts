/**
 * Pattern tables for Arabic legal documents
 *
 * Every list is scanned in order and order decides the outcome: the first
 * pattern that matches anywhere in the text wins. Do not reorder entries.
 */

import legalKeywords from '../../data/legal-keywords.json';
import type { LawType } from '../../types/legal.js';
import { ORDINAL_PHRASE_SOURCE } from './arabicOrdinals.js';

/** ASCII, Arabic-Indic and Extended Arabic-Indic digits */
const DIGIT = '[0-9\\u0660-\\u0669\\u06F0-\\u06F9]';

export const LAW_NAME_PATTERNS: readonly RegExp[] = Object.freeze([
  /نظام\s+(.+?)(?:\s+رقم|\s+لعام|\s+لسنة)/u,
  /مرسوم\s+(.+?)(?:\s+رقم|\s+لعام|\s+لسنة)/u,
  /قانون\s+(.+?)(?:\s+رقم|\s+لعام|\s+لسنة)/u,
  /لائحة\s+(.+?)(?:\s+رقم|\s+لعام|\s+لسنة)/u,
  /قرار\s+(.+?)(?:\s+رقم|\s+لعام|\s+لسنة)/u,
]);

export const LAW_TYPE_PATTERNS: ReadonlyArray<readonly [RegExp, LawType]> = Object.freeze([
  [/نظام/u, 'law'],
  [/مرسوم/u, 'decree'],
  [/قانون/u, 'law'],
  [/لائحة/u, 'regulation'],
  [/قرار/u, 'directive'],
] as const);

export const ISSUING_AUTHORITY_PATTERNS: readonly RegExp[] = Object.freeze([
  /وزارة\s+(.+?)(?:\s+و|\s+،|\s+\.|\s+\n)/u,
  /هيئة\s+(.+?)(?:\s+و|\s+،|\s+\.|\s+\n)/u,
  /مجلس\s+(.+?)(?:\s+و|\s+،|\s+\.|\s+\n)/u,
]);

export const YEAR_PATTERNS: readonly RegExp[] = Object.freeze([
  new RegExp(`لعام\\s+(${DIGIT}{4})`, 'u'),
  new RegExp(`لسنة\\s+(${DIGIT}{4})`, 'u'),
  new RegExp(`عام\\s+(${DIGIT}{4})`, 'u'),
  new RegExp(`سنة\\s+(${DIGIT}{4})`, 'u'),
]);

/** Arabic letters, hamza forms included, without diacritics */
const LETTER = '[\\u0621-\\u063A\\u0641-\\u064A]';

/**
 * Words that extend an ordinal into a larger one ("العاشرة بعد المائة",
 * "الحادية عشرة", "الثالثة والأربعون", "الخامسة بعد الثلاثمائة").
 */
const ORDINAL_CONTINUATION =
  `(?:عشرة|بعد\\s+(?:المائة|المائتين|ال${LETTER}+مائة)|وال(?:عشرون|ثلاثون|أربعون|خمسون|ستون|سبعون|ثمانون|تسعون))`;

/**
 * An ordinal article heading: a table phrase plus any continuation words,
 * ending at a word boundary; or any "ال" word run that is closed by ":".
 * Phrases outside the table are therefore captured whole instead of being
 * cut at their longest known prefix.
 */
const ORDINAL_HEADING =
  `(?:(?:${ORDINAL_PHRASE_SOURCE})(?:\\s+${ORDINAL_CONTINUATION}(?!${LETTER}))*(?!${LETTER})` +
  `|ال${LETTER}+(?:\\s+(?:${ORDINAL_CONTINUATION}|ال${LETTER}+)(?!${LETTER}))*(?=\\s*:))`;

/**
 * "المادة" + ordinal heading, optional ":" or ".", then the body up to the
 * next ordinal article heading or the end of the text.
 * Groups: 1 = ordinal phrase, 2 = body.
 */
export const ORDINAL_ARTICLE_PATTERN: RegExp = new RegExp(
  `المادة\\s+(${ORDINAL_HEADING})[:.]?\\s*(.*?)(?=المادة\\s+${ORDINAL_HEADING}|$)`,
  'gsu'
);

function numberedMarkerPattern(marker: string): RegExp {
  return new RegExp(`${marker}\\s+(${DIGIT}+)[:.]?\\s*(.*?)(?=${marker}\\s+${DIGIT}+|$)`, 'gsu');
}

/**
 * Numbered markers tried when no ordinal heading is found; all four are applied
 * and their results accumulated. A bare "مادة" is only a marker when it is not
 * the tail of "المادة". Groups: 1 = digits, 2 = body.
 */
export const NUMERIC_ARTICLE_PATTERNS: readonly RegExp[] = Object.freeze([
  numberedMarkerPattern('المادة'),
  numberedMarkerPattern('(?<!ال)مادة'),
  numberedMarkerPattern('الفقرة'),
  numberedMarkerPattern('البند'),
]);

export const REFERENCE_PATTERNS: readonly RegExp[] = Object.freeze([
  /نظام\s+(.+?)(?:\s+رقم|\s+لعام)/gu,
  /قانون\s+(.+?)(?:\s+رقم|\s+لعام)/gu,
  /مرسوم\s+(.+?)(?:\s+رقم|\s+لعام)/gu,
  new RegExp(`المادة\\s+(${DIGIT}+)\\s+من\\s+(.+?)(?:\\s+رقم|\\s+لعام)`, 'gu'),
  new RegExp(`الفقرة\\s+(${DIGIT}+)\\s+من\\s+(.+?)(?:\\s+رقم|\\s+لعام)`, 'gu'),
]);

export const LEGAL_KEYWORDS: readonly string[] = Object.freeze([...legalKeywords]);

/** Pulls the numeral back out of a canonical "المادة {N}" for sorting */
export const ARTICLE_NUMBER_PATTERN = /المادة\s+(\d+)/u;
