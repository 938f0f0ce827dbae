import type { LawSourceMetadata, LawSourceOverrides } from '../../types/legal.js';
import { normalizeArabicDigits } from '../../utils/arabicText.js';
import { getLogger } from '../../utils/logger.js';
import {
  ISSUING_AUTHORITY_PATTERNS,
  LAW_NAME_PATTERNS,
  LAW_TYPE_PATTERNS,
  YEAR_PATTERNS,
} from './ArabicLegalPatterns.js';

export const DEFAULT_LAW_NAME = 'وثيقة قانونية';
export const DEFAULT_JURISDICTION = 'المملكة العربية السعودية';

/** Only the leading slice of the document is used for the description */
const DESCRIPTION_WINDOW = 500;

export function defaultLawSource(): LawSourceMetadata {
  return {
    name: DEFAULT_LAW_NAME,
    type: 'law',
    jurisdiction: DEFAULT_JURISDICTION,
    issuingAuthority: null,
    issueDate: null,
    lastUpdate: null,
    description: null,
    sourceUrl: null,
  };
}

function firstCapture(patterns: readonly RegExp[], text: string): string | null {
  for (const pattern of patterns) {
    const match = pattern.exec(text);
    if (match) {
      return match[1].trim();
    }
  }
  return null;
}

/**
 * Infers law metadata (name, type, issuing authority, year, description)
 * from the raw text of a legal document.
 */
export class LawSourceDetector {
  /**
   * Detect law source information from Arabic text. Never throws; fields
   * without a match keep their defaults.
   */
  detect(text: string): LawSourceMetadata {
    const detected = defaultLawSource();

    try {
      const name = firstCapture(LAW_NAME_PATTERNS, text);
      if (name) {
        detected.name = name;
      }

      const typeMatch = LAW_TYPE_PATTERNS.find(([pattern]) => pattern.test(text));
      if (typeMatch) {
        detected.type = typeMatch[1];
      }

      detected.issuingAuthority = firstCapture(ISSUING_AUTHORITY_PATTERNS, text);

      const year = firstCapture(YEAR_PATTERNS, text);
      if (year) {
        detected.issueDate = `${normalizeArabicDigits(year)}-01-01`;
      }

      const firstSentence = text.slice(0, DESCRIPTION_WINDOW).split(/[.!?]/)[0].trim();
      if (firstSentence) {
        detected.description = firstSentence;
      }

      return detected;
    } catch (error) {
      getLogger().error({ error }, 'Failed to detect law source from text');
      return defaultLawSource();
    }
  }

  /**
   * Overlay caller-provided details onto detected ones; a provided value wins
   * unless it is null or undefined.
   */
  merge(detected: LawSourceMetadata, provided?: LawSourceOverrides | null): LawSourceMetadata {
    const merged: LawSourceMetadata = { ...detected };
    if (!provided) {
      return merged;
    }

    const assign = <K extends keyof LawSourceMetadata>(key: K): void => {
      const value = provided[key];
      if (value !== null && value !== undefined) {
        merged[key] = value;
      }
    };

    assign('name');
    assign('type');
    assign('jurisdiction');
    assign('issuingAuthority');
    assign('issueDate');
    assign('lastUpdate');
    assign('description');
    assign('sourceUrl');

    return merged;
  }
}
