import { defaultArabicTextUtility } from '../../utils/arabicText.js';
import type { ArabicTextUtility } from '../../utils/arabicText.js';
import { getLogger } from '../../utils/logger.js';
import { LEGAL_KEYWORDS } from './ArabicLegalPatterns.js';

/**
 * Keywords for an article body: legal dictionary terms first, in dictionary
 * order, then generic keywords from the text utility.
 */
export class KeywordExtractor {
  constructor(private readonly textUtility: ArabicTextUtility = defaultArabicTextUtility) {}

  extract(content: string, maxKeywords: number = 10): string[] {
    try {
      const keywords: string[] = [];
      const haystack = content.toLowerCase();

      for (const term of LEGAL_KEYWORDS) {
        if (haystack.includes(term)) {
          keywords.push(term);
        }
      }

      for (const word of this.textUtility.extractGenericKeywords(content, maxKeywords)) {
        if (!keywords.includes(word)) {
          keywords.push(word);
        }
      }

      return keywords.slice(0, maxKeywords);
    } catch (error) {
      getLogger().error({ error }, 'Failed to extract keywords');
      return [];
    }
  }
}
