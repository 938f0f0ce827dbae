import { getLogger } from '../../utils/logger.js';
import { REFERENCE_PATTERNS } from './ArabicLegalPatterns.js';

/**
 * Collects mentions of other legal instruments ("نظام العمل رقم ...",
 * "المادة 5 من نظام ...") in first-seen order.
 */
export class ReferenceExtractor {
  extract(content: string): string[] {
    try {
      const references: string[] = [];
      for (const pattern of REFERENCE_PATTERNS) {
        for (const match of content.matchAll(pattern)) {
          const reference = match[0].trim();
          if (!references.includes(reference)) {
            references.push(reference);
          }
        }
      }
      return references;
    } catch (error) {
      getLogger().error({ error }, 'Failed to extract references');
      return [];
    }
  }
}
